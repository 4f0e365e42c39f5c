#!/usr/bin/env node

import * as fs from "fs";
import * as path from "path";
import { Command } from "commander";
import chalk from "chalk";
import { createActivityCommand } from "./commands/activity";
import { createFindBranchCommand } from "./commands/find-branch";
import { createSearchCommand } from "./commands/search";
import { createStaleCommand } from "./commands/stale";

function readVersion(): string {
  const manifest: unknown = JSON.parse(
    fs.readFileSync(path.join(__dirname, "..", "package.json"), "utf-8"),
  );
  if (
    typeof manifest === "object" &&
    manifest !== null &&
    "version" in manifest &&
    typeof manifest.version === "string"
  ) {
    return manifest.version;
  }
  return "0.0.0";
}

const program = new Command();

program
  .name("gitc")
  .description("gitc adds branch search, activity reports, stale-branch cleanup and commit search on top of git")
  .version(readVersion())
  .option("-C, --repo <path>", "Repository to operate on (defaults to $GITC_REPO or the current directory)")
  .option("--timeout <ms>", "Kill git commands that stall for longer than this (defaults to $GITC_TIMEOUT_MS or 30000)")
  .option("--verbose", "Print every git command that runs", false);

// Add all commands
program.addCommand(createFindBranchCommand());
program.addCommand(createActivityCommand());
program.addCommand(createStaleCommand());
program.addCommand(createSearchCommand());

// Handle unknown commands
program.on("command:*", () => {
  console.error(chalk.red("Invalid command:"), program.args.join(" "));
  console.log(chalk.yellow("See --help for a list of available commands."));
  process.exit(1);
});

// Error handling
process.on("uncaughtException", (error) => {
  console.error(chalk.red("Uncaught Exception:"), error.message);
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  console.error(chalk.red("Unhandled Rejection:"), reason);
  process.exit(1);
});

// If no command is provided, show help
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync().catch((error: unknown) => {
    console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
    process.exit(1);
  });
}

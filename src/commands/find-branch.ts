import { Command } from "commander";
import chalk from "chalk";
import { GitAdapter } from "../git/GitAdapter";
import { parseBranchRecords } from "../git/parsers";
import { compilePattern, describeScope, matchBranches, unifyBranches } from "../git/patterns";
import type { GlobalOptions, RuntimeConfig, UnifiedBranch } from "../models";
import {
  formatDate,
  handleCommandError,
  printTable,
  resolveRuntimeConfig,
  setVerbose,
  shortHash,
} from "../utils";

export interface FindBranchCommandOptions {
  regex: boolean;
  locals: boolean;
  remotes: boolean;
  json: boolean;
}

export function createFindBranchCommand(): Command {
  const command = new Command("find-branch");

  command
    .alias("fb")
    .description("Find branches across local and remote refs")
    .argument("<pattern>", "Glob pattern(s), comma-separated (e.g. 'DEV_*' or 'feature/*,hotfix/*')")
    .option("--regex", "Treat the pattern as a regular expression", false)
    .option("--no-locals", "Leave out local branches")
    .option("--no-remotes", "Leave out remote-tracking branches")
    .option("--json", "Output in JSON format", false)
    .action(async (pattern: string, options: FindBranchCommandOptions, cmd: Command) => {
      try {
        const config = resolveRuntimeConfig(cmd.optsWithGlobals<GlobalOptions>());
        setVerbose(config.verbose);
        await runFindBranch(pattern, options, config);
      } catch (error) {
        handleCommandError(error);
      }
    });

  return command;
}

export async function runFindBranch(
  pattern: string,
  options: FindBranchCommandOptions,
  config: RuntimeConfig,
): Promise<UnifiedBranch[]> {
  // Validate before touching git so a bad pattern fails fast
  compilePattern(pattern, { regex: options.regex });

  const adapter = await GitAdapter.open(config);
  const output = await adapter.listRefs({ locals: options.locals, remotes: options.remotes });
  const records = parseBranchRecords(output);

  const matches = unifyBranches(matchBranches(pattern, records, { regex: options.regex }))
    .sort((a, b) => a.name.toLowerCase().localeCompare(b.name.toLowerCase()));

  if (options.json) {
    const jsonOutput = matches.map((branch) => ({
      name: branch.name,
      local: branch.local !== null,
      remotes: branch.remotes.map((remote) => remote.remote),
      upstream: branch.local?.upstream ?? null,
      lastCommit: branch.lastCommitTime.toISOString(),
      hash: branch.lastCommitHash,
    }));
    console.log(JSON.stringify(jsonOutput, null, 2));
    return matches;
  }

  if (matches.length === 0) {
    console.log(chalk.yellow("No branches matched."));
    return matches;
  }

  printTable(
    ["BRANCH", "SCOPE", "UPSTREAM", "LAST_COMMIT", "HASH"],
    matches.map((branch) => [
      branch.name,
      describeScope(branch),
      branch.local?.upstream ?? "-",
      formatDate(branch.lastCommitTime),
      shortHash(branch.lastCommitHash),
    ]),
  );

  return matches;
}

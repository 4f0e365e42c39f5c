import { Command } from "commander";
import chalk from "chalk";
import confirm from "@inquirer/confirm";
import { GitAdapter } from "../git/GitAdapter";
import { parseBranchRecords } from "../git/parsers";
import { ProtectionSet, classifyStale, isStale, parseThreshold } from "../git/staleness";
import type {
  BranchRecord,
  DeletionReport,
  GlobalOptions,
  RuntimeConfig,
  StaleClassification,
} from "../models";
import {
  GitcError,
  formatDate,
  formatRelativeAge,
  handleCommandError,
  printTable,
  resolveRuntimeConfig,
  setVerbose,
} from "../utils";

export interface StaleCommandOptions {
  delete: boolean;
  keep?: string;
  force: boolean;
  remotes: boolean;
}

export interface StaleResult {
  classification: StaleClassification;
  staleRemotes: BranchRecord[];
  report: DeletionReport | null;
}

export function createStaleCommand(): Command {
  const command = new Command("stale");

  command
    .description("List local branches with no commits within a duration, and optionally delete them")
    .argument("<duration>", "Age threshold such as 30d, 12w, 6m or 1y")
    .option("--delete", "Delete the stale local branches", false)
    .option(
      "--keep <names>",
      "Comma-separated branches to preserve in addition to main, master, develop and dev",
    )
    .option("-f, --force", "Skip confirmation and force-delete (git branch -D)", false)
    .option("--remotes", "Also list stale remote-tracking branches (never deleted)", false)
    .action(async (duration: string, options: StaleCommandOptions, cmd: Command) => {
      try {
        const config = resolveRuntimeConfig(cmd.optsWithGlobals<GlobalOptions>());
        setVerbose(config.verbose);
        const result = await runStale(duration, options, config);
        if (result.report && result.report.failed.length > 0) {
          process.exitCode = 1;
        }
      } catch (error) {
        handleCommandError(error);
      }
    });

  return command;
}

export async function runStale(
  duration: string,
  options: StaleCommandOptions,
  config: RuntimeConfig,
  now: Date = new Date(),
): Promise<StaleResult> {
  // A malformed threshold must fail before anything is listed or deleted
  const threshold = parseThreshold(duration, now);

  if (options.delete && !options.force && !process.stdin.isTTY) {
    throw new GitcError("Confirming deletions requires a TTY. Re-run with --force to delete without prompting.");
  }

  const adapter = await GitAdapter.open(config);
  const current = await adapter.currentBranch();
  const protection = ProtectionSet.fromKeepList(options.keep, current ? [current] : []);

  const records = parseBranchRecords(
    await adapter.listRefs({ locals: true, remotes: options.remotes }),
  );
  const locals = records.filter((record) => record.scope === "local");
  const classification = classifyStale({ threshold, protection, branches: locals });

  const staleRemotes = records.filter(
    (record) =>
      record.scope === "remote" && !protection.has(record.name) && isStale(record, threshold.cutoff),
  );

  const result: StaleResult = { classification, staleRemotes, report: null };

  if (classification.deletable.length === 0 && staleRemotes.length === 0) {
    console.log(chalk.yellow(`No stale branches found older than ${threshold.expression}.`));
    printProtected(classification.protected, threshold.cutoff);
    return result;
  }

  console.log(
    chalk.green(
      `Found ${classification.deletable.length + staleRemotes.length} branch(es) with no commits since ${formatDate(threshold.cutoff)}:`,
    ),
  );
  console.log();

  printTable(
    ["BRANCH", "SCOPE", "LAST_COMMIT", "AGE"],
    [...classification.deletable, ...staleRemotes].map((record) => [
      record.scope === "remote" ? `${record.remote}/${record.name}` : record.name,
      record.scope,
      formatDate(record.lastCommitTime),
      formatRelativeAge(record.lastCommitTime, now),
    ]),
  );
  printProtected(classification.protected, threshold.cutoff);

  if (!options.delete) {
    if (classification.deletable.length > 0) {
      console.log();
      console.log(chalk.blue("Re-run with --delete to remove the stale local branches."));
    }
    return result;
  }

  if (classification.deletable.length === 0) {
    console.log();
    console.log(chalk.yellow("No local branches to delete; remote branches are never deleted."));
    return result;
  }

  console.log(chalk.blue("\nDeleting stale local branches..."));
  result.report = await deleteBranches(adapter, classification.deletable, options.force);
  printReport(result.report);

  return result;
}

/**
 * Delete each branch independently; one failure never stops the rest.
 * Without `force`, every branch is confirmed first and deleted with `git branch -d`.
 */
export async function deleteBranches(
  adapter: GitAdapter,
  branches: BranchRecord[],
  force: boolean,
): Promise<DeletionReport> {
  const report: DeletionReport = { deleted: [], skipped: [], failed: [] };

  for (const branch of branches) {
    if (!force) {
      const proceed = await confirm({
        message: `Delete branch '${branch.name}' (last commit ${formatDate(branch.lastCommitTime)})?`,
        default: false,
      });
      if (!proceed) {
        report.skipped.push(branch.name);
        continue;
      }
    }

    try {
      await adapter.deleteBranch(branch.name, force);
      report.deleted.push(branch.name);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      report.failed.push({ branch: branch.name, error: errorMessage });
    }
  }

  return report;
}

function printProtected(branches: BranchRecord[], cutoff: Date): void {
  const staleProtected = branches.filter((branch) => isStale(branch, cutoff));
  if (staleProtected.length > 0) {
    console.log(
      chalk.gray(`Protected (kept): ${staleProtected.map((branch) => branch.name).join(", ")}`),
    );
  }
}

function printReport(report: DeletionReport): void {
  for (const branch of report.deleted) {
    console.log(chalk.green(`✓ Deleted branch: ${branch}`));
  }
  for (const branch of report.skipped) {
    console.log(chalk.gray(`- Skipped branch: ${branch}`));
  }
  for (const failure of report.failed) {
    console.log(chalk.red(`✗ Failed to delete ${failure.branch}: ${failure.error}`));
  }

  console.log(
    chalk.bold(
      `\nDeleted ${report.deleted.length}, skipped ${report.skipped.length}, failed ${report.failed.length}.`,
    ),
  );
}

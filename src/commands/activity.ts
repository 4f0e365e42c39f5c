import { Command } from "commander";
import chalk from "chalk";
import { GitAdapter } from "../git/GitAdapter";
import { parseBranchRecords, parseCommitRecords } from "../git/parsers";
import { compilePattern, matchBranches } from "../git/patterns";
import type { CommitRecord, GlobalOptions, RuntimeConfig } from "../models";
import {
  GitcError,
  formatDate,
  formatTable,
  handleCommandError,
  resolveDateExpression,
  resolveRuntimeConfig,
  setVerbose,
  shortHash,
} from "../utils";

export interface ActivityCommandOptions {
  since: string;
  until?: string;
  branch: string;
  regex: boolean;
  author?: string;
  limit?: string;
}

export interface BranchActivity {
  branch: string;
  commits: CommitRecord[];
}

export function createActivityCommand(): Command {
  const command = new Command("activity");

  command
    .description("Show commits on local branches matching a pattern within a date range")
    .requiredOption(
      "--since <date>",
      "Start of the range: anything git understands (yesterday, 2025-08-01) or a duration like 2w",
    )
    .option("--until <date>", "End of the range, same formats as --since")
    .option("-b, --branch <pattern>", "Branch glob pattern(s), comma-separated", "*")
    .option("--regex", "Treat the branch pattern as a regular expression", false)
    .option("--author <name>", "Only commits by this author")
    .option("--limit <n>", "Maximum commits to show per branch")
    .action(async (options: ActivityCommandOptions, cmd: Command) => {
      try {
        const config = resolveRuntimeConfig(cmd.optsWithGlobals<GlobalOptions>());
        setVerbose(config.verbose);
        await runActivity(options, config);
      } catch (error) {
        handleCommandError(error);
      }
    });

  return command;
}

function parseLimit(limit: string | undefined): number {
  if (limit === undefined) {
    return 0;
  }
  if (!/^\d+$/.test(limit.trim())) {
    throw new GitcError(`Invalid --limit '${limit}': expected a non-negative integer`);
  }
  return Number(limit);
}

export async function runActivity(
  options: ActivityCommandOptions,
  config: RuntimeConfig,
  now: Date = new Date(),
): Promise<BranchActivity[]> {
  compilePattern(options.branch, { regex: options.regex });
  const maxCount = parseLimit(options.limit);
  const since = resolveDateExpression(options.since, now);
  const until = options.until ? resolveDateExpression(options.until, now) : undefined;

  const adapter = await GitAdapter.open(config);
  const branches = matchBranches(
    options.branch,
    parseBranchRecords(await adapter.listRefs({ locals: true, remotes: false })),
    { regex: options.regex },
  ).sort((a, b) => a.name.toLowerCase().localeCompare(b.name.toLowerCase()));

  if (branches.length === 0) {
    console.log(chalk.yellow("No local branches matched."));
    return [];
  }

  const activity: BranchActivity[] = [];
  let total = 0;

  for (const branch of branches) {
    const output = await adapter.log({
      revisions: [branch.ref],
      since,
      until,
      author: options.author,
      maxCount,
    });
    const commits = parseCommitRecords(output, { fallbackBranch: branch.name });
    if (commits.length === 0) {
      continue;
    }

    activity.push({ branch: branch.name, commits });
    total += commits.length;

    console.log();
    console.log(chalk.bold(`[${branch.name}] ${commits.length} commit(s)`));
    const [, ...lines] = formatTable(
      ["HASH", "DATE", "AUTHOR", "MESSAGE"],
      commits.map((commit) => [
        shortHash(commit.hash),
        formatDate(commit.timestamp),
        commit.author,
        commit.message,
      ]),
    );
    for (const line of lines) {
      console.log(`  ${line}`);
    }
  }

  console.log();
  if (total === 0) {
    console.log(chalk.yellow("No activity found."));
  } else {
    console.log(chalk.bold(`Total commits: ${total}`));
  }

  return activity;
}

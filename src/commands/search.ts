import { Command, Option } from "commander";
import chalk from "chalk";
import { GitAdapter } from "../git/GitAdapter";
import { parseCommitRecords } from "../git/parsers";
import type { CommitRecord, GlobalOptions, GrepMatchMode, RuntimeConfig } from "../models";
import {
  GitcError,
  InvalidPickError,
  formatDate,
  handleCommandError,
  printTable,
  resolveDateExpression,
  resolveRuntimeConfig,
  setVerbose,
  shortHash,
} from "../utils";
import { pickCommit } from "./commit-picker";

const DEFAULT_SHOW = "20";

export interface SearchCommandOptions {
  all: boolean;
  caseSensitive: boolean;
  ignoreCase?: boolean;
  match: GrepMatchMode;
  author?: string;
  since?: string;
  until?: string;
  show: string;
  /** Row number to cherry-pick, or `true` to choose interactively */
  pick?: string | true;
}

export interface SearchResult {
  commits: CommitRecord[];
  picked: CommitRecord | null;
}

export function createSearchCommand(): Command {
  const command = new Command("search");

  command
    .description("Search commit messages and optionally cherry-pick a result")
    .argument("<keyword>", "Text to look for in commit messages")
    .option("--all", "Search every ref (default)", true)
    .option("--no-all", "Search only the current branch instead of all refs")
    .option("--case-sensitive", "Match the keyword case-sensitively", false)
    .addOption(
      new Option("-i, --ignore-case", "Match the keyword case-insensitively (default)").conflicts("caseSensitive"),
    )
    .addOption(
      new Option("--match <mode>", "How the keyword is interpreted by git's --grep")
        .choices(["basic", "extended", "fixed"])
        .default("basic"),
    )
    .option("--author <name>", "Only commits by this author")
    .option("--since <date>", "Only commits after this date (git date or a duration like 2w)")
    .option("--until <date>", "Only commits before this date")
    .option("--show <n>", "Maximum number of commits to list (0 for no limit)", DEFAULT_SHOW)
    .option("--pick [n]", "Cherry-pick result number n; without n, choose interactively")
    .action(async (keyword: string, options: SearchCommandOptions, cmd: Command) => {
      try {
        const config = resolveRuntimeConfig(cmd.optsWithGlobals<GlobalOptions>());
        setVerbose(config.verbose);
        await runSearch(keyword, options, config);
      } catch (error) {
        handleCommandError(error);
      }
    });

  return command;
}

function parseShow(show: string): number {
  if (!/^\d+$/.test(show.trim())) {
    throw new GitcError(`Invalid --show '${show}': expected a non-negative integer`);
  }
  return Number(show);
}

function resolvePickIndex(pick: string, count: number): number {
  const index = /^\d+$/.test(pick.trim()) ? Number(pick) : NaN;
  if (!Number.isInteger(index) || index < 1 || index > count) {
    throw new InvalidPickError(`--pick must be between 1 and ${count}`);
  }
  return index - 1;
}

export async function runSearch(
  keyword: string,
  options: SearchCommandOptions,
  config: RuntimeConfig,
  now: Date = new Date(),
): Promise<SearchResult> {
  if (keyword === "") {
    throw new GitcError("Search keyword cannot be empty");
  }
  const maxCount = parseShow(options.show);

  const adapter = await GitAdapter.open(config);
  const output = await adapter.log({
    all: options.all,
    grep: keyword,
    matchMode: options.match,
    ignoreCase: options.ignoreCase === true || !options.caseSensitive,
    author: options.author,
    since: options.since ? resolveDateExpression(options.since, now) : undefined,
    until: options.until ? resolveDateExpression(options.until, now) : undefined,
    maxCount,
  });
  const commits = parseCommitRecords(output);

  if (commits.length === 0) {
    console.log(chalk.yellow("No matching commits."));
    return { commits, picked: null };
  }

  printTable(
    ["#", "HASH", "DATE", "AUTHOR", "BRANCH", "MESSAGE"],
    commits.map((commit, index) => [
      String(index + 1),
      shortHash(commit.hash),
      formatDate(commit.timestamp),
      commit.author,
      commit.branch || "-",
      commit.message,
    ]),
  );

  if (options.pick === undefined) {
    return { commits, picked: null };
  }

  const picked =
    options.pick === true
      ? await pickCommit(commits)
      : commits[resolvePickIndex(options.pick, commits.length)];

  if (!picked) {
    return { commits, picked: null };
  }

  console.log(chalk.bold(`\nCherry-picking ${shortHash(picked.hash)} ...`));
  const result = await adapter.cherryPick(picked.hash);
  if (result.trim()) {
    console.log(result.trim());
  }
  console.log(chalk.green(`✓ Cherry-picked ${shortHash(picked.hash)}: ${picked.message}`));

  return { commits, picked };
}

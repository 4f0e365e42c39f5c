import * as path from "path";
import chalk from "chalk";
import type { GlobalOptions, RuntimeConfig } from "../models";

// ============================================================================
// Error Handling
// ============================================================================

/**
 * Base class for every error gitc raises on purpose.
 * `exitCode` is what the process exits with when the error reaches the CLI.
 */
export class GitcError extends Error {
  constructor(message: string, public readonly exitCode: number = 1) {
    super(message);
    this.name = "GitcError";
  }
}

export class NotARepositoryError extends GitcError {
  constructor(public readonly repoPath: string, detail?: string) {
    super(
      `Not inside a git repository: ${repoPath}${detail ? ` (${detail})` : ""}`,
      2,
    );
    this.name = "NotARepositoryError";
  }
}

export class ExecutableNotFoundError extends GitcError {
  constructor(public readonly executable: string = "git") {
    super(`'${executable}' was not found on PATH. Install it or fix your PATH and try again.`);
    this.name = "ExecutableNotFoundError";
  }
}

export class GitExitError extends GitcError {
  constructor(public readonly subcommand: string, public readonly detail: string) {
    super(`git ${subcommand} failed: ${detail}`);
    this.name = "GitExitError";
  }
}

export class GitTimeoutError extends GitcError {
  constructor(public readonly subcommand: string, public readonly timeoutMs: number) {
    super(`git ${subcommand} timed out after ${timeoutMs}ms`);
    this.name = "GitTimeoutError";
  }
}

export class InvalidThresholdError extends GitcError {
  constructor(public readonly expression: string) {
    super(`Invalid duration '${expression}' (use formats like: 30d, 12w, 6m, 1y)`);
    this.name = "InvalidThresholdError";
  }
}

export class InvalidPatternError extends GitcError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidPatternError";
  }
}

export class InvalidPickError extends GitcError {
  constructor(message: string) {
    super(message, 2);
    this.name = "InvalidPickError";
  }
}

/**
 * Standard error handler for CLI commands.
 * Formats and displays the error, then exits with the error's exit code (1 by default).
 */
export function handleCommandError(error: unknown): never {
  logger.error(error instanceof Error ? error.message : error);
  process.exit(error instanceof GitcError ? error.exitCode : 1);
}

// ============================================================================
// Logging
// ============================================================================

let verboseMode = false;

export function setVerbose(verbose: boolean): void {
  verboseMode = verbose;
}

export const logger = {
  warn(...args: unknown[]): void {
    console.warn(chalk.yellow("Warning:"), ...args);
  },
  error(...args: unknown[]): void {
    console.error(chalk.red("Error:"), ...args);
  },
  debug(...args: unknown[]): void {
    if (verboseMode) {
      console.error(chalk.gray("[debug]"), ...args.map((arg) => chalk.gray(String(arg))));
    }
  },
};

// ============================================================================
// Configuration
// ============================================================================

export const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Resolve runtime settings from global CLI flags, falling back to the environment.
 * Flags win over GITC_REPO / GITC_TIMEOUT_MS / GITC_DEBUG; the repository defaults to the cwd.
 */
export function resolveRuntimeConfig(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env,
): RuntimeConfig {
  const repo = options.repo || env.GITC_REPO || process.cwd();

  const rawTimeout = options.timeout ?? env.GITC_TIMEOUT_MS;
  let timeoutMs = DEFAULT_TIMEOUT_MS;
  if (rawTimeout !== undefined && rawTimeout !== "") {
    if (!/^\d+$/.test(rawTimeout.trim()) || Number(rawTimeout) <= 0) {
      throw new GitcError(`Invalid timeout '${rawTimeout}': expected a positive number of milliseconds`);
    }
    timeoutMs = Number(rawTimeout);
  }

  return {
    repoPath: path.resolve(repo),
    timeoutMs,
    verbose: Boolean(options.verbose) || env.GITC_DEBUG === "1",
  };
}

// ============================================================================
// Durations
// ============================================================================

const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;
const MS_PER_DAY = 24 * MS_PER_HOUR;

// m is a 30-day month, y a 365-day year
const DAYS_PER_UNIT: Record<string, number> = {
  d: 1,
  w: 7,
  m: 30,
  y: 365,
};

const COMPACT_DURATION = /^\s*(\d+)\s*([a-z])\s*$/i;

/**
 * Parse compact durations like 30d, 12w, 6m, 1y into milliseconds.
 * Throws InvalidThresholdError for anything else, including a zero amount.
 */
export function parseCompactDuration(expression: string): number {
  const match = expression.match(COMPACT_DURATION);
  if (!match) {
    throw new InvalidThresholdError(expression);
  }

  const amount = Number(match[1]);
  const unit = match[2].toLowerCase();
  if (!(unit in DAYS_PER_UNIT) || amount <= 0) {
    throw new InvalidThresholdError(expression);
  }

  return amount * DAYS_PER_UNIT[unit] * MS_PER_DAY;
}

export function isCompactDuration(expression: string): boolean {
  const match = expression.match(COMPACT_DURATION);
  return match !== null && match[2].toLowerCase() in DAYS_PER_UNIT;
}

/**
 * Turn a `--since` / `--until` value into something `git log` accepts.
 * Compact durations become an absolute ISO timestamp relative to `now`;
 * anything else ("yesterday", "2025-08-01", "3 days ago") is passed through for git to parse.
 */
export function resolveDateExpression(expression: string, now: Date = new Date()): string {
  if (isCompactDuration(expression)) {
    return new Date(now.getTime() - parseCompactDuration(expression)).toISOString();
  }
  return expression.trim();
}

// ============================================================================
// Formatting
// ============================================================================

export function formatDate(date: Date): string {
  return date.toISOString().split("T")[0]; // YYYY-MM-DD format
}

export function formatRelativeAge(date: Date, now: Date = new Date()): string {
  const diffMs = now.getTime() - date.getTime();
  const hours = diffMs / MS_PER_HOUR;

  if (hours < 1) {
    const minutes = Math.max(0, Math.floor(diffMs / MS_PER_MINUTE));
    return `${minutes} ${minutes === 1 ? "minute" : "minutes"} ago`;
  } else if (hours < 24) {
    const count = Math.floor(hours);
    return `${count} ${count === 1 ? "hour" : "hours"} ago`;
  } else if (hours < 24 * 7) {
    const days = Math.floor(hours / 24);
    return `${days} ${days === 1 ? "day" : "days"} ago`;
  } else {
    const weeks = Math.floor(hours / (24 * 7));
    return `${weeks} ${weeks === 1 ? "week" : "weeks"} ago`;
  }
}

export function shortHash(hash: string): string {
  return hash.length > 8 ? hash.substring(0, 8) : hash;
}

/**
 * Lay out rows as left-aligned columns separated by two spaces.
 * Returns the header line first; trailing whitespace is trimmed from every line.
 */
export function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? "").length)),
  );

  const renderRow = (cells: string[]): string =>
    widths
      .map((width, column) => (cells[column] ?? "").padEnd(width))
      .join("  ")
      .trimEnd();

  return [renderRow(headers), ...rows.map(renderRow)];
}

/**
 * Print a table with a bold header line.
 */
export function printTable(headers: string[], rows: string[][]): void {
  const [headerLine, ...lines] = formatTable(headers, rows);
  console.log(chalk.bold(headerLine));
  for (const line of lines) {
    console.log(line);
  }
}

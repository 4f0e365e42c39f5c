import type { BranchRecord, UnifiedBranch } from "../models";
import { InvalidPatternError } from "../utils";

export interface PatternOptions {
  /** Treat the pattern as an unanchored regular expression instead of globs */
  regex?: boolean;
}

const REGEX_SPECIALS = /[.+^${}()|[\]\\]/g;

/**
 * Translate a single glob into an anchored, case-sensitive RegExp source.
 * `*` matches any run of characters (slashes included), `?` exactly one.
 */
export function globToRegExpSource(glob: string): string {
  let source = "";
  for (const char of glob) {
    if (char === "*") {
      source += ".*";
    } else if (char === "?") {
      source += ".";
    } else {
      source += char.replace(REGEX_SPECIALS, "\\$&");
    }
  }
  return `^${source}$`;
}

export function globToRegExp(glob: string): RegExp {
  return new RegExp(globToRegExpSource(glob));
}

/**
 * Compile a user pattern. Globs may be comma-separated ("feature/*,hotfix/*").
 * An empty pattern is rejected rather than silently matching everything.
 */
export function compilePattern(pattern: string, options: PatternOptions = {}): RegExp {
  if (pattern.trim() === "") {
    throw new InvalidPatternError("Pattern must contain at least one character or a wildcard");
  }

  if (options.regex) {
    try {
      return new RegExp(pattern);
    } catch (error) {
      throw new InvalidPatternError(
        `Invalid regular expression '${pattern}': ${error instanceof Error ? error.message : error}`,
      );
    }
  }

  const globs = pattern
    .split(",")
    .map((glob) => glob.trim())
    .filter((glob) => glob.length > 0);

  if (globs.length === 0) {
    throw new InvalidPatternError(`Pattern '${pattern}' contains no globs`);
  }

  return new RegExp(globs.map((glob) => `(?:${globToRegExpSource(glob)})`).join("|"));
}

/**
 * Return the records whose logical name matches, in input order.
 * Local and remote records are matched independently; an empty pattern matches nothing.
 */
export function matchBranches(
  pattern: string,
  records: BranchRecord[],
  options: PatternOptions = {},
): BranchRecord[] {
  if (pattern.trim() === "") {
    return [];
  }

  const matcher = compilePattern(pattern, options);
  return records.filter((record) => matcher.test(record.name));
}

/**
 * Merge records that share a logical name into one display row,
 * keeping the local record separate so deletion only ever sees it.
 */
export function unifyBranches(records: BranchRecord[]): UnifiedBranch[] {
  const byName = new Map<string, UnifiedBranch>();

  for (const record of records) {
    let unified = byName.get(record.name);
    if (!unified) {
      unified = {
        name: record.name,
        local: null,
        remotes: [],
        lastCommitTime: record.lastCommitTime,
        lastCommitHash: record.lastCommitHash,
      };
      byName.set(record.name, unified);
    } else if (record.lastCommitTime > unified.lastCommitTime) {
      unified.lastCommitTime = record.lastCommitTime;
      unified.lastCommitHash = record.lastCommitHash;
    }

    if (record.scope === "local") {
      unified.local = record;
    } else {
      unified.remotes.push(record);
    }
  }

  return [...byName.values()];
}

export function describeScope(branch: UnifiedBranch): string {
  const scopes: string[] = [];
  if (branch.local) {
    scopes.push("local");
  }
  for (const remote of branch.remotes) {
    scopes.push(remote.remote ?? "remote");
  }
  return scopes.join(", ");
}

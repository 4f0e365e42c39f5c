import type { BranchRecord, StaleClassification, StalenessThreshold } from "../models";
import { parseCompactDuration } from "../utils";
import { globToRegExp } from "./patterns";

export const DEFAULT_PROTECTED_BRANCHES = ["main", "master", "develop", "dev"] as const;

/**
 * Parse a threshold like "12w" into an absolute cutoff relative to `now`.
 * Throws InvalidThresholdError before anything is classified.
 */
export function parseThreshold(expression: string, now: Date = new Date()): StalenessThreshold {
  const durationMs = parseCompactDuration(expression);
  return {
    expression: expression.trim(),
    durationMs,
    cutoff: new Date(now.getTime() - durationMs),
  };
}

/**
 * Branch names exempt from deletion: the built-in defaults plus whatever the
 * invocation adds. Entries containing `*` or `?` are treated as globs.
 */
export class ProtectionSet {
  private names: Set<string>;
  private globs: RegExp[];

  constructor(entries: Iterable<string>) {
    this.names = new Set();
    this.globs = [];

    for (const entry of entries) {
      const name = entry.trim();
      if (!name) {
        continue;
      }
      if (name.includes("*") || name.includes("?")) {
        this.globs.push(globToRegExp(name));
      } else {
        this.names.add(name);
      }
    }
  }

  /**
   * Build the set for one invocation from a comma-separated `--keep` value.
   * `extra` carries names discovered at run time, such as the checked-out branch.
   */
  static fromKeepList(keep: string = "", extra: string[] = []): ProtectionSet {
    return new ProtectionSet([
      ...DEFAULT_PROTECTED_BRANCHES,
      ...keep.split(","),
      ...extra,
    ]);
  }

  has(name: string): boolean {
    return this.names.has(name) || this.globs.some((glob) => glob.test(name));
  }
}

export function isStale(record: BranchRecord, cutoff: Date): boolean {
  return record.lastCommitTime.getTime() < cutoff.getTime();
}

export interface ClassifyOptions {
  threshold: StalenessThreshold;
  protection: ProtectionSet;
  branches: BranchRecord[];
}

/**
 * Partition branches into deletable, retained and protected.
 * Protection wins over age; only local branches strictly older than the cutoff are deletable.
 */
export function classifyStale(options: ClassifyOptions): StaleClassification {
  const result: StaleClassification = { deletable: [], retained: [], protected: [] };

  for (const branch of options.branches) {
    if (options.protection.has(branch.name)) {
      result.protected.push(branch);
    } else if (branch.scope === "local" && isStale(branch, options.threshold.cutoff)) {
      result.deletable.push(branch);
    } else {
      result.retained.push(branch);
    }
  }

  return result;
}

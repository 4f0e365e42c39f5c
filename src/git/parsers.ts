import type { BranchRecord, CommitRecord } from "../models";
import { logger } from "../utils";

/**
 * Line grammar shared by the adapter's format strings and the parsers below.
 * Bump GRAMMAR_VERSION whenever a field is added, removed or reordered.
 */
export const GRAMMAR_VERSION = 1;

/** ASCII unit separator; never appears in ref names and is vanishingly rare in subjects. */
export const FIELD_SEPARATOR = "\x1f";

// for-each-ref spells a hex byte as %xx, log as %xNN
const REF_SEP = "%1f";
const LOG_SEP = "%x1f";

export const BRANCH_FORMAT = [
  "%(refname)",
  "%(objectname)",
  "%(committerdate:unix)",
  "%(upstream:short)",
].join(REF_SEP);

export const COMMIT_FORMAT = ["%H", "%an", "%ct", "%S", "%s"].join(LOG_SEP);

const BRANCH_FIELD_COUNT = 4;
const COMMIT_FIELD_COUNT = 5;

const LOCAL_PREFIX = "refs/heads/";
const REMOTE_PREFIX = "refs/remotes/";

export type RecordKind = "branch" | "commit";

export interface RecordKindMap {
  branch: BranchRecord;
  commit: CommitRecord;
}

export interface SkippedLine {
  kind: RecordKind;
  lineNumber: number;
  line: string;
  reason: string;
}

export interface ParseOptions {
  /** Called for each malformed line; defaults to logging a warning */
  onSkip?: (skipped: SkippedLine) => void;
  /** Branch name used for commits whose source ref is empty */
  fallbackBranch?: string;
}

type LineResult<T> =
  | { status: "ok"; record: T }
  | { status: "ignored" }
  | { status: "malformed"; reason: string };

type LineParser<T> = (fields: string[], options: ParseOptions) => LineResult<T>;

function parseUnixTimestamp(value: string): Date | null {
  if (!/^\d+$/.test(value)) {
    return null;
  }
  return new Date(Number(value) * 1000);
}

/**
 * Strip the ref namespace git adds with `--all --source`, so commits reached
 * through `refs/heads/x` and a plain `x` revision report the same branch.
 */
export function normalizeSourceRef(source: string): string {
  if (source.startsWith(LOCAL_PREFIX)) {
    return source.substring(LOCAL_PREFIX.length);
  }
  if (source.startsWith(REMOTE_PREFIX)) {
    return source.substring(REMOTE_PREFIX.length);
  }
  return source;
}

const parseBranchLine: LineParser<BranchRecord> = (fields) => {
  if (fields.length !== BRANCH_FIELD_COUNT) {
    return { status: "malformed", reason: `expected ${BRANCH_FIELD_COUNT} fields, got ${fields.length}` };
  }

  const [ref, hash, committed, upstream] = fields;
  if (!hash) {
    return { status: "malformed", reason: "missing commit hash" };
  }

  const lastCommitTime = parseUnixTimestamp(committed);
  if (!lastCommitTime) {
    return { status: "malformed", reason: `invalid commit timestamp '${committed}'` };
  }

  if (ref.startsWith(LOCAL_PREFIX) && ref.length > LOCAL_PREFIX.length) {
    return {
      status: "ok",
      record: {
        name: ref.substring(LOCAL_PREFIX.length),
        scope: "local",
        remote: null,
        ref,
        lastCommitTime,
        lastCommitHash: hash,
        upstream: upstream || null,
      },
    };
  }

  if (ref.startsWith(REMOTE_PREFIX)) {
    // refs/remotes/<remote>/<branch...>
    const remainder = ref.substring(REMOTE_PREFIX.length);
    const slash = remainder.indexOf("/");
    if (slash <= 0 || slash === remainder.length - 1) {
      return { status: "malformed", reason: `unrecognised remote ref '${ref}'` };
    }

    const name = remainder.substring(slash + 1);
    // The symbolic origin/HEAD pointer is not a branch
    if (name === "HEAD") {
      return { status: "ignored" };
    }

    return {
      status: "ok",
      record: {
        name,
        scope: "remote",
        remote: remainder.substring(0, slash),
        ref,
        lastCommitTime,
        lastCommitHash: hash,
        upstream: upstream || null,
      },
    };
  }

  return { status: "malformed", reason: `unrecognised ref '${ref}'` };
};

const parseCommitLine: LineParser<CommitRecord> = (fields, options) => {
  if (fields.length < COMMIT_FIELD_COUNT) {
    return { status: "malformed", reason: `expected ${COMMIT_FIELD_COUNT} fields, got ${fields.length}` };
  }

  // The subject is last and may itself contain the separator
  const [hash, author, committed, source] = fields;
  const message = fields.slice(COMMIT_FIELD_COUNT - 1).join(FIELD_SEPARATOR);
  if (!hash) {
    return { status: "malformed", reason: "missing commit hash" };
  }

  const timestamp = parseUnixTimestamp(committed);
  if (!timestamp) {
    return { status: "malformed", reason: `invalid commit timestamp '${committed}'` };
  }

  return {
    status: "ok",
    record: {
      hash,
      author,
      timestamp,
      message,
      branch: normalizeSourceRef(source) || options.fallbackBranch || "",
    },
  };
};

const LINE_PARSERS: { [K in RecordKind]: LineParser<RecordKindMap[K]> } = {
  branch: parseBranchLine,
  commit: parseCommitLine,
};

function warnSkipped(skipped: SkippedLine): void {
  logger.warn(
    `Skipping malformed ${skipped.kind} line ${skipped.lineNumber} (${skipped.reason}): ${skipped.line}`,
  );
}

/**
 * Parse line-oriented git output produced with BRANCH_FORMAT or COMMIT_FORMAT.
 * Malformed lines are reported through `onSkip` and left out; the rest keep their order.
 */
export function parseRecords<K extends RecordKind>(
  kind: K,
  output: string,
  options: ParseOptions = {},
): RecordKindMap[K][] {
  const parseLine = LINE_PARSERS[kind];
  const onSkip = options.onSkip ?? warnSkipped;
  const records: RecordKindMap[K][] = [];
  logger.debug(`Parsing ${kind} records (grammar v${GRAMMAR_VERSION})`);

  const lines = output.split(/\r?\n/);
  lines.forEach((line, index) => {
    if (line.trim() === "") {
      return;
    }

    const result = parseLine(line.split(FIELD_SEPARATOR), options);
    if (result.status === "ok") {
      records.push(result.record);
    } else if (result.status === "malformed") {
      onSkip({ kind, lineNumber: index + 1, line, reason: result.reason });
    }
  });

  return records;
}

export function parseBranchRecords(output: string, options?: ParseOptions): BranchRecord[] {
  return parseRecords("branch", output, options);
}

export function parseCommitRecords(output: string, options?: ParseOptions): CommitRecord[] {
  return parseRecords("commit", output, options);
}

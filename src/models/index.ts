export type BranchScope = "local" | "remote";

export interface BranchRecord {
  /** Logical branch name, without the `refs/heads/` or `<remote>/` prefix */
  name: string;
  scope: BranchScope;
  /** Remote the ref belongs to, or null for local branches */
  remote: string | null;
  /** Full ref name as reported by git */
  ref: string;
  lastCommitTime: Date;
  lastCommitHash: string;
  upstream: string | null;
}

export interface CommitRecord {
  hash: string;
  author: string;
  timestamp: Date;
  message: string;
  branch: string;
}

export interface UnifiedBranch {
  name: string;
  local: BranchRecord | null;
  remotes: BranchRecord[];
  lastCommitTime: Date;
  lastCommitHash: string;
}

export interface StalenessThreshold {
  expression: string;
  durationMs: number;
  cutoff: Date;
}

export interface StaleClassification {
  deletable: BranchRecord[];
  retained: BranchRecord[];
  protected: BranchRecord[];
}

export interface DeletionReport {
  deleted: string[];
  skipped: string[];
  failed: Array<{ branch: string; error: string }>;
}

export type GrepMatchMode = "basic" | "extended" | "fixed";

export interface LogQuery {
  revisions?: string[];
  all?: boolean;
  since?: string;
  until?: string;
  author?: string;
  grep?: string;
  matchMode?: GrepMatchMode;
  ignoreCase?: boolean;
  maxCount?: number;
}

export interface RefScopes {
  locals: boolean;
  remotes: boolean;
}

// A type alias so it satisfies commander's OptionValues index signature
export type GlobalOptions = {
  repo?: string;
  timeout?: string;
  verbose?: boolean;
};

export interface RuntimeConfig {
  repoPath: string;
  timeoutMs: number;
  verbose: boolean;
}

import { simpleGit, GitError, GitPluginError } from "simple-git";
import type { SimpleGit } from "simple-git";
import type { LogQuery, RefScopes, RuntimeConfig } from "../models";
import {
  DEFAULT_TIMEOUT_MS,
  ExecutableNotFoundError,
  GitExitError,
  GitTimeoutError,
  NotARepositoryError,
  logger,
} from "../utils";
import { BRANCH_FORMAT, COMMIT_FORMAT } from "./parsers";

const GIT_EXECUTABLE = "git";

/**
 * The only place gitc runs git. Every method returns raw stdout (or nothing)
 * and turns simple-git failures into ExecutableNotFoundError, GitExitError or GitTimeoutError.
 */
export class GitAdapter {
  private git: SimpleGit;
  readonly repoPath: string;
  readonly timeoutMs: number;

  constructor(repoPath: string, timeoutMs: number = DEFAULT_TIMEOUT_MS) {
    this.repoPath = repoPath;
    this.timeoutMs = timeoutMs;
    try {
      this.git = simpleGit({
        baseDir: repoPath,
        binary: GIT_EXECUTABLE,
        timeout: { block: timeoutMs },
      });
    } catch (error) {
      // simple-git refuses to start in a directory that does not exist
      throw new NotARepositoryError(repoPath, error instanceof Error ? error.message : String(error));
    }
  }

  /**
   * Bind to the configured repository and make sure it is a work tree.
   */
  static async open(config: RuntimeConfig): Promise<GitAdapter> {
    const adapter = new GitAdapter(config.repoPath, config.timeoutMs);
    await adapter.initialize();
    return adapter;
  }

  async run(args: string[]): Promise<string> {
    const subcommand = args[0] ?? "";
    logger.debug(`git ${args.join(" ")} (in ${this.repoPath})`);

    try {
      return await this.git.raw(args);
    } catch (error) {
      throw this.classifyError(subcommand, error);
    }
  }

  private classifyError(subcommand: string, error: unknown): Error {
    const message = error instanceof Error ? error.message : String(error);

    if (error instanceof GitPluginError && error.plugin === "timeout") {
      return new GitTimeoutError(subcommand, this.timeoutMs);
    }
    if (/ENOENT/.test(message)) {
      return new ExecutableNotFoundError(GIT_EXECUTABLE);
    }
    if (error instanceof GitError) {
      return new GitExitError(subcommand, message.trim() || "exited with a non-zero status");
    }
    return error instanceof Error ? error : new Error(message);
  }

  async initialize(): Promise<void> {
    let inside: string;
    try {
      inside = await this.run(["rev-parse", "--is-inside-work-tree"]);
    } catch (error) {
      if (error instanceof GitExitError) {
        throw new NotARepositoryError(this.repoPath);
      }
      throw error;
    }

    if (inside.trim() !== "true") {
      throw new NotARepositoryError(this.repoPath);
    }
  }

  async listRefs(scopes: RefScopes): Promise<string> {
    const namespaces: string[] = [];
    if (scopes.locals) {
      namespaces.push("refs/heads");
    }
    if (scopes.remotes) {
      namespaces.push("refs/remotes");
    }
    if (namespaces.length === 0) {
      return "";
    }

    return this.run(["for-each-ref", `--format=${BRANCH_FORMAT}`, ...namespaces]);
  }

  /**
   * Name of the checked-out branch, or null when HEAD is detached.
   */
  async currentBranch(): Promise<string | null> {
    const head = (await this.run(["rev-parse", "--abbrev-ref", "HEAD"])).trim();
    return head && head !== "HEAD" ? head : null;
  }

  async log(query: LogQuery): Promise<string> {
    const args = ["log", `--format=${COMMIT_FORMAT}`, "--source"];

    if (query.all) {
      args.push("--all");
    }
    if (query.since) {
      args.push(`--since=${query.since}`);
    }
    if (query.until) {
      args.push(`--until=${query.until}`);
    }
    if (query.author) {
      args.push(`--author=${query.author}`);
    }
    if (query.grep !== undefined) {
      args.push(`--grep=${query.grep}`);
      if (query.matchMode === "extended") {
        args.push("--extended-regexp");
      } else if (query.matchMode === "fixed") {
        args.push("--fixed-strings");
      }
      if (query.ignoreCase) {
        args.push("--regexp-ignore-case");
      }
    }
    if (query.maxCount && query.maxCount > 0) {
      args.push(`--max-count=${query.maxCount}`);
    }

    // Revisions go last, fenced so a branch called "-x" is not read as a flag nor as a path
    if (query.revisions && query.revisions.length > 0) {
      args.push("--end-of-options", ...query.revisions, "--");
    }

    return this.run(args);
  }

  async deleteBranch(branch: string, force: boolean = false): Promise<void> {
    await this.run(["branch", force ? "-D" : "-d", branch]);
  }

  async cherryPick(hash: string): Promise<string> {
    return this.run(["cherry-pick", hash]);
  }
}

import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { GitError } from "simple-git";
import { runStale } from "../../src/commands/stale";
import type { StaleCommandOptions } from "../../src/commands/stale";
import type { BranchRecord } from "../../src/models";
import { GitcError, InvalidThresholdError } from "../../src/utils";
import {
  branchLine,
  captureConsole,
  createMockGit,
  routeGit,
  setStdinTTY,
  testConfig,
  weeksBefore,
} from "../helpers";
import type { MockGit } from "../helpers";

const { simpleGitMock, confirmMock } = vi.hoisted(() => ({
  simpleGitMock: vi.fn(),
  confirmMock: vi.fn(),
}));

vi.mock("simple-git", async (importOriginal) => ({
  ...(await importOriginal<typeof import("simple-git")>()),
  simpleGit: simpleGitMock,
}));

vi.mock("@inquirer/confirm", () => ({ default: confirmMock }));

const now = new Date("2026-06-01T00:00:00.000Z");

const LOCAL_REFS = [
  branchLine("refs/heads/old", "a1", weeksBefore(now, 13)),
  branchLine("refs/heads/new", "a2", weeksBefore(now, 2)),
  branchLine("refs/heads/hotfixY", "a3", weeksBefore(now, 20)),
  branchLine("refs/heads/main", "a4", weeksBefore(now, 30)),
];
const OLDER_REF = branchLine("refs/heads/older", "a5", weeksBefore(now, 15));
const REMOTE_REF = branchLine("refs/remotes/origin/old", "b1", weeksBefore(now, 13));

const defaults: StaleCommandOptions = { delete: false, keep: "hotfixY", force: false, remotes: false };

function names(records: BranchRecord[]): string[] {
  return records.map((record) => record.name);
}

function branchCalls(mockGit: MockGit): string[][] {
  return mockGit.raw.mock.calls.map(([args]) => args).filter((args) => args[0] === "branch");
}

describe("stale", () => {
  let mockGit: MockGit;
  let capture: ReturnType<typeof captureConsole>;
  let restoreTTY: (() => void) | undefined;

  beforeEach(() => {
    mockGit = createMockGit();
    simpleGitMock.mockReset();
    simpleGitMock.mockReturnValue(mockGit);
    confirmMock.mockReset();
    capture = captureConsole();
  });

  afterEach(() => {
    capture.restore();
    restoreTTY?.();
    restoreTTY = undefined;
  });

  function serveRefs(lines: string[], routes: Parameters<typeof routeGit>[1] = {}): void {
    routeGit(mockGit, {
      "for-each-ref": (args) =>
        lines.filter((line) => args.includes("refs/remotes") || line.startsWith("refs/heads/")).join("\n"),
      ...routes,
    });
  }

  test("should classify old, new and kept branches", async () => {
    serveRefs(LOCAL_REFS);

    const result = await runStale("12w", defaults, testConfig, now);

    expect(names(result.classification.deletable)).toEqual(["old"]);
    expect(names(result.classification.protected)).toEqual(["hotfixY", "main"]);
    expect(names(result.classification.retained)).toEqual(["new"]);
    expect(result.report).toBeNull();
    expect(branchCalls(mockGit)).toEqual([]);
    expect(capture.logs()).toEqual([
      "Found 1 branch(es) with no commits since 2026-03-09:",
      "",
      "BRANCH  SCOPE  LAST_COMMIT  AGE",
      "old     local  2026-03-02   13 weeks ago",
      "Protected (kept): hotfixY, main",
      "",
      "Re-run with --delete to remove the stale local branches.",
    ]);
  });

  test("should protect the checked-out branch", async () => {
    serveRefs(LOCAL_REFS, {
      "rev-parse": (args) => (args[1] === "--is-inside-work-tree" ? "true\n" : "old\n"),
    });

    const result = await runStale("12w", defaults, testConfig, now);

    expect(result.classification.deletable).toEqual([]);
    expect(names(result.classification.protected)).toEqual(["old", "hotfixY", "main"]);
    expect(capture.logs()[0]).toBe("No stale branches found older than 12w.");
  });

  test("should fail on a malformed threshold before running git", async () => {
    await expect(runStale("12q", { ...defaults, delete: true, force: true }, testConfig, now)).rejects.toBeInstanceOf(
      InvalidThresholdError,
    );
    expect(simpleGitMock).not.toHaveBeenCalled();
  });

  test("should refuse interactive deletion without a TTY", async () => {
    restoreTTY = setStdinTTY(false);

    await expect(runStale("12w", { ...defaults, delete: true }, testConfig, now)).rejects.toBeInstanceOf(GitcError);
    expect(simpleGitMock).not.toHaveBeenCalled();
  });

  test("should force-delete every stale branch and collect failures", async () => {
    serveRefs([...LOCAL_REFS, OLDER_REF], {
      branch: (args) =>
        args[2] === "old" ? new GitError(undefined, "error: branch 'old' not found.") : "Deleted branch\n",
    });

    const result = await runStale("12w", { ...defaults, delete: true, force: true }, testConfig, now);

    expect(confirmMock).not.toHaveBeenCalled();
    expect(branchCalls(mockGit)).toEqual([
      ["branch", "-D", "old"],
      ["branch", "-D", "older"],
    ]);
    expect(result.report).toEqual({
      deleted: ["older"],
      skipped: [],
      failed: [{ branch: "old", error: "git branch failed: error: branch 'old' not found." }],
    });
    expect(capture.logs()).toContain("✓ Deleted branch: older");
    expect(capture.logs()).toContain("✗ Failed to delete old: git branch failed: error: branch 'old' not found.");
    expect(capture.logs()).toContain("\nDeleted 1, skipped 0, failed 1.");
  });

  test("should confirm each branch before a safe delete", async () => {
    restoreTTY = setStdinTTY(true);
    serveRefs([...LOCAL_REFS, OLDER_REF]);
    confirmMock.mockResolvedValueOnce(true).mockResolvedValueOnce(false);

    const result = await runStale("12w", { ...defaults, delete: true }, testConfig, now);

    expect(confirmMock).toHaveBeenCalledTimes(2);
    expect(confirmMock).toHaveBeenNthCalledWith(1, {
      message: "Delete branch 'old' (last commit 2026-03-02)?",
      default: false,
    });
    expect(branchCalls(mockGit)).toEqual([["branch", "-d", "old"]]);
    expect(result.report).toEqual({ deleted: ["old"], skipped: ["older"], failed: [] });
  });

  test("should list stale remote branches without deleting them", async () => {
    serveRefs([...LOCAL_REFS, REMOTE_REF]);

    const result = await runStale(
      "12w",
      { ...defaults, remotes: true, delete: true, force: true },
      testConfig,
      now,
    );

    expect(result.staleRemotes.map((record) => record.ref)).toEqual(["refs/remotes/origin/old"]);
    expect(branchCalls(mockGit)).toEqual([["branch", "-D", "old"]]);
    expect(capture.logs().slice(0, 5)).toEqual([
      "Found 2 branch(es) with no commits since 2026-03-09:",
      "",
      "BRANCH      SCOPE   LAST_COMMIT  AGE",
      "old         local   2026-03-02   13 weeks ago",
      "origin/old  remote  2026-03-02   13 weeks ago",
    ]);
  });

  test("should report when nothing is stale", async () => {
    serveRefs([branchLine("refs/heads/fresh", "c1", weeksBefore(now, 1))]);

    const result = await runStale("12w", defaults, testConfig, now);

    expect(result.classification.retained.map((record) => record.name)).toEqual(["fresh"]);
    expect(capture.logs()).toEqual(["No stale branches found older than 12w."]);
  });
});

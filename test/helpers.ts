import { vi } from "vitest";
import type { Mock } from "vitest";
import type { RuntimeConfig } from "../src/models";

export const US = "\x1f";

export const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

export const testConfig: RuntimeConfig = {
  repoPath: "/repo",
  timeoutMs: 30000,
  verbose: false,
};

export interface MockGit {
  raw: Mock<(args: string[]) => Promise<string>>;
}

export function createMockGit(): MockGit {
  return {
    raw: vi.fn<(args: string[]) => Promise<string>>(() => Promise.resolve("")),
  };
}

export function weeksBefore(now: Date, weeks: number): Date {
  return new Date(now.getTime() - weeks * WEEK_MS);
}

function unixSeconds(date: Date): string {
  return String(Math.floor(date.getTime() / 1000));
}

export function branchLine(ref: string, hash: string, committedAt: Date, upstream = ""): string {
  return [ref, hash, unixSeconds(committedAt), upstream].join(US);
}

export function commitLine(
  hash: string,
  author: string,
  committedAt: Date,
  source: string,
  subject: string,
): string {
  return [hash, author, unixSeconds(committedAt), source, subject].join(US);
}

// Helper to capture console output
export function captureConsole() {
  const log = vi.spyOn(console, "log").mockImplementation(() => {});
  const error = vi.spyOn(console, "error").mockImplementation(() => {});
  const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

  const lines = (spy: typeof log) => spy.mock.calls.map((args) => args.map(String).join(" "));

  return {
    logs: () => lines(log),
    errors: () => lines(error),
    warnings: () => lines(warn),
    restore: () => {
      log.mockRestore();
      error.mockRestore();
      warn.mockRestore();
    },
  };
}

/**
 * Pretend stdin is (or is not) a terminal; returns a function that undoes it.
 */
export function setStdinTTY(isTTY: boolean): () => void {
  const original = Object.getOwnPropertyDescriptor(process.stdin, "isTTY");
  Object.defineProperty(process.stdin, "isTTY", { value: isTTY, configurable: true, writable: true });

  return () => {
    if (original) {
      Object.defineProperty(process.stdin, "isTTY", original);
    } else {
      Reflect.deleteProperty(process.stdin, "isTTY");
    }
  };
}

type GitRoute = (args: string[]) => string | Error;

/**
 * Answer `git.raw` calls by subcommand, the way a small repository would.
 * `rev-parse` defaults to a work tree checked out on `main`.
 */
export function routeGit(mockGit: MockGit, routes: Record<string, GitRoute>): void {
  mockGit.raw.mockImplementation(async (args) => {
    const route = routes[args[0]];
    if (route) {
      const result = route(args);
      if (result instanceof Error) {
        throw result;
      }
      return result;
    }
    if (args[0] === "rev-parse") {
      return args[1] === "--is-inside-work-tree" ? "true\n" : "main\n";
    }
    return "";
  });
}

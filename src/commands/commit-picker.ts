import chalk from "chalk";
import search from "@inquirer/search";
import type { CommitRecord } from "../models";
import { GitcError, formatDate, shortHash } from "../utils";

export interface PickerOptions {
  message?: string;
}

/**
 * Show an interactive fuzzy search picker over commits.
 * Returns the selected commit, or null if cancelled. Throws without a TTY.
 */
export async function pickCommit(
  commits: CommitRecord[],
  options: PickerOptions = {},
): Promise<CommitRecord | null> {
  const { message = "Select a commit to cherry-pick (type to search):" } = options;

  if (!process.stdin.isTTY) {
    throw new GitcError("Interactive selection requires a TTY. Pass a row number instead, e.g. --pick 2.");
  }

  if (commits.length === 0) {
    return null;
  }

  try {
    return await search({
      message,
      source: async (term) => {
        const searchTerm = (term || "").toLowerCase();

        return commits
          .filter(
            (commit) =>
              commit.message.toLowerCase().includes(searchTerm) ||
              commit.hash.startsWith(searchTerm),
          )
          .map((commit) => ({
            name: `${chalk.yellow(shortHash(commit.hash))} ${commit.message}`,
            value: commit,
            description: `${commit.author}, ${formatDate(commit.timestamp)} on ${commit.branch || "unknown branch"}`,
          }));
      },
    });
  } catch (error) {
    // Handle user cancellation (Ctrl+C or Escape)
    if (error instanceof Error && error.name === "ExitPromptError") {
      console.log(chalk.gray("Selection cancelled."));
      return null;
    }
    throw error;
  }
}

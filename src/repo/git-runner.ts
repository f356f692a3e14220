import { createInterface } from "node:readline";
import type { Readable } from "node:stream";

import { execa } from "execa";

import { toErrorMessage } from "../core/index.js";

export type GitRunResult =
  | { status: "exited"; exitCode: number }
  | { status: "error"; message: string };

export interface GitRunOptions {
  cwd?: string;
  /** Receives each line of stdout and stderr, interleaved as git writes them. */
  onLine?: (line: string) => void;
}

export type GitRunner = (args: readonly string[], options?: GitRunOptions) => Promise<GitRunResult>;

/**
 * Runs `git` with prompts disabled. Nonzero exits are returned, not thrown;
 * `status: "error"` means git could not be started or was killed by a signal.
 */
export const runGit: GitRunner = async (args, options = {}) => {
  try {
    const subprocess = execa("git", [...args], {
      cwd: options.cwd,
      all: true,
      reject: false,
      stdin: "ignore",
      env: { GIT_TERMINAL_PROMPT: "0" },
    });

    const streaming = subprocess.all
      ? forwardLines(subprocess.all, options.onLine)
      : Promise.resolve();
    const [result] = await Promise.all([subprocess, streaming]);

    if (typeof result.exitCode === "number") {
      return { status: "exited", exitCode: result.exitCode };
    }

    return {
      status: "error",
      message: result.shortMessage ?? result.message ?? `git ${args[0] ?? ""} did not exit`,
    };
  } catch (error) {
    return { status: "error", message: toErrorMessage(error) };
  }
};

export function isSuccessful(result: GitRunResult): boolean {
  return result.status === "exited" && result.exitCode === 0;
}

export function describeGitResult(result: GitRunResult): string {
  return result.status === "exited" ? `exit code ${result.exitCode}` : result.message;
}

async function forwardLines(
  stream: Readable,
  onLine: ((line: string) => void) | undefined,
): Promise<void> {
  const lines = createInterface({ input: stream, crlfDelay: Number.POSITIVE_INFINITY });
  for await (const line of lines) {
    onLine?.(line);
  }
}

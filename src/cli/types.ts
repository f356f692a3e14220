import type { ChalkInstance } from "chalk";

import type { RunSummary } from "../core/index.js";

export const EXIT_SUCCESS = 0;
export const EXIT_GENERAL_ERROR = 1;
export const EXIT_REPOSITORY_FAILURES = 1;
export const EXIT_LISTING_ERROR = 2;
export const EXIT_USAGE_ERROR = 2;

/** Raw option bag handed over by commander. */
export interface CliOptions {
  dest: string;
  token?: string;
  ssh?: boolean;
  includeArchived?: boolean;
  workers?: number;
  full?: boolean;
  mirror?: boolean;
  org: string;
  apiUrl: string;
  retries: number;
  failOnError?: boolean;
  quiet?: boolean;
  json?: boolean;
  color?: boolean;
}

export interface OutputOptions {
  quiet: boolean;
  json: boolean;
  color: boolean;
}

export interface PipelineContext {
  ui: ChalkInstance;
  output: OutputOptions;
  /** True when spinners and git output should be suppressed (--json or --quiet). */
  suppressOutput: boolean;
  runStartedAt: number;
}

export function resolveExitCode(summary: RunSummary, failOnError: boolean): number {
  if (failOnError && summary.failures.length > 0) {
    return EXIT_REPOSITORY_FAILURES;
  }

  return EXIT_SUCCESS;
}

export function formatDuration(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds < 0) {
    return "0s";
  }

  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

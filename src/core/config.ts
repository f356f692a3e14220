import { availableParallelism } from "node:os";
import { resolve } from "node:path";

import { z } from "zod";

import { configError } from "./errors.js";

export const DEFAULT_ORG = "electronicarts";
export const DEFAULT_DEST = "electronicarts";
export const DEFAULT_API_URL = "https://api.github.com";
export const DEFAULT_RETRY_LIMIT = 2;

export const MIN_CONCURRENCY = 1;
export const MAX_CONCURRENCY = 16;
const DEFAULT_CONCURRENCY_CAP = 8;

export const WorkerPoolConfigSchema = z
  .object({
    destinationDirectory: z.string().min(1),
    concurrency: z.number().int().min(MIN_CONCURRENCY).max(MAX_CONCURRENCY),
    useSsh: z.boolean().default(false),
    shallow: z.boolean().default(true),
    mirror: z.boolean().default(false),
    retryLimit: z.number().int().min(0).default(DEFAULT_RETRY_LIMIT),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.mirror && value.shallow) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["shallow"],
        message: "Mirror clones always carry full history and cannot be shallow",
      });
    }
  });

export type WorkerPoolConfig = z.output<typeof WorkerPoolConfigSchema>;

export const RunConfigSchema = z
  .object({
    org: z
      .string()
      .trim()
      .regex(/^[A-Za-z0-9][A-Za-z0-9_.-]*$/, "Organization must be a GitHub login"),
    apiUrl: z.string().url(),
    includeArchived: z.boolean().default(false),
    failOnError: z.boolean().default(false),
    pool: WorkerPoolConfigSchema,
  })
  .strict();

export type RunConfig = z.output<typeof RunConfigSchema>;
export type RunConfigInput = z.input<typeof RunConfigSchema>;

/** Flag values as they arrive from the command line, before defaults. */
export interface RunFlags {
  dest?: string;
  org?: string;
  apiUrl?: string;
  workers?: number;
  retries?: number;
  ssh?: boolean;
  full?: boolean;
  mirror?: boolean;
  includeArchived?: boolean;
  failOnError?: boolean;
}

export function clampConcurrency(value: number): number {
  if (!Number.isFinite(value)) {
    return MIN_CONCURRENCY;
  }

  return Math.max(MIN_CONCURRENCY, Math.min(MAX_CONCURRENCY, Math.trunc(value)));
}

export function defaultConcurrency(cpuCount: number = availableParallelism()): number {
  return clampConcurrency(Math.min(DEFAULT_CONCURRENCY_CAP, cpuCount));
}

export function loadRunConfig(config: unknown): RunConfig {
  const parsed = RunConfigSchema.safeParse(config);

  if (parsed.success) {
    return parsed.data;
  }

  throw configError("CONFIG_INVALID", "Invalid orgclone configuration", {
    context: {
      issues: parsed.error.issues.map((issue) => ({
        code: issue.code,
        message: issue.message,
        path: issue.path.join("."),
      })),
    },
  });
}

/**
 * Merges command-line flags with defaults. `--mirror` wins over `--full` and
 * over the implicit shallow clone; `--workers` is clamped rather than rejected.
 */
export function resolveRunConfig(
  flags: RunFlags,
  options: { cwd?: string; cpuCount?: number } = {},
): RunConfig {
  const mirror = flags.mirror === true;
  const concurrency =
    flags.workers === undefined
      ? defaultConcurrency(options.cpuCount)
      : clampConcurrency(flags.workers);

  return loadRunConfig({
    org: flags.org ?? DEFAULT_ORG,
    apiUrl: flags.apiUrl ?? DEFAULT_API_URL,
    includeArchived: flags.includeArchived === true,
    failOnError: flags.failOnError === true,
    pool: {
      destinationDirectory: resolve(options.cwd ?? process.cwd(), flags.dest ?? DEFAULT_DEST),
      concurrency,
      useSsh: flags.ssh === true,
      shallow: flags.full !== true && !mirror,
      mirror,
      retryLimit: flags.retries ?? DEFAULT_RETRY_LIMIT,
    },
  } satisfies RunConfigInput);
}

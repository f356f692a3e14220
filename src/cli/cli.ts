import { readFileSync } from "node:fs";

import { Command, CommanderError } from "commander";

import {
  CloneError,
  DEFAULT_API_URL,
  DEFAULT_DEST,
  DEFAULT_ORG,
  DEFAULT_RETRY_LIMIT,
  MAX_CONCURRENCY,
  isListingError,
  resolveRunConfig,
} from "../core/index.js";
import { resolveGitHubToken } from "./github-auth.js";
import { createUi, parseInteger, parseNonNegativeInteger } from "./helpers.js";
import { type PipelineDeps, runPipeline } from "./pipeline.js";
import {
  type CliOptions,
  EXIT_GENERAL_ERROR,
  EXIT_LISTING_ERROR,
  EXIT_USAGE_ERROR,
  type PipelineContext,
} from "./types.js";

function readPackageVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      readFileSync(new URL("../../package.json", import.meta.url), "utf8"),
    );
    if (typeof raw === "object" && raw !== null && "version" in raw) {
      return typeof raw.version === "string" ? raw.version : "0.0.0";
    }
  } catch {
    // running from an unpacked copy without package.json
  }

  return "0.0.0";
}

export async function runCloneCommand(
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
  deps: PipelineDeps = {},
): Promise<number> {
  const config = resolveRunConfig({
    dest: options.dest,
    org: options.org,
    apiUrl: options.apiUrl,
    workers: options.workers,
    retries: options.retries,
    ssh: options.ssh,
    full: options.full,
    mirror: options.mirror,
    includeArchived: options.includeArchived,
    failOnError: options.failOnError,
  });

  const output = {
    quiet: options.quiet === true,
    json: options.json === true,
    color: options.color !== false,
  };
  const ctx: PipelineContext = {
    ui: createUi(output.color && !output.json, env),
    output,
    suppressOutput: output.json || output.quiet,
    runStartedAt: Date.now(),
  };

  const result = await runPipeline(config, resolveGitHubToken(options.token, env), ctx, deps);
  return result.exitCode;
}

export async function createCliProgram(): Promise<Command> {
  const program = new Command();
  program
    .name("orgclone")
    .description("Clone or update every repository of a GitHub organization in parallel")
    .version(readPackageVersion())
    .option("--dest <path>", "Destination folder that holds all repositories", DEFAULT_DEST)
    .option("--token <token>", "GitHub token (default: GITHUB_TOKEN, then GH_TOKEN)")
    .option("--ssh", "Use SSH clone URLs instead of HTTPS", false)
    .option("--include-archived", "Include archived repositories", false)
    .option(
      "--workers <count>",
      `Concurrent clones, clamped to 1..${MAX_CONCURRENCY} (default: min(8, CPU count))`,
      parseInteger,
    )
    .option("--full", "Full clone instead of a shallow depth=1 clone", false)
    .option("--mirror", "Bare mirror clone (implies full history, overrides --full)", false)
    .option("--org <name>", "GitHub organization to enumerate", DEFAULT_ORG)
    .option("--api-url <url>", "GitHub REST API base URL", DEFAULT_API_URL)
    .option(
      "--retries <count>",
      "Extra clone attempts per repository",
      parseNonNegativeInteger,
      DEFAULT_RETRY_LIMIT,
    )
    .option("--fail-on-error", "Exit with code 1 when any repository failed", false)
    .option("--quiet", "Suppress git output and progress; keep the summary", false)
    .option("--json", "Print the summary as JSON", false)
    .option("--no-color", "Disable ANSI colors")
    .action(async (options: CliOptions) => {
      process.exitCode = await runCloneCommand(options);
    });

  program.addHelpText(
    "after",
    `
Examples:
  $ orgclone                                   Shallow clone via HTTPS into ./${DEFAULT_DEST}
  $ orgclone --ssh --workers 8 --include-archived
  $ orgclone --org my-org --dest ./mirrors --mirror
  $ orgclone --token "$GITHUB_TOKEN"

Exit Codes:
  0   Pipeline ran (individual repository failures are listed, not fatal)
  1   Unexpected error, summary log write failure, or --fail-on-error with failures
  2   Repository listing failed, or invalid options`,
  );

  return program;
}

export async function runCli(argv: readonly string[] = process.argv): Promise<void> {
  const program = await createCliProgram();
  program.exitOverride();
  await program.parseAsync([...argv]);
}

export function exitCodeForError(error: unknown): number {
  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? 0 : EXIT_USAGE_ERROR;
  }

  if (isListingError(error)) {
    return EXIT_LISTING_ERROR;
  }

  if (error instanceof CloneError && error.code === "CONFIG_INVALID") {
    return EXIT_USAGE_ERROR;
  }

  return EXIT_GENERAL_ERROR;
}

import { mkdir } from "node:fs/promises";

import {
  type CloneOutcome,
  type RunConfig,
  type RunSummary,
  type Sleep,
  createEventBus,
} from "../core/index.js";
import { runPool } from "../execution/index.js";
import { type GitRunner, RepositoryLister } from "../repo/index.js";
import { summarize, writeSummaryLog } from "../tracking/index.js";
import { ProgressDisplay, formatInteger } from "./helpers.js";
import { printSummary } from "./render.js";
import { type PipelineContext, resolveExitCode } from "./types.js";

export interface PipelineDeps {
  fetch?: typeof globalThis.fetch;
  runGit?: GitRunner;
  pathExists?: (path: string) => Promise<boolean>;
  sleep?: Sleep;
  now?: () => number;
}

export interface PipelineResult {
  exitCode: number;
  outcomes: CloneOutcome[];
  summary?: RunSummary;
  logPath?: string;
}

/**
 * list → clone/update → summarize. Listing errors propagate (the entry point
 * maps them to exit code 2); per-repository failures only shape the summary.
 */
export async function runPipeline(
  config: RunConfig,
  token: string | undefined,
  ctx: PipelineContext,
  deps: PipelineDeps = {},
): Promise<PipelineResult> {
  const { pool } = config;
  const display = new ProgressDisplay(ctx.suppressOutput, (line) => ctx.ui.dim(line));
  const bus = createEventBus();

  await mkdir(pool.destinationDirectory, { recursive: true });

  if (!token && !ctx.suppressOutput) {
    console.warn(
      ctx.ui.yellow(
        "[orgclone] No GitHub token found (--token, GITHUB_TOKEN or GH_TOKEN); " +
          "unauthenticated listing is heavily rate limited.",
      ),
    );
  }

  let listed = 0;
  bus.on("listing:page", ({ page, count }) => {
    listed += count;
    display.update(`Listing repositories from ${config.org} (page ${page}, ${listed} seen)`);
  });
  bus.on("listing:rate-limited", ({ waitSeconds }) => {
    display.write(ctx.ui.yellow(`Hit rate limit. Sleeping ${waitSeconds} seconds...`));
  });

  const lister = new RepositoryLister({
    org: config.org,
    baseUrl: config.apiUrl,
    bus,
    sleep: deps.sleep,
    now: deps.now,
    fetch: deps.fetch,
  });

  display.start(`Listing repositories from ${config.org}`);
  const repos = await lister
    .listRepositories({ token, includeArchived: config.includeArchived })
    .catch((error: unknown) => {
      display.fail(`Could not list repositories of ${config.org}`);
      throw error;
    });
  display.succeed(`Listed ${formatInteger(repos.length)} repositories from ${config.org}`);

  if (repos.length === 0) {
    if (ctx.output.json) {
      console.log(JSON.stringify({ summary: summarize([]), outcomes: [] }, null, 2));
    } else {
      console.log("No repositories found. (Maybe the org is empty or your token lacks access?)");
    }
    return { exitCode: 0, outcomes: [] };
  }

  if (!ctx.suppressOutput) {
    console.log(
      `Found ${formatInteger(repos.length)} repositories to process (dest: ${pool.destinationDirectory})`,
    );
  }

  bus.on("clone:completed", ({ completed, total }) => {
    display.update(`Cloning repositories ${completed}/${total}`);
  });

  display.start(`Cloning repositories 0/${repos.length}`);
  const outcomes = await runPool(repos, pool, {
    bus,
    output: display,
    runGit: deps.runGit,
    pathExists: deps.pathExists,
    sleep: deps.sleep,
  });
  display.succeed(`Processed ${formatInteger(outcomes.length)} repositories`);

  const summary = summarize(outcomes);
  const logPath = await writeSummaryLog(
    outcomes,
    pool.destinationDirectory,
    new Date(deps.now ? deps.now() : Date.now()),
  );

  printSummary(ctx, { summary, outcomes, logPath });

  return {
    exitCode: resolveExitCode(summary, config.failOnError),
    outcomes,
    summary,
    logPath,
  };
}

import { constants as fsConstants } from "node:fs";
import { access } from "node:fs/promises";
import { join } from "node:path";

import {
  type CloneEventBus,
  type CloneOutcome,
  type FailedOutcome,
  type OutputChannel,
  type RepositoryDescriptor,
  type Sleep,
  type WorkerPoolConfig,
  silentOutput,
  sleep as defaultSleep,
  toErrorMessage,
} from "../core/index.js";
import {
  type GitRunResult,
  type GitRunner,
  describeGitResult,
  isSuccessful,
  runGit as defaultRunGit,
} from "./git-runner.js";

const CLONE_BACKOFF_BASE_SECONDS = 5;

export interface CloneWorkerDeps {
  runGit?: GitRunner;
  pathExists?: (path: string) => Promise<boolean>;
  sleep?: Sleep;
  output?: OutputChannel;
  bus?: CloneEventBus;
}

type ResolvedDeps = Required<Omit<CloneWorkerDeps, "bus">> & Pick<CloneWorkerDeps, "bus">;

type UpdateResult =
  | { status: "updated"; fastForward: boolean }
  | { status: "failed"; result: GitRunResult };

export function cloneTargetPath(
  repo: RepositoryDescriptor,
  config: Pick<WorkerPoolConfig, "destinationDirectory" | "mirror">,
): string {
  return join(config.destinationDirectory, config.mirror ? `${repo.name}.git` : repo.name);
}

export function buildCloneArgs(
  url: string,
  target: string,
  config: Pick<WorkerPoolConfig, "mirror" | "shallow">,
): string[] {
  if (config.mirror) {
    return ["clone", "--mirror", url, target];
  }

  if (config.shallow) {
    return ["clone", "--depth", "1", "--no-single-branch", url, target];
  }

  return ["clone", url, target];
}

/** Seconds to wait before retry number `retry` (0-based): 5, 10, 20, ... */
export function cloneBackoffSeconds(retry: number): number {
  return CLONE_BACKOFF_BASE_SECONDS * 2 ** retry;
}

/**
 * Brings one repository up to date on disk. Existing checkouts are updated in
 * place; anything else, including a failed update, goes through a fresh clone.
 * Never rejects: every failure ends up in a `failed` outcome.
 */
export async function processOne(
  repo: RepositoryDescriptor,
  config: WorkerPoolConfig,
  deps: CloneWorkerDeps = {},
): Promise<CloneOutcome> {
  const resolved: ResolvedDeps = {
    runGit: deps.runGit ?? defaultRunGit,
    pathExists: deps.pathExists ?? pathExists,
    sleep: deps.sleep ?? defaultSleep,
    output: deps.output ?? silentOutput,
    bus: deps.bus,
  };

  try {
    const target = cloneTargetPath(repo, config);

    if (await resolved.pathExists(target)) {
      const update = await updateExisting(repo, target, config, resolved);
      if (update.status === "updated") {
        return { status: "updated", name: repo.name, fastForward: update.fastForward };
      }

      resolved.output.write(
        `[${repo.name}] update failed (${describeGitResult(update.result)}); trying a fresh clone`,
      );
    }

    return await cloneFresh(repo, target, config, resolved);
  } catch (error) {
    return {
      status: "failed",
      name: repo.name,
      code: "CLONE_FAILED",
      reason: toErrorMessage(error),
    };
  }
}

async function updateExisting(
  repo: RepositoryDescriptor,
  target: string,
  config: WorkerPoolConfig,
  deps: ResolvedDeps,
): Promise<UpdateResult> {
  const onLine = lineForwarder(repo.name, deps.output);

  if (config.mirror) {
    const result = await deps.runGit(["remote", "update", "--prune"], { cwd: target, onLine });
    return isSuccessful(result) ? { status: "updated", fastForward: true } : { status: "failed", result };
  }

  const fetched = await deps.runGit(["fetch", "--all", "--prune"], { cwd: target, onLine });
  if (!isSuccessful(fetched)) {
    return { status: "failed", result: fetched };
  }

  // A rejected fast-forward still counts as updated; the outcome records it.
  const pulled = await deps.runGit(["pull", "--ff-only"], { cwd: target, onLine });
  return { status: "updated", fastForward: isSuccessful(pulled) };
}

async function cloneFresh(
  repo: RepositoryDescriptor,
  target: string,
  config: WorkerPoolConfig,
  deps: ResolvedDeps,
): Promise<CloneOutcome> {
  const url = config.useSsh ? repo.sshCloneUrl : repo.httpCloneUrl;
  const args = buildCloneArgs(url, target, config);
  const onLine = lineForwarder(repo.name, deps.output);

  let attempt = 1;
  let result = await deps.runGit(args, { onLine });

  while (!isSuccessful(result) && attempt <= config.retryLimit) {
    const delaySeconds = cloneBackoffSeconds(attempt - 1);
    deps.output.write(
      `[${repo.name}] clone failed with ${describeGitResult(result)}. ` +
        `Retrying in ${delaySeconds}s (attempt ${attempt}/${config.retryLimit})...`,
    );
    deps.bus?.emit("clone:retrying", {
      name: repo.name,
      exitCode: result.status === "exited" ? result.exitCode : null,
      delaySeconds,
      attempt,
      maxRetries: config.retryLimit,
    });

    await deps.sleep(delaySeconds * 1000);
    attempt += 1;
    result = await deps.runGit(args, { onLine });
  }

  if (isSuccessful(result)) {
    return { status: "cloned", name: repo.name, attempts: attempt };
  }

  return toFailedOutcome(repo.name, result);
}

function toFailedOutcome(name: string, result: GitRunResult): FailedOutcome {
  if (result.status === "exited") {
    return {
      status: "failed",
      name,
      code: "CLONE_FAILED",
      reason: `clone failed with exit code ${result.exitCode}`,
      exitCode: result.exitCode,
    };
  }

  return {
    status: "failed",
    name,
    code: "GIT_SPAWN_FAILED",
    reason: `git could not run: ${result.message}`,
  };
}

function lineForwarder(name: string, output: OutputChannel): (line: string) => void {
  return (line) => {
    const trimmed = line.trimEnd();
    if (trimmed.trim().length > 0) {
      output.write(`[${name}] ${trimmed}`);
    }
  };
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

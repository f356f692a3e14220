import PQueue from "p-queue";

import {
  type CloneEventBus,
  type CloneOutcome,
  type RepositoryDescriptor,
  type WorkerPoolConfig,
  toErrorMessage,
} from "../core/index.js";
import { type CloneWorkerDeps, processOne } from "../repo/index.js";

export type ProcessOne = (
  repo: RepositoryDescriptor,
  config: WorkerPoolConfig,
  deps: CloneWorkerDeps,
) => Promise<CloneOutcome>;

export interface PoolDeps extends CloneWorkerDeps {
  /** Unit of work per repository; defaults to the clone/update worker. */
  processOne?: ProcessOne;
}

/**
 * Runs one clone/update unit per descriptor with at most `concurrency` in
 * flight. Outcomes are returned in completion order. A failing unit never
 * cancels its siblings; a throwing event listener rejects the run after all
 * units have finished.
 */
export async function runPool(
  repos: readonly RepositoryDescriptor[],
  config: WorkerPoolConfig,
  deps: PoolDeps = {},
): Promise<CloneOutcome[]> {
  const { processOne: unit = processOne, ...workerDeps } = deps;
  const queue = new PQueue({ concurrency: config.concurrency });
  const outcomes: CloneOutcome[] = [];
  const total = repos.length;
  let completed = 0;

  const record = (outcome: CloneOutcome): void => {
    outcomes.push(outcome);
    completed += 1;
    workerDeps.bus?.emit("clone:completed", { outcome, completed, total });
  };

  const tasks = repos.map((repo) =>
    queue.add(async () => {
      workerDeps.bus?.emit("clone:started", { repo });

      let outcome: CloneOutcome;
      try {
        outcome = await unit(repo, config, workerDeps);
      } catch (error) {
        outcome = {
          status: "failed",
          name: repo.name,
          code: "CLONE_FAILED",
          reason: toErrorMessage(error),
        };
      }

      record(outcome);
    }),
  );

  // Errors raised by bus listeners surface here once every unit has settled.
  const settled = await Promise.allSettled(tasks);
  for (const result of settled) {
    if (result.status === "rejected") {
      throw result.reason;
    }
  }

  return outcomes;
}

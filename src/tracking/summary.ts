import type { CloneOutcome, FailedOutcome, RunSummary } from "../core/index.js";

export function summarize(outcomes: readonly CloneOutcome[]): RunSummary {
  const failures: FailedOutcome[] = [];
  const notFastForwarded: string[] = [];
  let cloned = 0;
  let updated = 0;

  for (const outcome of outcomes) {
    switch (outcome.status) {
      case "cloned":
        cloned += 1;
        break;
      case "updated":
        updated += 1;
        if (!outcome.fastForward) {
          notFastForwarded.push(outcome.name);
        }
        break;
      case "failed":
        failures.push(outcome);
        break;
    }
  }

  return {
    total: outcomes.length,
    successCount: cloned + updated,
    cloned,
    updated,
    notFastForwarded,
    failures,
  };
}

export function formatOutcomeLine(outcome: CloneOutcome): string {
  return `${outcome.status}: ${outcome.name}`;
}

import type { ChalkInstance } from "chalk";

import type { CloneOutcome, RunSummary } from "../core/index.js";
import { formatOutcomeLine } from "../tracking/index.js";
import { formatInteger, truncate } from "./helpers.js";
import { type PipelineContext, formatDuration } from "./types.js";

export function formatSummaryLines(
  ui: ChalkInstance,
  summary: RunSummary,
  params: { logPath: string; durationSeconds?: number },
): string[] {
  const lines = [
    "",
    ui.bold("Summary:"),
    `  Success: ${formatInteger(summary.successCount)}/${formatInteger(summary.total)}` +
      ` (cloned ${summary.cloned}, updated ${summary.updated})`,
  ];

  if (summary.failures.length > 0) {
    lines.push(ui.red("  Failures:"));
    for (const failure of summary.failures) {
      lines.push(`    - ${formatOutcomeLine(failure)} (${truncate(failure.reason, 120)})`);
    }
  }

  if (summary.notFastForwarded.length > 0) {
    lines.push(ui.yellow("  Fetched but not fast-forwarded:"));
    for (const name of summary.notFastForwarded) {
      lines.push(`    - ${name}`);
    }
  }

  if (params.durationSeconds !== undefined) {
    lines.push(`  Duration: ${formatDuration(params.durationSeconds)}`);
  }

  lines.push("", `Detailed log saved to: ${params.logPath}`);
  return lines;
}

export function printSummary(
  ctx: PipelineContext,
  params: { summary: RunSummary; outcomes: readonly CloneOutcome[]; logPath: string },
): void {
  if (ctx.output.json) {
    console.log(
      JSON.stringify(
        { summary: params.summary, outcomes: params.outcomes, logPath: params.logPath },
        null,
        2,
      ),
    );
    return;
  }

  const durationSeconds = (Date.now() - ctx.runStartedAt) / 1000;
  for (const line of formatSummaryLines(ctx.ui, params.summary, {
    logPath: params.logPath,
    durationSeconds,
  })) {
    console.log(line);
  }
}

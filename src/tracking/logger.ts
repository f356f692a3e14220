import { writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";

import { type CloneOutcome, persistenceError, toErrorMessage } from "../core/index.js";
import { formatOutcomeLine } from "./summary.js";

export function summaryLogFileName(now: Date): string {
  return `clone_summary_${Math.floor(now.getTime() / 1000)}.log`;
}

/**
 * Writes one `<status>: <name>` line per outcome into the destination
 * directory and returns the file's absolute path.
 */
export async function writeSummaryLog(
  outcomes: readonly CloneOutcome[],
  destinationDirectory: string,
  now: Date = new Date(),
): Promise<string> {
  const filePath = join(resolve(destinationDirectory), summaryLogFileName(now));
  const payload = outcomes.map((outcome) => `${formatOutcomeLine(outcome)}\n`).join("");

  try {
    await writeFile(filePath, payload, { encoding: "utf8" });
  } catch (error) {
    throw persistenceError(
      "SUMMARY_WRITE_FAILED",
      `Could not write summary log to ${filePath}: ${toErrorMessage(error)}`,
      { context: { filePath }, cause: error },
    );
  }

  return filePath;
}

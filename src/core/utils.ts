import { setTimeout as delay } from "node:timers/promises";

/**
 * Truncate a string to `maxLength`, appending an ellipsis when trimmed.
 */
export function truncate(value: string, maxLength: number, ellipsis = "…"): string {
  if (value.length <= maxLength) {
    return value;
  }
  return `${value.slice(0, Math.max(0, maxLength - ellipsis.length))}${ellipsis}`;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = async (ms) => {
  await delay(ms);
};

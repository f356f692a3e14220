import chalk, { Chalk, type ChalkInstance } from "chalk";
import { InvalidArgumentError } from "commander";
import ora, { type Ora } from "ora";

import type { OutputChannel } from "../core/index.js";

// ── UI helpers ──────────────────────────────────────────────

export function createUi(color: boolean, env: NodeJS.ProcessEnv = process.env): ChalkInstance {
  const noColorEnv = Object.prototype.hasOwnProperty.call(env, "NO_COLOR");
  const colorEnabled = color && !noColorEnv;

  return new Chalk({ level: colorEnabled ? chalk.level : 0 });
}

/**
 * One live spinner plus a line printer that keeps it intact. Every worker
 * writes through `write`, so git output and retry notices land above the
 * spinner instead of tearing it. With `suppress` nothing is printed at all.
 */
export class ProgressDisplay implements OutputChannel {
  private spinner: Ora | null = null;

  public constructor(
    private readonly suppress: boolean,
    private readonly formatLine: (line: string) => string = (line) => line,
  ) {}

  public start(text: string): void {
    if (this.suppress) {
      return;
    }

    this.spinner?.stop();
    this.spinner = ora({ text, color: "blue" }).start();
  }

  public update(text: string): void {
    if (this.spinner) {
      this.spinner.text = text;
    }
  }

  public succeed(text: string): void {
    this.spinner?.succeed(text);
    this.spinner = null;
  }

  public fail(text: string): void {
    this.spinner?.fail(text);
    this.spinner = null;
  }

  public write(line: string): void {
    if (this.suppress) {
      return;
    }

    const spinner = this.spinner;
    if (spinner?.isSpinning) {
      spinner.clear();
      console.log(this.formatLine(line));
      spinner.render();
      return;
    }

    console.log(this.formatLine(line));
  }
}

// ── Parsing helpers ─────────────────────────────────────────

export function parseInteger(value: string): number {
  const trimmed = value.trim();
  if (!/^[-+]?\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`Expected an integer but received "${value}".`);
  }

  return Number.parseInt(trimmed, 10);
}

export function parseNonNegativeInteger(value: string): number {
  const parsed = parseInteger(value);
  if (parsed < 0) {
    throw new InvalidArgumentError(`Expected a non-negative integer but received "${value}".`);
  }

  return parsed;
}

// ── Formatting helpers ──────────────────────────────────────

export function formatInteger(value: number): string {
  return new Intl.NumberFormat("en-US").format(value);
}

export { truncate } from "../core/utils.js";

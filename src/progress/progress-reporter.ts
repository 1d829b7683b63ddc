import { clearLine, cursorTo } from "node:readline";

import chalk, { type ChalkInstance } from "chalk";
import { z } from "zod";

import { ValidationError } from "../lib/errors.js";

export const progressPercentSchema = z.number().int().min(0).max(100);

const DEFAULT_BAR_WIDTH = 20;

export type ProgressStream = NodeJS.WritableStream & { isTTY?: boolean };

export interface ProgressReporterOptions {
  stream?: ProgressStream;
  enabled?: boolean;
  width?: number;
  colors?: ChalkInstance;
}

export interface ProgressSnapshot {
  percent: number;
  activity: string;
  status: string;
}

export function assertProgressPercent(percent: number): number {
  const parsed = progressPercentSchema.safeParse(percent);
  if (!parsed.success) {
    throw new ValidationError(`progress percent must be an integer between 0 and 100, got ${percent}`);
  }
  return parsed.data;
}

export function renderProgressLine(
  snapshot: ProgressSnapshot,
  width = DEFAULT_BAR_WIDTH,
  colors: ChalkInstance = chalk
): string {
  const filled = Math.round((snapshot.percent / 100) * width);
  const bar = colors.green("#".repeat(filled)) + colors.gray(".".repeat(width - filled));
  const percent = `${String(snapshot.percent).padStart(3, " ")}%`;
  return `${colors.cyan(snapshot.activity)} [${bar}] ${percent} ${snapshot.status}`;
}

/**
 * Console progress indicator. Redraws one line in place on a TTY and
 * prints one line per report elsewhere.
 */
export class ProgressReporter {
  private readonly stream: ProgressStream;
  private readonly enabled: boolean;
  private readonly width: number;
  private readonly colors: ChalkInstance;
  private current: ProgressSnapshot | null = null;
  private lineOpen = false;

  constructor(options: ProgressReporterOptions = {}) {
    this.stream = options.stream ?? process.stderr;
    this.enabled = options.enabled ?? true;
    this.width = options.width ?? DEFAULT_BAR_WIDTH;
    this.colors = options.colors ?? chalk;
  }

  get last(): ProgressSnapshot | null {
    return this.current;
  }

  report(percent: number, activity: string, status: string): void {
    const snapshot: ProgressSnapshot = { percent: assertProgressPercent(percent), activity, status };
    this.current = snapshot;
    if (!this.enabled) {
      return;
    }

    const line = renderProgressLine(snapshot, this.width, this.colors);
    if (this.stream.isTTY) {
      cursorTo(this.stream, 0);
      clearLine(this.stream, 0);
      this.stream.write(line);
      this.lineOpen = true;
      return;
    }

    this.stream.write(`${line}\n`);
  }

  complete(): void {
    if (this.lineOpen) {
      this.stream.write("\n");
      this.lineOpen = false;
    }
  }
}

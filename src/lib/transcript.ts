import { closeSync, mkdirSync, openSync, writeSync } from "node:fs";
import { hostname, platform, userInfo } from "node:os";
import { dirname, resolve } from "node:path";
import { format } from "node:util";

import { LogInitError, TranscriptClosedError } from "./errors.js";

const BANNER = "**********************";

const CAPTURED_METHODS = ["log", "info", "warn", "error"] as const;

type CapturedMethod = (typeof CAPTURED_METHODS)[number];

export interface ConsoleLike {
  log(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface TranscriptOptions {
  console?: ConsoleLike;
}

/**
 * Append-mode capture of console output into a file.
 *
 * While open, every call to log/info/warn/error on the captured console still
 * reaches the original method and is also appended to the file as one line.
 */
export class Transcript {
  private fd: number | null;
  private readonly restore: Array<() => void> = [];

  private constructor(
    readonly path: string,
    fd: number,
    private readonly target: ConsoleLike
  ) {
    this.fd = fd;
  }

  static open(path: string, options: TranscriptOptions = {}): Transcript {
    const absolute = resolve(path);
    let fd: number;
    try {
      mkdirSync(dirname(absolute), { recursive: true });
      fd = openSync(absolute, "a");
    } catch (error) {
      throw new LogInitError(absolute, error);
    }

    const transcript = new Transcript(absolute, fd, options.console ?? console);
    transcript.writeBanner("Transcript started", [
      `Username: ${currentUser()}`,
      `Machine: ${hostname()} (${platform()})`,
      `Process ID: ${process.pid}`
    ]);
    transcript.capture();
    return transcript;
  }

  get closed(): boolean {
    return this.fd === null;
  }

  /** Appends a line to the file only. */
  write(line: string): void {
    if (this.fd === null) {
      throw new TranscriptClosedError(this.path);
    }
    writeSync(this.fd, `${line}\n`);
  }

  close(): void {
    if (this.fd === null) {
      return;
    }

    for (const undo of this.restore.splice(0)) {
      undo();
    }
    this.writeBanner("Transcript stopped", []);
    closeSync(this.fd);
    this.fd = null;
  }

  private capture(): void {
    for (const method of CAPTURED_METHODS) {
      this.restore.push(this.wrap(method));
    }
  }

  private wrap(method: CapturedMethod): () => void {
    const target = this.target;
    const original = target[method];

    target[method] = (...args: unknown[]): void => {
      original.apply(target, args);
      if (this.fd !== null) {
        this.write(format(...args));
      }
    };

    return () => {
      target[method] = original;
    };
  }

  private writeBanner(title: string, details: string[]): void {
    this.write(BANNER);
    this.write(`${title}, output file is ${this.path}`);
    for (const detail of details) {
      this.write(detail);
    }
    this.write(BANNER);
  }
}

function currentUser(): string {
  try {
    return userInfo().username;
  } catch {
    return process.env.USER ?? process.env.USERNAME ?? "unknown";
  }
}

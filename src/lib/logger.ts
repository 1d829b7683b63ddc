import type { ConsoleLike } from "./transcript.js";

export const LOG_LEVELS = ["DEBUG", "INFO", "WARN", "ERROR"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
}

/** Destination for DEBUG lines and anything else that must not reach the console. */
export interface LogFileSink {
  write(line: string): void;
}

export interface SessionLoggerOptions {
  console?: ConsoleLike;
  now?: () => Date;
  /** Echo DEBUG lines to the console as well. */
  verbose?: boolean;
  /** Runs before each console line, e.g. to end an open progress line. */
  beforeConsoleWrite?: () => void;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** Local time as `yyyy-MM-dd HH:mm:ss`. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function formatLogLine(entry: LogEntry): string {
  return `[${formatTimestamp(entry.timestamp)}] [${entry.level}] ${entry.message}`;
}

/**
 * Writes formatted lines to standard output and the session file.
 *
 * The console is expected to be captured by the session transcript, so
 * console lines reach the file through the capture. DEBUG lines skip the
 * console and are written to the file sink directly.
 */
export class SessionLogger {
  private readonly console: ConsoleLike;
  private readonly now: () => Date;
  private readonly verbose: boolean;
  private readonly beforeConsoleWrite: () => void;

  constructor(
    private readonly file: LogFileSink,
    options: SessionLoggerOptions = {}
  ) {
    this.console = options.console ?? console;
    this.now = options.now ?? (() => new Date());
    this.verbose = options.verbose ?? false;
    this.beforeConsoleWrite = options.beforeConsoleWrite ?? (() => undefined);
  }

  log(message: string, level: LogLevel = "INFO"): LogEntry {
    const entry: LogEntry = { timestamp: this.now(), level, message };
    const line = formatLogLine(entry);

    if (level === "DEBUG" && !this.verbose) {
      this.file.write(line);
    } else {
      this.beforeConsoleWrite();
      this.console.log(line);
    }

    return entry;
  }

  debug(message: string): LogEntry {
    return this.log(message, "DEBUG");
  }

  info(message: string): LogEntry {
    return this.log(message, "INFO");
  }

  warn(message: string): LogEntry {
    return this.log(message, "WARN");
  }

  error(message: string): LogEntry {
    return this.log(message, "ERROR");
  }
}

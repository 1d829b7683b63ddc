import { formatTimestamp, SessionLogger } from "../lib/logger.js";
import { type ConsoleLike, Transcript } from "../lib/transcript.js";

export interface RunSession {
  startTime: Date;
  endTime: Date | null;
  logPath: string;
}

export interface SessionHandle {
  session: RunSession;
  logger: SessionLogger;
  transcript: Transcript;
}

export interface SessionOptions {
  console?: ConsoleLike;
  now?: () => Date;
  verbose?: boolean;
  beforeConsoleWrite?: () => void;
}

export function initializeSession(logPath: string, options: SessionOptions = {}): SessionHandle {
  const now = options.now ?? (() => new Date());
  const transcript = Transcript.open(logPath, { console: options.console });
  const logger = new SessionLogger(transcript, {
    console: options.console,
    now,
    verbose: options.verbose,
    beforeConsoleWrite: options.beforeConsoleWrite
  });

  const session: RunSession = { startTime: now(), endTime: null, logPath: transcript.path };
  logger.info(`Start time: ${formatTimestamp(session.startTime)}`);

  return { session, logger, transcript };
}

export function durationSeconds(session: RunSession): string {
  const end = session.endTime ?? session.startTime;
  return ((end.getTime() - session.startTime.getTime()) / 1000).toFixed(3);
}

/**
 * Stamps the end time, logs end time and runtime, then releases the log file.
 * Returns the duration in milliseconds.
 */
export function closeSession(handle: SessionHandle, now: () => Date = () => new Date()): number {
  const { session, logger, transcript } = handle;
  const endTime = now();
  session.endTime = endTime;

  try {
    logger.info(`End time: ${formatTimestamp(endTime)}`);
    logger.info(`Total runtime: ${durationSeconds(session)} seconds`);
  } finally {
    transcript.close();
  }

  return endTime.getTime() - session.startTime.getTime();
}

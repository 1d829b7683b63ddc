export class TaskError extends Error {
  constructor(
    message: string,
    public readonly code: string = "INTERNAL_ERROR",
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TaskError";
  }
}

export class ValidationError extends TaskError {
  constructor(message: string) {
    super(`Validation error: ${message}`, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

export class LogInitError extends TaskError {
  constructor(logPath: string, cause: unknown) {
    super(`Unable to open log file ${logPath}: ${errorMessage(cause)}`, "LOG_INIT_FAILED", { cause });
    this.name = "LogInitError";
  }
}

export class TranscriptClosedError extends TaskError {
  constructor(logPath: string) {
    super(`Transcript already closed: ${logPath}`, "TRANSCRIPT_CLOSED");
    this.name = "TranscriptClosedError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Format an error for terminal output.
 */
export function formatError(error: unknown): string {
  if (error instanceof TaskError) {
    return `[${error.code}] ${error.message}`;
  }
  return `[ERROR] ${errorMessage(error)}`;
}

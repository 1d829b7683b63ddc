export { buildProgram, type ProgramDeps } from "./cli/program.js";
export { getEnv, resetEnvForTests, type AppEnv } from "./config/env.js";
export {
  DEFAULT_STEP_DELAY_MS,
  defaultLogPath,
  resolveRunOptions,
  type RunOptions,
  type RunOptionsInput
} from "./config/run-options.js";
export {
  errorMessage,
  formatError,
  LogInitError,
  TaskError,
  TranscriptClosedError,
  ValidationError
} from "./lib/errors.js";
export {
  formatLogLine,
  formatTimestamp,
  LOG_LEVELS,
  SessionLogger,
  type LogEntry,
  type LogFileSink,
  type LogLevel
} from "./lib/logger.js";
export { Transcript, type ConsoleLike } from "./lib/transcript.js";
export {
  assertProgressPercent,
  ProgressReporter,
  renderProgressLine,
  type ProgressSnapshot,
  type ProgressStream
} from "./progress/progress-reporter.js";
export { runTask, type RunnerDeps, type RunnerState, type RunResult } from "./task/runner.js";
export {
  closeSession,
  durationSeconds,
  initializeSession,
  type RunSession,
  type SessionHandle
} from "./task/session.js";
export { ACTIVITY, SIMULATED_STEPS, simulatedWorkload, type Workload, type WorkloadContext } from "./task/workload.js";

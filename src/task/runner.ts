import { errorMessage } from "../lib/errors.js";
import type { ConsoleLike } from "../lib/transcript.js";
import type { RunOptions } from "../config/run-options.js";
import { ProgressReporter } from "../progress/progress-reporter.js";
import { closeSession, initializeSession, type RunSession } from "./session.js";
import { ACTIVITY, simulatedWorkload, sleep, type Workload } from "./workload.js";

export type RunnerState = "setup" | "running" | "cleanup" | "closed";

export interface RunnerDeps {
  workload?: Workload;
  progress?: ProgressReporter;
  console?: ConsoleLike;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  onStateChange?: (state: RunnerState) => void;
}

export interface RunResult {
  session: RunSession;
  durationMs: number;
}

export async function runTask(options: RunOptions, deps: RunnerDeps = {}): Promise<RunResult> {
  const now = deps.now ?? (() => new Date());
  const workload = deps.workload ?? simulatedWorkload;
  const progress = deps.progress ?? new ProgressReporter({ enabled: options.showProgress });
  const enter = (state: RunnerState): void => deps.onStateChange?.(state);

  const handle = initializeSession(options.logFile, {
    console: deps.console,
    now,
    verbose: options.verbose,
    beforeConsoleWrite: () => progress.complete()
  });
  const { logger } = handle;
  let durationMs = 0;

  try {
    enter("setup");
    logger.info("Beginning workload execution");
    progress.report(options.progressPercent, ACTIVITY, "Starting");

    enter("running");
    await workload({
      logger,
      progress,
      stepDelayMs: options.stepDelayMs,
      sleep: deps.sleep ?? sleep
    });

    enter("cleanup");
    progress.report(100, ACTIVITY, "Complete");
    logger.info("Custom workload completed successfully.");
  } catch (error) {
    logger.error(`An error occurred: ${errorMessage(error)}`);
    throw error;
  } finally {
    progress.complete();
    durationMs = closeSession(handle, now);
    enter("closed");
  }

  return { session: handle.session, durationMs };
}

import { setTimeout as delay } from "node:timers/promises";

import type { SessionLogger } from "../lib/logger.js";
import type { ProgressReporter } from "../progress/progress-reporter.js";

export const ACTIVITY = "Running custom workload";

export interface WorkloadContext {
  logger: SessionLogger;
  progress: ProgressReporter;
  stepDelayMs: number;
  sleep: (ms: number) => Promise<void>;
}

export type Workload = (context: WorkloadContext) => Promise<void>;

export const SIMULATED_STEPS: readonly number[] = [0, 10, 20, 30, 40, 50, 60, 70, 80, 90, 100];

export async function sleep(ms: number): Promise<void> {
  await delay(ms);
}

/**
 * Placeholder workload. Replace the loop body with the real task.
 */
export const simulatedWorkload: Workload = async ({ logger, progress, stepDelayMs, sleep: pause }) => {
  for (const step of SIMULATED_STEPS) {
    await pause(stepDelayMs);
    progress.report(step, ACTIVITY, `${step}% complete`);
    logger.debug(`Completed ${step}% of simulated workload`);
  }
};

import { basename, dirname, extname, join } from "node:path";

import { z } from "zod";

import type { AppEnv } from "./env.js";
import { ValidationError } from "../lib/errors.js";

export const DEFAULT_STEP_DELAY_MS = 100;

/** Accepts a number or a non-blank numeric string. */
function integerOption(name: string, min: number, max: number) {
  const range = `${name} must be between ${min} and ${max}`;
  return z
    .union([z.number(), z.string().trim().min(1, `${name} must not be empty`)])
    .pipe(
      z.coerce
        .number({ invalid_type_error: `${name} must be a number` })
        .int(`${name} must be an integer`)
        .min(min, range)
        .max(max, range)
    );
}

const runOptionsSchema = z.object({
  logFile: z.string().min(1),
  progressPercent: integerOption("ProgressPercent", 0, 100),
  stepDelayMs: integerOption("StepDelay", 0, 60000),
  showProgress: z.boolean(),
  verbose: z.boolean()
});

export type RunOptions = z.infer<typeof runOptionsSchema>;

/** Raw values as they arrive from the command line. */
export interface RunOptionsInput {
  logFile?: string;
  progressPercent?: string | number;
  stepDelay?: string | number;
  progress?: boolean;
  verbose?: boolean;
}

/** `<scriptDir>/<scriptName>.log` for the given script path. */
export function defaultLogPath(scriptPath: string): string {
  const name = basename(scriptPath, extname(scriptPath));
  return join(dirname(scriptPath), `${name}.log`);
}

/**
 * Merges command line values over environment values over defaults and
 * validates the result.
 */
export function resolveRunOptions(input: RunOptionsInput, env: AppEnv, scriptPath: string): RunOptions {
  const parsed = runOptionsSchema.safeParse({
    logFile: input.logFile ?? env.TASK_LOG_FILE ?? defaultLogPath(scriptPath),
    progressPercent: input.progressPercent ?? env.TASK_PROGRESS_PERCENT ?? 0,
    stepDelayMs: input.stepDelay ?? env.TASK_STEP_DELAY_MS ?? DEFAULT_STEP_DELAY_MS,
    showProgress: input.progress ?? true,
    verbose: input.verbose ?? env.TASK_VERBOSE
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ValidationError(issues.join("; "));
  }

  return parsed.data;
}

import { Command } from "commander";

import { getEnv } from "../config/env.js";
import { resolveRunOptions, type RunOptionsInput } from "../config/run-options.js";
import { runTask, type RunnerDeps, type RunResult } from "../task/runner.js";

export interface ProgramDeps extends RunnerDeps {
  /** Path of the running script, used to derive the default log file. */
  scriptPath: string;
  onResult?: (result: RunResult) => void;
}

export function buildProgram(deps: ProgramDeps): Command {
  const { scriptPath, onResult, ...runnerDeps } = deps;
  const program = new Command();

  program
    .name("run-task")
    .description("Run an ad-hoc administrative task with a session log, progress and timing")
    .option("-l, --log-file <path>", "Log file to append to (default: <scriptDir>/<scriptName>.log)")
    .option("-p, --progress-percent <percent>", "Initial progress percent, 0-100")
    .option("--step-delay <ms>", "Delay per simulated work step in milliseconds")
    .option("--no-progress", "Do not draw the progress indicator")
    .option("-v, --verbose", "Echo DEBUG lines to the console")
    .action(async (input: RunOptionsInput) => {
      const options = resolveRunOptions(input, getEnv(), scriptPath);
      const result = await runTask(options, runnerDeps);
      onResult?.(result);
    });

  return program;
}

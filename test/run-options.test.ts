import { beforeEach, describe, expect, test } from "vitest";

import { getEnv, resetEnvForTests, type AppEnv } from "../src/config/env.js";
import { defaultLogPath, resolveRunOptions } from "../src/config/run-options.js";
import { ValidationError } from "../src/lib/errors.js";

function buildEnv(overrides: Partial<AppEnv> = {}): AppEnv {
  return {
    TASK_VERBOSE: false,
    ...overrides
  };
}

describe("defaultLogPath", () => {
  test("places the log beside the script with the script name", () => {
    expect(defaultLogPath("/opt/scripts/rotate-keys.ts")).toBe("/opt/scripts/rotate-keys.log");
    expect(defaultLogPath("/opt/scripts/dist/run-task.js")).toBe("/opt/scripts/dist/run-task.log");
  });
});

describe("resolveRunOptions", () => {
  test("falls back to defaults", () => {
    expect(resolveRunOptions({}, buildEnv(), "/srv/tasks/run-task.js")).toEqual({
      logFile: "/srv/tasks/run-task.log",
      progressPercent: 0,
      stepDelayMs: 100,
      showProgress: true,
      verbose: false
    });
  });

  test("prefers command line values over environment values", () => {
    const env = buildEnv({ TASK_LOG_FILE: "/var/log/env.log", TASK_PROGRESS_PERCENT: 10, TASK_STEP_DELAY_MS: 50 });

    const fromEnv = resolveRunOptions({}, env, "/srv/tasks/run-task.js");
    expect(fromEnv.logFile).toBe("/var/log/env.log");
    expect(fromEnv.progressPercent).toBe(10);
    expect(fromEnv.stepDelayMs).toBe(50);

    const fromCli = resolveRunOptions(
      { logFile: "/tmp/cli.log", progressPercent: "40", stepDelay: "0", progress: false, verbose: true },
      env,
      "/srv/tasks/run-task.js"
    );
    expect(fromCli).toEqual({
      logFile: "/tmp/cli.log",
      progressPercent: 40,
      stepDelayMs: 0,
      showProgress: false,
      verbose: true
    });
  });

  test("rejects a progress percent outside 0-100", () => {
    for (const progressPercent of ["-1", "101", "12.5", "abc"]) {
      expect(() => resolveRunOptions({ progressPercent }, buildEnv(), "/srv/run-task.js")).toThrow(ValidationError);
    }
  });

  test("rejects an empty or blank progress percent", () => {
    for (const progressPercent of ["", "   "]) {
      expect(() => resolveRunOptions({ progressPercent }, buildEnv(), "/srv/run-task.js")).toThrow(
        "Validation error: progressPercent: ProgressPercent must not be empty"
      );
    }
  });

  test("rejects an empty step delay", () => {
    expect(() => resolveRunOptions({ stepDelay: "" }, buildEnv(), "/srv/run-task.js")).toThrow(ValidationError);
  });

  test("names the offending option", () => {
    expect(() => resolveRunOptions({ progressPercent: 150 }, buildEnv(), "/srv/run-task.js")).toThrow(
      "Validation error: progressPercent: ProgressPercent must be between 0 and 100"
    );
  });
});

describe("getEnv", () => {
  beforeEach(() => {
    delete process.env.TASK_LOG_FILE;
    delete process.env.TASK_PROGRESS_PERCENT;
    delete process.env.TASK_STEP_DELAY_MS;
    delete process.env.TASK_VERBOSE;
    resetEnvForTests();
  });

  test("parses task variables", () => {
    process.env.TASK_PROGRESS_PERCENT = "30";
    process.env.TASK_VERBOSE = "1";

    const env = getEnv();
    expect(env.TASK_PROGRESS_PERCENT).toBe(30);
    expect(env.TASK_VERBOSE).toBe(true);
    expect(env.TASK_LOG_FILE).toBeUndefined();
  });

  test("rejects an out-of-range percent", () => {
    process.env.TASK_PROGRESS_PERCENT = "200";
    expect(() => getEnv()).toThrow(/^Invalid environment/);
    delete process.env.TASK_PROGRESS_PERCENT;
  });
});

import { describe, expect, test, vi } from "vitest";

import { formatLogLine, formatTimestamp, SessionLogger } from "../src/lib/logger.js";

const fixedNow = (): Date => new Date(2026, 9, 18, 9, 5, 3);

function buildLogger(verbose = false) {
  const fileLines: string[] = [];
  const console = { log: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const beforeConsoleWrite = vi.fn();
  const logger = new SessionLogger(
    { write: (line) => void fileLines.push(line) },
    { console, now: fixedNow, verbose, beforeConsoleWrite }
  );
  return { logger, console, fileLines, beforeConsoleWrite };
}

describe("log formatting", () => {
  test("formats local timestamps with zero padding", () => {
    expect(formatTimestamp(new Date(2026, 0, 2, 3, 4, 5))).toBe("2026-01-02 03:04:05");
    expect(formatTimestamp(new Date(2026, 11, 31, 23, 59, 59))).toBe("2026-12-31 23:59:59");
  });

  test("formats a log line with level", () => {
    const line = formatLogLine({ timestamp: fixedNow(), level: "WARN", message: "disk almost full" });
    expect(line).toBe("[2026-10-18 09:05:03] [WARN] disk almost full");
  });
});

describe("SessionLogger", () => {
  test("defaults to INFO and writes to console.log", () => {
    const { logger, console, fileLines } = buildLogger();
    const entry = logger.log("Beginning workload execution");

    expect(entry.level).toBe("INFO");
    expect(console.log).toHaveBeenCalledTimes(1);
    expect(console.log).toHaveBeenCalledWith("[2026-10-18 09:05:03] [INFO] Beginning workload execution");
    expect(fileLines).toEqual([]);
  });

  test("writes WARN and ERROR to standard output", () => {
    const { logger, console } = buildLogger();
    logger.warn("careful");
    logger.error("broken");

    expect(console.log.mock.calls).toEqual([
      ["[2026-10-18 09:05:03] [WARN] careful"],
      ["[2026-10-18 09:05:03] [ERROR] broken"]
    ]);
    expect(console.warn).not.toHaveBeenCalled();
    expect(console.error).not.toHaveBeenCalled();
  });

  test("runs the console hook before every console line but not for file-only lines", () => {
    const { logger, beforeConsoleWrite } = buildLogger();
    logger.info("one");
    logger.debug("file only");
    logger.error("two");

    expect(beforeConsoleWrite).toHaveBeenCalledTimes(2);
  });

  test("keeps DEBUG lines off the console", () => {
    const { logger, console, fileLines } = buildLogger();
    logger.debug("Completed 10% of simulated workload");

    expect(fileLines).toEqual(["[2026-10-18 09:05:03] [DEBUG] Completed 10% of simulated workload"]);
    expect(console.log).not.toHaveBeenCalled();
    expect(console.info).not.toHaveBeenCalled();
  });

  test("echoes DEBUG lines to the console when verbose", () => {
    const { logger, console, fileLines } = buildLogger(true);
    logger.debug("details");

    expect(console.log).toHaveBeenCalledWith("[2026-10-18 09:05:03] [DEBUG] details");
    expect(fileLines).toEqual([]);
  });
});

/**
 * Run Log Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, readFileSync } from "fs";
import path from "path";
import { FileRunLogger, NoopRunLogger, RUNS_LOG_HEADER } from "../src/trace/run_log.js";
import { makeWorkspace, removeWorkspace } from "./helpers/workspace.js";

const RUN = 20170808000000;

let workspace: string;

beforeEach(() => {
  workspace = makeWorkspace();
});

afterEach(() => {
  removeWorkspace(workspace);
});

function runsLog(): string[] {
  return readFileSync(path.join(workspace, "log", "runs.log"), "utf-8").split("\n");
}

describe("FileRunLogger", () => {
  it("creates the log directory", () => {
    new FileRunLogger(workspace, RUN);
    expect(existsSync(path.join(workspace, "log"))).toBe(true);
  });

  it("writes the header once, then one line per event", () => {
    const finished = new Date(2017, 7, 8, 0, 5, 30);
    const runLogger = new FileRunLogger(workspace, RUN, () => finished);

    runLogger.reportStart(RUN, [1000, 2000], { "fake.name": "two words", roll_call: [] });
    runLogger.reportFinish(RUN, true);
    runLogger.reportStart(RUN, [3000], {});
    runLogger.reportFinish(RUN, false);

    expect(runsLog()).toEqual([
      RUNS_LOG_HEADER,
      "20170808000000|2017-08-08 00:00:00|START|1000 2000|fake.name=two_words",
      "20170808000000|2017-08-08 00:05:30|FINISH|||",
      "20170808000000|2017-08-08 00:00:00|START|3000|",
      "20170808000000|2017-08-08 00:05:30|CRASH|||",
      "",
    ]);
  });

  it("appends to an existing runs log", () => {
    new FileRunLogger(workspace, RUN).reportStart(RUN, [1000], {});
    new FileRunLogger(workspace, RUN + 1).reportStart(RUN + 1, [1000], {});

    const lines = runsLog();
    expect(lines.filter((line) => line === RUNS_LOG_HEADER)).toHaveLength(1);
    expect(lines[2]).toBe("20170808000001|2017-08-08 00:00:01|START|1000|");
  });
});

describe("NoopRunLogger", () => {
  it("writes nothing", () => {
    const runLogger = new NoopRunLogger();
    runLogger.reportStart();
    runLogger.reportFinish();
    expect(existsSync(path.join(workspace, "log"))).toBe(false);
  });
});

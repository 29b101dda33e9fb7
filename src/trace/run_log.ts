import { appendFileSync, existsSync, mkdirSync, writeFileSync } from "fs";
import path from "path";

import { createFileLogger, createLogger, type Logger } from "../shared/logger.js";
import { displayDate, displayRunTimestamp } from "../shared/run_config.js";

export const RUNS_LOG_HEADER = "run_id|timestamp|status|targets|params";

/**
 * Records the start and end of every run. The engine itself never calls it;
 * the runner reports around `Engine.run`.
 */
export interface RunLogger {
  readonly logger: Logger;
  reportStart(timestamp: number, targets: readonly number[], params: Readonly<Record<string, unknown>>): void;
  reportFinish(timestamp: number, success: boolean): void;
}

export class NoopRunLogger implements RunLogger {
  readonly logger: Logger = createLogger("runner");

  reportStart(): void {}

  reportFinish(): void {}
}

/**
 * Keeps `<workspace>/log/runs.log`, one pipe-separated line per START and
 * FINISH/CRASH, and a full process log in `<workspace>/log/<timestamp>.log`.
 */
export class FileRunLogger implements RunLogger {
  readonly logDir: string;
  readonly runsLog: string;
  readonly logger: Logger;
  private readonly now: () => Date;

  constructor(workspace: string, timestamp: number, now: () => Date = () => new Date()) {
    this.logDir = path.join(workspace, "log");
    this.runsLog = path.join(this.logDir, "runs.log");
    this.now = now;
    mkdirSync(this.logDir, { recursive: true });
    this.logger = createFileLogger(path.join(this.logDir, `${timestamp}.log`)).child({ module: "runner" });
  }

  reportStart(timestamp: number, targets: readonly number[], params: Readonly<Record<string, unknown>>): void {
    if (!existsSync(this.runsLog)) {
      writeFileSync(this.runsLog, `${RUNS_LOG_HEADER}\n`);
    }
    // Only string params are recorded; spaces would break the column layout.
    const paramText = Object.entries(params)
      .filter((entry): entry is [string, string] => typeof entry[1] === "string")
      .map(([key, value]) => `${key}=${value.replace(/ /g, "_")}`)
      .join(" ");
    appendFileSync(
      this.runsLog,
      `${timestamp}|${displayRunTimestamp(timestamp)}|START|${targets.join(" ")}|${paramText}\n`,
    );
  }

  reportFinish(timestamp: number, success: boolean): void {
    appendFileSync(this.runsLog, `${timestamp}|${displayDate(this.now())}|${success ? "FINISH" : "CRASH"}|||\n`);
  }
}

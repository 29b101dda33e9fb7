#!/usr/bin/env tsx
/**
 * Usage: npm run example -- [--targets <code|workflow>...] [--params section.key=value...]
 *
 * Runs the monthly briefing into examples/simple/workspace/. Set
 * LAYERFLOW_RUN_TIMESTAMP (YYYYMMDDHHMMSS) to re-run an earlier version.
 */

import "dotenv/config";
import path from "path";
import { fileURLToPath } from "url";

import { logger, parseRunTimestamp, runEngine } from "../../src/index.js";
import { taskFactories } from "./tasks.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

async function main() {
  const extra = process.argv.slice(2);
  const argv = [
    "--engine", path.join(__dirname, "engine.yaml"),
    "--conf", path.join(__dirname, "conf.ini"),
    "--dir", path.join(__dirname, "workspace"),
    ...(extra.includes("--targets") ? [] : ["--targets", "monthly_briefing", "--deps"]),
    ...extra,
  ];

  const summary = await runEngine({
    taskFactories,
    argv,
    timestamp: parseRunTimestamp(undefined, process.env["LAYERFLOW_RUN_TIMESTAMP"]),
  });
  logger.info(`Run ${summary.timestamp} executed ${summary.executed.length} tasks`);
}

main().catch((err: unknown) => {
  logger.error({ err }, "Run failed");
  process.exit(1);
});

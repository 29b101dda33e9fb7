/**
 * Runner: sets up and runs an engine from command-line arguments.
 *
 * Usage (from a host program that supplies its task factories):
 *   --dir <workspace> --targets <code|workflow>... [--deps]
 *   [--engine engine.yaml] [--conf params.ini...] [--params section.key=value...]
 *
 * The host calls `runEngine` from its main function. A callback can adjust
 * the engine or the run arguments between setup and execution.
 */

import path from "path";

import { loadEngineConfig, type TaskFactories } from "../config/engine_config.js";
import { readContext } from "../config/params.js";
import { ArgumentError } from "../engine/errors.js";
import { EngineRegistry } from "../engine/registry.js";
import { Engine } from "../engine/runtime.js";
import type { RunSummary, TaskContext } from "../engine/types.js";
import { formatRunTimestamp } from "../shared/run_config.js";
import { FileRunLogger, NoopRunLogger, type RunLogger } from "../trace/run_log.js";

export interface RunArgs {
  dir: string;
  targets: string[];
  deps: boolean;
  engine: string;
  conf: string[];
  params: string[];
}

export interface RunArguments {
  workspace: string;
  targets: number[];
  context: TaskContext;
}

export type RunCallback = (engine: Engine, args: RunArguments) => RunArguments | Promise<RunArguments>;

export interface RunEngineOptions {
  taskFactories: TaskFactories;
  /** Arguments without the program name. Defaults to `process.argv.slice(2)`. */
  argv?: readonly string[];
  /** Run timestamp (YYYYMMDDHHMMSS). Defaults to now. */
  timestamp?: number;
  /** Called just before the engine runs; returns the arguments to run with. */
  callback?: RunCallback;
  /** Write `log/runs.log` and `log/<timestamp>.log` in the workspace. Defaults to true. */
  logs?: boolean;
}

const LIST_FLAGS = new Set(["--targets", "--conf", "--params"]);
const VALUE_FLAGS = new Set(["--dir", "--engine"]);

export function parseRunArgs(argv: readonly string[]): RunArgs {
  const values = new Map<string, string>();
  const lists = new Map<string, string[]>();
  let deps = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--deps") {
      deps = true;
    } else if (VALUE_FLAGS.has(arg)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new ArgumentError(`${arg} expects a value`);
      }
      values.set(arg, value);
      i++;
    } else if (LIST_FLAGS.has(arg)) {
      const items: string[] = [];
      while (i + 1 < argv.length && !argv[i + 1].startsWith("--")) {
        items.push(argv[++i]);
      }
      if (items.length === 0) {
        throw new ArgumentError(`${arg} expects at least one value`);
      }
      lists.set(arg, [...(lists.get(arg) ?? []), ...items]);
    } else {
      throw new ArgumentError(`Unrecognized argument: ${arg}`);
    }
  }

  const dir = values.get("--dir");
  if (dir === undefined) throw new ArgumentError("--dir is required");
  const targets = lists.get("--targets");
  if (targets === undefined) throw new ArgumentError("--targets is required");

  return {
    dir,
    targets,
    deps,
    engine: values.get("--engine") ?? "engine.yaml",
    conf: lists.get("--conf") ?? [],
    params: lists.get("--params") ?? [],
  };
}

/**
 * Read the configs, expand the targets, build the context and run the engine.
 * A failed run is reported as CRASH in the run log and rethrown.
 */
export async function runEngine(options: RunEngineOptions): Promise<RunSummary> {
  const timestamp = options.timestamp ?? formatRunTimestamp();
  const args = parseRunArgs(options.argv ?? process.argv.slice(2));

  const runLogger: RunLogger = (options.logs ?? true) ? new FileRunLogger(args.dir, timestamp) : new NoopRunLogger();
  const log = runLogger.logger;

  log.info("Setting up engine");
  const registry = loadEngineConfig(path.resolve(args.engine), options.taskFactories, new EngineRegistry(log));
  for (const [name, codes] of registry.listWorkflows()) {
    log.debug(`Workflow ${name}: [${codes.join(", ")}]`);
  }
  const engine = new Engine(registry, { timestamp, logger: log });
  const targets = engine.expandTargets(args.targets, args.deps);

  log.info("Setting up context");
  let runArgs: RunArguments = {
    workspace: args.dir,
    targets,
    context: readContext(args.conf, args.params),
  };

  if (options.callback) {
    log.info("Executing callback");
    runArgs = await options.callback(engine, runArgs);
  }

  runLogger.reportStart(timestamp, runArgs.targets, runArgs.context);
  log.info("Running the engine");
  try {
    const summary = await engine.run(runArgs.workspace, runArgs.targets, runArgs.context);
    runLogger.reportFinish(timestamp, true);
    return summary;
  } catch (err) {
    runLogger.reportFinish(timestamp, false);
    log.error({ err }, "Exception caught");
    throw err;
  }
}

/**
 * Engine: runs the tasks that produce a list of target codes.
 *
 * Targets are processed strictly in the given order, one task at a time. Each
 * task runs at most once per run even when it produces several targets. The
 * context object is shared by every task of the run; it is the only channel
 * between tasks besides the files themselves.
 */

import { openDataFile, DataFileSet } from "../files/data_file_set.js";
import { formatRunTimestamp } from "../shared/run_config.js";
import { createLogger, type Logger } from "../shared/logger.js";
import type { EngineRegistry } from "./registry.js";
import { resolveDataFilePath } from "./versioning.js";
import { expandTargets, type TargetRequest } from "./resolver.js";
import { describeTask, type FileIntent, type RunSummary, type Task, type TaskContext } from "./types.js";

export interface EngineOptions {
  /** Run timestamp (YYYYMMDDHHMMSS). Defaults to the current local time. */
  timestamp?: number;
  logger?: Logger;
}

export class Engine {
  readonly registry: EngineRegistry;
  readonly timestamp: number;
  private readonly log: Logger;

  constructor(registry: EngineRegistry, options: EngineOptions = {}) {
    this.registry = registry;
    this.timestamp = options.timestamp ?? formatRunTimestamp();
    this.log = options.logger ?? createLogger("engine");
  }

  expandTargets(requests: readonly TargetRequest[], includeDependencies = false): number[] {
    return expandTargets(this.registry, requests, includeDependencies);
  }

  private openFiles(workspace: string, codes: readonly number[], intent: FileIntent): DataFileSet {
    const files = codes.map((code) => {
      const spec = this.registry.getSpec(code);
      const filePath = resolveDataFilePath(workspace, spec, intent, this.timestamp);
      this.log.debug(`${intent === "read" ? "Input" : "Output"} file ${code} is ${filePath}`);
      return openDataFile(filePath, intent, spec);
    });
    return new DataFileSet(files);
  }

  /**
   * Run the tasks producing `targets` against `workspace`.
   * Errors thrown by a task propagate as-is; files already written stay.
   */
  async run(workspace: string, targets: readonly number[], context: TaskContext = {}): Promise<RunSummary> {
    this.log.debug(`Context has ${Object.keys(context).length} items`);
    for (const [key, value] of Object.entries(context)) {
      this.log.debug(`* ${key}: ${String(value)}`);
    }

    const completed = new Set<Task>();
    const summary: RunSummary = { timestamp: this.timestamp, executed: [], skipped: [] };

    for (const target of targets) {
      const task = this.registry.getTask(target);
      if (completed.has(task)) {
        summary.skipped.push(target);
        continue;
      }

      const label = describeTask(task);
      this.log.info(`Building target ${target} (${this.registry.getSpec(target).name}) by running task ${label}`);

      const inputs = this.openFiles(workspace, task.inputCodes, "read");
      const outputs = this.openFiles(workspace, task.outputCodes, "write");
      await task.run(inputs, outputs, context);

      completed.add(task);
      summary.executed.push(label);
    }

    return summary;
  }
}

/**
 * Engine Registry: file specs, tasks and workflows.
 *
 * Filled once during setup and read-only afterwards. Registration enforces the
 * graph invariants; because every task's outputs are numerically greater than
 * its inputs, any ascending list of codes is a valid execution order.
 */

import { createLogger, type Logger } from "../shared/logger.js";
import {
  CodeOrderingError,
  DuplicateSpecError,
  DuplicateTaskOutputError,
  DuplicateWorkflowError,
  UnknownSpecError,
  UnknownTaskError,
} from "./errors.js";
import { describeTask, type FileSpec, type Task } from "./types.js";

export class EngineRegistry {
  private readonly specs = new Map<number, FileSpec>();
  private readonly tasksByOutput = new Map<number, Task>();
  private readonly workflows = new Map<string, readonly number[]>();
  private readonly log: Logger;

  constructor(log: Logger = createLogger("registry")) {
    this.log = log;
  }

  registerFileSpec(spec: FileSpec): void {
    if (this.specs.has(spec.code)) {
      throw new DuplicateSpecError(spec.code);
    }
    this.log.debug(`Registering file spec ${spec.code} (${spec.name})`);
    this.specs.set(spec.code, spec);
  }

  registerTask(task: Task): void {
    const label = describeTask(task);

    for (const code of task.outputCodes) {
      if (this.tasksByOutput.has(code)) {
        throw new DuplicateTaskOutputError(code, label);
      }
    }

    if (task.inputCodes.length > 0 && task.outputCodes.length > 0) {
      const maxInput = Math.max(...task.inputCodes);
      const minOutput = Math.min(...task.outputCodes);
      if (maxInput >= minOutput) {
        throw new CodeOrderingError(maxInput, minOutput, label);
      }
    }

    for (const code of [...task.inputCodes, ...task.outputCodes]) {
      if (!this.specs.has(code)) {
        throw new UnknownSpecError(code, label);
      }
    }

    this.log.debug(`Registering task ${label}`);
    for (const code of task.outputCodes) {
      this.tasksByOutput.set(code, task);
    }
  }

  /** Codes are checked when the workflow is expanded, not here. */
  registerWorkflow(name: string, codes: readonly number[]): void {
    if (this.workflows.has(name)) {
      throw new DuplicateWorkflowError(name);
    }
    this.log.debug(`Registering workflow ${name} with targets [${codes.join(", ")}]`);
    this.workflows.set(name, [...codes]);
  }

  getSpec(code: number): FileSpec {
    const spec = this.specs.get(code);
    if (!spec) throw new UnknownSpecError(code);
    return spec;
  }

  getTask(code: number): Task {
    const task = this.tasksByOutput.get(code);
    if (!task) throw new UnknownTaskError(code);
    return task;
  }

  hasTask(code: number): boolean {
    return this.tasksByOutput.has(code);
  }

  findWorkflow(name: string): readonly number[] | undefined {
    return this.workflows.get(name);
  }

  listSpecs(): FileSpec[] {
    return [...this.specs.values()].sort((a, b) => a.code - b.code);
  }

  listWorkflows(): Map<string, readonly number[]> {
    return new Map(this.workflows);
  }
}

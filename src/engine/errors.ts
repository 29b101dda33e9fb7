/**
 * Engine error types.
 *
 * Every error raised by the engine extends EngineError, so callers can catch
 * engine failures with `err instanceof EngineError` and still tell them apart
 * from errors thrown inside a task's own code.
 */

// ── Base ───────────────────────────────────────────────────────────

export class EngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

// ── Configuration ──────────────────────────────────────────────────

export class DuplicateSpecError extends EngineError {
  constructor(public readonly code: number) {
    super(`File specification ${code} already registered`);
  }
}

export class DuplicateTaskOutputError extends EngineError {
  constructor(
    public readonly code: number,
    public readonly task: string,
  ) {
    super(`Task with output ${code} already registered (while registering ${task})`);
  }
}

export class CodeOrderingError extends EngineError {
  constructor(
    public readonly maxInputCode: number,
    public readonly minOutputCode: number,
    public readonly task: string,
  ) {
    super(`Input code ${maxInputCode} not smaller than output code ${minOutputCode} in task ${task}`);
  }
}

export class UnknownSpecError extends EngineError {
  constructor(
    public readonly code: number,
    public readonly task?: string,
  ) {
    super(
      task === undefined
        ? `No file specification registered for code ${code}`
        : `Unregistered spec ${code} referenced in task ${task}`,
    );
  }
}

export class DuplicateWorkflowError extends EngineError {
  constructor(public readonly workflow: string) {
    super(`Workflow ${workflow} already registered`);
  }
}

export class EngineConfigError extends EngineError {
  constructor(
    public readonly source: string,
    public readonly issues: string[],
  ) {
    super(`Invalid engine configuration in ${source}:\n  ${issues.join("\n  ")}`);
  }
}

export class UnknownTaskClassError extends EngineError {
  constructor(
    public readonly className: string,
    public readonly available: string[],
  ) {
    super(
      `Task class '${className}' is not in the task factory map` +
        (available.length > 0 ? ` (known: ${available.join(", ")})` : ""),
    );
  }
}

export class ParamFileError extends EngineError {
  constructor(
    public readonly source: string,
    public readonly line: number,
    message: string,
  ) {
    super(`${message} at ${source}:${line}`);
  }
}

// ── Resolution ─────────────────────────────────────────────────────

export class InvalidTargetError extends EngineError {
  constructor(public readonly target: string) {
    super(`Target '${target}' is neither a workflow name nor a data file code`);
  }
}

export class UnknownTaskError extends EngineError {
  constructor(public readonly code: number) {
    super(`No registered task that can create target ${code}`);
  }
}

// ── Storage ────────────────────────────────────────────────────────

export class NoInputFileError extends EngineError {
  constructor(
    public readonly code: number,
    public readonly workspace: string,
  ) {
    super(`No input files for code ${String(code).padStart(4, "0")} in ${workspace}`);
  }
}

export class DataFileError extends EngineError {
  constructor(
    public readonly path: string,
    message: string,
  ) {
    super(`${message}: ${path}`);
  }
}

export class SchemaMismatchError extends DataFileError {
  constructor(
    path: string,
    public readonly expected: string[],
    public readonly actual: string[],
  ) {
    super(path, `Columns [${actual.join(", ")}] do not match schema columns [${expected.join(", ")}]`);
  }
}

// ── Runner ─────────────────────────────────────────────────────────

export class ArgumentError extends EngineError {}

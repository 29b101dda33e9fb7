/**
 * Engine Types
 *
 * Core type definitions for file specifications, tasks and the run context.
 * A data file kind is addressed by its integer code everywhere in the engine;
 * codes double as the ordering key of the whole task graph.
 */

import type { DataFileSet } from "../files/data_file_set.js";

// ── File Specs ─────────────────────────────────────────────────────

export const FLAGS = ["binary", "gzipped", "directory"] as const;

export type Flag = (typeof FLAGS)[number];

export const FIELD_TYPES = ["bool", "int", "float", "str", "datetime"] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

export interface SchemaField {
  name: string;
  type: FieldType;
}

export interface CsvDialect {
  delimiter: string;
  quote: string;
  lineTerminator: string;
}

export const DEFAULT_DIALECT: CsvDialect = {
  delimiter: ",",
  quote: '"',
  lineTerminator: "\r\n",
};

export interface FileSpec {
  readonly code: number;
  readonly name: string;
  /** Empty string means the file name carries no extension. */
  readonly extension: string;
  readonly flags: ReadonlySet<Flag>;
  /** Present only for tabular (CSV) files. */
  readonly schema?: readonly SchemaField[];
  readonly dialect?: CsvDialect;
}

export type TabularFileSpec = FileSpec & {
  readonly schema: readonly SchemaField[];
  readonly dialect: CsvDialect;
};

export function isTabular(spec: FileSpec): spec is TabularFileSpec {
  return spec.schema !== undefined;
}

export function hasFlag(spec: FileSpec, flag: Flag): boolean {
  return spec.flags.has(flag);
}

// ── Tasks ──────────────────────────────────────────────────────────

export type FileIntent = "read" | "write";

/**
 * Mutable key/value map shared by every task of one run, in execution order.
 * Parameter files land here as `section.key` entries.
 */
export type TaskContext = Record<string, unknown>;

/**
 * A unit of work that reads the files of its input codes and writes the files
 * of its output codes. When a task has both, every input code must be smaller
 * than every output code. Two task objects are never the same task, even when
 * they declare identical codes.
 */
export interface Task {
  readonly name?: string;
  readonly inputCodes: readonly number[];
  readonly outputCodes: readonly number[];
  run(inputs: DataFileSet, outputs: DataFileSet, context: TaskContext): Promise<void> | void;
}

/** Human-readable label, e.g. `summary [1000, 2000] -> [4000]`. */
export function describeTask(task: Task): string {
  const codes = `[${task.inputCodes.join(", ")}] -> [${task.outputCodes.join(", ")}]`;
  return task.name ? `${task.name} ${codes}` : codes;
}

// ── Run Results ────────────────────────────────────────────────────

export interface RunSummary {
  timestamp: number;
  /** Task labels in execution order. */
  executed: string[];
  /** Targets whose producing task had already run earlier in the run. */
  skipped: number[];
}

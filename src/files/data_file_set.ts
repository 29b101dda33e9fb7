/**
 * The files handed to a task, keyed by code.
 */

import { EngineError } from "../engine/errors.js";
import { isTabular, type FileIntent, type FileSpec } from "../engine/types.js";
import { CsvInputDataFile, CsvOutputDataFile } from "./csv_file.js";
import { DataFile } from "./data_file.js";

/** Pick the handle class for a spec: CSV handles for tabular specs, plain otherwise. */
export function openDataFile(filePath: string, intent: FileIntent, spec: FileSpec): DataFile {
  if (isTabular(spec)) {
    return intent === "read" ? new CsvInputDataFile(filePath, spec) : new CsvOutputDataFile(filePath, spec);
  }
  return new DataFile(filePath, intent, spec);
}

export class DataFileSet implements Iterable<DataFile> {
  private readonly files = new Map<number, DataFile>();

  constructor(files: Iterable<DataFile> = []) {
    for (const file of files) {
      this.files.set(file.spec.code, file);
    }
  }

  get size(): number {
    return this.files.size;
  }

  has(code: number): boolean {
    return this.files.has(code);
  }

  codes(): number[] {
    return [...this.files.keys()];
  }

  get(code: number): DataFile {
    const file = this.files.get(code);
    if (!file) {
      throw new EngineError(`No data file for code ${code} (available: ${this.codes().join(", ") || "none"})`);
    }
    return file;
  }

  csvInput(code: number): CsvInputDataFile {
    const file = this.get(code);
    if (!(file instanceof CsvInputDataFile)) {
      throw new EngineError(`Data file ${code} is not a readable CSV file`);
    }
    return file;
  }

  csvOutput(code: number): CsvOutputDataFile {
    const file = this.get(code);
    if (!(file instanceof CsvOutputDataFile)) {
      throw new EngineError(`Data file ${code} is not a writable CSV file`);
    }
    return file;
  }

  [Symbol.iterator](): Iterator<DataFile> {
    return this.files.values();
  }
}

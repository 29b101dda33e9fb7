/**
 * Tabular (CSV) data files.
 *
 * Records are read lazily through csv-parse; each `records()` call re-opens
 * the file, so a sequence can be restarted. Writing goes through a scoped
 * record writer that emits the header first and one line per record.
 */

import { parse } from "csv-parse";
import type { Writable } from "stream";

import { DataFileError, SchemaMismatchError } from "../engine/errors.js";
import type { CsvDialect, TabularFileSpec } from "../engine/types.js";
import { coerceField, formatField, type DataRecord } from "./coerce.js";
import { DataFile, writeChunk } from "./data_file.js";

export interface CsvOptions {
  /** Check the header (reads) or record fields (writes) against the schema. Defaults to true. */
  validate?: boolean;
}

function toCells(row: unknown, source: string): string[] {
  if (!Array.isArray(row)) {
    throw new DataFileError(source, "Unexpected CSV row shape");
  }
  return row.map((cell) => String(cell));
}

function sameColumns(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((name, i) => name === b[i]);
}

export class CsvInputDataFile extends DataFile {
  declare readonly spec: TabularFileSpec;

  constructor(path: string, spec: TabularFileSpec) {
    super(path, "read", spec);
  }

  columns(): string[] {
    return this.spec.schema.map((field) => field.name);
  }

  async *records(options: CsvOptions = {}): AsyncGenerator<DataRecord> {
    const validate = options.validate ?? true;
    const { schema, dialect } = this.spec;

    const source = this.createReadStream();
    const parser = parse({
      delimiter: dialect.delimiter,
      quote: dialect.quote,
      escape: dialect.quote,
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
    source.on("error", (err) => parser.destroy(err));
    source.pipe(parser);

    const rows: AsyncIterable<unknown> = parser;
    let header: string[] | undefined;
    try {
      for await (const row of rows) {
        const cells = toCells(row, this.path);
        if (header === undefined) {
          header = cells;
          if (validate && !sameColumns(header, this.columns())) {
            throw new SchemaMismatchError(this.path, this.columns(), header);
          }
          continue;
        }

        const record: DataRecord = {};
        const width = Math.min(cells.length, schema.length);
        for (let i = 0; i < width; i++) {
          record[schema[i].name] = coerceField(cells[i], schema[i].type, this.path);
        }
        yield record;
      }
    } finally {
      source.destroy();
      parser.destroy();
    }

    if (header === undefined && validate) {
      throw new DataFileError(this.path, "Empty file without header");
    }
  }

  /** Collect every record. Convenient for small files. */
  async readAll(options: CsvOptions = {}): Promise<DataRecord[]> {
    const out: DataRecord[] = [];
    for await (const record of this.records(options)) {
      out.push(record);
    }
    return out;
  }
}

/** Format one CSV line, quoting only the cells that need it. */
export function formatCsvLine(cells: readonly string[], dialect: CsvDialect): string {
  if (cells.length === 1 && cells[0] === "") {
    return `${dialect.quote}${dialect.quote}${dialect.lineTerminator}`;
  }
  const quoted = cells.map((cell) => {
    const needsQuotes =
      cell.includes(dialect.delimiter) ||
      cell.includes(dialect.quote) ||
      cell.includes("\n") ||
      cell.includes("\r");
    if (!needsQuotes) return cell;
    const escaped = cell.split(dialect.quote).join(dialect.quote + dialect.quote);
    return `${dialect.quote}${escaped}${dialect.quote}`;
  });
  return quoted.join(dialect.delimiter) + dialect.lineTerminator;
}

export class RecordWriter {
  private count = 0;

  constructor(
    private readonly file: CsvOutputDataFile,
    private readonly stream: Writable,
    private readonly validate: boolean,
  ) {}

  get written(): number {
    return this.count;
  }

  async writeHeader(): Promise<void> {
    await writeChunk(this.stream, formatCsvLine(this.file.columns(), this.file.spec.dialect));
  }

  async write(record: Record<string, unknown>): Promise<void> {
    const { schema, dialect } = this.file.spec;
    if (this.validate) {
      const columns = this.file.columns();
      const keys = Object.keys(record);
      if (keys.some((key) => !columns.includes(key))) {
        throw new SchemaMismatchError(this.file.path, columns, keys);
      }
    }
    const cells = schema.map((field) => formatField(record[field.name], field.type));
    await writeChunk(this.stream, formatCsvLine(cells, dialect));
    this.count++;
  }
}

export class CsvOutputDataFile extends DataFile {
  declare readonly spec: TabularFileSpec;

  constructor(path: string, spec: TabularFileSpec) {
    super(path, "write", spec);
  }

  columns(): string[] {
    return this.spec.schema.map((field) => field.name);
  }

  async withRecordWriter<T>(fn: (writer: RecordWriter) => Promise<T> | T, options: CsvOptions = {}): Promise<T> {
    return this.withWriteStream(async (stream) => {
      const writer = new RecordWriter(this, stream, options.validate ?? true);
      await writer.writeHeader();
      return fn(writer);
    });
  }

  /** Write a whole record list in one scope. Returns the number of records written. */
  async writeAll(records: Iterable<Record<string, unknown>>, options: CsvOptions = {}): Promise<number> {
    return this.withRecordWriter(async (writer) => {
      for (const record of records) {
        await writer.write(record);
      }
      return writer.written;
    }, options);
  }
}

/**
 * Run parameters: INI parameter files plus `key=value` overrides from the
 * command line, flattened into the run context as `section.key` entries.
 */

import { readFileSync } from "fs";

import { ParamFileError } from "../engine/errors.js";
import type { TaskContext } from "../engine/types.js";

const DEFAULT_SECTION = "DEFAULT";

export type IniDocument = Map<string, Map<string, string>>;

/**
 * Parse INI text. Keys are lower-cased, `#` and `;` start comment lines, and
 * keys of the DEFAULT section are inherited by every other section. A key
 * before the first section header or a line without `=` or `:` fails.
 */
export function parseIni(text: string, source = "<inline>"): IniDocument {
  const sections: IniDocument = new Map([[DEFAULT_SECTION, new Map<string, string>()]]);
  let current: Map<string, string> | undefined;

  const lines = text.split(/\r?\n/);
  for (const [index, rawLine] of lines.entries()) {
    const line = rawLine.trim();
    if (line === "" || line.startsWith("#") || line.startsWith(";")) continue;

    const header = /^\[(.+)\]$/.exec(line);
    if (header) {
      const name = header[1].trim();
      current = sections.get(name) ?? new Map<string, string>();
      sections.set(name, current);
      continue;
    }

    if (current === undefined) {
      throw new ParamFileError(source, index + 1, "Missing section header");
    }
    const sep = line.search(/[=:]/);
    if (sep <= 0) {
      throw new ParamFileError(source, index + 1, `Expected 'key = value', got '${line}'`);
    }
    current.set(line.slice(0, sep).trim().toLowerCase(), line.slice(sep + 1).trim());
  }

  const defaults = sections.get(DEFAULT_SECTION) ?? new Map<string, string>();
  for (const [name, values] of sections) {
    if (name === DEFAULT_SECTION) continue;
    sections.set(name, new Map([...defaults, ...values]));
  }
  return sections;
}

/** Split `section.key=value`; the section defaults to `default`. */
export function parseParam(param: string): { key: string; value: string } | undefined {
  const eq = param.indexOf("=");
  if (eq < 0) return undefined;

  const name = param.slice(0, eq);
  const value = param.slice(eq + 1);
  const dot = name.indexOf(".");
  const section = dot < 0 ? "default" : name.slice(0, dot);
  const key = dot < 0 ? name : name.slice(dot + 1);
  return { key: `${section}.${key.toLowerCase()}`, value };
}

/**
 * Build the run context. Files are read in order, later files override
 * earlier ones, and command-line params override all files.
 */
export function readContext(paramFiles: readonly string[] = [], commandLineParams: readonly string[] = []): TaskContext {
  const context: TaskContext = {};

  for (const filePath of paramFiles) {
    for (const [section, values] of parseIni(readFileSync(filePath, "utf-8"), filePath)) {
      for (const [key, value] of values) {
        context[`${section}.${key}`] = value;
      }
    }
  }

  for (const param of commandLineParams) {
    const parsed = parseParam(param);
    if (parsed) context[parsed.key] = parsed.value;
  }

  return context;
}

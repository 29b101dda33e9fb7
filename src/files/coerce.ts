/**
 * Field coercion between CSV text and typed record values.
 *
 * Reads are lenient for numbers: a value that does not parse as an int or a
 * float becomes 0. An int beyond the safe integer range fails. Datetimes are
 * strict and must use one of the known layouts.
 */

import { DataFileError } from "../engine/errors.js";
import type { FieldType } from "../engine/types.js";

export type FieldValue = boolean | number | string | Date;

export type DataRecord = Record<string, FieldValue>;

const INT_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_FLOAT_PATTERN = /^([+-]?)(nan|inf|infinity)$/i;
const TRUE_VALUES = new Set(["y", "Y", "1"]);

// YYYY-MM-DD, then an optional time with a space or T separator,
// optional seconds, milliseconds and trailing Z.
const DATETIME_LAYOUTS: Record<number, RegExp> = {
  10: /^(\d{4})-(\d{2})-(\d{2})$/,
  16: /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2})$/,
  19: /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/,
  20: /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/,
  23: /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})\.(\d{3})$/,
};

function parseInt10(text: string, source: string): number {
  const trimmed = text.trim();
  if (!INT_PATTERN.test(trimmed)) return 0;
  const value = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(value)) {
    throw new DataFileError(source, `Integer '${trimmed}' is outside the safe integer range`);
  }
  return value;
}

function parseFloat10(text: string): number {
  const trimmed = text.trim();
  if (FLOAT_PATTERN.test(trimmed)) return Number(trimmed);
  const special = SPECIAL_FLOAT_PATTERN.exec(trimmed);
  if (special) {
    if (special[2].toLowerCase() === "nan") return Number.NaN;
    return special[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }
  return 0;
}

export function parseDateTime(text: string, source: string): Date {
  // 27 characters: microseconds and a UTC offset, only the first 19 are used
  const value = text.length === 27 ? text.slice(0, 19) : text;
  const layout = DATETIME_LAYOUTS[value.length];
  const m = layout?.exec(value);
  if (!m) {
    throw new DataFileError(source, `Unsupported date/time format '${text}'`);
  }

  const [year, month, day, hour = 0, minute = 0, second = 0, ms = 0] = m
    .slice(1)
    .filter((part): part is string => part !== undefined)
    .map(Number);
  const date = new Date(Date.UTC(2000, month - 1, day, hour, minute, second, ms));
  // Date.UTC maps years 0-99 onto 1900-1999
  date.setUTCFullYear(year, month - 1, day);
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    throw new DataFileError(source, `Invalid date/time '${text}'`);
  }
  return date;
}

/** Convert one CSV cell to the schema type. `source` names the file in errors. */
export function coerceField(text: string, type: FieldType, source: string): FieldValue {
  switch (type) {
    case "int":
      return parseInt10(text, source);
    case "float":
      return parseFloat10(text);
    case "bool":
      return TRUE_VALUES.has(text);
    case "str":
      return text;
    case "datetime":
      return parseDateTime(text, source);
  }
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** `YYYY-MM-DD HH:MM:SS` in UTC, with `.mmm` when the milliseconds are not zero. */
export function formatDateTime(date: Date): string {
  const base =
    `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
  const ms = date.getUTCMilliseconds();
  return ms === 0 ? base : `${base}.${pad(ms, 3)}`;
}

function formatNumber(value: number): string {
  if (Number.isNaN(value)) return "nan";
  if (value === Number.POSITIVE_INFINITY) return "inf";
  if (value === Number.NEGATIVE_INFINITY) return "-inf";
  return String(value);
}

/** Convert a record value to CSV text. Missing values become empty cells. */
export function formatField(value: unknown, type: FieldType): string {
  if (value === undefined || value === null) return "";
  if (type === "bool") {
    if (typeof value === "string") return TRUE_VALUES.has(value) ? "1" : "0";
    return value ? "1" : "0";
  }
  if (value instanceof Date) return formatDateTime(value);
  if (typeof value === "number") return formatNumber(value);
  return String(value);
}

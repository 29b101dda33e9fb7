/**
 * Run Configuration Module
 *
 * A run is identified by its timestamp, an integer of the form
 * YYYYMMDDHHMMSS in local time. Every file a run writes carries it as the
 * version, and reads prefer files stamped with it.
 */

const TIMESTAMP_PATTERN = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** Format a date as a run timestamp, e.g. 20170808000000. */
export function formatRunTimestamp(date: Date = new Date()): number {
  return Number(
    `${pad(date.getFullYear(), 4)}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
      `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`,
  );
}

/** Render a run timestamp as `YYYY-MM-DD HH:MM:SS`. */
export function displayRunTimestamp(timestamp: number): string {
  const m = TIMESTAMP_PATTERN.exec(String(timestamp));
  if (!m) {
    throw new Error(`Not a run timestamp: ${timestamp}`);
  }
  return `${m[1]}-${m[2]}-${m[3]} ${m[4]}:${m[5]}:${m[6]}`;
}

/** Render a date as `YYYY-MM-DD HH:MM:SS` in local time. */
export function displayDate(date: Date): string {
  return displayRunTimestamp(formatRunTimestamp(date));
}

/**
 * Parse a run timestamp from a CLI argument and/or environment variable.
 * CLI argument takes priority over environment variable.
 * Falls back to the current time when neither is provided.
 */
export function parseRunTimestamp(cliArg?: string, envVar?: string, now: Date = new Date()): number {
  const raw = (cliArg ?? envVar ?? "").trim();
  if (raw === "") return formatRunTimestamp(now);
  if (!TIMESTAMP_PATTERN.test(raw)) {
    throw new Error(`Invalid run timestamp '${raw}': expected YYYYMMDDHHMMSS`);
  }
  return Number(raw);
}

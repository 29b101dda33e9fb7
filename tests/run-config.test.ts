/**
 * Run Timestamp Tests
 */

import { describe, it, expect } from "vitest";
import {
  displayDate,
  displayRunTimestamp,
  formatRunTimestamp,
  parseRunTimestamp,
} from "../src/shared/run_config.js";

const NOW = new Date(2017, 7, 8, 9, 5, 7);

describe("formatRunTimestamp", () => {
  it("formats local time as YYYYMMDDHHMMSS", () => {
    expect(formatRunTimestamp(NOW)).toBe(20170808090507);
  });
});

describe("displayRunTimestamp", () => {
  it("renders the timestamp with separators", () => {
    expect(displayRunTimestamp(20170808090507)).toBe("2017-08-08 09:05:07");
  });

  it("rejects numbers of the wrong width", () => {
    expect(() => displayRunTimestamp(2017)).toThrow("Not a run timestamp: 2017");
  });
});

describe("displayDate", () => {
  it("renders a date like a run timestamp", () => {
    expect(displayDate(NOW)).toBe("2017-08-08 09:05:07");
  });
});

describe("parseRunTimestamp", () => {
  it("defaults to the current time", () => {
    expect(parseRunTimestamp(undefined, undefined, NOW)).toBe(20170808090507);
  });

  it("CLI arg takes priority over env var", () => {
    expect(parseRunTimestamp("20170101000000", "20180101000000", NOW)).toBe(20170101000000);
  });

  it("falls back to env var when no CLI arg", () => {
    expect(parseRunTimestamp(undefined, "20180101000000", NOW)).toBe(20180101000000);
  });

  it("treats a blank value as absent", () => {
    expect(parseRunTimestamp("  ", undefined, NOW)).toBe(20170808090507);
  });

  it("rejects malformed input", () => {
    expect(() => parseRunTimestamp("2017-01-01")).toThrow(/expected YYYYMMDDHHMMSS/);
  });
});

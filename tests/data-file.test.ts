/**
 * Data File Handle Tests
 *
 * Plain, gzipped and directory handles, intent checks and the per-task file set.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, readdirSync, readFileSync, statSync } from "fs";
import path from "path";
import { gunzipSync } from "zlib";
import { DataFile } from "../src/files/data_file.js";
import { CsvInputDataFile, CsvOutputDataFile } from "../src/files/csv_file.js";
import { DataFileSet, openDataFile } from "../src/files/data_file_set.js";
import { DataFileError, EngineError } from "../src/engine/errors.js";
import { DEFAULT_DIALECT, type FileSpec, type Flag, type TabularFileSpec } from "../src/engine/types.js";
import { genericSpec, makeWorkspace, removeWorkspace, touch } from "./helpers/workspace.js";

const GZIPPED: FileSpec = { code: 1100, name: "packed", extension: "txt.gz", flags: new Set<Flag>(["gzipped"]) };
const DIRECTORY: FileSpec = { code: 1200, name: "plots", extension: "", flags: new Set<Flag>(["directory"]) };
const TABLE: TabularFileSpec = {
  code: 1300,
  name: "table",
  extension: "csv",
  flags: new Set(),
  schema: [{ name: "id", type: "int" }],
  dialect: DEFAULT_DIALECT,
};

let workspace: string;

beforeEach(() => {
  workspace = makeWorkspace();
});

afterEach(() => {
  removeWorkspace(workspace);
});

describe("DataFile", () => {
  it("reports its path and flags", () => {
    const file = new DataFile("/tmp/x", "read", GZIPPED);
    expect(file.getPath()).toBe("/tmp/x");
    expect(file.isGzipped()).toBe(true);
    expect(file.isBinary()).toBe(false);
    expect(file.isDirectory()).toBe(false);
  });

  it("writes and reads text", async () => {
    const target = path.join(workspace, "d1000_foo_v1.dat");
    await new DataFile(target, "write", genericSpec(1000)).writeText("héllo\n");

    expect(readFileSync(target, "utf-8")).toBe("héllo\n");
    expect(await new DataFile(target, "read", genericSpec(1000)).readText()).toBe("héllo\n");
    expect(readdirSync(workspace)).toEqual(["d1000_foo_v1.dat"]);
  });

  it("compresses gzipped specs transparently", async () => {
    const target = path.join(workspace, "d1100_packed_v1.txt.gz");
    await new DataFile(target, "write", GZIPPED).writeText("compressed text");

    expect(gunzipSync(readFileSync(target)).toString("utf-8")).toBe("compressed text");
    expect(await new DataFile(target, "read", GZIPPED).readText()).toBe("compressed text");
  });

  it("writes binary data unchanged", async () => {
    const target = path.join(workspace, "d1000_foo_v1.dat");
    const bytes = Uint8Array.from([0, 255, 10, 13]);
    await new DataFile(target, "write", genericSpec(1000)).writeBuffer(bytes);

    expect([...(await new DataFile(target, "read", genericSpec(1000)).readBuffer())]).toEqual([0, 255, 10, 13]);
  });

  it("creates missing parent directories on write", async () => {
    const target = path.join(workspace, "nested", "d1000_foo_v1.dat");
    await new DataFile(target, "write", genericSpec(1000)).writeText("x");
    expect(readFileSync(target, "utf-8")).toBe("x");
  });

  it("refuses to read through a write handle and the reverse", async () => {
    const target = touch(workspace, "d1000_foo_v1.dat", "x");
    await expect(new DataFile(target, "write", genericSpec(1000)).readText()).rejects.toThrow(DataFileError);
    await expect(new DataFile(target, "read", genericSpec(1000)).writeText("y")).rejects.toThrow(
      `File opened for read cannot be used for write: ${target}`,
    );
    expect(readFileSync(target, "utf-8")).toBe("x");
  });

  it("rejects a missing input file", async () => {
    const target = path.join(workspace, "missing.dat");
    await expect(new DataFile(target, "read", genericSpec(1000)).readText()).rejects.toThrow(/ENOENT/);
  });

  it("creates a directory for directory specs", async () => {
    const target = path.join(workspace, "d1200_plots_v1");
    await new DataFile(target, "write", DIRECTORY).makeDirectory();
    expect(statSync(target).isDirectory()).toBe(true);
  });

  it("refuses to stream a directory spec", async () => {
    const target = path.join(workspace, "d1200_plots_v1");
    await expect(new DataFile(target, "write", DIRECTORY).writeText("x")).rejects.toThrow(
      "Cannot open a directory as a stream",
    );
    expect(existsSync(target)).toBe(false);
  });

  it("makes directories only for directory specs", async () => {
    const target = path.join(workspace, "d1000_foo_v1.dat");
    await expect(new DataFile(target, "write", genericSpec(1000)).makeDirectory()).rejects.toThrow(
      "Not a directory spec",
    );
  });
});

describe("openDataFile", () => {
  it("picks CSV handles for tabular specs", () => {
    expect(openDataFile("a.csv", "read", TABLE)).toBeInstanceOf(CsvInputDataFile);
    expect(openDataFile("a.csv", "write", TABLE)).toBeInstanceOf(CsvOutputDataFile);
  });

  it("picks the plain handle otherwise", () => {
    const file = openDataFile("a.dat", "write", genericSpec(1000));
    expect(file).toBeInstanceOf(DataFile);
    expect(file).not.toBeInstanceOf(CsvOutputDataFile);
    expect(file.intent).toBe("write");
  });
});

describe("DataFileSet", () => {
  const set = new DataFileSet([
    openDataFile("a.dat", "read", genericSpec(1000)),
    openDataFile("b.csv", "read", TABLE),
  ]);

  it("indexes files by code", () => {
    expect(set.size).toBe(2);
    expect(set.has(1300)).toBe(true);
    expect(set.has(2000)).toBe(false);
    expect(set.codes()).toEqual([1000, 1300]);
    expect(set.get(1000).getPath()).toBe("a.dat");
    expect([...set].map((file) => file.spec.code)).toEqual([1000, 1300]);
  });

  it("names the available codes when one is missing", () => {
    expect(() => set.get(2000)).toThrow("No data file for code 2000 (available: 1000, 1300)");
    expect(() => new DataFileSet().get(1)).toThrow("(available: none)");
  });

  it("returns typed CSV handles", () => {
    expect(set.csvInput(1300).columns()).toEqual(["id"]);
    expect(() => set.csvInput(1000)).toThrow(EngineError);
    expect(() => set.csvOutput(1300)).toThrow("Data file 1300 is not a writable CSV file");
  });
});

/**
 * Versioned file resolution.
 *
 * Files live flat in a workspace directory under the name
 * `d<code:4>_<name>_v<version>[.<extension>]`, where the version is the
 * timestamp of the run that wrote them. There is no manifest: the directory
 * listing is the only record of what exists.
 */

import { readdirSync } from "fs";
import path from "path";

import { NoInputFileError } from "./errors.js";
import type { FileIntent, FileSpec } from "./types.js";

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function stem(spec: FileSpec): string {
  return `d${String(spec.code).padStart(4, "0")}_${spec.name}_v`;
}

export function formatDataFileName(spec: FileSpec, version: number): string {
  const suffix = spec.extension === "" ? "" : `.${spec.extension}`;
  return `${stem(spec)}${version}${suffix}`;
}

function fileNamePattern(spec: FileSpec): RegExp {
  const suffix = spec.extension === "" ? "" : `\\.${escapeRegExp(spec.extension)}`;
  return new RegExp(`^${escapeRegExp(stem(spec))}(\\d+)${suffix}$`);
}

/**
 * Versions of `spec` present in `workspace`, ascending.
 * A missing workspace directory holds no versions.
 */
export function listDataFileVersions(workspace: string, spec: FileSpec): number[] {
  let entries: string[];
  try {
    entries = readdirSync(workspace);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
    throw err;
  }

  const pattern = fileNamePattern(spec);
  const versions = new Set<number>();
  for (const entry of entries) {
    const m = pattern.exec(entry);
    if (!m) continue;
    const version = Number(m[1]);
    if (Number.isSafeInteger(version)) versions.add(version);
  }
  return [...versions].sort((a, b) => a - b);
}

/**
 * Path of the file a run should read or write for `spec`.
 *
 * Writes are always stamped with the run timestamp. Reads prefer a file
 * stamped with the run timestamp, so concurrent runs sharing a workspace see
 * their own intermediate files, and otherwise take the greatest version.
 */
export function resolveDataFilePath(
  workspace: string,
  spec: FileSpec,
  intent: FileIntent,
  runTimestamp: number,
): string {
  let version = runTimestamp;
  if (intent === "read") {
    const versions = listDataFileVersions(workspace, spec);
    if (versions.length === 0) {
      throw new NoInputFileError(spec.code, workspace);
    }
    if (!versions.includes(runTimestamp)) {
      version = versions[versions.length - 1];
    }
  }
  return path.join(workspace, formatDataFileName(spec, version));
}

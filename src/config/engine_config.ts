/**
 * Engine configuration: YAML document describing file specs, tasks and
 * workflows.
 *
 * ```yaml
 * specs:
 *   - code: 1000
 *     name: people
 *     flags: [gzipped]
 *     schema:
 *       - { name: name, type: str }
 *       - { name: dob, type: datetime }
 *     dialect: { delimiter: ";" }
 *   - { code: 5000, name: plots, flags: [directory] }
 * tasks:
 *   - class: DownloadPeople
 * workflows:
 *   monthly: [4000, 5000]
 * ```
 *
 * Task classes are resolved through a factory map supplied by the host
 * program; nothing is imported dynamically.
 */

import { readFileSync } from "fs";
import YAML from "yaml";
import { z } from "zod";

import { EngineConfigError, UnknownTaskClassError } from "../engine/errors.js";
import { EngineRegistry } from "../engine/registry.js";
import { DEFAULT_DIALECT, FIELD_TYPES, FLAGS, type FileSpec, type Flag, type Task } from "../engine/types.js";

// ── Schema ───────────────────────────────────────────────────────────

// Integers or digit strings only; YAML nulls and booleans are rejected.
const CodeSchema = z
  .union([
    z.number().int(),
    z
      .string()
      .regex(/^\s*\d+\s*$/, "code must be a non-negative integer")
      .transform((text) => Number(text)),
  ])
  .pipe(z.number().int().nonnegative());

export const SchemaFieldSchema = z.object({
  name: z.string().min(1),
  type: z.enum(FIELD_TYPES),
});

export const DialectSchema = z
  .object({
    delimiter: z.string().length(1).optional(),
    quotechar: z.string().length(1).optional(),
    lineterminator: z.string().min(1).optional(),
  })
  .strict();

export const FileSpecEntrySchema = z.object({
  code: CodeSchema,
  name: z.string().regex(/^[A-Za-z0-9][A-Za-z0-9_-]*$/, "name must be letters, digits, dashes and underscores"),
  extension: z.string().regex(/^[A-Za-z0-9.]*$/).optional(),
  flags: z
    .array(
      z
        .string()
        .transform((flag) => flag.toLowerCase())
        .pipe(z.enum(FLAGS)),
    )
    .default([]),
  schema: z.array(SchemaFieldSchema).min(1).optional(),
  dialect: DialectSchema.optional(),
});

export const TaskEntrySchema = z.object({
  class: z.string().min(1),
});

export const EngineConfigSchema = z.object({
  specs: z.array(FileSpecEntrySchema).default([]),
  tasks: z.array(TaskEntrySchema).default([]),
  workflows: z.record(z.string(), z.array(CodeSchema)).default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type FileSpecEntry = z.infer<typeof FileSpecEntrySchema>;

/** Host-supplied constructors for the task classes named in the config. */
export type TaskFactories = Readonly<Record<string, () => Task>>;

// ── Parsing ──────────────────────────────────────────────────────────

export function parseEngineConfig(text: string, source = "<inline>"): EngineConfig {
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (err) {
    throw new EngineConfigError(source, [err instanceof Error ? err.message : String(err)]);
  }

  const result = EngineConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new EngineConfigError(
      source,
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  return result.data;
}

export function toFileSpec(entry: FileSpecEntry): FileSpec {
  const flags = new Set<Flag>(entry.flags);
  const extension = entry.extension ?? (flags.has("directory") ? "" : "csv");
  const base = { code: entry.code, name: entry.name, extension, flags };
  if (!entry.schema) return base;

  return {
    ...base,
    schema: entry.schema.map((field) => ({ name: field.name, type: field.type })),
    dialect: {
      delimiter: entry.dialect?.delimiter ?? DEFAULT_DIALECT.delimiter,
      quote: entry.dialect?.quotechar ?? DEFAULT_DIALECT.quote,
      lineTerminator: entry.dialect?.lineterminator ?? DEFAULT_DIALECT.lineTerminator,
    },
  };
}

/** Register specs, then tasks, then workflows. */
export function applyEngineConfig(
  config: EngineConfig,
  registry: EngineRegistry,
  taskFactories: TaskFactories,
): EngineRegistry {
  for (const entry of config.specs) {
    registry.registerFileSpec(toFileSpec(entry));
  }

  for (const entry of config.tasks) {
    const factory = Object.hasOwn(taskFactories, entry.class) ? taskFactories[entry.class] : undefined;
    if (!factory) {
      throw new UnknownTaskClassError(entry.class, Object.keys(taskFactories));
    }
    registry.registerTask(factory());
  }

  for (const [name, codes] of Object.entries(config.workflows)) {
    registry.registerWorkflow(name, codes);
  }

  return registry;
}

/** Read a YAML engine configuration file into `registry` (a new one by default). */
export function loadEngineConfig(
  filePath: string,
  taskFactories: TaskFactories,
  registry: EngineRegistry = new EngineRegistry(),
): EngineRegistry {
  const text = readFileSync(filePath, "utf-8");
  return applyEngineConfig(parseEngineConfig(text, filePath), registry, taskFactories);
}

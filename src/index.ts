export * from "./engine/errors.js";
export * from "./engine/types.js";
export { EngineRegistry } from "./engine/registry.js";
export { expandTargets, type TargetRequest } from "./engine/resolver.js";
export { formatDataFileName, listDataFileVersions, resolveDataFilePath } from "./engine/versioning.js";
export { Engine, type EngineOptions } from "./engine/runtime.js";

export { DataFile } from "./files/data_file.js";
export { CsvInputDataFile, CsvOutputDataFile, RecordWriter, type CsvOptions } from "./files/csv_file.js";
export { DataFileSet, openDataFile } from "./files/data_file_set.js";
export { coerceField, formatField, type DataRecord, type FieldValue } from "./files/coerce.js";

export {
  applyEngineConfig,
  loadEngineConfig,
  parseEngineConfig,
  type EngineConfig,
  type TaskFactories,
} from "./config/engine_config.js";
export { readContext, parseIni, parseParam } from "./config/params.js";

export { FileRunLogger, NoopRunLogger, type RunLogger } from "./trace/run_log.js";
export { runEngine, parseRunArgs, type RunArguments, type RunCallback, type RunEngineOptions } from "./cli/run_engine.js";
export { formatRunTimestamp, parseRunTimestamp } from "./shared/run_config.js";
export { createLogger, logger } from "./shared/logger.js";

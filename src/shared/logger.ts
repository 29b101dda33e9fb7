import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger };

const options: LoggerOptions = {
  level: process.env["LAYERFLOW_LOG_LEVEL"] ?? "info",
  base: {
    pid: undefined,
    hostname: undefined,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

export const logger = pino(options, pino.destination({ dest: 2, sync: true }));

export function createLogger(module: string, parent: Logger = logger): Logger {
  return parent.child({ module });
}

/**
 * Logger that writes every line both to stderr and to `filePath`.
 * The file is opened synchronously so a crashing run still leaves its log.
 */
export function createFileLogger(filePath: string): Logger {
  const streams = pino.multistream([
    { stream: pino.destination({ dest: 2, sync: true }), level: "trace" },
    { stream: pino.destination({ dest: filePath, sync: true, mkdir: true }), level: "trace" },
  ]);
  return pino({ ...options, level: process.env["LAYERFLOW_LOG_LEVEL"] ?? "debug" }, streams);
}

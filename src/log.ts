import fs from "node:fs";
import path from "node:path";

import pino, { multistream, type LoggerOptions } from "pino";

import type { MemoryLakeConfig } from "./config.js";

export type Logger = pino.Logger;

const BASE_OPTIONS: LoggerOptions = {
  name: "memory-lake",
  redact: { paths: ["apiKey", "*.apiKey", "headers.authorization"], censor: "[redacted]" },
};

/**
 * Pino logger writing to stdout, and additionally to `filePath` at
 * `fileLevel` when a path is given. The log directory is created on demand.
 */
export function createLogger(
  level: string,
  filePath?: string,
  fileLevel?: string,
  opts?: { console?: boolean },
): Logger {
  const consoleEnabled = opts?.console !== false;
  if (!filePath) {
    return pino({ ...BASE_OPTIONS, level: consoleEnabled ? level : "silent" });
  }

  const dir = path.dirname(filePath);
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new Error(`Cannot create log directory: ${dir}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const file = { level: fileLevel ?? level, stream: pino.destination({ dest: filePath, sync: false }) };
  if (!consoleEnabled) {
    return pino({ ...BASE_OPTIONS, level: file.level }, file.stream);
  }
  return pino({ ...BASE_OPTIONS, level: "trace" }, multistream([{ level, stream: process.stdout }, file]));
}

export function createLoggerFromConfig(config: MemoryLakeConfig, opts?: { console?: boolean }): Logger {
  return createLogger(config.logging.level, config.resolved.logFilePath, config.resolved.logFileLevel, opts);
}

/**
 * Logger that drops everything; used where a component is exercised without output.
 */
export function createSilentLogger(): Logger {
  return createLogger("silent", undefined, undefined, { console: false });
}

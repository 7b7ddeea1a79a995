import fs from "fs";
import path from "path";
import { formatError } from "./errors";
import type { LogLevel } from "./types";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Appends one JSON line per entry when set. */
  file?: string | null;
  console?: Pick<Console, "log" | "warn" | "error">;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function isLogLevel(value: unknown): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const out = options.console ?? console;
  const file = options.file ?? null;
  let fileReady = false;
  let fileFailed = false;

  const appendToFile = (line: string): void => {
    if (!file || fileFailed) {
      return;
    }
    try {
      if (!fileReady) {
        fs.mkdirSync(path.dirname(file), { recursive: true });
        fileReady = true;
      }
      fs.appendFileSync(file, `${line}\n`);
    } catch (error) {
      fileFailed = true;
      out.error(`Log file ${file} disabled: ${formatError(error)}`);
    }
  };

  const write = (level: LogLevel, message: string, meta?: LogMeta): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    const time = new Date().toISOString();
    appendToFile(JSON.stringify({ time, level, message, ...(meta ? { meta } : {}) }));
    const consoleFn = level === "error" ? out.error : level === "warn" ? out.warn : out.log;
    const suffix = meta ? ` ${JSON.stringify(meta)}` : "";
    consoleFn(`[${time}] ${level.toUpperCase()} ${message}${suffix}`);
  };

  return {
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta)
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};

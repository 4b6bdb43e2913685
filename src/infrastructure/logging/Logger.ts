import fs from "fs";
import path from "path";

import { config, type ConfiguredLogLevel } from "@config/index";

export type LogLevel = "info" | "warn" | "error" | "debug";

export interface LoggerPort {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  event?(type: string, payload: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level: ConfiguredLogLevel;
  /** JSON-lines file every emitted entry is appended to. */
  file?: string | undefined;
}

const LEVEL_ORDER: Record<ConfiguredLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function appendToFile(file: string, line: string): void {
  const dir = path.dirname(file);

  try {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.appendFileSync(file, line, { encoding: "utf-8" });
  } catch (err) {
    console.error("Failed to write log file:", err);
  }
}

function writeEntry(
  level: LogLevel,
  entry: Record<string, unknown>,
  file: string | undefined
): void {
  const line = JSON.stringify(entry);

  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }

  if (file) {
    appendToFile(file, line + "\n");
  }
}

/**
 * Structured JSON logger.
 *
 * - `log()` writes `{ timestamp, level, message, ...meta }`.
 * - `event()` writes `{ timestamp, type, ...payload }` at info level.
 * - Entries below the configured level are dropped.
 */
export function createLogger(options: LoggerOptions): LoggerPort {
  const threshold = LEVEL_ORDER[options.level];
  const enabled = (level: LogLevel): boolean =>
    LEVEL_ORDER[level] >= threshold;

  return {
    log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
      if (!enabled(level)) {
        return;
      }

      writeEntry(
        level,
        {
          timestamp: new Date().toISOString(),
          level,
          message,
          ...(meta || {}),
        },
        options.file
      );
    },

    event(type: string, payload: Record<string, unknown>): void {
      if (!enabled("info")) {
        return;
      }

      writeEntry(
        "info",
        {
          timestamp: new Date().toISOString(),
          type,
          ...payload,
        },
        options.file
      );
    },
  };
}

export const logger: LoggerPort = createLogger({
  level: config.observability.logLevel,
  file: config.observability.logFile,
});

export function logEvent(type: string, payload: Record<string, unknown>): void {
  if (typeof logger.event === "function") {
    logger.event(type, payload);
    return;
  }

  logger.log("info", type, payload);
}

/** Message and name of an unknown thrown value, for log payloads. */
export function describeError(error: unknown): {
  message: string;
  name: string | undefined;
} {
  return error instanceof Error
    ? { message: error.message, name: error.name }
    : { message: String(error), name: undefined };
}

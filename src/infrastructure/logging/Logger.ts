import fs from "fs";
import path from "path";

import { config } from "@config/index";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerPort {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  event(type: string, payload: Record<string, unknown>): void;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_WEIGHT;
}

export interface LoggerOptions {
  level: string;
  toFile: boolean;
  dir: string;
}

/**
 * JSON-lines logger writing to the console and, optionally, `<dir>/app.log`.
 *
 * `log()` honours the configured minimum level. `event()` records a named
 * domain event at info level with the shape `{ timestamp, type, ...payload }`.
 */
export function createLogger(options: LoggerOptions): LoggerPort {
  const minLevel: LogLevel = isLogLevel(options.level) ? options.level : "info";
  const logFile = path.join(options.dir, "app.log");

  function enabled(level: LogLevel): boolean {
    return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[minLevel];
  }

  function writeEntry(level: LogLevel, entry: Record<string, unknown>): void {
    const line = JSON.stringify(entry);

    if (level === "error") {
      console.error(line);
    } else {
      console.log(line);
    }

    if (!options.toFile) {
      return;
    }

    try {
      fs.mkdirSync(options.dir, { recursive: true });
      fs.appendFileSync(logFile, line + "\n", { encoding: "utf-8" });
    } catch (err) {
      console.error("Failed to write log file:", err);
    }
  }

  return {
    log(level, message, meta) {
      if (!enabled(level)) {
        return;
      }

      writeEntry(level, {
        timestamp: new Date().toISOString(),
        level,
        message,
        ...(meta || {}),
      });
    },

    event(type, payload) {
      if (!enabled("info")) {
        return;
      }

      writeEntry("info", {
        timestamp: new Date().toISOString(),
        type,
        ...payload,
      });
    },
  };
}

export const logger: LoggerPort = createLogger({
  level: config.observability.logLevel,
  toFile: config.observability.logToFile,
  dir: config.observability.logDir,
});

export function logEvent(type: string, payload: Record<string, unknown>): void {
  logger.event(type, payload);
}

/**
 * Simple structured logger.
 * Outputs JSON logs in production and readable lines otherwise.
 * Everything goes to stderr so stdout stays reserved for scan reports.
 */

import { config } from "./env";

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const IS_PRODUCTION = config.NODE_ENV === "production";

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function formatLog(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...meta,
  };

  if (IS_PRODUCTION) {
    return JSON.stringify(entry);
  }
  const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
  return `[${entry.timestamp}] ${level.toUpperCase()} ${message}${metaStr}`;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
}

/**
 * Create a logger with its own level threshold.
 */
export function createLogger(initialLevel: LogLevel): Logger {
  let threshold = initialLevel;

  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];

  return {
    debug(message, meta) {
      if (enabled("debug")) {
        console.error(formatLog("debug", message, meta));
      }
    },

    info(message, meta) {
      if (enabled("info")) {
        console.error(formatLog("info", message, meta));
      }
    },

    warn(message, meta) {
      if (enabled("warn")) {
        console.warn(formatLog("warn", message, meta));
      }
    },

    error(message, meta) {
      if (enabled("error")) {
        console.error(formatLog("error", message, meta));
      }
    },

    setLevel(level) {
      threshold = level;
    },

    getLevel() {
      return threshold;
    },
  };
}

export const logger = createLogger(
  isLogLevel(config.POLICYSCAN_LOG_LEVEL) ? config.POLICYSCAN_LOG_LEVEL : "info"
);

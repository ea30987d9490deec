/**
 * Micro-logger: minimal logging with level filtering
 * No external dependencies, wraps console.*
 *
 * Each run builds its own logger with createLogger and passes it down;
 * there is no module-level logger instance.
 */

import type { LogLevel, Logger, LoggerOptions } from "@/types";
import { LOG_LEVELS, DEFAULT_LOG_LEVEL } from "@/constants/logger";

/**
 * Format meta object as JSON string
 */
function formatMeta(meta?: Record<string, unknown>): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  return " " + JSON.stringify(meta, errorReplacer);
}

/**
 * JSON.stringify drops Error fields (they are non-enumerable)
 */
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

function consoleSink(level: LogLevel, line: string): void {
  switch (level) {
    case "debug":
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}

/**
 * Format a single log line
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>,
  now: Date = new Date(),
): string {
  return `[${now.toISOString()}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`;
}

/**
 * Build a logger bound to the given level, sink and context
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = LOG_LEVELS[options.level ?? DEFAULT_LOG_LEVEL];
  const sink = options.sink ?? consoleSink;
  const context = options.context ?? {};

  const log = (
    level: LogLevel,
    message: string,
    meta?: Record<string, unknown>,
  ): void => {
    if (options.quiet || LOG_LEVELS[level] < minLevel) {
      return;
    }
    sink(level, formatLogLine(level, message, { ...context, ...meta }));
  };

  return {
    debug: (message, meta) => log("debug", message, meta),
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta),
  };
}

/**
 * Create a logger with bound context (meta merged into all calls)
 */
export function withContext(
  logger: Logger,
  context: Record<string, unknown>,
): Logger {
  return {
    debug: (message, meta) => logger.debug(message, { ...context, ...meta }),
    info: (message, meta) => logger.info(message, { ...context, ...meta }),
    warn: (message, meta) => logger.warn(message, { ...context, ...meta }),
    error: (message, meta) => logger.error(message, { ...context, ...meta }),
  };
}

/**
 * Logger that drops everything (tests, library use without logging)
 */
export const silentLogger: Logger = createLogger({ quiet: true });

/**
 * Check whether a string names a log level
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

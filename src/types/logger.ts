/**
 * Logger type definitions
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Logger interface for structured logging
 *
 * Matches the shape returned by createLogger (@/logger).
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Options for building a run-scoped logger
 */
export type LoggerOptions = {
  /** Minimum level written (default "info") */
  level?: LogLevel;

  /** Drop every message regardless of level */
  quiet?: boolean;

  /** Metadata merged into every entry */
  context?: Record<string, unknown>;

  /**
   * Output sink, console by default
   * Receives the formatted line and the level it was logged at.
   */
  sink?: (level: LogLevel, line: string) => void;
};

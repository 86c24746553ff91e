/**
 * Logging service types.
 *
 * The services depend only on these interfaces; the electron-log backed
 * implementation is wired in at startup.
 */

/**
 * Log levels, ordered from most to least verbose.
 * Values match electron-log's level names.
 */
export const LogLevel = {
  SILLY: "silly",
  DEBUG: "debug",
  INFO: "info",
  WARN: "warn",
  ERROR: "error",
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Closed set of logger scopes. One per component so the log file can be
 * filtered by area.
 */
export type LoggerName =
  | "app"
  | "config"
  | "bus"
  | "subscription"
  | "debouncer"
  | "focus"
  | "reset"
  | "toggle"
  | "process";

/**
 * Structured context attached to a log line.
 * Flat primitives only so every transport can render it.
 */
export type LogContext = Record<string, string | number | boolean | null>;

/**
 * Scoped logger.
 */
export interface Logger {
  silly(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

/**
 * Factory for scoped loggers.
 */
export interface LoggingService {
  createLogger(name: LoggerName): Logger;
}

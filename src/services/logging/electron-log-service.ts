/**
 * LoggingService backed by electron-log's Node.js entry point.
 *
 * Each LoggerName maps to an electron-log scope, so lines read
 * `[info] (debouncer) Layout change handled layout=ru`.
 */

import log from "electron-log/node";
import type { LogContext, Logger, LoggerName, LoggingService, LogLevel } from "./types";

export interface ElectronLogServiceOptions {
  /** Minimum level written to the console */
  readonly consoleLevel: LogLevel;
  /** Minimum level written to the log file; false disables the file transport */
  readonly fileLevel: LogLevel | false;
}

const DEFAULT_OPTIONS: ElectronLogServiceOptions = {
  consoleLevel: "info",
  fileLevel: "debug",
};

/**
 * Render context as `key=value` pairs appended to the message.
 */
export function formatContext(context?: LogContext): string {
  if (!context) return "";
  const parts = Object.entries(context).map(([key, value]) => `${key}=${String(value)}`);
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

export class ElectronLogService implements LoggingService {
  private readonly loggers = new Map<LoggerName, Logger>();

  constructor(options: Partial<ElectronLogServiceOptions> = {}) {
    const resolved = { ...DEFAULT_OPTIONS, ...options };
    log.transports.console.level = resolved.consoleLevel;
    log.transports.file.level = resolved.fileLevel;
  }

  createLogger(name: LoggerName): Logger {
    const existing = this.loggers.get(name);
    if (existing) return existing;

    const scope = log.scope(name);
    const logger: Logger = {
      silly: (message, context) => scope.silly(message + formatContext(context)),
      debug: (message, context) => scope.debug(message + formatContext(context)),
      info: (message, context) => scope.info(message + formatContext(context)),
      warn: (message, context) => scope.warn(message + formatContext(context)),
      error: (message, context) => scope.error(message + formatContext(context)),
    };
    this.loggers.set(name, logger);
    return logger;
  }
}

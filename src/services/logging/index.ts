/**
 * Public API exports for the logging service.
 */

export type { Logger, LoggingService, LogContext, LoggerName } from "./types";
export { LogLevel } from "./types";
export { ElectronLogService, formatContext } from "./electron-log-service";
export type { ElectronLogServiceOptions } from "./electron-log-service";
export { createSilentLogger, SILENT_LOGGER } from "./silent-logger";

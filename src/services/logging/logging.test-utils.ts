/**
 * Mock utilities for logging tests.
 */

import { vi, type Mock } from "vitest";
import type { LogContext, Logger, LoggerName, LoggingService } from "./types";

/**
 * Mock logger with vitest spy methods.
 */
export interface MockLogger extends Logger {
  silly: Mock<(message: string, context?: LogContext) => void>;
  debug: Mock<(message: string, context?: LogContext) => void>;
  info: Mock<(message: string, context?: LogContext) => void>;
  warn: Mock<(message: string, context?: LogContext) => void>;
  error: Mock<(message: string, context?: LogContext) => void>;
}

/**
 * Mock logging service that hands out one MockLogger per name.
 */
export interface MockLoggingService extends LoggingService {
  createLogger: Mock<(name: LoggerName) => MockLogger>;
  /** Get the logger created for a name (creates it if needed) */
  getLogger(name: LoggerName): MockLogger;
}

/**
 * Create a mock logger that records all calls.
 *
 * @example
 * ```typescript
 * const logger = createMockLogger();
 * debouncer.handle(event);
 * expect(logger.warn).toHaveBeenCalledWith("Layout reset failed", { error: "boom" });
 * ```
 */
export function createMockLogger(): MockLogger {
  return {
    silly: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/**
 * Create a mock logging service.
 */
export function createMockLoggingService(): MockLoggingService {
  const loggers = new Map<LoggerName, MockLogger>();
  const getLogger = (name: LoggerName): MockLogger => {
    let logger = loggers.get(name);
    if (!logger) {
      logger = createMockLogger();
      loggers.set(name, logger);
    }
    return logger;
  };

  return {
    createLogger: vi.fn(getLogger),
    getLogger,
  };
}

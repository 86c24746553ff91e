import type { Logger } from "./types";

/**
 * Create a logger that discards everything.
 */
export function createSilentLogger(): Logger {
  const noop = (): void => {};
  return { silly: noop, debug: noop, info: noop, warn: noop, error: noop };
}

/**
 * Shared silent logger for optional logger dependencies.
 */
export const SILENT_LOGGER: Logger = createSilentLogger();

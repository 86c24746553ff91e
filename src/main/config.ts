/**
 * Runtime configuration from environment variables.
 *
 * Environment variables:
 * - INPUT_SOURCE_SYNC_TRANSPORT: 'portal' (default) or 'legacy'
 * - INPUT_SOURCE_SYNC_AVOID_LAYOUT: layout that is switched away from (default 'ru')
 * - INPUT_SOURCE_SYNC_RESET: 'gsettings', 'settings-daemon' or 'shell-eval'
 * - INPUT_SOURCE_SYNC_ECHO_WINDOW_MS: pending echo lifetime, 0 = no expiry (default 1500)
 * - INPUT_SOURCE_SYNC_LOG_LEVEL: console log level (default 'info')
 * - INPUT_SOURCE_SYNC_WINDOW_ID: X11 window id of the host (daemon mode)
 * - INPUT_SOURCE_SYNC_TOGGLE_COMMAND: command that toggles the host's input method (daemon mode)
 */

import { z } from "zod";
import type { TransportKind } from "../services/bus";
import { DEFAULT_ECHO_WINDOW_MS, RESET_POLICIES, type ResetPolicy } from "../services/input-sources";
import { LogLevel } from "../services/logging";
import { parseCommandLine, type CommandLine } from "../services/platform/command-line";
import { LayoutSyncError, getErrorMessage } from "../services/errors";

export interface InputSourceSyncConfig {
  readonly transport: TransportKind;
  readonly avoidanceLayout: string;
  readonly resetPolicy: ResetPolicy;
  readonly echoWindowMs: number;
  readonly logLevel: LogLevel;
  readonly windowId: string | undefined;
  readonly toggleCommand: CommandLine | undefined;
}

const DEFAULT_RESET_POLICY: Record<TransportKind, ResetPolicy> = {
  portal: "shell-eval",
  legacy: "gsettings",
};

// Empty strings count as unset
const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === "" ? undefined : value))
  .optional();

const envSchema = z.object({
  INPUT_SOURCE_SYNC_TRANSPORT: z.enum(["portal", "legacy"]).default("portal"),
  INPUT_SOURCE_SYNC_AVOID_LAYOUT: z.string().trim().min(1).default("ru"),
  INPUT_SOURCE_SYNC_RESET: z.enum(RESET_POLICIES).optional(),
  INPUT_SOURCE_SYNC_ECHO_WINDOW_MS: z
    .string()
    .regex(/^\d+$/, "expected a non-negative integer")
    .transform((value) => Number.parseInt(value, 10))
    .optional(),
  INPUT_SOURCE_SYNC_LOG_LEVEL: z
    .enum([LogLevel.SILLY, LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR])
    .default(LogLevel.INFO),
  INPUT_SOURCE_SYNC_WINDOW_ID: optionalString,
  INPUT_SOURCE_SYNC_TOGGLE_COMMAND: optionalString,
});

/**
 * Read and validate configuration.
 *
 * @throws LayoutSyncError with code INVALID_CONFIG
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): InputSourceSyncConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new LayoutSyncError("INVALID_CONFIG", `Invalid configuration: ${issues.join("; ")}`);
  }
  const values = parsed.data;
  const transport = values.INPUT_SOURCE_SYNC_TRANSPORT;

  let toggleCommand: CommandLine | undefined;
  try {
    toggleCommand = parseCommandLine(values.INPUT_SOURCE_SYNC_TOGGLE_COMMAND);
  } catch (error) {
    throw new LayoutSyncError(
      "INVALID_CONFIG",
      `Invalid INPUT_SOURCE_SYNC_TOGGLE_COMMAND: ${getErrorMessage(error)}`,
      error
    );
  }

  return {
    transport,
    avoidanceLayout: values.INPUT_SOURCE_SYNC_AVOID_LAYOUT,
    resetPolicy: values.INPUT_SOURCE_SYNC_RESET ?? DEFAULT_RESET_POLICY[transport],
    echoWindowMs: values.INPUT_SOURCE_SYNC_ECHO_WINDOW_MS ?? DEFAULT_ECHO_WINDOW_MS,
    logLevel: values.INPUT_SOURCE_SYNC_LOG_LEVEL,
    windowId: values.INPUT_SOURCE_SYNC_WINDOW_ID,
    toggleCommand,
  };
}

/**
 * X11 focus backend using xdotool.
 */

import type { FocusOracle } from "./focus-oracle";
import type { ProcessRunner } from "../platform/process";
import { runToCompletion } from "../platform/process";
import type { Logger } from "../logging";
import { getErrorMessage } from "../errors";

/** Timeout for the active window query */
export const ACTIVE_WINDOW_TIMEOUT_MS = 1000;

/**
 * Parse an X11 window id given as decimal ("65011719") or hex ("0x3e00007").
 *
 * @returns The numeric id, or undefined if the value is not a positive integer
 */
export function parseWindowId(value: string | number): number | undefined {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) && value > 0 ? value : undefined;
  }
  const trimmed = value.trim();
  let parsed: number;
  if (/^0x[0-9a-f]+$/i.test(trimmed)) {
    parsed = Number.parseInt(trimmed.slice(2), 16);
  } else if (/^\d+$/.test(trimmed)) {
    parsed = Number.parseInt(trimmed, 10);
  } else {
    return undefined;
  }
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : undefined;
}

export class X11WindowFocusOracle implements FocusOracle {
  readonly backend = "x11" as const;

  constructor(
    private readonly hostWindowId: number,
    private readonly runner: ProcessRunner,
    private readonly logger: Logger
  ) {}

  async isHostFocused(): Promise<boolean> {
    try {
      const stdout = await runToCompletion(
        this.runner,
        "xdotool",
        ["getactivewindow"],
        ACTIVE_WINDOW_TIMEOUT_MS
      );
      const active = parseWindowId(stdout);
      if (active === undefined) {
        this.logger.debug("Unparsable active window id", { output: stdout.trim() });
        return false;
      }
      return active === this.hostWindowId;
    } catch (error) {
      this.logger.debug("Active window query failed", { error: getErrorMessage(error) });
      return false;
    }
  }
}

/**
 * InputMethodToggle - flips the host's internal input method.
 */

import type { ProcessRunner } from "../platform/process";
import { runToCompletion } from "../platform/process";
import type { CommandLine } from "../platform/command-line";
import type { Logger } from "../logging";
import { LayoutSyncError, getErrorMessage } from "../errors";

export interface InputMethodToggle {
  /**
   * Flip the input method exactly once.
   * May throw (or reject); callers log and continue.
   */
  toggle(): void | Promise<void>;
}

/**
 * Toggle that calls back into an embedding host.
 */
export class CallbackInputMethodToggle implements InputMethodToggle {
  constructor(
    private readonly callback: () => void | Promise<void>,
    private readonly logger: Logger
  ) {}

  async toggle(): Promise<void> {
    await this.callback();
    this.logger.debug("Input method toggled");
  }
}

/** Timeout for an external toggle command */
export const TOGGLE_COMMAND_TIMEOUT_MS = 3000;

/**
 * Toggle that runs a command, for hosts in another process
 * (e.g. `emacsclient --eval (toggle-input-method)`).
 */
export class CommandInputMethodToggle implements InputMethodToggle {
  constructor(
    private readonly commandLine: CommandLine,
    private readonly runner: ProcessRunner,
    private readonly logger: Logger
  ) {}

  async toggle(): Promise<void> {
    const { command, args } = this.commandLine;
    try {
      await runToCompletion(this.runner, command, args, TOGGLE_COMMAND_TIMEOUT_MS);
    } catch (error) {
      throw new LayoutSyncError("ACTION_FAILED", `Toggle command failed: ${getErrorMessage(error)}`, error);
    }
    this.logger.debug("Input method toggled", { command });
  }
}

/**
 * LayoutResetAction - asks the desktop to switch back to a configured input source slot.
 *
 * Three interchangeable policies; exactly one is active per deployment:
 * - gsettings: write the legacy `current` key
 * - settings-daemon: call the keyboard settings daemon's SetInputSource
 * - shell-eval: activate the source through GNOME Shell's Eval
 *
 * Resets are fire-and-forget. Failures are logged and not retried; the next
 * genuine layout change gets another chance.
 */

import type { ProcessRunner } from "../platform/process";
import { runToCompletion } from "../platform/process";
import { gdbusArgs, parseEvalReply, GDBUS_TIMEOUT_MS } from "../platform/gdbus";
import type { CommandLine } from "../platform/command-line";
import type { Logger } from "../logging";
import { LayoutSyncError, getErrorMessage } from "../errors";

export const RESET_POLICIES = ["gsettings", "settings-daemon", "shell-eval"] as const;

export type ResetPolicy = (typeof RESET_POLICIES)[number];

export interface LayoutResetAction {
  readonly policy: ResetPolicy;
  /** Request the switch and return immediately */
  reset(slot: number): void;
}

/**
 * Shell script activating an input source slot.
 */
export function activateSourceScript(slot: number): string {
  return `imports.ui.status.keyboard.getInputSourceManager().inputSources[${slot}].activate()`;
}

/**
 * Command line implementing a reset policy.
 */
export function buildResetCommand(policy: ResetPolicy, slot: number): CommandLine {
  switch (policy) {
    case "gsettings":
      return {
        command: "gsettings",
        args: ["set", "org.gnome.desktop.input-sources", "current", String(slot)],
      };
    case "settings-daemon":
      return {
        command: "gdbus",
        args: gdbusArgs({
          dest: "org.gnome.SettingsDaemon.Keyboard",
          objectPath: "/org/gnome/SettingsDaemon/Keyboard",
          method: "org.gnome.SettingsDaemon.Keyboard.SetInputSource",
          args: [`uint32 ${slot}`],
        }),
      };
    case "shell-eval":
      return {
        command: "gdbus",
        args: gdbusArgs({
          dest: "org.gnome.Shell",
          objectPath: "/org/gnome/Shell",
          method: "org.gnome.Shell.Eval",
          args: [activateSourceScript(slot)],
        }),
      };
  }
}

export class CommandLayoutResetAction implements LayoutResetAction {
  constructor(
    readonly policy: ResetPolicy,
    private readonly runner: ProcessRunner,
    private readonly logger: Logger
  ) {}

  reset(slot: number): void {
    void this.execute(slot);
  }

  /**
   * Run the reset and wait for it. Never rejects.
   *
   * @returns true when the desktop accepted the reset
   */
  async execute(slot: number): Promise<boolean> {
    const { command, args } = buildResetCommand(this.policy, slot);
    try {
      const stdout = await runToCompletion(this.runner, command, args, GDBUS_TIMEOUT_MS);
      if (this.policy === "shell-eval") {
        const reply = parseEvalReply(stdout);
        if (!reply?.success) {
          throw new LayoutSyncError("ACTION_FAILED", `Shell.Eval rejected reset: ${stdout.trim()}`);
        }
      }
      this.logger.debug("Layout reset", { policy: this.policy, slot });
      return true;
    } catch (error) {
      this.logger.warn("Layout reset failed", {
        policy: this.policy,
        slot,
        error: getErrorMessage(error),
      });
      return false;
    }
  }
}

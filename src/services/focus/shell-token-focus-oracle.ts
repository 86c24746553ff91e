/**
 * GNOME Shell focus backend for sessions without stable window ids (Wayland).
 *
 * The host's own window is identified by the focused window's stable
 * sequence number, captured the first time the host reports focus.
 */

import type { FocusOracle } from "./focus-oracle";
import type { ProcessRunner } from "../platform/process";
import { gdbusCall, parseEvalReply } from "../platform/gdbus";
import type { Logger } from "../logging";
import { LayoutSyncError, getErrorMessage } from "../errors";

/**
 * Script evaluated in GNOME Shell; returns the focused window's stable
 * sequence as a string, or "" when nothing has focus.
 */
export const FOCUSED_WINDOW_SCRIPT =
  "(function(){const w=global.display.focus_window;return w?String(w.get_stable_sequence()):'';})()";

export class ShellTokenFocusOracle implements FocusOracle {
  readonly backend = "gnome-shell" as const;
  private hostToken: string | undefined;

  constructor(
    private readonly hasApplicationFocus: () => boolean,
    private readonly runner: ProcessRunner,
    private readonly logger: Logger
  ) {}

  /** Token cached for the host window, if captured */
  get cachedToken(): string | undefined {
    return this.hostToken;
  }

  async isHostFocused(): Promise<boolean> {
    try {
      if (this.hostToken === undefined) {
        if (!this.hasApplicationFocus()) return false;
        const token = await this.queryFocusedToken();
        if (token === undefined) return false;
        this.hostToken = token;
        this.logger.debug("Captured host window token", { token });
        return true;
      }
      return (await this.queryFocusedToken()) === this.hostToken;
    } catch (error) {
      this.logger.debug("Focused window query failed", { error: getErrorMessage(error) });
      return false;
    }
  }

  private async queryFocusedToken(): Promise<string | undefined> {
    const output = await gdbusCall(this.runner, {
      dest: "org.gnome.Shell",
      objectPath: "/org/gnome/Shell",
      method: "org.gnome.Shell.Eval",
      args: [FOCUSED_WINDOW_SCRIPT],
    });
    const reply = parseEvalReply(output);
    if (!reply || !reply.success) {
      throw new LayoutSyncError("FOCUS_QUERY_FAILED", `Shell.Eval rejected focus query: ${output}`);
    }
    const value: unknown = JSON.parse(reply.result);
    if (typeof value !== "string") {
      throw new LayoutSyncError("FOCUS_QUERY_FAILED", `Unexpected focus token: ${reply.result}`);
    }
    return value === "" ? undefined : value;
  }
}

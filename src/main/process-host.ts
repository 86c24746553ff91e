/**
 * HostApplication for daemon mode, where the editor runs in another process.
 *
 * Has no hasApplicationFocus: focus can only be checked through the X11
 * window id, and other sessions fall back to the unfocused oracle.
 */

import type { HostApplication, InputMethodToggle } from "../services/input-sources";
import type { Unsubscribe } from "../services/types";
import { LayoutSyncError } from "../services/errors";

export class ProcessHost implements HostApplication {
  private readonly teardownCallbacks = new Set<() => void>();

  constructor(
    readonly windowId: string | undefined,
    private readonly toggle: InputMethodToggle | undefined
  ) {}

  async toggleInputMethod(): Promise<void> {
    if (!this.toggle) {
      throw new LayoutSyncError("ACTION_FAILED", "No toggle command configured");
    }
    await this.toggle.toggle();
  }

  onTeardown(callback: () => void): Unsubscribe {
    this.teardownCallbacks.add(callback);
    return () => {
      this.teardownCallbacks.delete(callback);
    };
  }

  /**
   * Run and forget every teardown callback.
   */
  teardown(): void {
    const callbacks = [...this.teardownCallbacks];
    this.teardownCallbacks.clear();
    for (const callback of callbacks) {
      callback();
    }
  }
}

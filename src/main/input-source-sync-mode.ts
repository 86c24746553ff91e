/**
 * InputSourceSyncMode - user-facing on/off switch for input source sync.
 *
 * Enabling registers the signal subscription; a failed registration leaves
 * the mode disabled. A subscription torn down by the host also reads as disabled.
 */

import type { SignalSubscription, SubscriptionHandle } from "../services/input-sources";
import type { Logger } from "../services/logging";
import { SILENT_LOGGER } from "../services/logging";

export type SubscriptionControl = Pick<SignalSubscription, "handle" | "register" | "unregister">;

export class InputSourceSyncMode {
  private handle: SubscriptionHandle | undefined;
  /** Latest requested state; an enable() overtaken by disable() does not apply */
  private requested = false;
  private readonly logger: Logger;

  constructor(
    private readonly subscription: SubscriptionControl,
    logger?: Logger
  ) {
    this.logger = logger ?? SILENT_LOGGER;
  }

  get isEnabled(): boolean {
    return this.handle !== undefined && this.subscription.handle === this.handle;
  }

  /**
   * Turn the mode on.
   *
   * @returns Whether the mode is on afterwards
   */
  async enable(): Promise<boolean> {
    if (this.isEnabled) {
      return true;
    }
    this.requested = true;
    const handle = await this.subscription.register();
    if (!this.requested) {
      return false;
    }
    if (!handle) {
      this.requested = false;
      this.handle = undefined;
      this.logger.warn("Input source sync could not be enabled");
      return false;
    }
    this.handle = handle;
    this.logger.info("Input source sync enabled", { transport: handle.transport });
    return true;
  }

  async disable(): Promise<void> {
    const wasEnabled = this.isEnabled;
    this.requested = false;
    const handle = this.handle;
    this.handle = undefined;
    await this.subscription.unregister(handle);
    if (wasEnabled) {
      this.logger.info("Input source sync disabled");
    }
  }

  /**
   * Flip the mode.
   *
   * @returns Whether the mode is on afterwards
   */
  async toggle(): Promise<boolean> {
    if (this.isEnabled) {
      await this.disable();
      return false;
    }
    return this.enable();
  }
}

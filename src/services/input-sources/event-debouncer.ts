/**
 * EventDebouncer - decides what to do with each layout-change notification.
 *
 * Owns the SuppressionState for one subscription. For every notification it
 * gates on host focus, filters unrelated settings, swallows echoes of its own
 * corrective resets, and then fires at most one reset and one toggle.
 *
 * handle() must not be called re-entrantly; SignalSubscription serializes calls.
 */

import { recognizedSetting, type TransportKind } from "../bus";
import type { FocusOracle } from "../focus";
import type { Logger } from "../logging";
import { SILENT_LOGGER } from "../logging";
import { getErrorMessage } from "../errors";
import type { InputMethodToggle } from "./input-method-toggle";
import type { LayoutResetAction } from "./layout-reset";
import { newestLayout } from "./payload-decoder";
import {
  DEFAULT_LAYOUT_SLOT,
  policyForTransport,
  type LayoutId,
  type NotificationEvent,
  type ReconciliationPolicy,
  type SuppressionState,
} from "./types";

/** Default lifetime of a pending echo suppression */
export const DEFAULT_ECHO_WINDOW_MS = 1500;

/**
 * What handle() did with a notification.
 */
export type HandleOutcome =
  | "unfocused"
  | "unrecognized"
  | "empty"
  | "skip-consumed"
  | "suppressed"
  | "toggled"
  | "reset-and-toggled";

export interface EventDebouncerDeps {
  readonly transport: TransportKind;
  /** Defaults to the transport's policy */
  readonly policy?: ReconciliationPolicy;
  /** Layout that triggers a corrective reset on echo-free transports */
  readonly avoidanceLayout: LayoutId;
  readonly focus: FocusOracle;
  readonly reset: LayoutResetAction;
  readonly toggle: InputMethodToggle;
  readonly logger?: Logger;
  /** 0 keeps a pending skip until the next notification */
  readonly echoWindowMs?: number;
  readonly now?: () => number;
  /** Seed for lastObservedLayout */
  readonly initialLayout?: LayoutId;
}

export class EventDebouncer {
  readonly policy: ReconciliationPolicy;
  private readonly state: SuppressionState;
  private readonly logger: Logger;
  private readonly echoWindowMs: number;
  private readonly now: () => number;

  constructor(private readonly deps: EventDebouncerDeps) {
    this.policy = deps.policy ?? policyForTransport(deps.transport);
    this.logger = deps.logger ?? SILENT_LOGGER;
    this.echoWindowMs = deps.echoWindowMs ?? DEFAULT_ECHO_WINDOW_MS;
    this.now = deps.now ?? Date.now;
    this.state = {
      lastObservedLayout: deps.initialLayout,
      skipNext: false,
      skipSetAt: undefined,
    };
  }

  /** Copy of the current suppression state */
  get snapshot(): Readonly<SuppressionState> {
    return { ...this.state };
  }

  async handle(event: NotificationEvent): Promise<HandleOutcome> {
    if (!(await this.isFocused())) {
      return "unfocused";
    }

    const expected = recognizedSetting(this.deps.transport);
    if (event.group !== expected.group || event.setting !== expected.setting) {
      return "unrecognized";
    }

    const layout = newestLayout(event);

    if (this.policy === "echo-free") {
      if (layout === undefined) return "empty";
      return this.handleEchoFree(layout);
    }
    return this.handleEchoing(layout);
  }

  private async handleEchoFree(layout: LayoutId): Promise<HandleOutcome> {
    this.state.lastObservedLayout = layout;
    const shouldReset = layout === this.deps.avoidanceLayout;
    if (shouldReset) {
      this.fireReset();
    }
    await this.fireToggle();
    this.logger.debug("Layout change handled", { layout, reset: shouldReset });
    return shouldReset ? "reset-and-toggled" : "toggled";
  }

  private async handleEchoing(layout: LayoutId | undefined): Promise<HandleOutcome> {
    this.expireSkip();

    if (layout === undefined) {
      if (!this.state.skipNext) return "empty";
      this.clearSkip();
      return "skip-consumed";
    }

    if (layout === this.state.lastObservedLayout || this.state.skipNext) {
      const wasSkip = this.state.skipNext;
      this.clearSkip();
      this.state.lastObservedLayout = layout;
      this.logger.silly("Notification suppressed", { layout, echo: wasSkip });
      return "suppressed";
    }

    this.state.lastObservedLayout = layout;
    this.state.skipNext = true;
    this.state.skipSetAt = this.now();
    this.fireReset();
    await this.fireToggle();
    this.logger.debug("Layout change handled", { layout, reset: true });
    return "reset-and-toggled";
  }

  private expireSkip(): void {
    if (!this.state.skipNext || this.echoWindowMs === 0 || this.state.skipSetAt === undefined) {
      return;
    }
    const age = this.now() - this.state.skipSetAt;
    if (age > this.echoWindowMs) {
      this.logger.debug("Pending echo expired", { ageMs: age });
      this.clearSkip();
    }
  }

  private clearSkip(): void {
    this.state.skipNext = false;
    this.state.skipSetAt = undefined;
  }

  private async isFocused(): Promise<boolean> {
    try {
      return await this.deps.focus.isHostFocused();
    } catch (error) {
      this.logger.debug("Focus query failed", {
        backend: this.deps.focus.backend,
        error: getErrorMessage(error),
      });
      return false;
    }
  }

  private fireReset(): void {
    try {
      this.deps.reset.reset(DEFAULT_LAYOUT_SLOT);
    } catch (error) {
      this.logger.warn("Layout reset failed", { error: getErrorMessage(error) });
    }
  }

  private async fireToggle(): Promise<void> {
    try {
      await this.deps.toggle.toggle();
    } catch (error) {
      this.logger.warn("Input method toggle failed", { error: getErrorMessage(error) });
    }
  }
}

/**
 * Core types for input source synchronization.
 */

import type { TransportKind } from "../bus";
import type { Unsubscribe } from "../types";

/**
 * Opaque keyboard layout code.
 * Slot ordinals (legacy indicator) are numbers, xkb layout tags (portal) are strings.
 * Compared by strict equality only.
 */
export type LayoutId = string | number;

/**
 * One entry of an input source list, e.g. `("xkb", "ru")`.
 */
export interface LayoutEntry {
  /** Input source type tag ("xkb", "ibus", or "indicator" for legacy slots) */
  readonly source: string;
  readonly layout: LayoutId;
}

/**
 * Decoded notification payload. Entries are in most-recently-used order.
 */
export type LayoutPayload =
  | { readonly kind: "legacy"; readonly entries: readonly LayoutEntry[] }
  | { readonly kind: "portal"; readonly entries: readonly LayoutEntry[] };

/**
 * A layout-change notification after boundary decoding.
 */
export interface NotificationEvent {
  readonly transport: TransportKind;
  readonly group: string;
  readonly setting: string;
  readonly payload: LayoutPayload;
}

/**
 * Mutable suppression bookkeeping owned by one EventDebouncer.
 */
export interface SuppressionState {
  lastObservedLayout: LayoutId | undefined;
  /** Set after a corrective reset on echoing transports */
  skipNext: boolean;
  /** When skipNext was set (ms since epoch) */
  skipSetAt: number | undefined;
}

/**
 * How corrective resets show up on the notification channel.
 *
 * - echo-free: the reset produces no notification of its own
 * - echoing: the reset produces a second notification that must be swallowed
 */
export type ReconciliationPolicy = "echo-free" | "echoing";

/**
 * Reconciliation policy for a transport.
 */
export function policyForTransport(transport: TransportKind): ReconciliationPolicy {
  return transport === "portal" ? "echo-free" : "echoing";
}

/**
 * The editor (or other application) whose input method is kept in sync.
 */
export interface HostApplication {
  /** Native X11 window id of the host's main window, when known */
  readonly windowId?: string | number;
  /**
   * Whether the host currently believes it holds keyboard focus.
   * Used to capture the focused-window token on compositors without stable ids.
   */
  hasApplicationFocus?(): boolean;
  /** Flip the host's internal input method once */
  toggleInputMethod(): void | Promise<void>;
  /** Run a callback when the host shuts down */
  onTeardown(callback: () => void): Unsubscribe;
}

/** Input source slot the corrective reset switches to */
export const DEFAULT_LAYOUT_SLOT = 0;

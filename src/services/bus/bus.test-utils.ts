/**
 * In-process stand-in for the session bus.
 */

import { vi, type Mock } from "vitest";
import type { BusMethodCall, BusSignal, SignalBus } from "./types";
import type { Unsubscribe } from "../types";

export interface FakeSignalBusOptions {
  /** Reject match rules that request eavesdropping */
  readonly rejectEavesdrop?: boolean;
  /** Reject every match rule */
  readonly rejectMatch?: boolean;
}

/**
 * Fake SignalBus with vitest spies and a signal injector.
 *
 * Method calls resolve with an empty body unless `call` is given an
 * implementation via `bus.call.mockImplementation(...)`.
 */
export class FakeSignalBus implements SignalBus {
  readonly matches = new Set<string>();
  readonly addMatch: Mock<(rule: string) => Promise<void>>;
  readonly removeMatch: Mock<(rule: string) => Promise<void>>;
  readonly call: Mock<(call: BusMethodCall) => Promise<readonly unknown[]>>;
  readonly disconnect: Mock<() => void>;

  private readonly listeners = new Set<(signal: BusSignal) => void>();
  private readonly closeListeners = new Set<(error: Error) => void>();

  constructor(options: FakeSignalBusOptions = {}) {
    this.addMatch = vi.fn(async (rule: string) => {
      if (options.rejectMatch || (options.rejectEavesdrop && rule.includes("eavesdrop="))) {
        throw new Error("org.freedesktop.DBus.Error.AccessDenied");
      }
      this.matches.add(rule);
    });
    this.removeMatch = vi.fn(async (rule: string) => {
      this.matches.delete(rule);
    });
    this.call = vi.fn(async (_call: BusMethodCall): Promise<readonly unknown[]> => []);
    this.disconnect = vi.fn(() => {
      this.listeners.clear();
      this.closeListeners.clear();
    });
  }

  onSignal(listener: (signal: BusSignal) => void): Unsubscribe {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  onClose(listener: (error: Error) => void): Unsubscribe {
    this.closeListeners.add(listener);
    return () => this.closeListeners.delete(listener);
  }

  /** Simulate the connection failing: close listeners are notified once */
  fail(error: Error = new Error("Bus connection failed: socket closed")): void {
    const listeners = [...this.closeListeners];
    this.closeListeners.clear();
    for (const listener of listeners) {
      listener(error);
    }
  }

  /** Deliver a signal to every listener */
  emit(signal: BusSignal): void {
    for (const listener of this.listeners) {
      listener(signal);
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  get closeListenerCount(): number {
    return this.closeListeners.size;
  }
}

/**
 * dbus-next style variant value.
 */
export function variant(signature: string, value: unknown): { signature: string; value: unknown } {
  return { signature, value };
}

/**
 * Build a portal SettingChanged signal for input sources.
 */
export function portalSignal(
  layouts: readonly string[],
  overrides: { group?: string; setting?: string } = {}
): BusSignal {
  return {
    sender: ":1.12",
    path: "/org/freedesktop/portal/desktop",
    interface: "org.freedesktop.portal.Settings",
    member: "SettingChanged",
    signature: "ssv",
    body: [
      overrides.group ?? "org.gnome.desktop.input-sources",
      overrides.setting ?? "mru-sources",
      variant(
        "a(ss)",
        layouts.map((layout) => ["xkb", layout])
      ),
    ],
  };
}

/**
 * Build a legacy indicator Changed signal reporting the current slot.
 */
export function legacySignal(current: number | undefined): BusSignal {
  const stateChanges: Record<string, unknown> =
    current === undefined ? {} : { current: variant("u", current) };
  return {
    sender: ":1.40",
    path: "/com/canonical/indicator/keyboard",
    interface: "org.gtk.Actions",
    member: "Changed",
    signature: "asa{sb}a{sv}a{s(bgav)}",
    body: [[], {}, stateChanges, {}],
  };
}

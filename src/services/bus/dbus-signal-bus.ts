/**
 * SignalBus implementation on dbus-next.
 */

import dbus, { type Message, type MessageBus } from "dbus-next";
import type { BusMethodCall, BusSignal, SignalBus } from "./types";
import type { Unsubscribe } from "../types";
import type { Logger } from "../logging";
import { LayoutSyncError, getErrorMessage } from "../errors";

const BUS_DAEMON = {
  destination: "org.freedesktop.DBus",
  path: "/org/freedesktop/DBus",
  interface: "org.freedesktop.DBus",
} as const;

/**
 * Convert an incoming dbus-next message to a BusSignal.
 * Returns undefined for anything that is not a signal.
 */
export function toBusSignal(message: Message): BusSignal | undefined {
  if (message.type !== dbus.MessageType.SIGNAL) {
    return undefined;
  }
  return {
    sender: message.sender || undefined,
    path: message.path,
    interface: message.interface,
    member: message.member,
    signature: message.signature,
    body: Array.isArray(message.body) ? message.body : [],
  };
}

/**
 * A socket failure on a dbus-next connection only surfaces as an `error`
 * event; replies to calls in flight never arrive. The first such event
 * closes this bus: pending and later calls reject, and close listeners
 * are notified once.
 */
export class DbusSignalBus implements SignalBus {
  private readonly listeners = new Set<(signal: BusSignal) => void>();
  private readonly closeListeners = new Set<(error: Error) => void>();
  private readonly pendingCalls = new Set<(error: Error) => void>();
  private closedBy: LayoutSyncError | undefined;

  private readonly onMessage = (message: Message): void => {
    const signal = toBusSignal(message);
    if (!signal) return;
    for (const listener of this.listeners) {
      listener(signal);
    }
  };
  private readonly onError = (error: unknown): void => {
    this.logger.warn("Bus connection error", { error: getErrorMessage(error) });
    if (this.closedBy) return;

    const failure = new LayoutSyncError(
      "TRANSPORT_UNAVAILABLE",
      `Bus connection failed: ${getErrorMessage(error)}`,
      error
    );
    this.close(failure);
    const listeners = [...this.closeListeners];
    this.closeListeners.clear();
    for (const listener of listeners) {
      listener(failure);
    }
  };

  constructor(
    private readonly bus: MessageBus,
    private readonly logger: Logger
  ) {
    this.bus.on("message", this.onMessage);
    this.bus.on("error", this.onError);
  }

  async addMatch(rule: string): Promise<void> {
    await this.call({ ...BUS_DAEMON, member: "AddMatch", signature: "s", body: [rule] });
    this.logger.debug("Match rule added", { rule });
  }

  async removeMatch(rule: string): Promise<void> {
    await this.call({ ...BUS_DAEMON, member: "RemoveMatch", signature: "s", body: [rule] });
    this.logger.debug("Match rule removed", { rule });
  }

  onSignal(listener: (signal: BusSignal) => void): Unsubscribe {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  onClose(listener: (error: Error) => void): Unsubscribe {
    if (this.closedBy) {
      listener(this.closedBy);
      return () => undefined;
    }
    this.closeListeners.add(listener);
    return () => this.closeListeners.delete(listener);
  }

  async call(call: BusMethodCall): Promise<readonly unknown[]> {
    if (this.closedBy) {
      throw this.closedBy;
    }
    const message = new dbus.Message({
      destination: call.destination,
      path: call.path,
      interface: call.interface,
      member: call.member,
      signature: call.signature,
      body: call.body ? [...call.body] : [],
    });
    const reply = await new Promise<Message | null>((resolve, reject) => {
      this.pendingCalls.add(reject);
      void this.bus.call(message).then(
        (value) => {
          this.pendingCalls.delete(reject);
          resolve(value);
        },
        (error: unknown) => {
          this.pendingCalls.delete(reject);
          reject(error);
        }
      );
    });
    return reply && Array.isArray(reply.body) ? reply.body : [];
  }

  disconnect(): void {
    this.listeners.clear();
    this.closeListeners.clear();
    this.close(this.closedBy ?? new LayoutSyncError("TRANSPORT_UNAVAILABLE", "Bus disconnected"));
    this.bus.removeListener("message", this.onMessage);
    this.bus.removeListener("error", this.onError);
    this.bus.disconnect();
  }

  /**
   * Reject every call in flight and refuse new ones.
   */
  private close(reason: LayoutSyncError): void {
    this.closedBy = reason;
    const pending = [...this.pendingCalls];
    this.pendingCalls.clear();
    for (const reject of pending) {
      reject(reason);
    }
  }
}

/**
 * Open a session bus connection at the given address.
 */
export function createDbusSignalBus(busAddress: string, logger: Logger): SignalBus {
  return new DbusSignalBus(dbus.sessionBus({ busAddress }), logger);
}

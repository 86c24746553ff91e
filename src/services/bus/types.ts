/**
 * Notification transport types.
 *
 * The services talk to the session bus through SignalBus so that tests can
 * substitute an in-process fake for the dbus-next connection.
 */

import type { Unsubscribe } from "../types";

/**
 * A broadcast signal received from the bus.
 * The body is left undecoded; payload decoding happens at the boundary.
 */
export interface BusSignal {
  readonly sender?: string;
  readonly path: string;
  readonly interface: string;
  readonly member: string;
  readonly signature: string;
  readonly body: readonly unknown[];
}

/**
 * A method call sent to a named service.
 */
export interface BusMethodCall {
  readonly destination: string;
  readonly path: string;
  readonly interface: string;
  readonly member: string;
  readonly signature?: string;
  readonly body?: readonly unknown[];
}

/**
 * Connection to the session bus.
 */
export interface SignalBus {
  /**
   * Install a match rule with the bus daemon.
   * @throws when the daemon rejects the rule (e.g. eavesdropping not permitted)
   */
  addMatch(rule: string): Promise<void>;
  /** Remove a previously installed match rule */
  removeMatch(rule: string): Promise<void>;
  /** Receive every signal delivered to this connection */
  onSignal(listener: (signal: BusSignal) => void): Unsubscribe;
  /**
   * Call a method and return the reply body.
   * @throws on error replies
   */
  call(call: BusMethodCall): Promise<readonly unknown[]>;
  /**
   * Notified once when the connection fails after it was opened.
   * Not called for disconnect(). Registering on a failed connection
   * calls the listener at once.
   */
  onClose(listener: (error: Error) => void): Unsubscribe;
  /** Close the connection; further calls fail */
  disconnect(): void;
}

/**
 * Opens a bus connection for the given address.
 */
export type SignalBusFactory = (busAddress: string) => SignalBus;

/**
 * SignalSubscription - owns the bus connection and the match rule for
 * layout-change notifications, and feeds them to a fresh EventDebouncer.
 *
 * register() and unregister() are idempotent. Notifications are dispatched
 * one at a time through a promise chain, so the debouncer never runs
 * re-entrantly and a notification queued before unregister() is dropped.
 *
 * Registration gives up when the connection fails or the bus stays silent
 * past the registration timeout. A connection lost later unregisters the
 * live handle.
 */

import {
  LEGACY_INDICATOR_SERVICE,
  LEGACY_SIGNAL,
  buildMatchRule,
  signalFor,
  type BusSignal,
  type SignalBus,
  type SignalBusFactory,
  type TransportKind,
} from "../bus";
import type { Logger } from "../logging";
import type { Unsubscribe } from "../types";
import { LayoutSyncError, getErrorMessage, isLayoutSyncError, type LayoutSyncErrorCode } from "../errors";
import type { EventDebouncer } from "./event-debouncer";
import type { LayoutStateReader } from "./layout-state-reader";
import { decodeSignal } from "./payload-decoder";
import type { HostApplication, LayoutId } from "./types";

export const DEFAULT_REGISTRATION_TIMEOUT_MS = 5000;

/**
 * Token for a live subscription.
 */
export interface SubscriptionHandle {
  readonly id: number;
  readonly transport: TransportKind;
  /** Match rule installed with the bus daemon */
  readonly rule: string;
  readonly debouncer: EventDebouncer;
}

export interface SignalSubscriptionDeps {
  readonly transport: TransportKind;
  /** Session bus address; registration is refused without one */
  readonly busAddress: string | undefined;
  readonly connect: SignalBusFactory;
  readonly host: Pick<HostApplication, "onTeardown">;
  /** Called once per registration with the primed layout */
  readonly createDebouncer: (initialLayout: LayoutId | undefined) => EventDebouncer;
  readonly stateReader?: LayoutStateReader;
  readonly logger: Logger;
  /** Upper bound for connecting, priming and installing the match rule */
  readonly registrationTimeoutMs?: number;
}

interface ActiveSubscription {
  readonly handle: SubscriptionHandle;
  readonly bus: SignalBus;
  readonly unsubscribeSignal: Unsubscribe;
  readonly removeTeardown: Unsubscribe;
  readonly removeCloseListener: Unsubscribe;
  queue: Promise<void>;
}

/**
 * Races registration steps against connection loss and a deadline.
 */
class RegistrationDeadline {
  private readonly aborted: Promise<never>;
  private readonly timer: ReturnType<typeof setTimeout>;
  private readonly removeCloseListener: Unsubscribe;

  constructor(bus: SignalBus, timeoutMs: number) {
    let abort: (error: LayoutSyncError) => void = () => undefined;
    this.aborted = new Promise<never>((_resolve, reject) => {
      abort = reject;
    });
    this.timer = setTimeout(() => {
      abort(new LayoutSyncError("TRANSPORT_UNAVAILABLE", `Bus did not answer within ${timeoutMs} ms`));
    }, timeoutMs);
    this.removeCloseListener = bus.onClose((error) => {
      abort(new LayoutSyncError("TRANSPORT_UNAVAILABLE", error.message, error));
    });
  }

  run<T>(step: Promise<T>): Promise<T> {
    return Promise.race([step, this.aborted]);
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.removeCloseListener();
  }
}

export class SignalSubscription {
  private active: ActiveSubscription | undefined;
  private pending: Promise<SubscriptionHandle | null> | undefined;
  private nextId = 1;

  constructor(private readonly deps: SignalSubscriptionDeps) {}

  /** The live handle, if any */
  get handle(): SubscriptionHandle | undefined {
    return this.active?.handle;
  }

  /**
   * Subscribe to layout-change notifications.
   *
   * @returns The active handle, or null when the transport is unavailable
   */
  register(): Promise<SubscriptionHandle | null> {
    if (this.active) {
      return Promise.resolve(this.active.handle);
    }
    if (!this.pending) {
      this.pending = this.connectAndSubscribe().finally(() => {
        this.pending = undefined;
      });
    }
    return this.pending;
  }

  /**
   * Remove the match rule and close the connection.
   * A handle that is no longer active is ignored.
   */
  async unregister(handle?: SubscriptionHandle): Promise<void> {
    if (this.pending) {
      await this.pending;
    }
    const active = this.active;
    if (!active) {
      return;
    }
    if (handle && handle !== active.handle) {
      this.deps.logger.debug("Ignoring stale subscription handle", { id: handle.id });
      return;
    }

    this.active = undefined;
    active.removeTeardown();
    active.removeCloseListener();
    active.unsubscribeSignal();
    try {
      await active.bus.removeMatch(active.handle.rule);
    } catch (error) {
      this.deps.logger.debug("Match rule removal failed", { error: getErrorMessage(error) });
    }
    active.bus.disconnect();
    this.deps.logger.info("Unsubscribed", { id: active.handle.id, transport: active.handle.transport });
  }

  /**
   * Resolves once every notification queued so far has been handled.
   */
  async idle(): Promise<void> {
    await this.active?.queue;
  }

  private async connectAndSubscribe(): Promise<SubscriptionHandle | null> {
    const { transport, busAddress, logger } = this.deps;
    if (!busAddress) {
      logger.warn("Session bus address not set; input source sync disabled", {
        variable: "DBUS_SESSION_BUS_ADDRESS",
      });
      return null;
    }

    let bus: SignalBus | undefined;
    let deadline: RegistrationDeadline | undefined;
    let unsubscribeSignal: Unsubscribe | undefined;
    try {
      bus = this.deps.connect(busAddress);
      deadline = new RegistrationDeadline(
        bus,
        this.deps.registrationTimeoutMs ?? DEFAULT_REGISTRATION_TIMEOUT_MS
      );
      if (transport === "legacy") {
        await deadline.run(this.probeIndicator(bus));
      }

      const initialLayout = await deadline.run(this.primeLayout(bus));
      const rule = await deadline.run(this.installMatch(bus));
      deadline.dispose();
      const handle: SubscriptionHandle = {
        id: this.nextId++,
        transport,
        rule,
        debouncer: this.deps.createDebouncer(initialLayout),
      };

      const connection = bus;
      let active: ActiveSubscription | undefined;
      unsubscribeSignal = connection.onSignal((signal) => {
        if (active) this.enqueue(active, signal);
      });
      active = {
        handle,
        bus: connection,
        unsubscribeSignal,
        removeTeardown: this.deps.host.onTeardown(() => {
          void this.unregister(handle);
        }),
        removeCloseListener: connection.onClose((error) => {
          logger.warn("Session bus connection lost; input source sync disabled", {
            id: handle.id,
            transport,
            error: error.message,
          });
          void this.unregister(handle);
        }),
        queue: Promise.resolve(),
      };
      this.active = active;

      logger.info("Subscribed", {
        id: handle.id,
        transport,
        initialLayout: initialLayout ?? null,
        eavesdrop: rule.includes("eavesdrop="),
      });
      return handle;
    } catch (error) {
      deadline?.dispose();
      unsubscribeSignal?.();
      bus?.disconnect();
      const failure = isLayoutSyncError(error)
        ? error
        : new LayoutSyncError("TRANSPORT_UNAVAILABLE", getErrorMessage(error), error);
      logger.warn("Input source sync unavailable", {
        transport,
        code: failure.code,
        error: failure.message,
      });
      return null;
    }
  }

  private async probeIndicator(bus: SignalBus): Promise<void> {
    try {
      await bus.call({
        destination: LEGACY_INDICATOR_SERVICE,
        path: LEGACY_SIGNAL.path,
        interface: "org.freedesktop.DBus.Peer",
        member: "Ping",
      });
    } catch (error) {
      throw new LayoutSyncError(
        "TRANSPORT_UNAVAILABLE",
        `Keyboard indicator not reachable: ${getErrorMessage(error)}`,
        error
      );
    }
  }

  private async primeLayout(bus: SignalBus): Promise<LayoutId | undefined> {
    const reader = this.deps.stateReader;
    if (!reader) return undefined;
    try {
      return await reader.readCurrent(bus);
    } catch (error) {
      this.deps.logger.debug("Could not read current layout", { error: getErrorMessage(error) });
      return undefined;
    }
  }

  /**
   * Install the match rule, asking for eavesdropping first.
   * Bus daemons that refuse eavesdropping get a plain rule.
   */
  private async installMatch(bus: SignalBus): Promise<string> {
    const signature = signalFor(this.deps.transport);
    const eavesdropRule = buildMatchRule(signature, { eavesdrop: true });
    try {
      await bus.addMatch(eavesdropRule);
      return eavesdropRule;
    } catch (error) {
      this.deps.logger.debug("Eavesdropping refused; using plain match rule", {
        error: getErrorMessage(error),
      });
    }
    const rule = buildMatchRule(signature);
    await bus.addMatch(rule);
    return rule;
  }

  private enqueue(active: ActiveSubscription, signal: BusSignal): void {
    active.queue = active.queue.then(() => this.dispatch(active, signal));
  }

  private async dispatch(active: ActiveSubscription, signal: BusSignal): Promise<void> {
    if (this.active !== active) {
      return;
    }
    const decoded = decodeSignal(signal, active.handle.transport);
    if (!decoded.ok) {
      if (decoded.reason === "malformed") {
        this.deps.logger.debug("Malformed notification discarded", {
          code: "MALFORMED_NOTIFICATION" satisfies LayoutSyncErrorCode,
          member: signal.member,
          detail: decoded.detail,
        });
      }
      return;
    }
    try {
      const outcome = await active.handle.debouncer.handle(decoded.event);
      this.deps.logger.silly("Notification handled", { id: active.handle.id, outcome });
    } catch (error) {
      this.deps.logger.warn("Notification handler failed", { error: getErrorMessage(error) });
    }
  }
}

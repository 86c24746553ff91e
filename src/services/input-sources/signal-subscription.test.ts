// @vitest-environment node
/**
 * Tests for SignalSubscription.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { SignalSubscription, type SignalSubscriptionDeps } from "./signal-subscription";
import { EventDebouncer } from "./event-debouncer";
import { PortalLayoutStateReader } from "./layout-state-reader";
import type { LayoutId } from "./types";
import { FakeSignalBus, legacySignal, portalSignal } from "../bus/bus.test-utils";
import type { BusMethodCall, SignalBusFactory } from "../bus";
import { createMockLogger, type MockLogger } from "../logging/logging.test-utils";

const PORTAL_EAVESDROP_RULE =
  "type='signal',path='/org/freedesktop/portal/desktop'," +
  "interface='org.freedesktop.portal.Settings',member='SettingChanged',eavesdrop='true'";
const PORTAL_PLAIN_RULE =
  "type='signal',path='/org/freedesktop/portal/desktop'," +
  "interface='org.freedesktop.portal.Settings',member='SettingChanged'";

class FakeHost {
  private readonly callbacks = new Set<() => void>();

  onTeardown(callback: () => void): () => void {
    this.callbacks.add(callback);
    return () => this.callbacks.delete(callback);
  }

  teardown(): void {
    for (const callback of [...this.callbacks]) callback();
  }

  get teardownCount(): number {
    return this.callbacks.size;
  }
}

describe("SignalSubscription", () => {
  let bus: FakeSignalBus;
  let connect: Mock<SignalBusFactory>;
  let host: FakeHost;
  let logger: MockLogger;
  let reset: Mock<(slot: number) => void>;
  let toggle: Mock<() => Promise<void>>;
  let focused: boolean;
  let primed: (LayoutId | undefined)[];

  beforeEach(() => {
    bus = new FakeSignalBus();
    connect = vi.fn<SignalBusFactory>(() => bus);
    host = new FakeHost();
    logger = createMockLogger();
    reset = vi.fn<(slot: number) => void>();
    toggle = vi.fn<() => Promise<void>>(async () => undefined);
    focused = true;
    primed = [];
  });

  function create(overrides: Partial<SignalSubscriptionDeps> = {}): SignalSubscription {
    const transport = overrides.transport ?? "portal";
    return new SignalSubscription({
      transport,
      busAddress: "unix:path=/run/user/1000/bus",
      connect,
      host,
      logger,
      createDebouncer: (initialLayout) => {
        primed.push(initialLayout);
        return new EventDebouncer({
          transport,
          avoidanceLayout: "ru",
          focus: { backend: "x11", isHostFocused: async () => focused },
          reset: { policy: "shell-eval", reset },
          toggle: { toggle },
          initialLayout,
        });
      },
      ...overrides,
    });
  }

  describe("register", () => {
    it("installs an eavesdropping match rule", async () => {
      const subscription = create();

      const handle = await subscription.register();

      expect(handle?.rule).toBe(PORTAL_EAVESDROP_RULE);
      expect(connect).toHaveBeenCalledWith("unix:path=/run/user/1000/bus");
      expect([...bus.matches]).toEqual([PORTAL_EAVESDROP_RULE]);
      expect(bus.listenerCount).toBe(1);
      expect(subscription.handle).toBe(handle);
    });

    it("falls back to a plain rule when eavesdropping is refused", async () => {
      bus = new FakeSignalBus({ rejectEavesdrop: true });
      const subscription = create();

      const handle = await subscription.register();

      expect(handle?.rule).toBe(PORTAL_PLAIN_RULE);
      expect(bus.addMatch).toHaveBeenCalledTimes(2);
      expect(logger.debug).toHaveBeenCalledWith("Eavesdropping refused; using plain match rule", {
        error: "org.freedesktop.DBus.Error.AccessDenied",
      });
    });

    it("returns the existing handle on a second call", async () => {
      const subscription = create();

      const first = await subscription.register();
      const second = await subscription.register();

      expect(second).toBe(first);
      expect(connect).toHaveBeenCalledTimes(1);
      expect(bus.listenerCount).toBe(1);
    });

    it("shares one registration between concurrent calls", async () => {
      const subscription = create();

      const [first, second] = await Promise.all([subscription.register(), subscription.register()]);

      expect(second).toBe(first);
      expect(connect).toHaveBeenCalledTimes(1);
    });

    it("returns null without a session bus address", async () => {
      const subscription = create({ busAddress: undefined });

      await expect(subscription.register()).resolves.toBeNull();

      expect(connect).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledWith(
        "Session bus address not set; input source sync disabled",
        { variable: "DBUS_SESSION_BUS_ADDRESS" }
      );
    });

    it("returns null when the connection cannot be opened", async () => {
      connect.mockImplementationOnce(() => {
        throw new Error("ENOENT /run/user/1000/bus");
      });
      const subscription = create();

      await expect(subscription.register()).resolves.toBeNull();

      expect(logger.warn).toHaveBeenCalledWith("Input source sync unavailable", {
        transport: "portal",
        code: "TRANSPORT_UNAVAILABLE",
        error: "ENOENT /run/user/1000/bus",
      });
    });

    it("cleans up when no match rule is accepted", async () => {
      bus = new FakeSignalBus({ rejectMatch: true });
      const subscription = create();

      await expect(subscription.register()).resolves.toBeNull();

      expect(bus.disconnect).toHaveBeenCalledTimes(1);
      expect(bus.listenerCount).toBe(0);
      expect(host.teardownCount).toBe(0);
      expect(subscription.handle).toBeUndefined();
    });

    it("pings the keyboard indicator on the legacy transport", async () => {
      const subscription = create({ transport: "legacy" });

      await subscription.register();

      const ping: BusMethodCall = {
        destination: "com.canonical.indicator.keyboard",
        path: "/com/canonical/indicator/keyboard",
        interface: "org.freedesktop.DBus.Peer",
        member: "Ping",
      };
      expect(bus.call).toHaveBeenCalledWith(ping);
    });

    it("gives up when the keyboard indicator does not answer", async () => {
      bus.call.mockRejectedValueOnce(new Error("org.freedesktop.DBus.Error.ServiceUnknown"));
      const subscription = create({ transport: "legacy" });

      await expect(subscription.register()).resolves.toBeNull();

      expect(bus.addMatch).not.toHaveBeenCalled();
      expect(bus.disconnect).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith("Input source sync unavailable", {
        transport: "legacy",
        code: "TRANSPORT_UNAVAILABLE",
        error: "Keyboard indicator not reachable: org.freedesktop.DBus.Error.ServiceUnknown",
      });
    });

    it("skips the indicator ping on the portal transport", async () => {
      await create().register();

      expect(bus.call).not.toHaveBeenCalled();
    });

    it("primes the debouncer with the current layout", async () => {
      bus.call.mockResolvedValueOnce([{ signature: "v", value: { signature: "a(ss)", value: [["xkb", "us"]] } }]);
      const subscription = create({ stateReader: new PortalLayoutStateReader() });

      const handle = await subscription.register();

      expect(primed).toEqual(["us"]);
      expect(handle?.debouncer.snapshot.lastObservedLayout).toBe("us");
    });

    it("registers unprimed when the layout cannot be read", async () => {
      bus.call.mockRejectedValueOnce(new Error("org.freedesktop.portal.Error.NotFound"));
      const subscription = create({ stateReader: new PortalLayoutStateReader() });

      const handle = await subscription.register();

      expect(handle).not.toBeNull();
      expect(primed).toEqual([undefined]);
      expect(logger.debug).toHaveBeenCalledWith("Could not read current layout", {
        error: "org.freedesktop.portal.Error.NotFound",
      });
    });
  });

  describe("register on a failing connection", () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it("returns null when the connection fails mid-registration", async () => {
      bus.addMatch.mockReturnValueOnce(new Promise(() => undefined));
      const subscription = create();

      const pending = subscription.register();
      await vi.waitFor(() => expect(bus.addMatch).toHaveBeenCalledTimes(1));
      bus.fail(new Error("Bus connection failed: connect ENOENT /tmp/test-bus"));

      await expect(pending).resolves.toBeNull();
      expect(bus.disconnect).toHaveBeenCalledTimes(1);
      expect(host.teardownCount).toBe(0);
      expect(logger.warn).toHaveBeenCalledWith("Input source sync unavailable", {
        transport: "portal",
        code: "TRANSPORT_UNAVAILABLE",
        error: "Bus connection failed: connect ENOENT /tmp/test-bus",
      });
    });

    it("returns null when the bus never answers", async () => {
      vi.useFakeTimers();
      bus.call.mockReturnValueOnce(new Promise(() => undefined));
      const subscription = create({ transport: "legacy", registrationTimeoutMs: 2000 });

      const pending = subscription.register();
      await vi.advanceTimersByTimeAsync(2000);

      await expect(pending).resolves.toBeNull();
      expect(bus.addMatch).not.toHaveBeenCalled();
      expect(bus.disconnect).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith("Input source sync unavailable", {
        transport: "legacy",
        code: "TRANSPORT_UNAVAILABLE",
        error: "Bus did not answer within 2000 ms",
      });
    });

    it("lets unregister and register proceed after a stalled registration", async () => {
      vi.useFakeTimers();
      bus.addMatch.mockReturnValueOnce(new Promise(() => undefined));
      const subscription = create({ registrationTimeoutMs: 2000 });

      const stalled = subscription.register();
      const unregistered = subscription.unregister();
      await vi.advanceTimersByTimeAsync(2000);

      await expect(stalled).resolves.toBeNull();
      await expect(unregistered).resolves.toBeUndefined();
      const handle = await subscription.register();
      expect(handle?.rule).toBe(PORTAL_EAVESDROP_RULE);
      expect(connect).toHaveBeenCalledTimes(2);
    });

    it("stops watching the connection once registered", async () => {
      const subscription = create();

      await subscription.register();

      expect(bus.closeListenerCount).toBe(1);
    });
  });

  describe("dispatch", () => {
    it("routes notifications to the debouncer", async () => {
      const subscription = create();
      await subscription.register();

      bus.emit(portalSignal(["ru", "us"]));
      await subscription.idle();

      expect(reset).toHaveBeenCalledWith(0);
      expect(toggle).toHaveBeenCalledTimes(1);
    });

    it("handles notifications one at a time", async () => {
      const order: string[] = [];
      let release: () => void = () => undefined;
      toggle.mockImplementationOnce(async () => {
        order.push("first:start");
        await new Promise<void>((resolve) => {
          release = resolve;
        });
        order.push("first:end");
      });
      toggle.mockImplementationOnce(async () => {
        order.push("second");
      });
      const subscription = create();
      await subscription.register();

      bus.emit(portalSignal(["us"]));
      bus.emit(portalSignal(["de"]));
      await vi.waitFor(() => expect(order).toEqual(["first:start"]));
      release();
      await subscription.idle();

      expect(order).toEqual(["first:start", "first:end", "second"]);
    });

    it("ignores unrelated signals", async () => {
      const subscription = create();
      await subscription.register();

      bus.emit(legacySignal(1));
      await subscription.idle();

      expect(toggle).not.toHaveBeenCalled();
    });

    it("logs and discards a malformed body", async () => {
      const subscription = create();
      await subscription.register();

      bus.emit({ ...portalSignal(["ru"]), body: ["org.gnome.desktop.input-sources"] });
      await subscription.idle();

      expect(toggle).not.toHaveBeenCalled();
      expect(logger.debug).toHaveBeenCalledWith("Malformed notification discarded", {
        code: "MALFORMED_NOTIFICATION",
        member: "SettingChanged",
        detail: "unexpected body for ssv",
      });
    });

    it("takes no action while the host is unfocused", async () => {
      focused = false;
      const subscription = create({ transport: "legacy" });
      await subscription.register();

      bus.emit(legacySignal(1));
      bus.emit(legacySignal(0));
      await subscription.idle();

      expect(reset).not.toHaveBeenCalled();
      expect(toggle).not.toHaveBeenCalled();
    });

    it("swallows the echo of a legacy reset", async () => {
      const subscription = create({ transport: "legacy" });
      await subscription.register();

      bus.emit(legacySignal(1));
      bus.emit(legacySignal(0));
      await subscription.idle();

      expect(reset).toHaveBeenCalledTimes(1);
      expect(toggle).toHaveBeenCalledTimes(1);
    });

    it("drops queued notifications after unregister", async () => {
      let release: () => void = () => undefined;
      toggle.mockImplementationOnce(
        () =>
          new Promise<void>((resolve) => {
            release = resolve;
          })
      );
      const subscription = create();
      await subscription.register();

      bus.emit(portalSignal(["us"]));
      bus.emit(portalSignal(["ru"]));
      const drained = subscription.idle();
      await vi.waitFor(() => expect(toggle).toHaveBeenCalledTimes(1));
      await subscription.unregister();
      release();
      await drained;

      expect(toggle).toHaveBeenCalledTimes(1);
      expect(reset).not.toHaveBeenCalled();
    });
  });

  describe("unregister", () => {
    it("removes the rule and closes the connection", async () => {
      const subscription = create();
      await subscription.register();

      await subscription.unregister();

      expect(bus.removeMatch).toHaveBeenCalledWith(PORTAL_EAVESDROP_RULE);
      expect(bus.matches.size).toBe(0);
      expect(bus.listenerCount).toBe(0);
      expect(bus.disconnect).toHaveBeenCalledTimes(1);
      expect(host.teardownCount).toBe(0);
      expect(subscription.handle).toBeUndefined();
    });

    it("is safe to call twice", async () => {
      const subscription = create();
      await subscription.register();

      await subscription.unregister();
      await subscription.unregister();

      expect(bus.disconnect).toHaveBeenCalledTimes(1);
      expect(subscription.handle).toBeUndefined();
    });

    it("is safe without a registration", async () => {
      await expect(create().unregister()).resolves.toBeUndefined();
    });

    it("ignores a stale handle", async () => {
      const firstBus = bus;
      const subscription = create();
      const stale = await subscription.register();
      await subscription.unregister();
      bus = new FakeSignalBus();
      const current = await subscription.register();

      await subscription.unregister(stale ?? undefined);

      expect(subscription.handle).toBe(current);
      expect(bus.disconnect).not.toHaveBeenCalled();
      expect(firstBus.disconnect).toHaveBeenCalledTimes(1);
    });

    it("waits for a pending registration", async () => {
      const subscription = create();

      const registering = subscription.register();
      await subscription.unregister();

      await expect(registering).resolves.not.toBeNull();
      expect(subscription.handle).toBeUndefined();
      expect(bus.disconnect).toHaveBeenCalledTimes(1);
    });

    it("still disconnects when the rule cannot be removed", async () => {
      const subscription = create();
      await subscription.register();
      bus.removeMatch.mockRejectedValueOnce(new Error("org.freedesktop.DBus.Error.MatchRuleNotFound"));

      await subscription.unregister();

      expect(bus.disconnect).toHaveBeenCalledTimes(1);
      expect(logger.debug).toHaveBeenCalledWith("Match rule removal failed", {
        error: "org.freedesktop.DBus.Error.MatchRuleNotFound",
      });
    });

    it("runs automatically at host teardown", async () => {
      const subscription = create();
      await subscription.register();

      host.teardown();
      await vi.waitFor(() => expect(bus.disconnect).toHaveBeenCalledTimes(1));

      expect(subscription.handle).toBeUndefined();
    });

    it("runs when the connection is lost", async () => {
      const subscription = create();
      await subscription.register();

      bus.fail(new Error("Bus connection failed: socket closed"));
      await vi.waitFor(() => expect(bus.disconnect).toHaveBeenCalledTimes(1));

      expect(subscription.handle).toBeUndefined();
      expect(host.teardownCount).toBe(0);
      expect(logger.warn).toHaveBeenCalledWith("Session bus connection lost; input source sync disabled", {
        id: 1,
        transport: "portal",
        error: "Bus connection failed: socket closed",
      });
    });

    it("stops watching the connection", async () => {
      const subscription = create();
      await subscription.register();

      await subscription.unregister();

      expect(bus.closeListenerCount).toBe(0);
    });

    it("allows registering again afterwards", async () => {
      const subscription = create();
      const first = await subscription.register();
      await subscription.unregister();

      const second = await subscription.register();

      expect(second).not.toBe(first);
      expect(second?.id).toBe(2);
      expect(primed).toHaveLength(2);
    });
  });
});

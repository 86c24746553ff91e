/**
 * Tests for layout state readers.
 */

import { describe, it, expect } from "vitest";
import {
  GsettingsLayoutStateReader,
  PortalLayoutStateReader,
  createLayoutStateReader,
} from "./layout-state-reader";
import { FakeSignalBus, variant } from "../bus/bus.test-utils";
import { createMockProcessRunner, createMockSpawnedProcess } from "../platform/process.test-utils";

describe("PortalLayoutStateReader", () => {
  it("reads the first MRU source through Settings.Read", async () => {
    const bus = new FakeSignalBus();
    bus.call.mockResolvedValueOnce([variant("v", variant("a(ss)", [["xkb", "us"], ["xkb", "ru"]]))]);

    const layout = await new PortalLayoutStateReader().readCurrent(bus);

    expect(layout).toBe("us");
    expect(bus.call).toHaveBeenCalledWith({
      destination: "org.freedesktop.portal.Desktop",
      path: "/org/freedesktop/portal/desktop",
      interface: "org.freedesktop.portal.Settings",
      member: "Read",
      signature: "ss",
      body: ["org.gnome.desktop.input-sources", "mru-sources"],
    });
  });

  it("returns undefined for an empty list", async () => {
    const bus = new FakeSignalBus();
    bus.call.mockResolvedValueOnce([variant("v", variant("a(ss)", []))]);

    await expect(new PortalLayoutStateReader().readCurrent(bus)).resolves.toBeUndefined();
  });

  it("returns undefined for an empty reply", async () => {
    await expect(new PortalLayoutStateReader().readCurrent(new FakeSignalBus())).resolves.toBeUndefined();
  });

  it("propagates call errors", async () => {
    const bus = new FakeSignalBus();
    bus.call.mockRejectedValueOnce(new Error("org.freedesktop.portal.Error.NotFound"));

    await expect(new PortalLayoutStateReader().readCurrent(bus)).rejects.toThrow(
      "org.freedesktop.portal.Error.NotFound"
    );
  });
});

describe("GsettingsLayoutStateReader", () => {
  it("parses a uint32 slot", async () => {
    const runner = createMockProcessRunner(
      createMockSpawnedProcess({ result: { exitCode: 0, stdout: "uint32 1\n" } })
    );

    await expect(new GsettingsLayoutStateReader(runner).readCurrent()).resolves.toBe(1);
    expect(runner.run).toHaveBeenCalledWith("gsettings", ["get", "org.gnome.desktop.input-sources", "current"]);
  });

  it("parses a bare number", async () => {
    const runner = createMockProcessRunner(
      createMockSpawnedProcess({ result: { exitCode: 0, stdout: "0\n" } })
    );

    await expect(new GsettingsLayoutStateReader(runner).readCurrent()).resolves.toBe(0);
  });

  it("returns undefined for unexpected output", async () => {
    const runner = createMockProcessRunner(
      createMockSpawnedProcess({ result: { exitCode: 0, stdout: "@as []\n" } })
    );

    await expect(new GsettingsLayoutStateReader(runner).readCurrent()).resolves.toBeUndefined();
  });

  it("rejects when gsettings fails", async () => {
    const runner = createMockProcessRunner(
      createMockSpawnedProcess({ result: { exitCode: 1, stderr: "No such key “current”" } })
    );

    await expect(new GsettingsLayoutStateReader(runner).readCurrent()).rejects.toThrow(/No such key/);
  });
});

describe("createLayoutStateReader", () => {
  it("matches the transport", () => {
    const runner = createMockProcessRunner();

    expect(createLayoutStateReader("portal", runner)).toBeInstanceOf(PortalLayoutStateReader);
    expect(createLayoutStateReader("legacy", runner)).toBeInstanceOf(GsettingsLayoutStateReader);
  });
});

/**
 * Tests for gdbus helpers.
 */

import { describe, it, expect } from "vitest";
import { gdbusArgs, gdbusCall, parseEvalReply } from "./gdbus";
import { createMockProcessRunner, createMockSpawnedProcess } from "./process.test-utils";

const SET_INPUT_SOURCE = {
  dest: "org.gnome.SettingsDaemon.Keyboard",
  objectPath: "/org/gnome/SettingsDaemon/Keyboard",
  method: "org.gnome.SettingsDaemon.Keyboard.SetInputSource",
  args: ["0"],
};

describe("gdbusArgs", () => {
  it("builds a session call", () => {
    expect(gdbusArgs(SET_INPUT_SOURCE)).toEqual([
      "call",
      "--session",
      "--dest",
      "org.gnome.SettingsDaemon.Keyboard",
      "--object-path",
      "/org/gnome/SettingsDaemon/Keyboard",
      "--method",
      "org.gnome.SettingsDaemon.Keyboard.SetInputSource",
      "0",
    ]);
  });
});

describe("gdbusCall", () => {
  it("runs gdbus and returns the trimmed reply", async () => {
    const runner = createMockProcessRunner(
      createMockSpawnedProcess({ result: { exitCode: 0, stdout: "()\n" } })
    );

    await expect(gdbusCall(runner, SET_INPUT_SOURCE)).resolves.toBe("()");
    expect(runner.run).toHaveBeenCalledWith("gdbus", gdbusArgs(SET_INPUT_SOURCE));
  });

  it("rejects when gdbus fails", async () => {
    const runner = createMockProcessRunner(
      createMockSpawnedProcess({
        result: { exitCode: 1, stderr: "Error: GDBus.Error:org.freedesktop.DBus.Error.ServiceUnknown" },
      })
    );

    await expect(gdbusCall(runner, SET_INPUT_SOURCE)).rejects.toThrow(/ServiceUnknown/);
  });
});

describe("parseEvalReply", () => {
  it("parses a successful reply with a JSON string result", () => {
    expect(parseEvalReply(`(true, '"1234"')`)).toEqual({ success: true, result: '"1234"' });
  });

  it("parses a failed reply", () => {
    expect(parseEvalReply("(false, '')")).toEqual({ success: false, result: "" });
  });

  it("parses double-quoted results containing apostrophes", () => {
    expect(parseEvalReply(`(true, "it's")`)).toEqual({ success: true, result: "it's" });
  });

  it("unescapes backslash sequences", () => {
    expect(parseEvalReply(`(true, 'a\\'b')`)).toEqual({ success: true, result: "a'b" });
  });

  it("returns undefined for other shapes", () => {
    expect(parseEvalReply("()")).toBeUndefined();
    expect(parseEvalReply("(uint32 1,)")).toBeUndefined();
  });
});

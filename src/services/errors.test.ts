/**
 * Tests for input source sync error definitions.
 */

import { describe, it, expect } from "vitest";
import {
  LayoutSyncError,
  getErrorMessage,
  isLayoutSyncError,
  isLayoutSyncErrorWithCode,
} from "./errors";

describe("LayoutSyncError", () => {
  it("carries code, message and name", () => {
    const error = new LayoutSyncError("ACTION_FAILED", "gsettings exited with 1");

    expect(error.code).toBe("ACTION_FAILED");
    expect(error.message).toBe("gsettings exited with 1");
    expect(error.name).toBe("LayoutSyncError");
  });

  it("is an instance of Error and LayoutSyncError", () => {
    const error = new LayoutSyncError("INVALID_CONFIG", "bad");

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(LayoutSyncError);
  });

  it("keeps the wrapped cause", () => {
    const cause = new Error("ENOENT");
    const error = new LayoutSyncError("FOCUS_QUERY_FAILED", "xdotool failed", cause);

    expect(error.cause).toBe(cause);
  });
});

describe("isLayoutSyncError", () => {
  it("returns true for LayoutSyncError", () => {
    expect(isLayoutSyncError(new LayoutSyncError("ACTION_FAILED", "x"))).toBe(true);
  });

  it("returns false for plain errors and non-errors", () => {
    expect(isLayoutSyncError(new Error("x"))).toBe(false);
    expect(isLayoutSyncError("x")).toBe(false);
    expect(isLayoutSyncError(null)).toBe(false);
  });
});

describe("isLayoutSyncErrorWithCode", () => {
  it("matches the code", () => {
    const error = new LayoutSyncError("TRANSPORT_UNAVAILABLE", "x");

    expect(isLayoutSyncErrorWithCode(error, "TRANSPORT_UNAVAILABLE")).toBe(true);
    expect(isLayoutSyncErrorWithCode(error, "ACTION_FAILED")).toBe(false);
  });
});

describe("getErrorMessage", () => {
  it("returns the message of an Error", () => {
    expect(getErrorMessage(new Error("boom"))).toBe("boom");
  });

  it("stringifies other values", () => {
    expect(getErrorMessage("boom")).toBe("boom");
    expect(getErrorMessage(42)).toBe("42");
  });
});

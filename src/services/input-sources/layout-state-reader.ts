/**
 * Reads the current layout once, to prime suppression state before subscribing.
 */

import { z } from "zod";
import {
  INPUT_SOURCES_GROUP,
  MRU_SOURCES_SETTING,
  PORTAL_SERVICE,
  PORTAL_SIGNAL,
  type SignalBus,
  type TransportKind,
} from "../bus";
import type { ProcessRunner } from "../platform/process";
import { runToCompletion } from "../platform/process";
import { decodeLayoutPairs } from "./payload-decoder";
import type { LayoutId } from "./types";

export interface LayoutStateReader {
  /**
   * Current layout in the transport's LayoutId form.
   * @returns undefined when the layout is unknown
   * @throws when the query fails
   */
  readCurrent(bus: SignalBus): Promise<LayoutId | undefined>;
}

/**
 * Reads `mru-sources` through the settings portal's Read method.
 */
export class PortalLayoutStateReader implements LayoutStateReader {
  async readCurrent(bus: SignalBus): Promise<LayoutId | undefined> {
    const body = await bus.call({
      destination: PORTAL_SERVICE,
      path: PORTAL_SIGNAL.path,
      interface: PORTAL_SIGNAL.interface,
      member: "Read",
      signature: "ss",
      body: [INPUT_SOURCES_GROUP, MRU_SOURCES_SETTING],
    });
    // Read wraps the value in an extra variant; decodeLayoutPairs unwraps both
    const entries = decodeLayoutPairs(body[0]);
    return entries?.[0]?.layout;
  }
}

const GSETTINGS_UINT_PATTERN = z
  .string()
  .trim()
  .regex(/^(?:uint32\s+)?\d+$/)
  .transform((value) => Number.parseInt(value.replace(/^uint32\s+/, ""), 10));

/** Timeout for the gsettings read */
export const GSETTINGS_TIMEOUT_MS = 2000;

/**
 * Reads the legacy `current` slot with gsettings.
 */
export class GsettingsLayoutStateReader implements LayoutStateReader {
  constructor(private readonly runner: ProcessRunner) {}

  async readCurrent(): Promise<LayoutId | undefined> {
    const stdout = await runToCompletion(
      this.runner,
      "gsettings",
      ["get", "org.gnome.desktop.input-sources", "current"],
      GSETTINGS_TIMEOUT_MS
    );
    const parsed = GSETTINGS_UINT_PATTERN.safeParse(stdout);
    return parsed.success ? parsed.data : undefined;
  }
}

/**
 * Reader matching a transport's LayoutId form.
 */
export function createLayoutStateReader(transport: TransportKind, runner: ProcessRunner): LayoutStateReader {
  return transport === "portal" ? new PortalLayoutStateReader() : new GsettingsLayoutStateReader(runner);
}

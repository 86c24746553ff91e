/**
 * Boundary decoding of layout-change signals.
 *
 * dbus-next hands over loosely typed bodies (arrays, plain objects and
 * Variant instances). Everything past this module works on LayoutEntry.
 */

import { z } from "zod";
import { LEGACY_SIGNAL, PORTAL_SIGNAL, matchesSignature, type BusSignal, type TransportKind } from "../bus";
import type { LayoutEntry, LayoutId, NotificationEvent } from "./types";

/** Source tag used for legacy indicator slots */
export const LEGACY_SOURCE_TAG = "indicator";

const variantSchema = z.object({ signature: z.string(), value: z.unknown() });

const layoutPairsSchema = z.array(z.tuple([z.string(), z.string()]).rest(z.unknown()));

const slotSchema = z.union([
  z.number().int().nonnegative(),
  z.bigint().nonnegative().transform((value) => Number(value)),
]);

const portalBodySchema = z.tuple([z.string(), z.string(), z.unknown()]);

const legacyBodySchema = z.tuple([
  z.array(z.string()),
  z.record(z.unknown()),
  z.record(z.unknown()),
  z.record(z.unknown()),
]);

/** Action description `(enabled, parameter type, state)` in the additions dict */
const actionDescriptionSchema = z.tuple([z.boolean(), z.string(), z.array(z.unknown())]);

/**
 * Result of decoding a signal.
 *
 * - unrelated: the signal is not the transport's layout signal at all
 * - malformed: right signal, body does not have the expected shape
 */
export type DecodeResult =
  | { readonly ok: true; readonly event: NotificationEvent }
  | { readonly ok: false; readonly reason: "unrelated" }
  | { readonly ok: false; readonly reason: "malformed"; readonly detail: string };

/**
 * Strip any number of variant wrappers.
 */
export function unwrapVariant(value: unknown): unknown {
  let current = value;
  for (;;) {
    const parsed = variantSchema.safeParse(current);
    if (!parsed.success) return current;
    current = parsed.data.value;
  }
}

/**
 * Decode an `a(ss)` input source list (possibly variant-wrapped).
 *
 * @returns Entries in list order, or undefined when the value is not a list of pairs
 */
export function decodeLayoutPairs(value: unknown): LayoutEntry[] | undefined {
  const parsed = layoutPairsSchema.safeParse(unwrapVariant(value));
  if (!parsed.success) return undefined;
  return parsed.data.map(([source, layout]) => ({ source, layout }));
}

/**
 * Read the `current` slot of a legacy action group change.
 * Looks at state changes first, then at newly added action descriptions.
 */
export function decodeLegacyCurrent(
  stateChanges: Record<string, unknown>,
  additions: Record<string, unknown>
): LayoutId | undefined {
  if ("current" in stateChanges) {
    const slot = slotSchema.safeParse(unwrapVariant(stateChanges.current));
    return slot.success ? slot.data : undefined;
  }

  const added = actionDescriptionSchema.safeParse(additions.current);
  if (!added.success) return undefined;
  const [state] = added.data[2];
  if (state === undefined) return undefined;
  const slot = slotSchema.safeParse(unwrapVariant(state));
  return slot.success ? slot.data : undefined;
}

function decodePortal(signal: BusSignal): DecodeResult {
  const body = portalBodySchema.safeParse(signal.body);
  if (!body.success) {
    return { ok: false, reason: "malformed", detail: `unexpected body for ${signal.signature}` };
  }
  const [group, setting, value] = body.data;
  // Other settings carry other value types; an empty list is discarded downstream
  const entries = decodeLayoutPairs(value) ?? [];
  return {
    ok: true,
    event: { transport: "portal", group, setting, payload: { kind: "portal", entries } },
  };
}

function decodeLegacy(signal: BusSignal): DecodeResult {
  const body = legacyBodySchema.safeParse(signal.body);
  if (!body.success) {
    return { ok: false, reason: "malformed", detail: `unexpected body for ${signal.signature}` };
  }
  const [, , stateChanges, additions] = body.data;
  const current = decodeLegacyCurrent(stateChanges, additions);
  const entries: LayoutEntry[] =
    current === undefined ? [] : [{ source: LEGACY_SOURCE_TAG, layout: current }];
  return {
    ok: true,
    event: {
      transport: "legacy",
      group: signal.interface,
      setting: signal.member,
      payload: { kind: "legacy", entries },
    },
  };
}

/**
 * Decode a bus signal for the given transport.
 */
export function decodeSignal(signal: BusSignal, transport: TransportKind): DecodeResult {
  if (transport === "portal") {
    return matchesSignature(signal, PORTAL_SIGNAL) ? decodePortal(signal) : { ok: false, reason: "unrelated" };
  }
  return matchesSignature(signal, LEGACY_SIGNAL) ? decodeLegacy(signal) : { ok: false, reason: "unrelated" };
}

/**
 * Most recent layout of a notification, if any.
 */
export function newestLayout(event: NotificationEvent): LayoutId | undefined {
  return event.payload.entries[0]?.layout;
}

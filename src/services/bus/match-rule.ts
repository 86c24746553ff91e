/**
 * D-Bus match rule construction.
 */

import type { SignalSignature } from "./signatures";

export interface MatchRuleOptions {
  /** Restrict to a sender (well-known or unique name) */
  readonly sender?: string;
  /** Ask for broadcasts not addressed to this connection */
  readonly eavesdrop?: boolean;
}

/**
 * Build a signal match rule string.
 *
 * @example
 * ```typescript
 * buildMatchRule(PORTAL_SIGNAL, { eavesdrop: true });
 * // "type='signal',path='/org/freedesktop/portal/desktop',interface=...,eavesdrop='true'"
 * ```
 */
export function buildMatchRule(signature: SignalSignature, options: MatchRuleOptions = {}): string {
  const parts: [string, string][] = [["type", "signal"]];
  if (options.sender) {
    parts.push(["sender", options.sender]);
  }
  parts.push(["path", signature.path]);
  parts.push(["interface", signature.interface]);
  parts.push(["member", signature.member]);
  if (options.eavesdrop) {
    parts.push(["eavesdrop", "true"]);
  }
  return parts.map(([key, value]) => `${key}='${escapeRuleValue(value)}'`).join(",");
}

/**
 * Escape a value for a match rule. Apostrophes end the quoted value, so
 * they are closed, escaped, and reopened.
 */
function escapeRuleValue(value: string): string {
  return value.replace(/'/g, "'\\''");
}

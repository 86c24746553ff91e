/**
 * Session bus transport exports.
 */

export type { BusSignal, BusMethodCall, SignalBus, SignalBusFactory } from "./types";
export {
  type TransportKind,
  type SignalSignature,
  PORTAL_SIGNAL,
  LEGACY_SIGNAL,
  INPUT_SOURCES_GROUP,
  MRU_SOURCES_SETTING,
  LEGACY_INDICATOR_SERVICE,
  PORTAL_SERVICE,
  recognizedSetting,
  signalFor,
  matchesSignature,
} from "./signatures";
export { buildMatchRule, type MatchRuleOptions } from "./match-rule";
export { DbusSignalBus, createDbusSignalBus, toBusSignal } from "./dbus-signal-bus";

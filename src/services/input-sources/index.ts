/**
 * Input source synchronization exports.
 */

export type {
  LayoutId,
  LayoutEntry,
  LayoutPayload,
  NotificationEvent,
  SuppressionState,
  ReconciliationPolicy,
  HostApplication,
} from "./types";
export { policyForTransport, DEFAULT_LAYOUT_SLOT } from "./types";
export {
  type DecodeResult,
  LEGACY_SOURCE_TAG,
  decodeSignal,
  decodeLayoutPairs,
  decodeLegacyCurrent,
  newestLayout,
  unwrapVariant,
} from "./payload-decoder";
export {
  type ResetPolicy,
  type LayoutResetAction,
  RESET_POLICIES,
  CommandLayoutResetAction,
  activateSourceScript,
  buildResetCommand,
} from "./layout-reset";
export {
  type InputMethodToggle,
  CallbackInputMethodToggle,
  CommandInputMethodToggle,
  TOGGLE_COMMAND_TIMEOUT_MS,
} from "./input-method-toggle";
export {
  type LayoutStateReader,
  PortalLayoutStateReader,
  GsettingsLayoutStateReader,
  createLayoutStateReader,
} from "./layout-state-reader";
export {
  type HandleOutcome,
  type EventDebouncerDeps,
  EventDebouncer,
  DEFAULT_ECHO_WINDOW_MS,
} from "./event-debouncer";
export {
  type SubscriptionHandle,
  type SignalSubscriptionDeps,
  SignalSubscription,
  DEFAULT_REGISTRATION_TIMEOUT_MS,
} from "./signal-subscription";

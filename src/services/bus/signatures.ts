/**
 * Bus coordinates of the two supported layout-change notifications.
 */

/**
 * Notification transport variant.
 *
 * - portal: desktop settings portal `SettingChanged` (current GNOME)
 * - legacy: keyboard indicator action-group `Changed` (older Ubuntu)
 */
export type TransportKind = "portal" | "legacy";

/**
 * Where a signal comes from.
 */
export interface SignalSignature {
  readonly path: string;
  readonly interface: string;
  readonly member: string;
}

export const PORTAL_SIGNAL: SignalSignature = {
  path: "/org/freedesktop/portal/desktop",
  interface: "org.freedesktop.portal.Settings",
  member: "SettingChanged",
};

export const LEGACY_SIGNAL: SignalSignature = {
  path: "/com/canonical/indicator/keyboard",
  interface: "org.gtk.Actions",
  member: "Changed",
};

/** Settings group carrying the input source list */
export const INPUT_SOURCES_GROUP = "org.gnome.desktop.input-sources";

/** Most-recently-used input sources key */
export const MRU_SOURCES_SETTING = "mru-sources";

/** Well-known name of the legacy keyboard indicator */
export const LEGACY_INDICATOR_SERVICE = "com.canonical.indicator.keyboard";

/** Well-known name of the settings portal */
export const PORTAL_SERVICE = "org.freedesktop.portal.Desktop";

/**
 * The (group, setting) pair a transport's layout notifications carry.
 * Legacy signals have no settings group, so the interface and member stand in.
 */
export function recognizedSetting(transport: TransportKind): { group: string; setting: string } {
  if (transport === "portal") {
    return { group: INPUT_SOURCES_GROUP, setting: MRU_SOURCES_SETTING };
  }
  return { group: LEGACY_SIGNAL.interface, setting: LEGACY_SIGNAL.member };
}

export function signalFor(transport: TransportKind): SignalSignature {
  return transport === "portal" ? PORTAL_SIGNAL : LEGACY_SIGNAL;
}

/**
 * Check whether a signal's coordinates match a signature.
 */
export function matchesSignature(
  signal: { path: string; interface: string; member: string },
  signature: SignalSignature
): boolean {
  return (
    signal.path === signature.path &&
    signal.interface === signature.interface &&
    signal.member === signature.member
  );
}

/**
 * FocusOracle - answers whether the host window has keyboard focus.
 *
 * Backends:
 * - X11WindowFocusOracle: compares the host's X11 window id with the active window
 * - ShellTokenFocusOracle: caches GNOME Shell's focused-window token when the host
 *   reports focus, then compares later queries against it
 * - UNFOCUSED_ORACLE: fallback when no backend applies
 *
 * Every backend fails closed: a query error means "not focused".
 */

/**
 * Backend identifier, for logging.
 */
export type FocusBackend = "x11" | "gnome-shell" | "none";

export interface FocusOracle {
  readonly backend: FocusBackend;
  isHostFocused(): Promise<boolean>;
}

/**
 * Oracle used when no focus backend is available. Never reports focus.
 */
export const UNFOCUSED_ORACLE: FocusOracle = {
  backend: "none",
  isHostFocused: async () => false,
};

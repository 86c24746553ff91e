/**
 * Focus detection exports.
 */

export { type FocusOracle, type FocusBackend, UNFOCUSED_ORACLE } from "./focus-oracle";
export { X11WindowFocusOracle, parseWindowId, ACTIVE_WINDOW_TIMEOUT_MS } from "./x11-focus-oracle";
export { ShellTokenFocusOracle, FOCUSED_WINDOW_SCRIPT } from "./shell-token-focus-oracle";
export { createFocusOracle, type FocusOracleDeps } from "./create-focus-oracle";

/**
 * Focus backend selection by capability probing.
 */

import { UNFOCUSED_ORACLE, type FocusOracle } from "./focus-oracle";
import { X11WindowFocusOracle, parseWindowId } from "./x11-focus-oracle";
import { ShellTokenFocusOracle } from "./shell-token-focus-oracle";
import type { SessionEnvironment } from "../platform/session-environment";
import type { ProcessRunner } from "../platform/process";
import type { HostApplication } from "../input-sources/types";
import type { Logger } from "../logging";

export interface FocusOracleDeps {
  readonly environment: SessionEnvironment;
  readonly host: Pick<HostApplication, "windowId" | "hasApplicationFocus">;
  readonly runner: ProcessRunner;
  readonly logger: Logger;
}

/**
 * Pick the focus backend for the current session.
 *
 * - X11 session and the host exposes a window id: X11WindowFocusOracle
 * - GNOME session and the host reports its own focus: ShellTokenFocusOracle
 * - otherwise: UNFOCUSED_ORACLE (the feature never fires)
 */
export function createFocusOracle(deps: FocusOracleDeps): FocusOracle {
  const { environment, host, runner, logger } = deps;

  if (environment.sessionType === "x11" && host.windowId !== undefined) {
    const windowId = parseWindowId(host.windowId);
    if (windowId !== undefined) {
      logger.debug("Focus backend selected", { backend: "x11", windowId });
      return new X11WindowFocusOracle(windowId, runner, logger);
    }
    logger.warn("Ignoring invalid host window id", { windowId: String(host.windowId) });
  }

  if (environment.isGnome && host.hasApplicationFocus) {
    logger.debug("Focus backend selected", { backend: "gnome-shell" });
    return new ShellTokenFocusOracle(() => host.hasApplicationFocus?.() ?? false, runner, logger);
  }

  logger.warn("No focus backend for this session; layout changes will be ignored", {
    sessionType: environment.sessionType,
    gnome: environment.isGnome,
  });
  return UNFOCUSED_ORACLE;
}

/**
 * Desktop session probing from the process environment.
 */

/**
 * Windowing system of the current desktop session.
 */
export type SessionType = "x11" | "wayland" | "unknown";

/**
 * What the environment says about the desktop session.
 */
export interface SessionEnvironment {
  /** Session bus address, undefined when no bus is reachable */
  readonly busAddress: string | undefined;
  readonly sessionType: SessionType;
  /** True when XDG_CURRENT_DESKTOP lists GNOME (or a GNOME derivative) */
  readonly isGnome: boolean;
}

/**
 * Read the session environment.
 *
 * Session type comes from XDG_SESSION_TYPE; when unset, WAYLAND_DISPLAY
 * wins over DISPLAY.
 */
export function readSessionEnvironment(env: NodeJS.ProcessEnv = process.env): SessionEnvironment {
  const busAddress = env.DBUS_SESSION_BUS_ADDRESS?.trim() || undefined;
  const desktops = (env.XDG_CURRENT_DESKTOP ?? "").split(":").map((d) => d.trim().toLowerCase());

  return {
    busAddress,
    sessionType: detectSessionType(env),
    isGnome: desktops.some(isGnomeDesktop),
  };
}

function isGnomeDesktop(desktop: string): boolean {
  return (
    desktop === "gnome" ||
    desktop === "ubuntu" ||
    desktop.startsWith("gnome-") ||
    desktop.endsWith("-gnome")
  );
}

function detectSessionType(env: NodeJS.ProcessEnv): SessionType {
  const declared = env.XDG_SESSION_TYPE?.toLowerCase();
  if (declared === "x11" || declared === "wayland") {
    return declared;
  }
  if (env.WAYLAND_DISPLAY) return "wayland";
  if (env.DISPLAY) return "x11";
  return "unknown";
}

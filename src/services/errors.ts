/**
 * Error definitions for the input source sync services.
 *
 * Nothing on the notification path throws to its caller; these errors are
 * raised inside adapters and caught (and logged) at the component boundary.
 */

/**
 * Error codes for input source sync operations.
 */
export type LayoutSyncErrorCode =
  // The session bus or the legacy indicator cannot be reached
  | "TRANSPORT_UNAVAILABLE"
  // A notification body does not have the expected shape
  | "MALFORMED_NOTIFICATION"
  // Reset command or host toggle failed
  | "ACTION_FAILED"
  // Window system query failed
  | "FOCUS_QUERY_FAILED"
  // Environment configuration rejected at startup
  | "INVALID_CONFIG";

/**
 * Error raised by input source sync components.
 *
 * @example
 * ```typescript
 * throw new LayoutSyncError("TRANSPORT_UNAVAILABLE", "DBUS_SESSION_BUS_ADDRESS is not set");
 * ```
 */
export class LayoutSyncError extends Error {
  readonly name = "LayoutSyncError";

  constructor(
    /** Error code identifying the type of error */
    readonly code: LayoutSyncErrorCode,
    message: string,
    /** Underlying error, when wrapping one */
    readonly cause?: unknown
  ) {
    super(message);
    // Fix prototype chain for instanceof to work
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Type guard to check if an error is a LayoutSyncError.
 */
export function isLayoutSyncError(error: unknown): error is LayoutSyncError {
  return error instanceof LayoutSyncError;
}

/**
 * Type guard to check if an error is a LayoutSyncError with a specific code.
 */
export function isLayoutSyncErrorWithCode(
  error: unknown,
  code: LayoutSyncErrorCode
): error is LayoutSyncError {
  return isLayoutSyncError(error) && error.code === code;
}

/**
 * Extract a log-friendly message from any thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * One-shot session bus method calls through the gdbus command-line tool.
 *
 * Used for the opaque external actions (layout reset, GNOME Shell queries)
 * so they stay independent of the long-lived signal connection.
 */

import { runToCompletion, type ProcessRunner } from "./process";

/**
 * A gdbus method call.
 */
export interface GdbusCall {
  /** Well-known bus name */
  readonly dest: string;
  readonly objectPath: string;
  /** Fully qualified method, e.g. "org.gnome.Shell.Eval" */
  readonly method: string;
  /** Arguments in GVariant text format */
  readonly args: readonly string[];
}

/** Default timeout for gdbus calls */
export const GDBUS_TIMEOUT_MS = 2000;

/**
 * Build the gdbus argument vector for a call.
 */
export function gdbusArgs(call: GdbusCall): string[] {
  return [
    "call",
    "--session",
    "--dest",
    call.dest,
    "--object-path",
    call.objectPath,
    "--method",
    call.method,
    ...call.args,
  ];
}

/**
 * Run a gdbus call and return the printed reply tuple.
 *
 * @throws CommandFailedError when gdbus fails or times out
 */
export async function gdbusCall(
  runner: ProcessRunner,
  call: GdbusCall,
  timeoutMs: number = GDBUS_TIMEOUT_MS
): Promise<string> {
  const stdout = await runToCompletion(runner, "gdbus", gdbusArgs(call), timeoutMs);
  return stdout.trim();
}

/**
 * Reply of org.gnome.Shell.Eval: `(success, result)`.
 */
export interface EvalReply {
  readonly success: boolean;
  /** JSON-encoded return value of the script */
  readonly result: string;
}

const EVAL_REPLY_PATTERN = /^\((true|false),\s*(?:'((?:[^'\\]|\\.)*)'|"((?:[^"\\]|\\.)*)")\)$/s;

/**
 * Parse gdbus' printed `(bs)` reply.
 * gdbus quotes strings with apostrophes, or with double quotes when the
 * string itself contains an apostrophe.
 *
 * @returns Parsed reply, or undefined if the output has another shape
 */
export function parseEvalReply(output: string): EvalReply | undefined {
  const match = EVAL_REPLY_PATTERN.exec(output.trim());
  if (!match) return undefined;
  const quoted = match[2] ?? match[3] ?? "";
  return {
    success: match[1] === "true",
    result: quoted.replace(/\\(.)/gs, "$1"),
  };
}

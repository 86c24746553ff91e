/**
 * Parsing of commands given as a single configuration string.
 */

/**
 * Parsed command with its arguments.
 */
export interface CommandLine {
  readonly command: string;
  readonly args: readonly string[];
}

/**
 * Split a space-separated command string.
 *
 * @param value - e.g. "emacsclient --eval (toggle-input-method)"
 * @returns Parsed command, or undefined for an empty string
 * @throws Error if quotes are detected (not supported)
 */
export function parseCommandLine(value: string | undefined): CommandLine | undefined {
  if (!value || !value.trim()) {
    return undefined;
  }

  if (value.includes('"') || value.includes("'")) {
    throw new Error(
      "Quoted arguments are not supported in command strings. " +
        "Pass each argument as a single space-free token."
    );
  }

  const [command, ...args] = value.trim().split(/\s+/);
  if (command === undefined) {
    return undefined;
  }
  return { command, args };
}

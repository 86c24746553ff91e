/**
 * Process spawning utilities.
 *
 * Commands used by this project (gsettings, xdotool, the host toggle
 * command) are short-lived; callers spawn, then wait for the result.
 */

import { execa, type Options as ExecaOptions, type ResultPromise } from "execa";

/**
 * Result of a finished (or still running) process.
 */
export interface ProcessResult {
  /** Exit code, undefined when killed by a signal or still running */
  readonly exitCode?: number;
  readonly stdout: string;
  readonly stderr: string;
  /** Signal that terminated the process */
  readonly signal?: string;
  /** True when wait() timed out before the process exited */
  readonly running?: boolean;
}

/**
 * Handle to a spawned process.
 */
export interface SpawnedProcess {
  /** Process ID, undefined when spawning failed */
  readonly pid: number | undefined;
  kill(signal?: NodeJS.Signals): boolean;
  /**
   * Wait for the process to exit.
   * Never rejects: spawn failures resolve with the error text on stderr.
   *
   * @param timeout Stop waiting after this many milliseconds (process keeps running)
   */
  wait(timeout?: number): Promise<ProcessResult>;
}

/**
 * Abstraction over process spawning, for testability.
 */
export interface ProcessRunner {
  run(command: string, args: readonly string[]): SpawnedProcess;
}

/**
 * ProcessRunner implementation using execa.
 * Uses cleanup: true so children are terminated when the parent exits.
 */
export class ExecaProcessRunner implements ProcessRunner {
  run(command: string, args: readonly string[]): SpawnedProcess {
    const execaOptions: ExecaOptions = {
      cleanup: true,
      encoding: "utf8",
      // Exit codes are reported in the result, not thrown
      reject: false,
    };

    return new ExecaSpawnedProcess(execa(command, [...args], execaOptions));
  }
}

class ExecaSpawnedProcess implements SpawnedProcess {
  private resultPromise: Promise<ProcessResult> | null = null;

  constructor(private readonly subprocess: ResultPromise) {}

  get pid(): number | undefined {
    return this.subprocess.pid;
  }

  kill(signal?: NodeJS.Signals): boolean {
    return this.subprocess.kill(signal);
  }

  async wait(timeout?: number): Promise<ProcessResult> {
    const result = this.getResult();
    if (timeout === undefined) {
      return result;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<ProcessResult>((resolve) => {
      timer = setTimeout(() => resolve({ stdout: "", stderr: "", running: true }), timeout);
    });

    try {
      return await Promise.race([result, timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Settle the execa promise once and cache the mapped result.
   */
  private getResult(): Promise<ProcessResult> {
    if (!this.resultPromise) {
      this.resultPromise = this.subprocess.then(
        (result) => ({
          exitCode: result.exitCode,
          stdout: toText(result.stdout),
          stderr: toText(result.stderr) || failureMessage(result),
          signal: result.signal,
        }),
        (error: unknown) => ({
          stdout: "",
          stderr: error instanceof Error ? error.message : String(error),
        })
      );
    }
    return this.resultPromise;
  }
}

function failureMessage(result: object): string {
  if ("failed" in result && result.failed === true && "message" in result) {
    return String(result.message);
  }
  return "";
}

function toText(output: unknown): string {
  return typeof output === "string" ? output : "";
}

/**
 * Error raised by runToCompletion.
 */
export class CommandFailedError extends Error {
  readonly name = "CommandFailedError";

  constructor(
    readonly command: string,
    readonly result: ProcessResult
  ) {
    super(describeFailure(command, result));
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

function describeFailure(command: string, result: ProcessResult): string {
  if (result.running) {
    return `${command} did not exit in time`;
  }
  const detail = result.stderr.trim();
  const status = result.signal ? `signal ${result.signal}` : `exit code ${result.exitCode ?? "unknown"}`;
  return detail ? `${command} failed (${status}): ${detail}` : `${command} failed (${status})`;
}

/**
 * Run a short-lived command and return its stdout.
 * A timed-out process is killed.
 *
 * @throws CommandFailedError on spawn failure, timeout or non-zero exit
 */
export async function runToCompletion(
  runner: ProcessRunner,
  command: string,
  args: readonly string[],
  timeoutMs: number
): Promise<string> {
  const proc = runner.run(command, args);
  const result = await proc.wait(timeoutMs);
  if (result.running) {
    proc.kill("SIGKILL");
  }
  if (result.running || proc.pid === undefined || result.exitCode !== 0) {
    throw new CommandFailedError(command, result);
  }
  return result.stdout;
}

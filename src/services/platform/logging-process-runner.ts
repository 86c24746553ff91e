/**
 * LoggingProcessRunner - decorator that adds logging to ProcessRunner.
 *
 * Logs spawn, exit code, non-empty output lines and spawn failures at the
 * "process" scope. The execa runner itself has no logging dependency.
 */

import type { ProcessRunner, ProcessResult, SpawnedProcess } from "./process";
import type { Logger } from "../logging";

export class LoggingProcessRunner implements ProcessRunner {
  constructor(
    private readonly inner: ProcessRunner,
    private readonly logger: Logger
  ) {}

  run(command: string, args: readonly string[]): SpawnedProcess {
    const proc = this.inner.run(command, args);
    if (proc.pid !== undefined) {
      this.logger.debug("Spawned", { command, args: args.join(" "), pid: proc.pid });
    }
    return new LoggingSpawnedProcess(proc, command, this.logger);
  }
}

class LoggingSpawnedProcess implements SpawnedProcess {
  private logged = false;

  constructor(
    private readonly inner: SpawnedProcess,
    private readonly command: string,
    private readonly logger: Logger
  ) {}

  get pid(): number | undefined {
    return this.inner.pid;
  }

  kill(signal?: NodeJS.Signals): boolean {
    return this.inner.kill(signal);
  }

  async wait(timeout?: number): Promise<ProcessResult> {
    const result = await this.inner.wait(timeout);
    if (this.logged) return result;
    this.logged = true;

    if (this.pid === undefined) {
      this.logger.error("Spawn failed", {
        command: this.command,
        error: result.stderr || "Unknown error",
      });
      return result;
    }

    if (result.running) {
      this.logger.warn("Wait timeout", { command: this.command, timeout: timeout ?? 0 });
      return result;
    }

    this.logLines(result.stdout, "stdout");
    this.logLines(result.stderr, "stderr");
    this.logger.debug("Exited", {
      command: this.command,
      pid: this.pid,
      exitCode: result.exitCode ?? -1,
    });
    return result;
  }

  private logLines(output: string, stream: "stdout" | "stderr"): void {
    for (const line of output.split("\n")) {
      if (line.trim() === "") continue;
      this.logger.silly(`[${this.command}] ${stream}: ${line}`);
    }
  }
}

/**
 * Test utilities for process module.
 */
import { vi, type Mock } from "vitest";
import type { SpawnedProcess, ProcessResult, ProcessRunner } from "./process";

/**
 * Mock SpawnedProcess with vitest mock methods for assertions.
 */
export interface MockSpawnedProcess extends SpawnedProcess {
  kill: Mock<(signal?: NodeJS.Signals) => boolean>;
  wait: Mock<(timeout?: number) => Promise<ProcessResult>>;
}

/**
 * Mock ProcessRunner with vitest mock method for assertions.
 */
export interface MockProcessRunner extends ProcessRunner {
  run: Mock<(command: string, args: readonly string[]) => SpawnedProcess>;
}

/**
 * Create a mock SpawnedProcess resolving with the given result.
 * A pid of null simulates a spawn failure.
 */
export function createMockSpawnedProcess(overrides?: {
  pid?: number | null;
  result?: Partial<ProcessResult>;
}): MockSpawnedProcess {
  const result: ProcessResult = { exitCode: 0, stdout: "", stderr: "", ...overrides?.result };
  const pid = overrides?.pid === null ? undefined : (overrides?.pid ?? 4242);

  return {
    pid,
    kill: vi.fn().mockReturnValue(true),
    wait: vi.fn().mockResolvedValue(result),
  };
}

/**
 * Create a mock ProcessRunner.
 *
 * Accepts either a single process returned for every call, or a map from
 * command name to process.
 */
export function createMockProcessRunner(
  spawned?: SpawnedProcess | Record<string, SpawnedProcess>
): MockProcessRunner {
  const fallback = createMockSpawnedProcess();
  return {
    run: vi.fn((command: string, _args: readonly string[]) => {
      if (spawned === undefined) return fallback;
      if (isSpawnedProcess(spawned)) return spawned;
      return spawned[command] ?? fallback;
    }),
  };
}

function isSpawnedProcess(value: SpawnedProcess | Record<string, SpawnedProcess>): value is SpawnedProcess {
  return typeof value.wait === "function";
}

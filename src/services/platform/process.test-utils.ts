/**
 * Test utilities for process module.
 */
import { vi, type Mock } from "vitest";
import type { SpawnedProcess, ProcessResult, ProcessRunner, ProcessOptions } from "./process";

/**
 * Mock SpawnedProcess with vitest mock methods for assertions.
 */
export interface MockSpawnedProcess extends SpawnedProcess {
  wait: Mock<() => Promise<ProcessResult>>;
}

/**
 * Mock ProcessRunner with vitest mock method for assertions.
 */
export interface MockProcessRunner extends ProcessRunner {
  run: Mock<(command: string, args: readonly string[], options?: ProcessOptions) => SpawnedProcess>;
}

/**
 * Create a mock SpawnedProcess with controllable behavior.
 *
 * @param overrides.pid - Process ID (defaults to 12345, set to null to simulate spawn failure)
 * @param overrides.waitResult - Result for wait() (can be a value or async function)
 */
export function createMockSpawnedProcess(overrides?: {
  /** Set to null to simulate spawn failure (pid will be undefined) */
  pid?: number | null;
  waitResult?: Partial<ProcessResult> | (() => Promise<ProcessResult>);
}): MockSpawnedProcess {
  const defaultResult: ProcessResult = {
    exitCode: 0,
    stdout: "",
    stderr: "",
  };

  const pid = overrides?.pid === null ? undefined : (overrides?.pid ?? 12345);
  const waitResult = overrides?.waitResult;

  return {
    pid,
    wait: vi.fn(async (): Promise<ProcessResult> => {
      if (typeof waitResult === "function") {
        return waitResult();
      }
      return { ...defaultResult, ...waitResult };
    }),
  };
}

/**
 * Create a mock ProcessRunner.
 *
 * Pass a SpawnedProcess to return it for every call, or a function to pick
 * one per command.
 *
 * @example
 * const runner = createMockProcessRunner((command) =>
 *   createMockSpawnedProcess({ waitResult: command === "which" ? { stdout: "/usr/bin/pkl\n" } : {} })
 * );
 */
export function createMockProcessRunner(
  spawnedProcess?: SpawnedProcess | ((command: string, args: readonly string[]) => SpawnedProcess)
): MockProcessRunner {
  return {
    run: vi.fn((command: string, args: readonly string[]): SpawnedProcess => {
      if (typeof spawnedProcess === "function") {
        return spawnedProcess(command, args);
      }
      return spawnedProcess ?? createMockSpawnedProcess();
    }),
  };
}

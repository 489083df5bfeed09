// @vitest-environment node
/**
 * Unit tests for ExecaSpawnedProcess result conversion and logging.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ExecaSpawnedProcess } from "./process";
import { createMockLogger, type MockLogger } from "../logging/logging.test-utils";

function fakeSubprocess(
  pid: number | undefined,
  result: Promise<{ stdout?: unknown; stderr?: unknown; exitCode?: number; signal?: string }>
) {
  return Object.assign(result, { pid });
}

describe("ExecaSpawnedProcess", () => {
  let logger: MockLogger;

  beforeEach(() => {
    logger = createMockLogger();
  });

  it("converts a normal exit", async () => {
    const proc = new ExecaSpawnedProcess(
      fakeSubprocess(42, Promise.resolve({ stdout: "out", stderr: "err", exitCode: 3 })),
      logger,
      "pkl"
    );

    expect(proc.pid).toBe(42);
    expect(await proc.wait()).toEqual({ stdout: "out", stderr: "err", exitCode: 3 });
  });

  it("keeps the signal of a killed process", async () => {
    const proc = new ExecaSpawnedProcess(
      fakeSubprocess(42, Promise.resolve({ stdout: "", stderr: "", signal: "SIGTERM" })),
      logger,
      "pkl"
    );

    expect(await proc.wait()).toEqual({ stdout: "", stderr: "", exitCode: null, signal: "SIGTERM" });
  });

  it("treats non-string output as empty", async () => {
    const proc = new ExecaSpawnedProcess(
      fakeSubprocess(42, Promise.resolve({ stdout: undefined, stderr: ["x"], exitCode: 0 })),
      logger,
      "pkl"
    );

    expect(await proc.wait()).toEqual({ stdout: "", stderr: "", exitCode: 0 });
  });

  it("returns the same result on every wait", async () => {
    const proc = new ExecaSpawnedProcess(
      fakeSubprocess(42, Promise.resolve({ stdout: "a", stderr: "", exitCode: 0 })),
      logger,
      "pkl"
    );

    const first = await proc.wait();
    const second = await proc.wait();

    expect(second).toBe(first);
    expect(logger.debug).toHaveBeenCalledTimes(1);
  });

  it("converts an unexpected rejection into a failed result", async () => {
    const proc = new ExecaSpawnedProcess(
      fakeSubprocess(undefined, Promise.reject(new Error("spawn EACCES"))),
      logger,
      "pkl"
    );

    expect(await proc.wait()).toEqual({ stdout: "", stderr: "spawn EACCES", exitCode: null });
    expect(logger.error).toHaveBeenCalledWith("Spawn failed", { command: "pkl", error: "spawn EACCES" });
  });

  it("logs output lines and the exit status", async () => {
    const proc = new ExecaSpawnedProcess(
      fakeSubprocess(7, Promise.resolve({ stdout: "line1\n\nline2", stderr: "warn", exitCode: 0 })),
      logger,
      "pkl"
    );

    await proc.wait();

    expect(logger.silly.mock.calls.map(([message]) => message)).toEqual([
      "[pkl 7] stdout: line1",
      "[pkl 7] stdout: line2",
      "[pkl 7] stderr: warn",
    ]);
    expect(logger.debug).toHaveBeenCalledWith("Exited", {
      command: "pkl",
      pid: 7,
      exitCode: 0,
      signal: null,
    });
  });
});

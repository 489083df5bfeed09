/**
 * Process spawning utilities.
 */

import { execa, ExecaError } from "execa";
import type { Logger } from "../logging";
import { getErrorMessage } from "../../shared/error-utils";

export interface ProcessOptions {
  /** Working directory for the process */
  readonly cwd?: string;
  /**
   * Environment variables.
   * When provided, replaces process.env entirely (no merging).
   */
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Result of running a process command.
 */
export interface ProcessResult {
  readonly stdout: string;
  readonly stderr: string;
  /**
   * Exit code, or null if process didn't exit normally.
   * null when: killed by signal or spawn error.
   */
  readonly exitCode: number | null;
  /** Signal name if process was killed (e.g., 'SIGTERM', 'SIGKILL') */
  readonly signal?: string;
}

/**
 * Handle for a spawned process.
 */
export interface SpawnedProcess {
  /**
   * Process ID.
   * undefined if process failed to spawn (e.g., ENOENT, EACCES).
   */
  readonly pid: number | undefined;

  /**
   * Wait for the process to exit.
   * Never throws for process exit status or spawn failures - check result fields instead.
   *
   * @example
   * const result = await proc.wait();
   * if (result.exitCode !== 0) {
   *   console.error(result.stderr);
   * }
   */
  wait(): Promise<ProcessResult>;
}

/**
 * Interface for running external processes.
 * Allows dependency injection for testing.
 */
export interface ProcessRunner {
  /**
   * Start a process and return a handle to it.
   * Returns synchronously - the process is spawned immediately.
   *
   * @example
   * const proc = runner.run('pkl', ['eval', '--format', 'json', 'config.pkl']);
   * const result = await proc.wait();
   */
  run(command: string, args: readonly string[], options?: ProcessOptions): SpawnedProcess;
}

/**
 * The parts of an execa result this module reads.
 */
interface RawResult {
  readonly stdout?: unknown;
  readonly stderr?: unknown;
  readonly exitCode?: number | undefined;
  readonly signal?: string | undefined;
}

type Subprocess = PromiseLike<RawResult> & { readonly pid?: number | undefined };

/**
 * SpawnedProcess implementation wrapping an execa subprocess.
 */
export class ExecaSpawnedProcess implements SpawnedProcess {
  readonly pid: number | undefined;
  private readonly completion: Promise<ProcessResult>;

  constructor(
    subprocess: Subprocess,
    private readonly logger: Logger,
    private readonly command: string
  ) {
    this.pid = subprocess.pid;
    this.completion = this.waitForProcess(subprocess);
  }

  wait(): Promise<ProcessResult> {
    return this.completion;
  }

  private async waitForProcess(subprocess: Subprocess): Promise<ProcessResult> {
    let result: ProcessResult;
    try {
      result = this.convertResult(await subprocess);
    } catch (error) {
      // reject: false makes execa resolve on failure; anything else is unexpected
      result = { stdout: "", stderr: getErrorMessage(error), exitCode: null };
    }

    if (result.exitCode === null && result.signal === undefined) {
      this.logger.error("Spawn failed", { command: this.command, error: result.stderr });
    } else {
      this.logResult(result);
    }
    return result;
  }

  /**
   * Log the result of a completed process.
   */
  private logResult(result: ProcessResult): void {
    this.logOutputLines(result.stdout, "stdout");
    this.logOutputLines(result.stderr, "stderr");

    this.logger.debug("Exited", {
      command: this.command,
      pid: this.pid ?? 0,
      exitCode: result.exitCode ?? -1,
      signal: result.signal ?? null,
    });
  }

  /**
   * Log output lines (stdout or stderr) at SILLY level.
   */
  private logOutputLines(output: string, stream: "stdout" | "stderr"): void {
    if (!output) return;

    const prefix = `[${this.command} ${this.pid ?? 0}]`;
    for (const line of output.split("\n")) {
      if (line.trim() === "") continue;
      this.logger.silly(`${prefix} ${stream}: ${line}`);
    }
  }

  private convertResult(result: RawResult): ProcessResult {
    // For spawn errors (ENOENT, EACCES), execa resolves with an ExecaError
    // and puts the reason in originalMessage (with reject: false)
    let stderr = typeof result.stderr === "string" ? result.stderr : "";
    if (result instanceof ExecaError && result.exitCode === undefined && !stderr) {
      stderr = result.originalMessage;
    }

    const processResult: ProcessResult = {
      stdout: typeof result.stdout === "string" ? result.stdout : "",
      stderr,
      exitCode: result.exitCode ?? null,
    };
    if (result.signal) {
      return { ...processResult, signal: result.signal };
    }
    return processResult;
  }
}

/**
 * Process runner implementation using execa.
 */
export class ExecaProcessRunner implements ProcessRunner {
  constructor(private readonly logger: Logger) {}

  run(command: string, args: readonly string[], options?: ProcessOptions): SpawnedProcess {
    const subprocess = execa(command, [...args], {
      cleanup: true,
      encoding: "utf8",
      reject: false, // Don't throw on non-zero exit - check exitCode instead
      ...(options?.cwd && { cwd: options.cwd }),
      // When custom env is provided, disable extendEnv so that deleted keys
      // from the custom env are actually removed (not inherited from process.env)
      ...(options?.env && { env: options.env, extendEnv: false }),
    });

    const spawned = new ExecaSpawnedProcess(subprocess, this.logger, command);

    // Spawn failures are logged when the result settles
    if (spawned.pid !== undefined) {
      this.logger.debug("Spawned", { command, args: args.join(" "), pid: spawned.pid });
    }

    return spawned;
  }
}

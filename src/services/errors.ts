/**
 * Service error definitions with serialization support for machine-readable output.
 */

import type { FileSystemErrorCode } from "./platform/filesystem";

/**
 * Error codes for pkl provisioning operations.
 */
export type ProvisionErrorCode =
  | "NETWORK_ERROR"
  | "BAD_STATUS"
  | "PARSE_ERROR"
  | "UNSUPPORTED_PLATFORM"
  | "IO_ERROR";

/**
 * Serialized error format for `--json` output.
 */
export interface SerializedError {
  readonly type: "provision" | "filesystem" | "config" | "process" | "cli";
  readonly message: string;
  readonly code?: string;
  readonly path?: string;
  readonly status?: number;
}

/**
 * Base class for all service errors.
 */
export abstract class ServiceError extends Error {
  abstract readonly type: SerializedError["type"];
  readonly code: string | undefined;

  constructor(message: string, code?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code ?? undefined;
    // Fix prototype chain for instanceof to work
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serialize the error for machine-readable output.
   */
  toJSON(): SerializedError {
    const result: SerializedError = {
      type: this.type,
      message: this.message,
    };
    if (this.code !== undefined) {
      return { ...result, code: this.code };
    }
    return result;
  }
}

/**
 * Extra detail attached to a ProvisionError, depending on its code.
 */
export interface ProvisionErrorDetails {
  /** HTTP status of a BAD_STATUS response */
  readonly status?: number;
  /** Host OS identifier of an UNSUPPORTED_PLATFORM failure */
  readonly os?: string;
  /** Host architecture identifier of an UNSUPPORTED_PLATFORM failure */
  readonly arch?: string;
  /** Underlying error */
  readonly cause?: unknown;
}

/**
 * Error from pkl provisioning (release lookup, artifact resolution, download, install).
 */
export class ProvisionError extends ServiceError {
  readonly type = "provision" as const;
  readonly status: number | undefined;
  readonly os: string | undefined;
  readonly arch: string | undefined;

  constructor(
    message: string,
    readonly errorCode: ProvisionErrorCode,
    details: ProvisionErrorDetails = {}
  ) {
    super(message, errorCode, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "ProvisionError";
    this.status = details.status;
    this.os = details.os;
    this.arch = details.arch;
  }

  /**
   * Wrap this error with a stage prefix, keeping code and details.
   *
   * @example
   * throw error.wrap("failed to get latest version");
   * // "failed to get latest version: failed to fetch latest release: status code 503"
   */
  wrap(prefix: string): ProvisionError {
    return new ProvisionError(`${prefix}: ${this.message}`, this.errorCode, {
      ...(this.status !== undefined && { status: this.status }),
      ...(this.os !== undefined && { os: this.os }),
      ...(this.arch !== undefined && { arch: this.arch }),
      cause: this,
    });
  }

  override toJSON(): SerializedError {
    const result: SerializedError = {
      type: this.type,
      message: this.message,
      code: this.errorCode,
    };
    if (this.status !== undefined) {
      return { ...result, status: this.status };
    }
    return result;
  }
}

/**
 * Error from loading configuration.
 */
export class ConfigError extends ServiceError {
  readonly type = "config" as const;
}

/**
 * Error from running an external process.
 */
export class ProcessError extends ServiceError {
  readonly type = "process" as const;
}

/**
 * Error codes for command-line flow failures.
 */
export type CliErrorCode = "PKL_NOT_FOUND" | "PROVISION_FAILED";

/**
 * Error reported by a CLI command to the user.
 */
export class CliError extends ServiceError {
  readonly type = "cli" as const;

  constructor(
    message: string,
    readonly cliCode: CliErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, cliCode, options);
    this.name = "CliError";
  }
}

/**
 * Error from filesystem operations.
 */
export class FileSystemError extends ServiceError {
  readonly type = "filesystem" as const;

  constructor(
    /** Mapped error code */
    readonly fsCode: FileSystemErrorCode,
    /** Path that caused the error */
    readonly path: string,
    message: string,
    /** Original error for debugging */
    cause?: Error,
    /** Original Node.js error code (e.g., "EMFILE", "ENOSPC") */
    readonly originalCode?: string
  ) {
    super(message, fsCode, cause === undefined ? undefined : { cause });
    this.name = "FileSystemError";
  }

  override toJSON(): SerializedError {
    return {
      type: this.type,
      message: this.message,
      path: this.path,
      code: this.fsCode,
    };
  }
}

/**
 * Type guard to check if an error is a ServiceError.
 */
export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

export { getErrorMessage } from "../shared/error-utils";

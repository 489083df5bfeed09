/**
 * FileSystemLayer - Abstraction over filesystem operations.
 *
 * Provides an injectable interface for filesystem access, enabling:
 * - Unit testing of services with mock FileSystemLayer
 * - Boundary testing of DefaultFileSystemLayer against real filesystem
 * - Consistent error handling via FileSystemError
 */

import * as fs from "node:fs/promises";
import { FileSystemError } from "../errors";
import type { Logger } from "../logging";

/**
 * Options for mkdir operation.
 */
export interface MkdirOptions {
  /** Create parent directories if they don't exist (default: true) */
  readonly recursive?: boolean;
}

/**
 * Options for rm operation.
 */
export interface RmOptions {
  /** Remove directories and their contents recursively (default: false) */
  readonly recursive?: boolean;
  /** Ignore errors if path doesn't exist (default: false) */
  readonly force?: boolean;
}

/**
 * Error codes for filesystem operations.
 */
export type FileSystemErrorCode =
  | "ENOENT" // File/directory not found
  | "EACCES" // Permission denied
  | "EEXIST" // File/directory already exists
  | "ENOTDIR" // Not a directory
  | "EISDIR" // Is a directory (when file expected)
  | "ENOTEMPTY" // Directory not empty
  | "UNKNOWN"; // Other errors (check originalCode)

/**
 * Abstraction over filesystem operations.
 * Enables unit testing of services that need filesystem access.
 *
 * All paths are absolute native paths.
 * Methods throw FileSystemError on failures.
 *
 * NOTE: No exists() method - use try/catch on actual operations to avoid TOCTOU races.
 */
export interface FileSystemLayer {
  /**
   * Read entire file as UTF-8 string.
   *
   * @throws FileSystemError with code ENOENT if file not found
   * @throws FileSystemError with code EACCES if permission denied
   * @throws FileSystemError with code EISDIR if path is a directory
   *
   * @example
   * const content = await fs.readFile('/home/user/.config/pkl-provisioner/config.json');
   * const config = JSON.parse(content);
   */
  readFile(path: string): Promise<string>;

  /**
   * Create directory. Creates parent directories by default.
   * No-op if directory already exists.
   *
   * @throws FileSystemError with code EEXIST if path exists as a file
   * @throws FileSystemError with code EACCES if permission denied
   */
  mkdir(path: string, options?: MkdirOptions): Promise<void>;

  /**
   * Create or truncate a file and write every chunk of `chunks` to it, in order.
   *
   * Errors thrown by the chunk source propagate unchanged; only failures of the
   * file itself become FileSystemError. The file is closed in every case and
   * is left in place on failure.
   *
   * @returns Number of bytes written
   * @throws FileSystemError with code ENOENT if parent directory doesn't exist
   * @throws FileSystemError with code EACCES if permission denied
   * @throws FileSystemError with code EISDIR if path is a directory
   *
   * @example
   * const bytes = await fs.writeFileStream('/home/user/.local/bin/pkl', chunks);
   */
  writeFileStream(path: string, chunks: AsyncIterable<Uint8Array>): Promise<number>;

  /**
   * Set the permission bits of a file.
   *
   * @throws FileSystemError with code ENOENT if file not found
   * @throws FileSystemError with code EACCES if permission denied
   *
   * @example Make a binary executable
   * await fs.chmod('/home/user/.local/bin/pkl', 0o755);
   */
  chmod(path: string, mode: number): Promise<void>;

  /**
   * Delete file or directory.
   *
   * @throws FileSystemError with code ENOENT if path not found (unless force: true)
   * @throws FileSystemError with code EACCES if permission denied
   *
   * @example Remove if exists (no error if missing)
   * await fs.rm('/path/to/maybe', { force: true });
   */
  rm(path: string, options?: RmOptions): Promise<void>;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Known error codes that map to FileSystemErrorCode.
 */
const KNOWN_ERROR_CODES: ReadonlySet<string> = new Set<FileSystemErrorCode>([
  "ENOENT",
  "EACCES",
  "EEXIST",
  "ENOTDIR",
  "EISDIR",
  "ENOTEMPTY",
]);

function isKnownErrorCode(code: string): code is FileSystemErrorCode {
  return KNOWN_ERROR_CODES.has(code);
}

/**
 * Extract the POSIX error code from a Node.js error.
 * fs.rm() reports SystemErrors with ERR_FS_* codes whose `info.code` holds
 * the POSIX code; everything else carries it in `code`.
 */
function extractErrorCode(error: Error): string | undefined {
  if (
    "info" in error &&
    typeof error.info === "object" &&
    error.info !== null &&
    "code" in error.info &&
    typeof error.info.code === "string"
  ) {
    return error.info.code;
  }
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Map a Node.js filesystem error to a FileSystemError.
 */
function mapError(error: unknown, path: string): FileSystemError {
  if (!(error instanceof Error)) {
    return new FileSystemError("UNKNOWN", path, String(error));
  }

  const code = extractErrorCode(error);

  if (code && isKnownErrorCode(code)) {
    return new FileSystemError(code, path, error.message, error);
  }

  // Unknown error code - preserve original code
  return new FileSystemError("UNKNOWN", path, error.message, error, code);
}

// ============================================================================
// DefaultFileSystemLayer Implementation
// ============================================================================

/**
 * Default implementation of FileSystemLayer using node:fs/promises.
 * Maps Node.js errors to FileSystemError for consistent error handling.
 */
export class DefaultFileSystemLayer implements FileSystemLayer {
  constructor(private readonly logger: Logger) {}

  async readFile(filePath: string): Promise<string> {
    this.logger.debug("Read", { path: filePath });
    try {
      return await fs.readFile(filePath, "utf-8");
    } catch (error) {
      throw this.fail("Read", error, filePath);
    }
  }

  async mkdir(dirPath: string, options?: MkdirOptions): Promise<void> {
    const recursive = options?.recursive ?? true;
    this.logger.debug("Mkdir", { path: dirPath });
    try {
      await fs.mkdir(dirPath, { recursive });
    } catch (error) {
      throw this.fail("Mkdir", error, dirPath);
    }
  }

  async writeFileStream(filePath: string, chunks: AsyncIterable<Uint8Array>): Promise<number> {
    this.logger.debug("WriteStream", { path: filePath });

    let handle: fs.FileHandle;
    try {
      handle = await fs.open(filePath, "w");
    } catch (error) {
      throw this.fail("WriteStream", error, filePath);
    }

    let bytes = 0;
    try {
      for await (const chunk of chunks) {
        await this.writeChunk(handle, chunk, filePath);
        bytes += chunk.byteLength;
      }
    } finally {
      await handle.close();
    }

    this.logger.debug("WriteStream complete", { path: filePath, bytes });
    return bytes;
  }

  async chmod(filePath: string, mode: number): Promise<void> {
    this.logger.debug("Chmod", { path: filePath, mode: mode.toString(8) });
    try {
      await fs.chmod(filePath, mode);
    } catch (error) {
      throw this.fail("Chmod", error, filePath);
    }
  }

  async rm(targetPath: string, options?: RmOptions): Promise<void> {
    const recursive = options?.recursive ?? false;
    const force = options?.force ?? false;
    this.logger.debug("Rm", { path: targetPath, recursive });
    try {
      await fs.rm(targetPath, { recursive, force });
    } catch (error) {
      throw this.fail("Rm", error, targetPath);
    }
  }

  private async writeChunk(handle: fs.FileHandle, chunk: Uint8Array, filePath: string): Promise<void> {
    let offset = 0;
    while (offset < chunk.byteLength) {
      try {
        const { bytesWritten } = await handle.write(chunk, offset);
        offset += bytesWritten;
      } catch (error) {
        throw this.fail("WriteStream", error, filePath);
      }
    }
  }

  private fail(operation: string, error: unknown, path: string): FileSystemError {
    const fsError = mapError(error, path);
    this.logger.warn(`${operation} failed`, {
      path,
      code: fsError.fsCode,
      error: fsError.message,
    });
    return fsError;
  }
}

/**
 * Test utilities for FileSystemLayer mocking.
 *
 * Provides mock factory for FileSystemLayer to enable easy unit testing of consumers.
 */

import { vi, type Mock } from "vitest";
import type { FileSystemLayer, MkdirOptions, RmOptions } from "./filesystem";
import type { FileSystemError } from "../errors";

// ============================================================================
// Mock Option Types
// ============================================================================

/**
 * Options for mock readFile method.
 */
export interface MockReadFileOptions {
  /** Content to return */
  readonly content?: string;
  /** Error to throw */
  readonly error?: FileSystemError;
  /** Custom implementation */
  readonly implementation?: (path: string) => Promise<string>;
}

/**
 * Options for mock mkdir method.
 */
export interface MockMkdirOptions {
  /** Error to throw */
  readonly error?: FileSystemError;
  /** Custom implementation */
  readonly implementation?: (path: string, options?: MkdirOptions) => Promise<void>;
}

/**
 * Options for mock writeFileStream method.
 */
export interface MockWriteFileStreamOptions {
  /** Error to throw before any chunk is consumed */
  readonly error?: FileSystemError;
  /** Custom implementation */
  readonly implementation?: (path: string, chunks: AsyncIterable<Uint8Array>) => Promise<number>;
}

/**
 * Options for mock chmod method.
 */
export interface MockChmodOptions {
  /** Error to throw */
  readonly error?: FileSystemError;
  /** Custom implementation */
  readonly implementation?: (path: string, mode: number) => Promise<void>;
}

/**
 * Options for mock rm method.
 */
export interface MockRmOptions {
  /** Error to throw */
  readonly error?: FileSystemError;
  /** Custom implementation */
  readonly implementation?: (path: string, options?: RmOptions) => Promise<void>;
}

/**
 * Options for creating a mock FileSystemLayer.
 */
export interface MockFileSystemLayerOptions {
  readonly readFile?: MockReadFileOptions;
  readonly mkdir?: MockMkdirOptions;
  readonly writeFileStream?: MockWriteFileStreamOptions;
  readonly chmod?: MockChmodOptions;
  readonly rm?: MockRmOptions;
}

// ============================================================================
// Mock FileSystemLayer Factory
// ============================================================================

/**
 * Drain a chunk source, returning the concatenated bytes.
 * Errors from the source propagate, as they do from the real layer.
 */
export async function collectChunks(chunks: AsyncIterable<Uint8Array>): Promise<Uint8Array> {
  const parts: Uint8Array[] = [];
  let total = 0;
  for await (const chunk of chunks) {
    parts.push(chunk);
    total += chunk.byteLength;
  }
  const result = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.byteLength;
  }
  return result;
}

/**
 * Create mock FileSystemLayer for testing.
 * By default reads return "", writes drain their chunks and succeed.
 *
 * @example Throw specific error
 * const mockFs = createMockFileSystemLayer({
 *   readFile: { error: new FileSystemError('ENOENT', '/path', 'Not found') }
 * });
 */
export function createMockFileSystemLayer(options?: MockFileSystemLayerOptions): FileSystemLayer {
  return {
    async readFile(path: string): Promise<string> {
      if (options?.readFile?.implementation) {
        return options.readFile.implementation(path);
      }
      if (options?.readFile?.error) {
        throw options.readFile.error;
      }
      return options?.readFile?.content ?? "";
    },

    async mkdir(path: string, mkdirOptions?: MkdirOptions): Promise<void> {
      if (options?.mkdir?.implementation) {
        return options.mkdir.implementation(path, mkdirOptions);
      }
      if (options?.mkdir?.error) {
        throw options.mkdir.error;
      }
    },

    async writeFileStream(path: string, chunks: AsyncIterable<Uint8Array>): Promise<number> {
      if (options?.writeFileStream?.implementation) {
        return options.writeFileStream.implementation(path, chunks);
      }
      if (options?.writeFileStream?.error) {
        throw options.writeFileStream.error;
      }
      const bytes = await collectChunks(chunks);
      return bytes.byteLength;
    },

    async chmod(path: string, mode: number): Promise<void> {
      if (options?.chmod?.implementation) {
        return options.chmod.implementation(path, mode);
      }
      if (options?.chmod?.error) {
        throw options.chmod.error;
      }
    },

    async rm(path: string, rmOptions?: RmOptions): Promise<void> {
      if (options?.rm?.implementation) {
        return options.rm.implementation(path, rmOptions);
      }
      if (options?.rm?.error) {
        throw options.rm.error;
      }
    },
  };
}

// ============================================================================
// Spy FileSystemLayer Factory
// ============================================================================

/**
 * FileSystemLayer with vi.fn() spies for asserting on method calls.
 */
export interface SpyFileSystemLayer extends FileSystemLayer {
  readFile: Mock<FileSystemLayer["readFile"]>;
  mkdir: Mock<FileSystemLayer["mkdir"]>;
  writeFileStream: Mock<FileSystemLayer["writeFileStream"]>;
  chmod: Mock<FileSystemLayer["chmod"]>;
  rm: Mock<FileSystemLayer["rm"]>;
}

/**
 * Create a FileSystemLayer with vi.fn() spies for testing.
 *
 * @example
 * ```typescript
 * const fs = createSpyFileSystemLayer();
 * await installer.fetchAndInstall(url, target);
 * expect(fs.chmod).toHaveBeenCalledWith('/bin/pkl', 0o755);
 * ```
 */
export function createSpyFileSystemLayer(options?: MockFileSystemLayerOptions): SpyFileSystemLayer {
  const mock = createMockFileSystemLayer(options);
  return {
    readFile: vi.fn(mock.readFile),
    mkdir: vi.fn(mock.mkdir),
    writeFileStream: vi.fn(mock.writeFileStream),
    chmod: vi.fn(mock.chmod),
    rm: vi.fn(mock.rm),
  };
}

// @vitest-environment node
/**
 * Boundary tests for DefaultFileSystemLayer.
 * Tests filesystem operations against real filesystem with temp directories.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { readFile as nodeReadFile, writeFile as nodeWriteFile, mkdir as nodeMkdir, stat } from "node:fs/promises";
import { DefaultFileSystemLayer } from "./filesystem";
import { FileSystemError } from "../errors";
import { createTempDir } from "../test-utils";
import { createMockLogger, type MockLogger } from "../logging/logging.test-utils";

async function* chunksOf(...parts: string[]): AsyncGenerator<Uint8Array> {
  const encoder = new TextEncoder();
  for (const part of parts) {
    yield encoder.encode(part);
  }
}

describe("DefaultFileSystemLayer", () => {
  let fs: DefaultFileSystemLayer;
  let logger: MockLogger;
  let tempDir: { path: string; cleanup: () => Promise<void> };

  beforeEach(async () => {
    logger = createMockLogger();
    fs = new DefaultFileSystemLayer(logger);
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await tempDir.cleanup();
  });

  describe("readFile", () => {
    it("reads file content", async () => {
      const filePath = join(tempDir.path, "config.json");
      await nodeWriteFile(filePath, '{"installDir":"/opt/bin"}', "utf-8");

      const content = await fs.readFile(filePath);

      expect(content).toBe('{"installDir":"/opt/bin"}');
    });

    it("throws ENOENT for non-existent file", async () => {
      const filePath = join(tempDir.path, "missing.json");

      await expect(fs.readFile(filePath)).rejects.toBeInstanceOf(FileSystemError);
      await expect(fs.readFile(filePath)).rejects.toMatchObject({ fsCode: "ENOENT", path: filePath });
    });

    it("throws EISDIR when reading a directory", async () => {
      const dirPath = join(tempDir.path, "a-dir");
      await nodeMkdir(dirPath);

      await expect(fs.readFile(dirPath)).rejects.toMatchObject({ fsCode: "EISDIR", path: dirPath });
    });

    it("logs a warning on failure", async () => {
      const filePath = join(tempDir.path, "missing.json");

      await expect(fs.readFile(filePath)).rejects.toThrow(FileSystemError);

      expect(logger.warn).toHaveBeenCalledWith(
        "Read failed",
        expect.objectContaining({ path: filePath, code: "ENOENT" })
      );
    });
  });

  describe("mkdir", () => {
    it("creates nested directories", async () => {
      const dirPath = join(tempDir.path, "a", "b", "c");

      await fs.mkdir(dirPath);

      const stats = await stat(dirPath);
      expect(stats.isDirectory()).toBe(true);
    });

    it("is a no-op for an existing directory", async () => {
      await fs.mkdir(tempDir.path);

      const stats = await stat(tempDir.path);
      expect(stats.isDirectory()).toBe(true);
    });

    it("throws EEXIST when the path is a file", async () => {
      const filePath = join(tempDir.path, "file");
      await nodeWriteFile(filePath, "x");

      await expect(fs.mkdir(filePath)).rejects.toMatchObject({ fsCode: "EEXIST" });
    });
  });

  describe("writeFileStream", () => {
    it("writes all chunks in order and returns the byte count", async () => {
      const filePath = join(tempDir.path, "pkl");

      const bytes = await fs.writeFileStream(filePath, chunksOf("#!/bin/sh\n", "echo pkl\n"));

      expect(bytes).toBe(19);
      expect(await nodeReadFile(filePath, "utf-8")).toBe("#!/bin/sh\necho pkl\n");
    });

    it("truncates an existing file", async () => {
      const filePath = join(tempDir.path, "pkl");
      await nodeWriteFile(filePath, "an older and much longer binary");

      await fs.writeFileStream(filePath, chunksOf("new"));

      expect(await nodeReadFile(filePath, "utf-8")).toBe("new");
    });

    it("creates an empty file for an empty source", async () => {
      const filePath = join(tempDir.path, "empty");

      const bytes = await fs.writeFileStream(filePath, chunksOf());

      expect(bytes).toBe(0);
      expect((await stat(filePath)).size).toBe(0);
    });

    it("throws ENOENT when the parent directory is missing", async () => {
      const filePath = join(tempDir.path, "missing", "pkl");

      await expect(fs.writeFileStream(filePath, chunksOf("x"))).rejects.toMatchObject({
        fsCode: "ENOENT",
        path: filePath,
      });
    });

    it("propagates source errors unchanged and keeps the partial file", async () => {
      const filePath = join(tempDir.path, "pkl");
      const sourceError = new Error("connection reset");
      async function* failing(): AsyncGenerator<Uint8Array> {
        yield new TextEncoder().encode("partial");
        throw sourceError;
      }

      await expect(fs.writeFileStream(filePath, failing())).rejects.toBe(sourceError);

      expect(await nodeReadFile(filePath, "utf-8")).toBe("partial");
    });
  });

  describe("chmod", () => {
    it.skipIf(process.platform === "win32")("sets permission bits", async () => {
      const filePath = join(tempDir.path, "pkl");
      await nodeWriteFile(filePath, "binary");

      await fs.chmod(filePath, 0o755);

      expect((await stat(filePath)).mode & 0o777).toBe(0o755);
    });

    it("throws ENOENT for non-existent file", async () => {
      const filePath = join(tempDir.path, "missing");

      await expect(fs.chmod(filePath, 0o755)).rejects.toMatchObject({ fsCode: "ENOENT" });
    });
  });

  describe("rm", () => {
    it("removes a file", async () => {
      const filePath = join(tempDir.path, "pkl");
      await nodeWriteFile(filePath, "binary");

      await fs.rm(filePath);

      await expect(stat(filePath)).rejects.toThrow();
    });

    it("ignores a missing path with force", async () => {
      await expect(fs.rm(join(tempDir.path, "missing"), { force: true })).resolves.toBeUndefined();
    });

    it("throws ENOENT for a missing path without force", async () => {
      const filePath = join(tempDir.path, "missing");

      await expect(fs.rm(filePath)).rejects.toMatchObject({ fsCode: "ENOENT", path: filePath });
    });

    it("removes a directory tree with recursive", async () => {
      const dirPath = join(tempDir.path, "tree");
      await nodeMkdir(join(dirPath, "nested"), { recursive: true });
      await nodeWriteFile(join(dirPath, "nested", "file"), "x");

      await fs.rm(dirPath, { recursive: true });

      await expect(stat(dirPath)).rejects.toThrow();
    });
  });
});

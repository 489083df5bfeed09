/**
 * Tests for HttpBinaryInstaller with mocked network and filesystem.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { HttpBinaryInstaller } from "./binary-installer";
import { EXECUTABLE_MODE } from "./types";
import { FileSystemError, ProvisionError } from "../errors";
import { createMockHttpClient, type ConfiguredResponse } from "../platform/network.test-utils";
import {
  collectChunks,
  createSpyFileSystemLayer,
  type MockFileSystemLayerOptions,
} from "../platform/filesystem.test-utils";
import { createMockLogger, type MockLogger } from "../logging/logging.test-utils";

const LOCATOR = "https://github.com/apple/pkl/releases/download/0.28.2/pkl-linux-amd64";
const TARGET = { path: "/home/test/.local/bin/pkl", mode: EXECUTABLE_MODE };

describe("HttpBinaryInstaller", () => {
  let logger: MockLogger;

  beforeEach(() => {
    logger = createMockLogger();
  });

  function createInstaller(response: ConfiguredResponse, fsOptions?: MockFileSystemLayerOptions) {
    const httpClient = createMockHttpClient({ responses: { [LOCATOR]: response } });
    const fileSystem = createSpyFileSystemLayer(fsOptions);
    const installer = new HttpBinaryInstaller({ httpClient, fileSystem, logger });
    return { installer, httpClient, fileSystem };
  }

  describe("success", () => {
    it("streams the body to the target, then sets the mode", async () => {
      let written = "";
      const { installer, httpClient, fileSystem } = createInstaller(
        { body: "#!/bin/sh\necho pkl\n" },
        {
          writeFileStream: {
            implementation: async (_path, chunks) => {
              const bytes = await collectChunks(chunks);
              written = new TextDecoder().decode(bytes);
              return bytes.byteLength;
            },
          },
        }
      );

      const bytes = await installer.fetchAndInstall(LOCATOR, TARGET);

      expect(bytes).toBe(19);
      expect(written).toBe("#!/bin/sh\necho pkl\n");
      expect(httpClient.fetch).toHaveBeenCalledWith(LOCATOR, { timeout: 60000 });
      expect(fileSystem.writeFileStream).toHaveBeenCalledWith(TARGET.path, expect.anything());
      expect(fileSystem.chmod).toHaveBeenCalledWith(TARGET.path, 0o755);
      expect(fileSystem.rm).not.toHaveBeenCalled();
    });

    it("installs an empty body as an empty file", async () => {
      const { installer, fileSystem } = createInstaller({ status: 200 });

      await expect(installer.fetchAndInstall(LOCATOR, TARGET)).resolves.toBe(0);
      expect(fileSystem.chmod).toHaveBeenCalledTimes(1);
    });

    it("applies a custom download timeout", async () => {
      const httpClient = createMockHttpClient({ defaultResponse: { body: "x" } });
      const installer = new HttpBinaryInstaller({
        httpClient,
        fileSystem: createSpyFileSystemLayer(),
        logger,
        timeoutMs: 500,
      });

      await installer.fetchAndInstall(LOCATOR, TARGET);

      expect(httpClient.fetch).toHaveBeenCalledWith(LOCATOR, { timeout: 500 });
    });
  });

  describe("network failures", () => {
    it("reports a non-success status without touching the filesystem", async () => {
      const { installer, fileSystem } = createInstaller({ status: 404, body: "Not Found" });

      const error = await installer.fetchAndInstall(LOCATOR, TARGET).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProvisionError);
      expect(error).toMatchObject({ message: "status code 404", errorCode: "BAD_STATUS", status: 404 });
      expect(fileSystem.writeFileStream).not.toHaveBeenCalled();
      expect(fileSystem.chmod).not.toHaveBeenCalled();
    });

    it("reports a failed request with its cause", async () => {
      const { installer, fileSystem } = createInstaller({
        error: new TypeError("fetch failed", { cause: new Error("connect ECONNREFUSED 127.0.0.1:443") }),
      });

      await expect(installer.fetchAndInstall(LOCATOR, TARGET)).rejects.toMatchObject({
        message: "fetch failed: connect ECONNREFUSED 127.0.0.1:443",
        errorCode: "NETWORK_ERROR",
      });
      expect(fileSystem.writeFileStream).not.toHaveBeenCalled();
    });

    it("removes the partial file when the body fails mid-transfer", async () => {
      const { installer, fileSystem } = createInstaller({
        body: "partial",
        bodyError: new Error("other side closed"),
      });

      await expect(installer.fetchAndInstall(LOCATOR, TARGET)).rejects.toMatchObject({
        message: "other side closed",
        errorCode: "NETWORK_ERROR",
      });
      expect(fileSystem.rm).toHaveBeenCalledWith(TARGET.path, { force: true });
      expect(fileSystem.chmod).not.toHaveBeenCalled();
    });
  });

  describe("filesystem failures", () => {
    it("reports a file that cannot be created, without cleanup", async () => {
      const { installer, fileSystem } = createInstaller(
        { body: "binary" },
        {
          writeFileStream: {
            error: new FileSystemError("EACCES", TARGET.path, "EACCES: permission denied, open '/home/test/.local/bin/pkl'"),
          },
        }
      );

      await expect(installer.fetchAndInstall(LOCATOR, TARGET)).rejects.toMatchObject({
        message: "failed to write file: EACCES: permission denied, open '/home/test/.local/bin/pkl'",
        errorCode: "IO_ERROR",
      });
      expect(fileSystem.rm).not.toHaveBeenCalled();
      expect(fileSystem.chmod).not.toHaveBeenCalled();
    });

    it("removes the file when a write fails after it was created", async () => {
      const { installer, fileSystem } = createInstaller(
        { body: "binary" },
        {
          writeFileStream: {
            implementation: async (path, chunks) => {
              for await (const chunk of chunks) {
                throw new FileSystemError("UNKNOWN", path, `ENOSPC: no space left on device (${chunk.byteLength})`);
              }
              return 0;
            },
          },
        }
      );

      await expect(installer.fetchAndInstall(LOCATOR, TARGET)).rejects.toMatchObject({
        message: "failed to write file: ENOSPC: no space left on device (6)",
        errorCode: "IO_ERROR",
      });
      expect(fileSystem.rm).toHaveBeenCalledWith(TARGET.path, { force: true });
    });

    it("reports and cleans up a failed chmod", async () => {
      const { installer, fileSystem } = createInstaller(
        { body: "binary" },
        { chmod: { error: new FileSystemError("EACCES", TARGET.path, "operation not permitted") } }
      );

      await expect(installer.fetchAndInstall(LOCATOR, TARGET)).rejects.toMatchObject({
        message: "failed to make file executable: operation not permitted",
        errorCode: "IO_ERROR",
      });
      expect(fileSystem.rm).toHaveBeenCalledWith(TARGET.path, { force: true });
    });

    it("keeps the original error when cleanup fails", async () => {
      const { installer } = createInstaller(
        { body: "binary" },
        {
          chmod: { error: new FileSystemError("EACCES", TARGET.path, "operation not permitted") },
          rm: { error: new FileSystemError("EACCES", TARGET.path, "cannot remove") },
        }
      );

      await expect(installer.fetchAndInstall(LOCATOR, TARGET)).rejects.toMatchObject({
        message: "failed to make file executable: operation not permitted",
      });
      expect(logger.warn).toHaveBeenCalledWith("Failed to remove partial file", {
        path: TARGET.path,
        error: "cannot remove",
      });
    });
  });
});

/**
 * Downloads a release artifact and installs it as an executable file.
 */

import type { HttpClient } from "../platform/network";
import { describeFetchError } from "../platform/network";
import type { FileSystemLayer } from "../platform/filesystem";
import type { Logger } from "../logging";
import { ProvisionError, getErrorMessage } from "../errors";
import { DEFAULT_DOWNLOAD_TIMEOUT_MS } from "../config/types";
import type { ArtifactLocator, BinaryInstaller, InstallTarget } from "./types";

/**
 * Dependencies for HttpBinaryInstaller.
 */
export interface HttpBinaryInstallerDeps {
  readonly httpClient: HttpClient;
  readonly fileSystem: FileSystemLayer;
  readonly logger: Logger;
  /** Bounds the whole download, body included. Default: 60000 */
  readonly timeoutMs?: number;
}

/**
 * Yield the chunks of a response body. Read failures become NETWORK_ERROR.
 */
async function* readChunks(body: Response["body"], onStart: () => void): AsyncGenerator<Uint8Array> {
  onStart();
  if (!body) {
    return;
  }

  const reader = body.getReader();
  try {
    for (;;) {
      let result: Awaited<ReturnType<typeof reader.read>>;
      try {
        result = await reader.read();
      } catch (error) {
        throw new ProvisionError(describeFetchError(error), "NETWORK_ERROR", { cause: error });
      }
      if (result.done) {
        return;
      }
      yield result.value;
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Installs artifacts by streaming an HTTP response into the target file,
 * then setting its permission bits.
 */
export class HttpBinaryInstaller implements BinaryInstaller {
  private readonly httpClient: HttpClient;
  private readonly fileSystem: FileSystemLayer;
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(deps: HttpBinaryInstallerDeps) {
    this.httpClient = deps.httpClient;
    this.fileSystem = deps.fileSystem;
    this.logger = deps.logger;
    this.timeoutMs = deps.timeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS;
  }

  async fetchAndInstall(locator: ArtifactLocator, target: InstallTarget): Promise<number> {
    this.logger.info("Downloading", { url: locator, path: target.path });

    let response: Response;
    try {
      response = await this.httpClient.fetch(locator, { timeout: this.timeoutMs });
    } catch (error) {
      throw new ProvisionError(describeFetchError(error), "NETWORK_ERROR", { cause: error });
    }

    // Nothing is written for an error response
    if (!response.ok) {
      await response.body?.cancel();
      throw new ProvisionError(`status code ${response.status}`, "BAD_STATUS", { status: response.status });
    }

    let created = false;
    let bytes: number;
    try {
      bytes = await this.fileSystem.writeFileStream(
        target.path,
        readChunks(response.body, () => {
          created = true;
        })
      );
    } catch (error) {
      if (created) {
        await this.removePartial(target.path);
      }
      if (error instanceof ProvisionError) {
        throw error;
      }
      throw new ProvisionError(`failed to write file: ${getErrorMessage(error)}`, "IO_ERROR", { cause: error });
    }

    try {
      await this.fileSystem.chmod(target.path, target.mode);
    } catch (error) {
      await this.removePartial(target.path);
      throw new ProvisionError(`failed to make file executable: ${getErrorMessage(error)}`, "IO_ERROR", {
        cause: error,
      });
    }

    this.logger.info("Installed", { path: target.path, bytes, mode: target.mode.toString(8) });
    return bytes;
  }

  /**
   * Best-effort removal of a file left by a failed install.
   */
  private async removePartial(path: string): Promise<void> {
    try {
      await this.fileSystem.rm(path, { force: true });
      this.logger.debug("Removed partial file", { path });
    } catch (error) {
      this.logger.warn("Failed to remove partial file", { path, error: getErrorMessage(error) });
    }
  }
}

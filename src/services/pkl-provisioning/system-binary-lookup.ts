/**
 * Finds executables on the host search path.
 */

import type { ProcessRunner } from "../platform/process";
import type { PlatformInfo } from "../platform/platform-info";
import type { Logger } from "../logging";

/**
 * Dependencies for SystemBinaryLookup.
 */
export interface SystemBinaryLookupDeps {
  readonly processRunner: ProcessRunner;
  readonly platformInfo: PlatformInfo;
  readonly logger: Logger;
}

/**
 * Looks up binaries with `which` (`where` on Windows).
 */
export class SystemBinaryLookup {
  private readonly processRunner: ProcessRunner;
  private readonly platformInfo: PlatformInfo;
  private readonly logger: Logger;

  constructor(deps: SystemBinaryLookupDeps) {
    this.processRunner = deps.processRunner;
    this.platformInfo = deps.platformInfo;
    this.logger = deps.logger;
  }

  /**
   * Find a binary on PATH.
   *
   * @returns Absolute path of the first match, or null if not found
   */
  async find(name: string): Promise<string | null> {
    const command = this.platformInfo.platform === "win32" ? "where" : "which";
    const result = await this.processRunner.run(command, [name]).wait();

    if (result.exitCode !== 0) {
      this.logger.debug("Binary not found on PATH", { name, exitCode: result.exitCode });
      return null;
    }

    // `where` prints every match, one per line
    const firstLine = result.stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .find((line) => line.length > 0);
    if (firstLine === undefined) {
      return null;
    }

    this.logger.debug("Binary found on PATH", { name, path: firstLine });
    return firstLine;
  }
}

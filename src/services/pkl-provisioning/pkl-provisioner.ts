/**
 * PklProvisioner - drives release lookup, artifact resolution and install.
 *
 * The caller decides whether provisioning is needed (pkl missing from PATH,
 * user consent); this class only performs it.
 */

import type { Logger } from "../logging";
import type { PlatformInfo } from "../platform/platform-info";
import { ProvisionError } from "../errors";
import {
  EXECUTABLE_MODE,
  type ArtifactResolver,
  type BinaryInstaller,
  type ProvisionerState,
  type ReleaseLocator,
} from "./types";

/**
 * Dependencies for PklProvisioner.
 */
export interface PklProvisionerDeps {
  readonly releaseLocator: ReleaseLocator;
  readonly artifactResolver: ArtifactResolver;
  readonly installer: BinaryInstaller;
  readonly platformInfo: PlatformInfo;
  readonly logger: Logger;
}

/**
 * Wrap a stage failure with its prefix. Errors that are not ProvisionErrors
 * are bugs and pass through untouched.
 */
function wrapStage(error: unknown, prefix: string): unknown {
  return error instanceof ProvisionError ? error.wrap(prefix) : error;
}

export class PklProvisioner {
  private readonly releaseLocator: ReleaseLocator;
  private readonly artifactResolver: ArtifactResolver;
  private readonly installer: BinaryInstaller;
  private readonly platformInfo: PlatformInfo;
  private readonly logger: Logger;
  private currentState: ProvisionerState = "not-installed";

  constructor(deps: PklProvisionerDeps) {
    this.releaseLocator = deps.releaseLocator;
    this.artifactResolver = deps.artifactResolver;
    this.installer = deps.installer;
    this.platformInfo = deps.platformInfo;
    this.logger = deps.logger;
  }

  get state(): ProvisionerState {
    return this.currentState;
  }

  /**
   * Install the latest pkl release at `targetPath`.
   * The parent directory must already exist.
   *
   * @returns The installed path
   * @throws ProvisionError prefixed with the failing stage, e.g.
   *   "failed to get latest version: failed to fetch latest release: status code 503"
   */
  async provision(targetPath: string): Promise<string> {
    if (this.currentState === "resolving") {
      throw new Error("provisioning is already in progress");
    }
    this.transition("resolving");

    try {
      let version: string;
      try {
        version = await this.releaseLocator.latestVersion();
      } catch (error) {
        throw wrapStage(error, "failed to get latest version");
      }

      const platform = { os: this.platformInfo.platform, arch: this.platformInfo.arch };
      let locator: string;
      try {
        locator = this.artifactResolver.resolve(version, platform);
      } catch (error) {
        throw wrapStage(error, "failed to get download URL");
      }

      try {
        await this.installer.fetchAndInstall(locator, { path: targetPath, mode: EXECUTABLE_MODE });
      } catch (error) {
        const stage =
          error instanceof ProvisionError && error.errorCode === "IO_ERROR"
            ? "failed to install binary"
            : "failed to download binary";
        throw wrapStage(error, stage);
      }

      this.logger.info("Provisioned pkl", { version, path: targetPath });
    } catch (error) {
      this.transition("failed");
      throw error;
    }

    this.transition("installed");
    return targetPath;
  }

  private transition(next: ProvisionerState): void {
    this.logger.debug("State change", { from: this.currentState, to: next });
    this.currentState = next;
  }
}

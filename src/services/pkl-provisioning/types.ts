/**
 * Types for pkl provisioning.
 */

/**
 * Opaque release tag (e.g., "0.28.2"). Never parsed or compared.
 */
export type ReleaseVersion = string;

/**
 * Fully-qualified download URL of a release artifact.
 */
export type ArtifactLocator = string;

/**
 * Host operating system and CPU architecture, in Node's identifiers
 * (process.platform / process.arch).
 */
export interface PlatformKey {
  readonly os: string;
  readonly arch: string;
}

/**
 * Where and with which permission bits a binary is installed.
 */
export interface InstallTarget {
  /** Absolute path of the file to create or overwrite */
  readonly path: string;
  /** Permission bits set after the content is written */
  readonly mode: number;
}

/** rwxr-xr-x */
export const EXECUTABLE_MODE = 0o755;

/**
 * Provisioner lifecycle.
 * "failed" is terminal for an invocation; a later provision() call starts over.
 */
export type ProvisionerState = "not-installed" | "resolving" | "installed" | "failed";

/**
 * Looks up the latest published release.
 */
export interface ReleaseLocator {
  /**
   * @throws ProvisionError NETWORK_ERROR, BAD_STATUS or PARSE_ERROR
   */
  latestVersion(): Promise<ReleaseVersion>;
}

/**
 * Maps a release and platform to the artifact to download.
 */
export interface ArtifactResolver {
  /**
   * @throws ProvisionError UNSUPPORTED_PLATFORM when the platform has no artifact
   */
  resolve(version: ReleaseVersion, platform: PlatformKey): ArtifactLocator;
}

/**
 * Downloads an artifact and installs it as a file.
 */
export interface BinaryInstaller {
  /**
   * @returns Number of bytes installed
   * @throws ProvisionError NETWORK_ERROR, BAD_STATUS or IO_ERROR
   */
  fetchAndInstall(locator: ArtifactLocator, target: InstallTarget): Promise<number>;
}

/**
 * Mock factories for the provisioning collaborators.
 */

import { vi, type Mock } from "vitest";
import type {
  ArtifactLocator,
  ArtifactResolver,
  BinaryInstaller,
  InstallTarget,
  PlatformKey,
  ReleaseLocator,
  ReleaseVersion,
} from "./types";

export interface MockReleaseLocator extends ReleaseLocator {
  latestVersion: Mock<() => Promise<ReleaseVersion>>;
}

export interface MockArtifactResolver extends ArtifactResolver {
  resolve: Mock<(version: ReleaseVersion, platform: PlatformKey) => ArtifactLocator>;
}

export interface MockBinaryInstaller extends BinaryInstaller {
  fetchAndInstall: Mock<(locator: ArtifactLocator, target: InstallTarget) => Promise<number>>;
}

/**
 * Release locator resolving to `version`, or rejecting with `error`.
 */
export function createMockReleaseLocator(options?: { version?: string; error?: Error }): MockReleaseLocator {
  return {
    latestVersion: vi.fn(async (): Promise<ReleaseVersion> => {
      if (options?.error) {
        throw options.error;
      }
      return options?.version ?? "0.28.2";
    }),
  };
}

/**
 * Artifact resolver building "https://example.test/<version>/<os>-<arch>",
 * or throwing `error`.
 */
export function createMockArtifactResolver(options?: { error?: Error }): MockArtifactResolver {
  return {
    resolve: vi.fn((version: ReleaseVersion, platform: PlatformKey): ArtifactLocator => {
      if (options?.error) {
        throw options.error;
      }
      return `https://example.test/${version}/${platform.os}-${platform.arch}`;
    }),
  };
}

/**
 * Installer reporting `bytes` installed, or rejecting with `error`.
 */
export function createMockBinaryInstaller(options?: { bytes?: number; error?: Error }): MockBinaryInstaller {
  return {
    fetchAndInstall: vi.fn(async (_locator: ArtifactLocator, _target: InstallTarget): Promise<number> => {
      if (options?.error) {
        throw options.error;
      }
      return options?.bytes ?? 1024;
    }),
  };
}

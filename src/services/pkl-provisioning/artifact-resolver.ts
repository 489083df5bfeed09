/**
 * Compatibility table and artifact URL construction for pkl releases.
 */

import { ProvisionError } from "../errors";
import { DEFAULT_DOWNLOAD_BASE_URL } from "../config/types";
import type { ArtifactLocator, ArtifactResolver, PlatformKey, ReleaseVersion } from "./types";

/**
 * Release artifact filename per host platform.
 *
 * Keys use Node's identifiers; values use the upstream naming (macos, amd64,
 * aarch64). This is the only place the two conventions meet.
 */
export const PKL_ARTIFACTS: ReadonlyMap<string, string> = new Map([
  ["darwin/x64", "pkl-macos-amd64"],
  ["darwin/arm64", "pkl-macos-aarch64"],
  ["linux/x64", "pkl-linux-amd64"],
  ["linux/arm64", "pkl-linux-aarch64"],
  ["win32/x64", "pkl-windows-amd64.exe"],
]);

/**
 * Resolves pkl release artifacts from the compatibility table.
 */
export class PklArtifactResolver implements ArtifactResolver {
  private readonly baseUrl: string;

  constructor(baseUrl: string = DEFAULT_DOWNLOAD_BASE_URL) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  resolve(version: ReleaseVersion, platform: PlatformKey): ArtifactLocator {
    const key = `${platform.os}/${platform.arch}`;
    const filename = PKL_ARTIFACTS.get(key);
    if (filename === undefined) {
      throw new ProvisionError(`unsupported OS/architecture combination: ${key}`, "UNSUPPORTED_PLATFORM", {
        os: platform.os,
        arch: platform.arch,
      });
    }
    return `${this.baseUrl}/${version}/${filename}`;
  }
}

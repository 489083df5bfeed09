/**
 * Default install location for pkl.
 */

import { join } from "node:path";
import type { PlatformInfo } from "../platform/platform-info";

/**
 * File name of the pkl executable on a platform.
 */
export function pklBinaryName(platform: string): string {
  return platform === "win32" ? "pkl.exe" : "pkl";
}

/**
 * Directory pkl is installed into when none is configured.
 */
export function defaultInstallDir(homeDir: string): string {
  return join(homeDir, ".local", "bin");
}

/**
 * Path the provisioner installs pkl to.
 *
 * @param installDir - Configured directory, or null for ~/.local/bin
 */
export function resolveInstallPath(installDir: string | null, platformInfo: PlatformInfo): string {
  const dir = installDir ?? defaultInstallDir(platformInfo.homeDir);
  return join(dir, pklBinaryName(platformInfo.platform));
}

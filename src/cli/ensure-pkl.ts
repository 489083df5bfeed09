/**
 * Makes sure a pkl binary is available, installing it on request.
 */

import { dirname } from "node:path";
import { CliError, getErrorMessage } from "../services/errors";
import { resolveInstallPath } from "../services/pkl-provisioning";
import type { CliServices } from "./types";

export const PKL_NOT_FOUND_MESSAGE = "pkl binary not found in PATH. Please install pkl first";

export type EnsurePklDeps = Pick<
  CliServices,
  "binaryLookup" | "provisioner" | "fileSystem" | "prompter" | "platformInfo" | "config" | "logger"
>;

export interface EnsurePklOptions {
  /** Install without asking when pkl is missing */
  readonly assumeYes: boolean;
  /** Install to this path even when pkl is on PATH */
  readonly targetPath?: string;
}

export interface PklLocation {
  readonly path: string;
  /** Whether this call installed the binary */
  readonly installed: boolean;
}

/**
 * Find pkl on PATH, or install the latest release.
 *
 * @throws CliError PKL_NOT_FOUND when the user declines the install
 * @throws CliError PROVISION_FAILED when the install fails
 * @throws FileSystemError when the install directory cannot be created
 */
export async function ensurePkl(deps: EnsurePklDeps, options: EnsurePklOptions): Promise<PklLocation> {
  if (options.targetPath === undefined) {
    const found = await deps.binaryLookup.find("pkl");
    if (found !== null) {
      deps.logger.debug("Using pkl binary", { path: found });
      return { path: found, installed: false };
    }

    deps.logger.warn("pkl binary not found in PATH");
    const confirmed =
      options.assumeYes ||
      (await deps.prompter.confirm("pkl binary not found in PATH. Would you like to install pkl now?"));
    if (!confirmed) {
      throw new CliError(PKL_NOT_FOUND_MESSAGE, "PKL_NOT_FOUND");
    }
  }

  const targetPath = options.targetPath ?? resolveInstallPath(deps.config.installDir, deps.platformInfo);
  await deps.fileSystem.mkdir(dirname(targetPath), { recursive: true });

  deps.logger.info("Downloading pkl", { path: targetPath });
  try {
    await deps.provisioner.provision(targetPath);
  } catch (error) {
    throw new CliError(`failed to download pkl: ${getErrorMessage(error)}`, "PROVISION_FAILED", {
      cause: error,
    });
  }

  deps.logger.info("Successfully installed pkl", { path: targetPath });
  return { path: targetPath, installed: true };
}

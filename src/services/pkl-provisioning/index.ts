/**
 * Pkl provisioning module.
 */

export { PklProvisioner, type PklProvisionerDeps } from "./pkl-provisioner";
export { PklArtifactResolver, PKL_ARTIFACTS } from "./artifact-resolver";
export { GitHubReleaseLocator, type GitHubReleaseLocatorDeps } from "./release-locator";
export { HttpBinaryInstaller, type HttpBinaryInstallerDeps } from "./binary-installer";
export { SystemBinaryLookup, type SystemBinaryLookupDeps } from "./system-binary-lookup";
export { resolveInstallPath, defaultInstallDir, pklBinaryName } from "./install-path";
export {
  EXECUTABLE_MODE,
  type ArtifactLocator,
  type ArtifactResolver,
  type BinaryInstaller,
  type InstallTarget,
  type PlatformKey,
  type ProvisionerState,
  type ReleaseLocator,
  type ReleaseVersion,
} from "./types";

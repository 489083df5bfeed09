/**
 * Configuration service module.
 */

export {
  ConfigService,
  defaultConfigPath,
  parseConfigFile,
  type ConfigServiceDeps,
} from "./config-service";
export {
  type ProvisionerConfig,
  DEFAULT_CONFIG,
  DEFAULT_RELEASE_INDEX_URL,
  DEFAULT_DOWNLOAD_BASE_URL,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_DOWNLOAD_TIMEOUT_MS,
} from "./types";

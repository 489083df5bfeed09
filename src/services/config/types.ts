/**
 * Configuration types for the provisioner.
 *
 * Values come from built-in defaults, then the optional config.json, then
 * PKL_PROVISIONER_* environment variables, later sources winning.
 */

/** GitHub API endpoint describing the latest pkl release */
export const DEFAULT_RELEASE_INDEX_URL = "https://api.github.com/repos/apple/pkl/releases/latest";

/** Base of the per-release artifact URLs */
export const DEFAULT_DOWNLOAD_BASE_URL = "https://github.com/apple/pkl/releases/download";

/** Timeout for the release index request */
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

/** Timeout for the artifact download, body included */
export const DEFAULT_DOWNLOAD_TIMEOUT_MS = 60_000;

/**
 * Effective provisioner configuration.
 */
export interface ProvisionerConfig {
  readonly releaseIndexUrl: string;
  readonly downloadBaseUrl: string;
  readonly requestTimeoutMs: number;
  readonly downloadTimeoutMs: number;
  /** Directory pkl is installed into (null = ~/.local/bin) */
  readonly installDir: string | null;
  /** Bearer token for the release index (null = anonymous) */
  readonly githubToken: string | null;
}

export const DEFAULT_CONFIG: ProvisionerConfig = {
  releaseIndexUrl: DEFAULT_RELEASE_INDEX_URL,
  downloadBaseUrl: DEFAULT_DOWNLOAD_BASE_URL,
  requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
  downloadTimeoutMs: DEFAULT_DOWNLOAD_TIMEOUT_MS,
  installDir: null,
  githubToken: null,
};

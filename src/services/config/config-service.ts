/**
 * Configuration service for loading provisioner configuration.
 *
 * This is a pure service (not a boundary abstraction) that uses FileSystemLayer
 * for I/O operations. Configuration is stored as JSON in
 * ~/.config/pkl-provisioner/config.json unless a path is given.
 */

import { join } from "node:path";
import { z } from "zod";
import type { FileSystemLayer } from "../platform/filesystem";
import type { PlatformInfo } from "../platform/platform-info";
import type { Logger } from "../logging";
import { ConfigError, FileSystemError, getErrorMessage } from "../errors";
import { formatValidationIssues } from "../../shared/error-utils";
import type { ProvisionerConfig } from "./types";
import { DEFAULT_CONFIG } from "./types";

const timeoutSchema = z.number().int().positive();
const urlSchema = z.string().url();

/**
 * Shape of config.json. Every field is optional; unknown fields are rejected
 * so typos do not go unnoticed.
 */
const configFileSchema = z
  .object({
    releaseIndexUrl: urlSchema,
    downloadBaseUrl: urlSchema,
    requestTimeoutMs: timeoutSchema,
    downloadTimeoutMs: timeoutSchema,
    installDir: z.string().min(1).nullable(),
  })
  .partial()
  .strict();

type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Dependencies for ConfigService.
 */
export interface ConfigServiceDeps {
  readonly fileSystem: FileSystemLayer;
  readonly platformInfo: PlatformInfo;
  readonly logger: Logger;
  /** Environment to read overrides from. Default: process.env */
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Default location of config.json for a home directory.
 */
export function defaultConfigPath(homeDir: string): string {
  return join(homeDir, ".config", "pkl-provisioner", "config.json");
}

/**
 * Parse and validate config.json content.
 *
 * @throws ConfigError if the content is not JSON or does not match the schema
 */
export function parseConfigFile(content: string): ConfigFile {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`invalid JSON: ${getErrorMessage(error)}`, "INVALID_JSON", { cause: error });
  }

  const result = configFileSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(formatValidationIssues(result.error.issues), "INVALID_CONFIG");
  }
  return result.data;
}

/**
 * Service for loading provisioner configuration.
 */
export class ConfigService {
  private readonly fileSystem: FileSystemLayer;
  private readonly platformInfo: PlatformInfo;
  private readonly logger: Logger;
  private readonly env: NodeJS.ProcessEnv;

  constructor(deps: ConfigServiceDeps) {
    this.fileSystem = deps.fileSystem;
    this.platformInfo = deps.platformInfo;
    this.logger = deps.logger;
    this.env = deps.env ?? process.env;
  }

  /**
   * Load configuration: defaults, overlaid by the config file, overlaid by
   * environment overrides.
   * A missing file yields defaults. An unreadable or invalid file logs a
   * warning and yields defaults.
   */
  async load(configPath?: string): Promise<ProvisionerConfig> {
    const path = configPath ?? defaultConfigPath(this.platformInfo.homeDir);
    const file = await this.loadFile(path);
    const env = this.loadEnv();

    const config: ProvisionerConfig = {
      releaseIndexUrl: env.releaseIndexUrl ?? file.releaseIndexUrl ?? DEFAULT_CONFIG.releaseIndexUrl,
      downloadBaseUrl: env.downloadBaseUrl ?? file.downloadBaseUrl ?? DEFAULT_CONFIG.downloadBaseUrl,
      requestTimeoutMs: env.requestTimeoutMs ?? file.requestTimeoutMs ?? DEFAULT_CONFIG.requestTimeoutMs,
      downloadTimeoutMs:
        env.downloadTimeoutMs ?? file.downloadTimeoutMs ?? DEFAULT_CONFIG.downloadTimeoutMs,
      installDir:
        env.installDir ?? (file.installDir === undefined ? DEFAULT_CONFIG.installDir : file.installDir),
      githubToken: this.env.GITHUB_TOKEN || DEFAULT_CONFIG.githubToken,
    };

    this.logger.debug("Config resolved", {
      releaseIndexUrl: config.releaseIndexUrl,
      downloadBaseUrl: config.downloadBaseUrl,
      requestTimeoutMs: config.requestTimeoutMs,
      downloadTimeoutMs: config.downloadTimeoutMs,
      installDir: config.installDir,
      authenticated: config.githubToken !== null,
    });
    return config;
  }

  private async loadFile(path: string): Promise<ConfigFile> {
    let content: string;
    try {
      content = await this.fileSystem.readFile(path);
    } catch (error) {
      // File doesn't exist - the common case
      if (error instanceof FileSystemError && error.fsCode === "ENOENT") {
        this.logger.debug("Config not found, using defaults", { path });
        return {};
      }
      this.logger.warn("Config load failed, using defaults", {
        path,
        error: getErrorMessage(error),
      });
      return {};
    }

    try {
      const file = parseConfigFile(content);
      this.logger.debug("Config loaded", { path });
      return file;
    } catch (error) {
      if (!(error instanceof ConfigError)) {
        throw error;
      }
      this.logger.warn("Config validation failed, using defaults", {
        path,
        error: error.message,
      });
      return {};
    }
  }

  private loadEnv(): ConfigFile {
    const releaseIndexUrl = this.envValue("PKL_PROVISIONER_RELEASE_URL", urlSchema);
    const downloadBaseUrl = this.envValue("PKL_PROVISIONER_DOWNLOAD_URL", urlSchema);
    const requestTimeoutMs = this.envValue("PKL_PROVISIONER_TIMEOUT_MS", z.coerce.number().pipe(timeoutSchema));
    const downloadTimeoutMs = this.envValue(
      "PKL_PROVISIONER_DOWNLOAD_TIMEOUT_MS",
      z.coerce.number().pipe(timeoutSchema)
    );
    const installDir = this.envValue("PKL_PROVISIONER_INSTALL_DIR", z.string());

    return {
      ...(releaseIndexUrl !== undefined && { releaseIndexUrl }),
      ...(downloadBaseUrl !== undefined && { downloadBaseUrl }),
      ...(requestTimeoutMs !== undefined && { requestTimeoutMs }),
      ...(downloadTimeoutMs !== undefined && { downloadTimeoutMs }),
      ...(installDir !== undefined && { installDir }),
    };
  }

  /**
   * Read and validate one environment override.
   * Unset and empty variables count as absent; invalid ones are ignored with a warning.
   */
  private envValue<T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
    const raw = this.env[name];
    if (raw === undefined || raw === "") {
      return undefined;
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
      this.logger.warn("Ignoring invalid environment override", {
        name,
        error: formatValidationIssues(result.error.issues),
      });
      return undefined;
    }
    return result.data;
  }
}

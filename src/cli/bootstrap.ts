/**
 * Wires the real services for a command run.
 */

import { ElectronLogService } from "../services/logging";
import { ConfigService } from "../services/config";
import { DefaultFileSystemLayer } from "../services/platform/filesystem";
import { DefaultNetworkLayer } from "../services/platform/network";
import { ExecaProcessRunner } from "../services/platform/process";
import { NodePlatformInfo, type PlatformInfo } from "../services/platform/platform-info";
import {
  GitHubReleaseLocator,
  HttpBinaryInstaller,
  PklArtifactResolver,
  PklProvisioner,
  SystemBinaryLookup,
} from "../services/pkl-provisioning";
import { ReadlinePrompter, type PromptInput } from "./prompter";
import type { CliServices, GlobalOptions } from "./types";

export interface BootstrapOptions {
  /** Default: process.env */
  readonly env?: NodeJS.ProcessEnv;
  /** Default: NodePlatformInfo */
  readonly platformInfo?: PlatformInfo;
  /** Prompt input. Default: process.stdin */
  readonly stdin?: PromptInput;
  /** Prompt output. Default: process.stderr */
  readonly stderr?: NodeJS.WritableStream;
}

/**
 * Create logging, load configuration and build the provisioning services.
 */
export async function createCliServices(
  options: GlobalOptions,
  bootstrap: BootstrapOptions = {}
): Promise<CliServices> {
  const env = bootstrap.env ?? process.env;
  const platformInfo = bootstrap.platformInfo ?? new NodePlatformInfo();

  const loggingService = new ElectronLogService({ verbosity: options.verbose, env });
  const fileSystem = new DefaultFileSystemLayer(loggingService.createLogger("fs"));

  const configService = new ConfigService({
    fileSystem,
    platformInfo,
    logger: loggingService.createLogger("config"),
    env,
  });
  const config = await configService.load(options.config);

  const httpClient = new DefaultNetworkLayer(loggingService.createLogger("network"));
  const processRunner = new ExecaProcessRunner(loggingService.createLogger("process"));
  const provisionLogger = loggingService.createLogger("provision");

  const provisioner = new PklProvisioner({
    releaseLocator: new GitHubReleaseLocator({
      httpClient,
      logger: provisionLogger,
      url: config.releaseIndexUrl,
      timeoutMs: config.requestTimeoutMs,
      token: config.githubToken,
    }),
    artifactResolver: new PklArtifactResolver(config.downloadBaseUrl),
    installer: new HttpBinaryInstaller({
      httpClient,
      fileSystem,
      logger: provisionLogger,
      timeoutMs: config.downloadTimeoutMs,
    }),
    platformInfo,
    logger: provisionLogger,
  });

  return {
    logger: loggingService.createLogger("cli"),
    config,
    platformInfo,
    fileSystem,
    processRunner,
    binaryLookup: new SystemBinaryLookup({ processRunner, platformInfo, logger: provisionLogger }),
    provisioner,
    prompter: new ReadlinePrompter(bootstrap.stdin ?? process.stdin, bootstrap.stderr ?? process.stderr),
  };
}

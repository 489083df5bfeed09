/**
 * Types shared by the command-line layer.
 */

import type { Logger } from "../services/logging";
import type { ProvisionerConfig } from "../services/config";
import type { PlatformInfo } from "../services/platform/platform-info";
import type { FileSystemLayer } from "../services/platform/filesystem";
import type { ProcessRunner } from "../services/platform/process";
import type { Prompter } from "./prompter";

/**
 * Options accepted before (or after) any command.
 * A type alias rather than an interface so it satisfies commander's OptionValues.
 */
export type GlobalOptions = {
  /** Number of -v flags */
  readonly verbose: number;
  /** Path of config.json, overriding the default location */
  readonly config?: string;
  /** Print machine-readable output */
  readonly json: boolean;
};

/**
 * Where command output goes. Text passed in already ends with a newline.
 */
export interface CliOutput {
  /** Write to stdout */
  write(text: string): void;
  /** Write to stderr */
  error(text: string): void;
}

/**
 * Finds a binary on PATH.
 */
export interface BinaryLookup {
  find(name: string): Promise<string | null>;
}

/**
 * Installs pkl at a path.
 */
export interface Provisioner {
  provision(targetPath: string): Promise<string>;
}

/**
 * Services a command works with, created once global options are known.
 */
export interface CliServices {
  readonly logger: Logger;
  readonly config: ProvisionerConfig;
  readonly platformInfo: PlatformInfo;
  readonly fileSystem: FileSystemLayer;
  readonly processRunner: ProcessRunner;
  readonly binaryLookup: BinaryLookup;
  readonly provisioner: Provisioner;
  readonly prompter: Prompter;
}

/**
 * Dependencies of the command-line program.
 */
export interface CliDeps {
  /** Version string reported by `version` */
  readonly version: string;
  readonly platformInfo: PlatformInfo;
  readonly output: CliOutput;
  /** Build the services for a command. Called at most once per run. */
  readonly createServices: (options: GlobalOptions) => Promise<CliServices>;
}

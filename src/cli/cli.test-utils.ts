/**
 * Mock factories for command-line tests.
 */

import { vi, type Mock } from "vitest";
import { DEFAULT_CONFIG, type ProvisionerConfig } from "../services/config";
import { createMockLogger, type MockLogger } from "../services/logging/logging.test-utils";
import { createMockPlatformInfo } from "../services/platform/platform-info.test-utils";
import { createSpyFileSystemLayer, type SpyFileSystemLayer } from "../services/platform/filesystem.test-utils";
import { createMockProcessRunner, type MockProcessRunner } from "../services/platform/process.test-utils";
import type { PlatformInfo } from "../services/platform/platform-info";
import type { Prompter } from "./prompter";
import type { BinaryLookup, CliDeps, CliOutput, CliServices, GlobalOptions, Provisioner } from "./types";

export interface MockCliOutput extends CliOutput {
  write: Mock<(text: string) => void>;
  error: Mock<(text: string) => void>;
  /** Everything written to stdout so far */
  stdout(): string;
  /** Everything written to stderr so far */
  stderr(): string;
}

export function createMockOutput(): MockCliOutput {
  const out: string[] = [];
  const err: string[] = [];
  return {
    write: vi.fn((text: string) => {
      out.push(text);
    }),
    error: vi.fn((text: string) => {
      err.push(text);
    }),
    stdout: () => out.join(""),
    stderr: () => err.join(""),
  };
}

export interface MockBinaryLookup extends BinaryLookup {
  find: Mock<(name: string) => Promise<string | null>>;
}

export interface MockProvisioner extends Provisioner {
  provision: Mock<(targetPath: string) => Promise<string>>;
}

export interface MockPrompter extends Prompter {
  confirm: Mock<(question: string) => Promise<boolean>>;
}

export interface MockCliServices extends CliServices {
  readonly logger: MockLogger;
  readonly fileSystem: SpyFileSystemLayer;
  readonly processRunner: MockProcessRunner;
  readonly binaryLookup: MockBinaryLookup;
  readonly provisioner: MockProvisioner;
  readonly prompter: MockPrompter;
}

export interface MockCliServicesOptions {
  /** Path `which pkl` reports; null when pkl is not on PATH */
  readonly pklOnPath?: string | null;
  /** Answer to the install prompt */
  readonly confirm?: boolean;
  /** Rejection of provision() */
  readonly provisionError?: Error;
  readonly config?: Partial<ProvisionerConfig>;
  readonly platformInfo?: PlatformInfo;
  readonly processRunner?: MockProcessRunner;
}

/**
 * Services for a run where pkl is on PATH at /usr/bin/pkl unless configured otherwise.
 */
export function createMockCliServices(options?: MockCliServicesOptions): MockCliServices {
  const pklOnPath = options?.pklOnPath === undefined ? "/usr/bin/pkl" : options.pklOnPath;
  return {
    logger: createMockLogger(),
    config: { ...DEFAULT_CONFIG, ...options?.config },
    platformInfo: options?.platformInfo ?? createMockPlatformInfo(),
    fileSystem: createSpyFileSystemLayer(),
    processRunner: options?.processRunner ?? createMockProcessRunner(),
    binaryLookup: {
      find: vi.fn(async (_name: string): Promise<string | null> => pklOnPath),
    },
    provisioner: {
      provision: vi.fn(async (targetPath: string): Promise<string> => {
        if (options?.provisionError) {
          throw options.provisionError;
        }
        return targetPath;
      }),
    },
    prompter: {
      confirm: vi.fn(async (_question: string): Promise<boolean> => options?.confirm ?? false),
    },
  };
}

export interface MockCliDeps extends CliDeps {
  readonly output: MockCliOutput;
  readonly createServices: Mock<(options: GlobalOptions) => Promise<CliServices>>;
}

/**
 * Program dependencies handing out `services` for every command.
 */
export function createMockCliDeps(services: CliServices = createMockCliServices()): MockCliDeps {
  return {
    version: "1.2.3",
    platformInfo: createMockPlatformInfo(),
    output: createMockOutput(),
    createServices: vi.fn(async (_options: GlobalOptions): Promise<CliServices> => services),
  };
}

/**
 * Platform information provider.
 * Abstracts process.platform, process.arch, and os.homedir() for testability.
 */

import os from "node:os";

export interface PlatformInfo {
  /** Operating system platform as reported by Node.js: 'linux', 'darwin', 'win32', ... */
  readonly platform: string;

  /** CPU architecture as reported by Node.js: 'x64', 'arm64', ... */
  readonly arch: string;

  /** User's home directory */
  readonly homeDir: string;
}

/**
 * PlatformInfo implementation using Node.js APIs.
 *
 * Values are cached at construction time for consistency. Unsupported
 * combinations are reported as-is; deciding what is supported is up to
 * the artifact resolver.
 */
export class NodePlatformInfo implements PlatformInfo {
  readonly platform: string;
  readonly arch: string;
  readonly homeDir: string;

  constructor() {
    this.platform = process.platform;
    this.arch = process.arch;
    this.homeDir = os.homedir();
  }
}

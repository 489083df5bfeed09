/**
 * pkl-provisioner executable.
 *
 * Bundled by vite.config.bin.ts to dist/bin/pkl-provisioner.js.
 */

import { createCliServices, runCli } from "../cli";
import { NodePlatformInfo } from "../services/platform/platform-info";
import { getErrorMessage } from "../services/errors";

runCli(process.argv.slice(2), {
  version: __APP_VERSION__,
  platformInfo: new NodePlatformInfo(),
  output: {
    write: (text) => process.stdout.write(text),
    error: (text) => process.stderr.write(text),
  },
  createServices: (options) => createCliServices(options),
}).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    process.stderr.write(`pkl-provisioner: ${getErrorMessage(error)}\n`);
    process.exitCode = 1;
  }
);

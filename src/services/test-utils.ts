/**
 * Test utilities for service tests.
 */

import { mkdtemp, rm, realpath } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

/**
 * Create a temporary directory with automatic cleanup.
 * Uses realpath so paths compare equal on hosts where tmpdir is a symlink.
 */
export async function createTempDir(): Promise<{
  path: string;
  cleanup: () => Promise<void>;
}> {
  const tempPath = await mkdtemp(join(tmpdir(), "pkl-provisioner-test-"));
  const resolvedPath = await realpath(tempPath);
  return {
    path: resolvedPath,
    cleanup: async () => {
      await rm(resolvedPath, { recursive: true, force: true });
    },
  };
}

/**
 * Vite config for building the pkl-provisioner executable.
 *
 * Compiles src/bin/pkl-provisioner.ts to dist/bin/pkl-provisioner.js as an
 * ESM bundle with a node shebang. Dependencies stay external and are
 * resolved from node_modules at run time.
 */

import { defineConfig, type UserConfig } from "vite";
import { chmod, readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import { buildDefaults } from "./vite.defaults";

const root = fileURLToPath(new URL(".", import.meta.url));

async function readPackage(): Promise<{ version: string; dependencies: string[] }> {
  const data: unknown = JSON.parse(await readFile(resolve(root, "package.json"), "utf-8"));
  if (typeof data !== "object" || data === null || !("version" in data) || typeof data.version !== "string") {
    throw new Error("package.json has no version");
  }
  const dependencies =
    "dependencies" in data && typeof data.dependencies === "object" && data.dependencies !== null
      ? Object.keys(data.dependencies)
      : [];
  return { version: data.version, dependencies };
}

export default defineConfig(async (): Promise<UserConfig> => {
  const pkg = await readPackage();
  const outFile = resolve(root, "dist/bin/pkl-provisioner.js");

  return {
    plugins: [
      buildDefaults({ nodeBuiltins: true, external: pkg.dependencies }),
      // Make the bundle executable after build completes
      {
        name: "make-executable",
        closeBundle: async () => {
          if (process.platform !== "win32") {
            await chmod(outFile, 0o755);
          }
        },
      },
    ],
    define: {
      __APP_VERSION__: JSON.stringify(pkg.version),
    },
    build: {
      target: "node20",
      lib: {
        entry: resolve(root, "src/bin/pkl-provisioner.ts"),
        formats: ["es"],
        fileName: () => "pkl-provisioner.js",
      },
      rollupOptions: {
        output: {
          banner: "#!/usr/bin/env node",
        },
      },
      outDir: resolve(root, "dist/bin"),
      emptyOutDir: true,
      // Don't report gzip sizes (not relevant for CLI scripts)
      reportCompressedSize: false,
    },
  };
});

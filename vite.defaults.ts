/**
 * Shared Vite defaults for consistent build behavior.
 *
 * Features:
 * - Fails build on Rollup warnings (always enabled)
 * - Configurable Node.js built-ins externalization
 * - Sensible defaults for minify/sourcemap
 *
 * Usage:
 *   import { buildDefaults } from "./vite.defaults";
 *   export default defineConfig({
 *     plugins: [buildDefaults({ nodeBuiltins: true })],
 *   });
 */

import { builtinModules } from "node:module";
import type { Plugin } from "vite";

export interface BuildDefaultsOptions {
  /**
   * Include Node.js built-in modules in rollupOptions.external.
   * Includes both bare (fs) and prefixed (node:fs) forms.
   * @default false
   */
  nodeBuiltins?: boolean;

  /**
   * Additional modules to externalize. A module's subpath imports
   * (e.g. "electron-log/node") are externalized with it.
   * Merged with nodeBuiltins if enabled.
   */
  external?: string[];

  /**
   * Enable minification.
   * @default false
   */
  minify?: boolean;

  /**
   * Enable sourcemaps.
   * @default false
   */
  sourcemap?: boolean;
}

const nodeBuiltins = [...builtinModules, ...builtinModules.map((m) => `node:${m}`)];

/**
 * Shared Vite plugin for consistent build behavior.
 *
 * Always fails build on Rollup warnings to catch issues early.
 */
export function buildDefaults(options: BuildDefaultsOptions = {}): Plugin {
  const {
    nodeBuiltins: includeNodeBuiltins = false,
    external = [],
    minify = false,
    sourcemap = false,
  } = options;

  const exact = new Set([...external, ...(includeNodeBuiltins ? nodeBuiltins : [])]);
  const isExternal = (id: string): boolean =>
    exact.has(id) || external.some((name) => id.startsWith(`${name}/`));

  return {
    name: "build-defaults",
    config() {
      return {
        build: {
          minify,
          sourcemap,
          rollupOptions: {
            external: isExternal,
            onLog(level, log, handler) {
              if (level === "warn") {
                throw new Error(`Rollup warning: ${log.message}`);
              }
              handler(level, log);
            },
          },
        },
      };
    },
  };
}

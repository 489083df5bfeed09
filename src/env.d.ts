/**
 * Global constants injected by Vite at build time.
 */

/**
 * Version from package.json. "dev" under the test runner.
 */
declare const __APP_VERSION__: string;

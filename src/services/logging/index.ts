/**
 * Logging module public API.
 */

export type { Logger, LoggerName, LoggingService, LogContext } from "./types";
export { LogLevel } from "./types";
export { ElectronLogService, parseLogLevel, verbosityToLevel } from "./electron-log-service";
export type { ElectronLogServiceOptions } from "./electron-log-service";

import type { Logger } from "./types";

/**
 * Logger that discards everything.
 * For boundary tests and callers that do not care about log output.
 */
export const SILENT_LOGGER: Logger = {
  silly: () => {},
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

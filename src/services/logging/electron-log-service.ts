/**
 * ElectronLogService - CLI logging implementation using electron-log's Node.js entry.
 *
 * Features:
 * - Console level driven by the CLI verbosity counter
 * - Environment variable configuration for level, log file and scope filter
 * - Named logger scopes for component identification
 * - Context serialization as key=value pairs
 */

import log from "electron-log/node";
import type { Logger, LoggerName, LoggingService, LogContext, LogLevel } from "./types";
import { LogLevel as LogLevelValues } from "./types";

/**
 * Type for electron-log scope (log functions).
 */
type ElectronLogScope = ReturnType<typeof log.scope>;

const LOG_FORMAT = "[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}";

/**
 * Options for ElectronLogService.
 */
export interface ElectronLogServiceOptions {
  /** Number of -v flags given on the command line */
  readonly verbosity: number;
  /** Environment to read PKL_PROVISIONER_* variables from. Default: process.env */
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Format context object as key=value pairs for log message.
 *
 * @param context - Context object to format
 * @returns Formatted string like "key1=value1 key2=value2"
 */
function formatContext(context: LogContext | undefined): string {
  if (!context) return "";
  return Object.entries(context)
    .map(([key, value]) => {
      if (value === null) return `${key}=null`;
      return `${key}=${String(value)}`;
    })
    .join(" ");
}

/**
 * Parse and validate PKL_PROVISIONER_LOGLEVEL environment variable.
 *
 * @returns Valid log level or undefined if invalid
 */
export function parseLogLevel(envValue: string | undefined): LogLevel | undefined {
  if (!envValue) return undefined;
  const normalized = envValue.toLowerCase().trim();
  return isLogLevel(normalized) ? normalized : undefined;
}

const LOG_LEVELS: ReadonlySet<string> = new Set<string>(Object.values(LogLevelValues));

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

/**
 * Map the -v counter to a console level.
 * 0 keeps the console quiet, 1 shows warnings, 2 info, 3 and more debug.
 */
export function verbosityToLevel(verbosity: number): LogLevel | false {
  if (verbosity <= 0) return false;
  if (verbosity === 1) return "warn";
  if (verbosity === 2) return "info";
  return "debug";
}

/**
 * Logger implementation wrapping an electron-log scope.
 */
class ElectronLogLogger implements Logger {
  private readonly scope: ElectronLogScope;

  constructor(scope: ElectronLogScope) {
    this.scope = scope;
  }

  silly(message: string, context?: LogContext): void {
    this.scope.silly(this.format(message, context));
  }

  debug(message: string, context?: LogContext): void {
    this.scope.debug(this.format(message, context));
  }

  info(message: string, context?: LogContext): void {
    this.scope.info(this.format(message, context));
  }

  warn(message: string, context?: LogContext): void {
    this.scope.warn(this.format(message, context));
  }

  error(message: string, context?: LogContext, error?: Error): void {
    const fullMessage = this.format(message, context);
    if (error) {
      this.scope.error(fullMessage, error);
    } else {
      this.scope.error(fullMessage);
    }
  }

  private format(message: string, context: LogContext | undefined): string {
    const contextStr = formatContext(context);
    return contextStr ? `${message} ${contextStr}` : message;
  }
}

/**
 * Parse PKL_PROVISIONER_LOGGER env var to get set of allowed logger names.
 *
 * @returns Set of allowed logger names, or undefined if not set (allow all)
 */
function parseLoggerFilter(envValue: string | undefined): Set<string> | undefined {
  if (!envValue) return undefined;
  const names = envValue
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  if (names.length === 0) return undefined;
  return new Set(names);
}

/**
 * Logger that filters based on allowed logger names.
 * If the logger is not in the allowed set, all log methods are no-ops.
 */
class FilteredLogger implements Logger {
  private readonly inner: Logger;
  private readonly enabled: boolean;

  constructor(inner: Logger, allowedLoggers: Set<string> | undefined, name: LoggerName) {
    this.inner = inner;
    this.enabled = allowedLoggers === undefined || allowedLoggers.has(name);
  }

  silly(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.silly(message, context);
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.debug(message, context);
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.info(message, context);
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.warn(message, context);
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (this.enabled) this.inner.error(message, context, error);
  }
}

/**
 * Logging service using electron-log.
 *
 * Configuration:
 * - Console level from the -v counter (see verbosityToLevel)
 * - Override via PKL_PROVISIONER_LOGLEVEL environment variable
 * - File output via PKL_PROVISIONER_LOG_FILE (path of the log file)
 * - Logger filtering via PKL_PROVISIONER_LOGGER (comma-separated logger names)
 *
 * Console output goes to stderr so command output on stdout stays clean.
 *
 * @example
 * ```typescript
 * const loggingService = new ElectronLogService({ verbosity: 2 });
 * const logger = loggingService.createLogger('provision');
 * logger.info('Downloading', { version: '0.28.2' });
 * // stderr: [2025-06-01 10:30:00.123] [info] [provision] Downloading version=0.28.2
 * ```
 */
export class ElectronLogService implements LoggingService {
  private readonly loggers = new Map<LoggerName, Logger>();
  private readonly consoleLevel: LogLevel | false;
  private readonly allowedLoggers: Set<string> | undefined;

  constructor(options: ElectronLogServiceOptions) {
    const env = options.env ?? process.env;

    // Env var > -v counter
    const envLevel = parseLogLevel(env.PKL_PROVISIONER_LOGLEVEL);
    this.consoleLevel = envLevel ?? verbosityToLevel(options.verbosity);

    this.allowedLoggers = parseLoggerFilter(env.PKL_PROVISIONER_LOGGER);

    log.transports.console.level = this.consoleLevel;
    log.transports.console.format = LOG_FORMAT;
    log.transports.console.writeFn = ({ message }): void => {
      process.stderr.write(`${message.data.map((part) => String(part)).join(" ")}\n`);
    };

    const logFile = env.PKL_PROVISIONER_LOG_FILE;
    if (logFile) {
      log.transports.file.resolvePathFn = (): string => logFile;
      log.transports.file.level = envLevel ?? "debug";
      log.transports.file.format = LOG_FORMAT;
    } else {
      log.transports.file.level = false;
    }
  }

  /**
   * Create a logger with the specified name (scope).
   * If PKL_PROVISIONER_LOGGER is set, only loggers in the list will actually log.
   */
  createLogger(name: LoggerName): Logger {
    const existing = this.loggers.get(name);
    if (existing) {
      return existing;
    }

    const scope = log.scope(`[${name}]`);
    const logger = new FilteredLogger(new ElectronLogLogger(scope), this.allowedLoggers, name);
    this.loggers.set(name, logger);
    return logger;
  }
}

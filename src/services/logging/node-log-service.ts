/**
 * NodeLogService - Logging implementation using electron-log's Node.js entry point.
 *
 * Features:
 * - Console output at a configurable level
 * - Optional session-based log files: `<datetime>-<uuid>.log`
 * - Environment variable configuration for level, log directory and scope filter
 * - Named logger scopes for component identification
 * - Context serialization as key=value pairs
 */

import log from "electron-log/node";
import { randomUUID } from "node:crypto";
import { join } from "node:path";
import type { Logger, LoggerName, LoggingService, LogContext } from "./types.js";
import { LogLevel, LOGGER_NAMES } from "./types.js";

/**
 * Type for electron-log scope (log functions).
 */
type ElectronLogScope = ReturnType<typeof log.scope>;

/**
 * Options for NodeLogService.
 */
export interface NodeLogServiceOptions {
  /** Level used when JDK_INSTALLER_LOGLEVEL is not set. Default: "info" */
  readonly defaultLevel?: LogLevel;
  /** Environment to read overrides from. Default: process.env */
  readonly env?: NodeJS.ProcessEnv;
}

const LOG_FORMAT = "[{h}:{i}:{s}.{ms}] [{level}] {scope} {text}";

/**
 * Format context object as key=value pairs for log message.
 *
 * @returns Formatted string like "key1=value1 key2=value2"
 */
export function formatContext(context: LogContext | undefined): string {
  if (!context) return "";
  return Object.entries(context)
    .map(([key, value]) => {
      if (value === null) return `${key}=null`;
      return `${key}=${String(value)}`;
    })
    .join(" ");
}

function isLogLevel(value: string): value is LogLevel {
  return Object.values(LogLevel).some((level) => level === value);
}

function isLoggerName(value: string): value is LoggerName {
  return LOGGER_NAMES.some((name) => name === value);
}

/**
 * Parse and validate JDK_INSTALLER_LOGLEVEL.
 *
 * @returns Valid log level or undefined if invalid
 */
export function parseLogLevel(envValue: string | undefined): LogLevel | undefined {
  if (!envValue) return undefined;
  const normalized = envValue.toLowerCase().trim();
  return isLogLevel(normalized) ? normalized : undefined;
}

/**
 * Parse JDK_INSTALLER_LOGGER to get set of allowed logger names.
 * Unknown names are dropped.
 *
 * @param envValue - Comma-separated logger names
 * @returns Set of allowed logger names, or undefined if not set (allow all)
 */
export function parseLoggerFilter(envValue: string | undefined): Set<LoggerName> | undefined {
  if (!envValue) return undefined;
  const names = envValue
    .split(",")
    .map((name) => name.trim())
    .filter(isLoggerName);
  if (names.length === 0) return undefined;
  return new Set(names);
}

/**
 * Generate session-based log filename.
 * Format: YYYY-MM-DDTHH-MM-SS-<uuid>.log
 */
function generateSessionFilename(): string {
  const timestamp = new Date()
    .toISOString()
    .replace(/[:.]/g, "-")
    .slice(0, 19); // YYYY-MM-DDTHH-MM-SS
  const uuid = randomUUID().slice(0, 8);
  return `${timestamp}-${uuid}.log`;
}

/**
 * Logger implementation wrapping an electron-log scope.
 */
class ElectronLogLogger implements Logger {
  constructor(private readonly scope: ElectronLogScope) {}

  silly(message: string, context?: LogContext): void {
    this.scope.silly(withContext(message, context));
  }

  debug(message: string, context?: LogContext): void {
    this.scope.debug(withContext(message, context));
  }

  info(message: string, context?: LogContext): void {
    this.scope.info(withContext(message, context));
  }

  warn(message: string, context?: LogContext): void {
    this.scope.warn(withContext(message, context));
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (error) {
      this.scope.error(withContext(message, context), error);
    } else {
      this.scope.error(withContext(message, context));
    }
  }
}

function withContext(message: string, context: LogContext | undefined): string {
  const contextStr = formatContext(context);
  return contextStr ? `${message} ${contextStr}` : message;
}

/**
 * Logger that filters based on allowed logger names.
 * If the logger is not in the allowed set, all log methods are no-ops.
 */
class FilteredLogger implements Logger {
  private readonly enabled: boolean;

  constructor(
    private readonly inner: Logger,
    allowedLoggers: Set<LoggerName> | undefined,
    name: LoggerName
  ) {
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
 * Logging service backed by electron-log/node.
 *
 * Configuration:
 * - Level: JDK_INSTALLER_LOGLEVEL, else `defaultLevel` (info)
 * - Log files: written to JDK_INSTALLER_LOG_DIR when set, disabled otherwise
 * - Logger filtering via JDK_INSTALLER_LOGGER (comma-separated logger names)
 *
 * @example
 * ```typescript
 * const loggingService = new NodeLogService({ defaultLevel: "debug" });
 * const logger = loggingService.createLogger('download');
 * logger.info('Download complete', { bytes: 195000000 });
 * // Output: [10:30:00.123] [info] [download] Download complete bytes=195000000
 * ```
 */
export class NodeLogService implements LoggingService {
  private readonly loggers = new Map<LoggerName, Logger>();
  private readonly allowedLoggers: Set<LoggerName> | undefined;
  readonly level: LogLevel;
  readonly logFile: string | null;

  constructor(options: NodeLogServiceOptions = {}) {
    const env = options.env ?? process.env;

    this.level = parseLogLevel(env.JDK_INSTALLER_LOGLEVEL) ?? options.defaultLevel ?? "info";
    this.allowedLoggers = parseLoggerFilter(env.JDK_INSTALLER_LOGGER);

    const logDir = env.JDK_INSTALLER_LOG_DIR;
    this.logFile = logDir ? join(logDir, generateSessionFilename()) : null;

    const logFile = this.logFile;
    if (logFile) {
      log.transports.file.resolvePathFn = (): string => logFile;
      log.transports.file.level = this.level;
      log.transports.file.format = LOG_FORMAT;
    } else {
      log.transports.file.level = false;
    }

    log.transports.console.level = this.level;
    log.transports.console.format = LOG_FORMAT;
  }

  /**
   * Create a logger with the specified name (scope).
   * If JDK_INSTALLER_LOGGER is set, only loggers in the list will actually log.
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

  dispose(): void {
    this.loggers.clear();
  }
}

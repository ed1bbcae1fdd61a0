/**
 * Logging module public API.
 */

export type { Logger, LoggerName, LoggingService, LogContext } from "./types.js";
export { LogLevel, LOGGER_NAMES, logAtLevel } from "./types.js";
export { NodeLogService, formatContext, parseLogLevel, parseLoggerFilter } from "./node-log-service.js";
export type { NodeLogServiceOptions } from "./node-log-service.js";

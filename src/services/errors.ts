/**
 * Service error definitions.
 *
 * Every installer stage raises its own ServiceError subclass so callers can
 * report which stage failed without parsing messages.
 */

import type { FileSystemErrorCode } from "./platform/filesystem.js";

/**
 * Error codes for archive extraction operations.
 */
export type ArchiveErrorCode = "INVALID_ARCHIVE" | "EXTRACTION_FAILED" | "PERMISSION_DENIED";

/**
 * Error codes for configuration problems.
 */
export type ConfigurationErrorCode = "MISSING_SOURCE" | "CONFLICTING_SOURCE" | "INVALID_OPTION";

/**
 * Installer stages that can fail, in pipeline order.
 */
export type InstallStage =
  | "configuration"
  | "resolution"
  | "acquisition"
  | "extraction"
  | "environment"
  | "verification";

/**
 * Discriminant carried by every ServiceError.
 */
export type ServiceErrorType = InstallStage | "filesystem";

/**
 * Base class for all service errors.
 */
export abstract class ServiceError extends Error {
  abstract readonly type: ServiceErrorType;
  readonly code: string | undefined;

  constructor(message: string, code?: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code ?? undefined;
    // Fix prototype chain for instanceof to work
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The request names no archive source, or names both.
 */
export class ConfigurationError extends ServiceError {
  readonly type = "configuration" as const;

  constructor(
    message: string,
    readonly errorCode?: ConfigurationErrorCode
  ) {
    super(message, errorCode);
    this.name = "ConfigurationError";
  }
}

/**
 * The release listing was unreachable, unparseable, or had no matching asset.
 */
export class ResolutionError extends ServiceError {
  readonly type = "resolution" as const;
}

/**
 * The archive download failed.
 */
export class AcquisitionError extends ServiceError {
  readonly type = "acquisition" as const;
}

/**
 * Archive unreadable, extraction failed, or destination not writable.
 */
export class ExtractionError extends ServiceError {
  readonly type = "extraction" as const;

  constructor(
    message: string,
    readonly errorCode?: ArchiveErrorCode
  ) {
    super(message, errorCode);
    this.name = "ExtractionError";
  }
}

/**
 * Reading or writing a machine-scoped environment variable failed.
 */
export class EnvironmentError extends ServiceError {
  readonly type = "environment" as const;
}

/**
 * The installed executable is missing or does not report a version.
 */
export class VerificationError extends ServiceError {
  readonly type = "verification" as const;
}

/**
 * Error from filesystem operations.
 */
export class FileSystemError extends ServiceError {
  readonly type = "filesystem" as const;

  constructor(
    /** Mapped error code */
    readonly fsCode: FileSystemErrorCode,
    /** Path that caused the error */
    readonly path: string,
    message: string,
    /** Original error for debugging */
    override readonly cause?: Error,
    /** Original Node.js error code (e.g., "EMFILE", "ENOSPC") */
    readonly originalCode?: string
  ) {
    super(message, fsCode);
    this.name = "FileSystemError";
  }

}

/**
 * Type guard to check if an error is a ServiceError.
 */
export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

/**
 * Extract a message string from an unknown error.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * FileSystemLayer - Abstraction over filesystem operations.
 *
 * Provides an injectable interface for filesystem access, enabling:
 * - Unit testing of services with mock FileSystemLayer
 * - Boundary testing of DefaultFileSystemLayer against real filesystem
 * - Consistent error handling via FileSystemError
 */

import * as fs from "node:fs/promises";
import { createWriteStream } from "node:fs";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { FileSystemError } from "../errors.js";
import type { Logger } from "../logging/index.js";

/**
 * Result of a stat call.
 */
export interface FileStat {
  readonly isDirectory: boolean;
  readonly isFile: boolean;
  /** Size in bytes */
  readonly size: number;
}

/**
 * Options for mkdir operation.
 */
export interface MkdirOptions {
  /** Create parent directories if they don't exist (default: true) */
  readonly recursive?: boolean;
}

/**
 * Error codes for filesystem operations.
 */
export type FileSystemErrorCode =
  | "ENOENT" // File/directory not found
  | "EACCES" // Permission denied
  | "EEXIST" // File/directory already exists
  | "ENOTDIR" // Not a directory
  | "EISDIR" // Is a directory (when file expected)
  | "ENOTEMPTY" // Directory not empty
  | "UNKNOWN"; // Other errors (check originalCode)

/**
 * Abstraction over filesystem operations.
 *
 * All paths are absolute. Methods throw FileSystemError on failures.
 *
 * NOTE: No exists() method - use stat() and check for ENOENT.
 */
export interface FileSystemLayer {
  /**
   * Create directory. Creates parent directories by default.
   * No-op if directory already exists.
   *
   * @throws FileSystemError with code EEXIST if path exists as a file
   * @throws FileSystemError with code EACCES if permission denied
   */
  mkdir(path: string, options?: MkdirOptions): Promise<void>;

  /**
   * Get type and size of a path. Follows symlinks.
   *
   * @throws FileSystemError with code ENOENT if path not found
   */
  stat(path: string): Promise<FileStat>;

  /**
   * Delete a file.
   *
   * @throws FileSystemError with code ENOENT if file not found
   * @throws FileSystemError with code EISDIR if path is a directory
   */
  unlink(path: string): Promise<void>;

  /**
   * Stream content into a file. Overwrites existing file.
   * Resolves once every chunk has been flushed.
   *
   * @param path - Absolute path to file
   * @param content - Web stream, e.g. a fetch Response body
   * @throws FileSystemError with code ENOENT if parent directory doesn't exist
   * @throws FileSystemError with code EACCES if permission denied
   *
   * @example
   * const response = await fetch(url);
   * await fs.writeStream('/tmp/archive.zip', response.body);
   */
  writeStream(path: string, content: ReadableStream<Uint8Array>): Promise<void>;
}

// ============================================================================
// Helper Functions
// ============================================================================

const KNOWN_ERROR_CODES: ReadonlySet<string> = new Set<FileSystemErrorCode>([
  "ENOENT",
  "EACCES",
  "EEXIST",
  "ENOTDIR",
  "EISDIR",
  "ENOTEMPTY",
]);

function isKnownErrorCode(code: string | undefined): code is FileSystemErrorCode {
  return code !== undefined && KNOWN_ERROR_CODES.has(code);
}

/**
 * Extract the POSIX error code from a Node.js error.
 * fs.rm() reports ERR_FS_* codes with the POSIX code under info.code.
 */
function extractErrorCode(error: Error): string | undefined {
  if ("info" in error && typeof error.info === "object" && error.info !== null) {
    const info: { code?: unknown } = error.info;
    if (typeof info.code === "string") {
      return info.code;
    }
  }
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Map a Node.js filesystem error to a FileSystemError.
 */
export function mapError(error: unknown, path: string): FileSystemError {
  if (!(error instanceof Error)) {
    return new FileSystemError("UNKNOWN", path, String(error));
  }

  const code = extractErrorCode(error);

  if (isKnownErrorCode(code)) {
    return new FileSystemError(code, path, error.message, error);
  }

  // Unknown error code - preserve original code
  return new FileSystemError("UNKNOWN", path, error.message, error, code);
}

// ============================================================================
// DefaultFileSystemLayer Implementation
// ============================================================================

/**
 * Default implementation of FileSystemLayer using node:fs/promises.
 * Maps Node.js errors to FileSystemError for consistent error handling.
 */
export class DefaultFileSystemLayer implements FileSystemLayer {
  constructor(private readonly logger: Logger) {}

  async mkdir(dirPath: string, options?: MkdirOptions): Promise<void> {
    const recursive = options?.recursive ?? true;
    this.logger.debug("Mkdir", { path: dirPath });
    try {
      await fs.mkdir(dirPath, { recursive });
    } catch (error) {
      throw this.fail("Mkdir failed", error, dirPath);
    }
  }

  async stat(targetPath: string): Promise<FileStat> {
    try {
      const stats = await fs.stat(targetPath);
      return {
        isDirectory: stats.isDirectory(),
        isFile: stats.isFile(),
        size: stats.size,
      };
    } catch (error) {
      const fsError = mapError(error, targetPath);
      // ENOENT is how callers test for existence
      if (fsError.fsCode !== "ENOENT") {
        this.logger.warn("Stat failed", {
          path: targetPath,
          code: fsError.fsCode,
          error: fsError.message,
        });
      }
      throw fsError;
    }
  }

  async unlink(filePath: string): Promise<void> {
    this.logger.debug("Unlink", { path: filePath });
    try {
      await fs.unlink(filePath);
    } catch (error) {
      throw this.fail("Unlink failed", error, filePath);
    }
  }

  async writeStream(filePath: string, content: ReadableStream<Uint8Array>): Promise<void> {
    this.logger.debug("WriteStream", { path: filePath });
    try {
      await pipeline(Readable.fromWeb(content), createWriteStream(filePath));
    } catch (error) {
      throw this.fail("WriteStream failed", error, filePath);
    }
  }

  private fail(message: string, error: unknown, path: string): FileSystemError {
    const fsError = mapError(error, path);
    this.logger.warn(message, {
      path,
      code: fsError.fsCode,
      error: fsError.message,
    });
    return fsError;
  }
}

/**
 * Archive download into a temporary file.
 */

import { randomUUID } from "node:crypto";
import * as path from "node:path";
import { AcquisitionError, FileSystemError, getErrorMessage } from "../errors.js";
import { discardBody, type HttpClient } from "../platform/network.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import type { PlatformInfo } from "../platform/platform-info.js";
import type { Logger } from "../logging/index.js";
import type { DownloadProgressCallback } from "./types.js";

/**
 * Fetches a remote archive to a local temporary file.
 */
export interface ArchiveAcquirer {
  /**
   * Download `url` into a new temporary file.
   * The caller owns the returned file and must hand it to release().
   * A failed download leaves no file behind.
   *
   * @throws AcquisitionError on transport failure, non-2xx status, or write failure
   */
  download(url: string, onProgress?: DownloadProgressCallback): Promise<string>;

  /**
   * Remove a temporary archive. Never throws.
   */
  release(archivePath: string): Promise<void>;
}

export interface HttpArchiveAcquirerOptions {
  /** Timeout for the whole download in ms. Default: 600000 */
  readonly timeoutMs?: number;
}

const TEMP_PREFIX = "jdk-installer";

/**
 * Temp file name for a download, keeping the URL's file name so the
 * extractor can tell the format from the extension.
 */
export function tempFileName(url: string, uniqueId: string): string {
  const segment = path.posix.basename(new URL(url).pathname);
  return `${TEMP_PREFIX}-${uniqueId}-${segment || "archive"}`;
}

/**
 * ArchiveAcquirer that streams the response body to disk.
 */
export class HttpArchiveAcquirer implements ArchiveAcquirer {
  private readonly timeoutMs: number;

  constructor(
    private readonly httpClient: HttpClient,
    private readonly fileSystemLayer: FileSystemLayer,
    private readonly platformInfo: PlatformInfo,
    private readonly logger: Logger,
    options: HttpArchiveAcquirerOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 600000;
  }

  async download(url: string, onProgress?: DownloadProgressCallback): Promise<string> {
    let tempFile: string;
    try {
      tempFile = path.join(this.platformInfo.tmpDir, tempFileName(url, randomUUID().slice(0, 8)));
    } catch (error) {
      throw new AcquisitionError(`Invalid download URL ${url}: ${getErrorMessage(error)}`);
    }

    this.logger.info("Downloading", { url, path: tempFile });

    let response: Response;
    try {
      response = await this.httpClient.fetch(url, { timeout: this.timeoutMs });
    } catch (error) {
      throw new AcquisitionError(`Network error downloading ${url}: ${getErrorMessage(error)}`);
    }

    if (!response.ok) {
      await discardBody(response, this.logger);
      throw new AcquisitionError(`HTTP ${response.status} downloading ${url}`);
    }
    if (!response.body) {
      throw new AcquisitionError(`Empty response body downloading ${url}`);
    }

    const contentLength = response.headers.get("content-length");
    const totalBytes = contentLength ? parseInt(contentLength, 10) : null;
    let bytesDownloaded = 0;

    const counted = response.body.pipeThrough(
      new TransformStream<Uint8Array, Uint8Array>({
        transform(chunk, controller) {
          bytesDownloaded += chunk.byteLength;
          onProgress?.({ bytesDownloaded, totalBytes });
          controller.enqueue(chunk);
        },
      })
    );

    try {
      await this.fileSystemLayer.writeStream(tempFile, counted);
    } catch (error) {
      // The caller never sees tempFile, so a partial file is ours to remove
      await this.release(tempFile);
      throw new AcquisitionError(
        `Failed to download ${url} to ${tempFile}: ${getErrorMessage(error)}`
      );
    }

    this.logger.info("Download complete", { url, path: tempFile, bytes: bytesDownloaded });
    return tempFile;
  }

  async release(archivePath: string): Promise<void> {
    try {
      await this.fileSystemLayer.unlink(archivePath);
      this.logger.debug("Released temporary archive", { path: archivePath });
    } catch (error) {
      if (error instanceof FileSystemError && error.fsCode === "ENOENT") {
        return;
      }
      this.logger.warn("Failed to remove temporary archive", {
        path: archivePath,
        error: getErrorMessage(error),
      });
    }
  }
}

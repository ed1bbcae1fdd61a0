/**
 * Archive extraction interface and implementations.
 */

import * as tar from "tar";
import yauzl from "yauzl";
import * as fs from "node:fs";
import * as path from "node:path";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { ExtractionError, getErrorMessage, type ArchiveErrorCode } from "../errors.js";
import type { Logger } from "../logging/index.js";

/**
 * Interface for extracting archives.
 */
export interface ArchiveExtractor {
  /**
   * Extract an archive into an existing directory, merging with its contents.
   * Files at the same relative path are overwritten; nothing is removed.
   *
   * @param archivePath - Path to the archive file
   * @param destDir - Existing directory to extract into
   * @param stripLevels - Leading path segments dropped from every entry
   * @throws ExtractionError on extraction failure
   */
  extract(archivePath: string, destDir: string, stripLevels: number): Promise<void>;
}

function errorCodeOf(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function classify(error: unknown): ArchiveErrorCode {
  if (error instanceof ExtractionError && error.errorCode) {
    return error.errorCode;
  }
  const code = errorCodeOf(error) ?? "";
  const message = getErrorMessage(error);
  if (code === "EACCES" || code === "EPERM" || /EACCES|EPERM/.test(message)) {
    return "PERMISSION_DENIED";
  }
  if (
    code.startsWith("TAR_") ||
    code.startsWith("Z_") ||
    /zlib|unexpected end|end of central directory|invalid/i.test(message)
  ) {
    return "INVALID_ARCHIVE";
  }
  return "EXTRACTION_FAILED";
}

/**
 * Wrap any extraction failure so the message names both archive and destination.
 */
export function toExtractionError(
  error: unknown,
  archivePath: string,
  destDir: string
): ExtractionError {
  return new ExtractionError(
    `Failed to extract ${archivePath} into ${destDir}: ${getErrorMessage(error)}`,
    classify(error)
  );
}

/**
 * Map an archive entry name to its location under destDir after stripping.
 *
 * @returns Absolute target path, or null when stripping leaves nothing
 * @throws ExtractionError when the entry would land outside destDir
 */
export function resolveEntryPath(
  destDir: string,
  entryName: string,
  stripLevels: number
): string | null {
  const segments = entryName.split(/[\\/]/).filter((segment) => segment !== "" && segment !== ".");
  if (segments.length <= stripLevels) {
    return null;
  }

  const root = path.resolve(destDir);
  const target = path.resolve(root, ...segments.slice(stripLevels));
  const relative = path.relative(root, target);
  if (
    relative === "" ||
    relative === ".." ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative)
  ) {
    throw new ExtractionError(`entry ${entryName} escapes the destination`, "INVALID_ARCHIVE");
  }
  return target;
}

/**
 * Extractor for .tar.gz archives using the `tar` package.
 */
export class TarExtractor implements ArchiveExtractor {
  constructor(private readonly logger?: Logger) {}

  async extract(archivePath: string, destDir: string, stripLevels: number): Promise<void> {
    try {
      await tar.extract({
        file: archivePath,
        cwd: destDir,
        strip: stripLevels,
        // Entry problems such as `..` paths reject instead of being skipped
        strict: true,
        onReadEntry: (entry) => {
          this.logger?.silly(`Entry ${entry.path}`);
        },
      });
    } catch (error) {
      throw toExtractionError(error, archivePath, destDir);
    }
  }
}

/**
 * Extractor for .zip archives using the `yauzl` package.
 */
export class ZipExtractor implements ArchiveExtractor {
  constructor(private readonly logger?: Logger) {}

  async extract(archivePath: string, destDir: string, stripLevels: number): Promise<void> {
    try {
      await this.extractZip(archivePath, destDir, stripLevels);
    } catch (error) {
      throw toExtractionError(error, archivePath, destDir);
    }
  }

  private extractZip(archivePath: string, destDir: string, stripLevels: number): Promise<void> {
    return new Promise((resolve, reject) => {
      yauzl.open(archivePath, { lazyEntries: true }, (err, zipfile) => {
        if (err) {
          reject(err);
          return;
        }

        zipfile.on("entry", (entry: yauzl.Entry) => {
          this.writeEntry(zipfile, entry, destDir, stripLevels)
            .then(() => zipfile.readEntry())
            .catch((error: unknown) => {
              zipfile.close();
              reject(error);
            });
        });
        zipfile.on("end", () => resolve());
        zipfile.on("error", reject);
        zipfile.readEntry();
      });
    });
  }

  private async writeEntry(
    zipfile: yauzl.ZipFile,
    entry: yauzl.Entry,
    destDir: string,
    stripLevels: number
  ): Promise<void> {
    const target = resolveEntryPath(destDir, entry.fileName, stripLevels);
    if (target === null) {
      return;
    }
    this.logger?.silly(`Entry ${entry.fileName}`);

    if (entry.fileName.endsWith("/")) {
      await fs.promises.mkdir(target, { recursive: true });
      return;
    }

    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    const readStream = await openReadStream(zipfile, entry);
    await pipeline(readStream, fs.createWriteStream(target));

    // Unix mode bits live in the upper 16 bits of the external attributes
    const mode = (entry.externalFileAttributes >>> 16) & 0o777;
    if (mode !== 0 && process.platform !== "win32") {
      await fs.promises.chmod(target, mode);
    }
  }
}

function openReadStream(zipfile: yauzl.ZipFile, entry: yauzl.Entry): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (err, stream) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(stream);
    });
  });
}

/**
 * Archive extractor that selects the appropriate implementation based on file extension.
 */
export class DefaultArchiveExtractor implements ArchiveExtractor {
  private readonly tarExtractor: TarExtractor;
  private readonly zipExtractor: ZipExtractor;

  constructor(private readonly logger?: Logger) {
    this.tarExtractor = new TarExtractor(logger);
    this.zipExtractor = new ZipExtractor(logger);
  }

  async extract(archivePath: string, destDir: string, stripLevels: number): Promise<void> {
    const lowerPath = archivePath.toLowerCase();
    this.logger?.info("Extracting", { archive: archivePath, destination: destDir, stripLevels });

    if (lowerPath.endsWith(".tar.gz") || lowerPath.endsWith(".tgz")) {
      return this.tarExtractor.extract(archivePath, destDir, stripLevels);
    }

    if (lowerPath.endsWith(".zip")) {
      return this.zipExtractor.extract(archivePath, destDir, stripLevels);
    }

    throw new ExtractionError(
      `Failed to extract ${archivePath} into ${destDir}: unsupported archive format, expected .zip, .tar.gz or .tgz`,
      "INVALID_ARCHIVE"
    );
  }
}

/**
 * JdkInstaller - drives one installation from archive source to verified JDK.
 *
 * States, in order:
 *   Start -> DestinationPrepared -> SourceResolved -> Extracted
 *         -> [EnvironmentUpdated] -> Verified -> Done
 *
 * Any stage error ends the run with that stage's ServiceError. There is no
 * rollback: files already extracted and variables already written stay.
 */

import { ExtractionError, FileSystemError, getErrorMessage } from "../errors.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import type { Logger } from "../logging/index.js";
import type { ArchiveAcquirer } from "./archive-acquirer.js";
import type { ArchiveExtractor } from "./archive-extractor.js";
import type { EnvironmentConfigurator } from "./environment-configurator.js";
import type { InstallationVerifier } from "./installation-verifier.js";
import type { ReleaseResolver } from "./release-resolver.js";
import type {
  DownloadProgressCallback,
  EnvironmentUpdateResult,
  InstallRequest,
  InstallResult,
  JdkDistribution,
} from "./types.js";

export type InstallState =
  | "Start"
  | "DestinationPrepared"
  | "SourceResolved"
  | "Extracted"
  | "EnvironmentUpdated"
  | "Verified"
  | "Done";

export interface JdkInstallerDeps {
  readonly fileSystemLayer: FileSystemLayer;
  readonly resolver: ReleaseResolver;
  readonly acquirer: ArchiveAcquirer;
  readonly extractor: ArchiveExtractor;
  readonly configurator: Pick<EnvironmentConfigurator, "applyPathUpdate">;
  readonly verifier: Pick<InstallationVerifier, "verify">;
  readonly distribution: JdkDistribution;
  readonly logger: Logger;
}

export class JdkInstaller {
  constructor(private readonly deps: JdkInstallerDeps) {}

  /**
   * Run the installation described by `request`.
   *
   * @param onProgress - Receives download progress when the archive is downloaded
   * @throws ExtractionError, ResolutionError, AcquisitionError, EnvironmentError or VerificationError
   */
  async install(
    request: InstallRequest,
    onProgress?: DownloadProgressCallback
  ): Promise<InstallResult> {
    const { destination } = request;
    this.enter("Start", { destination, source: request.source.kind });

    await this.prepareDestination(destination);
    this.enter("DestinationPrepared", { destination });

    let downloadUrl: string | undefined;
    if (request.source.kind === "file") {
      this.enter("SourceResolved", { archive: request.source.path });
      await this.extract(request.source.path, destination);
    } else {
      const { resolver, acquirer, distribution } = this.deps;
      downloadUrl = await resolver.resolveLatest(distribution.repository, distribution.assetPattern);
      const archivePath = await acquirer.download(downloadUrl, onProgress);
      this.enter("SourceResolved", { archive: archivePath, url: downloadUrl });
      try {
        await this.extract(archivePath, destination);
      } finally {
        await acquirer.release(archivePath);
      }
    }
    this.enter("Extracted", { destination });

    let environment: EnvironmentUpdateResult | undefined;
    if (request.updatePath) {
      environment = await this.deps.configurator.applyPathUpdate(destination);
      this.enter("EnvironmentUpdated", { ...environment });
    }

    const version = await this.deps.verifier.verify(destination);
    this.enter("Verified", { version });

    const result: InstallResult = {
      destination,
      version,
      source: request.source.kind,
      ...(downloadUrl !== undefined && { downloadUrl }),
      ...(environment !== undefined && { environment }),
    };
    this.enter("Done", { destination });
    this.deps.logger.info("Installation complete", { destination });
    return result;
  }

  private enter(state: InstallState, context: Record<string, string | boolean>): void {
    this.deps.logger.debug("State", { state, ...context });
  }

  /**
   * Use an existing directory as-is, or create it.
   */
  private async prepareDestination(destination: string): Promise<void> {
    const { fileSystemLayer, logger } = this.deps;

    try {
      const stat = await fileSystemLayer.stat(destination);
      if (!stat.isDirectory) {
        throw new ExtractionError(
          `Destination ${destination} exists and is not a directory`,
          "EXTRACTION_FAILED"
        );
      }
      logger.warn("Destination already exists, merging into it", { destination });
      return;
    } catch (error) {
      if (error instanceof ExtractionError) throw error;
      if (!(error instanceof FileSystemError && error.fsCode === "ENOENT")) {
        throw new ExtractionError(
          `Cannot inspect destination ${destination}: ${getErrorMessage(error)}`,
          "EXTRACTION_FAILED"
        );
      }
    }

    try {
      await fileSystemLayer.mkdir(destination, { recursive: true });
    } catch (error) {
      const code =
        error instanceof FileSystemError && error.fsCode === "EACCES"
          ? "PERMISSION_DENIED"
          : "EXTRACTION_FAILED";
      throw new ExtractionError(
        `Cannot create destination ${destination}: ${getErrorMessage(error)}`,
        code
      );
    }
  }

  private async extract(archivePath: string, destination: string): Promise<void> {
    const { extractor, distribution } = this.deps;
    try {
      await extractor.extract(archivePath, destination, distribution.stripLevels);
    } catch (error) {
      if (error instanceof ExtractionError) throw error;
      throw new ExtractionError(
        `Failed to extract ${archivePath} into ${destination}: ${getErrorMessage(error)}`,
        "EXTRACTION_FAILED"
      );
    }
  }
}

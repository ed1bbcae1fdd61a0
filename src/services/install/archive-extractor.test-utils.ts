/**
 * Test utilities for ArchiveExtractor.
 */

import { vi, type Mock } from "vitest";
import { ExtractionError, type ArchiveErrorCode } from "../errors.js";

/**
 * Options for creating a mock archive extractor.
 */
export interface MockArchiveExtractorOptions {
  /**
   * If provided, the extract method will reject with this error.
   */
  error?: {
    message: string;
    code: ArchiveErrorCode;
  };
  /** Runs on each extract call, e.g. to write files into destDir */
  onExtract?: (archivePath: string, destDir: string, stripLevels: number) => Promise<void>;
}

/**
 * Mock ArchiveExtractor type with spy on extract.
 */
export interface MockArchiveExtractor {
  extract: Mock<(archivePath: string, destDir: string, stripLevels: number) => Promise<void>>;
}

/**
 * Create a mock ArchiveExtractor with controllable behavior.
 */
export function createMockArchiveExtractor(
  options: MockArchiveExtractorOptions = {}
): MockArchiveExtractor {
  return {
    extract: vi.fn(async (archivePath: string, destDir: string, stripLevels: number) => {
      if (options.error) {
        throw new ExtractionError(options.error.message, options.error.code);
      }
      await options.onExtract?.(archivePath, destDir, stripLevels);
    }),
  };
}

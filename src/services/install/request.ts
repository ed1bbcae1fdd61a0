/**
 * Validation of raw installer options into an InstallRequest.
 */

import * as path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import type { InstallRequest } from "./types.js";

/**
 * Options as they arrive from the command line.
 */
export const RawInstallOptionsSchema = z
  .object({
    file: z.string().min(1, "must not be empty").optional(),
    latest: z.boolean().optional(),
    destination: z.string().min(1, "must not be empty").optional(),
    updatePath: z.boolean().optional(),
  })
  .strict();

export type RawInstallOptions = z.input<typeof RawInstallOptionsSchema>;

/**
 * Build an InstallRequest, checking everything before any side effect.
 *
 * @param defaultDestination - Used when no destination is given
 * @throws ConfigurationError when options are malformed, or name no source or both sources
 *
 * @example
 * createInstallRequest({ latest: true }, "C:\\Program Files\\Java\\jdk-21");
 * // { source: { kind: "download-latest" }, destination: "C:\\Program Files\\Java\\jdk-21", updatePath: false }
 */
export function createInstallRequest(raw: unknown, defaultDestination: string): InstallRequest {
  const parsed = RawInstallOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid options: ${message}`, "INVALID_OPTION");
  }

  const { file, latest, destination, updatePath } = parsed.data;
  if (file !== undefined && latest === true) {
    throw new ConfigurationError(
      "Both an archive file and --latest were given; choose one",
      "CONFLICTING_SOURCE"
    );
  }
  if (file === undefined && latest !== true) {
    throw new ConfigurationError(
      "No archive source given: pass --file <archive> or --latest",
      "MISSING_SOURCE"
    );
  }

  return {
    source: file !== undefined ? { kind: "file", path: path.resolve(file) } : { kind: "download-latest" },
    destination: path.resolve(destination ?? defaultDestination),
    updatePath: updatePath ?? false,
  };
}

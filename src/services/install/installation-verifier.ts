/**
 * Post-install check that runs the installed executable.
 */

import * as path from "node:path";
import { FileSystemError, VerificationError, getErrorMessage } from "../errors.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import type { ProcessRunner } from "../platform/process.js";
import type { Logger } from "../logging/index.js";
import type { JdkDistribution } from "./types.js";

export interface InstallationVerifierOptions {
  /** Timeout for the version query in ms. Default: 30000 */
  readonly timeoutMs?: number;
}

/**
 * Lines of `output` that mention "version", trimmed.
 */
export function extractVersionLines(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.includes("version"));
}

/**
 * Runs `<installRoot>/<executable> -version` and reports what it prints.
 */
export class InstallationVerifier {
  private readonly timeoutMs: number;

  constructor(
    private readonly fileSystemLayer: FileSystemLayer,
    private readonly processRunner: ProcessRunner,
    private readonly distribution: Pick<JdkDistribution, "executable">,
    private readonly logger: Logger,
    options: InstallationVerifierOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  /**
   * @returns The version lines, joined with newlines
   * @throws VerificationError when the executable is missing, fails, or prints no version
   */
  async verify(installRoot: string): Promise<string> {
    const executable = path.join(installRoot, ...this.distribution.executable.split("/"));

    await this.requireFile(executable);

    // -version prints to stderr on most JDKs
    const result = await this.processRunner
      .run(executable, ["-version"], { timeout: this.timeoutMs })
      .wait();
    const combined = [result.stdout, result.stderr].filter((text) => text !== "").join("\n");

    if (result.exitCode !== 0) {
      const detail = result.timedOut
        ? "timed out"
        : result.exitCode === null
          ? combined.trim() || "failed to start"
          : `exit code ${result.exitCode}`;
      throw new VerificationError(`${executable} -version failed: ${detail}`);
    }

    const lines = extractVersionLines(combined);
    if (lines.length === 0) {
      throw new VerificationError(`${executable} -version printed no version line`);
    }

    const version = lines.join("\n");
    this.logger.info("Verified installation", { executable, version: lines[0] ?? "" });
    return version;
  }

  private async requireFile(executable: string): Promise<void> {
    try {
      const stat = await this.fileSystemLayer.stat(executable);
      if (stat.isFile) {
        return;
      }
    } catch (error) {
      if (!(error instanceof FileSystemError && error.fsCode === "ENOENT")) {
        throw new VerificationError(`Cannot inspect ${executable}: ${getErrorMessage(error)}`);
      }
    }
    throw new VerificationError(`binary not found at ${executable}`);
  }
}

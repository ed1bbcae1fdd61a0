/**
 * Command-line front end for the JDK installer.
 *
 * Exit codes:
 *   0 - installed and verified
 *   1 - a stage failed (resolution, download, extraction, environment, verification)
 *   2 - bad options or configuration
 */

import { Command, CommanderError } from "commander";
import { loadInstallerConfig } from "./services/config/index.js";
import { ConfigurationError, getErrorMessage, isServiceError } from "./services/errors.js";
import {
  createInstallRequest,
  createJdkInstaller,
  type DownloadProgressCallback,
  type InstallerPlatformDeps,
} from "./services/install/index.js";
import {
  NodeLogService,
  logAtLevel,
  type Logger,
  type LoggingService,
} from "./services/logging/index.js";
import { DefaultFileSystemLayer } from "./services/platform/filesystem.js";
import { DefaultNetworkLayer } from "./services/platform/network.js";
import { NodePlatformInfo } from "./services/platform/platform-info.js";
import { ExecaProcessRunner } from "./services/platform/process.js";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIGURATION = 2;

const PROGRESS_STEP_PERCENT = 10;
const PROGRESS_STEP_BYTES = 10 * 1024 * 1024;

type CliOptions = {
  file?: string;
  latest?: boolean;
  destination?: string;
  updatePath?: boolean;
  verbose?: boolean;
};

export interface CliOutput {
  stdout(line: string): void;
  stderr(line: string): void;
}

export type CliPlatform = Omit<InstallerPlatformDeps, "loggingService">;

export interface CliDeps {
  readonly env: NodeJS.ProcessEnv;
  readonly output: CliOutput;
  readonly createLoggingService: (verbose: boolean, env: NodeJS.ProcessEnv) => LoggingService;
  readonly createPlatform: (loggingService: LoggingService) => CliPlatform;
}

/**
 * Production wiring: electron-log on the console, real network, filesystem
 * and processes.
 */
export function createDefaultCliDeps(): CliDeps {
  return {
    env: process.env,
    output: {
      stdout: (line) => process.stdout.write(`${line}\n`),
      stderr: (line) => process.stderr.write(`${line}\n`),
    },
    createLoggingService: (verbose, env) =>
      new NodeLogService({ env, defaultLevel: verbose ? "debug" : "info" }),
    createPlatform: (loggingService) => ({
      httpClient: new DefaultNetworkLayer(loggingService.createLogger("network")),
      fileSystemLayer: new DefaultFileSystemLayer(loggingService.createLogger("fs")),
      processRunner: new ExecaProcessRunner(loggingService.createLogger("process")),
      platformInfo: new NodePlatformInfo(),
    }),
  };
}

function createProgram(output: CliOutput): Command {
  return new Command()
    .name("jdk-installer")
    .description("Install a JDK from a release archive and optionally register it machine-wide")
    .option("--file <archive>", "install from a local .zip, .tar.gz or .tgz archive")
    .option("--latest", "download the newest release archive")
    .option("--destination <dir>", "install directory (merged into when it exists)")
    .option("--update-path", "set the home variable and add the install to machine PATH")
    .option("--verbose", "log debug output")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => output.stdout(text.trimEnd()),
      writeErr: (text) => output.stderr(text.trimEnd()),
    });
}

/**
 * Logs download progress in steps of 10%, or every 10 MiB when the size is unknown.
 */
export function createProgressReporter(logger: Logger): DownloadProgressCallback {
  let lastStep = -1;
  return ({ bytesDownloaded, totalBytes }) => {
    if (totalBytes !== null && totalBytes > 0) {
      const percent = Math.floor((bytesDownloaded / totalBytes) * 100);
      const step = Math.floor(percent / PROGRESS_STEP_PERCENT);
      if (step > lastStep) {
        lastStep = step;
        logger.info("Downloading", { percent, bytesDownloaded, totalBytes });
      }
      return;
    }
    const step = Math.floor(bytesDownloaded / PROGRESS_STEP_BYTES);
    if (step > lastStep) {
      lastStep = step;
      logger.info("Downloading", { bytesDownloaded });
    }
  };
}

function exitCodeFor(error: unknown): number {
  return error instanceof ConfigurationError ? EXIT_CONFIGURATION : EXIT_FAILURE;
}

function describeError(error: unknown): string {
  return isServiceError(error) ? `[${error.type}] ${error.message}` : `[internal] ${getErrorMessage(error)}`;
}

/**
 * Run the installer with `argv` (arguments only, without node and script).
 *
 * Prints the verified version line to stdout on success and
 * `[<error type>] <message>` to stderr on failure.
 */
export async function main(
  argv: readonly string[],
  deps: CliDeps = createDefaultCliDeps()
): Promise<number> {
  const { output } = deps;
  const program = createProgram(output);

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_SUCCESS : EXIT_CONFIGURATION;
    }
    throw error;
  }

  const { verbose, ...installOptions } = program.opts<CliOptions>();
  const loggingService = deps.createLoggingService(verbose === true, deps.env);
  const logger = loggingService.createLogger("cli");

  try {
    const config = loadInstallerConfig(deps.env, logger);
    const request = createInstallRequest(installOptions, config.distribution.defaultDestination);

    const platform = deps.createPlatform(loggingService);
    const { platformInfo } = platform;
    if (platformInfo.platform !== "win32" || platformInfo.arch !== "x64") {
      logger.warn("Release archives target Windows x64", {
        platform: platformInfo.platform,
        arch: platformInfo.arch,
      });
    }

    const installer = createJdkInstaller(config, { ...platform, loggingService });
    const result = await installer.install(request, createProgressReporter(logger));

    output.stdout(result.version);
    return EXIT_SUCCESS;
  } catch (error) {
    const exitCode = exitCodeFor(error);
    logAtLevel(logger, exitCode === EXIT_CONFIGURATION ? "warn" : "error", "Installation failed", {
      error: getErrorMessage(error),
    });
    output.stderr(describeError(error));
    return exitCode;
  } finally {
    loggingService.dispose();
  }
}

/**
 * Wiring of JdkInstaller from configuration and platform layers.
 */

import type { InstallerConfig } from "../config/types.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import type { HttpClient } from "../platform/network.js";
import type { PlatformInfo } from "../platform/platform-info.js";
import type { ProcessRunner } from "../platform/process.js";
import type { LoggingService } from "../logging/index.js";
import { HttpArchiveAcquirer } from "./archive-acquirer.js";
import { DefaultArchiveExtractor, type ArchiveExtractor } from "./archive-extractor.js";
import { EnvironmentConfigurator } from "./environment-configurator.js";
import { PowerShellEnvironmentStore, type EnvironmentStore } from "./environment-store.js";
import { InstallationVerifier } from "./installation-verifier.js";
import { JdkInstaller } from "./installer.js";
import { GitHubReleaseResolver } from "./release-resolver.js";

export interface InstallerPlatformDeps {
  readonly httpClient: HttpClient;
  readonly fileSystemLayer: FileSystemLayer;
  readonly processRunner: ProcessRunner;
  readonly platformInfo: PlatformInfo;
  readonly loggingService: LoggingService;
  /** Default: PowerShellEnvironmentStore on processRunner */
  readonly environmentStore?: EnvironmentStore;
  /** Default: DefaultArchiveExtractor */
  readonly extractor?: ArchiveExtractor;
}

/**
 * Build a JdkInstaller whose stages log under their own scopes.
 */
export function createJdkInstaller(config: InstallerConfig, deps: InstallerPlatformDeps): JdkInstaller {
  const { httpClient, fileSystemLayer, processRunner, platformInfo, loggingService } = deps;
  const { distribution } = config;

  const resolver = new GitHubReleaseResolver(httpClient, loggingService.createLogger("resolver"), {
    apiBaseUrl: config.apiBaseUrl,
    timeoutMs: config.requestTimeoutMs,
    ...(config.githubToken !== null && { token: config.githubToken }),
  });
  const acquirer = new HttpArchiveAcquirer(
    httpClient,
    fileSystemLayer,
    platformInfo,
    loggingService.createLogger("download"),
    { timeoutMs: config.downloadTimeoutMs }
  );
  const environmentLogger = loggingService.createLogger("environment");
  const store =
    deps.environmentStore ?? new PowerShellEnvironmentStore(processRunner, environmentLogger);

  return new JdkInstaller({
    fileSystemLayer,
    resolver,
    acquirer,
    extractor: deps.extractor ?? new DefaultArchiveExtractor(loggingService.createLogger("extract")),
    configurator: new EnvironmentConfigurator(store, distribution, environmentLogger),
    verifier: new InstallationVerifier(
      fileSystemLayer,
      processRunner,
      distribution,
      loggingService.createLogger("verify")
    ),
    distribution,
    logger: loggingService.createLogger("installer"),
  });
}

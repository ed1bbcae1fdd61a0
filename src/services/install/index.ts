/**
 * JDK installation module.
 */

export { JdkInstaller, type JdkInstallerDeps, type InstallState } from "./installer.js";
export { createJdkInstaller, type InstallerPlatformDeps } from "./create-installer.js";
export { createInstallRequest, RawInstallOptionsSchema, type RawInstallOptions } from "./request.js";
export { TEMURIN_21_WINDOWS_X64 } from "./distribution.js";
export {
  GitHubReleaseResolver,
  selectAsset,
  DEFAULT_API_BASE_URL,
  type ReleaseResolver,
} from "./release-resolver.js";
export { HttpArchiveAcquirer, type ArchiveAcquirer } from "./archive-acquirer.js";
export {
  DefaultArchiveExtractor,
  TarExtractor,
  ZipExtractor,
  type ArchiveExtractor,
} from "./archive-extractor.js";
export {
  EnvironmentConfigurator,
  appendPathEntry,
  containsPathEntry,
  PATH_VARIABLE,
} from "./environment-configurator.js";
export { PowerShellEnvironmentStore, type EnvironmentStore } from "./environment-store.js";
export { InstallationVerifier, extractVersionLines } from "./installation-verifier.js";
export type {
  DownloadProgress,
  DownloadProgressCallback,
  EnvironmentUpdateResult,
  InstallRequest,
  InstallResult,
  InstallSource,
  JdkDistribution,
  ReleaseAsset,
} from "./types.js";

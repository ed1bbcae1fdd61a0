/**
 * Configuration types for the installer.
 *
 * Every value has a default; environment variables override them.
 */

import type { JdkDistribution } from "../install/types.js";
import { TEMURIN_21_WINDOWS_X64 } from "../install/distribution.js";
import { DEFAULT_API_BASE_URL } from "../install/release-resolver.js";

/**
 * Installer configuration.
 */
export interface InstallerConfig {
  /** GitHub API root. Env: JDK_INSTALLER_API_URL */
  readonly apiBaseUrl: string;
  /** Timeout for release API requests in ms. Env: JDK_INSTALLER_REQUEST_TIMEOUT_MS */
  readonly requestTimeoutMs: number;
  /** Timeout for the archive download in ms. Env: JDK_INSTALLER_DOWNLOAD_TIMEOUT_MS */
  readonly downloadTimeoutMs: number;
  /** Token for authenticated API requests (higher rate limit). Env: GITHUB_TOKEN */
  readonly githubToken: string | null;
  /** The release channel */
  readonly distribution: JdkDistribution;
}

/**
 * Defaults used when no override is set.
 */
export const DEFAULT_INSTALLER_CONFIG: InstallerConfig = {
  apiBaseUrl: DEFAULT_API_BASE_URL,
  requestTimeoutMs: 30000,
  downloadTimeoutMs: 600000,
  githubToken: null,
  distribution: TEMURIN_21_WINDOWS_X64,
};

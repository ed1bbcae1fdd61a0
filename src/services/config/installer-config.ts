/**
 * Loads InstallerConfig from environment variables.
 */

import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import { DEFAULT_INSTALLER_CONFIG, type InstallerConfig } from "./types.js";

/** Empty variables count as unset. */
function optionalEnv<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === "" ? undefined : value), schema.optional());
}

const timeoutSchema = z.coerce.number().int().positive();

const EnvOverridesSchema = z.object({
  JDK_INSTALLER_API_URL: optionalEnv(z.string().url()),
  JDK_INSTALLER_REQUEST_TIMEOUT_MS: optionalEnv(timeoutSchema),
  JDK_INSTALLER_DOWNLOAD_TIMEOUT_MS: optionalEnv(timeoutSchema),
  GITHUB_TOKEN: optionalEnv(z.string()),
});

/**
 * Build the installer configuration from defaults and environment overrides.
 *
 * @throws ConfigurationError when an override is malformed
 *
 * @example
 * const config = loadInstallerConfig(process.env);
 * config.requestTimeoutMs; // 30000 unless JDK_INSTALLER_REQUEST_TIMEOUT_MS is set
 */
export function loadInstallerConfig(
  env: NodeJS.ProcessEnv = process.env,
  logger?: Logger
): InstallerConfig {
  const parsed = EnvOverridesSchema.safeParse(env);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment: ${message}`, "INVALID_OPTION");
  }

  const overrides = parsed.data;
  const config: InstallerConfig = {
    ...DEFAULT_INSTALLER_CONFIG,
    apiBaseUrl: overrides.JDK_INSTALLER_API_URL ?? DEFAULT_INSTALLER_CONFIG.apiBaseUrl,
    requestTimeoutMs:
      overrides.JDK_INSTALLER_REQUEST_TIMEOUT_MS ?? DEFAULT_INSTALLER_CONFIG.requestTimeoutMs,
    downloadTimeoutMs:
      overrides.JDK_INSTALLER_DOWNLOAD_TIMEOUT_MS ?? DEFAULT_INSTALLER_CONFIG.downloadTimeoutMs,
    githubToken: overrides.GITHUB_TOKEN ?? null,
  };

  logger?.debug("Config loaded", {
    apiBaseUrl: config.apiBaseUrl,
    requestTimeoutMs: config.requestTimeoutMs,
    downloadTimeoutMs: config.downloadTimeoutMs,
    authenticated: config.githubToken !== null,
  });
  return config;
}

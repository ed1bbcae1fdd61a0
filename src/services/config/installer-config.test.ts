/**
 * Tests for loadInstallerConfig.
 */

import { describe, it, expect } from "vitest";
import { loadInstallerConfig } from "./installer-config.js";
import { DEFAULT_INSTALLER_CONFIG } from "./types.js";
import { ConfigurationError } from "../errors.js";
import { createMockLogger } from "../logging/logging.test-utils.js";

describe("loadInstallerConfig", () => {
  it("returns the defaults for an empty environment", () => {
    expect(loadInstallerConfig({})).toEqual(DEFAULT_INSTALLER_CONFIG);
  });

  it("has the documented defaults", () => {
    expect(DEFAULT_INSTALLER_CONFIG).toMatchObject({
      apiBaseUrl: "https://api.github.com",
      requestTimeoutMs: 30000,
      downloadTimeoutMs: 600000,
      githubToken: null,
    });
    expect(DEFAULT_INSTALLER_CONFIG.distribution.repository).toBe("adoptium/temurin21-binaries");
  });

  it("applies environment overrides", () => {
    const config = loadInstallerConfig({
      JDK_INSTALLER_API_URL: "http://localhost:8080",
      JDK_INSTALLER_REQUEST_TIMEOUT_MS: "5000",
      JDK_INSTALLER_DOWNLOAD_TIMEOUT_MS: "60000",
      GITHUB_TOKEN: "test-secret",
    });

    expect(config).toEqual({
      ...DEFAULT_INSTALLER_CONFIG,
      apiBaseUrl: "http://localhost:8080",
      requestTimeoutMs: 5000,
      downloadTimeoutMs: 60000,
      githubToken: "test-secret",
    });
  });

  it("treats empty variables as unset", () => {
    expect(
      loadInstallerConfig({ JDK_INSTALLER_API_URL: "", GITHUB_TOKEN: "", JDK_INSTALLER_REQUEST_TIMEOUT_MS: "" })
    ).toEqual(DEFAULT_INSTALLER_CONFIG);
  });

  it("ignores unrelated variables", () => {
    expect(loadInstallerConfig({ PATH: "/usr/bin", HOME: "/home/test" })).toEqual(
      DEFAULT_INSTALLER_CONFIG
    );
  });

  it("rejects a malformed timeout", () => {
    expect(() => loadInstallerConfig({ JDK_INSTALLER_REQUEST_TIMEOUT_MS: "soon" })).toThrow(
      ConfigurationError
    );
    expect(() => loadInstallerConfig({ JDK_INSTALLER_DOWNLOAD_TIMEOUT_MS: "-1" })).toThrow(
      /^Invalid environment: JDK_INSTALLER_DOWNLOAD_TIMEOUT_MS: /
    );
  });

  it("rejects a malformed API URL", () => {
    expect(() => loadInstallerConfig({ JDK_INSTALLER_API_URL: "not a url" })).toThrow(
      expect.objectContaining({ type: "configuration", errorCode: "INVALID_OPTION" })
    );
  });

  it("logs the loaded values without the token", () => {
    const logger = createMockLogger();

    loadInstallerConfig({ GITHUB_TOKEN: "test-secret" }, logger);

    expect(logger.debug).toHaveBeenCalledWith("Config loaded", {
      apiBaseUrl: "https://api.github.com",
      requestTimeoutMs: 30000,
      downloadTimeoutMs: 600000,
      authenticated: true,
    });
  });
});

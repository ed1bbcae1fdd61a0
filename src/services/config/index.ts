/**
 * Installer configuration module.
 */

export { loadInstallerConfig } from "./installer-config.js";
export { type InstallerConfig, DEFAULT_INSTALLER_CONFIG } from "./types.js";

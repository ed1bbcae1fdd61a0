/**
 * The release channel the installer targets.
 */

import type { JdkDistribution } from "./types.js";

/**
 * Eclipse Temurin JDK 21, HotSpot, Windows x64 zip.
 */
export const TEMURIN_21_WINDOWS_X64: JdkDistribution = {
  repository: "adoptium/temurin21-binaries",
  assetPattern: "OpenJDK21U-jdk_x64_windows_hotspot_*.zip",
  defaultDestination: "C:\\Program Files\\Java\\jdk-21",
  homeVariable: "JAVA_HOME",
  executable: "bin/java.exe",
  stripLevels: 1,
};

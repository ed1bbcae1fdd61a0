/**
 * Test utilities for PlatformInfo.
 */
import type { PlatformInfo } from "./platform-info.js";

/**
 * Create a mock PlatformInfo.
 * Defaults to Windows x64 with a test temp directory.
 */
export function createMockPlatformInfo(overrides?: Partial<PlatformInfo>): PlatformInfo {
  return {
    platform: overrides?.platform ?? "win32",
    arch: overrides?.arch ?? "x64",
    tmpDir: overrides?.tmpDir ?? "/tmp/test",
  };
}

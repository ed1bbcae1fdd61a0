/**
 * Platform information provider.
 * Abstracts process.platform, process.arch, and os.tmpdir() for testability.
 */

import os from "node:os";

export interface PlatformInfo {
  /** Operating system platform: 'linux', 'darwin', 'win32' */
  readonly platform: NodeJS.Platform;

  /** CPU architecture as reported by Node.js, e.g. 'x64' */
  readonly arch: string;

  /** Directory for temporary downloads */
  readonly tmpDir: string;
}

/**
 * PlatformInfo implementation using Node.js APIs.
 *
 * Values are cached at construction time for consistency.
 */
export class NodePlatformInfo implements PlatformInfo {
  readonly platform: NodeJS.Platform;
  readonly arch: string;
  readonly tmpDir: string;

  constructor() {
    this.platform = process.platform;
    this.arch = process.arch;
    this.tmpDir = os.tmpdir();
  }
}

/**
 * Test utilities for service tests.
 * These helpers create temporary directories with automatic cleanup
 * and inspect the trees written into them.
 */

import { mkdtemp, rm, realpath, readdir } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

/**
 * Create a temporary directory with automatic cleanup.
 * Uses realpath to resolve Windows 8.3 short paths (e.g., RUNNER~1 -> runneradmin).
 * @returns Object with path and cleanup function
 */
export async function createTempDir(): Promise<{
  path: string;
  cleanup: () => Promise<void>;
}> {
  const tempPath = await mkdtemp(join(tmpdir(), "jdk-installer-test-"));
  // Resolve to canonical path so path comparisons in tests match
  const resolvedPath = await realpath(tempPath);
  return {
    path: resolvedPath,
    cleanup: async () => {
      await rm(resolvedPath, {
        recursive: true,
        force: true,
        // Retry on EBUSY/EPERM - file handles may take time to release on Windows
        maxRetries: 5,
        retryDelay: 200,
      });
    },
  };
}

/**
 * List every file and directory below `root` as sorted `/`-separated
 * relative paths. Directories end with `/`.
 */
export async function listTree(root: string): Promise<string[]> {
  const result: string[] = [];

  async function walk(dir: string, prefix: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.isDirectory()) {
        result.push(`${prefix}${entry.name}/`);
        await walk(join(dir, entry.name), `${prefix}${entry.name}/`);
      } else {
        result.push(`${prefix}${entry.name}`);
      }
    }
  }

  await walk(root, "");
  return result.sort();
}

/**
 * Machine-wide home variable and PATH registration.
 */

import * as path from "node:path";
import { EnvironmentError, getErrorMessage } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { EnvironmentStore } from "./environment-store.js";
import type { EnvironmentUpdateResult, JdkDistribution } from "./types.js";

export const PATH_VARIABLE = "PATH";

const PATH_SEPARATOR = ";";

/**
 * Comparison key for a PATH segment: Windows paths are case-insensitive
 * and a trailing separator does not change the folder.
 */
function pathKey(segment: string): string {
  return segment.trim().replace(/[\\/]+$/, "").toLowerCase();
}

/**
 * True if `entry` is one of the `;`-separated segments of `pathValue`.
 * Empty segments never match.
 */
export function containsPathEntry(pathValue: string, entry: string): boolean {
  const key = pathKey(entry);
  return pathValue
    .split(PATH_SEPARATOR)
    .filter((segment) => segment.trim() !== "")
    .some((segment) => pathKey(segment) === key);
}

/**
 * Append `entry` to a PATH value. An empty or unset PATH becomes `entry`.
 */
export function appendPathEntry(pathValue: string | undefined, entry: string): string {
  if (!pathValue) {
    return entry;
  }
  return pathValue.endsWith(PATH_SEPARATOR)
    ? `${pathValue}${entry}`
    : `${pathValue}${PATH_SEPARATOR}${entry}`;
}

/**
 * Points the home variable at an install root and puts its executables on PATH.
 * Both writes are skipped when the value is already in place, so repeated
 * runs leave the store untouched. The two writes are independent.
 */
export class EnvironmentConfigurator {
  constructor(
    private readonly store: EnvironmentStore,
    private readonly distribution: Pick<JdkDistribution, "homeVariable" | "pathEntry">,
    private readonly logger: Logger
  ) {}

  /**
   * @throws EnvironmentError naming the variable that could not be read or written
   */
  async applyPathUpdate(installRoot: string): Promise<EnvironmentUpdateResult> {
    const homeUpdated = await this.updateHome(installRoot);
    const pathUpdated = await this.updatePath(this.pathEntryFor(installRoot));
    return { homeUpdated, pathUpdated };
  }

  private pathEntryFor(installRoot: string): string {
    const { pathEntry } = this.distribution;
    return pathEntry ? path.join(installRoot, pathEntry) : installRoot;
  }

  private async updateHome(installRoot: string): Promise<boolean> {
    const name = this.distribution.homeVariable;
    return this.guard(name, async () => {
      const current = await this.store.get(name);
      if (current === installRoot) {
        this.logger.debug("Home variable already set", { name, value: installRoot });
        return false;
      }
      await this.store.set(name, installRoot);
      this.logger.info("Home variable set", { name, value: installRoot, previous: current ?? null });
      return true;
    });
  }

  private async updatePath(entry: string): Promise<boolean> {
    return this.guard(PATH_VARIABLE, async () => {
      const current = await this.store.get(PATH_VARIABLE);
      if (current !== undefined && containsPathEntry(current, entry)) {
        this.logger.debug("PATH already contains entry", { entry });
        return false;
      }
      await this.store.set(PATH_VARIABLE, appendPathEntry(current, entry));
      this.logger.info("PATH entry added", { entry });
      return true;
    });
  }

  private async guard(name: string, update: () => Promise<boolean>): Promise<boolean> {
    try {
      return await update();
    } catch (error) {
      if (error instanceof EnvironmentError) {
        throw error;
      }
      throw new EnvironmentError(`Failed to update ${name}: ${getErrorMessage(error)}`);
    }
  }
}

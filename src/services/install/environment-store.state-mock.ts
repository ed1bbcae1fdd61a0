/**
 * Behavioral mock for EnvironmentStore with in-memory state.
 *
 * @example
 * const store = createMockEnvironmentStore({ values: { PATH: "C:\\Windows" } });
 * await configurator.applyPathUpdate("C:\\jdk");
 * expect(store.$.writes).toEqual([...]);
 */

import { EnvironmentError } from "../errors.js";
import type { EnvironmentStore } from "./environment-store.js";

export interface EnvironmentWrite {
  readonly name: string;
  readonly value: string;
}

export interface EnvironmentStoreMockState {
  /** Current variable values */
  readonly values: ReadonlyMap<string, string>;
  /** Every set() call in order */
  readonly writes: readonly EnvironmentWrite[];
}

export type MockEnvironmentStore = EnvironmentStore & { readonly $: EnvironmentStoreMockState };

export interface MockEnvironmentStoreOptions {
  readonly values?: Record<string, string>;
  /** Variables whose reads fail */
  readonly failReads?: readonly string[];
  /** Variables whose writes fail, like an unelevated process */
  readonly failWrites?: readonly string[];
}

/**
 * Create an in-memory EnvironmentStore.
 */
export function createMockEnvironmentStore(
  options: MockEnvironmentStoreOptions = {}
): MockEnvironmentStore {
  const values = new Map<string, string>(Object.entries(options.values ?? {}));
  const writes: EnvironmentWrite[] = [];

  return {
    $: {
      get values(): ReadonlyMap<string, string> {
        return values;
      },
      get writes(): readonly EnvironmentWrite[] {
        return writes;
      },
    },

    async get(name: string): Promise<string | undefined> {
      if (options.failReads?.includes(name)) {
        throw new EnvironmentError(`Failed to read machine variable ${name}: access denied`);
      }
      return values.get(name);
    },

    async set(name: string, value: string): Promise<void> {
      if (options.failWrites?.includes(name)) {
        throw new EnvironmentError(`Failed to write machine variable ${name}: access denied`);
      }
      writes.push({ name, value });
      values.set(name, value);
    },
  };
}

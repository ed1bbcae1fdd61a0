/**
 * Behavioral mock for FileSystemLayer with in-memory state.
 *
 * Simulates real filesystem behavior:
 * - In-memory file/directory storage
 * - Proper error handling (ENOENT, EEXIST, EISDIR, ENOTDIR)
 * - Per-entry error injection
 *
 * @example
 * const mock = createFileSystemMock({
 *   entries: {
 *     "/tmp": directory(),
 *     "/tmp/archive.zip": file("PK"),
 *   },
 * });
 *
 * await mock.unlink("/tmp/archive.zip");
 * expect(mock.$.entries.has("/tmp/archive.zip")).toBe(false);
 */

import * as path from "node:path";
import type { FileStat, FileSystemErrorCode, FileSystemLayer, MkdirOptions } from "./filesystem.js";
import { FileSystemError } from "../errors.js";

/**
 * File entry in the mock filesystem.
 */
export interface FileEntry {
  readonly type: "file";
  readonly content: Uint8Array;
  /** If set, accessing this entry throws an error with this code */
  readonly error?: FileSystemErrorCode;
}

/**
 * Directory entry in the mock filesystem.
 */
export interface DirectoryEntry {
  readonly type: "directory";
  /** If set, accessing this entry throws an error with this code */
  readonly error?: FileSystemErrorCode;
}

export type Entry = FileEntry | DirectoryEntry;

/**
 * State exposed through `mock.$`.
 */
export interface FileSystemMockState {
  /** All entries keyed by normalized path */
  readonly entries: ReadonlyMap<string, Entry>;
  /** Number of calls per operation name */
  readonly calls: Readonly<Record<keyof FileSystemLayer, number>>;
  /**
   * Set an entry, creating parent directories.
   * Test helper - does NOT follow real filesystem semantics.
   */
  setEntry(entryPath: string, entry: Entry): void;
  /** Text content of a file, or undefined if there is none */
  readText(filePath: string): string | undefined;
}

export type MockFileSystemLayer = FileSystemLayer & { readonly $: FileSystemMockState };

export interface FileSystemMockOptions {
  readonly entries?: Record<string, Entry>;
}

/**
 * Create a file entry.
 *
 * @example
 * file("hello world")
 * file(new Uint8Array([0x50, 0x4b]))
 * file("secret", { error: "EACCES" })
 */
export function file(
  content: string | Uint8Array,
  options?: { error?: FileSystemErrorCode }
): FileEntry {
  const bytes = typeof content === "string" ? new TextEncoder().encode(content) : content;
  return options?.error ? { type: "file", content: bytes, error: options.error } : { type: "file", content: bytes };
}

/**
 * Create a directory entry.
 *
 * @example
 * directory()
 * directory({ error: "EACCES" })
 */
export function directory(options?: { error?: FileSystemErrorCode }): DirectoryEntry {
  return options?.error ? { type: "directory", error: options.error } : { type: "directory" };
}

function fsError(code: FileSystemErrorCode, entryPath: string, syscall: string): FileSystemError {
  return new FileSystemError(code, entryPath, `${code}: ${syscall} '${entryPath}'`);
}

/**
 * Create an in-memory FileSystemLayer.
 * The root directory always exists.
 */
export function createFileSystemMock(options?: FileSystemMockOptions): MockFileSystemLayer {
  const entries = new Map<string, Entry>();
  const root = path.parse(path.resolve("/")).root;
  entries.set(root, directory());

  const calls: Record<keyof FileSystemLayer, number> = {
    mkdir: 0,
    stat: 0,
    unlink: 0,
    writeStream: 0,
  };

  const normalize = (entryPath: string): string => path.resolve(entryPath);

  const ensureParents = (normalized: string): void => {
    const parent = path.dirname(normalized);
    if (parent === normalized || entries.has(parent)) return;
    ensureParents(parent);
    entries.set(parent, directory());
  };

  const setEntry = (entryPath: string, entry: Entry): void => {
    const normalized = normalize(entryPath);
    ensureParents(normalized);
    entries.set(normalized, entry);
  };

  /** Entry lookup that honors injected errors. */
  const lookup = (normalized: string, syscall: string): Entry | undefined => {
    const entry = entries.get(normalized);
    if (entry?.error) {
      throw fsError(entry.error, normalized, syscall);
    }
    return entry;
  };

  /** Parent directory must exist and be a directory. */
  const requireParent = (normalized: string, syscall: string): void => {
    const parent = lookup(path.dirname(normalized), syscall);
    if (!parent) throw fsError("ENOENT", normalized, syscall);
    if (parent.type !== "directory") throw fsError("ENOTDIR", normalized, syscall);
  };

  for (const [entryPath, entry] of Object.entries(options?.entries ?? {})) {
    setEntry(entryPath, entry);
  }

  const state: FileSystemMockState = {
    get entries(): ReadonlyMap<string, Entry> {
      return entries;
    },
    get calls(): Readonly<Record<keyof FileSystemLayer, number>> {
      return calls;
    },
    setEntry,
    readText(filePath: string): string | undefined {
      const entry = entries.get(normalize(filePath));
      return entry?.type === "file" ? new TextDecoder().decode(entry.content) : undefined;
    },
  };

  return {
    $: state,

    async mkdir(dirPath: string, mkdirOptions?: MkdirOptions): Promise<void> {
      calls.mkdir++;
      const normalized = normalize(dirPath);
      const existing = lookup(normalized, "mkdir");
      const recursive = mkdirOptions?.recursive ?? true;
      if (existing) {
        if (existing.type === "file" || !recursive) throw fsError("EEXIST", normalized, "mkdir");
        return;
      }
      if (recursive) {
        const missing: string[] = [];
        let current = path.dirname(normalized);
        while (!entries.has(current)) {
          missing.unshift(current);
          current = path.dirname(current);
        }
        // The nearest existing ancestor decides whether creation is possible
        const ancestor = lookup(current, "mkdir");
        if (ancestor?.type === "file") throw fsError("ENOTDIR", normalized, "mkdir");
        for (const dir of missing) entries.set(dir, directory());
      } else {
        requireParent(normalized, "mkdir");
      }
      entries.set(normalized, directory());
    },

    async stat(targetPath: string): Promise<FileStat> {
      calls.stat++;
      const normalized = normalize(targetPath);
      const entry = lookup(normalized, "stat");
      if (!entry) throw fsError("ENOENT", normalized, "stat");
      return {
        isDirectory: entry.type === "directory",
        isFile: entry.type === "file",
        size: entry.type === "file" ? entry.content.byteLength : 0,
      };
    },

    async unlink(filePath: string): Promise<void> {
      calls.unlink++;
      const normalized = normalize(filePath);
      const entry = lookup(normalized, "unlink");
      if (!entry) throw fsError("ENOENT", normalized, "unlink");
      if (entry.type === "directory") throw fsError("EISDIR", normalized, "unlink");
      entries.delete(normalized);
    },

    async writeStream(filePath: string, content: ReadableStream<Uint8Array>): Promise<void> {
      calls.writeStream++;
      const normalized = normalize(filePath);
      requireParent(normalized, "open");
      const existing = lookup(normalized, "open");
      if (existing?.type === "directory") throw fsError("EISDIR", normalized, "open");

      const chunks: Uint8Array[] = [];
      const flush = (): void => {
        const total = chunks.reduce((sum, chunk) => sum + chunk.byteLength, 0);
        const bytes = new Uint8Array(total);
        let offset = 0;
        for (const chunk of chunks) {
          bytes.set(chunk, offset);
          offset += chunk.byteLength;
        }
        entries.set(normalized, { type: "file", content: bytes });
      };

      const reader = content.getReader();
      try {
        for (;;) {
          const { done, value } = await reader.read();
          if (done) break;
          chunks.push(value);
        }
      } catch (error) {
        // A broken stream leaves a partial file behind, like a real disk write
        flush();
        throw new FileSystemError(
          "UNKNOWN",
          normalized,
          error instanceof Error ? error.message : String(error)
        );
      }
      flush();
    },
  };
}

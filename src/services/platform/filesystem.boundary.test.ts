// @vitest-environment node
/**
 * Boundary tests for DefaultFileSystemLayer.
 * Tests filesystem operations against real filesystem with temp directories.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { readFile, writeFile as nodeWriteFile } from "node:fs/promises";
import { DefaultFileSystemLayer } from "./filesystem.js";
import { FileSystemError } from "../errors.js";
import { createTempDir } from "../test-utils.js";
import { createSilentLogger } from "../logging/logging.test-utils.js";

function streamOf(...chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
}

describe("DefaultFileSystemLayer", () => {
  let fs: DefaultFileSystemLayer;
  let tempDir: { path: string; cleanup: () => Promise<void> };

  beforeEach(async () => {
    fs = new DefaultFileSystemLayer(createSilentLogger());
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await tempDir.cleanup();
  });

  describe("mkdir", () => {
    it("creates nested directories", async () => {
      const dirPath = join(tempDir.path, "a", "b", "c");

      await fs.mkdir(dirPath);

      expect((await fs.stat(dirPath)).isDirectory).toBe(true);
    });

    it("is a no-op for an existing directory", async () => {
      await fs.mkdir(tempDir.path);

      expect((await fs.stat(tempDir.path)).isDirectory).toBe(true);
    });

    it("throws EEXIST when a file is in the way", async () => {
      const filePath = join(tempDir.path, "file");
      await nodeWriteFile(filePath, "x");

      await expect(fs.mkdir(filePath)).rejects.toMatchObject({ fsCode: "EEXIST", path: filePath });
    });

    it("throws ENOENT for a missing parent without recursive", async () => {
      const dirPath = join(tempDir.path, "missing", "child");

      await expect(fs.mkdir(dirPath, { recursive: false })).rejects.toMatchObject({
        fsCode: "ENOENT",
      });
    });
  });

  describe("stat", () => {
    it("reports file size", async () => {
      const filePath = join(tempDir.path, "file");
      await nodeWriteFile(filePath, "12345");

      expect(await fs.stat(filePath)).toEqual({ isDirectory: false, isFile: true, size: 5 });
    });

    it("throws FileSystemError with ENOENT for a missing path", async () => {
      const missing = join(tempDir.path, "missing");

      const error = await fs.stat(missing).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FileSystemError);
      expect(error).toMatchObject({ fsCode: "ENOENT", path: missing });
    });
  });

  describe("unlink", () => {
    it("removes a file", async () => {
      const filePath = join(tempDir.path, "file");
      await nodeWriteFile(filePath, "x");

      await fs.unlink(filePath);

      await expect(fs.stat(filePath)).rejects.toMatchObject({ fsCode: "ENOENT" });
    });

    it("throws ENOENT for a missing file", async () => {
      await expect(fs.unlink(join(tempDir.path, "missing"))).rejects.toMatchObject({
        fsCode: "ENOENT",
      });
    });
  });

  describe("writeStream", () => {
    it("writes every chunk", async () => {
      const filePath = join(tempDir.path, "archive.zip");

      await fs.writeStream(filePath, streamOf("PK", "\u0003\u0004", "rest"));

      expect(await readFile(filePath, "utf-8")).toBe("PK\u0003\u0004rest");
    });

    it("overwrites an existing file", async () => {
      const filePath = join(tempDir.path, "archive.zip");
      await nodeWriteFile(filePath, "old content that is longer");

      await fs.writeStream(filePath, streamOf("new"));

      expect(await readFile(filePath, "utf-8")).toBe("new");
    });

    it("throws ENOENT when the parent directory is missing", async () => {
      const filePath = join(tempDir.path, "missing", "archive.zip");

      await expect(fs.writeStream(filePath, streamOf("x"))).rejects.toMatchObject({
        fsCode: "ENOENT",
        path: filePath,
      });
    });

    it("rejects when the source stream fails", async () => {
      const filePath = join(tempDir.path, "archive.zip");
      const broken = new ReadableStream<Uint8Array>({
        pull(controller) {
          controller.error(new Error("connection reset"));
        },
      });

      await expect(fs.writeStream(filePath, broken)).rejects.toBeInstanceOf(FileSystemError);
    });
  });
});

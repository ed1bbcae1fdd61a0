/**
 * Boundary tests for ArchiveExtractor implementations.
 * Tests extraction with real archive files.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { TarExtractor, ZipExtractor, DefaultArchiveExtractor } from "./archive-extractor.js";
import { ExtractionError } from "../errors.js";
import { createTempDir, listTree } from "../test-utils.js";
import {
  SAMPLE_LAYOUT,
  strippedTree,
  writeTarGz,
  writeZip,
  type ArchiveLayout,
} from "./archive-fixtures.test-utils.js";

describe("ZipExtractor (boundary)", () => {
  let tempDir: { path: string; cleanup: () => Promise<void> };
  let archivePath: string;
  let destDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
    archivePath = path.join(tempDir.path, "sample.zip");
    destDir = path.join(tempDir.path, "out");
    await fs.mkdir(destDir);
  });

  afterEach(async () => {
    await tempDir.cleanup();
  });

  it("removes the wrapping folder with strip level 1", async () => {
    writeZip(archivePath, SAMPLE_LAYOUT);

    await new ZipExtractor().extract(archivePath, destDir, 1);

    expect(await listTree(destDir)).toEqual(["bin/", "bin/tool.exe", "lib/", "lib/data.txt"]);
    expect(await fs.readFile(path.join(destDir, "bin", "tool.exe"), "utf-8")).toBe("tool binary");
  });

  it("produces exactly the archive entries minus the wrapper", async () => {
    const layout: ArchiveLayout = {
      "jdk-21.0.5+11/": null,
      "jdk-21.0.5+11/release": "JAVA_VERSION=21",
      "jdk-21.0.5+11/bin/": null,
      "jdk-21.0.5+11/bin/java.exe": "java",
      "jdk-21.0.5+11/conf/": null,
      "jdk-21.0.5+11/conf/security/": null,
      "jdk-21.0.5+11/conf/security/java.policy": "grant {}",
    };
    writeZip(archivePath, layout);

    await new ZipExtractor().extract(archivePath, destDir, 1);

    expect(await listTree(destDir)).toEqual(strippedTree(layout, 1));
  });

  it("creates parent folders for entries without directory records", async () => {
    writeZip(archivePath, { "root/a/b/c.txt": "c" });

    await new ZipExtractor().extract(archivePath, destDir, 1);

    expect(await listTree(destDir)).toEqual(["a/", "a/b/", "a/b/c.txt"]);
  });

  it("keeps the wrapping folder with strip level 0", async () => {
    writeZip(archivePath, SAMPLE_LAYOUT);

    await new ZipExtractor().extract(archivePath, destDir, 0);

    expect(await listTree(destDir)).toEqual(strippedTree(SAMPLE_LAYOUT, 0));
  });

  it("merges into the destination without removing existing files", async () => {
    await fs.writeFile(path.join(destDir, "keep.txt"), "keep");
    await fs.mkdir(path.join(destDir, "bin"));
    await fs.writeFile(path.join(destDir, "bin", "tool.exe"), "old tool");
    await fs.writeFile(path.join(destDir, "bin", "other.exe"), "other");
    writeZip(archivePath, SAMPLE_LAYOUT);

    await new ZipExtractor().extract(archivePath, destDir, 1);

    expect(await listTree(destDir)).toEqual([
      "bin/",
      "bin/other.exe",
      "bin/tool.exe",
      "keep.txt",
      "lib/",
      "lib/data.txt",
    ]);
    expect(await fs.readFile(path.join(destDir, "keep.txt"), "utf-8")).toBe("keep");
    expect(await fs.readFile(path.join(destDir, "bin", "tool.exe"), "utf-8")).toBe("tool binary");
  });

  it("throws INVALID_ARCHIVE for a corrupt zip naming archive and destination", async () => {
    await fs.writeFile(archivePath, "not a valid zip file");

    const error = await new ZipExtractor()
      .extract(archivePath, destDir, 1)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toMatchObject({
      errorCode: "INVALID_ARCHIVE",
      message: expect.stringContaining(`Failed to extract ${archivePath} into ${destDir}: `),
    });
  });

  it("throws EXTRACTION_FAILED for a missing archive", async () => {
    await expect(
      new ZipExtractor().extract(path.join(tempDir.path, "missing.zip"), destDir, 1)
    ).rejects.toMatchObject({ type: "extraction", errorCode: "EXTRACTION_FAILED" });
  });
});

describe("TarExtractor (boundary)", () => {
  let tempDir: { path: string; cleanup: () => Promise<void> };
  let archivePath: string;
  let destDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
    archivePath = path.join(tempDir.path, "sample.tar.gz");
    destDir = path.join(tempDir.path, "out");
    await fs.mkdir(destDir);
  });

  afterEach(async () => {
    await tempDir.cleanup();
  });

  it("removes the wrapping folder with strip level 1", async () => {
    await writeTarGz(archivePath, SAMPLE_LAYOUT);

    await new TarExtractor().extract(archivePath, destDir, 1);

    expect(await listTree(destDir)).toEqual(["bin/", "bin/tool.exe", "lib/", "lib/data.txt"]);
    expect(await fs.readFile(path.join(destDir, "lib", "data.txt"), "utf-8")).toBe("data");
  });

  it("merges into the destination without removing existing files", async () => {
    await fs.writeFile(path.join(destDir, "keep.txt"), "keep");
    await writeTarGz(archivePath, SAMPLE_LAYOUT);

    await new TarExtractor().extract(archivePath, destDir, 1);

    expect(await listTree(destDir)).toEqual([
      "bin/",
      "bin/tool.exe",
      "keep.txt",
      "lib/",
      "lib/data.txt",
    ]);
  });

  it("throws INVALID_ARCHIVE for a corrupt archive", async () => {
    await fs.writeFile(archivePath, "not a valid tar.gz file");

    await expect(new TarExtractor().extract(archivePath, destDir, 1)).rejects.toMatchObject({
      errorCode: "INVALID_ARCHIVE",
      message: expect.stringContaining(`Failed to extract ${archivePath} into ${destDir}: `),
    });
  });
});

describe("DefaultArchiveExtractor (boundary)", () => {
  let tempDir: { path: string; cleanup: () => Promise<void> };
  let destDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
    destDir = path.join(tempDir.path, "out");
    await fs.mkdir(destDir);
  });

  afterEach(async () => {
    await tempDir.cleanup();
  });

  it("extracts zip based on extension, case-insensitively", async () => {
    const archivePath = path.join(tempDir.path, "SAMPLE.ZIP");
    writeZip(archivePath, SAMPLE_LAYOUT);

    await new DefaultArchiveExtractor().extract(archivePath, destDir, 1);

    expect(await listTree(destDir)).toEqual(strippedTree(SAMPLE_LAYOUT, 1));
  });

  it("extracts tgz based on extension", async () => {
    const archivePath = path.join(tempDir.path, "sample.tgz");
    await writeTarGz(archivePath, SAMPLE_LAYOUT);

    await new DefaultArchiveExtractor().extract(archivePath, destDir, 1);

    expect(await listTree(destDir)).toEqual(strippedTree(SAMPLE_LAYOUT, 1));
  });

  it("throws for unsupported extensions", async () => {
    const archivePath = path.join(tempDir.path, "archive.7z");
    await fs.writeFile(archivePath, "fake 7z content");

    await expect(
      new DefaultArchiveExtractor().extract(archivePath, destDir, 1)
    ).rejects.toMatchObject({
      errorCode: "INVALID_ARCHIVE",
      message: expect.stringContaining("unsupported archive format"),
    });
  });
});

/**
 * Builders for real archives used by boundary and integration tests.
 */

import AdmZip from "adm-zip";
import * as tar from "tar";
import * as fs from "node:fs/promises";
import * as path from "node:path";

/**
 * Archive layout: `/`-separated entry names mapped to file content,
 * or null for a directory entry.
 */
export type ArchiveLayout = Readonly<Record<string, string | null>>;

/**
 * The layout of a typical release archive with a single wrapping folder.
 */
export const SAMPLE_LAYOUT: ArchiveLayout = {
  "sample-root/": null,
  "sample-root/bin/": null,
  "sample-root/bin/tool.exe": "tool binary",
  "sample-root/lib/": null,
  "sample-root/lib/data.txt": "data",
};

/**
 * Write a zip archive with the given layout.
 */
export function writeZip(archivePath: string, layout: ArchiveLayout): void {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(layout)) {
    if (content === null) {
      zip.addFile(name.endsWith("/") ? name : `${name}/`, Buffer.alloc(0));
    } else {
      zip.addFile(name, Buffer.from(content, "utf-8"));
    }
  }
  zip.writeZip(archivePath);
}

/**
 * Write a .tar.gz archive with the given layout.
 * The files are staged in a scratch folder next to the archive.
 */
export async function writeTarGz(archivePath: string, layout: ArchiveLayout): Promise<void> {
  const stagingDir = `${archivePath}.staging`;
  await fs.mkdir(stagingDir, { recursive: true });

  for (const [name, content] of Object.entries(layout)) {
    const target = path.join(stagingDir, ...name.split("/"));
    if (content === null) {
      await fs.mkdir(target, { recursive: true });
    } else {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, content, "utf-8");
    }
  }

  const topLevel = [...new Set(Object.keys(layout).map((name) => name.split("/")[0] ?? name))];
  await tar.create({ gzip: true, file: archivePath, cwd: stagingDir }, topLevel);
  await fs.rm(stagingDir, { recursive: true, force: true });
}

/**
 * The tree a layout produces after stripping `stripLevels` leading segments,
 * in the form returned by listTree().
 */
export function strippedTree(layout: ArchiveLayout, stripLevels: number): string[] {
  const result: string[] = [];
  for (const [name, content] of Object.entries(layout)) {
    const segments = name.split("/").filter((segment) => segment !== "");
    if (segments.length <= stripLevels) continue;
    const relative = segments.slice(stripLevels).join("/");
    result.push(content === null ? `${relative}/` : relative);
  }
  return result.sort();
}

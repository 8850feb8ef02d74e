import fs from "node:fs/promises";
import path from "node:path";
import { minimatch } from "minimatch";
import type { Sample } from "../types/sample.js";

/** Code-unit order: stable across locales and platforms. */
export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function sampleIdFor(corpusDir: string, filePath: string): string {
  return path.relative(corpusDir, filePath).split(path.sep).join("/");
}

/**
 * Enumerate sample ids under `corpusDir` (recursively) with the given
 * extension, in lexical order. Ids matching an `exclude` glob are skipped.
 * Nothing is read or written.
 */
export async function listSampleIds(corpusDir: string, extension: string, exclude: readonly string[] = []): Promise<string[]> {
  const entries = await fs.readdir(corpusDir, { recursive: true, withFileTypes: true });
  const ids: string[] = [];
  for (const entry of entries) {
    if (!entry.isFile() || !entry.name.endsWith(extension)) continue;
    // Dirent.path is the parent directory on Node 20 (renamed parentPath in 20.12).
    const id = sampleIdFor(corpusDir, path.join(entry.path, entry.name));
    if (!exclude.some((pattern) => minimatch(id, pattern, { dot: true }))) ids.push(id);
  }
  return ids.sort(compareIds);
}

export async function readSample(corpusDir: string, id: string): Promise<Sample> {
  const filePath = path.join(corpusDir, ...id.split("/"));
  return { id, path: filePath, content: await fs.readFile(filePath, "utf8") };
}

export async function readSamples(corpusDir: string, ids: readonly string[]): Promise<Sample[]> {
  return Promise.all(ids.map((id) => readSample(corpusDir, id)));
}

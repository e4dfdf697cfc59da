/**
 * Source Discovery
 *
 * Finds every file under the source directory that should be processed.
 * Editor leftovers (`name~`, `#name#`) and anything inside `.git` are
 * skipped.
 */

import { join, posix } from "node:path";
import { readdir, readFile, stat } from "node:fs/promises";
import type { SourceFile } from "../types/index.js";
import { SourceReadError } from "../utils/errors.js";
import { CONFIG_FILENAME } from "../config.js";
import { extensionOf, ORG_EXTENSION } from "./metadata.js";

/**
 * True for files that should never be picked up.
 */
export function isIgnored(relativePath: string, exclude: readonly string[] = []): boolean {
  const segments = relativePath.split("/");
  const name = segments[segments.length - 1];

  if (segments.includes(".git")) return true;
  if (name.endsWith("~")) return true;
  if (name.startsWith("#") && name.endsWith("#")) return true;
  if (relativePath === CONFIG_FILENAME) return true;

  return exclude.some(
    (prefix) => relativePath === prefix || relativePath.startsWith(`${prefix.replace(/\/+$/, "")}/`)
  );
}

/**
 * Discover all source files below `sourceDir`.
 *
 * @returns Relative `/`-separated paths, sorted
 */
export async function discoverSources(
  sourceDir: string,
  exclude: readonly string[] = []
): Promise<string[]> {
  const found: string[] = [];
  await scanDirectory(sourceDir, "", found);
  return found.filter((path) => !isIgnored(path, exclude)).sort();
}

/**
 * Recursively scan a directory for files.
 */
async function scanDirectory(
  baseDir: string,
  relativePath: string,
  found: string[]
): Promise<void> {
  const dirPath = relativePath ? join(baseDir, relativePath) : baseDir;
  const entries = await readdir(dirPath, { withFileTypes: true });

  for (const entry of entries) {
    const entryPath = relativePath ? posix.join(relativePath, entry.name) : entry.name;

    if (entry.isDirectory()) {
      if (entry.name === ".git") continue;
      await scanDirectory(baseDir, entryPath, found);
    } else if (entry.isFile()) {
      found.push(entryPath);
    }
  }
}

/**
 * Read one source file with its modification time. Only outline sources
 * have their text loaded; other files are copied byte for byte later.
 *
 * @throws SourceReadError if the file cannot be read
 */
export async function readSource(sourceDir: string, relativePath: string): Promise<SourceFile> {
  const path = join(sourceDir, relativePath);
  try {
    const info = await stat(path);
    const content =
      extensionOf(relativePath) === ORG_EXTENSION ? await readFile(path, "utf-8") : "";
    return { relativePath, content, modified: info.mtime };
  } catch (error) {
    throw new SourceReadError(path, error);
  }
}

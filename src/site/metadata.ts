/**
 * Metadata Extraction
 *
 * Phase 1 of a site build: one record per source, read without expanding
 * any macro. Articles feed the `listing` macro.
 */

import { posix } from "node:path";
import type { SiteMetadata, SourceFile } from "../types/index.js";
import { readMetadata } from "../parser/document.js";

export const ORG_EXTENSION = "org";

export const IMAGE_EXTENSIONS: readonly string[] = ["png", "jpg", "jpeg", "webm", "gif"];

/**
 * Lower-cased extension without the dot, or "" when there is none.
 */
export function extensionOf(relativePath: string): string {
  return posix.extname(relativePath).slice(1).toLowerCase();
}

/**
 * Swap a path's extension, keeping its directory.
 */
export function withExtension(relativePath: string, extension: string): string {
  const parsed = posix.parse(relativePath);
  return posix.join(parsed.dir, `${parsed.name}.${extension}`);
}

/**
 * Split a `#+TAGS:` value: on commas when there is one, else on whitespace.
 */
export function splitTags(value: string): string[] {
  const separator = value.includes(",") ? "," : /\s+/;
  return value
    .split(separator)
    .map((tag) => tag.trim())
    .filter((tag) => tag !== "");
}

/**
 * Build the metadata record for one source.
 *
 * @returns The record, or null for files that have none
 */
export function extractMetadata(source: SourceFile, siteUrl: string): SiteMetadata | null {
  const extension = extensionOf(source.relativePath);

  if (extension === ORG_EXTENSION) {
    const keywords = readMetadata(source.content, source.relativePath);
    const htmlPath = withExtension(source.relativePath, "html");
    const tags = keywords.get("tags");

    return {
      kind: "article",
      title: keywords.get("title") ?? posix.parse(htmlPath).name,
      author: keywords.get("author"),
      description: keywords.get("description") ?? keywords.get("desc"),
      tags: tags === undefined ? [] : splitTags(tags),
      modified: source.modified,
      url: `${siteUrl}/${htmlPath}`,
    };
  }

  if (IMAGE_EXTENSIONS.includes(extension)) {
    return { kind: "image", url: `${siteUrl}/${source.relativePath}` };
  }

  return null;
}

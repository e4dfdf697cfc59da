/**
 * Build command
 * Renders every outline file under the source directory into HTML.
 */

import { dirname, isAbsolute, join, relative, sep } from "node:path";
import { copyFile, mkdir, stat, writeFile } from "node:fs/promises";
import type { CLIOptions } from "../index.js";
import type { SourceFile } from "../../types/index.js";
import { loadConfig, type SiteConfig } from "../../config.js";
import { discoverSources, readSource } from "../../site/discover.js";
import { buildSite, type PageResult, type SiteBuild } from "../../site/pipeline.js";
import { createChildLogger } from "../../utils/logger.js";

const log = createChildLogger({ component: "build" });

/**
 * True when `output` is missing or older than `source`.
 */
export async function isStale(source: string, output: string): Promise<boolean> {
  try {
    const [sourceInfo, outputInfo] = await Promise.all([stat(source), stat(output)]);
    return outputInfo.mtimeMs < sourceInfo.mtimeMs;
  } catch (error) {
    if (isMissing(error)) {
      return true;
    }
    throw error;
  }
}

async function writeOutput(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, "utf-8");
}

async function copyOutput(from: string, to: string): Promise<void> {
  await mkdir(dirname(to), { recursive: true });
  await copyFile(from, to);
}

export async function buildCommand(options: CLIOptions): Promise<number> {
  const { sourceDir, destDir } = options;

  console.log("Starting build...");

  if (options.verbose) {
    console.log(`Source: ${sourceDir}`);
    console.log(`Output: ${destDir}`);
  }

  let config: SiteConfig;
  try {
    config = await loadConfig(sourceDir);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    return 1;
  }

  const paths = await discoverSources(sourceDir, [
    ...config.exclude,
    ...nestedOutput(sourceDir, destDir),
  ]);
  const sources: SourceFile[] = [];
  const results: PageResult[] = [];

  for (const relativePath of paths) {
    try {
      sources.push(await readSource(sourceDir, relativePath));
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      results.push({ kind: "failed", relativePath, error });
    }
  }

  let site: SiteBuild;
  try {
    site = buildSite(sources, { siteUrl: config.siteUrl });
  } catch (err) {
    console.error(`Build aborted: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
  results.push(...site.results);

  let written = 0;
  let skipped = 0;

  for (const result of results) {
    if (result.kind === "failed") {
      continue;
    }

    const sourcePath = join(sourceDir, result.relativePath);
    const outputPath = join(destDir, result.outputPath);

    if (!options.force && !(await isStale(sourcePath, outputPath))) {
      skipped++;
      continue;
    }

    if (result.kind === "page") {
      await writeOutput(outputPath, result.html);
      // The outline source is published next to its page.
      await copyOutput(sourcePath, join(destDir, result.relativePath));
    } else {
      log.debug({ file: result.relativePath }, "copying file as-is");
      await copyOutput(sourcePath, outputPath);
    }
    written++;
  }

  if (options.metadataFile) {
    const articles = site.snapshot.filter((record) => record.kind === "article");
    await writeOutput(options.metadataFile, JSON.stringify(articles, null, 2) + "\n");
    if (options.verbose) {
      console.log(`Metadata: ${options.metadataFile}`);
    }
  }

  const failures = results.filter(
    (r): r is Extract<PageResult, { kind: "failed" }> => r.kind === "failed"
  );

  console.log(`\nBuild complete: ${written} written, ${skipped} up to date`);

  if (failures.length > 0) {
    console.error(`\n${failures.length} file(s) failed.`);
    for (const failure of failures) {
      console.error(`  - ${failure.relativePath}: ${failure.error.message}`);
    }
    return 1;
  }

  return 0;
}

/**
 * The output directory as a source-relative prefix, when it lives inside
 * the source tree.
 */
export function nestedOutput(sourceDir: string, destDir: string): string[] {
  const path = relative(sourceDir, destDir);
  if (path === "" || path === ".." || path.startsWith(`..${sep}`) || isAbsolute(path)) {
    return [];
  }
  return [path.split(sep).join("/")];
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

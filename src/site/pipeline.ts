/**
 * Site Pipeline
 *
 * Builds every page of a site in two strict phases:
 *
 *   1. extract  - one metadata record per source, no macro expansion
 *   2. render   - parse and render each outline source against a frozen
 *                 snapshot of every record from phase 1
 *
 * Phase 2 never starts before phase 1 has finished for all sources, so a
 * `listing` macro always sees the whole site. Failures are reported per
 * document; only unrecoverable errors abort the run.
 */

import type { Logger } from "pino";
import type {
  MetadataSnapshot,
  OrgDocument,
  ParseContext,
  SiteMetadata,
  SourceFile,
  TemplateContext,
  TemplateRenderer,
} from "../types/index.js";
import { parseDocument } from "../parser/document.js";
import { renderHtml } from "../renderer/html.js";
import { isUnrecoverable } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";
import { extensionOf, extractMetadata, ORG_EXTENSION, withExtension } from "./metadata.js";

export interface BuildOptions {
  siteUrl: string;
  /** Wraps each rendered fragment; defaults to returning `content` unchanged */
  template?: TemplateRenderer;
  logger?: Logger;
}

export type PageResult =
  | {
      kind: "page";
      relativePath: string;
      outputPath: string;
      html: string;
      metadata: ReadonlyMap<string, string>;
    }
  | { kind: "copy"; relativePath: string; outputPath: string }
  | { kind: "failed"; relativePath: string; error: Error };

export interface SiteBuild {
  snapshot: MetadataSnapshot;
  results: PageResult[];
}

export interface ExtractionResult {
  records: SiteMetadata[];
  failures: Map<string, Error>;
}

const identityTemplate: TemplateRenderer = (context) => context.content;

/**
 * Phase 1: extract a record from every source.
 */
export function extractAll(
  sources: readonly SourceFile[],
  siteUrl: string,
  log: Logger = createChildLogger({ component: "extract" })
): ExtractionResult {
  const records: SiteMetadata[] = [];
  const failures = new Map<string, Error>();

  for (const source of sources) {
    try {
      const record = extractMetadata(source, siteUrl);
      if (record) {
        records.push(record);
      }
    } catch (error) {
      if (isUnrecoverable(error)) {
        throw error;
      }
      failures.set(source.relativePath, toError(error));
      log.warn({ file: source.relativePath, err: error }, "metadata extraction failed");
    }
  }

  log.debug({ records: records.length }, "metadata extracted");
  return { records, failures };
}

/**
 * Freeze phase 1's records into the snapshot phase 2 reads.
 */
export function freezeSnapshot(records: readonly SiteMetadata[]): MetadataSnapshot {
  return Object.freeze(records.map((record) => Object.freeze({ ...record })));
}

/**
 * Key/value pairs for the page template. Document keywords come first;
 * `content` always holds the fragment.
 */
export function templateContext(document: OrgDocument, html: string): TemplateContext {
  return { ...Object.fromEntries(document.metadata), content: html };
}

/**
 * Phase 2 for one outline source.
 */
export function renderSource(
  source: SourceFile,
  context: ParseContext,
  template: TemplateRenderer = identityTemplate
): PageResult {
  const document = parseDocument(source.content, source.relativePath, context);
  const html = template(templateContext(document, renderHtml(document)));

  return {
    kind: "page",
    relativePath: source.relativePath,
    outputPath: withExtension(source.relativePath, "html"),
    html,
    metadata: document.metadata,
  };
}

/**
 * Run both phases over a set of sources.
 *
 * @throws Only errors marked unrecoverable; everything else is reported
 *   as a `failed` result for its document
 */
export function buildSite(sources: readonly SourceFile[], options: BuildOptions): SiteBuild {
  const log = options.logger ?? createChildLogger({ component: "pipeline" });
  const template = options.template ?? identityTemplate;

  const { records, failures } = extractAll(sources, options.siteUrl, log);
  const snapshot = freezeSnapshot(records);
  const context: ParseContext = { siteUrl: options.siteUrl, metadata: snapshot };

  const results: PageResult[] = [];

  for (const source of sources) {
    const failure = failures.get(source.relativePath);
    if (failure) {
      results.push({ kind: "failed", relativePath: source.relativePath, error: failure });
      continue;
    }

    if (extensionOf(source.relativePath) !== ORG_EXTENSION) {
      results.push({
        kind: "copy",
        relativePath: source.relativePath,
        outputPath: source.relativePath,
      });
      continue;
    }

    log.info({ file: source.relativePath }, "rendering outline file");

    try {
      results.push(renderSource(source, context, template));
    } catch (error) {
      if (isUnrecoverable(error)) {
        throw error;
      }
      log.error({ file: source.relativePath, err: error }, "render failed");
      results.push({ kind: "failed", relativePath: source.relativePath, error: toError(error) });
    }
  }

  return { snapshot, results };
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * orgsite
 *
 * Outline files to HTML: lexer, document assembler, renderer, and the
 * two-phase site pipeline around them.
 */

export * from "./types/index.js";
export * from "./parser/index.js";
export { renderHtml, renderNode } from "./renderer/html.js";
export { escapeText, escapeAttribute } from "./renderer/escape.js";
export {
  buildSite,
  extractAll,
  freezeSnapshot,
  renderSource,
  templateContext,
  type BuildOptions,
  type PageResult,
  type SiteBuild,
} from "./site/pipeline.js";
export { extractMetadata, splitTags } from "./site/metadata.js";
export { discoverSources, readSource } from "./site/discover.js";
export { loadConfig, parseConfig, type SiteConfig } from "./config.js";
export * from "./utils/errors.js";

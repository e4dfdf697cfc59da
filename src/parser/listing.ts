/**
 * The `listing` macro: an index of sibling articles rendered as cards.
 */

import type { ArticleMetadata, ParseContext } from "../types/index.js";
import { escapeAttribute, escapeText } from "../renderer/escape.js";

/**
 * Select the articles living under `siteUrl + prefix`, newest first.
 */
export function selectArticles(
  context: ParseContext,
  prefix: string = ""
): ArticleMetadata[] {
  const base = context.siteUrl + prefix;

  return context.metadata
    .filter((record): record is Readonly<ArticleMetadata> => record.kind === "article")
    .filter((article) => article.url.startsWith(base))
    .map((article) => ({ ...article, tags: [...article.tags] }))
    .sort(
      (a, b) =>
        b.modified.getTime() - a.modified.getTime() || a.url.localeCompare(b.url)
    );
}

/**
 * Render one article card.
 */
export function renderCard(article: ArticleMetadata): string {
  const modified = article.modified.toISOString();

  const attributes: Array<[string, string]> = [
    ["data-title", article.title],
    ["data-last-modified", modified],
  ];
  if (article.description !== undefined) {
    attributes.push(["data-description", article.description]);
  }
  if (article.author !== undefined) {
    attributes.push(["data-author", article.author]);
  }
  if (article.tags.length > 0) {
    attributes.push(["data-tags", article.tags.join(", ")]);
  }

  const attrs = attributes
    .map(([name, value]) => ` ${name}="${escapeAttribute(value)}"`)
    .join("");

  let body = `<p class="card-title">${escapeText(article.title)}</p>`;
  if (article.description !== undefined) {
    body += `<p>${escapeText(article.description)}</p>`;
  }

  let footer = `<span class="card-time">${escapeText(modified)}</span>`;
  if (article.author !== undefined) {
    footer += `<span class="card-author">${escapeText(article.author)}</span>`;
  }

  return (
    `<a href="${escapeAttribute(article.url)}" class="article-card">` +
    `<div${attrs}>${body}<div>${footer}</div></div>` +
    `</a>`
  );
}

/**
 * Expand `#+BEGIN: listing PREFIX` into the HTML of the article index.
 *
 * @param args - Macro arguments; the first is a URL prefix relative to the site
 * @param context - Site URL and the phase-1 metadata snapshot
 */
export function renderListing(args: readonly string[], context: ParseContext): string {
  const cards = selectArticles(context, args[0]).map(renderCard).join("");
  return `<div class="articles">${cards}</div>`;
}

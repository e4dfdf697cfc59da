/**
 * HTML Renderer
 *
 * Walks a Document and produces the article fragment. Commented sections,
 * heading included, produce nothing.
 */

import type {
  OrgDocument,
  DocumentNode,
  LesserBlockNode,
} from "../types/index.js";
import { NotImplementedError } from "../utils/errors.js";
import { escapeAttribute, escapeText } from "./escape.js";

export function renderHtml(document: OrgDocument): string {
  const parts: string[] = [];

  for (const section of document.sections) {
    if (section.commented) {
      continue;
    }
    for (const node of section.nodes) {
      parts.push(renderNode(node));
    }
  }

  return `<div class="article">${parts.join("")}</div>`;
}

export function renderNode(node: DocumentNode): string {
  switch (node.type) {
    case "heading":
      return `<h${node.level}>${escapeText(node.title)}</h${node.level}>`;
    case "paragraph":
      return `<p>${escapeText(node.content).replace(/\n/g, "<br />")}</p>`;
    case "lesser_block":
      return renderBlock(node);
    case "table":
      return renderTable(node.rows);
  }
}

function renderBlock(node: LesserBlockNode): string {
  if (node.blockType === "src") {
    const lang = node.args.length > 0 ? ` class="language-${escapeAttribute(node.args[0])}"` : "";
    return `<pre><code${lang}>${escapeText(node.contents)}</code></pre>`;
  }

  if (node.blockType === "export") {
    if (node.args[node.args.length - 1] === "html") {
      return node.contents;
    }
    throw new NotImplementedError(`export block for ${node.args.join(" ") || "no backend"}`);
  }

  throw new NotImplementedError(`rendering of ${node.blockType} blocks`);
}

/**
 * Every source row keeps the empty cells before the first and after the
 * last `|`, so `|a|b|` renders four cells.
 */
function renderTable(rows: readonly string[][]): string {
  const body = rows
    .map((row) => `<tr>${row.map((cell) => `<td>${escapeText(cell)}</td>`).join("")}</tr>`)
    .join("");
  return `<table><thead></thead><tbody>${body}</tbody></table>`;
}

/**
 * orgsite Document Assembler
 *
 * Folds the lexer's token stream into a Document: a metadata map plus an
 * ordered list of sections, one per heading, behind an always-present
 * preamble section.
 */

import type {
  Token,
  MacroToken,
  DocumentNode,
  OrgDocument,
  ParseContext,
} from "../types/index.js";
import { EMPTY_CONTEXT } from "../types/index.js";
import { UndefinedMacroError } from "../utils/errors.js";
import { tokenize } from "./lexer.js";
import { renderListing } from "./listing.js";

interface MutableSection {
  nodes: DocumentNode[];
  commented: boolean;
}

/**
 * Assemble tokens into a Document.
 *
 * @param tokens - The tokens from the lexer
 * @param context - Site URL and metadata snapshot, read only by macros
 * @throws UndefinedMacroError for any macro other than `listing`
 */
export function assemble(
  tokens: readonly Token[],
  context: ParseContext = EMPTY_CONTEXT
): OrgDocument {
  const assembler = new Assembler(context);
  for (const token of tokens) {
    assembler.add(token);
  }
  return assembler.finish();
}

/**
 * Tokenize and assemble in one step.
 */
export function parseDocument(
  source: string,
  filename: string,
  context: ParseContext = EMPTY_CONTEXT
): OrgDocument {
  return assemble(tokenize(source, filename), context);
}

/**
 * Read only the keyword metadata of a source. Macros are not expanded, so
 * this is safe to run before the site's metadata snapshot exists.
 */
export function readMetadata(source: string, filename: string): Map<string, string> {
  const metadata = new Map<string, string>();
  for (const token of tokenize(source, filename)) {
    if (token.kind === "keyword") {
      metadata.set(token.name, token.content);
    }
  }
  return metadata;
}

/**
 * Internal Assembler class that tracks the current section.
 */
class Assembler {
  private context: ParseContext;
  private metadata = new Map<string, string>();
  private sections: MutableSection[] = [{ nodes: [], commented: false }];

  constructor(context: ParseContext) {
    this.context = context;
  }

  add(token: Token): void {
    switch (token.kind) {
      case "heading":
        this.sections.push({
          nodes: [
            {
              type: "heading",
              level: token.level,
              title: token.title,
              todoState: token.todoState,
              tags: token.tags,
              commented: token.commented,
            },
          ],
          commented: token.commented,
        });
        break;

      case "paragraph":
        this.append({ type: "paragraph", content: token.content });
        break;

      case "table":
        this.append({ type: "table", rows: token.rows });
        break;

      case "lesser_block":
      case "greater_block":
        this.append({
          type: "lesser_block",
          blockType: token.blockType,
          args: splitArgs(token.args),
          contents: token.contents.join("\n"),
        });
        break;

      case "keyword":
        this.metadata.set(token.name, token.content);
        break;

      case "macro":
        this.expandMacro(token);
        break;

      // Comments, planning lines and drawers carry nothing to render.
      case "comment":
      case "planning":
      case "drawer":
      case "empty_line":
        break;
    }
  }

  finish(): OrgDocument {
    return {
      metadata: this.metadata,
      sections: this.sections,
    };
  }

  private append(node: DocumentNode): void {
    this.sections[this.sections.length - 1].nodes.push(node);
  }

  private expandMacro(token: MacroToken): void {
    if (token.name !== "listing") {
      throw new UndefinedMacroError(token.name, token.location);
    }

    this.sections.push({
      nodes: [
        {
          type: "heading",
          level: 1,
          title: "Articles",
          tags: [],
          commented: false,
        },
        {
          type: "lesser_block",
          blockType: "export",
          args: ["html"],
          contents: renderListing(token.args, this.context),
        },
      ],
      commented: false,
    });
  }
}

function splitArgs(args: string): string[] {
  return args.split(/\s+/).filter((arg) => arg !== "");
}

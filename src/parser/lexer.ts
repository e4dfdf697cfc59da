/**
 * orgsite Lexer
 *
 * Tokenizes outline files line by line.
 *
 * The lexer is a small state machine:
 * - default: each line is classified on its own (see `classify`)
 * - drawer:  lines are collected until `:END:`
 * - block:   lines are collected until `#+END[_TYPE]`
 *
 * Paragraph and table lines accumulate in a pending slot and are flushed
 * to the output once a line of any other kind is produced.
 */

import type {
  Token,
  SourceLocation,
  HeadingToken,
  ParagraphToken,
  TableToken,
  LesserBlockType,
} from "../types/index.js";
import { LESSER_BLOCK_TYPES } from "../types/index.js";
import {
  BlockMismatchError,
  UnexpectedEndOfInputError,
} from "../utils/errors.js";

// =============================================================================
// Line Patterns
// =============================================================================

const HEADING =
  /^(\*+)\s+(?:((?!COMMENT)[A-Z]{2,})\s+)?(?:(?:\[#([a-zA-Z0-9])\]|#\[([a-zA-Z0-9])\])\s+)?(.+?)(?:\s+:((?:[a-zA-Z0-9_@#%]+:)+))?(?:\s+\[(\d+\/\d+|[\d.]+%)\])?\s*$/;
const PLANNING = /^\s+(\w+):\s*(.+)/;
const DRAWER_OPEN = /^\s+:([\w-]+):/;
const DRAWER_CLOSE = /^\s*:end:/i;
const BLOCK_OPEN = /^#\+BEGIN(?:_([a-zA-Z]+))?(?::|\s|$)\s*(.*)$/i;
const BLOCK_CLOSE = /^#\+END(?:_([a-zA-Z]+))?\b/i;
const COMMENT = /^#\s+(.+)/;
const KEYWORD = /^#\+([a-zA-Z_]+):\s*(.+)$/;
const TABLE_ROW = /^\s*\|/;
const INDENTED = /^\s+/;

type LexerState =
  | { kind: "default" }
  | { kind: "drawer"; name: string; lines: string[]; start: SourceLocation }
  | {
      kind: "block";
      blockType?: string;
      args: string;
      lines: string[];
      start: SourceLocation;
    };

/**
 * Tokenize an outline file.
 *
 * @param source - The text to tokenize
 * @param filename - Used only to tag token locations
 * @returns Tokens in source order, blank lines removed
 * @throws UnexpectedEndOfInputError if a drawer or block is left open
 * @throws BlockMismatchError if a block is closed with a different type
 */
export function tokenize(source: string, filename: string): Token[] {
  const lexer = new Lexer(filename);
  return lexer.tokenize(source);
}

/**
 * Internal Lexer class that maintains state during tokenization.
 */
class Lexer {
  private filename: string;
  private line: number = 1;
  private state: LexerState = { kind: "default" };
  private tokens: Token[] = [];
  private pending: ParagraphToken | TableToken | null = null;

  constructor(filename: string) {
    this.filename = filename;
  }

  /**
   * Main tokenize method.
   */
  tokenize(source: string): Token[] {
    for (const raw of source.split("\n")) {
      const line = raw.endsWith("\r") ? raw.slice(0, -1) : raw;

      switch (this.state.kind) {
        case "default":
          this.handleDefault(line);
          break;
        case "drawer":
          this.handleDrawer(line, this.state);
          break;
        case "block":
          this.handleBlock(line, this.state);
          break;
      }

      this.line++;
    }

    if (this.state.kind !== "default") {
      const open =
        this.state.kind === "drawer"
          ? `drawer :${this.state.name}:`
          : `block #+BEGIN${this.state.blockType ? `_${this.state.blockType.toUpperCase()}` : ""}`;
      throw new UnexpectedEndOfInputError(this.state.start, open);
    }

    this.flush();

    return this.tokens.filter((t) => t.kind !== "empty_line");
  }

  // ===========================================================================
  // States
  // ===========================================================================

  private handleDrawer(
    line: string,
    state: Extract<LexerState, { kind: "drawer" }>
  ): void {
    if (DRAWER_CLOSE.test(line)) {
      this.state = { kind: "default" };
      this.emit({
        kind: "drawer",
        name: state.name,
        contents: state.lines,
        location: state.start,
      });
      return;
    }

    state.lines.push(line);
  }

  private handleBlock(
    line: string,
    state: Extract<LexerState, { kind: "block" }>
  ): void {
    const close = BLOCK_CLOSE.exec(line);
    if (!close) {
      state.lines.push(line);
      return;
    }

    const closedType = close[1]?.toLowerCase();
    if (closedType !== state.blockType) {
      throw new BlockMismatchError(this.location(), state.blockType, closedType);
    }

    this.state = { kind: "default" };
    this.emit(this.constructBlock(state));
  }

  private handleDefault(line: string): void {
    if (line.trim() === "") {
      this.emit({ kind: "empty_line", location: this.location() });
      return;
    }

    const heading = this.matchHeading(line);
    if (heading) {
      this.emit(heading);
      return;
    }

    const previous = this.last();
    if (previous?.kind === "planning" || previous?.kind === "heading") {
      const planning = PLANNING.exec(line);
      if (planning) {
        this.emit({
          kind: "planning",
          planningType: planning[1],
          value: planning[2],
          location: this.location(),
        });
        return;
      }
    }

    const drawer = DRAWER_OPEN.exec(line);
    if (drawer) {
      this.flush();
      this.state = {
        kind: "drawer",
        name: drawer[1],
        lines: [],
        start: this.location(),
      };
      return;
    }

    const block = BLOCK_OPEN.exec(line);
    if (block) {
      this.flush();
      this.state = {
        kind: "block",
        blockType: block[1]?.toLowerCase(),
        args: block[2],
        lines: [],
        start: this.location(),
      };
      return;
    }

    const comment = COMMENT.exec(line);
    if (comment) {
      this.emit({
        kind: "comment",
        content: comment[1].trim(),
        location: this.location(),
      });
      return;
    }

    const keyword = KEYWORD.exec(line);
    if (keyword) {
      this.emit({
        kind: "keyword",
        name: keyword[1].toLowerCase(),
        content: keyword[2],
        location: this.location(),
      });
      return;
    }

    if (TABLE_ROW.test(line)) {
      this.handleTableRow(line);
      return;
    }

    this.handleParagraphLine(line);
  }

  // ===========================================================================
  // Line Kinds
  // ===========================================================================

  private matchHeading(line: string): HeadingToken | null {
    const match = HEADING.exec(line);
    if (!match) {
      return null;
    }

    const [, stars, todoState, priority, legacyPriority, title, tagCluster, completion] = match;
    const tags = (tagCluster ?? "").split(":").filter((tag) => tag !== "");

    return {
      kind: "heading",
      level: stars.length,
      todoState,
      priority: priority ?? legacyPriority,
      title: title.trim(),
      tags,
      archived: tags.includes("ARCHIVED"),
      commented: title.startsWith("COMMENT"),
      completion,
      location: this.location(),
    };
  }

  private handleTableRow(line: string): void {
    const cells = line
      .trim()
      .split("|")
      .map((cell) => cell.trim());

    if (this.pending?.kind === "table") {
      this.pending.rows.push(cells);
      return;
    }

    this.flush();
    this.pending = { kind: "table", rows: [cells], location: this.location() };
  }

  private handleParagraphLine(line: string): void {
    if (this.pending?.kind === "paragraph") {
      const previous = this.pending.content.trimEnd();
      this.pending.content = INDENTED.test(line)
        ? `${previous} ${line.trimStart()}`
        : `${previous}\n${line}`;
      return;
    }

    this.flush();
    this.pending = {
      kind: "paragraph",
      content: line.trimStart(),
      location: this.location(),
    };
  }

  // ===========================================================================
  // Blocks
  // ===========================================================================

  /**
   * Turn a closed block into its token. Untyped blocks are macros.
   */
  private constructBlock(state: Extract<LexerState, { kind: "block" }>): Token {
    const { blockType, args, lines, start } = state;

    if (blockType === undefined) {
      const [name = "", ...macroArgs] = args.trim().split(/\s+/).filter((w) => w !== "");
      return { kind: "macro", name, args: macroArgs, location: start };
    }

    if (blockType === "comment") {
      return { kind: "comment", content: lines.join("\n"), location: start };
    }

    if (isLesserBlockType(blockType)) {
      return {
        kind: "lesser_block",
        blockType,
        args,
        contents: stripSharedIndent(lines),
        location: start,
      };
    }

    return {
      kind: "greater_block",
      blockType,
      args,
      contents: lines,
      location: start,
    };
  }

  // =========================================================================
  // Helper Methods
  // =========================================================================

  /**
   * The most recently produced token, pending or not. Blank lines count.
   */
  private last(): Token | undefined {
    return this.pending ?? this.tokens[this.tokens.length - 1];
  }

  private emit(token: Token): void {
    this.flush();
    this.tokens.push(token);
  }

  private flush(): void {
    if (this.pending) {
      this.tokens.push(this.pending);
      this.pending = null;
    }
  }

  private location(): SourceLocation {
    return { file: this.filename, line: this.line };
  }
}

function isLesserBlockType(type: string): type is LesserBlockType {
  return LESSER_BLOCK_TYPES.some((t) => t === type);
}

/**
 * Remove the leading whitespace every line shares, keeping relative
 * indentation.
 */
export function stripSharedIndent(lines: string[]): string[] {
  if (lines.length === 0) {
    return [];
  }

  const shared = lines.reduce(
    (min, line) => Math.min(min, INDENTED.exec(line)?.[0].length ?? 0),
    Infinity
  );

  return lines.map((line) => line.slice(shared));
}

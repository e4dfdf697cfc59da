/**
 * orgsite Type Definitions
 *
 * This file defines all shared interfaces for the outline-to-HTML pipeline.
 *
 * Key concept: data flows strictly forward. The lexer produces tokens once,
 * the assembler folds them into a Document once, and everything downstream
 * only reads. Cross-document metadata is never ambient; it travels as an
 * explicit read-only snapshot.
 */

// =============================================================================
// Source Location (shared across parser components)
// =============================================================================

export interface SourceLocation {
  file: string;
  line: number; // 1-based
}

// =============================================================================
// Lexer Types
// =============================================================================

export type TokenKind =
  | 'empty_line'     // blank line, filtered from lexer output
  | 'paragraph'      // free text not claimed by another rule
  | 'table'          // | cell | cell |
  | 'heading'        // * TODO [#A] Title :tag: [1/2]
  | 'planning'       // indented KEYWORD: value under a heading
  | 'lesser_block'   // #+BEGIN_SRC / VERSE / EXAMPLE / EXPORT
  | 'greater_block'  // any other #+BEGIN_TYPE
  | 'keyword'        // #+NAME: value
  | 'comment'        // # text, or #+BEGIN_COMMENT
  | 'drawer'         // :NAME: ... :END:
  | 'macro';         // #+BEGIN: name args ... #+END

export interface EmptyLineToken {
  kind: 'empty_line';
  location: SourceLocation;
}

export interface ParagraphToken {
  kind: 'paragraph';
  content: string;
  location: SourceLocation;
}

export interface TableToken {
  kind: 'table';
  rows: string[][];
  location: SourceLocation;
}

export interface HeadingToken {
  kind: 'heading';
  level: number;
  todoState?: string;
  priority?: string;
  title: string;
  tags: string[];
  archived: boolean;
  commented: boolean;
  /** `3/5` or `60%`, without the brackets */
  completion?: string;
  location: SourceLocation;
}

export interface PlanningToken {
  kind: 'planning';
  planningType: string;
  value: string;
  location: SourceLocation;
}

export interface BlockToken<K extends 'lesser_block' | 'greater_block'> {
  kind: K;
  blockType: string;
  /** Raw text after the BEGIN line's type */
  args: string;
  contents: string[];
  location: SourceLocation;
}

export type LesserBlockToken = BlockToken<'lesser_block'>;
export type GreaterBlockToken = BlockToken<'greater_block'>;

export interface KeywordToken {
  kind: 'keyword';
  name: string;
  content: string;
  location: SourceLocation;
}

export interface CommentToken {
  kind: 'comment';
  content: string;
  location: SourceLocation;
}

export interface DrawerToken {
  kind: 'drawer';
  name: string;
  contents: string[];
  location: SourceLocation;
}

export interface MacroToken {
  kind: 'macro';
  name: string;
  args: string[];
  location: SourceLocation;
}

export type Token =
  | EmptyLineToken
  | ParagraphToken
  | TableToken
  | HeadingToken
  | PlanningToken
  | LesserBlockToken
  | GreaterBlockToken
  | KeywordToken
  | CommentToken
  | DrawerToken
  | MacroToken;

/** Block types whose contents are kept as near-literal text. */
export const LESSER_BLOCK_TYPES = ['src', 'verse', 'example', 'export'] as const;

export type LesserBlockType = typeof LESSER_BLOCK_TYPES[number];

// =============================================================================
// Document Types
// =============================================================================

export interface HeadingNode {
  type: 'heading';
  level: number;
  title: string;
  todoState?: string;
  tags: string[];
  commented: boolean;
}

export interface ParagraphNode {
  type: 'paragraph';
  content: string;
}

/**
 * A BEGIN/END block. Greater blocks share this shape so the renderer can
 * reject them by type.
 */
export interface LesserBlockNode {
  type: 'lesser_block';
  blockType: string;
  args: string[];
  contents: string;
}

export interface TableNode {
  type: 'table';
  rows: string[][];
}

export type DocumentNode =
  | HeadingNode
  | ParagraphNode
  | LesserBlockNode
  | TableNode;

export interface Section {
  readonly nodes: readonly DocumentNode[];
  readonly commented: boolean;
}

/**
 * A parsed document. `sections[0]` is the preamble: everything before the
 * first heading. It is always present, even when empty.
 */
export interface OrgDocument {
  readonly metadata: ReadonlyMap<string, string>;
  readonly sections: readonly Section[];
}

// =============================================================================
// Cross-document Metadata
// =============================================================================

export interface ArticleMetadata {
  kind: 'article';
  title: string;
  author?: string;
  description?: string;
  tags: string[];
  modified: Date;
  /** Absolute URL of the rendered page */
  url: string;
}

export interface ImageMetadata {
  kind: 'image';
  url: string;
}

export type SiteMetadata = ArticleMetadata | ImageMetadata;

/** Read-only view of every record extracted in phase 1. */
export type MetadataSnapshot = readonly Readonly<SiteMetadata>[];

/**
 * What the assembler needs from the rest of the site. Only macro expansion
 * reads it.
 */
export interface ParseContext {
  siteUrl: string;
  metadata: MetadataSnapshot;
}

export const EMPTY_CONTEXT: ParseContext = {
  siteUrl: '',
  metadata: [],
};

// =============================================================================
// Site Pipeline Types
// =============================================================================

/**
 * A source file as handed to the pipeline. `relativePath` uses `/`
 * separators and is relative to the source root.
 */
export interface SourceFile {
  relativePath: string;
  content: string;
  modified: Date;
}

/** Key/value pairs handed to the page template. `content` is reserved. */
export type TemplateContext = Record<string, string> & { content: string };

export type TemplateRenderer = (context: TemplateContext) => string;

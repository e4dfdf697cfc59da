/**
 * Parser Module
 *
 * Exports for lexer, document assembler, and the listing macro.
 */

export { tokenize, stripSharedIndent } from "./lexer.js";
export { assemble, parseDocument, readMetadata } from "./document.js";
export { renderListing, renderCard, selectArticles } from "./listing.js";

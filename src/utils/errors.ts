/**
 * Error types for the pipeline.
 *
 * Every failure is fatal to the document it happened in. `unrecoverable`
 * marks the ones that must also stop the whole run.
 */

import type { SourceLocation } from "../types/index.js";

export class OrgsiteError extends Error {
  readonly location?: SourceLocation;
  readonly unrecoverable: boolean = false;

  constructor(message: string, location?: SourceLocation) {
    super(location ? `${location.file}:${location.line}: ${message}` : message);
    this.name = new.target.name;
    this.location = location;
  }
}

export class SourceReadError extends OrgsiteError {
  constructor(path: string, cause: unknown) {
    super(`Failed to read ${path}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.cause = cause;
  }
}

/** An unterminated drawer or block at end of input. */
export class UnexpectedEndOfInputError extends OrgsiteError {
  constructor(location: SourceLocation, open: string) {
    super(`Unexpected end of input: ${open} opened here is never closed`, location);
  }
}

/**
 * A `#+END_X` closing a block opened with a different type. The input is
 * malformed and no repair is attempted.
 */
export class BlockMismatchError extends OrgsiteError {
  override readonly unrecoverable = true;

  constructor(location: SourceLocation, opened: string | undefined, closed: string | undefined) {
    super(
      `Closing a block of a different type: opened ${opened ?? "(none)"}, closed ${closed ?? "(none)"}`,
      location
    );
  }
}

export class UndefinedMacroError extends OrgsiteError {
  constructor(name: string, location: SourceLocation) {
    super(`Undefined macro: ${name}`, location);
  }
}

export class NotImplementedError extends OrgsiteError {
  constructor(what: string) {
    super(`Not implemented: ${what}`);
  }
}

export class ConfigError extends OrgsiteError {}

/**
 * True when an error must abort the run rather than a single document.
 */
export function isUnrecoverable(error: unknown): boolean {
  return error instanceof OrgsiteError && error.unrecoverable;
}

/**
 * Error classes raised by the stylesheet engine.
 *
 * Parsing is lenient unless `raiseParseErrors` is set, so `ParseError` only
 * surfaces in strict mode. The other classes are raised regardless of mode.
 */

export type ParseErrorType =
  | "empty_value"
  | "malformed_declaration"
  | "invalid_selector"
  | "invalid_selector_syntax"
  | "malformed_at_rule"
  | "unclosed_block";

export type SourceLocation = { line: number; column: number };

export class ParseError extends Error {
  readonly line: number | null;
  readonly column: number | null;
  readonly errorType: ParseErrorType;

  constructor(message: string, errorType: ParseErrorType, loc?: SourceLocation | null) {
    super(loc ? `${message} at line ${loc.line}, column ${loc.column}` : message);
    this.name = "ParseError";
    this.errorType = errorType;
    this.line = loc?.line ?? null;
    this.column = loc?.column ?? null;
  }
}

/** Nesting went deeper than the parser allows. */
export class DepthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DepthError";
  }
}

/** A resource limit such as the media query count was exceeded. */
export class SizeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SizeError";
  }
}

export class ImportError extends Error {
  readonly url: string;

  constructor(message: string, url: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ImportError";
    this.url = url;
  }
}

/** Shorthand input rejected before any splitting happens. */
export class ShorthandInputError extends Error {
  readonly property: string;

  constructor(message: string, property: string) {
    super(message);
    this.name = "ShorthandInputError";
    this.property = property;
  }
}

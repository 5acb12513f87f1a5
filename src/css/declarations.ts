/**
 * Declaration block parsing.
 *
 * Splits a block on top-level semicolons, separates property from value,
 * lowercases the property and lifts a trailing `!important` into a flag.
 * Values are kept as written apart from trimming and comment removal.
 */
import { createDeclaration, type Declaration } from "../internal/css-ir.js";
import { Diagnostics } from "../internal/diagnostics.js";
import { resolveRaiseOptions, type ParseErrorToggles } from "../internal/options.js";
import { findTopLevel, hasBrokenString, skipWhitespace, SourceText } from "../internal/scan.js";

export const MAX_PROPERTY_NAME_LENGTH = 256;
export const MAX_PROPERTY_VALUE_LENGTH = 32_768;

const IMPORTANT_SUFFIX = /!\s*important\s*$/i;

/**
 * Strip a trailing `!important` (any case, optional inner whitespace).
 *
 * @example splitImportant("red ! IMPORTANT") // { value: "red", important: true }
 */
export function splitImportant(raw: string): { value: string; important: boolean } {
  const trimmed = raw.trim();
  const match = IMPORTANT_SUFFIX.exec(trimmed);
  if (!match) {
    return { value: trimmed, important: false };
  }
  return { value: trimmed.slice(0, match.index).trim(), important: true };
}

/**
 * Parse the declarations in `[start, end)` of a source text. Problems go to
 * `diagnostics`, which either throws or records a warning; dropped
 * declarations never reach the result.
 */
export function parseDeclarationRange(
  source: SourceText,
  start: number,
  end: number,
  diagnostics: Diagnostics,
): Declaration[] {
  const declarations: Declaration[] = [];
  let pos = start;
  while (pos < end) {
    pos = skipWhitespace(source.text, pos, end);
    if (pos >= end) {
      break;
    }
    const stop = findTopLevel(source.text, pos, end, ";");
    const declaration = parseDeclarationAt(source, pos, stop, diagnostics);
    if (declaration) {
      declarations.push(declaration);
    }
    pos = stop + 1;
  }
  return declarations;
}

function parseDeclarationAt(
  source: SourceText,
  start: number,
  end: number,
  diagnostics: Diagnostics,
): Declaration | null {
  const colon = findTopLevel(source.text, start, end, ":");
  if (colon >= end) {
    diagnostics.report(
      "malformed_declaration",
      `Malformed declaration: missing colon in '${source.slice(start, end).trim()}'`,
      start,
    );
    return null;
  }

  const property = source.slice(start, colon).trim().toLowerCase();
  if (property === "") {
    diagnostics.report("malformed_declaration", "Malformed declaration: missing property name", start);
    return null;
  }
  if (/^[>+~]/.test(property) || /\s/.test(property)) {
    diagnostics.report(
      "malformed_declaration",
      `Malformed declaration: invalid property name '${property}'`,
      start,
    );
    return null;
  }

  const { value, important } = splitImportant(source.slice(colon + 1, end));
  if (value === "") {
    diagnostics.report("empty_value", `Empty value for property '${property}'`, start);
    return null;
  }

  if (hasBrokenString(value)) {
    diagnostics.report(
      "malformed_declaration",
      `Malformed declaration: unterminated string in '${property}'`,
      start,
    );
    return null;
  }

  if (property.length > MAX_PROPERTY_NAME_LENGTH || value.length > MAX_PROPERTY_VALUE_LENGTH) {
    diagnostics.warn("Dropped declaration exceeding the property size limits", start, {
      propertyLength: property.length,
      valueLength: value.length,
    });
    return null;
  }

  return createDeclaration(property, value, important);
}

/**
 * Parse a standalone declaration block such as `color: red; margin: 0 !important`.
 * Surrounding braces are not expected.
 */
export function parseDeclarations(
  text: string,
  options: { raiseParseErrors?: boolean | ParseErrorToggles } = {},
): Declaration[] {
  const source = new SourceText(text);
  const diagnostics = new Diagnostics(text, resolveRaiseOptions(options.raiseParseErrors));
  return parseDeclarationRange(source, 0, source.length, diagnostics);
}

/**
 * Split a declaration block into its raw `property: value` segments without
 * validating them.
 */
export function splitDeclarations(text: string): string[] {
  const source = new SourceText(text);
  const segments: string[] = [];
  let pos = 0;
  while (pos < source.length) {
    const stop = findTopLevel(source.text, pos, source.length, ";");
    const segment = source.slice(pos, stop).trim();
    if (segment) {
      segments.push(segment);
    }
    pos = stop + 1;
  }
  return segments;
}

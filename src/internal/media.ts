/**
 * Media query bookkeeping: parsing query text into media types, combining
 * nested queries, and interning queries so rules can refer to them by id.
 */
import type { MediaQuery } from "./css-ir.js";
import { SizeError } from "./errors.js";
import { collapseWhitespace } from "./scan.js";

export const MAX_MEDIA_QUERIES = 1000;

/** The implicit media type every rule matches. */
export const ALL_MEDIA = "all";

const MEDIA_KEYWORDS = new Set(["and", "or", "not", "only"]);

/**
 * Media types named by a query, in order of appearance. Parenthesised
 * feature tests and the logical keywords are skipped.
 *
 * @example parseMediaTypes("screen, print") // ["screen", "print"]
 * @example parseMediaTypes("screen and (min-width: 500px)") // ["screen"]
 */
export function parseMediaTypes(query: string): string[] {
  const types: string[] = [];
  let depth = 0;
  let word = "";
  const flush = () => {
    const lowered = word.toLowerCase();
    if (lowered && !MEDIA_KEYWORDS.has(lowered) && !types.includes(lowered)) {
      types.push(lowered);
    }
    word = "";
  };
  for (const ch of query) {
    if (ch === "(") {
      flush();
      depth++;
    } else if (ch === ")") {
      depth = Math.max(0, depth - 1);
    } else if (depth > 0) {
      continue;
    } else if (ch === "," || ch === ":" || /\s/.test(ch)) {
      flush();
    } else {
      word += ch;
    }
  }
  flush();
  return types;
}

/**
 * Combine an enclosing query with a nested one. A nested bare feature such as
 * `min-width: 500px` is wrapped in parentheses.
 */
export function combineMediaQueries(parent: string | null, child: string | null): string | null {
  if (!parent) {
    return child;
  }
  if (!child) {
    return parent;
  }
  const wrapped =
    child.includes(":") && !(child.startsWith("(") && child.endsWith(")")) ? `(${child})` : child;
  return `${parent} and ${wrapped}`;
}

/**
 * Canonical query text: whitespace collapsed and one space after the colon
 * of each feature test.
 *
 * @example normalizeMediaQuery("screen and (min-width:500px)") // "screen and (min-width: 500px)"
 */
export function normalizeMediaQuery(text: string): string {
  return collapseWhitespace(text)
    .replace(/\(\s*([^():]+?)\s*:\s*/g, "($1: ")
    .replace(/\s+\)/g, ")");
}

export function createMediaQuery(id: number, text: string): MediaQuery {
  const normalized = normalizeMediaQuery(text);
  const types = parseMediaTypes(normalized);
  const first = types[0];
  const leading = normalized.match(/^(?:only\s+)?([^\s,(]+)/i);
  if (types.length === 1 && first !== undefined && leading && leading[1]?.toLowerCase() === first) {
    const rest = normalized.slice(leading[0].length).replace(/^\s*and\s+/i, "").trim();
    return { id, type: first, conditions: rest || null, text: normalized, types };
  }
  return {
    id,
    type: types.length === 1 && first !== undefined ? first : ALL_MEDIA,
    conditions: normalized,
    text: normalized,
    types,
  };
}

/**
 * Interned media queries; `id` is the index into `list`.
 */
export class MediaQueryTable {
  private readonly queries: MediaQuery[];
  private readonly byText: Map<string, number>;

  constructor(queries: readonly MediaQuery[] = []) {
    this.queries = queries.map((query, id) => ({ ...query, id, types: [...query.types] }));
    this.byText = new Map(this.queries.map((query) => [query.text, query.id]));
  }

  get list(): readonly MediaQuery[] {
    return this.queries;
  }

  get(id: number | null): MediaQuery | null {
    return id === null ? null : (this.queries[id] ?? null);
  }

  textOf(id: number | null): string | null {
    return this.get(id)?.text ?? null;
  }

  intern(text: string): number {
    const normalized = normalizeMediaQuery(text);
    const existing = this.byText.get(normalized);
    if (existing !== undefined) {
      return existing;
    }
    if (this.queries.length >= MAX_MEDIA_QUERIES) {
      throw new SizeError(`Too many media queries: exceeded maximum of ${MAX_MEDIA_QUERIES}`);
    }
    const query = createMediaQuery(this.queries.length, normalized);
    this.queries.push(query);
    this.byText.set(normalized, query.id);
    return query.id;
  }

  clone(): MediaQueryTable {
    return new MediaQueryTable(this.queries);
  }
}

/**
 * Keys a rule under a media query is indexed by: each media type, then the
 * full text when it differs from the lone type.
 */
export function mediaIndexKeys(query: MediaQuery): string[] {
  const keys = [...query.types];
  if (!keys.includes(query.text)) {
    keys.push(query.text);
  }
  return keys;
}

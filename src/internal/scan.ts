/**
 * Character-level helpers shared by the parser, the declaration splitter and
 * the selector checks. Everything here is string and escape aware: quotes,
 * backslash escapes and bracket/paren groups are never treated as structure.
 */

export function isWhitespace(ch: string | undefined): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r" || ch === "\f";
}

export function skipWhitespace(src: string, pos: number, end: number): number {
  while (pos < end && isWhitespace(src[pos])) {
    pos++;
  }
  return pos;
}

/**
 * Replace every comment with spaces of the same length, keeping newlines, so
 * offsets and line numbers in the result still point into the original text.
 * An unterminated comment runs to the end of the input.
 */
export function blankComments(css: string): string {
  return rewriteComments(css, (comment) => comment.replace(/[^\n]/g, " "));
}

export function removeComments(css: string): string {
  return rewriteComments(css, () => "");
}

function rewriteComments(css: string, replace: (comment: string) => string): string {
  if (!css.includes("/*")) {
    return css;
  }
  let out = "";
  let copyFrom = 0;
  let quote: string | null = null;
  let i = 0;
  while (i < css.length) {
    const ch = css[i];
    if (ch === "\\") {
      i += 2;
      continue;
    }
    if (quote) {
      if (ch === quote || ch === "\n") {
        quote = null;
      }
      i++;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      i++;
      continue;
    }
    if (ch === "/" && css[i + 1] === "*") {
      const close = css.indexOf("*/", i + 2);
      const stop = close === -1 ? css.length : close + 2;
      out += css.slice(copyFrom, i) + replace(css.slice(i, stop));
      copyFrom = stop;
      i = stop;
      continue;
    }
    i++;
  }
  return out + css.slice(copyFrom);
}

/**
 * Source text with comments blanked out for scanning. `slice` hands back
 * text with comments removed, so values never carry comment padding.
 */
export class SourceText {
  readonly text: string;

  constructor(readonly original: string) {
    this.text = blankComments(original);
  }

  get length(): number {
    return this.text.length;
  }

  slice(start: number, end: number): string {
    const scanned = this.text.slice(start, end);
    if (scanned === this.original.slice(start, end)) {
      return scanned;
    }
    return removeComments(this.original.slice(start, end));
  }
}

/**
 * Index of the first character from `stops` that sits outside strings and
 * outside any `()` or `[]` group, or `end` when there is none. A string ends
 * at its closing quote or at an unescaped newline.
 */
export function findTopLevel(src: string, start: number, end: number, stops: string): number {
  let depth = 0;
  let quote: string | null = null;
  for (let i = start; i < end; i++) {
    const ch = src[i];
    if (ch === undefined) {
      break;
    }
    if (ch === "\\") {
      i++;
      continue;
    }
    if (quote) {
      if (ch === quote || ch === "\n") {
        quote = null;
      }
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === "(" || ch === "[") {
      depth++;
    } else if ((ch === ")" || ch === "]") && depth > 0) {
      depth--;
    } else if (depth === 0 && stops.includes(ch)) {
      return i;
    }
  }
  return end;
}

/**
 * Given the offset of a `{`, return the offset of its matching `}`, or -1 when
 * the block is still open at `end`.
 */
export function findMatchingBrace(src: string, open: number, end: number): number {
  let depth = 0;
  let quote: string | null = null;
  for (let i = open; i < end; i++) {
    const ch = src[i];
    if (ch === "\\") {
      i++;
      continue;
    }
    if (quote) {
      if (ch === quote || ch === "\n") {
        quote = null;
      }
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

/** True when a string in `text` is cut off by an unescaped newline. */
export function hasBrokenString(text: string): boolean {
  let quote: string | null = null;
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (ch === "\\") {
      i++;
      continue;
    }
    if (quote) {
      if (ch === "\n") {
        return true;
      }
      if (ch === quote) {
        quote = null;
      }
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    }
  }
  return false;
}

/**
 * Split on a separator that sits outside strings and groups. Parts are
 * returned untrimmed.
 */
export function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = [];
  let start = 0;
  for (;;) {
    const at = findTopLevel(text, start, text.length, separator);
    parts.push(text.slice(start, at));
    if (at >= text.length) {
      return parts;
    }
    start = at + 1;
  }
}

/**
 * Collapse runs of whitespace to one space and trim, leaving quoted strings
 * untouched.
 */
export function collapseWhitespace(text: string): string {
  let out = "";
  let quote: string | null = null;
  let pendingSpace = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (quote) {
      out += ch;
      if (ch === "\\" && i + 1 < text.length) {
        out += text.charAt(++i);
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }
    if (isWhitespace(ch)) {
      pendingSpace = out.length > 0;
      continue;
    }
    if (pendingSpace) {
      out += " ";
      pendingSpace = false;
    }
    out += ch;
    if (ch === "\\" && i + 1 < text.length) {
      out += text.charAt(++i);
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    }
  }
  return out;
}

/** Offsets of line starts, for turning an offset into a line and column. */
export class LineIndex {
  private readonly starts: number[] = [0];

  constructor(text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) === 10) {
        this.starts.push(i + 1);
      }
    }
  }

  locate(offset: number): { line: number; column: number } {
    let low = 0;
    let high = this.starts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if ((this.starts[mid] ?? 0) <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return { line: low + 1, column: offset - (this.starts[low] ?? 0) + 1 };
  }
}

/**
 * Selector helpers: specificity scoring, syntax checks and nested selector
 * resolution.
 * Core concepts: selector lists are split on top-level commas only, and
 * specificity is a single integer (id 100, class/attribute/pseudo-class 10,
 * element/pseudo-element 1).
 */
import selectorParser from "postcss-selector-parser";
import type { NestingStyle } from "./css-ir.js";
import { hasBrokenString, splitTopLevel } from "./scan.js";

// ────────────────────────────────────────────────────────────────────────────
// Specificity
// ────────────────────────────────────────────────────────────────────────────

/** Pseudo-elements that CSS2 allowed with a single colon. */
const LEGACY_PSEUDO_ELEMENTS = new Set([":before", ":after", ":first-line", ":first-letter", ":selection"]);

/** Pseudo-classes that take the specificity of their most specific argument. */
const ARGUMENT_PSEUDOS = new Set([":not", ":is", ":matches", ":-webkit-any", ":-moz-any", ":has"]);

const SPECIFICITY_CACHE_LIMIT = 10_000;
const specificityCache = new Map<string, number>();

/**
 * Specificity of one selector. A list scores as its most specific member.
 * Selectors that do not parse score 0.
 *
 * @example calculateSpecificity("#nav .item a:hover") // 100 + 10 + 1 + 10 = 121
 */
export function calculateSpecificity(selector: string): number {
  const cached = specificityCache.get(selector);
  if (cached !== undefined) {
    return cached;
  }
  let score = 0;
  try {
    const ast = selectorParser().astSync(selector);
    score = Math.max(0, ...ast.nodes.map(selectorScore));
  } catch {
    score = 0;
  }
  if (specificityCache.size >= SPECIFICITY_CACHE_LIMIT) {
    specificityCache.clear();
  }
  specificityCache.set(selector, score);
  return score;
}

function selectorScore(selector: selectorParser.Selector): number {
  let total = 0;
  for (const node of selector.nodes) {
    total += nodeScore(node);
  }
  return total;
}

function nodeScore(node: selectorParser.Node): number {
  switch (node.type) {
    case "id":
      return 100;
    case "class":
    case "attribute":
      return 10;
    case "tag":
      return 1;
    case "pseudo":
      return pseudoScore(node);
    default:
      // universal, nesting, combinators
      return 0;
  }
}

function pseudoScore(node: selectorParser.Pseudo): number {
  const name = node.value.toLowerCase();
  if (name.startsWith("::") || LEGACY_PSEUDO_ELEMENTS.has(name)) {
    return 1;
  }
  if (name === ":where") {
    return 0;
  }
  if (ARGUMENT_PSEUDOS.has(name)) {
    return Math.max(0, ...node.nodes.map(selectorScore));
  }
  return 10;
}

// ────────────────────────────────────────────────────────────────────────────
// Selector lists and nesting
// ────────────────────────────────────────────────────────────────────────────

/** Split a selector list on commas outside strings, brackets and parens. */
export function splitSelectorList(selectorText: string): string[] {
  return splitTopLevel(selectorText, ",").map((part) => part.trim());
}

/**
 * Qualify a nested selector with its parent. `&` stands for the parent;
 * without it the nested selector is a descendant (or, when it starts with a
 * combinator, a child/sibling) of the parent.
 *
 * @example resolveNestedSelector(".card", "&:hover") // { selector: ".card:hover", nestingStyle: "explicit" }
 * @example resolveNestedSelector(".card", "> p") // { selector: ".card > p", nestingStyle: "implicit" }
 */
export function resolveNestedSelector(
  parent: string,
  nested: string,
): { selector: string; nestingStyle: NestingStyle } {
  const offsets = nestingOffsets(nested);
  if (offsets.length > 0) {
    let selector = "";
    let from = 0;
    for (const offset of offsets) {
      selector += nested.slice(from, offset) + parent;
      from = offset + 1;
    }
    return { selector: selector + nested.slice(from), nestingStyle: "explicit" };
  }
  return { selector: `${parent} ${nested}`.trim(), nestingStyle: "implicit" };
}

/** Offsets of `&` outside strings, attribute brackets and escapes. */
function nestingOffsets(selector: string): number[] {
  const offsets: number[] = [];
  let quote: string | null = null;
  let brackets = 0;
  for (let i = 0; i < selector.length; i++) {
    const ch = selector.charAt(i);
    if (ch === "\\") {
      i++;
    } else if (quote) {
      if (ch === quote) {
        quote = null;
      }
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === "[") {
      brackets++;
    } else if (ch === "]" && brackets > 0) {
      brackets--;
    } else if (ch === "&" && brackets === 0) {
      offsets.push(i);
    }
  }
  return offsets;
}

// ────────────────────────────────────────────────────────────────────────────
// Validation
// ────────────────────────────────────────────────────────────────────────────

export type SelectorProblem = {
  type: "invalid_selector" | "invalid_selector_syntax";
  message: string;
};

type ValidateOptions = {
  /** Nested selectors may start with a combinator. */
  relative?: boolean;
  /** Run the character-level syntax checks. */
  checkSyntax?: boolean;
};

/**
 * First problem found in a selector list, or null. One bad member rejects
 * the whole list.
 */
export function validateSelectorList(
  selectorText: string,
  options: ValidateOptions = {},
): SelectorProblem | null {
  if (selectorText.trim() === "") {
    return { type: "invalid_selector", message: "Invalid selector: selector is empty" };
  }
  if (hasBrokenString(selectorText)) {
    return {
      type: "invalid_selector_syntax",
      message: "Invalid selector syntax: unterminated string",
    };
  }
  const parts = splitSelectorList(selectorText);
  for (const part of parts) {
    if (part === "") {
      return {
        type: "invalid_selector_syntax",
        message: `Invalid selector syntax: empty selector in list '${selectorText.trim()}'`,
      };
    }
    if (!options.relative && /^[>+~]/.test(part)) {
      return {
        type: "invalid_selector",
        message: `Invalid selector: '${part}' starts with a combinator`,
      };
    }
    if (options.checkSyntax && hasInvalidCharacters(part)) {
      return {
        type: "invalid_selector_syntax",
        message: `Invalid selector syntax: '${part}' contains invalid characters`,
      };
    }
  }
  return null;
}

function isNameChar(ch: string | undefined): boolean {
  if (ch === undefined) {
    return false;
  }
  return /[A-Za-z0-9_-]/.test(ch) || ch.charCodeAt(0) > 127 || ch === "\\";
}

function isNameStart(ch: string | undefined): boolean {
  return ch !== undefined && !/[0-9]/.test(ch) && isNameChar(ch);
}

const STRUCTURAL_CHARS = new Set([" ", "\t", "\n", "\r", "\f", "*", ">", "+", "~", "&", "|", ","]);

/**
 * Character-level syntax check for one selector. Bracket and paren groups are
 * skipped as a whole; `.`, `#` and `:` must introduce a name.
 */
function hasInvalidCharacters(selector: string): boolean {
  let i = 0;
  while (i < selector.length) {
    const ch = selector.charAt(i);
    if (ch === "\\") {
      i += 2;
      continue;
    }
    if (ch === "[" || ch === "(") {
      const close = findGroupEnd(selector, i);
      if (close === -1) {
        return true;
      }
      i = close + 1;
      continue;
    }
    if (ch === ".") {
      if (!isNameStart(selector[i + 1])) {
        return true;
      }
      i++;
      continue;
    }
    if (ch === "#") {
      if (!isNameChar(selector[i + 1])) {
        return true;
      }
      i++;
      continue;
    }
    if (ch === ":") {
      const next = selector[i + 1] === ":" ? i + 2 : i + 1;
      if (!isNameStart(selector[next])) {
        return true;
      }
      i = next;
      continue;
    }
    if (isNameChar(ch) || STRUCTURAL_CHARS.has(ch)) {
      i++;
      continue;
    }
    return true;
  }
  return false;
}

function findGroupEnd(selector: string, open: number): number {
  const closer = selector[open] === "[" ? "]" : ")";
  let depth = 0;
  let quote: string | null = null;
  for (let i = open; i < selector.length; i++) {
    const ch = selector[i];
    if (ch === "\\") {
      i++;
      continue;
    }
    if (quote) {
      if (ch === quote) {
        quote = null;
      }
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === selector[open]) {
      depth++;
    } else if (ch === closer) {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

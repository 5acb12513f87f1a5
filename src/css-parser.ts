/**
 * Stylesheet parser.
 *
 * A single recursive pass over comment-blanked source text. Qualified rules
 * become one `Rule` per selector in their list; nested selectors are
 * qualified with their parent; `@media`, `@supports`, `@layer`, `@container`
 * and `@scope` only tag the rules inside them, while descriptor at-rules such
 * as `@font-face` and `@keyframes` become opaque `AtRule` entries.
 *
 * Problems go through `Diagnostics`: strict kinds throw `ParseError`, the rest
 * are recorded as warnings and the offending input is dropped.
 */
import { parseDeclarationRange } from "./css/declarations.js";
import { parseImportPrelude } from "./import-resolver.js";
import type {
  AtRule,
  AtRuleType,
  Declaration,
  ImportStatement,
  NestingStyle,
  Rule,
  StylesheetEntry,
} from "./internal/css-ir.js";
import { Diagnostics } from "./internal/diagnostics.js";
import { DepthError, type ParseErrorType } from "./internal/errors.js";
import type { WarningLog } from "./internal/logger.js";
import { combineMediaQueries, MediaQueryTable } from "./internal/media.js";
import { resolveRaiseOptions, type ParseErrorToggles } from "./internal/options.js";
import { collapseWhitespace, findMatchingBrace, findTopLevel, skipWhitespace, SourceText } from "./internal/scan.js";
import {
  calculateSpecificity,
  resolveNestedSelector,
  splitSelectorList,
  validateSelectorList,
} from "./internal/selectors.js";

export const MAX_NESTING_DEPTH = 10;

export type ParseCssOptions = {
  raiseParseErrors?: boolean | ParseErrorToggles;
  /** Already resolved switches; takes precedence over `raiseParseErrors`. */
  raise?: Readonly<Record<ParseErrorType, boolean>>;
  /** Close blocks left open at end of input without reporting them. */
  fixBraces?: boolean;
  /** Media query every parsed rule is nested in. */
  media?: string | null;
  /** Table to intern media queries into; a new one by default. */
  mediaQueries?: MediaQueryTable;
  /** Id of the first entry, for appending to an existing stylesheet. */
  firstId?: number;
  firstSelectorListId?: number;
};

export type ParseResult = {
  entries: StylesheetEntry[];
  mediaQueries: MediaQueryTable;
  charset: string | null;
  /** `@import` statements left unresolved. */
  imports: ImportStatement[];
  warnings: WarningLog[];
  nextSelectorListId: number;
};

/** One selector a style block is emitted for. */
type Target = {
  selector: string;
  nestingStyle: NestingStyle | null;
  parentRuleId: number | null;
};

const CONDITIONAL_AT_RULES = new Set(["media", "supports", "layer", "container", "scope"]);
const KEYFRAMES = /^(-[a-z]+-)?keyframes$/;

const AT_RULE_TYPES: Record<string, AtRuleType> = {
  "font-face": "font_face",
  page: "page",
  property: "property",
  "counter-style": "counter_style",
};

class CssParser {
  readonly entries: StylesheetEntry[] = [];
  readonly imports: ImportStatement[] = [];
  charset: string | null = null;
  nextSelectorListId: number;

  private readonly src: SourceText;
  private readonly text: string;
  private sawRule = false;

  constructor(
    css: string,
    readonly diagnostics: Diagnostics,
    readonly mediaQueries: MediaQueryTable,
    private readonly fixBraces: boolean,
    private readonly firstId: number,
    firstSelectorListId: number,
  ) {
    this.src = new SourceText(css);
    this.text = this.src.text;
    this.nextSelectorListId = firstSelectorListId;
  }

  parse(media: string | null): void {
    this.parseStatements(0, this.src.length, media, 0);
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Statement level
  // ──────────────────────────────────────────────────────────────────────────

  private parseStatements(start: number, end: number, media: string | null, depth: number): void {
    checkDepth(depth);
    let pos = start;
    while (pos < end) {
      pos = skipWhitespace(this.text, pos, end);
      if (pos >= end) {
        break;
      }
      const ch = this.text[pos];
      if (ch === "}" || ch === ";") {
        pos++;
      } else if (ch === "@") {
        pos = this.parseAtRule(pos, end, media, depth, null);
      } else {
        pos = this.parseQualifiedRule(pos, end, media, depth);
      }
    }
  }

  private parseQualifiedRule(start: number, end: number, media: string | null, depth: number): number {
    const open = findTopLevel(this.text, start, end, "{;");
    if (open >= end || this.text[open] === ";") {
      // Stray text without a block.
      return open + 1;
    }
    this.sawRule = true;
    const close = this.findClose(open, end);
    const selectorText = collapseWhitespace(this.src.slice(start, open));

    const problem = validateSelectorList(selectorText, {
      checkSyntax: this.diagnostics.isStrict("invalid_selector_syntax"),
    });
    if (problem) {
      this.diagnostics.report(problem.type, problem.message, start);
      // A leading combinator is tolerated; every other problem drops the rule.
      if (problem.type === "invalid_selector_syntax" || selectorText === "") {
        return close + 1;
      }
    }

    const targets = splitSelectorList(selectorText).map(
      (selector): Target => ({ selector, nestingStyle: null, parentRuleId: null }),
    );
    this.parseStyleBlock(targets, open, close, media, depth + 1);
    return close + 1;
  }

  /**
   * Emit rules for every target from the block `[open, close]`. A block
   * without nested blocks is parsed once and its declarations shared;
   * otherwise the targets are pushed first and then filled while nested
   * rules are emitted after them.
   */
  private parseStyleBlock(
    targets: readonly Target[],
    open: number,
    close: number,
    media: string | null,
    depth: number,
  ): void {
    checkDepth(depth);
    const listId = targets.length > 1 ? this.nextSelectorListId++ : null;
    const hasNested = findTopLevel(this.text, open + 1, close, "{") < close;

    if (!hasNested) {
      const declarations = parseDeclarationRange(this.src, open + 1, close, this.diagnostics);
      for (const target of targets) {
        this.pushRule(target, [...declarations], listId, media);
      }
      return;
    }

    const parents = targets.map((target) => this.pushRule(target, [], listId, media));
    let pos = open + 1;
    while (pos < close) {
      pos = skipWhitespace(this.text, pos, close);
      if (pos >= close) {
        break;
      }
      if (this.text[pos] === ";") {
        pos++;
        continue;
      }
      if (this.text[pos] === "@") {
        pos = this.parseAtRule(pos, close, media, depth, parents);
        continue;
      }
      const stop = findTopLevel(this.text, pos, close, "{;");
      if (stop >= close || this.text[stop] === ";") {
        const declarations = parseDeclarationRange(this.src, pos, stop, this.diagnostics);
        for (const parent of parents) {
          parent.declarations.push(...declarations);
        }
        pos = stop + 1;
        continue;
      }
      pos = this.parseNestedRule(parents, pos, stop, close, media, depth);
    }
  }

  private parseNestedRule(
    parents: readonly Rule[],
    start: number,
    open: number,
    end: number,
    media: string | null,
    depth: number,
  ): number {
    const close = this.findClose(open, end);
    const selectorText = collapseWhitespace(this.src.slice(start, open));
    const problem = validateSelectorList(selectorText, {
      relative: true,
      checkSyntax: this.diagnostics.isStrict("invalid_selector_syntax"),
    });
    if (problem) {
      this.diagnostics.report(problem.type, problem.message, start);
      return close + 1;
    }
    const nested = splitSelectorList(selectorText);
    const targets = parents.flatMap((parent) =>
      nested.map((selector): Target => ({
        ...resolveNestedSelector(parent.selector, selector),
        parentRuleId: parent.id,
      })),
    );
    this.parseStyleBlock(targets, open, close, media, depth + 1);
    return close + 1;
  }

  // ──────────────────────────────────────────────────────────────────────────
  // At-rules
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * Parse the at-rule at `start`; returns the offset after it. `parents` is
   * set when the at-rule sits inside a style block, in which case
   * conditional bodies are style blocks of those parents.
   */
  private parseAtRule(
    start: number,
    end: number,
    media: string | null,
    depth: number,
    parents: readonly Rule[] | null,
  ): number {
    const nameMatch = /^@(-?[A-Za-z][\w-]*)/.exec(this.text.slice(start, Math.min(end, start + 256)));
    if (!nameMatch) {
      const stop = findTopLevel(this.text, start + 1, end, "{;");
      return stop < end && this.text[stop] === "{" ? this.findClose(stop, end) + 1 : stop + 1;
    }
    const name = (nameMatch[1] ?? "").toLowerCase();
    const preludeStart = start + nameMatch[0].length;
    const stop = findTopLevel(this.text, preludeStart, end, "{;");
    const prelude = collapseWhitespace(this.src.slice(preludeStart, stop));

    if (stop >= end || this.text[stop] === ";") {
      this.parseAtStatement(name, prelude, start);
      return stop + 1;
    }

    const close = this.findClose(stop, end);
    if (name !== "charset" && name !== "import") {
      this.sawRule = true;
    }

    if (CONDITIONAL_AT_RULES.has(name)) {
      this.parseConditionalBlock(name, prelude, start, stop, close, media, depth, parents);
    } else {
      this.pushAtRule(name, prelude, stop, close, media, depth);
    }
    return close + 1;
  }

  private parseAtStatement(name: string, prelude: string, start: number): void {
    if (name === "charset") {
      if (this.charset === null && prelude !== "") {
        this.charset = prelude.replace(/^["']|["']$/g, "");
      }
      return;
    }
    if (name === "import") {
      if (this.sawRule) {
        this.diagnostics.warn("Dropped @import that follows other rules", start, { prelude });
        return;
      }
      const statement = parseImportPrelude(prelude);
      if (statement) {
        this.imports.push(statement);
        this.diagnostics.warn("Dropped @import because imports are disabled", start, {
          url: statement.url,
        });
      }
      return;
    }
    // `@layer a, b;`, `@namespace` and unknown statements carry no rules.
    this.sawRule = true;
  }

  private parseConditionalBlock(
    name: string,
    prelude: string,
    start: number,
    open: number,
    close: number,
    media: string | null,
    depth: number,
    parents: readonly Rule[] | null,
  ): void {
    if (prelude === "" && (name === "media" || name === "supports" || name === "container")) {
      const missing = name === "media" ? "media query" : "condition";
      this.diagnostics.report("malformed_at_rule", `Malformed @${name}: missing ${missing}`, start);
      return;
    }
    const innerMedia = name === "media" ? combineMediaQueries(media, prelude) : media;
    if (parents) {
      const targets = parents.map(
        (parent): Target => ({ selector: parent.selector, nestingStyle: null, parentRuleId: parent.id }),
      );
      this.parseStyleBlock(targets, open, close, innerMedia, depth + 1);
    } else {
      this.parseStatements(open + 1, close, innerMedia, depth + 1);
    }
  }

  private pushAtRule(
    name: string,
    prelude: string,
    open: number,
    close: number,
    media: string | null,
    depth: number,
  ): void {
    checkDepth(depth + 1);
    const isKeyframes = KEYFRAMES.test(name);
    const hasBlocks = findTopLevel(this.text, open + 1, close, "{") < close;
    const atRule: AtRule = {
      kind: "atRule",
      id: this.firstId + this.entries.length,
      selector: prelude === "" ? `@${name}` : `@${name} ${prelude}`,
      atRuleType: isKeyframes ? "keyframes" : (AT_RULE_TYPES[name] ?? "other"),
      content:
        isKeyframes || hasBlocks
          ? { kind: "rules", ...this.parseNestedBlocks(open, close, !isKeyframes) }
          : {
              kind: "declarations",
              declarations: parseDeclarationRange(this.src, open + 1, close, this.diagnostics),
            },
      mediaQueryId: media === null ? null : this.mediaQueries.intern(media),
    };
    this.entries.push(atRule);
  }

  /**
   * Bodies made of blocks: `from { ... } 50% { ... }`, or `@page` with
   * margin boxes. Keyframe selectors carry no specificity. Descriptors
   * between the blocks are kept unless `keepDescriptors` is false.
   */
  private parseNestedBlocks(
    open: number,
    close: number,
    keepDescriptors: boolean,
  ): { declarations: Declaration[]; rules: Rule[] } {
    const declarations: Declaration[] = [];
    const rules: Rule[] = [];
    let pos = open + 1;
    while (pos < close) {
      pos = skipWhitespace(this.text, pos, close);
      if (pos >= close) {
        break;
      }
      const stop = findTopLevel(this.text, pos, close, "{;");
      if (stop >= close || this.text[stop] === ";") {
        if (keepDescriptors && this.text[pos] !== "@") {
          declarations.push(...parseDeclarationRange(this.src, pos, stop, this.diagnostics));
        }
        pos = stop + 1;
        continue;
      }
      const blockClose = this.findClose(stop, close);
      rules.push({
        kind: "rule",
        id: rules.length,
        selector: collapseWhitespace(this.src.slice(pos, stop)),
        declarations: parseDeclarationRange(this.src, stop + 1, blockClose, this.diagnostics),
        specificity: 0,
        parentRuleId: null,
        nestingStyle: null,
        selectorListId: null,
        mediaQueryId: null,
      });
      pos = blockClose + 1;
    }
    return { declarations, rules };
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Helpers
  // ──────────────────────────────────────────────────────────────────────────

  private pushRule(
    target: Target,
    declarations: Declaration[],
    selectorListId: number | null,
    media: string | null,
  ): Rule {
    const rule: Rule = {
      kind: "rule",
      id: this.firstId + this.entries.length,
      selector: target.selector,
      declarations,
      specificity: calculateSpecificity(target.selector),
      parentRuleId: target.parentRuleId,
      nestingStyle: target.nestingStyle,
      selectorListId,
      mediaQueryId: media === null ? null : this.mediaQueries.intern(media),
    };
    this.entries.push(rule);
    return rule;
  }

  /**
   * Offset of the `}` closing the block opened at `open`, or `end` when the
   * block runs off the end of its container.
   */
  private findClose(open: number, end: number): number {
    const close = findMatchingBrace(this.text, open, end);
    if (close !== -1) {
      return close;
    }
    if (!this.fixBraces) {
      this.diagnostics.report("unclosed_block", "Unclosed block: missing closing brace", open);
    }
    return end;
  }
}

function checkDepth(depth: number): void {
  if (depth > MAX_NESTING_DEPTH) {
    throw new DepthError(`CSS nesting too deep: exceeded maximum depth of ${MAX_NESTING_DEPTH}`);
  }
}

/**
 * Parse stylesheet text into flat entries.
 *
 * @example
 * parseCss("h1, h2 { color: red }").entries.map((e) => e.selector) // ["h1", "h2"]
 */
export function parseCss(css: string, options: ParseCssOptions = {}): ParseResult {
  const diagnostics = new Diagnostics(
    css,
    options.raise ?? resolveRaiseOptions(options.raiseParseErrors),
  );
  const mediaQueries = options.mediaQueries ?? new MediaQueryTable();
  const parser = new CssParser(
    css,
    diagnostics,
    mediaQueries,
    options.fixBraces ?? false,
    options.firstId ?? 0,
    options.firstSelectorListId ?? 0,
  );
  parser.parse(options.media ?? null);
  return {
    entries: parser.entries,
    mediaQueries,
    charset: parser.charset,
    imports: parser.imports,
    warnings: diagnostics.warnings,
    nextSelectorListId: parser.nextSelectorListId,
  };
}

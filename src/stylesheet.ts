/**
 * The stylesheet document.
 *
 * Entries live in one ordered array and `entries[i].id === i` holds after
 * every mutation: ids are recomputed, parent links remapped and unused media
 * queries compacted whenever the array changes. Derived views (the media
 * index and the selector list) are rebuilt or dropped before a mutating
 * method returns.
 */
import { readFileSync } from "node:fs";
import path from "node:path";
import { flattenRules, type CascadeOptions } from "./cascade.js";
import { convertColors, type ColorConversion, type ColorConverter } from "./color.js";
import { parseCss, type ParseResult } from "./css-parser.js";
import { Declarations } from "./css/declaration-list.js";
import { parseDeclarations } from "./css/declarations.js";
import { ImportResolver } from "./import-resolver.js";
import {
  cloneEntry,
  createDeclaration,
  declarationsOf,
  isRule,
  type Declaration,
  type ImportStatement,
  type MediaQuery,
  type Rule,
  type StylesheetEntry,
} from "./internal/css-ir.js";
import { rulesEqual } from "./internal/equality.js";
import { ParseError } from "./internal/errors.js";
import { Logger, type CollectedWarning, type WarningLog } from "./internal/logger.js";
import { ALL_MEDIA, MediaQueryTable, mediaIndexKeys, normalizeMediaQuery } from "./internal/media.js";
import { normalizeOptions, type ParseErrorToggles, type ResolvedOptions, type StylesheetOptions } from "./internal/options.js";
import { assertValidOptions, describeValue } from "./internal/public-api-validation.js";
import { collapseWhitespace } from "./internal/scan.js";
import { calculateSpecificity, splitSelectorList, validateSelectorList } from "./internal/selectors.js";
import { absolutizeUrls } from "./internal/uri-rewriter.js";
import { render, renderFormatted } from "./serializer.js";
import { matchesSpecificity, RuleScope, type SpecificityFilter } from "./stylesheet-scope.js";

export type AddBlockOptions = {
  /** Media query every rule of the block is nested in. */
  media?: string;
  fixBraces?: boolean;
  baseUri?: string;
  baseDir?: string;
  absolutePaths?: boolean;
  raiseParseErrors?: boolean | ParseErrorToggles;
  source?: string;
};

export type DeclarationsLike = string | readonly Declaration[] | Record<string, string> | Declarations;

export type AddRuleInput = {
  selector: string;
  declarations: DeclarationsLike;
  media?: string;
};

export type MediaFilter = string | readonly string[];

export type EachSelectorOptions = {
  media?: MediaFilter;
  specificity?: SpecificityFilter;
  property?: string;
  propertyValue?: string;
};

/** Read-only projection of a rule. */
export type SelectorEntry = {
  selector: string;
  /** `prop: value; prop2: value2 !important;` */
  declarations: string;
  specificity: number;
  mediaTypes: string[];
};

export type RenderFilter = { media?: MediaFilter };

function toMediaKeys(media: MediaFilter): string[] {
  const list = typeof media === "string" ? [media] : [...media];
  return list.map((key) => normalizeMediaQuery(key).toLowerCase());
}

function toDeclarationList(input: DeclarationsLike): Declaration[] {
  if (input instanceof Declarations) {
    return input.toArray();
  }
  return new Declarations(input).toArray();
}

function isRuleList(target: Rule | readonly Rule[]): target is readonly Rule[] {
  return Array.isArray(target);
}

export class Stylesheet {
  private entries: StylesheetEntry[] = [];
  private mediaTable = new MediaQueryTable();
  private index = new Map<string, number[]>();
  private selectorCache: string[] | null = null;
  private nextSelectorListId = 0;
  private charsetValue: string | null = null;
  private readonly collected: CollectedWarning[] = [];
  private readonly unresolved: ImportStatement[] = [];
  private readonly options: ResolvedOptions;

  constructor(private readonly rawOptions: StylesheetOptions = {}) {
    assertValidOptions(rawOptions, "Stylesheet");
    this.options = normalizeOptions(rawOptions);
  }

  /**
   * Parse `css` into a new stylesheet.
   *
   * @example Stylesheet.parse("h1, h2 { color: red }").size // 2
   */
  static parse(css: string, options: StylesheetOptions = {}): Stylesheet {
    return new Stylesheet(options).addBlock(css);
  }

  /**
   * Read and parse a file. Relative imports resolve against its directory
   * unless `baseDir` says otherwise.
   */
  static loadFile(filePath: string, options: StylesheetOptions = {}): Stylesheet {
    const css = readFileSync(filePath, "utf8");
    return Stylesheet.parse(css, {
      ...options,
      baseDir: options.baseDir ?? path.dirname(path.resolve(filePath)),
      source: options.source ?? filePath,
    });
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Reads
  // ──────────────────────────────────────────────────────────────────────────

  get rules(): readonly StylesheetEntry[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  get charset(): string | null {
    return this.charsetValue;
  }

  get mediaQueries(): readonly MediaQuery[] {
    return this.mediaTable.list;
  }

  /** Media key to ids of the entries under it. Base rules are not listed. */
  get mediaIndex(): ReadonlyMap<string, readonly number[]> {
    return this.index;
  }

  /** `all` followed by every media type in use. */
  get mediaTypes(): string[] {
    const types = [ALL_MEDIA];
    for (const query of this.mediaTable.list) {
      for (const type of query.types) {
        if (!types.includes(type)) {
          types.push(type);
        }
      }
    }
    return types;
  }

  /** Distinct rule selectors in order of first appearance. */
  get selectors(): readonly string[] {
    this.selectorCache ??= [
      ...new Set(this.entries.filter((entry) => entry.kind === "rule").map((rule) => rule.selector)),
    ];
    return this.selectorCache;
  }

  /** Problems tolerated while parsing, with the source they came from. */
  get warnings(): readonly CollectedWarning[] {
    return this.collected;
  }

  /** `@import` statements dropped because imports are disabled. */
  get imports(): readonly ImportStatement[] {
    return this.unresolved;
  }

  /** Media types an entry applies to; `["all"]` outside any media query. */
  mediaFor(entry: StylesheetEntry): string[] {
    const query = this.mediaTable.get(entry.mediaQueryId);
    if (!query) {
      return [ALL_MEDIA];
    }
    return query.types.length > 0 ? [...query.types] : [query.type];
  }

  mediaTextFor(entry: StylesheetEntry): string | null {
    return this.mediaTable.textOf(entry.mediaQueryId);
  }

  /** Entries under any of the given media keys, in document order. */
  entriesForMedia(media: MediaFilter): StylesheetEntry[] {
    const keys = toMediaKeys(media);
    if (keys.includes(ALL_MEDIA)) {
      return [...this.entries];
    }
    const ids = new Set(keys.flatMap((key) => this.index.get(key) ?? []));
    return this.entries.filter((entry) => ids.has(entry.id));
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Queries
  // ──────────────────────────────────────────────────────────────────────────

  select(): RuleScope {
    return new RuleScope(this);
  }

  eachSelector(options: EachSelectorOptions = {}): SelectorEntry[] {
    const property = options.property?.trim().toLowerCase();
    const out: SelectorEntry[] = [];
    for (const entry of this.entriesForMedia(options.media ?? ALL_MEDIA)) {
      if (entry.kind !== "rule") {
        continue;
      }
      if (options.specificity !== undefined && !matchesSpecificity(entry.specificity, options.specificity)) {
        continue;
      }
      if (
        property !== undefined &&
        !entry.declarations.some(
          (d) =>
            d.property === property &&
            (options.propertyValue === undefined || d.value === options.propertyValue),
        )
      ) {
        continue;
      }
      out.push({
        selector: entry.selector,
        declarations: new Declarations(entry.declarations).toString(),
        specificity: entry.specificity,
        mediaTypes: this.mediaFor(entry),
      });
    }
    return out;
  }

  /** Declaration strings of every rule with exactly this selector. */
  findBySelector(selector: string, media: MediaFilter = ALL_MEDIA): string[] {
    const wanted = collapseWhitespace(selector);
    return this.entriesForMedia(media)
      .filter((entry) => entry.selector === wanted)
      .map((entry) => new Declarations(declarationsOf(entry)).toString());
  }

  /**
   * Custom properties (`--name`) keyed by media text, `all` for base
   * rules. A later declaration wins unless an earlier one is `!important`.
   */
  customProperties(media?: MediaFilter): Record<string, Record<string, string>> {
    const result: Record<string, Record<string, string>> = {};
    const important = new Set<string>();
    const entries = media === undefined ? this.entries : this.entriesForMedia(media);
    for (const entry of entries) {
      const key = this.mediaTextFor(entry) ?? ALL_MEDIA;
      for (const declaration of declarationsOf(entry)) {
        if (!declaration.property.startsWith("--")) {
          continue;
        }
        const slot = `${key}\u0000${declaration.property}`;
        if (important.has(slot) && !declaration.important) {
          continue;
        }
        if (declaration.important) {
          important.add(slot);
        }
        result[key] = { ...result[key], [declaration.property]: declaration.value };
      }
    }
    return result;
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Mutations
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * Parse `css` and append its rules. `@import`s are resolved first when
   * imports are enabled.
   */
  addBlock(css: string, options: AddBlockOptions = {}): this {
    const source = options.source ?? this.options.source;
    let result: ParseResult;
    try {
      result = this.parseBlock(css, options);
    } catch (error) {
      this.reportFailure(error, source);
      throw error;
    }
    const warnings: WarningLog[] = [...result.warnings];

    const baseUri = options.baseUri ?? this.options.baseUri;
    if ((options.absolutePaths ?? this.options.absolutePaths) && baseUri) {
      this.absolutize(result.entries, baseUri, warnings);
    }

    this.mediaTable = result.mediaQueries;
    this.charsetValue ??= result.charset;
    this.unresolved.push(...result.imports);
    this.nextSelectorListId = result.nextSelectorListId;
    this.entries.push(...result.entries);
    this.recordWarnings(warnings, source);
    this.reindex();
    return this;
  }

  /**
   * Append one rule per selector in `input.selector`.
   *
   * @example sheet.addRule({ selector: ".a, .b", declarations: "color: red", media: "print" })
   */
  addRule(input: AddRuleInput): Rule[] {
    const selectorText = typeof input.selector === "string" ? collapseWhitespace(input.selector) : "";
    const problem = validateSelectorList(selectorText);
    if (problem) {
      throw new TypeError(
        [
          `Stylesheet.addRule: ${problem.message}.`,
          `Received: selector=${describeValue(input.selector)}`,
        ].join("\n"),
      );
    }
    const declarations =
      typeof input.declarations === "string"
        ? parseDeclarations(input.declarations, { raiseParseErrors: this.rawOptions.raiseParseErrors })
        : toDeclarationList(input.declarations);
    const selectors = splitSelectorList(selectorText);
    const listId = selectors.length > 1 ? this.nextSelectorListId++ : null;
    const mediaQueryId = input.media ? this.mediaTable.intern(input.media) : null;

    const added = selectors.map(
      (selector, i): Rule => ({
        kind: "rule",
        id: this.entries.length + i,
        selector,
        declarations: [...declarations],
        specificity: calculateSpecificity(selector),
        parentRuleId: null,
        nestingStyle: null,
        selectorListId: listId,
        mediaQueryId,
      }),
    );
    this.entries.push(...added);
    this.reindex();
    return added;
  }

  /**
   * Remove rules structurally equal to `target` (shorthand aware). A string
   * target is parsed first. Returns the number of entries removed.
   */
  removeRules(
    target: string | Rule | readonly Rule[],
    options: { mediaTypes?: MediaFilter } = {},
  ): number {
    const targets: ReadonlyArray<Pick<Rule, "selector" | "declarations">> =
      typeof target === "string"
        ? parseCss(target).entries.filter(isRule)
        : isRuleList(target)
          ? target
          : [target];
    const inScope = this.scopeIds(options.mediaTypes);
    return this.removeWhere(
      (entry) =>
        entry.kind === "rule" &&
        inScope(entry) &&
        targets.some((candidate) => rulesEqual(entry, candidate)),
    );
  }

  /** Remove entries by selector and/or media. Returns the number removed. */
  removeRulesBy(options: { selector?: string; mediaTypes?: MediaFilter }): number {
    const selector = options.selector === undefined ? undefined : collapseWhitespace(options.selector);
    const inScope = this.scopeIds(options.mediaTypes);
    return this.removeWhere(
      (entry) => inScope(entry) && (selector === undefined || entry.selector === selector),
    );
  }

  /**
   * Merge rules sharing a selector and media query, in place.
   * Nesting information is dropped.
   */
  flatten(options: CascadeOptions = {}): this {
    this.replaceEntries(flattenRules(this.entries, options));
    return this;
  }

  merge(options: CascadeOptions = {}): this {
    return this.flatten(options);
  }

  /** Flattened copy; this stylesheet is left as it is. */
  toFlattened(options: CascadeOptions = {}): Stylesheet {
    const copy = this.copy();
    copy.flatten(options);
    return copy;
  }

  /** Rewrite color notations in place. Returns the number of values changed. */
  convertColors(converter: ColorConverter, conversion: ColorConversion): number {
    const changed = convertColors(this.entries, converter, conversion);
    this.selectorCache = null;
    return changed;
  }

  clear(): this {
    this.entries = [];
    this.mediaTable = new MediaQueryTable();
    this.charsetValue = null;
    this.nextSelectorListId = 0;
    this.unresolved.length = 0;
    this.reindex();
    return this;
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Output
  // ──────────────────────────────────────────────────────────────────────────

  toString(filter: RenderFilter = {}): string {
    return render(this.renderable(filter), {
      charset: this.charsetValue,
      mediaQueries: this.mediaTable,
    });
  }

  toFormattedString(filter: RenderFilter = {}): string {
    return renderFormatted(this.renderable(filter), {
      charset: this.charsetValue,
      mediaQueries: this.mediaTable,
    });
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Bookkeeping
  // ──────────────────────────────────────────────────────────────────────────

  /** Resolve imports and parse; the document is untouched until this returns. */
  private parseBlock(css: string, options: AddBlockOptions): ParseResult {
    const imports = this.options.imports;
    const text = imports
      ? new ImportResolver(imports).resolve(css, {
          baseUri: options.baseUri ?? imports.baseUri,
          baseDir: options.baseDir ?? imports.baseDir,
        })
      : css;
    return parseCss(text, {
      raise: options.raiseParseErrors === undefined ? this.options.raise : undefined,
      raiseParseErrors: options.raiseParseErrors,
      fixBraces: options.fixBraces ?? this.options.fixBraces,
      media: options.media ?? null,
      mediaQueries: this.mediaTable.clone(),
      firstId: this.entries.length,
      firstSelectorListId: this.nextSelectorListId,
    });
  }

  private reportFailure(error: unknown, source: string): void {
    if (!this.options.logWarnings || !(error instanceof Error)) {
      return;
    }
    const loc =
      error instanceof ParseError && error.line !== null && error.column !== null
        ? { line: error.line, column: error.column }
        : undefined;
    Logger.logError(error.message, source, loc);
  }

  private renderable(filter: RenderFilter): readonly StylesheetEntry[] {
    return filter.media === undefined ? this.entries : this.entriesForMedia(filter.media);
  }

  private copy(): Stylesheet {
    const copy = new Stylesheet(this.rawOptions);
    copy.entries = this.entries.map((entry) => cloneEntry(entry));
    copy.mediaTable = this.mediaTable.clone();
    copy.charsetValue = this.charsetValue;
    copy.nextSelectorListId = this.nextSelectorListId;
    copy.reindex();
    return copy;
  }

  private scopeIds(media: MediaFilter | undefined): (entry: StylesheetEntry) => boolean {
    if (media === undefined) {
      return () => true;
    }
    const ids = new Set(this.entriesForMedia(media).map((entry) => entry.id));
    return (entry) => ids.has(entry.id);
  }

  private removeWhere(predicate: (entry: StylesheetEntry) => boolean): number {
    const kept = this.entries.filter((entry) => !predicate(entry));
    const removed = this.entries.length - kept.length;
    if (removed > 0) {
      this.replaceEntries(kept);
    }
    return removed;
  }

  /**
   * Install `next` (entries still carrying their old ids) as the document:
   * parent links are remapped or cleared, unused media queries dropped and
   * ids renumbered.
   */
  private replaceEntries(next: StylesheetEntry[]): void {
    const newIds = new Map<number, number>();
    next.forEach((entry, index) => newIds.set(entry.id, index));

    const usedMedia = new Map<number, number>();
    const queries: MediaQuery[] = [];
    for (const entry of next) {
      const query = this.mediaTable.get(entry.mediaQueryId);
      if (query && !usedMedia.has(query.id)) {
        usedMedia.set(query.id, queries.length);
        queries.push(query);
      }
    }

    this.entries = next.map((entry, index) => {
      const mediaQueryId =
        entry.mediaQueryId === null ? null : (usedMedia.get(entry.mediaQueryId) ?? null);
      if (entry.kind === "atRule") {
        return { ...entry, id: index, mediaQueryId };
      }
      const parent = entry.parentRuleId === null ? undefined : newIds.get(entry.parentRuleId);
      return {
        ...entry,
        id: index,
        mediaQueryId,
        parentRuleId: parent !== undefined && parent < index ? parent : null,
      };
    });
    this.mediaTable = new MediaQueryTable(queries);
    this.reindex();
  }

  private reindex(): void {
    const index = new Map<string, number[]>();
    for (const entry of this.entries) {
      const query = this.mediaTable.get(entry.mediaQueryId);
      if (!query) {
        continue;
      }
      for (const key of mediaIndexKeys(query)) {
        const ids = index.get(key.toLowerCase());
        if (ids) {
          ids.push(entry.id);
        } else {
          index.set(key.toLowerCase(), [entry.id]);
        }
      }
    }
    this.index = index;
    this.selectorCache = null;
  }

  private absolutize(entries: StylesheetEntry[], baseUri: string, warnings: WarningLog[]): void {
    const rewrite = (declarations: readonly Declaration[]) =>
      declarations.map((declaration) => {
        const value = absolutizeUrls(declaration.value, baseUri, ({ url }) => {
          warnings.push({
            severity: "warning",
            type: "Could not resolve url() against the base URI",
            loc: null,
            context: { url, baseUri },
          });
        });
        return value === declaration.value
          ? declaration
          : createDeclaration(declaration.property, value, declaration.important);
      });
    for (const entry of entries) {
      if (entry.kind === "rule") {
        entry.declarations = rewrite(entry.declarations);
        continue;
      }
      entry.content.declarations = rewrite(entry.content.declarations);
      if (entry.content.kind === "rules") {
        for (const rule of entry.content.rules) {
          rule.declarations = rewrite(rule.declarations);
        }
      }
    }
  }

  private recordWarnings(warnings: readonly WarningLog[], source: string): void {
    if (warnings.length === 0) {
      return;
    }
    this.collected.push(...warnings.map((warning) => ({ ...warning, source })));
    if (this.options.logWarnings) {
      Logger.logWarnings(warnings, source);
    }
  }
}

/** Shorthand for `Stylesheet.parse`. */
export function parseStylesheet(css: string, options: StylesheetOptions = {}): Stylesheet {
  return Stylesheet.parse(css, options);
}

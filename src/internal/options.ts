import type { ParseErrorType } from "./errors.js";

/** Where the importing stylesheet lives. */
export type ImportContext = {
  baseUri: string | null;
  baseDir: string | null;
};

/**
 * Fetches the text of an `@import` target. `url` is already resolved against
 * the importing stylesheet. Parsing is synchronous, so fetchers are too.
 */
export type ImportFetcher = (url: string, context: ImportContext) => string;

export type ImportOptions = {
  /** Maximum depth of nested imports (default 5). */
  maxDepth?: number;
  /** URL schemes that may be imported (default `["https"]`). */
  allowedSchemes?: string[];
  /** File extensions that may be imported (default `["css"]`). */
  extensions?: string[];
  baseUri?: string;
  baseDir?: string;
  fetcher?: ImportFetcher;
};

/**
 * Per-kind strict mode switches. A kind left out stays lenient.
 */
export type ParseErrorToggles = {
  emptyValues?: boolean;
  malformedDeclarations?: boolean;
  invalidSelectors?: boolean;
  invalidSelectorSyntax?: boolean;
  malformedAtRules?: boolean;
  unclosedBlocks?: boolean;
};

export type StylesheetOptions = {
  /** URI of the stylesheet, used to absolutize `url()` values and imports. */
  baseUri?: string;
  /** Directory relative imports are read from. */
  baseDir?: string;
  /** Rewrite relative `url()` values against `baseUri`. */
  absolutePaths?: boolean;
  /** Resolve `@import` statements. Dropped when false (the default). */
  import?: boolean | ImportOptions;
  /** Raise the first parse problem instead of dropping the offending input. */
  raiseParseErrors?: boolean | ParseErrorToggles;
  /** Close blocks left open at end of input. */
  fixBraces?: boolean;
  /** Echo tolerated parse problems through `Logger`. */
  logWarnings?: boolean;
  /** Name used for the stylesheet in warnings, usually a file path. */
  source?: string;
};

export type ResolvedImportOptions = {
  maxDepth: number;
  allowedSchemes: string[];
  extensions: string[];
  baseUri: string | null;
  baseDir: string | null;
  fetcher: ImportFetcher | null;
};

export type ResolvedOptions = {
  baseUri: string | null;
  baseDir: string | null;
  absolutePaths: boolean;
  imports: ResolvedImportOptions | null;
  raise: Record<ParseErrorType, boolean>;
  fixBraces: boolean;
  logWarnings: boolean;
  source: string;
};

export const DEFAULT_IMPORT_MAX_DEPTH = 5;

const TOGGLES: ReadonlyArray<readonly [keyof ParseErrorToggles, ParseErrorType]> = [
  ["emptyValues", "empty_value"],
  ["malformedDeclarations", "malformed_declaration"],
  ["invalidSelectors", "invalid_selector"],
  ["invalidSelectorSyntax", "invalid_selector_syntax"],
  ["malformedAtRules", "malformed_at_rule"],
  ["unclosedBlocks", "unclosed_block"],
];

export const PARSE_ERROR_TOGGLE_KEYS: readonly string[] = TOGGLES.map(([key]) => key);

export function resolveRaiseOptions(
  option: boolean | ParseErrorToggles | undefined,
): Record<ParseErrorType, boolean> {
  const all = option === true;
  const raise: Record<ParseErrorType, boolean> = {
    empty_value: all,
    malformed_declaration: all,
    invalid_selector: all,
    invalid_selector_syntax: all,
    malformed_at_rule: all,
    unclosed_block: all,
  };
  if (option && typeof option === "object") {
    for (const [key, type] of TOGGLES) {
      if (option[key] === true) {
        raise[type] = true;
      }
    }
  }
  return raise;
}

export function resolveImportOptions(
  option: boolean | ImportOptions | undefined,
  fallback: { baseUri: string | null; baseDir: string | null },
): ResolvedImportOptions | null {
  if (!option) {
    return null;
  }
  const custom: ImportOptions = option === true ? {} : option;
  return {
    maxDepth: custom.maxDepth ?? DEFAULT_IMPORT_MAX_DEPTH,
    allowedSchemes: (custom.allowedSchemes ?? ["https"]).map((s) => s.toLowerCase()),
    extensions: (custom.extensions ?? ["css"]).map((e) => e.replace(/^\./, "").toLowerCase()),
    baseUri: custom.baseUri ?? fallback.baseUri,
    baseDir: custom.baseDir ?? fallback.baseDir,
    fetcher: custom.fetcher ?? null,
  };
}

export function normalizeOptions(options: StylesheetOptions = {}): ResolvedOptions {
  const baseUri = options.baseUri ?? null;
  const baseDir = options.baseDir ?? null;
  return {
    baseUri,
    baseDir,
    absolutePaths: options.absolutePaths ?? false,
    imports: resolveImportOptions(options.import, { baseUri, baseDir }),
    raise: resolveRaiseOptions(options.raiseParseErrors),
    fixBraces: options.fixBraces ?? false,
    logWarnings: options.logWarnings ?? false,
    source: options.source ?? "<inline>",
  };
}

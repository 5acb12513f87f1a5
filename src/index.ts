export { Stylesheet, parseStylesheet } from "./stylesheet.js";
export type {
  AddBlockOptions,
  AddRuleInput,
  DeclarationsLike,
  EachSelectorOptions,
  MediaFilter,
  RenderFilter,
  SelectorEntry,
} from "./stylesheet.js";
export { RuleScope } from "./stylesheet-scope.js";
export type { SpecificityFilter } from "./stylesheet-scope.js";
export { parseCss, MAX_NESTING_DEPTH } from "./css-parser.js";
export type { ParseCssOptions, ParseResult } from "./css-parser.js";
export { parseDeclarations, splitDeclarations, splitImportant } from "./css/declarations.js";
export { Declarations } from "./css/declaration-list.js";
export {
  collapseShorthands,
  expandDeclarations,
  expandShorthand,
  getLonghandProperties,
  isShorthandProperty,
} from "./css/shorthand.js";
export { cascade, flattenRules, resolveCascade } from "./cascade.js";
export type { CascadeOptions } from "./cascade.js";
export { render, renderFormatted } from "./serializer.js";
export type { RenderOptions } from "./serializer.js";
export { calculateSpecificity, validateSelectorList } from "./internal/selectors.js";
export { ruleHash, rulesEqual } from "./internal/equality.js";
export {
  DepthError,
  ImportError,
  ParseError,
  ShorthandInputError,
  SizeError,
} from "./internal/errors.js";
export type { ParseErrorType } from "./internal/errors.js";
export { Logger, LoggerReport } from "./internal/logger.js";
export type { CollectedWarning, WarningLog, WarningType } from "./internal/logger.js";
export { ImportResolver, createFileImportFetcher, resolveImports } from "./import-resolver.js";
export type { ImportContext, ImportFetcher, ImportOptions } from "./import-resolver.js";
export { absolutizeUrls, resolveUrl } from "./internal/uri-rewriter.js";
export { convertColors, hexRgbConverter } from "./color.js";
export type { ColorConversion, ColorConverter, ColorNotation } from "./color.js";
export { isAtRule, isRule } from "./internal/css-ir.js";
export type {
  AtRule,
  AtRuleType,
  Declaration,
  ImportStatement,
  MediaQuery,
  NestingStyle,
  Rule,
  StylesheetEntry,
} from "./internal/css-ir.js";
export type { ParseErrorToggles, StylesheetOptions } from "./internal/options.js";

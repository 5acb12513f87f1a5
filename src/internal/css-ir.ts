/**
 * In-memory model of a parsed stylesheet.
 */

export type Declaration = Readonly<{
  property: string;
  value: string;
  important: boolean;
}>;

/**
 * How a nested selector was written: with `&` (`explicit`) or as a bare
 * descendant (`implicit`). Null for top-level rules and nested `@media` rules.
 */
export type NestingStyle = "explicit" | "implicit";

/**
 * Identity fields are readonly: IDs, selectors and media links are only
 * changed by `Stylesheet` operations, which rebuild entries.
 */
export type Rule = {
  readonly kind: "rule";
  readonly id: number;
  readonly selector: string;
  declarations: Declaration[];
  readonly specificity: number;
  readonly parentRuleId: number | null;
  readonly nestingStyle: NestingStyle | null;
  /** Shared by the rules produced from one comma-separated selector list. */
  readonly selectorListId: number | null;
  readonly mediaQueryId: number | null;
};

export type AtRuleType =
  | "font_face"
  | "keyframes"
  | "page"
  | "property"
  | "counter_style"
  | "supports"
  | "layer"
  | "container"
  | "scope"
  | "other";

export type AtRuleContent =
  | { kind: "declarations"; declarations: Declaration[] }
  /** Nested blocks, plus any descriptors written beside them (`@page` margin boxes). */
  | { kind: "rules"; declarations: Declaration[]; rules: Rule[] };

export type AtRule = {
  readonly kind: "atRule";
  readonly id: number;
  /** Header text, e.g. `@keyframes slide` or `@font-face`. */
  readonly selector: string;
  readonly atRuleType: AtRuleType;
  content: AtRuleContent;
  readonly mediaQueryId: number | null;
};

export type StylesheetEntry = Rule | AtRule;

export type MediaQuery = {
  id: number;
  /** Primary media type; `all` when the query only has conditions. */
  type: string;
  /** Everything after the primary type, e.g. `(min-width: 500px)`. */
  conditions: string | null;
  /** Full query text as used for grouping and output. */
  text: string;
  /** Every media type the query names (`screen, print` names two). */
  types: string[];
};

export type ImportStatement = {
  url: string;
  media: string | null;
};

export function createDeclaration(property: string, value: string, important = false): Declaration {
  return Object.freeze({ property: property.trim().toLowerCase(), value, important });
}

export function isRule(entry: StylesheetEntry): entry is Rule {
  return entry.kind === "rule";
}

export function isAtRule(entry: StylesheetEntry): entry is AtRule {
  return entry.kind === "atRule";
}

export function cloneEntry<T extends StylesheetEntry>(entry: T): T;
export function cloneEntry(entry: StylesheetEntry): StylesheetEntry {
  if (entry.kind === "rule") {
    return { ...entry, declarations: [...entry.declarations] };
  }
  const content: AtRuleContent =
    entry.content.kind === "declarations"
      ? { kind: "declarations", declarations: [...entry.content.declarations] }
      : {
          kind: "rules",
          declarations: [...entry.content.declarations],
          rules: entry.content.rules.map((rule) => cloneEntry(rule)),
        };
  return { ...entry, content };
}

/** Declarations an entry carries directly, not those of its nested blocks. */
export function declarationsOf(entry: StylesheetEntry): readonly Declaration[] {
  return entry.kind === "rule" ? entry.declarations : entry.content.declarations;
}

export function formatDeclaration(declaration: Declaration): string {
  const suffix = declaration.important ? " !important" : "";
  return `${declaration.property}: ${declaration.value}${suffix}`;
}

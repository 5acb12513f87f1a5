import type { AtRuleType, StylesheetEntry } from "./internal/css-ir.js";
import { declarationsOf } from "./internal/css-ir.js";

export type SpecificityFilter = number | { min?: number; max?: number };

type ScopeFilters = {
  media?: readonly string[];
  specificity?: SpecificityFilter;
  selector?: string | RegExp;
  property?: { name: string; value: string | null; prefixMatch: boolean };
  baseOnly?: boolean;
  atRuleType?: AtRuleType;
  important?: { property: string | null };
};

/** What a scope needs from its stylesheet. */
export interface ScopeSource {
  readonly rules: readonly StylesheetEntry[];
  entriesForMedia(media: readonly string[]): readonly StylesheetEntry[];
}

export function matchesSpecificity(specificity: number, filter: SpecificityFilter): boolean {
  if (typeof filter === "number") {
    return specificity === filter;
  }
  return (
    (filter.min === undefined || specificity >= filter.min) &&
    (filter.max === undefined || specificity <= filter.max)
  );
}

/**
 * Chainable, lazy filter over a stylesheet's entries. Each `with*` call
 * returns a new scope; filters run when the scope is read.
 *
 * @example sheet.select().withMedia("print").withSpecificity({ min: 10 }).toArray()
 */
export class RuleScope implements Iterable<StylesheetEntry> {
  constructor(
    private readonly source: ScopeSource,
    private readonly filters: Readonly<ScopeFilters> = {},
  ) {}

  private with(filters: ScopeFilters): RuleScope {
    return new RuleScope(this.source, { ...this.filters, ...filters });
  }

  /** Replaces any earlier media filter. `all` matches every entry. */
  withMedia(media: string | readonly string[]): RuleScope {
    return this.with({ media: typeof media === "string" ? [media] : [...media] });
  }

  withSpecificity(specificity: SpecificityFilter): RuleScope {
    return this.with({ specificity });
  }

  /** Exact selector text, or a pattern tested against it. */
  withSelector(selector: string | RegExp): RuleScope {
    return this.with({ selector });
  }

  withProperty(name: string, value?: string, options: { prefixMatch?: boolean } = {}): RuleScope {
    return this.with({
      property: {
        name: name.trim().toLowerCase(),
        value: value ?? null,
        prefixMatch: options.prefixMatch ?? false,
      },
    });
  }

  withImportant(property?: string): RuleScope {
    return this.with({ important: { property: property?.trim().toLowerCase() ?? null } });
  }

  withAtRuleType(atRuleType: AtRuleType): RuleScope {
    return this.with({ atRuleType });
  }

  /** Rules outside any media query. */
  baseOnly(): RuleScope {
    return this.with({ baseOnly: true });
  }

  *[Symbol.iterator](): Iterator<StylesheetEntry> {
    for (const entry of this.candidates()) {
      if (this.matches(entry)) {
        yield entry;
      }
    }
  }

  toArray(): StylesheetEntry[] {
    return [...this];
  }

  first(): StylesheetEntry | undefined {
    for (const entry of this) {
      return entry;
    }
    return undefined;
  }

  get size(): number {
    return this.toArray().length;
  }

  get isEmpty(): boolean {
    return this.first() === undefined;
  }

  private candidates(): readonly StylesheetEntry[] {
    if (this.filters.baseOnly) {
      return this.source.rules.filter((entry) => entry.kind === "rule" && entry.mediaQueryId === null);
    }
    if (this.filters.media) {
      return this.source.entriesForMedia(this.filters.media);
    }
    return this.source.rules;
  }

  private matches(entry: StylesheetEntry): boolean {
    const { specificity, selector, property, atRuleType, important } = this.filters;
    if (specificity !== undefined) {
      if (entry.kind !== "rule" || !matchesSpecificity(entry.specificity, specificity)) {
        return false;
      }
    }
    if (selector !== undefined) {
      const matched = typeof selector === "string" ? entry.selector === selector : selector.test(entry.selector);
      if (!matched) {
        return false;
      }
    }
    if (atRuleType !== undefined && (entry.kind !== "atRule" || entry.atRuleType !== atRuleType)) {
      return false;
    }
    const declarations = declarationsOf(entry);
    if (property) {
      const found = declarations.some(
        (d) =>
          (property.prefixMatch ? d.property.startsWith(property.name) : d.property === property.name) &&
          (property.value === null || d.value === property.value),
      );
      if (!found) {
        return false;
      }
    }
    if (important) {
      const found = declarations.some(
        (d) => d.important && (important.property === null || d.property === important.property),
      );
      if (!found) {
        return false;
      }
    }
    return true;
  }
}

/**
 * Cascade resolution.
 *
 * Picks one winning declaration per property across rules: `!important`
 * beats normal, then higher specificity, then later source position.
 * Shorthands are expanded before comparison so a `background-color` can
 * override part of an earlier `background`.
 */
import { collapseShorthands, expandDeclaration } from "./css/shorthand.js";
import {
  cloneEntry,
  type Declaration,
  type Rule,
  type StylesheetEntry,
} from "./internal/css-ir.js";

type Candidate = {
  declaration: Declaration;
  specificity: number;
  order: number;
};

export type CascadeOptions = {
  /** Fold complete longhand sets back into shorthands (default true). */
  collapse?: boolean;
};

function beats(incoming: Candidate, current: Candidate): boolean {
  if (incoming.declaration.important !== current.declaration.important) {
    return incoming.declaration.important;
  }
  if (incoming.specificity !== current.specificity) {
    return incoming.specificity > current.specificity;
  }
  return incoming.order > current.order;
}

/**
 * Winning longhand per property. Rules are taken in the order given, which
 * is their source order; the map keeps first-seen property order.
 */
export function resolveCascade(
  rules: ReadonlyArray<Pick<Rule, "declarations" | "specificity">>,
): Map<string, Declaration> {
  const winners = new Map<string, Candidate>();
  let order = 0;
  for (const rule of rules) {
    for (const declaration of rule.declarations) {
      for (const longhand of expandDeclaration(declaration)) {
        const candidate = { declaration: longhand, specificity: rule.specificity, order: order++ };
        const current = winners.get(longhand.property);
        if (!current || beats(candidate, current)) {
          winners.set(longhand.property, candidate);
        }
      }
    }
  }
  return new Map([...winners].map(([property, candidate]) => [property, candidate.declaration]));
}

/**
 * Cascade one declaration block on its own: shorthands expanded, the last
 * declaration of a property wins unless an earlier one is `!important`.
 */
export function resolveDeclarations(declarations: readonly Declaration[]): Map<string, Declaration> {
  return resolveCascade([{ declarations: [...declarations], specificity: 0 }]);
}

/**
 * Merge any list of rules into a single declaration list.
 *
 * @example cascade(parse(".t{color:black} #t{color:red}").rules) // [color: red]
 */
export function cascade(
  rules: ReadonlyArray<Pick<Rule, "declarations" | "specificity">>,
  options: CascadeOptions = {},
): Declaration[] {
  const merged = [...resolveCascade(rules).values()];
  return options.collapse === false ? merged : collapseShorthands(merged);
}

/**
 * Merge rules that share a selector and media query into one rule each.
 * Groups keep the position of their first rule; at-rules follow the merged
 * rules untouched. Groups that end up empty are dropped. The returned
 * entries still carry their old ids.
 */
export function flattenRules(
  entries: readonly StylesheetEntry[],
  options: CascadeOptions = {},
): StylesheetEntry[] {
  const groups = new Map<string, Rule[]>();
  const atRules: StylesheetEntry[] = [];
  for (const entry of entries) {
    if (entry.kind !== "rule") {
      atRules.push(cloneEntry(entry));
      continue;
    }
    const key = `${entry.mediaQueryId ?? ""}\u0000${entry.selector}`;
    const group = groups.get(key);
    if (group) {
      group.push(entry);
    } else {
      groups.set(key, [entry]);
    }
  }

  const merged: Rule[] = [];
  for (const group of groups.values()) {
    const [first] = group;
    if (!first) {
      continue;
    }
    const declarations = cascade(group, options);
    if (declarations.length === 0) {
      continue;
    }
    merged.push({
      ...first,
      declarations,
      parentRuleId: null,
      nestingStyle: null,
    });
  }

  return [...dropDivergedSelectorLists(merged), ...atRules];
}

/**
 * After merging, rules from one selector list may no longer share
 * declarations. Only members still identical to the list's first member keep
 * the list id, and a list needs at least two members.
 */
function dropDivergedSelectorLists(rules: readonly Rule[]): Rule[] {
  const lists = new Map<number, Rule[]>();
  for (const rule of rules) {
    if (rule.selectorListId !== null) {
      const members = lists.get(rule.selectorListId) ?? [];
      members.push(rule);
      lists.set(rule.selectorListId, members);
    }
  }
  const diverged = new Set<Rule>();
  for (const members of lists.values()) {
    const [reference] = members;
    if (!reference) {
      continue;
    }
    const matching = members.filter((rule) =>
      sameDeclarationList(rule.declarations, reference.declarations),
    );
    for (const rule of members) {
      if (matching.length < 2 || !matching.includes(rule)) {
        diverged.add(rule);
      }
    }
  }
  return rules.map((rule) => (diverged.has(rule) ? { ...rule, selectorListId: null } : rule));
}

function sameDeclarationList(a: readonly Declaration[], b: readonly Declaration[]): boolean {
  return (
    a.length === b.length &&
    a.every((declaration, index) => {
      const other = b[index];
      return (
        other !== undefined &&
        declaration.property === other.property &&
        declaration.value === other.value &&
        declaration.important === other.important
      );
    })
  );
}

/**
 * Shorthand-aware structural equality for rules and declaration blocks.
 * `margin: 10px` equals the four `margin-*` longhands set to `10px`; rule ids
 * and stored specificity never take part.
 */
import { resolveDeclarations } from "../cascade.js";
import type { Declaration, Rule } from "./css-ir.js";

/**
 * Canonical text of a block after expansion and cascading. Two blocks are
 * equivalent exactly when their keys match.
 */
export function declarationsKey(declarations: readonly Declaration[]): string {
  const resolved = [...resolveDeclarations(declarations).values()];
  return resolved
    .map((d) => `${d.property}:${d.value}${d.important ? "!" : ""}`)
    .sort()
    .join(";");
}

export function declarationsEquivalent(
  a: readonly Declaration[],
  b: readonly Declaration[],
): boolean {
  return declarationsKey(a) === declarationsKey(b);
}

export function ruleKey(rule: Pick<Rule, "selector" | "declarations">): string {
  return `${rule.selector}{${declarationsKey(rule.declarations)}}`;
}

export function rulesEqual(
  a: Pick<Rule, "selector" | "declarations">,
  b: Pick<Rule, "selector" | "declarations">,
): boolean {
  return a.selector === b.selector && declarationsEquivalent(a.declarations, b.declarations);
}

/**
 * 32-bit hash of `ruleKey`, so equal rules hash equally.
 */
export function ruleHash(rule: Pick<Rule, "selector" | "declarations">): number {
  const key = ruleKey(rule);
  let hash = 5381;
  for (let i = 0; i < key.length; i++) {
    hash = ((hash << 5) + hash + key.charCodeAt(i)) | 0;
  }
  return hash >>> 0;
}

import { resolveDeclarations } from "../cascade.js";
import { createDeclaration, formatDeclaration, type Declaration } from "../internal/css-ir.js";
import { declarationsEquivalent } from "../internal/equality.js";
import { parseDeclarations, splitImportant } from "./declarations.js";

type DeclarationsInput = string | readonly Declaration[] | Record<string, string>;

function isDeclarationList(
  input: readonly Declaration[] | Record<string, string>,
): input is readonly Declaration[] {
  return Array.isArray(input);
}

/**
 * An ordered, mutable declaration block.
 *
 * Lookups are by lowercase property name; when a property occurs more than
 * once the block keeps every occurrence and lookups see the last one.
 * Values given to `set` or the record form may end in `!important`.
 */
export class Declarations implements Iterable<Declaration> {
  private list: Declaration[];

  constructor(input: DeclarationsInput = []) {
    this.list = Declarations.toList(input);
  }

  private static toList(input: DeclarationsInput): Declaration[] {
    if (typeof input === "string") {
      return parseDeclarations(input);
    }
    if (isDeclarationList(input)) {
      return [...input];
    }
    return Object.entries(input).map(([property, raw]) => {
      const { value, important } = splitImportant(raw);
      return createDeclaration(property, value, important);
    });
  }

  get size(): number {
    return this.list.length;
  }

  get isEmpty(): boolean {
    return this.list.length === 0;
  }

  getDeclaration(property: string): Declaration | undefined {
    const name = property.trim().toLowerCase();
    for (let i = this.list.length - 1; i >= 0; i--) {
      const declaration = this.list[i];
      if (declaration?.property === name) {
        return declaration;
      }
    }
    return undefined;
  }

  /** Value of a property, without `!important`. */
  get(property: string): string | undefined {
    return this.getDeclaration(property)?.value;
  }

  has(property: string): boolean {
    return this.getDeclaration(property) !== undefined;
  }

  isImportant(property: string): boolean {
    return this.getDeclaration(property)?.important ?? false;
  }

  /**
   * Set a property. An existing declaration is replaced where it stands
   * (later duplicates are dropped); a new one is appended.
   */
  set(property: string, value: string, important?: boolean): this {
    const split = splitImportant(value);
    const declaration = createDeclaration(property, split.value, important ?? split.important);
    const index = this.list.findIndex((d) => d.property === declaration.property);
    if (index === -1) {
      this.list.push(declaration);
      return this;
    }
    this.list = this.list.filter((d, i) => i <= index || d.property !== declaration.property);
    this.list[index] = declaration;
    return this;
  }

  delete(property: string): boolean {
    const name = property.trim().toLowerCase();
    const before = this.list.length;
    this.list = this.list.filter((d) => d.property !== name);
    return this.list.length !== before;
  }

  properties(): string[] {
    return [...new Set(this.list.map((d) => d.property))];
  }

  toArray(): Declaration[] {
    return [...this.list];
  }

  /** Expanded longhands after cascading the block against itself. */
  resolved(): Declarations {
    return new Declarations([...resolveDeclarations(this.list).values()]);
  }

  equals(other: Declarations | readonly Declaration[]): boolean {
    const otherList = other instanceof Declarations ? other.list : other;
    return declarationsEquivalent(this.list, otherList);
  }

  /** `prop: value; prop2: value2 !important;` */
  toString(): string {
    return this.list.map((d) => `${formatDeclaration(d)};`).join(" ");
  }

  [Symbol.iterator](): Iterator<Declaration> {
    return this.list[Symbol.iterator]();
  }
}

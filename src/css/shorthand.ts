/**
 * CSS Shorthand Expansion and Collapsing
 *
 * Expands shorthand properties into longhands so the cascade can compare
 * them one by one, and folds complete longhand sets back into shorthands
 * for output.
 */
import valueParser from "postcss-value-parser";
import { createDeclaration, type Declaration } from "../internal/css-ir.js";
import { ShorthandInputError } from "../internal/errors.js";
import { splitImportant } from "./declarations.js";

// ============================================================================
// Shorthand Property Definitions
// ============================================================================

const SIDES = ["top", "right", "bottom", "left"] as const;
type Side = (typeof SIDES)[number];

const sided = (prefix: string, suffix = "") => SIDES.map((side) => `${prefix}-${side}${suffix}`);

const MARGIN_SIDES = sided("margin");
const PADDING_SIDES = sided("padding");
const BORDER_WIDTHS = sided("border", "-width");
const BORDER_STYLES = sided("border", "-style");
const BORDER_COLORS = sided("border", "-color");
const BORDER_LONGHANDS = [...BORDER_WIDTHS, ...BORDER_STYLES, ...BORDER_COLORS];

const FONT_LONGHANDS = [
  "font-style",
  "font-variant",
  "font-weight",
  "font-size",
  "line-height",
  "font-family",
];

const BACKGROUND_LONGHANDS = [
  "background-color",
  "background-image",
  "background-repeat",
  "background-attachment",
  "background-position",
  "background-size",
];

const LIST_STYLE_LONGHANDS = ["list-style-type", "list-style-position", "list-style-image"];

/**
 * Map of shorthand properties to the longhands they can set
 */
export const SHORTHAND_PROPERTIES: Record<string, readonly string[]> = {
  margin: MARGIN_SIDES,
  padding: PADDING_SIDES,
  border: BORDER_LONGHANDS,
  "border-top": ["border-top-width", "border-top-style", "border-top-color"],
  "border-right": ["border-right-width", "border-right-style", "border-right-color"],
  "border-bottom": ["border-bottom-width", "border-bottom-style", "border-bottom-color"],
  "border-left": ["border-left-width", "border-left-style", "border-left-color"],
  "border-width": BORDER_WIDTHS,
  "border-style": BORDER_STYLES,
  "border-color": BORDER_COLORS,
  font: FONT_LONGHANDS,
  background: BACKGROUND_LONGHANDS,
  "list-style": LIST_STYLE_LONGHANDS,
};

export function isShorthandProperty(property: string): boolean {
  return Object.hasOwn(SHORTHAND_PROPERTIES, property.toLowerCase());
}

export function getLonghandProperties(shorthand: string): readonly string[] | null {
  return SHORTHAND_PROPERTIES[shorthand.toLowerCase()] ?? null;
}

// ============================================================================
// Keyword Tables
// ============================================================================

const BORDER_WIDTH_KEYWORDS = new Set(["thin", "medium", "thick"]);
const BORDER_STYLE_KEYWORDS = new Set([
  "none",
  "hidden",
  "dotted",
  "dashed",
  "solid",
  "double",
  "groove",
  "ridge",
  "inset",
  "outset",
]);
const FONT_STYLE_KEYWORDS = new Set(["normal", "italic", "oblique"]);
const FONT_VARIANT_KEYWORDS = new Set(["normal", "small-caps"]);
const FONT_WEIGHT_KEYWORDS = new Set(["normal", "bold", "bolder", "lighter"]);
const FONT_SIZE_KEYWORDS = new Set([
  "xx-small",
  "x-small",
  "small",
  "medium",
  "large",
  "x-large",
  "xx-large",
  "smaller",
  "larger",
]);
const BACKGROUND_REPEAT_KEYWORDS = new Set([
  "repeat",
  "repeat-x",
  "repeat-y",
  "no-repeat",
  "space",
  "round",
]);
const BACKGROUND_ATTACHMENT_KEYWORDS = new Set(["scroll", "fixed", "local"]);
const BACKGROUND_POSITION_KEYWORDS = new Set(["left", "right", "center", "top", "bottom"]);
const BACKGROUND_SIZE_KEYWORDS = new Set(["auto", "cover", "contain"]);
const LIST_STYLE_POSITION_KEYWORDS = new Set(["inside", "outside"]);

const BACKGROUND_DEFAULTS: Record<string, string> = {
  "background-color": "transparent",
  "background-image": "none",
  "background-repeat": "repeat",
  "background-attachment": "scroll",
  "background-position": "0% 0%",
};

// ============================================================================
// Value Splitting
// ============================================================================

/** Longest value the splitter accepts. */
export const MAX_SHORTHAND_VALUE_LENGTH = 65_536;

/**
 * Split a value on top-level whitespace. Functions and strings stay whole,
 * so `calc(100% - 20px)` is one token. A `/` or `,` sticks to its neighbour
 * unless whitespace separates them.
 *
 * @example splitValue("center / cover") // ["center", "/", "cover"]
 * @example splitValue("14px/1.5 Arial, serif") // ["14px/1.5", "Arial,", "serif"]
 */
export function splitValue(value: string, property = "value"): string[] {
  if (value.length > MAX_SHORTHAND_VALUE_LENGTH) {
    throw new ShorthandInputError(
      [
        `Refusing to split a ${value.length}-character value for '${property}'.`,
        `Shorthand values are limited to ${MAX_SHORTHAND_VALUE_LENGTH} characters.`,
      ].join("\n"),
      property,
    );
  }
  const tokens: string[] = [];
  let current = "";
  const flush = () => {
    if (current) {
      tokens.push(current);
    }
    current = "";
  };
  for (const node of valueParser(value.trim()).nodes) {
    if (node.type === "space" || node.type === "comment") {
      flush();
    } else if (node.type === "div") {
      if (/\s/.test(node.before)) {
        flush();
      }
      current += node.value;
      if (/\s/.test(node.after)) {
        flush();
      }
    } else {
      current += valueParser.stringify(node);
    }
  }
  flush();
  return tokens;
}

const hasDigit = (token: string) => /[0-9]/.test(token);
const isFunction = (token: string) => token.includes("(");
const isImageToken = (token: string) =>
  token === "none" || /^url\(/i.test(token) || /gradient\(/i.test(token) || /^image-set\(/i.test(token);

/**
 * Apply the 1/2/3/4-value rule: [top, right, bottom, left].
 */
export function fourSides(tokens: readonly string[]): [string, string, string, string] | null {
  const [top, right = top, bottom = top, left = right] = tokens;
  if (tokens.length === 0 || tokens.length > 4 || top === undefined) {
    return null;
  }
  return [top, right ?? top, bottom ?? top, left ?? right ?? top];
}

/**
 * Shortest 1/2/3/4-value form of four side values.
 *
 * @example optimizeFourSides(["10px", "20px", "10px", "20px"]) // "10px 20px"
 */
export function optimizeFourSides([top, right, bottom, left]: readonly [string, string, string, string]): string {
  if (top === right && right === bottom && bottom === left) {
    return top;
  }
  if (top === bottom && right === left) {
    return `${top} ${right}`;
  }
  if (right === left) {
    return `${top} ${right} ${bottom}`;
  }
  return `${top} ${right} ${bottom} ${left}`;
}

// ============================================================================
// Shorthand Expansion
// ============================================================================

function expandFourSided(longhands: readonly string[], value: string, property: string): Record<string, string> | null {
  const sides = fourSides(splitValue(value, property));
  if (!sides) {
    return null;
  }
  const result: Record<string, string> = {};
  longhands.forEach((longhand, index) => {
    result[longhand] = sides[index] ?? sides[0];
  });
  return result;
}

type BorderParts = { width?: string; style?: string; color?: string };

function parseBorderValue(value: string, property: string): BorderParts {
  const parts: BorderParts = {};
  for (const token of splitValue(value, property)) {
    const lowered = token.toLowerCase();
    if (BORDER_WIDTH_KEYWORDS.has(lowered) || (hasDigit(token) && !isFunction(token) && !token.startsWith("#"))) {
      parts.width = token;
    } else if (BORDER_STYLE_KEYWORDS.has(lowered)) {
      parts.style = token;
    } else {
      parts.color = token;
    }
  }
  return parts;
}

/**
 * Expand a border shorthand value
 * @example expandBorder("2px solid red") // 4 widths, then 4 styles, then 4 colors
 */
export function expandBorder(value: string): Record<string, string> | null {
  const { width, style, color } = parseBorderValue(value, "border");
  const result: Record<string, string> = {};
  const groups: Array<[string | undefined, string[]]> = [
    [width, BORDER_WIDTHS],
    [style, BORDER_STYLES],
    [color, BORDER_COLORS],
  ];
  for (const [part, longhands] of groups) {
    if (part !== undefined) {
      for (const longhand of longhands) {
        result[longhand] = part;
      }
    }
  }
  return Object.keys(result).length > 0 ? result : null;
}

export function expandBorderSide(side: string, value: string): Record<string, string> | null {
  if (!isSide(side)) {
    throw new ShorthandInputError(
      `Unknown border side '${side}'. Expected one of: ${SIDES.join(", ")}`,
      `border-${side}`,
    );
  }
  const { width, style, color } = parseBorderValue(value, `border-${side}`);
  const result: Record<string, string> = {};
  if (width !== undefined) {
    result[`border-${side}-width`] = width;
  }
  if (style !== undefined) {
    result[`border-${side}-style`] = style;
  }
  if (color !== undefined) {
    result[`border-${side}-color`] = color;
  }
  return Object.keys(result).length > 0 ? result : null;
}

function isSide(side: string): side is Side {
  return SIDES.some((candidate) => candidate === side);
}

/**
 * Expand a font shorthand value.
 * Format: [style] [variant] [weight] size[/line-height] family
 *
 * @example expandFont("bold 14px/1.5 'Helvetica Neue', sans-serif")
 */
export function expandFont(value: string): Record<string, string> | null {
  const tokens = splitValue(value, "font");
  if (tokens.length < 2) {
    return null;
  }

  let style: string | undefined;
  let variant: string | undefined;
  let weight: string | undefined;
  let size: string | undefined;
  let lineHeight: string | undefined;
  let familyTokens: string[] = [];

  // The last token always belongs to the family.
  for (let i = 0; i < tokens.length - 1; i++) {
    const token = tokens[i] ?? "";
    const lowered = token.toLowerCase();
    if (FONT_STYLE_KEYWORDS.has(lowered) && style === undefined) {
      style = token;
    } else if (FONT_VARIANT_KEYWORDS.has(lowered) && variant === undefined) {
      variant = token;
    } else if (FONT_WEIGHT_KEYWORDS.has(lowered) || /^[1-9]00$/.test(token)) {
      weight = token;
    } else if (hasDigit(token) || FONT_SIZE_KEYWORDS.has(lowered.split("/")[0] ?? lowered)) {
      const slash = token.indexOf("/");
      size = slash === -1 ? token : token.slice(0, slash);
      lineHeight = slash === -1 ? undefined : token.slice(slash + 1) || undefined;
      familyTokens = tokens.slice(i + 1);
      if (familyTokens[0] === "/" && familyTokens.length > 2) {
        lineHeight = familyTokens[1];
        familyTokens = familyTokens.slice(2);
      }
      break;
    } else {
      break;
    }
  }

  const family = familyTokens.join(" ");
  if (size === undefined || family === "") {
    return null;
  }

  return {
    "font-style": style ?? "normal",
    "font-variant": variant ?? "normal",
    "font-weight": weight ?? "normal",
    "font-size": size,
    "line-height": lineHeight ?? "normal",
    "font-family": family,
  };
}

/**
 * Split `center/cover` style tokens so the slash stands alone. Functions
 * (urls, gradients, colors) keep their inner slashes.
 */
function separateSlashes(tokens: readonly string[]): string[] {
  const out: string[] = [];
  for (const token of tokens) {
    if (token === "/" || isFunction(token) || !token.includes("/")) {
      out.push(token);
      continue;
    }
    const [before, ...rest] = token.split("/");
    if (before) {
      out.push(before);
    }
    out.push("/");
    const after = rest.join("/");
    if (after) {
      out.push(after);
    }
  }
  return out;
}

const isPositionToken = (token: string) =>
  BACKGROUND_POSITION_KEYWORDS.has(token.toLowerCase()) ||
  (!isFunction(token) && !token.startsWith("#") && (token.includes("%") || hasDigit(token)));

/**
 * Expand a background shorthand value.
 * Format: [color] [image] [repeat] [attachment] [position [/ size]]
 *
 * @example expandBackground("url(img.png) no-repeat center / cover")
 */
export function expandBackground(value: string): Record<string, string> | null {
  const tokens = separateSlashes(splitValue(value, "background"));
  if (tokens.length === 0) {
    return null;
  }

  let color: string | undefined;
  let image: string | undefined;
  let repeat: string | undefined;
  let attachment: string | undefined;
  const position: string[] = [];
  const size: string[] = [];
  let afterSlash = false;

  for (const token of tokens) {
    const lowered = token.toLowerCase();
    if (token === "/") {
      afterSlash = true;
    } else if (afterSlash && size.length < 2 && (BACKGROUND_SIZE_KEYWORDS.has(lowered) || isPositionToken(token))) {
      size.push(token);
    } else if (isImageToken(lowered)) {
      image = token;
    } else if (BACKGROUND_REPEAT_KEYWORDS.has(lowered)) {
      repeat = token;
    } else if (BACKGROUND_ATTACHMENT_KEYWORDS.has(lowered)) {
      attachment = token;
    } else if (isPositionToken(token)) {
      position.push(token);
    } else {
      color = token;
    }
  }

  const result: Record<string, string> = {
    "background-color": color ?? "transparent",
    "background-image": image ?? "none",
    "background-repeat": repeat ?? "repeat",
    "background-attachment": attachment ?? "scroll",
    "background-position": position.length > 0 ? position.join(" ") : "0% 0%",
  };
  if (size.length > 0) {
    result["background-size"] = size.join(" ");
  }
  return result;
}

/**
 * Expand a list-style shorthand value.
 * Format: [type] [position] [image]
 */
export function expandListStyle(value: string): Record<string, string> | null {
  let type: string | undefined;
  let position: string | undefined;
  let image: string | undefined;
  for (const token of splitValue(value, "list-style")) {
    const lowered = token.toLowerCase();
    if (isImageToken(lowered)) {
      image = token;
    } else if (LIST_STYLE_POSITION_KEYWORDS.has(lowered)) {
      position = token;
    } else {
      type = token;
    }
  }
  const result: Record<string, string> = {};
  if (type !== undefined) {
    result["list-style-type"] = type;
  }
  if (position !== undefined) {
    result["list-style-position"] = position;
  }
  if (image !== undefined) {
    result["list-style-image"] = image;
  }
  return Object.keys(result).length > 0 ? result : null;
}

// ============================================================================
// Main Expansion Function
// ============================================================================

function expandLonghands(property: string, value: string): Record<string, string> | null {
  switch (property) {
    case "margin":
      return expandFourSided(MARGIN_SIDES, value, property);
    case "padding":
      return expandFourSided(PADDING_SIDES, value, property);
    case "border-width":
      return expandFourSided(BORDER_WIDTHS, value, property);
    case "border-style":
      return expandFourSided(BORDER_STYLES, value, property);
    case "border-color":
      return expandFourSided(BORDER_COLORS, value, property);
    case "border":
      return expandBorder(value);
    case "border-top":
    case "border-right":
    case "border-bottom":
    case "border-left":
      return expandBorderSide(property.slice("border-".length), value);
    case "font":
      return expandFont(value);
    case "background":
      return expandBackground(value);
    case "list-style":
      return expandListStyle(value);
    default:
      return null;
  }
}

/**
 * Expand a shorthand property to its longhand equivalents.
 * A trailing `!important` on the value is carried onto every longhand.
 * Returns null if the property is not a shorthand or the value cannot be
 * expanded.
 *
 * @example expandShorthand("MARGIN", "10px 20px !important")["margin-left"] // "20px !important"
 */
export function expandShorthand(property: string, value: string): Record<string, string> | null {
  const { value: bare, important } = splitImportant(value);
  const expanded = expandLonghands(property.trim().toLowerCase(), bare);
  if (!expanded || !important) {
    return expanded;
  }
  const result: Record<string, string> = {};
  for (const [longhand, longhandValue] of Object.entries(expanded)) {
    result[longhand] = `${longhandValue} !important`;
  }
  return result;
}

/**
 * Expand one declaration. Non-shorthands, and shorthands whose value cannot
 * be expanded, come back unchanged.
 */
export function expandDeclaration(declaration: Declaration): Declaration[] {
  const expanded = expandLonghands(declaration.property, declaration.value);
  if (!expanded) {
    return [declaration];
  }
  return Object.entries(expanded).map(([property, value]) =>
    createDeclaration(property, value, declaration.important),
  );
}

/**
 * Expand every shorthand in a block, keeping source order. Later
 * declarations still appear after the longhands of earlier shorthands.
 */
export function expandDeclarations(declarations: readonly Declaration[]): Declaration[] {
  return declarations.flatMap(expandDeclaration);
}

// ============================================================================
// Shorthand Collapsing
// ============================================================================

type PropertyMap = Map<string, Declaration>;

function sameImportance(declarations: readonly Declaration[]): boolean {
  return declarations.every((d) => d.important === declarations[0]?.important);
}

function allSame(declarations: readonly Declaration[]): boolean {
  const first = declarations[0];
  return (
    first !== undefined &&
    declarations.every((d) => d.value === first.value && d.important === first.important)
  );
}

function pick(map: PropertyMap, properties: readonly string[]): Declaration[] {
  const found: Declaration[] = [];
  for (const property of properties) {
    const declaration = map.get(property);
    if (declaration) {
      found.push(declaration);
    }
  }
  return found;
}

function asFour(declarations: readonly Declaration[]): [string, string, string, string] | null {
  const [top, right, bottom, left] = declarations;
  if (declarations.length !== 4 || !top || !right || !bottom || !left) {
    return null;
  }
  return [top.value, right.value, bottom.value, left.value];
}

class Collapser {
  private declarations: Declaration[];
  private readonly map: PropertyMap;

  constructor(declarations: readonly Declaration[]) {
    this.declarations = [...declarations];
    this.map = new Map(declarations.map((d) => [d.property, d]));
  }

  result(): Declaration[] {
    return this.declarations;
  }

  /** Drop `longhands` and append the shorthand at the end of the block. */
  private replace(longhands: readonly string[], property: string, value: string, important: boolean) {
    const drop = new Set(longhands);
    this.declarations = this.declarations.filter((d) => !drop.has(d.property));
    this.declarations.push(createDeclaration(property, value, important));
  }

  fourSided(longhands: readonly string[], property: string): void {
    const found = pick(this.map, longhands);
    const values = asFour(found);
    if (!values || !sameImportance(found)) {
      return;
    }
    this.replace(longhands, property, optimizeFourSides(values), found[0]?.important ?? false);
  }

  border(): void {
    const widths = pick(this.map, BORDER_WIDTHS);
    const styles = pick(this.map, BORDER_STYLES);
    const colors = pick(this.map, BORDER_COLORS);
    const style = styles[0];

    if (styles.length === 4 && allSame(styles) && style) {
      const widthsOk = widths.length < 4 || (allSame(widths) && widths[0]?.important === style.important);
      const colorsOk = colors.length < 4 || (allSame(colors) && colors[0]?.important === style.important);
      if (widthsOk && colorsOk) {
        const parts: string[] = [];
        if (widths.length === 4 && widths[0]) {
          parts.push(widths[0].value);
        }
        parts.push(style.value);
        if (colors.length === 4 && colors[0]) {
          parts.push(colors[0].value);
        }
        this.replace(BORDER_LONGHANDS, "border", parts.join(" "), style.important);
        return;
      }
    }

    this.fourSided(BORDER_WIDTHS, "border-width");
    this.fourSided(BORDER_STYLES, "border-style");
    this.fourSided(BORDER_COLORS, "border-color");
  }

  listStyle(): void {
    const found = pick(this.map, LIST_STYLE_LONGHANDS);
    if (found.length < 2 || !sameImportance(found)) {
      return;
    }
    const value = found.map((d) => d.value).join(" ");
    this.replace(LIST_STYLE_LONGHANDS, "list-style", value, found[0]?.important ?? false);
  }

  font(): void {
    const size = this.map.get("font-size");
    const family = this.map.get("font-family");
    const found = pick(this.map, FONT_LONGHANDS);
    if (!size || !family || !sameImportance(found)) {
      return;
    }
    const style = this.map.get("font-style")?.value;
    const variant = this.map.get("font-variant")?.value;
    const weight = this.map.get("font-weight")?.value;
    const lineHeight = this.map.get("line-height")?.value;
    const complete = found.length === FONT_LONGHANDS.length;

    const parts: string[] = [];
    for (const part of [style, variant, weight]) {
      if (part !== undefined && !(complete && part === "normal")) {
        parts.push(part);
      }
    }
    const showLineHeight = lineHeight !== undefined && !(complete && lineHeight === "normal");
    parts.push(showLineHeight ? `${size.value}/${lineHeight}` : size.value);
    parts.push(family.value);

    this.replace(FONT_LONGHANDS, "font", parts.join(" "), size.important);
  }

  background(): void {
    const found = pick(this.map, BACKGROUND_LONGHANDS);
    if (found.length < 2 || !sameImportance(found)) {
      return;
    }
    const size = this.map.get("background-size")?.value;
    const position = this.map.get("background-position")?.value;
    if (size !== undefined && position === undefined) {
      return;
    }
    const complete = pick(this.map, Object.keys(BACKGROUND_DEFAULTS)).length === 5;

    const parts: string[] = [];
    for (const property of [
      "background-color",
      "background-image",
      "background-repeat",
      "background-position",
      "background-attachment",
    ]) {
      const value = this.map.get(property)?.value;
      if (value === undefined) {
        continue;
      }
      const keep = property === "background-position" && size !== undefined;
      if (complete && value === BACKGROUND_DEFAULTS[property] && !keep) {
        continue;
      }
      parts.push(property === "background-position" && size !== undefined ? `${value} / ${size}` : value);
    }
    if (parts.length === 0) {
      parts.push("none");
    }
    this.replace(BACKGROUND_LONGHANDS, "background", parts.join(" "), found[0]?.important ?? false);
  }
}

/**
 * Fold complete longhand sets back into shorthands, in the order margin,
 * padding, border, list-style, font, background. Each new shorthand is
 * appended after the declarations it does not replace.
 */
export function collapseShorthands(declarations: readonly Declaration[]): Declaration[] {
  const collapser = new Collapser(declarations);
  collapser.fourSided(MARGIN_SIDES, "margin");
  collapser.fourSided(PADDING_SIDES, "padding");
  collapser.border();
  collapser.listStyle();
  collapser.font();
  collapser.background();
  return collapser.result();
}

/**
 * Color notation conversion over parsed declaration values.
 *
 * The engine only walks declarations and hands each value to a
 * `ColorConverter`; the built-in `hexRgbConverter` covers hex and
 * `rgb()`/`rgba()`. Other color spaces plug in through the same interface.
 */
import valueParser from "postcss-value-parser";
import { createDeclaration, type Declaration, type StylesheetEntry } from "./internal/css-ir.js";

export type ColorNotation = "hex" | "rgb" | "hsl" | "hwb" | "oklab" | "named";

export type ColorConversion = {
  /** Only convert colors written in this notation; any notation when unset. */
  from?: ColorNotation;
  to: ColorNotation;
};

export interface ColorConverter {
  /** The rewritten value, or null to keep `value` unchanged. */
  convert(value: string, conversion: ColorConversion): string | null;
}

type Rgba = { r: number; g: number; b: number; a: number };

const HEX_COLOR = /^#([0-9a-f]{3,4}|[0-9a-f]{6}|[0-9a-f]{8})$/i;

function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

function clampByte(value: number): number {
  return Math.min(255, Math.max(0, Math.round(value)));
}

/**
 * @example parseHex("#f00") // { r: 255, g: 0, b: 0, a: 1 }
 */
export function parseHex(token: string): Rgba | null {
  const match = HEX_COLOR.exec(token);
  const digits = match?.[1];
  if (!digits) {
    return null;
  }
  const full = digits.length <= 4 ? [...digits].map((d) => d + d).join("") : digits;
  const channel = (index: number) => Number.parseInt(full.slice(index * 2, index * 2 + 2), 16);
  return {
    r: channel(0),
    g: channel(1),
    b: channel(2),
    a: full.length === 8 ? channel(3) / 255 : 1,
  };
}

function parseChannel(token: string): number | null {
  const match = /^(-?\d*\.?\d+)(%?)$/.exec(token);
  if (!match) {
    return null;
  }
  const number = Number(match[1]);
  return match[2] === "%" ? (number / 100) * 255 : number;
}

function parseAlpha(token: string): number | null {
  const match = /^(-?\d*\.?\d+)(%?)$/.exec(token);
  if (!match) {
    return null;
  }
  const number = Number(match[1]);
  return Math.min(1, Math.max(0, match[2] === "%" ? number / 100 : number));
}

/**
 * Channels of an `rgb()`/`rgba()` function in comma or space syntax.
 */
export function parseRgbFunction(node: valueParser.FunctionNode): Rgba | null {
  const name = node.value.toLowerCase();
  if (name !== "rgb" && name !== "rgba") {
    return null;
  }
  const words = node.nodes.filter((child) => child.type === "word").map((child) => child.value);
  if (words.length !== 3 && words.length !== 4) {
    return null;
  }
  const [r, g, b] = words.slice(0, 3).map(parseChannel);
  const alphaToken = words[3];
  const a = alphaToken === undefined ? 1 : parseAlpha(alphaToken);
  if (r == null || g == null || b == null || a === null) {
    return null;
  }
  return { r: clampByte(r), g: clampByte(g), b: clampByte(b), a };
}

export function formatRgb({ r, g, b, a }: Rgba): string {
  return a >= 1 ? `rgb(${r}, ${g}, ${b})` : `rgba(${r}, ${g}, ${b}, ${roundTo(a, 3)})`;
}

export function formatHex({ r, g, b, a }: Rgba): string {
  const hex = (n: number) => clampByte(n).toString(16).padStart(2, "0");
  return `#${hex(r)}${hex(g)}${hex(b)}${a >= 1 ? "" : hex(a * 255)}`;
}

/**
 * Converts between hex (3, 4, 6 and 8 digits) and `rgb()`/`rgba()`.
 * Alpha in `rgba()` output is rounded to three decimals.
 *
 * @example hexRgbConverter.convert("1px solid #ff000080", { to: "rgb" }) // "1px solid rgba(255, 0, 0, 0.502)"
 */
export const hexRgbConverter: ColorConverter = {
  convert(value, { from, to }) {
    if ((to !== "hex" && to !== "rgb") || (from !== undefined && from !== "hex" && from !== "rgb")) {
      return null;
    }
    let changed = false;
    const parsed = valueParser(value);
    const output = valueParser.stringify(parsed.nodes, (node) => {
      if (to === "rgb" && from !== "rgb" && node.type === "word") {
        const color = parseHex(node.value);
        if (color) {
          changed = true;
          return formatRgb(color);
        }
      }
      if (to === "hex" && from !== "hex" && node.type === "function") {
        const color = parseRgbFunction(node);
        if (color) {
          changed = true;
          return formatHex(color);
        }
      }
      return undefined;
    });
    return changed ? output : null;
  },
};

function convertDeclarations(
  declarations: readonly Declaration[],
  converter: ColorConverter,
  conversion: ColorConversion,
): { declarations: Declaration[]; changed: number } {
  let changed = 0;
  const converted = declarations.map((declaration) => {
    const value = converter.convert(declaration.value, conversion);
    if (value === null || value === declaration.value) {
      return declaration;
    }
    changed++;
    return createDeclaration(declaration.property, value, declaration.important);
  });
  return { declarations: converted, changed };
}

/**
 * Run `converter` over every declaration value of `entries`, in place,
 * including descriptor at-rules and keyframe blocks. Returns the number of
 * values rewritten.
 */
export function convertColors(
  entries: StylesheetEntry[],
  converter: ColorConverter,
  conversion: ColorConversion,
): number {
  let total = 0;
  for (const entry of entries) {
    if (entry.kind === "rule") {
      const result = convertDeclarations(entry.declarations, converter, conversion);
      entry.declarations = result.declarations;
      total += result.changed;
    } else {
      const result = convertDeclarations(entry.content.declarations, converter, conversion);
      entry.content.declarations = result.declarations;
      total += result.changed;
      if (entry.content.kind === "rules") {
        total += convertColors(entry.content.rules, converter, conversion);
      }
    }
  }
  return total;
}

/**
 * Renders entries back to CSS text.
 *
 * Rules are emitted flat, in order. Rules that share a media query are
 * gathered into one `@media` block placed where that query first occurs, so
 * parsing the output and rendering it again gives the same text.
 */
import { formatDeclaration, type AtRule, type Declaration, type StylesheetEntry } from "./internal/css-ir.js";
import { MediaQueryTable } from "./internal/media.js";

export type RenderOptions = {
  charset?: string | null;
  /** Resolves `mediaQueryId`s; rules with an unknown id render without media. */
  mediaQueries?: MediaQueryTable;
};

type Style = {
  rule(indent: string, selector: string, declarations: readonly Declaration[]): string;
  atRule(indent: string, entry: AtRule): string;
};

function declarationText(declarations: readonly Declaration[]): string {
  return declarations.map((d) => `${formatDeclaration(d)};`).join(" ");
}

const compact: Style = {
  rule(indent, selector, declarations) {
    const body = declarationText(declarations);
    return `${indent}${selector} { ${body}${body ? " " : ""}}\n`;
  },
  atRule(indent, entry) {
    const inner = `${indent}  `;
    const { declarations } = entry.content;
    const lines = declarations.length > 0 ? [`${inner}${declarationText(declarations)}\n`] : [];
    if (entry.content.kind === "rules") {
      lines.push(...entry.content.rules.map((rule) => compact.rule(inner, rule.selector, rule.declarations)));
    }
    if (lines.length === 0) {
      return `${indent}${entry.selector} { }\n`;
    }
    return `${indent}${entry.selector} {\n${lines.join("")}${indent}}\n`;
  },
};

const formatted: Style = {
  rule(indent, selector, declarations) {
    const lines = declarations.map((d) => `${indent}  ${formatDeclaration(d)};\n`);
    return `${indent}${selector} {\n${lines.join("")}${indent}}\n`;
  },
  atRule(indent, entry) {
    const inner = `${indent}  `;
    const lines = entry.content.declarations.map((d) => `${inner}${formatDeclaration(d)};\n`);
    if (entry.content.kind === "rules") {
      lines.push(...entry.content.rules.map((rule) => formatted.rule(inner, rule.selector, rule.declarations)));
    }
    return `${indent}${entry.selector} {\n${lines.join("")}${indent}}\n`;
  },
};

function renderEntry(style: Style, indent: string, entry: StylesheetEntry): string {
  return entry.kind === "rule"
    ? style.rule(indent, entry.selector, entry.declarations)
    : style.atRule(indent, entry);
}

function renderWith(style: Style, entries: readonly StylesheetEntry[], options: RenderOptions): string {
  const mediaQueries = options.mediaQueries ?? new MediaQueryTable();
  let out = options.charset ? `@charset "${options.charset}";\n` : "";

  const groups = new Map<string, StylesheetEntry[]>();
  const order: Array<{ media: string | null; entry: StylesheetEntry | null }> = [];
  for (const entry of entries) {
    const media = mediaQueries.textOf(entry.mediaQueryId);
    if (media === null) {
      order.push({ media: null, entry });
      continue;
    }
    const group = groups.get(media);
    if (group) {
      group.push(entry);
    } else {
      groups.set(media, [entry]);
      order.push({ media, entry: null });
    }
  }

  for (const item of order) {
    if (item.entry) {
      out += renderEntry(style, "", item.entry);
      continue;
    }
    const group = item.media === null ? undefined : groups.get(item.media);
    if (!group) {
      continue;
    }
    out += `@media ${item.media} {\n`;
    for (const entry of group) {
      out += renderEntry(style, "  ", entry);
    }
    out += "}\n";
  }
  return out;
}

/**
 * Compact rendering: one line per rule.
 *
 * @example render(parseCss("a{color:red}").entries) // "a { color: red; }\n"
 */
export function render(entries: readonly StylesheetEntry[], options: RenderOptions = {}): string {
  return renderWith(compact, entries, options);
}

/** Multi-line rendering with one declaration per line. */
export function renderFormatted(
  entries: readonly StylesheetEntry[],
  options: RenderOptions = {},
): string {
  return renderWith(formatted, entries, options);
}

/**
 * Rewrites relative `url()` references in declaration values to absolute
 * URLs. `data:` URLs, absolute URLs and fragment-only references are left as
 * they are.
 */
import valueParser from "postcss-value-parser";

const ABSOLUTE_URL = /^[a-z][a-z0-9+.-]*:/i;

export type UrlRewriteFailure = { url: string; baseUri: string; error: unknown };

/**
 * Absolute form of `url` against `baseUri`, or null when it should be left
 * alone. Throws when `baseUri` cannot serve as a base.
 *
 * @example resolveUrl("../img/a.png", "https://example.com/css/site.css") // "https://example.com/img/a.png"
 */
export function resolveUrl(url: string, baseUri: string): string | null {
  const trimmed = url.trim();
  if (trimmed === "" || trimmed.startsWith("#") || ABSOLUTE_URL.test(trimmed)) {
    return null;
  }
  return new URL(trimmed, baseUri).href;
}

function urlArgument(node: valueParser.FunctionNode): string | null {
  const args = node.nodes.filter((child) => child.type !== "space" && child.type !== "comment");
  const [first] = args;
  if (args.length !== 1 || !first || (first.type !== "word" && first.type !== "string")) {
    return null;
  }
  return first.value;
}

/**
 * Rewrite every relative `url()` in `value` as `url('<absolute>')`. A
 * reference that cannot be resolved is kept and reported to `onFailure`.
 *
 * @example absolutizeUrls("url(yellow)", "http://www.example.org/style/basic.css")
 * // "url('http://www.example.org/style/yellow')"
 */
export function absolutizeUrls(
  value: string,
  baseUri: string,
  onFailure?: (failure: UrlRewriteFailure) => void,
): string {
  if (!/url\(/i.test(value)) {
    return value;
  }
  const parsed = valueParser(value);
  return valueParser.stringify(parsed.nodes, (node) => {
    if (node.type !== "function" || node.value.toLowerCase() !== "url") {
      return undefined;
    }
    const url = urlArgument(node);
    if (url === null) {
      return undefined;
    }
    let absolute: string | null;
    try {
      absolute = resolveUrl(url, baseUri);
    } catch (error) {
      onFailure?.({ url, baseUri, error });
      return undefined;
    }
    return absolute === null ? undefined : `url('${absolute.replace(/'/g, "%27")}')`;
  });
}

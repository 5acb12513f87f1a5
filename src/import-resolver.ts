/**
 * `@import` resolution.
 *
 * Imports are only valid in the leading run of `@charset`/`@import`
 * statements. Each one is resolved against the importing stylesheet, checked
 * against the import policy, fetched, resolved recursively and spliced into
 * the text in place of the statement, so the parser sees one document.
 */
import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";
import type { ImportStatement } from "./internal/css-ir.js";
import { ImportError } from "./internal/errors.js";
import {
  resolveImportOptions,
  type ImportContext,
  type ImportFetcher,
  type ImportOptions,
  type ResolvedImportOptions,
} from "./internal/options.js";
import { findTopLevel, skipWhitespace, SourceText } from "./internal/scan.js";

export type { ImportContext, ImportFetcher, ImportOptions };

const IMPORT_PRELUDE =
  /^(?:url\(\s*(?:"([^"]*)"|'([^']*)'|([^)\s]*))\s*\)|"([^"]*)"|'([^']*)')\s*([\s\S]*)$/i;

const SYSTEM_PATH_PREFIXES = ["/etc/", "/proc/", "/sys/", "/dev/"];

/**
 * Target and media of an `@import` prelude, or null when it names no URL.
 *
 * @example parseImportPrelude('url("print.css") print') // { url: "print.css", media: "print" }
 */
export function parseImportPrelude(prelude: string): ImportStatement | null {
  const match = IMPORT_PRELUDE.exec(prelude.trim());
  if (!match) {
    return null;
  }
  const url = match[1] ?? match[2] ?? match[3] ?? match[4] ?? match[5] ?? "";
  if (url === "") {
    return null;
  }
  const media = (match[6] ?? "").trim();
  return { url, media: media === "" ? null : media };
}

/** Reads `file:` URLs and plain paths from the local file system. */
export function createFileImportFetcher(): ImportFetcher {
  return (url) => readFileSync(url.startsWith("file:") ? fileURLToPath(url) : url, "utf8");
}

export class ImportResolver {
  constructor(private readonly options: ResolvedImportOptions) {}

  /** Replace the leading `@import` statements of `css` with the imported text. */
  resolve(css: string, context?: Partial<ImportContext>): string {
    return this.resolveText(
      css,
      {
        baseUri: context?.baseUri ?? this.options.baseUri,
        baseDir: context?.baseDir ?? this.options.baseDir,
      },
      [],
      0,
    );
  }

  /** Absolute URL of an import target relative to the importing stylesheet. */
  resolveTarget(url: string, context: ImportContext): URL {
    try {
      if (/^[a-z][a-z0-9+.-]*:/i.test(url)) {
        return new URL(url);
      }
      if (context.baseUri) {
        return new URL(url, context.baseUri);
      }
      if (context.baseDir) {
        return pathToFileURL(path.resolve(context.baseDir, url));
      }
      if (path.isAbsolute(url)) {
        return pathToFileURL(url);
      }
    } catch (error) {
      throw new ImportError(`Invalid @import URL '${url}'`, url, { cause: error });
    }
    throw new ImportError(
      `Cannot resolve relative @import '${url}' without a baseUri or baseDir`,
      url,
    );
  }

  /** Throws when the import policy rejects `target`. */
  checkPolicy(target: URL): void {
    const scheme = target.protocol.replace(/:$/, "").toLowerCase();
    if (!this.options.allowedSchemes.includes(scheme)) {
      throw new ImportError(
        `Import scheme '${scheme}' is not allowed (allowed: ${this.options.allowedSchemes.join(", ")})`,
        target.href,
      );
    }
    const extension = path.posix.extname(target.pathname).replace(/^\./, "").toLowerCase();
    if (!this.options.extensions.includes(extension)) {
      throw new ImportError(
        `Import extension '${extension || "(none)"}' is not allowed (allowed: ${this.options.extensions.join(", ")})`,
        target.href,
      );
    }
    if (scheme === "file") {
      const filePath = fileURLToPath(target);
      if (SYSTEM_PATH_PREFIXES.some((prefix) => filePath.startsWith(prefix))) {
        throw new ImportError(`Import of system path '${filePath}' is not allowed`, target.href);
      }
    }
  }

  private resolveText(css: string, context: ImportContext, chain: string[], depth: number): string {
    const source = new SourceText(css);
    let out = "";
    let copyFrom = 0;
    let pos = 0;
    for (;;) {
      pos = skipWhitespace(source.text, pos, source.length);
      const keyword = /^@(charset|import)\b/i.exec(source.text.slice(pos, pos + 8));
      if (!keyword) {
        break;
      }
      const stop = findTopLevel(source.text, pos, source.length, ";{");
      if (source.text[stop] === "{") {
        break;
      }
      if ((keyword[1] ?? "").toLowerCase() === "import") {
        const statement = parseImportPrelude(source.slice(pos + keyword[0].length, stop));
        if (statement) {
          out += css.slice(copyFrom, pos) + this.load(statement, context, chain, depth + 1);
          copyFrom = stop + 1;
        }
      }
      pos = stop + 1;
    }
    return out + css.slice(copyFrom);
  }

  private load(
    statement: ImportStatement,
    context: ImportContext,
    chain: string[],
    depth: number,
  ): string {
    if (depth > this.options.maxDepth) {
      throw new ImportError(
        `Import nesting too deep: exceeded maximum depth of ${this.options.maxDepth}`,
        statement.url,
      );
    }
    const target = this.resolveTarget(statement.url, context);
    this.checkPolicy(target);
    const href = target.href;
    if (chain.includes(href)) {
      throw new ImportError(`Circular @import of ${href}`, href);
    }

    const fetcher = this.options.fetcher ?? defaultFetcher(target);
    let text: string;
    try {
      text = fetcher(href, context);
    } catch (error) {
      if (error instanceof ImportError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ImportError(`Failed to import ${href}: ${reason}`, href, { cause: error });
    }

    const nestedContext: ImportContext =
      target.protocol === "file:"
        ? { baseUri: href, baseDir: path.dirname(fileURLToPath(target)) }
        : { baseUri: href, baseDir: context.baseDir };
    const resolved = this.resolveText(text, nestedContext, [...chain, href], depth);
    return statement.media === null
      ? `\n${resolved}\n`
      : `\n@media ${statement.media} {\n${resolved}\n}\n`;
  }
}

function defaultFetcher(target: URL): ImportFetcher {
  if (target.protocol === "file:") {
    return createFileImportFetcher();
  }
  return () => {
    throw new ImportError(
      `No fetcher configured for '${target.protocol.replace(/:$/, "")}' imports`,
      target.href,
    );
  };
}

/**
 * Splice the imports of `css` in before parsing.
 *
 * @example
 * resolveImports('@import "base.css"; a { color: red }', {
 *   allowedSchemes: ["https"],
 *   baseUri: "https://example.com/css/",
 *   fetcher: (url) => fetchSync(url),
 * });
 */
export function resolveImports(
  css: string,
  options: true | ImportOptions,
  context?: Partial<ImportContext>,
): string {
  const resolved = resolveImportOptions(options, {
    baseUri: context?.baseUri ?? null,
    baseDir: context?.baseDir ?? null,
  });
  if (!resolved) {
    return css;
  }
  return new ImportResolver(resolved).resolve(css, context);
}

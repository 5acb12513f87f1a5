import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, describe, it, expect, vi } from "vitest";
import { parseImportPrelude, resolveImports } from "../import-resolver.js";
import { ImportError } from "../internal/errors.js";
import type { ImportFetcher } from "../internal/options.js";
import { Stylesheet } from "../stylesheet.js";

const BASE_URI = "https://example.com/css/main.css";

function fakeFetcher(files: Record<string, string>): ImportFetcher {
  return (url) => {
    const text = files[url];
    if (text === undefined) {
      throw new Error("not found");
    }
    return text;
  };
}

function importError(run: () => unknown): ImportError {
  try {
    run();
  } catch (error) {
    if (error instanceof ImportError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected an ImportError");
}

describe("parseImportPrelude", () => {
  it("reads url() and string forms with media", () => {
    expect(parseImportPrelude('url("print.css") print')).toEqual({ url: "print.css", media: "print" });
    expect(parseImportPrelude("url(base.css)")).toEqual({ url: "base.css", media: null });
    expect(parseImportPrelude("'theme.css' screen and (min-width: 500px)")).toEqual({
      url: "theme.css",
      media: "screen and (min-width: 500px)",
    });
  });

  it("returns null without a URL", () => {
    expect(parseImportPrelude("")).toBeNull();
    expect(parseImportPrelude('""')).toBeNull();
  });
});

describe("resolveImports", () => {
  it("splices imported text in place of the statement", () => {
    const fetcher = fakeFetcher({ "https://example.com/css/base.css": "a { color: red }" });
    expect(resolveImports('@import "base.css"; b { color: blue }', { baseUri: BASE_URI, fetcher })).toBe(
      "\na { color: red }\n b { color: blue }",
    );
  });

  it("wraps an import with media in @media", () => {
    const fetcher = fakeFetcher({ "https://example.com/css/print.css": "a { color: black }" });
    expect(resolveImports("@import url(print.css) print;", { baseUri: BASE_URI, fetcher })).toBe(
      "\n@media print {\na { color: black }\n}\n",
    );
  });

  it("keeps a leading @charset", () => {
    const fetcher = fakeFetcher({ "https://example.com/css/base.css": "a { color: red }" });
    expect(resolveImports('@charset "UTF-8"; @import "base.css";', { baseUri: BASE_URI, fetcher })).toBe(
      '@charset "UTF-8"; \na { color: red }\n',
    );
  });

  it("leaves imports after other rules alone", () => {
    const css = 'a { color: red } @import "late.css";';
    expect(resolveImports(css, { baseUri: BASE_URI, fetcher: fakeFetcher({}) })).toBe(css);
  });

  it("resolves nested imports against the importing file", () => {
    const fetcher = fakeFetcher({
      "https://example.com/css/base.css": '@import "parts/reset.css"; a { color: red }',
      "https://example.com/css/parts/reset.css": "* { margin: 0 }",
    });
    const sheet = Stylesheet.parse('@import "base.css"; b { color: blue }', {
      import: { baseUri: BASE_URI, fetcher },
    });
    expect(sheet.selectors).toEqual(["*", "a", "b"]);
  });

  it("passes the importing context to the fetcher", () => {
    const fetcher = vi.fn<ImportFetcher>(() => "a { color: red }");
    resolveImports('@import "base.css";', { baseUri: BASE_URI, fetcher });
    expect(fetcher).toHaveBeenCalledWith("https://example.com/css/base.css", {
      baseUri: BASE_URI,
      baseDir: null,
    });
  });

  it("rejects circular imports", () => {
    const fetcher = fakeFetcher({
      "https://example.com/css/a.css": '@import "b.css";',
      "https://example.com/css/b.css": '@import "a.css";',
    });
    const error = importError(() => resolveImports('@import "a.css";', { baseUri: BASE_URI, fetcher }));
    expect(error.message).toBe("Circular @import of https://example.com/css/a.css");
  });

  it("limits nesting depth", () => {
    const fetcher = fakeFetcher({
      "https://example.com/css/a.css": '@import "b.css";',
      "https://example.com/css/b.css": "b { color: red }",
    });
    const error = importError(() =>
      resolveImports('@import "a.css";', { baseUri: BASE_URI, fetcher, maxDepth: 1 }),
    );
    expect(error.message).toBe("Import nesting too deep: exceeded maximum depth of 1");
  });

  it("rejects schemes and extensions outside the policy", () => {
    const fetcher = fakeFetcher({});
    expect(importError(() => resolveImports('@import "http://example.com/x.css";', { fetcher })).message).toBe(
      "Import scheme 'http' is not allowed (allowed: https)",
    );
    expect(importError(() => resolveImports('@import "https://example.com/x.txt";', { fetcher })).message).toBe(
      "Import extension 'txt' is not allowed (allowed: css)",
    );
    expect(importError(() => resolveImports('@import "https://example.com/theme";', { fetcher })).message).toBe(
      "Import extension '(none)' is not allowed (allowed: css)",
    );
  });

  it("rejects system paths", () => {
    const error = importError(() =>
      resolveImports('@import "/etc/passwd.css";', { allowedSchemes: ["file"], fetcher: fakeFetcher({}) }),
    );
    expect(error.message).toBe("Import of system path '/etc/passwd.css' is not allowed");
  });

  it("wraps fetcher failures with the cause", () => {
    const error = importError(() =>
      resolveImports('@import "missing.css";', { baseUri: BASE_URI, fetcher: fakeFetcher({}) }),
    );
    expect(error.message).toBe("Failed to import https://example.com/css/missing.css: not found");
    expect(error.url).toBe("https://example.com/css/missing.css");
    expect(error.cause).toBeInstanceOf(Error);
  });

  it("needs a base for relative imports", () => {
    expect(importError(() => resolveImports('@import "x.css";', true)).message).toBe(
      "Cannot resolve relative @import 'x.css' without a baseUri or baseDir",
    );
  });

  it("needs a fetcher for https imports", () => {
    expect(importError(() => resolveImports('@import "base.css";', { baseUri: BASE_URI })).message).toBe(
      "No fetcher configured for 'https' imports",
    );
  });
});

describe("file imports", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  it("reads relative imports beside the loaded file", () => {
    dir = mkdtempSync(path.join(tmpdir(), "stylesheet-imports-"));
    const main = path.join(dir, "main.css");
    writeFileSync(main, '@import "base.css" print;\nb { color: blue }\n');
    writeFileSync(path.join(dir, "base.css"), "a { color: red }\n");

    const sheet = Stylesheet.loadFile(main, { import: { allowedSchemes: ["file"] } });
    expect(sheet.selectors).toEqual(["a", "b"]);
    expect(sheet.findBySelector("a", "print")).toEqual(["color: red;"]);
  });
});

import { describe, it, expect } from "vitest";
import { parseCss } from "../css-parser.js";
import type { AtRule, Rule, StylesheetEntry } from "../internal/css-ir.js";
import { DepthError, ParseError } from "../internal/errors.js";

function rulesOf(entries: readonly StylesheetEntry[]): Rule[] {
  return entries.filter((entry): entry is Rule => entry.kind === "rule");
}

function atRulesOf(entries: readonly StylesheetEntry[]): AtRule[] {
  return entries.filter((entry): entry is AtRule => entry.kind === "atRule");
}

describe("parseCss", () => {
  describe("selector lists", () => {
    it("creates one rule per selector with shared declarations", () => {
      const { entries } = parseCss("h1, h2, h3 { color: red }");
      const rules = rulesOf(entries);

      expect(rules.map((rule) => rule.selector)).toEqual(["h1", "h2", "h3"]);
      expect(rules.map((rule) => rule.id)).toEqual([0, 1, 2]);
      for (const rule of rules) {
        expect(rule.declarations).toEqual([{ property: "color", value: "red", important: false }]);
        expect(rule.specificity).toBe(1);
        expect(rule.selectorListId).toBe(0);
      }
    });

    it("gives a lone selector no list id", () => {
      const [rule] = rulesOf(parseCss("h1 { color: red }").entries);
      expect(rule?.selectorListId).toBeNull();
    });

    it("keeps commas inside attribute selectors and functions", () => {
      const rules = rulesOf(parseCss('a[title="x,y"], p:is(.a, .b) { color: red }').entries);
      expect(rules.map((rule) => rule.selector)).toEqual(['a[title="x,y"]', "p:is(.a, .b)"]);
    });

    it("collapses whitespace in selectors", () => {
      const [rule] = rulesOf(parseCss("ul \n\t  li   >  a { color: red }").entries);
      expect(rule?.selector).toBe("ul li > a");
    });
  });

  describe("declarations", () => {
    it("lowercases property names and keeps values verbatim", () => {
      const [rule] = rulesOf(parseCss("a { COLOR: Red;  Font-Family:  'Open Sans' , serif }").entries);
      expect(rule?.declarations).toEqual([
        { property: "color", value: "Red", important: false },
        { property: "font-family", value: "'Open Sans' , serif", important: false },
      ]);
    });

    it("lifts !important into a flag", () => {
      const [rule] = rulesOf(parseCss("a { color: red ! IMPORTANT; margin: 0 }").entries);
      expect(rule?.declarations).toEqual([
        { property: "color", value: "red", important: true },
        { property: "margin", value: "0", important: false },
      ]);
    });

    it("does not split on semicolons inside url()", () => {
      const [rule] = rulesOf(
        parseCss("a { background: url(data:image/png;base64,AAA=) no-repeat; color: red }").entries,
      );
      expect(rule?.declarations.map((d) => d.value)).toEqual([
        "url(data:image/png;base64,AAA=) no-repeat",
        "red",
      ]);
    });

    it("ignores braces and semicolons inside strings", () => {
      const [rule] = rulesOf(parseCss('a[title="{x}"] { content: "};"; color: red }').entries);
      expect(rule?.selector).toBe('a[title="{x}"]');
      expect(rule?.specificity).toBe(11);
      expect(rule?.declarations.map((d) => [d.property, d.value])).toEqual([
        ["content", '"};"'],
        ["color", "red"],
      ]);
    });

    it("removes comments from values", () => {
      const [rule] = rulesOf(parseCss("a { color: /* note */ red; /* gap */ margin: 0 }").entries);
      expect(rule?.declarations.map((d) => [d.property, d.value])).toEqual([
        ["color", "red"],
        ["margin", "0"],
      ]);
    });

    it("keeps comment markers inside strings", () => {
      const [rule] = rulesOf(parseCss('a { content: "/* not a comment */" }').entries);
      expect(rule?.declarations[0]?.value).toBe('"/* not a comment */"');
    });

    it("keeps an empty rule", () => {
      const rules = rulesOf(parseCss("a { }").entries);
      expect(rules).toHaveLength(1);
      expect(rules[0]?.declarations).toEqual([]);
    });
  });

  describe("nesting", () => {
    it("resolves explicit and implicit nested selectors", () => {
      const rules = rulesOf(
        parseCss(".card { color: red; &:hover { color: blue } .title { font-weight: bold } }").entries,
      );

      expect(rules.map((rule) => [rule.id, rule.selector, rule.parentRuleId, rule.nestingStyle])).toEqual([
        [0, ".card", null, null],
        [1, ".card:hover", 0, "explicit"],
        [2, ".card .title", 0, "implicit"],
      ]);
      expect(rules[0]?.declarations).toEqual([{ property: "color", value: "red", important: false }]);
      expect(rules[1]?.specificity).toBe(20);
    });

    it("writes a leading combinator between parent and child", () => {
      const rules = rulesOf(parseCss(".list { > li { margin: 0 } }").entries);
      expect(rules.map((rule) => rule.selector)).toEqual([".list", ".list > li"]);
    });

    it("expands nested lists against every parent", () => {
      const rules = rulesOf(parseCss(".a, .b { .x, .y { color: red } }").entries);
      expect(rules.map((rule) => [rule.selector, rule.parentRuleId])).toEqual([
        [".a", null],
        [".b", null],
        [".a .x", 0],
        [".a .y", 0],
        [".b .x", 1],
        [".b .y", 1],
      ]);
    });

    it("tags a nested @media with the parent selector", () => {
      const { entries, mediaQueries } = parseCss(".a { color: red; @media print { color: blue } }");
      const rules = rulesOf(entries);

      expect(rules.map((rule) => [rule.selector, rule.parentRuleId, rule.mediaQueryId])).toEqual([
        [".a", null, null],
        [".a", 0, 0],
      ]);
      expect(rules[1]?.declarations).toEqual([{ property: "color", value: "blue", important: false }]);
      expect(mediaQueries.textOf(0)).toBe("print");
    });
  });

  describe("media queries", () => {
    it("combines nested @media conditions", () => {
      const { entries, mediaQueries } = parseCss(
        "@media screen { @media (min-width: 500px) { body { color: red } } }",
      );

      expect(rulesOf(entries).map((rule) => rule.selector)).toEqual(["body"]);
      expect(mediaQueries.list).toEqual([
        {
          id: 0,
          type: "screen",
          conditions: "(min-width: 500px)",
          text: "screen and (min-width: 500px)",
          types: ["screen"],
        },
      ]);
    });

    it("normalizes feature spacing", () => {
      const { mediaQueries } = parseCss("@media screen and (max-width:600px) { a { color: red } }");
      expect(mediaQueries.textOf(0)).toBe("screen and (max-width: 600px)");
    });

    it("interns one query per distinct condition", () => {
      const { entries } = parseCss(
        "@media print { a { color: red } } @media print { b { color: blue } } @media screen { c { color: green } }",
      );
      expect(rulesOf(entries).map((rule) => rule.mediaQueryId)).toEqual([0, 0, 1]);
    });

    it("applies the media option to every rule", () => {
      const { entries, mediaQueries } = parseCss("a { color: red } @media (min-width: 10px) { b { color: blue } }", {
        media: "print",
      });
      expect(rulesOf(entries).map((rule) => mediaQueries.textOf(rule.mediaQueryId))).toEqual([
        "print",
        "print and (min-width: 10px)",
      ]);
    });
  });

  describe("at-rules", () => {
    it("flattens conditional group rules into plain rules", () => {
      const { entries } = parseCss(
        "@layer utilities { .padding { padding: 1rem } } @supports (display: grid) { .grid { display: grid } } @layer a, b;",
      );
      expect(entries.map((entry) => [entry.kind, entry.selector, entry.mediaQueryId])).toEqual([
        ["rule", ".padding", null],
        ["rule", ".grid", null],
      ]);
    });

    it("keeps descriptor at-rules as opaque entries", () => {
      const { entries } = parseCss(
        '@font-face { font-family: "Test"; src: url(test.woff) } @keyframes spin { from { transform: rotate(0deg) } to { transform: rotate(360deg) } }',
      );
      const [fontFace, keyframes] = atRulesOf(entries);

      expect(fontFace?.selector).toBe("@font-face");
      expect(fontFace?.atRuleType).toBe("font_face");
      expect(fontFace?.content).toEqual({
        kind: "declarations",
        declarations: [
          { property: "font-family", value: '"Test"', important: false },
          { property: "src", value: "url(test.woff)", important: false },
        ],
      });

      expect(keyframes?.selector).toBe("@keyframes spin");
      expect(keyframes?.atRuleType).toBe("keyframes");
      expect(keyframes?.content.kind).toBe("rules");
      if (keyframes?.content.kind === "rules") {
        expect(keyframes.content.rules.map((rule) => [rule.selector, rule.declarations[0]?.value])).toEqual([
          ["from", "rotate(0deg)"],
          ["to", "rotate(360deg)"],
        ]);
      }
    });

    it("recognizes vendor keyframes and the other descriptor types", () => {
      const { entries } = parseCss(
        "@-webkit-keyframes pulse { 0% { opacity: 0 } } @page :first { margin: 1in } @property --x { syntax: '<length>'; inherits: false } @counter-style thumbs { symbols: a }",
      );
      expect(atRulesOf(entries).map((entry) => [entry.selector, entry.atRuleType])).toEqual([
        ["@-webkit-keyframes pulse", "keyframes"],
        ["@page :first", "page"],
        ["@property --x", "property"],
        ["@counter-style thumbs", "counter_style"],
      ]);
    });

    it("keeps descriptors written beside nested blocks", () => {
      const { entries } = parseCss('@page :first { margin: 1in; @top-left { content: "x" } size: A4 }');
      expect(atRulesOf(entries)[0]?.content).toEqual({
        kind: "rules",
        declarations: [
          { property: "margin", value: "1in", important: false },
          { property: "size", value: "A4", important: false },
        ],
        rules: [
          {
            kind: "rule",
            id: 0,
            selector: "@top-left",
            declarations: [{ property: "content", value: '"x"', important: false }],
            specificity: 0,
            parentRuleId: null,
            nestingStyle: null,
            selectorListId: null,
            mediaQueryId: null,
          },
        ],
      });
    });

    it("ignores stray declarations between keyframe blocks", () => {
      const { entries } = parseCss("@keyframes k { color: red; from { opacity: 0 } }");
      expect(atRulesOf(entries)[0]?.content).toMatchObject({ kind: "rules", declarations: [] });
    });

    it("keeps the media of an at-rule inside @media", () => {
      const { entries, mediaQueries } = parseCss("@media print { @font-face { font-family: x } }");
      expect(mediaQueries.textOf(entries[0]?.mediaQueryId ?? null)).toBe("print");
    });

    it("captures the first @charset", () => {
      const result = parseCss('@charset "UTF-8"; @charset "ISO-8859-1"; a { color: red }');
      expect(result.charset).toBe("UTF-8");
      expect(result.entries).toHaveLength(1);
    });

    it("records imports and drops them", () => {
      const result = parseCss('@import url("base.css") screen; a { color: red } @import "late.css";');
      expect(result.imports).toEqual([{ url: "base.css", media: "screen" }]);
      expect(result.warnings.map((warning) => warning.type)).toEqual([
        "Dropped @import because imports are disabled",
        "Dropped @import that follows other rules",
      ]);
      expect(result.entries).toHaveLength(1);
    });
  });

  describe("error handling", () => {
    it("ends a string at a newline so later rules survive", () => {
      const result = parseCss('a { content: "abc;\n  color: red; }\nb { color: blue }');
      expect(rulesOf(result.entries).map((rule) => [rule.selector, rule.declarations.length])).toEqual([
        ["a", 0],
        ["b", 1],
      ]);
      expect(result.warnings).toEqual([
        {
          severity: "warning",
          type: "Dropped malformed declaration",
          loc: { line: 1, column: 5 },
          context: { message: "Malformed declaration: unterminated string in 'content'" },
        },
      ]);
    });

    it("recovers the blocks after a string broken by a newline", () => {
      const { entries } = parseCss('a { content: "abc; }\nb { color: red }\nc { color: blue }');
      expect(rulesOf(entries).map((rule) => rule.selector)).toEqual(["a", "a c"]);
    });

    it("drops an empty value in lenient mode and records where it was", () => {
      const result = parseCss("h1 { color: ; margin: 0 }");
      expect(rulesOf(result.entries)[0]?.declarations).toEqual([
        { property: "margin", value: "0", important: false },
      ]);
      expect(result.warnings).toEqual([
        {
          severity: "warning",
          type: "Dropped declaration with an empty value",
          loc: { line: 1, column: 6 },
          context: { message: "Empty value for property 'color'" },
        },
      ]);
    });

    it("raises the first empty value in strict mode", () => {
      let caught: unknown;
      try {
        parseCss("h1 { color: ; }", { raiseParseErrors: true });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ParseError);
      if (caught instanceof ParseError) {
        expect(caught.errorType).toBe("empty_value");
        expect(caught.line).toBe(1);
        expect(caught.column).toBe(6);
        expect(caught.message).toBe("Empty value for property 'color' at line 1, column 6");
      }
    });

    it("treats a value of only !important as empty", () => {
      expect(() => parseCss("a { color: !important }", { raiseParseErrors: true })).toThrowError(
        "Empty value for property 'color'",
      );
    });

    it("reports lines after the first", () => {
      expect(() => parseCss("a {\n  color red;\n}", { raiseParseErrors: true })).toThrowError(
        "Malformed declaration: missing colon in 'color red' at line 2, column 3",
      );
    });

    it("only raises the kinds that are switched on", () => {
      const css = "a { color: ; } b { width }";
      expect(() => parseCss(css, { raiseParseErrors: { malformedDeclarations: true } })).toThrowError(
        /Malformed declaration/,
      );
      const result = parseCss(css, { raiseParseErrors: { malformedAtRules: true } });
      expect(result.warnings.map((warning) => warning.type)).toEqual([
        "Dropped declaration with an empty value",
        "Dropped malformed declaration",
      ]);
    });

    it("drops rules with an empty selector", () => {
      const result = parseCss("{ color: red } a { color: blue }");
      expect(result.entries.map((entry) => entry.selector)).toEqual(["a"]);
      expect(result.warnings[0]?.type).toBe("Dropped rule with an invalid selector");
    });

    it("raises a selector starting with a combinator", () => {
      expect(() => parseCss("> a { color: red }", { raiseParseErrors: { invalidSelectors: true } })).toThrowError(
        "Invalid selector: '> a' starts with a combinator at line 1, column 1",
      );
    });

    it("rejects a whole list when one member has invalid syntax", () => {
      expect(() =>
        parseCss("a, b..c { color: red }", { raiseParseErrors: { invalidSelectorSyntax: true } }),
      ).toThrowError("Invalid selector syntax: 'b..c' contains invalid characters");
    });

    it("accepts pseudo-classes, pseudo-elements and attribute selectors in strict mode", () => {
      const { entries } = parseCss(
        "a:not(.b)::before, li:nth-child(2n+1), [data-x='--y'] { color: red }",
        { raiseParseErrors: true },
      );
      expect(entries).toHaveLength(3);
    });

    it("reports @media without a query", () => {
      expect(() => parseCss("@media { a { color: red } }", { raiseParseErrors: true })).toThrowError(
        "Malformed @media: missing media query at line 1, column 1",
      );
      expect(parseCss("@media { a { color: red } } b { color: blue }").entries.map((e) => e.selector)).toEqual([
        "b",
      ]);
    });

    it("reports @supports without a condition", () => {
      expect(() => parseCss("@supports { a { color: red } }", { raiseParseErrors: true })).toThrowError(
        "Malformed @supports: missing condition",
      );
    });

    it("closes an unterminated block in lenient mode", () => {
      const result = parseCss("a { color: red");
      expect(rulesOf(result.entries)[0]?.declarations).toEqual([
        { property: "color", value: "red", important: false },
      ]);
      expect(result.warnings.map((warning) => warning.type)).toEqual(["Closed unterminated block at end of input"]);
    });

    it("raises an unterminated block unless braces are fixed", () => {
      expect(() => parseCss("a { color: red", { raiseParseErrors: { unclosedBlocks: true } })).toThrowError(
        "Unclosed block: missing closing brace at line 1, column 3",
      );
      const fixed = parseCss("a { color: red", { raiseParseErrors: true, fixBraces: true });
      expect(fixed.entries).toHaveLength(1);
      expect(fixed.warnings).toEqual([]);
    });

    it("limits nesting depth", () => {
      const deep = `${"@media a { ".repeat(12)}b { c: d }${" }".repeat(12)}`;
      expect(() => parseCss(deep)).toThrowError(DepthError);
      expect(() => parseCss(deep)).toThrowError("CSS nesting too deep: exceeded maximum depth of 10");

      const shallow = `${"@media a { ".repeat(3)}b { c: d }${" }".repeat(3)}`;
      expect(parseCss(shallow).entries).toHaveLength(1);
    });
  });

  it("continues ids and list ids from the given offsets", () => {
    const result = parseCss("a, b { color: red }", { firstId: 5, firstSelectorListId: 2 });
    expect(result.entries.map((entry) => entry.id)).toEqual([5, 6]);
    expect(rulesOf(result.entries).map((rule) => rule.selectorListId)).toEqual([2, 2]);
    expect(result.nextSelectorListId).toBe(3);
  });
});

import { describe, it, expect } from "vitest";
import {
  calculateSpecificity,
  resolveNestedSelector,
  splitSelectorList,
  validateSelectorList,
} from "../internal/selectors.js";

describe("calculateSpecificity", () => {
  it.each([
    ["*", 0],
    ["a", 1],
    [".item", 10],
    ["[type=text]", 10],
    ["#nav .item a:hover", 121],
    ["a::before", 2],
    ["a:before", 2],
    ["ul > li + li", 3],
  ])("scores %s as %i", (selector, expected) => {
    expect(calculateSpecificity(selector)).toBe(expected);
  });

  it("takes the most specific argument of :not, :is and :has", () => {
    expect(calculateSpecificity(":not(#a)")).toBe(100);
    expect(calculateSpecificity("li:is(.a, #b)")).toBe(101);
    expect(calculateSpecificity("div:has(> img)")).toBe(2);
  });

  it("scores :where as zero", () => {
    expect(calculateSpecificity("a:where(#x, .y)")).toBe(1);
  });

  it("scores a list as its most specific member", () => {
    expect(calculateSpecificity("h1, #x")).toBe(100);
  });

  it("scores unparseable selectors as zero", () => {
    expect(calculateSpecificity("a[")).toBe(0);
  });
});

describe("splitSelectorList", () => {
  it("splits on top-level commas only", () => {
    expect(splitSelectorList(" h1 , a[title='x,y'] , :is(.a, .b) ")).toEqual([
      "h1",
      "a[title='x,y']",
      ":is(.a, .b)",
    ]);
  });
});

describe("resolveNestedSelector", () => {
  it("substitutes & with the parent", () => {
    expect(resolveNestedSelector(".card", "&:hover")).toEqual({
      selector: ".card:hover",
      nestingStyle: "explicit",
    });
    expect(resolveNestedSelector(".card", ".dark &")).toEqual({
      selector: ".dark .card",
      nestingStyle: "explicit",
    });
  });

  it("ignores & inside attribute values and escapes", () => {
    expect(resolveNestedSelector(".a", '[data-x="&"]')).toEqual({
      selector: '.a [data-x="&"]',
      nestingStyle: "implicit",
    });
    expect(resolveNestedSelector(".a", "&[title='a&b'] .b\\&c")).toEqual({
      selector: ".a[title='a&b'] .b\\&c",
      nestingStyle: "explicit",
    });
  });

  it("makes bare selectors descendants", () => {
    expect(resolveNestedSelector(".card", "> p")).toEqual({ selector: ".card > p", nestingStyle: "implicit" });
    expect(resolveNestedSelector(".card", ".title")).toEqual({
      selector: ".card .title",
      nestingStyle: "implicit",
    });
  });
});

describe("validateSelectorList", () => {
  it("rejects empty selectors and empty list members", () => {
    expect(validateSelectorList("  ")).toEqual({
      type: "invalid_selector",
      message: "Invalid selector: selector is empty",
    });
    expect(validateSelectorList("a, , b")).toEqual({
      type: "invalid_selector_syntax",
      message: "Invalid selector syntax: empty selector in list 'a, , b'",
    });
  });

  it("rejects a string broken by a newline", () => {
    expect(validateSelectorList('a[title="x\ny"]')).toEqual({
      type: "invalid_selector_syntax",
      message: "Invalid selector syntax: unterminated string",
    });
  });

  it("rejects a leading combinator unless the selector is relative", () => {
    expect(validateSelectorList("> a")?.message).toBe("Invalid selector: '> a' starts with a combinator");
    expect(validateSelectorList("> a", { relative: true })).toBeNull();
  });

  it("checks characters only when asked", () => {
    expect(validateSelectorList("b..c")).toBeNull();
    expect(validateSelectorList("b..c", { checkSyntax: true })).toEqual({
      type: "invalid_selector_syntax",
      message: "Invalid selector syntax: 'b..c' contains invalid characters",
    });
    expect(validateSelectorList("a!b", { checkSyntax: true })?.type).toBe("invalid_selector_syntax");
  });

  it("accepts common selector syntax", () => {
    expect(
      validateSelectorList("a:hover::before, input[type='a,b'], ul > li ~ p, *|div, .\\31 0", {
        checkSyntax: true,
      }),
    ).toBeNull();
  });
});

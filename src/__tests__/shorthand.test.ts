import { describe, it, expect } from "vitest";
import { parseDeclarations } from "../css/declarations.js";
import {
  collapseShorthands,
  expandBorderSide,
  expandDeclarations,
  expandShorthand,
  getLonghandProperties,
  isShorthandProperty,
  splitValue,
} from "../css/shorthand.js";
import { cascade } from "../cascade.js";
import { formatDeclaration } from "../internal/css-ir.js";
import { ShorthandInputError } from "../internal/errors.js";

const collapsed = (css: string) => collapseShorthands(parseDeclarations(css)).map(formatDeclaration);

describe("splitValue", () => {
  it("keeps functions whole", () => {
    expect(splitValue("calc(100% - 20px) 5px")).toEqual(["calc(100% - 20px)", "5px"]);
  });

  it("keeps a slash attached unless spaced", () => {
    expect(splitValue("14px/1.5 Arial, serif")).toEqual(["14px/1.5", "Arial,", "serif"]);
    expect(splitValue("center / cover")).toEqual(["center", "/", "cover"]);
  });

  it("rejects oversized input", () => {
    expect(() => splitValue("a".repeat(65_537), "margin")).toThrowError(ShorthandInputError);
  });
});

describe("expandShorthand", () => {
  it("applies the 1/2/3/4 value rule", () => {
    expect(expandShorthand("margin", "10px")).toEqual({
      "margin-top": "10px",
      "margin-right": "10px",
      "margin-bottom": "10px",
      "margin-left": "10px",
    });
    expect(expandShorthand("padding", "10px 20px")).toEqual({
      "padding-top": "10px",
      "padding-right": "20px",
      "padding-bottom": "10px",
      "padding-left": "20px",
    });
    expect(expandShorthand("margin", "1px 2px 3px")).toEqual({
      "margin-top": "1px",
      "margin-right": "2px",
      "margin-bottom": "3px",
      "margin-left": "2px",
    });
    expect(expandShorthand("border-color", "red green blue black")).toEqual({
      "border-top-color": "red",
      "border-right-color": "green",
      "border-bottom-color": "blue",
      "border-left-color": "black",
    });
  });

  it("treats calc() as one token", () => {
    expect(expandShorthand("margin", "calc(100% - 20px) 5px")).toEqual({
      "margin-top": "calc(100% - 20px)",
      "margin-right": "5px",
      "margin-bottom": "calc(100% - 20px)",
      "margin-left": "5px",
    });
  });

  it("matches property names case-insensitively and carries !important", () => {
    expect(expandShorthand("MARGIN", "10px 20px !important")).toEqual({
      "margin-top": "10px !important",
      "margin-right": "20px !important",
      "margin-bottom": "10px !important",
      "margin-left": "20px !important",
    });
  });

  it("returns null for other properties", () => {
    expect(expandShorthand("color", "red")).toBeNull();
  });

  it("expands border onto every side", () => {
    const expanded = expandShorthand("border", "2px solid red");
    expect(Object.keys(expanded ?? {})).toHaveLength(12);
    expect(expanded?.["border-left-color"]).toBe("red");
    expect(expanded?.["border-top-width"]).toBe("2px");
    expect(expanded?.["border-bottom-style"]).toBe("solid");
  });

  it("expands one border side", () => {
    expect(expandShorthand("border-top", "1px dashed #333")).toEqual({
      "border-top-width": "1px",
      "border-top-style": "dashed",
      "border-top-color": "#333",
    });
    expect(() => expandBorderSide("middle", "1px")).toThrowError(ShorthandInputError);
  });

  it("expands font", () => {
    expect(expandShorthand("font", "italic bold 14px/1.5 'Helvetica Neue', sans-serif")).toEqual({
      "font-style": "italic",
      "font-variant": "normal",
      "font-weight": "bold",
      "font-size": "14px",
      "line-height": "1.5",
      "font-family": "'Helvetica Neue', sans-serif",
    });
  });

  it("reads a numeric font weight before the size", () => {
    expect(expandShorthand("font", "700 12px Arial")).toMatchObject({
      "font-weight": "700",
      "font-size": "12px",
      "font-family": "Arial",
    });
  });

  it("expands background with position and size", () => {
    expect(expandShorthand("background", "url(img.png) no-repeat center / cover")).toEqual({
      "background-color": "transparent",
      "background-image": "url(img.png)",
      "background-repeat": "no-repeat",
      "background-attachment": "scroll",
      "background-position": "center",
      "background-size": "cover",
    });
  });

  it("expands a color-only background with defaults", () => {
    expect(expandShorthand("background", "#fff")).toEqual({
      "background-color": "#fff",
      "background-image": "none",
      "background-repeat": "repeat",
      "background-attachment": "scroll",
      "background-position": "0% 0%",
    });
  });

  it("expands list-style", () => {
    expect(expandShorthand("list-style", "square inside")).toEqual({
      "list-style-type": "square",
      "list-style-position": "inside",
    });
  });

  it("rejects oversized values", () => {
    expect(() => expandShorthand("margin", "1px ".repeat(20_000))).toThrowError(ShorthandInputError);
  });
});

describe("shorthand lookup", () => {
  it("knows the longhands of each shorthand", () => {
    expect(isShorthandProperty("MARGIN")).toBe(true);
    expect(isShorthandProperty("color")).toBe(false);
    expect(getLonghandProperties("list-style")).toEqual([
      "list-style-type",
      "list-style-position",
      "list-style-image",
    ]);
  });
});

describe("expandDeclarations", () => {
  it("expands in place and keeps the important flag", () => {
    const expanded = expandDeclarations(parseDeclarations("color: red; margin: 0 !important"));
    expect(expanded.map(formatDeclaration)).toEqual([
      "color: red",
      "margin-top: 0 !important",
      "margin-right: 0 !important",
      "margin-bottom: 0 !important",
      "margin-left: 0 !important",
    ]);
  });
});

describe("collapseShorthands", () => {
  it("collapses four equal sides to one value", () => {
    expect(
      collapsed("margin-top: 10px; margin-right: 10px; margin-bottom: 10px; margin-left: 10px"),
    ).toEqual(["margin: 10px"]);
  });

  it("uses the shortest side form", () => {
    expect(
      collapsed("padding-top: 1px; padding-right: 2px; padding-bottom: 1px; padding-left: 2px"),
    ).toEqual(["padding: 1px 2px"]);
  });

  it("leaves partial and mixed-importance sets alone", () => {
    expect(collapsed("margin-top: 1px; margin-right: 1px; margin-bottom: 1px")).toEqual([
      "margin-top: 1px",
      "margin-right: 1px",
      "margin-bottom: 1px",
    ]);
    expect(
      collapsed("margin-top: 1px !important; margin-right: 1px; margin-bottom: 1px; margin-left: 1px"),
    ).toHaveLength(4);
  });

  it("appends the shorthand after the other declarations", () => {
    expect(
      collapsed("margin-top: 0; color: red; margin-right: 0; margin-bottom: 0; margin-left: 0"),
    ).toEqual(["color: red", "margin: 0"]);
  });

  it("collapses a uniform border", () => {
    const longhands = expandDeclarations(parseDeclarations("border: 1px solid red"));
    expect(collapseShorthands(longhands).map(formatDeclaration)).toEqual(["border: 1px solid red"]);
  });

  it("falls back to per-property border shorthands", () => {
    const longhands = expandDeclarations(
      parseDeclarations("border: 1px solid blue; border-top-color: red"),
    );
    const resolved = cascade([{ declarations: longhands, specificity: 0 }]);
    expect(resolved.map(formatDeclaration)).toEqual([
      "border-width: 1px",
      "border-style: solid",
      "border-color: red blue blue",
    ]);
  });

  it("collapses font and drops normal values when complete", () => {
    expect(
      collapsed(
        "font-style: normal; font-variant: normal; font-weight: bold; font-size: 14px; line-height: normal; font-family: Arial",
      ),
    ).toEqual(["font: bold 14px Arial"]);
    expect(collapsed("font-size: 14px; line-height: 1.2")).toEqual([
      "font-size: 14px",
      "line-height: 1.2",
    ]);
  });

  it("collapses background", () => {
    expect(collapsed("background-color: red; background-image: url(a.png)")).toEqual([
      "background: red url(a.png)",
    ]);
    expect(
      collapsed(
        "background-color: transparent; background-image: none; background-repeat: repeat; background-attachment: scroll; background-position: 0% 0%",
      ),
    ).toEqual(["background: none"]);
  });

  it("collapses list-style", () => {
    expect(collapsed("list-style-type: disc; list-style-position: inside")).toEqual([
      "list-style: disc inside",
    ]);
  });
});

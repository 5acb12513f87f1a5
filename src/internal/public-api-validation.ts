import type { StylesheetOptions } from "./options.js";
import { PARSE_ERROR_TOGGLE_KEYS } from "./options.js";

export function describeValue(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (value === undefined) {
    return "undefined";
  }
  if (Array.isArray(value)) {
    return `Array(${value.length})`;
  }
  if (typeof value === "string") {
    return `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  if (typeof value === "symbol") {
    return value.description ? `Symbol(${value.description})` : "Symbol()";
  }
  if (typeof value === "function") {
    return "[Function]";
  }
  if (typeof value === "object") {
    const ctor = Object.getPrototypeOf(value)?.constructor?.name ?? "Object";
    const keys = Object.keys(value);
    const preview = keys.slice(0, 5).join(", ");
    const suffix = keys.length > 5 ? ", ..." : "";
    return keys.length ? `${ctor} { ${preview}${suffix} }` : ctor;
  }
  return "[Unknown]";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalOfType(
  options: Record<string, unknown>,
  key: string,
  type: "string" | "boolean",
  where: string,
): void {
  const value = options[key];
  if (value === undefined || value === null || typeof value === type) {
    return;
  }
  throw new TypeError(
    [`${where}: option "${key}" must be a ${type}.`, `Received: ${key}=${describeValue(value)}`].join(
      "\n",
    ),
  );
}

function assertStringList(value: unknown, key: string, where: string): void {
  if (value === undefined) {
    return;
  }
  if (!Array.isArray(value) || value.some((entry) => typeof entry !== "string")) {
    throw new TypeError(
      [
        `${where}: import.${key} must be an array of strings.`,
        `Received: ${key}=${describeValue(value)}`,
      ].join("\n"),
    );
  }
}

/**
 * Runtime check for options handed in from untyped callers.
 */
export function assertValidOptions(
  candidate: unknown,
  where: string,
): asserts candidate is StylesheetOptions {
  if (candidate === undefined) {
    return;
  }
  if (!isRecord(candidate)) {
    throw new TypeError(
      [`${where}: expected an options object.`, `Received: ${describeValue(candidate)}`].join("\n"),
    );
  }

  optionalOfType(candidate, "baseUri", "string", where);
  optionalOfType(candidate, "baseDir", "string", where);
  optionalOfType(candidate, "source", "string", where);
  optionalOfType(candidate, "absolutePaths", "boolean", where);
  optionalOfType(candidate, "fixBraces", "boolean", where);
  optionalOfType(candidate, "logWarnings", "boolean", where);

  const raise = candidate.raiseParseErrors;
  if (raise !== undefined && typeof raise !== "boolean") {
    if (!isRecord(raise)) {
      throw new TypeError(
        [
          `${where}: option "raiseParseErrors" must be a boolean or an object.`,
          `Received: raiseParseErrors=${describeValue(raise)}`,
        ].join("\n"),
      );
    }
    const unknownKeys = Object.keys(raise).filter((key) => !PARSE_ERROR_TOGGLE_KEYS.includes(key));
    if (unknownKeys.length > 0) {
      throw new TypeError(
        [
          `${where}: unknown raiseParseErrors key(s): ${unknownKeys.join(", ")}.`,
          `Known keys: ${PARSE_ERROR_TOGGLE_KEYS.join(", ")}`,
        ].join("\n"),
      );
    }
  }

  const imports = candidate.import;
  if (imports !== undefined && typeof imports !== "boolean") {
    if (!isRecord(imports)) {
      throw new TypeError(
        [
          `${where}: option "import" must be a boolean or an object.`,
          `Received: import=${describeValue(imports)}`,
          "",
          "Expected shape:",
          "  {",
          "    maxDepth?: number,",
          '    allowedSchemes?: ["https", "file"],',
          '    extensions?: ["css"],',
          "    fetcher?: (url, context) => string",
          "  }",
        ].join("\n"),
      );
    }
    if (
      imports.maxDepth !== undefined &&
      (typeof imports.maxDepth !== "number" || !Number.isInteger(imports.maxDepth) || imports.maxDepth < 0)
    ) {
      throw new TypeError(
        [
          `${where}: import.maxDepth must be a non-negative integer.`,
          `Received: maxDepth=${describeValue(imports.maxDepth)}`,
        ].join("\n"),
      );
    }
    assertStringList(imports.allowedSchemes, "allowedSchemes", where);
    assertStringList(imports.extensions, "extensions", where);
    if (imports.fetcher !== undefined && typeof imports.fetcher !== "function") {
      throw new TypeError(
        [
          `${where}: import.fetcher must be a function.`,
          `Received: fetcher=${describeValue(imports.fetcher)}`,
        ].join("\n"),
      );
    }
  }
}

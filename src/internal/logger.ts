import { readFileSync } from "node:fs";
import type { ParseErrorType } from "./errors.js";

type Severity = "info" | "warning" | "error";

export type WarningType =
  | "Dropped declaration with an empty value"
  | "Dropped malformed declaration"
  | "Dropped rule with an invalid selector"
  | "Dropped rule list with invalid selector syntax"
  | "Dropped at-rule with a missing prelude"
  | "Closed unterminated block at end of input"
  | "Dropped @import that follows other rules"
  | "Dropped @import because imports are disabled"
  | "Dropped declaration exceeding the property size limits"
  | "Could not resolve url() against the base URI";

export const WARNING_FOR_PARSE_ERROR: Record<ParseErrorType, WarningType> = {
  empty_value: "Dropped declaration with an empty value",
  malformed_declaration: "Dropped malformed declaration",
  invalid_selector: "Dropped rule with an invalid selector",
  invalid_selector_syntax: "Dropped rule list with invalid selector syntax",
  malformed_at_rule: "Dropped at-rule with a missing prelude",
  unclosed_block: "Closed unterminated block at end of input",
};

export interface WarningLog {
  severity: Severity;
  type: WarningType;
  loc: { line: number; column: number } | null | undefined;
  context?: Record<string, unknown>;
}

export interface CollectedWarning extends WarningLog {
  source: string;
}

// ────────────────────────────────────────────────────────────────────────────
// Logger
// ────────────────────────────────────────────────────────────────────────────

export class Logger {
  /**
   * Write an error to stdout as "Error source:line:column\nmessage".
   */
  public static logError(
    message: string,
    source: string,
    loc?: { line: number; column: number },
    context?: unknown,
  ): void {
    const label = Logger.colorize("Error", ERROR_BG_COLOR, ERROR_TEXT_COLOR);
    Logger.writeBlock(`${label} ${formatLocation(source, loc)}\n${message}`, context);
  }

  /**
   * Record the warnings of one parse and echo them to stdout.
   */
  public static logWarnings(warnings: readonly WarningLog[], source: string): void {
    for (const warning of warnings) {
      Logger.collected.push({ ...warning, source });
      const label = Logger.severityLabel(warning.severity);
      Logger.writeBlock(
        `${label} ${formatLocation(source, warning.loc)}\n${warning.type}`,
        warning.context,
      );
    }
  }

  public static createReport(): LoggerReport {
    return new LoggerReport([...Logger.collected]);
  }

  /** @internal - for testing only */
  public static _clearCollected(): void {
    Logger.collected = [];
  }

  // -- Internal state

  private static collected: CollectedWarning[] = [];

  private static writeBlock(message: string, context?: unknown): void {
    const body = message.replace(/\s+$/u, "");
    const details = context === undefined ? null : JSON.stringify(context, null, 2);
    process.stdout.write(`${body}${details ? `\n${details}` : ""}\n\n`);
  }

  private static severityLabel(severity: Severity): string {
    switch (severity) {
      case "error":
        return Logger.colorize("Error", ERROR_BG_COLOR, ERROR_TEXT_COLOR);
      case "info":
        return Logger.colorize("Info", INFO_BG_COLOR, INFO_TEXT_COLOR);
      default:
        return Logger.colorize("Warning", WARN_BG_COLOR, WARN_TEXT_COLOR);
    }
  }

  private static colorize(label: string, background: string, text: string): string {
    if (!process.stdout.isTTY) {
      return label;
    }
    return `${background}${text}${label}${RESET_COLOR}`;
  }
}

function formatLocation(
  source: string,
  loc: { line: number; column: number } | null | undefined,
): string {
  return loc ? `${source}:${loc.line}:${loc.column}` : source;
}

// ────────────────────────────────────────────────────────────────────────────
// LoggerReport - groups collected warnings by type
// ────────────────────────────────────────────────────────────────────────────

interface WarningGroup {
  type: WarningType;
  warnings: CollectedWarning[];
}

const MAX_LOCATIONS_PER_GROUP = 10;

export class LoggerReport {
  private readonly warnings: CollectedWarning[];
  private sourceLines = new Map<string, string[] | null>();

  constructor(warnings: CollectedWarning[]) {
    this.warnings = warnings;
  }

  getWarnings(): CollectedWarning[] {
    return this.warnings;
  }

  /**
   * Render the report. Groups are ordered by size, largest first, and each
   * location is followed by a snippet when the source is a readable file.
   */
  toString(): string {
    if (this.warnings.length === 0) {
      return "";
    }

    const groups = this.groupByType();
    const rule = "─".repeat(60);
    const lines: string[] = [
      "",
      rule,
      `Warning Summary: ${this.warnings.length} warning(s) in ${groups.length} category(s)`,
      rule,
    ];

    for (const group of groups) {
      lines.push("", `▸ ${group.type} (${group.warnings.length})`, "");

      const shown = group.warnings.slice(0, MAX_LOCATIONS_PER_GROUP);
      for (const warning of shown) {
        lines.push(`  ${formatLocation(warning.source, warning.loc)}`);
        const snippet = warning.loc ? this.snippetFor(warning.source, warning.loc.line) : null;
        if (snippet) {
          lines.push(snippet);
        }
        lines.push("");
      }

      const hidden = group.warnings.length - shown.length;
      if (hidden > 0) {
        lines.push(`  ... and ${hidden} more location(s)`, "");
      }
    }

    return lines.join("\n");
  }

  print(): void {
    const output = this.toString();
    if (output) {
      const colored = output.replace(
        /▸ (.+?) \((\d+)\)/g,
        `${SECTION_COLOR}▸ $1 ($2)${RESET_COLOR}`,
      );
      process.stdout.write(colored + "\n");
    }
  }

  private groupByType(): WarningGroup[] {
    const groups = new Map<WarningType, WarningGroup>();
    for (const warning of this.warnings) {
      const group = groups.get(warning.type);
      if (group) {
        group.warnings.push(warning);
      } else {
        groups.set(warning.type, { type: warning.type, warnings: [warning] });
      }
    }
    return [...groups.values()].sort((a, b) => b.warnings.length - a.warnings.length);
  }

  private snippetFor(source: string, line: number): string | null {
    const lines = this.linesOf(source);
    const index = line - 1;
    if (!lines || index < 0 || index >= lines.length) {
      return null;
    }
    const out: string[] = [];
    const first = Math.max(0, index - 2);
    const last = Math.min(lines.length - 1, index + 2);
    for (let i = first; i <= last; i++) {
      const marker = i === index ? ">" : " ";
      out.push(`  ${marker} ${String(i + 1).padStart(4, " ")} | ${lines[i]}`);
    }
    return out.join("\n");
  }

  private linesOf(source: string): string[] | null {
    const cached = this.sourceLines.get(source);
    if (cached !== undefined) {
      return cached;
    }
    let lines: string[] | null = null;
    try {
      lines = readFileSync(source, "utf-8").split("\n");
    } catch {
      // Inline sources such as "<inline>" have no file behind them.
      lines = null;
    }
    this.sourceLines.set(source, lines);
    return lines;
  }
}

const WARN_BG_COLOR = "\u001b[43m";
const WARN_TEXT_COLOR = "\u001b[30m";
const ERROR_BG_COLOR = "\u001b[41m";
const ERROR_TEXT_COLOR = "\u001b[37m";
const INFO_BG_COLOR = "\u001b[44m";
const INFO_TEXT_COLOR = "\u001b[37m";
const SECTION_COLOR = "\u001b[36m";
const RESET_COLOR = "\u001b[0m";

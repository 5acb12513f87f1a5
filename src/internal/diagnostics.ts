import { ParseError, type ParseErrorType } from "./errors.js";
import { WARNING_FOR_PARSE_ERROR, type WarningLog, type WarningType } from "./logger.js";
import { LineIndex } from "./scan.js";

/**
 * Routes parse problems for one source text: a kind enabled in `raise`
 * throws a `ParseError`, every other problem becomes a warning.
 */
export class Diagnostics {
  readonly warnings: WarningLog[] = [];
  private lines: LineIndex | null = null;

  constructor(
    private readonly source: string,
    private readonly raise: Readonly<Record<ParseErrorType, boolean>>,
  ) {}

  isStrict(type: ParseErrorType): boolean {
    return this.raise[type];
  }

  report(type: ParseErrorType, message: string, offset: number): void {
    const loc = this.locate(offset);
    if (this.raise[type]) {
      throw new ParseError(message, type, loc);
    }
    this.warnings.push({
      severity: "warning",
      type: WARNING_FOR_PARSE_ERROR[type],
      loc,
      context: { message },
    });
  }

  warn(type: WarningType, offset: number, context?: Record<string, unknown>): void {
    this.warnings.push({ severity: "warning", type, loc: this.locate(offset), context });
  }

  locate(offset: number): { line: number; column: number } {
    this.lines ??= new LineIndex(this.source);
    return this.lines.locate(offset);
  }
}

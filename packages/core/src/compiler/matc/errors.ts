/**
 * Error types and formatting for the matc compiler
 */

/** Source location for error reporting */
export interface SourceLocation {
  line: number;
  column: number;
  offset: number;
  /** Unit the location belongs to, when it came from a named file */
  file?: string;
}

/** Source span (start to end) */
export interface SourceSpan {
  start: SourceLocation;
  end: SourceLocation;
}

/** Stage that raised an error */
export type ErrorStage = "lex" | "parse" | "semantic" | "internal";

interface ErrorOptions {
  location?: SourceLocation;
  span?: SourceSpan;
  source?: string;
}

/** Base error class for every compilation failure */
export class MatcError extends Error {
  readonly code: string;
  readonly stage: ErrorStage;
  readonly location?: SourceLocation;
  readonly span?: SourceSpan;
  readonly source?: string;

  constructor(stage: ErrorStage, code: string, message: string, options?: ErrorOptions) {
    super(message);
    this.name = "MatcError";
    this.stage = stage;
    this.code = code;
    this.location = options?.location ?? options?.span?.start;
    this.span = options?.span;
    this.source = options?.source;
  }

  /** Format error with source context */
  format(): string {
    const lines: string[] = [];

    const loc = this.location;
    if (loc) {
      const where = loc.file ? `${loc.file}:${loc.line}:${loc.column}` : `line ${loc.line}, column ${loc.column}`;
      lines.push(`Error [${this.code}] at ${where}:`);
    } else {
      lines.push(`Error [${this.code}]:`);
    }

    lines.push(`  ${this.message}`);

    if (this.source && loc) {
      const sourceLines = this.source.split("\n");
      const lineIdx = loc.line - 1;

      if (lineIdx >= 0 && lineIdx < sourceLines.length) {
        lines.push("");
        lines.push(`  ${loc.line} | ${sourceLines[lineIdx]}`);

        const padding = " ".repeat(String(loc.line).length + 3);
        const pointer = `${" ".repeat(Math.max(0, loc.column - 1))}^`;
        lines.push(`  ${padding}${pointer}`);
      }
    }

    return lines.join("\n");
  }
}

/** Tokenization and preprocessing error */
export class LexError extends MatcError {
  constructor(code: string, message: string, options?: ErrorOptions) {
    super("lex", code, message, options);
    this.name = "LexError";
  }
}

/** Parse error */
export class ParseError extends MatcError {
  constructor(message: string, options?: ErrorOptions) {
    super("parse", "PARSE_ERROR", message, options);
    this.name = "ParseError";
  }
}

/** Semantic (type and scope) error */
export class SemanticError extends MatcError {
  constructor(code: string, message: string, options?: ErrorOptions) {
    super("semantic", code, message, options);
    this.name = "SemanticError";
  }
}

/** Analyzer defect detected during generation or validation */
export class InternalError extends MatcError {
  constructor(message: string, options?: ErrorOptions) {
    super("internal", "INTERNAL_ERROR", `internal error: ${message}`, options);
    this.name = "InternalError";
  }
}

/** Create a source location from line, column, offset */
export function loc(line: number, column: number, offset: number, file?: string): SourceLocation {
  return file === undefined ? { line, column, offset } : { line, column, offset, file };
}

/** Create a source span from start and end locations */
export function span(start: SourceLocation, end: SourceLocation): SourceSpan {
  return { start, end };
}

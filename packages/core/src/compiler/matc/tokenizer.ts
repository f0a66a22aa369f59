/**
 * Layout-preserving tokenizer for matc source
 *
 * Whitespace and line ends are emitted as tokens of their own; the
 * preprocessor needs line boundaries to delimit directive arguments and the
 * parser drops them. Characters that start no token are emitted one at a time
 * as CHAR tokens and left for the parser to reject.
 */

import { LexError, type SourceLocation, loc } from "./errors.js";

// =============================================================================
// TOKEN TYPES
// =============================================================================

export type TokenType =
  // Layout
  | "WHITESPACE"
  | "NEWLINE"
  | "EOF"
  // Literals
  | "INT"
  | "FLOAT"
  | "STRING"
  // Words
  | "IDENTIFIER"
  | "KEYWORD"
  // Preprocessor
  | "DIRECTIVE"
  // Operators
  | "OPERATOR"
  | "ASSIGN"
  // Single-character fallback: punctuation and anything unrecognised
  | "CHAR";

/** Token with location info */
export interface Token {
  type: TokenType;
  value: string;
  location: SourceLocation;
}

/** Reserved lowercase words; user identifiers are uppercase only */
export const KEYWORDS = new Set([
  "int",
  "float",
  "bool",
  "string",
  "void",
  "auto",
  "matrix",
  "if",
  "else",
  "while",
  "for",
  "return",
  "true",
  "false",
  "and",
  "or",
  "not",
  "print",
  "printstr",
  "rows",
  "cols",
]);

/** Preprocessor directive names, matched case-insensitively after '#' */
export const DIRECTIVES = ["INCLUDE", "DEFINE", "UNDEF", "IFDEF", "IFNDEF", "END"] as const;

export type DirectiveName = (typeof DIRECTIVES)[number];

/** Largest integer literal accepted (signed 32-bit) */
export const INT_MAX = 2147483647;

/** Multi-character operators */
const MULTI_CHAR_OPS = ["==", "!=", "<=", ">="];

/** Single-character operators */
const SINGLE_CHAR_OPS = new Set(["+", "-", "*", "/", "<", ">"]);

const DIRECTIVE_SET: ReadonlySet<string> = new Set(DIRECTIVES);

export function isDirectiveName(value: string): value is DirectiveName {
  return DIRECTIVE_SET.has(value);
}

// =============================================================================
// TOKENIZER CLASS
// =============================================================================

export class Tokenizer {
  private readonly source: string;
  private readonly file?: string;
  private pos = 0;
  private line = 1;
  private column = 1;

  constructor(source: string, file?: string) {
    this.source = source;
    this.file = file;
  }

  /** Tokenize the entire source, directives included */
  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      const token = this.next();
      tokens.push(token);
      if (token.type === "EOF") return tokens;
    }
  }

  /** Scan and return the next token; returns EOF repeatedly once exhausted */
  next(): Token {
    for (;;) {
      if (this.atEnd()) {
        return this.make("EOF", "", this.location());
      }

      // Comment: // to end of line
      if (this.current() === "/" && this.peek() === "/") {
        this.skipToLineEnd();
        continue;
      }

      return this.scanToken();
    }
  }

  /**
   * Skip raw text of an excluded conditional region, up to and including the
   * line holding its matching #end. Directives are found wherever a `#`
   * starts outside a string or comment, as in active text; nested
   * #ifdef/#ifndef are counted but nothing in the region is tokenized.
   */
  skipConditionalRegion(opening: SourceLocation): void {
    let depth = 0;

    while (!this.atEnd()) {
      const char = this.current();

      if (char === "/" && this.peek() === "/") {
        this.skipToLineEnd();
        continue;
      }

      if (char === '"') {
        this.advance();
        while (!this.atEnd() && this.current() !== '"' && this.current() !== "\n") {
          this.advance();
        }
        if (this.current() === '"') this.advance();
        continue;
      }

      if (char !== "#") {
        this.advance();
        continue;
      }

      this.advance();
      while (this.current() === " " || this.current() === "\t") {
        this.advance();
      }
      const name = this.readLetters().toUpperCase();
      if (name === "IFDEF" || name === "IFNDEF") {
        depth++;
      } else if (name === "END") {
        if (depth === 0) {
          this.skipToLineEnd();
          if (this.current() === "\n") this.advance();
          return;
        }
        depth--;
      }
    }

    throw new LexError("UNTERMINATED_CONDITIONAL", "Conditional region is missing its #end", {
      location: opening,
      source: this.source,
    });
  }

  // ===========================================================================
  // CURSOR
  // ===========================================================================

  private atEnd(): boolean {
    return this.pos >= this.source.length;
  }

  /** Get current character */
  private current(): string {
    return this.source[this.pos] ?? "";
  }

  /** Peek at next character */
  private peek(offset = 1): string {
    return this.source[this.pos + offset] ?? "";
  }

  /** Advance position and update line/column tracking */
  private advance(): string {
    const char = this.current();
    this.pos++;
    if (char === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return char;
  }

  /** Get current location */
  private location(): SourceLocation {
    return loc(this.line, this.column, this.pos, this.file);
  }

  private make(type: TokenType, value: string, location: SourceLocation): Token {
    return { type, value, location };
  }

  private skipToLineEnd(): void {
    while (!this.atEnd() && this.current() !== "\n") {
      this.advance();
    }
  }

  private readLetters(): string {
    let value = "";
    while (/[A-Za-z]/.test(this.current())) {
      value += this.advance();
    }
    return value;
  }

  // ===========================================================================
  // SCANNING
  // ===========================================================================

  private scanToken(): Token {
    const startLocation = this.location();
    const char = this.current();

    if (char === " " || char === "\t" || char === "\r") {
      let value = "";
      while (this.current() === " " || this.current() === "\t" || this.current() === "\r") {
        value += this.advance();
      }
      return this.make("WHITESPACE", value, startLocation);
    }

    if (char === "\n") {
      this.advance();
      return this.make("NEWLINE", "\n", startLocation);
    }

    if (char === "#") {
      return this.scanDirective(startLocation);
    }

    if (char === '"') {
      return this.scanString(startLocation);
    }

    if (/[0-9]/.test(char)) {
      return this.scanNumber(startLocation);
    }

    if (/[A-Z_]/.test(char)) {
      let value = "";
      while (/[A-Z0-9_]/.test(this.current())) {
        value += this.advance();
      }
      return this.make("IDENTIFIER", value, startLocation);
    }

    if (/[a-z]/.test(char)) {
      const word = this.source.slice(this.pos).match(/^[a-z]+/)?.[0] ?? char;
      if (KEYWORDS.has(word)) {
        for (let i = 0; i < word.length; i++) this.advance();
        return this.make("KEYWORD", word, startLocation);
      }
    }

    for (const op of MULTI_CHAR_OPS) {
      if (this.source.startsWith(op, this.pos)) {
        for (let i = 0; i < op.length; i++) this.advance();
        return this.make("OPERATOR", op, startLocation);
      }
    }

    if (SINGLE_CHAR_OPS.has(char)) {
      this.advance();
      return this.make("OPERATOR", char, startLocation);
    }

    if (char === "=") {
      this.advance();
      return this.make("ASSIGN", "=", startLocation);
    }

    this.advance();
    return this.make("CHAR", char, startLocation);
  }

  /** Scan '#' plus a directive keyword; arguments are tokenized normally */
  private scanDirective(startLocation: SourceLocation): Token {
    this.advance(); // #
    while (this.current() === " " || this.current() === "\t") {
      this.advance();
    }

    const word = this.readLetters();
    if (word.length === 0) {
      throw new LexError("MALFORMED_DIRECTIVE", "Expected a directive name after '#'", {
        location: startLocation,
        source: this.source,
      });
    }

    const name = word.toUpperCase();
    if (!isDirectiveName(name)) {
      throw new LexError("MALFORMED_DIRECTIVE", `Unknown directive '#${word}'`, {
        location: startLocation,
        source: this.source,
      });
    }

    return this.make("DIRECTIVE", name, startLocation);
  }

  /** Scan a string literal; no escapes and no embedded quotes */
  private scanString(startLocation: SourceLocation): Token {
    this.advance(); // opening quote
    let value = "";

    while (!this.atEnd() && this.current() !== '"' && this.current() !== "\n") {
      value += this.advance();
    }

    if (this.current() !== '"') {
      throw new LexError("UNTERMINATED_STRING", "Unterminated string literal", {
        location: startLocation,
        source: this.source,
      });
    }

    this.advance(); // closing quote
    return this.make("STRING", value, startLocation);
  }

  /** Scan an integer (maximal digit run) or a float (digits '.' digits) */
  private scanNumber(startLocation: SourceLocation): Token {
    let value = "";
    while (/[0-9]/.test(this.current())) {
      value += this.advance();
    }

    if (this.current() === "." && /[0-9]/.test(this.peek())) {
      value += this.advance(); // .
      while (/[0-9]/.test(this.current())) {
        value += this.advance();
      }
      return this.make("FLOAT", value, startLocation);
    }

    if (Number.parseInt(value, 10) > INT_MAX) {
      throw new LexError(
        "INTEGER_OVERFLOW",
        `Integer literal ${value} does not fit in a signed 32-bit integer`,
        { location: startLocation, source: this.source }
      );
    }

    return this.make("INT", value, startLocation);
  }
}

/**
 * Tokenize source code without running directives
 */
export function tokenize(source: string, file?: string): Token[] {
  const tokenizer = new Tokenizer(source, file);
  return tokenizer.tokenize();
}

/**
 * Directive-driven preprocessor over the tokenizer
 *
 * Runs #include, #define, #undef, #ifdef, #ifndef and #end while tokens are
 * produced. Excluded regions are skipped as raw text, so they are never
 * tokenized and may contain anything.
 */

import { LexError, type SourceLocation } from "./errors.js";
import { type SourceHost, createFileSystemHost } from "./source-host.js";
import { type Token, Tokenizer, tokenize } from "./tokenizer.js";

export interface PreprocessOptions {
  /** Path of the unit being compiled; anchors relative #include targets */
  file?: string;
  /** Extra directories searched by #include, in order */
  includePaths?: readonly string[];
  /** Macros defined before the first line; an empty value defines the name only */
  defines?: Readonly<Record<string, string>>;
  /** Resolves and reads included units; defaults to the file system */
  host?: SourceHost;
}

/** A defined macro; an empty body marks the name as defined with no replacement */
export interface Macro {
  name: string;
  body: Token[];
}

/** Drop layout tokens */
function significant(tokens: Token[]): Token[] {
  return tokens.filter((t) => t.type !== "WHITESPACE" && t.type !== "NEWLINE" && t.type !== "EOF");
}

// =============================================================================
// PREPROCESSOR CLASS
// =============================================================================

export class Preprocessor {
  private readonly macros = new Map<string, Macro>();
  private readonly includeStack: string[] = [];
  private readonly includePaths: readonly string[];
  private readonly host: SourceHost;
  private readonly file?: string;
  private output: Token[] = [];

  constructor(options: PreprocessOptions = {}) {
    this.file = options.file;
    this.includePaths = options.includePaths ?? [];
    this.host = options.host ?? createFileSystemHost();

    for (const [name, value] of Object.entries(options.defines ?? {})) {
      this.macros.set(name, { name, body: significant(tokenize(value)) });
    }
  }

  /** Preprocess a complete unit into a token stream ending with EOF */
  run(source: string): Token[] {
    this.output = [];
    this.includeStack.length = 0;
    if (this.file !== undefined) this.includeStack.push(this.file);
    const eof = this.processUnit(source, this.file);
    this.output.push(eof);
    return this.output;
  }

  /** Whether a macro name is currently defined */
  isDefined(name: string): boolean {
    return this.macros.has(name);
  }

  /** Currently defined macros, in definition order */
  definedMacros(): Macro[] {
    return [...this.macros.values()];
  }

  // ===========================================================================
  // UNITS
  // ===========================================================================

  private processUnit(source: string, file: string | undefined): Token {
    const tokenizer = new Tokenizer(source, file);
    const open: SourceLocation[] = [];

    for (;;) {
      const token = tokenizer.next();

      switch (token.type) {
        case "EOF": {
          const unclosed = open[open.length - 1];
          if (unclosed) {
            throw new LexError("UNTERMINATED_CONDITIONAL", "Conditional region is missing its #end", {
              location: unclosed,
              source,
            });
          }
          return token;
        }
        case "DIRECTIVE":
          this.directive(token, tokenizer, open, source, file);
          break;
        case "IDENTIFIER":
          this.expand(token, new Set());
          break;
        default:
          this.output.push(token);
      }
    }
  }

  /** Read the arguments of a directive up to its line end */
  private readLine(tokenizer: Tokenizer): Token[] {
    const args: Token[] = [];
    for (;;) {
      const token = tokenizer.next();
      if (token.type === "NEWLINE" || token.type === "EOF") {
        return args;
      }
      if (token.type !== "WHITESPACE") {
        args.push(token);
      }
    }
  }

  private directive(
    token: Token,
    tokenizer: Tokenizer,
    open: SourceLocation[],
    source: string,
    file: string | undefined
  ): void {
    const args = this.readLine(tokenizer);
    const malformed = (message: string): LexError =>
      new LexError("MALFORMED_DIRECTIVE", message, { location: token.location, source });

    const singleName = (directive: string): string => {
      const [name, ...rest] = args;
      if (!name || name.type !== "IDENTIFIER" || rest.length > 0) {
        throw malformed(`#${directive.toLowerCase()} expects a single macro name`);
      }
      return name.value;
    };

    switch (token.value) {
      case "INCLUDE": {
        const [target, ...rest] = args;
        if (!target || target.type !== "STRING" || rest.length > 0) {
          throw malformed("#include expects a quoted file name");
        }
        this.include(target, file, source);
        return;
      }

      case "DEFINE": {
        const [name, ...body] = args;
        if (!name || name.type !== "IDENTIFIER") {
          throw malformed("#define expects a macro name");
        }
        this.macros.set(name.value, { name: name.value, body });
        return;
      }

      case "UNDEF":
        this.macros.delete(singleName("UNDEF"));
        return;

      case "IFDEF":
      case "IFNDEF": {
        const defined = this.macros.has(singleName(token.value));
        const active = token.value === "IFDEF" ? defined : !defined;
        if (active) {
          open.push(token.location);
        } else {
          tokenizer.skipConditionalRegion(token.location);
        }
        return;
      }

      case "END":
        if (args.length > 0) {
          throw malformed("#end takes no arguments");
        }
        if (open.pop() === undefined) {
          throw malformed("#end without a matching #ifdef or #ifndef");
        }
        return;

      default:
        throw malformed(`Unknown directive '#${token.value.toLowerCase()}'`);
    }
  }

  /** Splice the tokens of another unit in place of an #include line */
  private include(target: Token, file: string | undefined, source: string): void {
    const path = this.host.resolve(target.value, file, this.includePaths);
    if (path === undefined) {
      throw new LexError("INCLUDE_NOT_FOUND", `Cannot find included file "${target.value}"`, {
        location: target.location,
        source,
      });
    }

    if (this.includeStack.includes(path)) {
      throw new LexError("RECURSIVE_INCLUDE", `"${target.value}" includes itself`, {
        location: target.location,
        source,
      });
    }

    this.includeStack.push(path);
    this.processUnit(this.host.read(path), path);
    this.includeStack.pop();
  }

  /** Emit an identifier, replacing it by its macro body when it has one */
  private expand(token: Token, expanding: ReadonlySet<string>): void {
    const macro = this.macros.get(token.value);
    if (!macro || macro.body.length === 0 || expanding.has(macro.name)) {
      this.output.push(token);
      return;
    }

    const nested = new Set(expanding).add(macro.name);
    for (const part of macro.body) {
      const relocated: Token = { ...part, location: token.location };
      if (relocated.type === "IDENTIFIER") {
        this.expand(relocated, nested);
      } else {
        this.output.push(relocated);
      }
    }
  }
}

/**
 * Preprocess and tokenize source code
 */
export function preprocess(source: string, options?: PreprocessOptions): Token[] {
  const preprocessor = new Preprocessor(options);
  return preprocessor.run(source);
}

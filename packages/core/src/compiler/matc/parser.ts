/**
 * Recursive descent parser for matc syntax
 */

import { T, type Type } from "../../types/primitives.js";
import type {
  BinaryOperator,
  BlockNode,
  BuiltinName,
  ExpressionNode,
  FormalParam,
  FunctionDecl,
  GlobalDecl,
  ProgramAST,
  StatementNode,
} from "./ast.js";
import { ParseError, type SourceLocation } from "./errors.js";
import { type PreprocessOptions, preprocess } from "./preprocessor.js";
import type { Token, TokenType } from "./tokenizer.js";

const TYPE_KEYWORDS = new Set(["int", "float", "bool", "string", "void", "auto", "matrix"]);

const BUILTINS: readonly BuiltinName[] = ["print", "printstr", "rows", "cols"];

const EQUALITY_OPS = ["==", "!="] as const;
const RELATIONAL_OPS = ["<", "<=", ">", ">="] as const;
const ADDITIVE_OPS = ["+", "-"] as const;
const MULTIPLICATIVE_OPS = ["*", "/"] as const;

// =============================================================================
// PARSER CLASS
// =============================================================================

export class Parser {
  private readonly tokens: Token[];
  private readonly source?: string;
  private readonly file?: string;
  private pos = 0;

  /**
   * @param tokens - preprocessed tokens; layout tokens are dropped here
   * @param source - text of the main unit, used to quote it in errors
   * @param file - path of the main unit
   */
  constructor(tokens: Token[], source?: string, file?: string) {
    this.tokens = tokens.filter((t) => t.type !== "WHITESPACE" && t.type !== "NEWLINE");
    this.source = source;
    this.file = file;
  }

  // ===========================================================================
  // UTILITIES
  // ===========================================================================

  /** Get current token */
  private current(): Token {
    return (
      this.tokens[this.pos] ??
      this.tokens[this.tokens.length - 1] ?? {
        type: "EOF",
        value: "",
        location: { line: 1, column: 1, offset: 0 },
      }
    );
  }

  /** Check if current token matches */
  private check(type: TokenType, value?: string): boolean {
    const token = this.current();
    if (token.type !== type) return false;
    if (value !== undefined && token.value !== value) return false;
    return true;
  }

  /** Advance and return previous token */
  private advance(): Token {
    const token = this.current();
    if (token.type !== "EOF") {
      this.pos++;
    }
    return token;
  }

  /** Expect and consume a specific token */
  private expect(type: TokenType, value?: string): Token {
    const token = this.current();
    if (token.type !== type || (value !== undefined && token.value !== value)) {
      const wanted = value !== undefined ? `'${value}'` : type;
      throw this.error(`Expected ${wanted} but got ${describe(token)}`, token);
    }
    return this.advance();
  }

  /** Consume the current token when it is one of the given operators */
  private matchOperator<Op extends string>(ops: readonly Op[]): Op | undefined {
    if (!this.check("OPERATOR")) return undefined;
    const value = this.current().value;
    const op = ops.find((candidate) => candidate === value);
    if (op !== undefined) this.advance();
    return op;
  }

  private error(message: string, token: Token): ParseError {
    const quoted = token.location.file === this.file ? this.source : undefined;
    return new ParseError(message, { location: token.location, source: quoted });
  }

  // ===========================================================================
  // TOP-LEVEL PARSING
  // ===========================================================================

  /** Parse a complete program */
  parseProgram(): ProgramAST {
    const globals: GlobalDecl[] = [];
    const functions: FunctionDecl[] = [];
    const location = this.current().location;

    while (!this.check("EOF")) {
      const start = this.current();
      const type = this.parseType();
      const name = this.expect("IDENTIFIER").value;

      if (this.check("CHAR", "(")) {
        functions.push(this.parseFunction(type, name, start.location));
        continue;
      }

      if (this.check("ASSIGN")) {
        throw this.error(`Global variable ${name} cannot have an initializer`, this.current());
      }
      this.expect("CHAR", ";");
      globals.push({ kind: "global", type, name, location: start.location });
    }

    return { kind: "program", globals, functions, location };
  }

  private parseFunction(returnType: Type, name: string, location: SourceLocation): FunctionDecl {
    this.expect("CHAR", "(");
    const formals: FormalParam[] = [];

    if (!this.check("CHAR", ")")) {
      do {
        const start = this.current();
        const type = this.parseType();
        const formalName = this.expect("IDENTIFIER").value;
        formals.push({ type, name: formalName, location: start.location });
      } while (this.check("CHAR", ",") && this.advance());
    }
    this.expect("CHAR", ")");

    const body = this.parseBlock().body;
    return { kind: "function", returnType, name, formals, body, location };
  }

  /** Parse a type: scalar keyword or matrix<ELEM, ROWS, COLS> */
  parseType(): Type {
    const token = this.current();
    if (token.type !== "KEYWORD" || !TYPE_KEYWORDS.has(token.value)) {
      throw this.error(`Expected a type but got ${describe(token)}`, token);
    }
    this.advance();

    switch (token.value) {
      case "int":
        return T.int;
      case "float":
        return T.float;
      case "bool":
        return T.bool;
      case "string":
        return T.string;
      case "void":
        return T.void;
      case "auto":
        return T.auto;
      default: {
        this.expect("OPERATOR", "<");
        const element = this.parseType();
        this.expect("CHAR", ",");
        const rows = Number.parseInt(this.expect("INT").value, 10);
        this.expect("CHAR", ",");
        const cols = Number.parseInt(this.expect("INT").value, 10);
        this.expect("OPERATOR", ">");
        return T.matrix(element, rows, cols);
      }
    }
  }

  // ===========================================================================
  // STATEMENTS
  // ===========================================================================

  private parseBlock(): BlockNode {
    const open = this.expect("CHAR", "{");
    const body: StatementNode[] = [];
    while (!this.check("CHAR", "}")) {
      if (this.check("EOF")) {
        throw this.error("Unexpected end of input: missing '}'", this.current());
      }
      body.push(this.parseStatement());
    }
    this.expect("CHAR", "}");
    return { kind: "block", body, location: open.location };
  }

  /** Parse a single statement */
  parseStatement(): StatementNode {
    const token = this.current();
    const location = token.location;

    if (this.check("CHAR", "{")) {
      return this.parseBlock();
    }

    if (this.check("CHAR", ";")) {
      this.advance();
      return { kind: "expr", expr: { kind: "noexpr", location }, location };
    }

    if (token.type === "KEYWORD" && TYPE_KEYWORDS.has(token.value)) {
      const type = this.parseType();
      const name = this.expect("IDENTIFIER").value;
      let init: ExpressionNode | undefined;
      if (this.check("ASSIGN")) {
        this.advance();
        init = this.parseExpression();
      }
      this.expect("CHAR", ";");
      return { kind: "var", type, name, init, location };
    }

    if (this.check("KEYWORD", "return")) {
      this.advance();
      const value = this.check("CHAR", ";") ? undefined : this.parseExpression();
      this.expect("CHAR", ";");
      return { kind: "return", value, location };
    }

    if (this.check("KEYWORD", "if")) {
      this.advance();
      const condition = this.parseCondition();
      const thenBranch = this.parseStatement();
      let elseBranch: StatementNode = { kind: "block", body: [], location };
      if (this.check("KEYWORD", "else")) {
        this.advance();
        elseBranch = this.parseStatement();
      }
      return { kind: "if", condition, thenBranch, elseBranch, location };
    }

    if (this.check("KEYWORD", "while")) {
      this.advance();
      const condition = this.parseCondition();
      const body = this.parseStatement();
      return { kind: "while", condition, body, location };
    }

    if (this.check("KEYWORD", "for")) {
      return this.parseFor();
    }

    const expr = this.parseExpression();
    this.expect("CHAR", ";");
    return { kind: "expr", expr, location };
  }

  /** Parse `( EXPR )` */
  private parseCondition(): ExpressionNode {
    this.expect("CHAR", "(");
    const condition = this.parseExpression();
    this.expect("CHAR", ")");
    return condition;
  }

  /** Parse `for (INIT?; COND?; UPDATE?) BODY`; a missing condition is `true` */
  private parseFor(): StatementNode {
    const location = this.expect("KEYWORD", "for").location;
    this.expect("CHAR", "(");
    const init = this.parseOptionalExpression(";");
    this.expect("CHAR", ";");
    const condition: ExpressionNode = this.check("CHAR", ";")
      ? { kind: "bool", value: true, location: this.current().location }
      : this.parseExpression();
    this.expect("CHAR", ";");
    const update = this.parseOptionalExpression(")");
    this.expect("CHAR", ")");
    const body = this.parseStatement();
    return { kind: "for", init, condition, update, body, location };
  }

  private parseOptionalExpression(terminator: string): ExpressionNode {
    if (this.check("CHAR", terminator)) {
      return { kind: "noexpr", location: this.current().location };
    }
    return this.parseExpression();
  }

  // ===========================================================================
  // EXPRESSION PARSING
  // ===========================================================================

  /** Parse an expression */
  parseExpression(): ExpressionNode {
    return this.parseAssignment();
  }

  /** Parse assignment: NAME = value (right-associative) */
  private parseAssignment(): ExpressionNode {
    const left = this.parseOr();

    if (this.check("ASSIGN")) {
      const assign = this.advance();
      if (left.kind !== "identifier") {
        throw this.error("Invalid assignment target: only variables can be assigned", assign);
      }
      const value = this.parseAssignment();
      return { kind: "assign", name: left.name, value, location: left.location };
    }

    return left;
  }

  /** Parse or: a or b */
  private parseOr(): ExpressionNode {
    let left = this.parseAnd();

    while (this.check("KEYWORD", "or")) {
      this.advance();
      const right = this.parseAnd();
      left = this.binary("or", left, right);
    }

    return left;
  }

  /** Parse and: a and b */
  private parseAnd(): ExpressionNode {
    let left = this.parseEquality();

    while (this.check("KEYWORD", "and")) {
      this.advance();
      const right = this.parseEquality();
      left = this.binary("and", left, right);
    }

    return left;
  }

  /** Parse equality: == != */
  private parseEquality(): ExpressionNode {
    let left = this.parseRelational();

    for (let op = this.matchOperator(EQUALITY_OPS); op; op = this.matchOperator(EQUALITY_OPS)) {
      left = this.binary(op, left, this.parseRelational());
    }

    return left;
  }

  /** Parse relational: < <= > >= */
  private parseRelational(): ExpressionNode {
    let left = this.parseAdditive();

    for (let op = this.matchOperator(RELATIONAL_OPS); op; op = this.matchOperator(RELATIONAL_OPS)) {
      left = this.binary(op, left, this.parseAdditive());
    }

    return left;
  }

  /** Parse additive: + - */
  private parseAdditive(): ExpressionNode {
    let left = this.parseMultiplicative();

    for (let op = this.matchOperator(ADDITIVE_OPS); op; op = this.matchOperator(ADDITIVE_OPS)) {
      left = this.binary(op, left, this.parseMultiplicative());
    }

    return left;
  }

  /** Parse multiplicative: * / */
  private parseMultiplicative(): ExpressionNode {
    let left = this.parseUnary();

    for (
      let op = this.matchOperator(MULTIPLICATIVE_OPS);
      op;
      op = this.matchOperator(MULTIPLICATIVE_OPS)
    ) {
      left = this.binary(op, left, this.parseUnary());
    }

    return left;
  }

  /** Parse unary: not - */
  private parseUnary(): ExpressionNode {
    const token = this.current();

    if (this.check("KEYWORD", "not")) {
      this.advance();
      return { kind: "unary", op: "not", operand: this.parseUnary(), location: token.location };
    }

    if (this.check("OPERATOR", "-")) {
      this.advance();
      return { kind: "unary", op: "-", operand: this.parseUnary(), location: token.location };
    }

    return this.parsePrimary();
  }

  /** Parse primary expression */
  private parsePrimary(): ExpressionNode {
    const token = this.current();
    const location = token.location;

    switch (token.type) {
      case "INT":
        this.advance();
        return { kind: "int", value: Number.parseInt(token.value, 10), location };
      case "FLOAT":
        this.advance();
        return { kind: "float", value: Number.parseFloat(token.value), location };
      case "STRING":
        this.advance();
        return { kind: "string", value: token.value, location };
      case "IDENTIFIER":
        this.advance();
        if (this.check("CHAR", "(")) {
          return { kind: "call", callee: token.value, args: this.parseArguments(), location };
        }
        return { kind: "identifier", name: token.value, location };
      case "KEYWORD": {
        if (token.value === "true" || token.value === "false") {
          this.advance();
          return { kind: "bool", value: token.value === "true", location };
        }
        const builtin = BUILTINS.find((name) => name === token.value);
        if (builtin !== undefined) {
          this.advance();
          return { kind: "call", callee: builtin, builtin, args: this.parseArguments(), location };
        }
        break;
      }
      case "CHAR":
        if (token.value === "(") {
          this.advance();
          const expr = this.parseExpression();
          this.expect("CHAR", ")");
          return expr;
        }
        if (token.value === "[") {
          return this.parseMatrixLiteral();
        }
        break;
      default:
        break;
    }

    throw this.error(`Unexpected token in expression: ${describe(token)}`, token);
  }

  /** Parse `( ARG, ... )` */
  private parseArguments(): ExpressionNode[] {
    this.expect("CHAR", "(");
    const args: ExpressionNode[] = [];
    if (!this.check("CHAR", ")")) {
      do {
        args.push(this.parseExpression());
      } while (this.check("CHAR", ",") && this.advance());
    }
    this.expect("CHAR", ")");
    return args;
  }

  /** Parse `[[a, b], [c, d]]` or `[]` */
  private parseMatrixLiteral(): ExpressionNode {
    const location = this.expect("CHAR", "[").location;
    const rows: ExpressionNode[][] = [];

    if (!this.check("CHAR", "]")) {
      do {
        this.expect("CHAR", "[");
        const row: ExpressionNode[] = [];
        if (!this.check("CHAR", "]")) {
          do {
            row.push(this.parseExpression());
          } while (this.check("CHAR", ",") && this.advance());
        }
        this.expect("CHAR", "]");
        rows.push(row);
      } while (this.check("CHAR", ",") && this.advance());
    }

    this.expect("CHAR", "]");
    return { kind: "matrix", rows, location };
  }

  private binary(op: BinaryOperator, left: ExpressionNode, right: ExpressionNode): ExpressionNode {
    return { kind: "binary", op, left, right, location: left.location };
  }
}

/** Human-readable token description for error messages */
function describe(token: Token): string {
  if (token.type === "EOF") return "end of input";
  if (token.type === "CHAR" && /[a-z]/.test(token.value)) {
    return `'${token.value}' (identifiers must be uppercase)`;
  }
  return `${token.type} '${token.value}'`;
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Parse an already preprocessed token stream into an AST
 */
export function parseTokens(tokens: Token[], source?: string, file?: string): ProgramAST {
  const parser = new Parser(tokens, source, file);
  return parser.parseProgram();
}

/**
 * Preprocess and parse matc source code into an AST
 */
export function parse(source: string, options?: PreprocessOptions): ProgramAST {
  const tokens = preprocess(source, options);
  return parseTokens(tokens, source, options?.file);
}

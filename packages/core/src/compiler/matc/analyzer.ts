/**
 * Semantic analysis: scope resolution and type checking
 *
 * Turns the parser's AST into the typed tree. The first violation aborts
 * analysis with a SemanticError.
 */

import {
  type MatrixType,
  T,
  type Type,
  isMatrixElement,
  isNumeric,
  typeEquals,
  typeToString,
} from "../../types/primitives.js";
import type {
  BinaryExprNode,
  CallNode,
  ExpressionNode,
  FunctionDecl,
  MatrixLiteralNode,
  ProgramAST,
  StatementNode,
  UnaryExprNode,
} from "./ast.js";
import { SemanticError, type SourceLocation } from "./errors.js";
import { type ScopeId, ScopeTable } from "./scope.js";
import type {
  TypedBlock,
  TypedExpr,
  TypedFunction,
  TypedGlobal,
  TypedProgram,
  TypedStmt,
} from "./typed-ast.js";

/** Declared shape of a user function */
export interface FunctionSignature {
  name: string;
  formals: Type[];
  returnType: Type;
}

/** Name of the program entry point */
export const ENTRY_POINT = "MAIN";

const ARITHMETIC = new Set(["+", "-", "*", "/"]);
const COMPARISON = new Set(["==", "!=", "<", "<=", ">", ">="]);

export interface AnalyzeOptions {
  /** Text of the main unit, quoted in error output */
  source?: string;
  /** Path of the main unit */
  file?: string;
}

// =============================================================================
// ANALYZER CLASS
// =============================================================================

export class Analyzer {
  private readonly scopes = new ScopeTable();
  private readonly functions = new Map<string, FunctionSignature>();
  private readonly source?: string;
  private readonly file?: string;
  private currentFunction?: FunctionSignature;

  constructor(options: AnalyzeOptions = {}) {
    this.source = options.source;
    this.file = options.file;
  }

  /** Analyze a whole program */
  analyze(program: ProgramAST): TypedProgram {
    const globals: TypedGlobal[] = [];

    for (const global of program.globals) {
      if (global.type.kind === "auto") {
        throw this.error(
          "AUTO_WITHOUT_INITIALIZER",
          `Global ${global.name} is declared auto but globals take no initializer`,
          global.location
        );
      }
      this.checkStorageType(global.type, `Global ${global.name}`, global.location);
      if (!this.scopes.declare(this.scopes.global, global.name, global.type)) {
        throw this.error("DUPLICATE_DECLARATION", `Duplicate global ${global.name}`, global.location);
      }
      globals.push({ type: global.type, name: global.name });
    }

    for (const fn of program.functions) {
      this.declareFunction(fn);
    }

    const functions = program.functions.map((fn) => this.checkFunction(fn));
    return { globals, functions, scopes: this.scopes };
  }

  // ===========================================================================
  // DECLARATIONS
  // ===========================================================================

  private declareFunction(fn: FunctionDecl): void {
    if (this.functions.has(fn.name)) {
      throw this.error("DUPLICATE_DECLARATION", `Duplicate function ${fn.name}`, fn.location);
    }

    if (fn.returnType.kind === "auto") {
      throw this.error("INVALID_TYPE", `Function ${fn.name} cannot return auto`, fn.location);
    }
    if (fn.returnType.kind === "matrix") {
      this.checkMatrixType(fn.returnType, fn.location);
    }

    for (const formal of fn.formals) {
      if (formal.type.kind === "auto") {
        throw this.error("INVALID_TYPE", `Formal ${formal.name} of ${fn.name} cannot be auto`, formal.location);
      }
      this.checkStorageType(formal.type, `Formal ${formal.name} of ${fn.name}`, formal.location);
    }

    if (fn.name === ENTRY_POINT && (fn.returnType.kind !== "int" || fn.formals.length > 0)) {
      throw this.error(
        "INVALID_ENTRY_POINT",
        `${ENTRY_POINT} must return int and take no arguments`,
        fn.location
      );
    }

    this.functions.set(fn.name, {
      name: fn.name,
      formals: fn.formals.map((f) => f.type),
      returnType: fn.returnType,
    });
  }

  private checkFunction(fn: FunctionDecl): TypedFunction {
    const signature = this.functions.get(fn.name);
    if (!signature) {
      throw this.error("UNDEFINED_FUNCTION", `Undefined function ${fn.name}`, fn.location);
    }
    this.currentFunction = signature;

    const scope = this.scopes.create(this.scopes.global);
    for (const formal of fn.formals) {
      if (!this.scopes.declare(scope, formal.name, formal.type)) {
        throw this.error(
          "DUPLICATE_DECLARATION",
          `Duplicate formal ${formal.name} in ${fn.name}`,
          formal.location
        );
      }
    }

    const body: TypedBlock = {
      kind: "block",
      body: fn.body.map((stmt) => this.checkStatement(stmt, scope)),
      scope,
    };
    this.currentFunction = undefined;

    return {
      name: fn.name,
      formals: fn.formals.map((f) => ({ type: f.type, name: f.name })),
      returnType: fn.returnType,
      body,
      location: fn.location,
    };
  }

  /** Types a variable, formal or global may have */
  private checkStorageType(type: Type, what: string, location?: SourceLocation): void {
    if (type.kind === "void") {
      throw this.error("INVALID_TYPE", `${what} cannot have type void`, location);
    }
    if (type.kind === "matrix") {
      this.checkMatrixType(type, location);
    }
  }

  private checkMatrixType(type: MatrixType, location?: SourceLocation): void {
    if (!isMatrixElement(type.element)) {
      throw this.error(
        "INVALID_TYPE",
        `Matrix element type must be int, float or bool, got ${typeToString(type.element)}`,
        location
      );
    }
  }

  // ===========================================================================
  // STATEMENTS
  // ===========================================================================

  private checkStatement(stmt: StatementNode, scope: ScopeId): TypedStmt {
    switch (stmt.kind) {
      case "block":
        return this.checkBranch(stmt, scope);

      case "var": {
        let type = stmt.type;
        let init: TypedExpr | undefined;

        if (type.kind === "auto") {
          if (!stmt.init) {
            throw this.error(
              "AUTO_WITHOUT_INITIALIZER",
              `Variable ${stmt.name} is declared auto without an initializer`,
              stmt.location
            );
          }
          init = this.checkExpression(stmt.init, scope);
          if (init.type.kind === "void") {
            throw this.error(
              "INVALID_TYPE",
              `Cannot infer the type of ${stmt.name} from a void expression`,
              stmt.location
            );
          }
          type = init.type;
        } else {
          this.checkStorageType(type, `Variable ${stmt.name}`, stmt.location);
          if (stmt.init) {
            init = this.checkExpression(stmt.init, scope, type);
            this.requireType(type, init, `initialize ${stmt.name} of type ${typeToString(type)}`);
          }
        }

        if (!this.scopes.declare(scope, stmt.name, type)) {
          throw this.error(
            "DUPLICATE_DECLARATION",
            `Duplicate declaration of ${stmt.name} in the same scope`,
            stmt.location
          );
        }
        return init ? { kind: "var", type, name: stmt.name, init } : { kind: "var", type, name: stmt.name };
      }

      case "expr":
        return { kind: "expr", expr: this.checkExpression(stmt.expr, scope) };

      case "return":
        return this.checkReturn(stmt.value, scope, stmt.location);

      case "if":
        return {
          kind: "if",
          condition: this.checkCondition(stmt.condition, scope, "if"),
          thenBranch: this.checkBranch(stmt.thenBranch, scope),
          elseBranch: this.checkBranch(stmt.elseBranch, scope),
        };

      case "while":
        return {
          kind: "while",
          condition: this.checkCondition(stmt.condition, scope, "while"),
          body: this.checkBranch(stmt.body, scope),
        };

      case "for": {
        const init = this.checkExpression(stmt.init, scope);
        const condition = this.checkCondition(stmt.condition, scope, "for");
        const body = this.checkBranch(stmt.body, scope);
        // The update runs after the body and resolves in its scope
        const update = this.checkExpression(stmt.update, body.scope);
        return { kind: "for", init, condition, update, body, scope };
      }
    }
  }

  /** Check a nested statement in a scope of its own */
  private checkBranch(stmt: StatementNode, parent: ScopeId): TypedBlock {
    const scope = this.scopes.create(parent);
    const body = stmt.kind === "block" ? stmt.body : [stmt];
    return { kind: "block", body: body.map((s) => this.checkStatement(s, scope)), scope };
  }

  private checkCondition(expr: ExpressionNode, scope: ScopeId, construct: string): TypedExpr {
    const condition = this.checkExpression(expr, scope);
    if (condition.type.kind !== "bool") {
      throw this.error(
        "TYPE_MISMATCH",
        `Condition of ${construct} must be bool, got ${typeToString(condition.type)}`,
        expr.location
      );
    }
    return condition;
  }

  private checkReturn(
    value: ExpressionNode | undefined,
    scope: ScopeId,
    location?: SourceLocation
  ): TypedStmt {
    const fn = this.currentFunction;
    if (!fn) {
      throw this.error("RETURN_MISMATCH", "return outside of a function", location);
    }

    if (fn.returnType.kind === "void") {
      if (value) {
        throw this.error("RETURN_MISMATCH", `Void function ${fn.name} cannot return a value`, location);
      }
      return { kind: "return" };
    }

    if (!value) {
      throw this.error(
        "RETURN_MISMATCH",
        `Function ${fn.name} must return a value of type ${typeToString(fn.returnType)}`,
        location
      );
    }

    const typed = this.checkExpression(value, scope, fn.returnType);
    if (!typeEquals(typed.type, fn.returnType)) {
      throw this.error(
        "RETURN_MISMATCH",
        `Function ${fn.name} returns ${typeToString(fn.returnType)} but the returned value has type ${typeToString(typed.type)}`,
        value.location ?? location
      );
    }
    return { kind: "return", value: typed };
  }

  // ===========================================================================
  // EXPRESSIONS
  // ===========================================================================

  /**
   * Type an expression. `expected` only guides matrix literals, whose shape
   * cannot always be inferred; callers still compare the result type.
   */
  private checkExpression(expr: ExpressionNode, scope: ScopeId, expected?: Type): TypedExpr {
    const location = expr.location;

    switch (expr.kind) {
      case "int":
        return { type: T.int, expr: { kind: "int", value: expr.value }, location };
      case "float":
        return { type: T.float, expr: { kind: "float", value: expr.value }, location };
      case "bool":
        return { type: T.bool, expr: { kind: "bool", value: expr.value }, location };
      case "string":
        return { type: T.string, expr: { kind: "string", value: expr.value }, location };
      case "noexpr":
        return { type: T.void, expr: { kind: "noexpr" }, location };

      case "identifier": {
        const type = this.scopes.lookup(scope, expr.name);
        if (!type) {
          throw this.error("UNDECLARED_IDENTIFIER", `Undeclared identifier ${expr.name}`, location);
        }
        return { type, expr: { kind: "identifier", name: expr.name }, location };
      }

      case "assign": {
        const target = this.scopes.lookup(scope, expr.name);
        if (!target) {
          throw this.error("UNDECLARED_IDENTIFIER", `Undeclared identifier ${expr.name}`, location);
        }
        const value = this.checkExpression(expr.value, scope, target);
        this.requireType(target, value, `assign to ${expr.name} of type ${typeToString(target)}`);
        return { type: target, expr: { kind: "assign", name: expr.name, value }, location };
      }

      case "binary":
        return this.checkBinary(expr, scope);

      case "unary":
        return this.checkUnary(expr, scope);

      case "call":
        return expr.builtin ? this.checkBuiltin(expr, scope) : this.checkCall(expr, scope);

      case "matrix":
        return this.checkMatrixLiteral(expr, scope, expected);
    }
  }

  private checkBinary(expr: BinaryExprNode, scope: ScopeId): TypedExpr {
    const left = this.checkExpression(expr.left, scope);
    const right = this.checkExpression(expr.right, scope);
    const node = { kind: "binary" as const, op: expr.op, left, right };
    const operands = `${typeToString(left.type)} and ${typeToString(right.type)}`;

    if (ARITHMETIC.has(expr.op) || COMPARISON.has(expr.op)) {
      if (!isNumeric(left.type) || !typeEquals(left.type, right.type)) {
        throw this.error(
          "INVALID_OPERAND",
          `Operator ${expr.op} requires matching int or float operands, got ${operands}`,
          expr.location
        );
      }
      const type = ARITHMETIC.has(expr.op) ? left.type : T.bool;
      return { type, expr: node, location: expr.location };
    }

    if (left.type.kind !== "bool" || right.type.kind !== "bool") {
      throw this.error(
        "INVALID_OPERAND",
        `Operator ${expr.op} requires bool operands, got ${operands}`,
        expr.location
      );
    }
    return { type: T.bool, expr: node, location: expr.location };
  }

  private checkUnary(expr: UnaryExprNode, scope: ScopeId): TypedExpr {
    const operand = this.checkExpression(expr.operand, scope);
    const node = { kind: "unary" as const, op: expr.op, operand };

    if (expr.op === "-") {
      if (!isNumeric(operand.type)) {
        throw this.error(
          "INVALID_OPERAND",
          `Unary - requires an int or float operand, got ${typeToString(operand.type)}`,
          expr.location
        );
      }
      return { type: operand.type, expr: node, location: expr.location };
    }

    if (operand.type.kind !== "bool") {
      throw this.error(
        "INVALID_OPERAND",
        `not requires a bool operand, got ${typeToString(operand.type)}`,
        expr.location
      );
    }
    return { type: T.bool, expr: node, location: expr.location };
  }

  private checkBuiltin(expr: CallNode, scope: ScopeId): TypedExpr {
    const name = expr.builtin;
    if (!name) {
      return this.checkCall(expr, scope);
    }

    if (expr.args.length !== 1) {
      throw this.error(
        "ARITY_MISMATCH",
        `${name} expects 1 argument but got ${expr.args.length}`,
        expr.location
      );
    }

    const args = expr.args.map((arg) => this.checkExpression(arg, scope));
    const [arg] = args;
    const argType = arg ? arg.type : T.void;
    const node = { kind: "builtin" as const, name, args };

    switch (name) {
      case "print":
        if (argType.kind !== "int" && argType.kind !== "float" && argType.kind !== "bool") {
          throw this.error(
            "TYPE_MISMATCH",
            `print expects an int, float or bool argument, got ${typeToString(argType)}`,
            expr.location
          );
        }
        return { type: T.void, expr: node, location: expr.location };
      case "printstr":
        if (argType.kind !== "string") {
          throw this.error(
            "TYPE_MISMATCH",
            `printstr expects a string argument, got ${typeToString(argType)}`,
            expr.location
          );
        }
        return { type: T.void, expr: node, location: expr.location };
      case "rows":
      case "cols":
        if (argType.kind !== "matrix") {
          throw this.error(
            "TYPE_MISMATCH",
            `${name} expects a matrix argument, got ${typeToString(argType)}`,
            expr.location
          );
        }
        return { type: T.int, expr: node, location: expr.location };
    }
  }

  private checkCall(expr: CallNode, scope: ScopeId): TypedExpr {
    const signature = this.functions.get(expr.callee);
    if (!signature) {
      throw this.error("UNDEFINED_FUNCTION", `Undefined function ${expr.callee}`, expr.location);
    }

    if (expr.args.length !== signature.formals.length) {
      throw this.error(
        "ARITY_MISMATCH",
        `${expr.callee} expects ${signature.formals.length} argument(s) but got ${expr.args.length}`,
        expr.location
      );
    }

    const args = expr.args.map((arg, index) => {
      const formal = signature.formals[index] ?? T.void;
      const typed = this.checkExpression(arg, scope, formal);
      if (!typeEquals(typed.type, formal)) {
        throw this.error(
          "TYPE_MISMATCH",
          `Argument ${index + 1} of ${expr.callee} must be ${typeToString(formal)}, got ${typeToString(typed.type)}`,
          arg.location ?? expr.location
        );
      }
      return typed;
    });

    return {
      type: signature.returnType,
      expr: { kind: "call", callee: expr.callee, args },
      location: expr.location,
    };
  }

  private checkMatrixLiteral(expr: MatrixLiteralNode, scope: ScopeId, expected?: Type): TypedExpr {
    const rowCount = expr.rows.length;
    const colCount = expr.rows[0]?.length ?? 0;

    if (expr.rows.some((row) => row.length !== colCount)) {
      throw this.error(
        "MATRIX_SHAPE_MISMATCH",
        "Matrix literal rows must all have the same length",
        expr.location
      );
    }

    const rows = expr.rows.map((row) => row.map((element) => this.checkExpression(element, scope)));
    const shape = `${rowCount}x${colCount}`;

    let type: MatrixType;
    if (expected?.kind === "matrix") {
      // `[]` is the null reference and takes any expected shape
      if (rowCount > 0 && (expected.rows !== rowCount || expected.cols !== colCount)) {
        throw this.error(
          "MATRIX_SHAPE_MISMATCH",
          `Matrix literal has shape ${shape} but ${typeToString(expected)} was expected`,
          expr.location
        );
      }
      type = expected;
    } else {
      const first = rows[0]?.[0];
      if (!first) {
        throw this.error(
          "INVALID_TYPE",
          "Cannot infer the element type of an empty matrix literal",
          expr.location
        );
      }
      if (!isMatrixElement(first.type)) {
        throw this.error(
          "MATRIX_ELEMENT_MISMATCH",
          `Matrix elements must be int, float or bool, got ${typeToString(first.type)}`,
          first.location ?? expr.location
        );
      }
      type = T.matrix(first.type, rowCount, colCount);
    }

    for (const element of rows.flat()) {
      if (!typeEquals(element.type, type.element)) {
        throw this.error(
          "MATRIX_ELEMENT_MISMATCH",
          `Matrix element must be ${typeToString(type.element)}, got ${typeToString(element.type)}`,
          element.location ?? expr.location
        );
      }
    }

    return { type, expr: { kind: "matrix", rows }, location: expr.location };
  }

  // ===========================================================================
  // UTILITIES
  // ===========================================================================

  private requireType(expected: Type, actual: TypedExpr, action: string): void {
    if (!typeEquals(expected, actual.type)) {
      throw this.error(
        "TYPE_MISMATCH",
        `Cannot use a value of type ${typeToString(actual.type)} to ${action}`,
        actual.location
      );
    }
  }

  private error(code: string, message: string, location?: SourceLocation): SemanticError {
    const source = location && location.file === this.file ? this.source : undefined;
    return new SemanticError(code, message, { location, source });
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Analyze a parsed program into the typed tree
 */
export function analyze(program: ProgramAST, options?: AnalyzeOptions): TypedProgram {
  const analyzer = new Analyzer(options);
  return analyzer.analyze(program);
}

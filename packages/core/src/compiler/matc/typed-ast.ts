/**
 * Typed tree produced by semantic analysis
 *
 * Every expression carries its resolved type; `auto` never appears here.
 */

import type { Type } from "../../types/primitives.js";
import type { BinaryOperator, BuiltinName, UnaryOperator } from "./ast.js";
import type { SourceLocation } from "./errors.js";
import type { ScopeId, ScopeTable } from "./scope.js";

// =============================================================================
// EXPRESSIONS
// =============================================================================

/** Resolved type paired with the expression that has it */
export interface TypedExpr {
  type: Type;
  expr: TypedExprKind;
  location?: SourceLocation;
}

export type TypedExprKind =
  | { kind: "int"; value: number }
  | { kind: "float"; value: number }
  | { kind: "bool"; value: boolean }
  | { kind: "string"; value: string }
  | { kind: "matrix"; rows: TypedExpr[][] }
  | { kind: "identifier"; name: string }
  | { kind: "binary"; op: BinaryOperator; left: TypedExpr; right: TypedExpr }
  | { kind: "unary"; op: UnaryOperator; operand: TypedExpr }
  | { kind: "assign"; name: string; value: TypedExpr }
  | { kind: "call"; callee: string; args: TypedExpr[] }
  | { kind: "builtin"; name: BuiltinName; args: TypedExpr[] }
  | { kind: "noexpr" };

// =============================================================================
// STATEMENTS
// =============================================================================

export interface TypedBlock {
  kind: "block";
  body: TypedStmt[];
  scope: ScopeId;
}

export type TypedStmt =
  | TypedBlock
  | { kind: "var"; type: Type; name: string; init?: TypedExpr }
  | { kind: "expr"; expr: TypedExpr }
  | { kind: "return"; value?: TypedExpr }
  | { kind: "if"; condition: TypedExpr; thenBranch: TypedBlock; elseBranch: TypedBlock }
  | { kind: "while"; condition: TypedExpr; body: TypedBlock }
  | TypedFor;

/**
 * Counted loop; `scope` is the scope `init` and `condition` resolve in,
 * `update` resolves in the body's scope. Generation rewrites it into a
 * block and a while loop before lowering.
 */
export interface TypedFor {
  kind: "for";
  init: TypedExpr;
  condition: TypedExpr;
  update: TypedExpr;
  body: TypedBlock;
  scope: ScopeId;
}

// =============================================================================
// PROGRAM
// =============================================================================

export interface TypedFormal {
  type: Type;
  name: string;
}

export interface TypedFunction {
  name: string;
  formals: TypedFormal[];
  returnType: Type;
  /** Body block; its scope holds the formals */
  body: TypedBlock;
  location?: SourceLocation;
}

export interface TypedGlobal {
  type: Type;
  name: string;
}

export interface TypedProgram {
  globals: TypedGlobal[];
  functions: TypedFunction[];
  scopes: ScopeTable;
}

/**
 * AST node types for matc source, as produced by the parser
 *
 * Types are kept exactly as written (including `auto`) and identifiers are
 * unresolved; the analyzer turns this tree into the typed tree.
 */

import type { Type } from "../../types/primitives.js";
import type { SourceLocation } from "./errors.js";

// =============================================================================
// BASE TYPES
// =============================================================================

/** Base AST node with location info */
export interface ASTNode {
  location?: SourceLocation;
}

// =============================================================================
// PROGRAM
// =============================================================================

/** Complete program: globals and functions in source order */
export interface ProgramAST extends ASTNode {
  kind: "program";
  globals: GlobalDecl[];
  functions: FunctionDecl[];
}

/** Top-level variable: `TYPE NAME;` */
export interface GlobalDecl extends ASTNode {
  kind: "global";
  type: Type;
  name: string;
}

export interface FormalParam extends ASTNode {
  type: Type;
  name: string;
}

/** Function definition: `TYPE NAME(FORMALS) { BODY }` */
export interface FunctionDecl extends ASTNode {
  kind: "function";
  returnType: Type;
  name: string;
  formals: FormalParam[];
  body: StatementNode[];
}

// =============================================================================
// STATEMENTS
// =============================================================================

export type StatementNode =
  | BlockNode
  | VarDeclNode
  | ExprStmtNode
  | ReturnNode
  | IfNode
  | WhileNode
  | ForNode;

export interface BlockNode extends ASTNode {
  kind: "block";
  body: StatementNode[];
}

export interface VarDeclNode extends ASTNode {
  kind: "var";
  type: Type;
  name: string;
  init?: ExpressionNode;
}

export interface ExprStmtNode extends ASTNode {
  kind: "expr";
  expr: ExpressionNode;
}

export interface ReturnNode extends ASTNode {
  kind: "return";
  value?: ExpressionNode;
}

export interface IfNode extends ASTNode {
  kind: "if";
  condition: ExpressionNode;
  thenBranch: StatementNode;
  elseBranch: StatementNode;
}

export interface WhileNode extends ASTNode {
  kind: "while";
  condition: ExpressionNode;
  body: StatementNode;
}

export interface ForNode extends ASTNode {
  kind: "for";
  init: ExpressionNode;
  condition: ExpressionNode;
  update: ExpressionNode;
  body: StatementNode;
}

// =============================================================================
// EXPRESSIONS
// =============================================================================

export type ExpressionNode =
  | IntLiteralNode
  | FloatLiteralNode
  | BoolLiteralNode
  | StringLiteralNode
  | MatrixLiteralNode
  | IdentifierNode
  | BinaryExprNode
  | UnaryExprNode
  | AssignNode
  | CallNode
  | NoExprNode;

export type ArithmeticOperator = "+" | "-" | "*" | "/";
export type ComparisonOperator = "==" | "!=" | "<" | "<=" | ">" | ">=";
export type LogicalOperator = "and" | "or";
export type BinaryOperator = ArithmeticOperator | ComparisonOperator | LogicalOperator;

export type UnaryOperator = "-" | "not";

/** Pseudo-functions resolved by name rather than by lookup */
export type BuiltinName = "print" | "printstr" | "rows" | "cols";

export interface IntLiteralNode extends ASTNode {
  kind: "int";
  value: number;
}

export interface FloatLiteralNode extends ASTNode {
  kind: "float";
  value: number;
}

export interface BoolLiteralNode extends ASTNode {
  kind: "bool";
  value: boolean;
}

export interface StringLiteralNode extends ASTNode {
  kind: "string";
  value: string;
}

/** `[[a, b], [c, d]]`, row-major */
export interface MatrixLiteralNode extends ASTNode {
  kind: "matrix";
  rows: ExpressionNode[][];
}

export interface IdentifierNode extends ASTNode {
  kind: "identifier";
  name: string;
}

export interface BinaryExprNode extends ASTNode {
  kind: "binary";
  op: BinaryOperator;
  left: ExpressionNode;
  right: ExpressionNode;
}

export interface UnaryExprNode extends ASTNode {
  kind: "unary";
  op: UnaryOperator;
  operand: ExpressionNode;
}

export interface AssignNode extends ASTNode {
  kind: "assign";
  name: string;
  value: ExpressionNode;
}

/** Call of a user function (`builtin` unset) or a built-in pseudo-function */
export interface CallNode extends ASTNode {
  kind: "call";
  callee: string;
  builtin?: BuiltinName;
  args: ExpressionNode[];
}

/** Absent expression: empty statement, omitted `for` clause */
export interface NoExprNode extends ASTNode {
  kind: "noexpr";
}

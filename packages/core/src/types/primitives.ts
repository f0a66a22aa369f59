/**
 * Source-level types of the matc language
 */

export interface IntType {
  kind: "int";
}

export interface BoolType {
  kind: "bool";
}

export interface FloatType {
  kind: "float";
}

export interface VoidType {
  kind: "void";
}

export interface StringType {
  kind: "string";
}

/** Placeholder resolved from an initializer during analysis */
export interface AutoType {
  kind: "auto";
}

/** Fixed-shape matrix; dimensions are known at compile time */
export interface MatrixType {
  kind: "matrix";
  element: Type;
  rows: number;
  cols: number;
}

export type Type = IntType | BoolType | FloatType | VoidType | StringType | AutoType | MatrixType;

export type TypeKind = Type["kind"];

const intType: IntType = { kind: "int" };
const boolType: BoolType = { kind: "bool" };
const floatType: FloatType = { kind: "float" };
const voidType: VoidType = { kind: "void" };
const stringType: StringType = { kind: "string" };
const autoType: AutoType = { kind: "auto" };

/** Shared instances of the scalar types, plus a matrix constructor */
export const T = {
  int: intType,
  bool: boolType,
  float: floatType,
  void: voidType,
  string: stringType,
  auto: autoType,
  matrix: (element: Type, rows: number, cols: number): MatrixType => ({
    kind: "matrix",
    element,
    rows,
    cols,
  }),
};

/** Structural type equality */
export function typeEquals(a: Type, b: Type): boolean {
  if (a.kind === "matrix" && b.kind === "matrix") {
    return a.rows === b.rows && a.cols === b.cols && typeEquals(a.element, b.element);
  }
  return a.kind === b.kind;
}

export function isNumeric(type: Type): boolean {
  return type.kind === "int" || type.kind === "float";
}

/** Scalar types a matrix may hold */
export function isMatrixElement(type: Type): boolean {
  return type.kind === "int" || type.kind === "float" || type.kind === "bool";
}

/** Render a type the way it is written in source */
export function typeToString(type: Type): string {
  if (type.kind === "matrix") {
    return `matrix<${typeToString(type.element)}, ${type.rows}, ${type.cols}>`;
  }
  return type.kind;
}

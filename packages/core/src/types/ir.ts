/**
 * Intermediate Representation (IR) for compiled matc programs
 *
 * A control-flow graph in the shape of LLVM's textual IR: functions made of
 * labelled basic blocks, each holding straight-line instructions and one
 * terminator. Pointers are opaque.
 */

// =============================================================================
// TYPES
// =============================================================================

export type IRScalarType = "i1" | "i8" | "i32" | "i64" | "double" | "ptr" | "void";

/** Fixed-length array, `[N x T]` */
export interface IRArrayType {
  kind: "array";
  length: number;
  element: IRType;
}

export type IRType = IRScalarType | IRArrayType;

// =============================================================================
// VALUES
// =============================================================================

/** Literal operand; `null` only for `ptr` */
export interface IRConst {
  kind: "const";
  type: IRType;
  value: number | boolean | null;
}

/** Function-local SSA value or slot, printed as `%name` */
export interface IRRegister {
  kind: "register";
  type: IRType;
  name: string;
}

/** Module-level symbol, printed as `@name` */
export interface IRGlobalRef {
  kind: "global";
  type: IRType;
  name: string;
}

export type IRValue = IRConst | IRRegister | IRGlobalRef;

// =============================================================================
// INSTRUCTIONS
// =============================================================================

export type IRBinaryOp =
  | "add"
  | "sub"
  | "mul"
  | "sdiv"
  | "and"
  | "or"
  | "xor"
  | "fadd"
  | "fsub"
  | "fmul"
  | "fdiv";

export type IntPredicate = "eq" | "ne" | "slt" | "sle" | "sgt" | "sge";
export type FloatPredicate = "oeq" | "one" | "olt" | "ole" | "ogt" | "oge";

export interface BinaryInstruction {
  op: "binary";
  result: IRRegister;
  operator: IRBinaryOp;
  left: IRValue;
  right: IRValue;
}

export type CompareInstruction =
  | { op: "icmp"; result: IRRegister; predicate: IntPredicate; left: IRValue; right: IRValue }
  | { op: "fcmp"; result: IRRegister; predicate: FloatPredicate; left: IRValue; right: IRValue };

export interface FnegInstruction {
  op: "fneg";
  result: IRRegister;
  operand: IRValue;
}

/** Stack slot; only emitted in a function's entry block */
export interface AllocaInstruction {
  op: "alloca";
  result: IRRegister;
  allocated: IRType;
}

export interface LoadInstruction {
  op: "load";
  result: IRRegister;
  pointer: IRValue;
}

export interface StoreInstruction {
  op: "store";
  value: IRValue;
  pointer: IRValue;
}

/** Signature used at a call site; variadic callees print it in full */
export interface CallSignature {
  returnType: IRType;
  params: IRType[];
  variadic: boolean;
}

export interface CallInstruction {
  op: "call";
  /** Absent for calls whose result is void */
  result?: IRRegister;
  callee: string;
  signature: CallSignature;
  args: IRValue[];
}

export interface SelectInstruction {
  op: "select";
  result: IRRegister;
  condition: IRValue;
  ifTrue: IRValue;
  ifFalse: IRValue;
}

/** `getelementptr` over `base` with i64 indices */
export interface GepInstruction {
  op: "gep";
  result: IRRegister;
  base: IRType;
  pointer: IRValue;
  indices: IRValue[];
}

export interface ZextInstruction {
  op: "zext";
  result: IRRegister;
  operand: IRValue;
  to: IRType;
}

export type IRInstruction =
  | BinaryInstruction
  | CompareInstruction
  | FnegInstruction
  | AllocaInstruction
  | LoadInstruction
  | StoreInstruction
  | CallInstruction
  | SelectInstruction
  | GepInstruction
  | ZextInstruction;

export type IRTerminator =
  | { op: "br"; target: string }
  | { op: "condbr"; condition: IRValue; ifTrue: string; ifFalse: string }
  | { op: "ret"; value?: IRValue };

// =============================================================================
// MODULE
// =============================================================================

export interface BasicBlock {
  label: string;
  instructions: IRInstruction[];
  /** Set exactly once */
  terminator?: IRTerminator;
}

export interface IRParam {
  name: string;
  type: IRType;
}

export interface IRFunction {
  name: string;
  returnType: IRType;
  params: IRParam[];
  /** First block is the entry block */
  blocks: BasicBlock[];
}

/** Zero-initialized module variable */
export interface IRGlobal {
  name: string;
  type: IRType;
}

/** Private NUL-terminated byte string */
export interface IRStringConstant {
  name: string;
  value: string;
}

/** External function */
export interface IRDeclaration {
  name: string;
  signature: CallSignature;
}

export interface IRModule {
  name: string;
  sourceFile?: string;
  globals: IRGlobal[];
  strings: IRStringConstant[];
  declarations: IRDeclaration[];
  functions: IRFunction[];
}

// =============================================================================
// COMPILATION RESULT
// =============================================================================

export interface CompilationResult {
  success: boolean;
  ir?: IRModule;
  /** Textual IR; present only on success */
  text?: string;
  errors: CompilationError[];
  warnings: CompilationWarning[];
}

export interface CompilationError {
  code: string;
  message: string;
  line?: number;
  column?: number;
  file?: string;
}

export interface CompilationWarning {
  code: string;
  message: string;
  line?: number;
  column?: number;
  file?: string;
}

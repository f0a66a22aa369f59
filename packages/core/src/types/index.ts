/**
 * Type exports for @matc/core
 */

// Source types
export type {
  Type,
  TypeKind,
  IntType,
  BoolType,
  FloatType,
  VoidType,
  StringType,
  AutoType,
  MatrixType,
} from "./primitives.js";

export {
  T,
  typeEquals,
  typeToString,
  isNumeric,
  isMatrixElement,
} from "./primitives.js";

// IR
export type {
  IRType,
  IRScalarType,
  IRArrayType,
  IRValue,
  IRConst,
  IRRegister,
  IRGlobalRef,
  IRBinaryOp,
  IntPredicate,
  FloatPredicate,
  IRInstruction,
  IRTerminator,
  BinaryInstruction,
  CompareInstruction,
  FnegInstruction,
  AllocaInstruction,
  LoadInstruction,
  StoreInstruction,
  CallInstruction,
  CallSignature,
  SelectInstruction,
  GepInstruction,
  ZextInstruction,
  BasicBlock,
  IRParam,
  IRFunction,
  IRGlobal,
  IRStringConstant,
  IRDeclaration,
  IRModule,
  CompilationResult,
  CompilationError,
  CompilationWarning,
} from "./ir.js";

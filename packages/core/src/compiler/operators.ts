/**
 * Operator lowering tables
 */

import type { BinaryOperator, UnaryOperator } from "./matc/ast.js";
import { InternalError } from "./matc/errors.js";
import type { FloatPredicate, IRBinaryOp, IRRegister, IRValue, IntPredicate } from "../types/ir.js";
import { type FunctionBuilder, constBool, constInt } from "./ir-builder.js";

export type OperatorLowering =
  | { op: "binary"; operator: IRBinaryOp }
  | { op: "icmp"; predicate: IntPredicate }
  | { op: "fcmp"; predicate: FloatPredicate };

/** Integer form, and float form where the operator has one */
export interface OperatorForms {
  int: OperatorLowering;
  float?: OperatorLowering;
}

const arith = (int: IRBinaryOp, float: IRBinaryOp): OperatorForms => ({
  int: { op: "binary", operator: int },
  float: { op: "binary", operator: float },
});

const compare = (int: IntPredicate, float: FloatPredicate): OperatorForms => ({
  int: { op: "icmp", predicate: int },
  float: { op: "fcmp", predicate: float },
});

export const BINARY_OPERATORS: Readonly<Record<BinaryOperator, OperatorForms>> = {
  "+": arith("add", "fadd"),
  "-": arith("sub", "fsub"),
  "*": arith("mul", "fmul"),
  "/": arith("sdiv", "fdiv"),
  "==": compare("eq", "oeq"),
  "!=": compare("ne", "one"),
  "<": compare("slt", "olt"),
  "<=": compare("sle", "ole"),
  ">": compare("sgt", "ogt"),
  ">=": compare("sge", "oge"),
  and: { int: { op: "binary", operator: "and" } },
  or: { int: { op: "binary", operator: "or" } },
};

/**
 * Emit a binary operator. `float` selects the float form, and is decided by
 * the left operand's source type.
 */
export function lowerBinary(
  builder: FunctionBuilder,
  operator: BinaryOperator,
  left: IRValue,
  right: IRValue,
  float: boolean
): IRRegister {
  const forms = BINARY_OPERATORS[operator];
  const lowering = float ? forms.float : forms.int;
  if (!lowering) {
    throw new InternalError(`operator ${operator} has no float form`);
  }

  switch (lowering.op) {
    case "binary": {
      const result = builder.register("tmp", left.type);
      builder.emit({ op: "binary", result, operator: lowering.operator, left, right });
      return result;
    }
    case "icmp": {
      const result = builder.register("tmp", "i1");
      builder.emit({ op: "icmp", result, predicate: lowering.predicate, left, right });
      return result;
    }
    case "fcmp": {
      const result = builder.register("tmp", "i1");
      builder.emit({ op: "fcmp", result, predicate: lowering.predicate, left, right });
      return result;
    }
  }
}

export function lowerUnary(
  builder: FunctionBuilder,
  operator: UnaryOperator,
  operand: IRValue,
  float: boolean
): IRRegister {
  const result = builder.register("tmp", operand.type);

  if (operator === "not") {
    builder.emit({ op: "binary", result, operator: "xor", left: operand, right: constBool(true) });
  } else if (float) {
    builder.emit({ op: "fneg", result, operand });
  } else {
    builder.emit({ op: "binary", result, operator: "sub", left: constInt(0), right: operand });
  }
  return result;
}

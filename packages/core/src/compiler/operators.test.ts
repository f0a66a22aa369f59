/**
 * Operator lowering tests
 */

import { describe, expect, test } from "vitest";
import { FunctionBuilder, constBool, constFloat, constInt } from "./ir-builder.js";
import { BINARY_OPERATORS, lowerBinary, lowerUnary } from "./operators.js";

function builder(): FunctionBuilder {
  return new FunctionBuilder("F", "void", []);
}

describe("BINARY_OPERATORS", () => {
  test("covers every source operator", () => {
    expect(Object.keys(BINARY_OPERATORS).sort()).toEqual(
      ["!=", "*", "+", "-", "/", "<", "<=", "==", ">", ">=", "and", "or"].sort()
    );
  });

  test("logical operators have no float form", () => {
    expect(BINARY_OPERATORS.and.float).toBeUndefined();
    expect(BINARY_OPERATORS.or.float).toBeUndefined();
  });

  test("integer division is signed", () => {
    expect(BINARY_OPERATORS["/"].int).toEqual({ op: "binary", operator: "sdiv" });
  });
});

describe("lowerBinary", () => {
  test("integer arithmetic keeps the operand type", () => {
    const b = builder();
    const result = lowerBinary(b, "+", constInt(1), constInt(2), false);
    expect(result).toEqual({ kind: "register", type: "i32", name: "tmp" });
    expect(b.current.instructions).toEqual([
      { op: "binary", result, operator: "add", left: constInt(1), right: constInt(2) },
    ]);
  });

  test("the float flag selects the float form", () => {
    const b = builder();
    const result = lowerBinary(b, "/", constFloat(1), constFloat(2), true);
    expect(result.type).toBe("double");
    expect(b.current.instructions[0]).toMatchObject({ op: "binary", operator: "fdiv" });
  });

  test("comparisons produce i1", () => {
    const b = builder();
    const int = lowerBinary(b, "<=", constInt(1), constInt(2), false);
    const float = lowerBinary(b, "!=", constFloat(1), constFloat(2), true);
    expect([int.type, float.type]).toEqual(["i1", "i1"]);
    expect(b.current.instructions).toMatchObject([
      { op: "icmp", predicate: "sle" },
      { op: "fcmp", predicate: "one" },
    ]);
  });

  test("logical operators lower to bitwise i1 operations", () => {
    const b = builder();
    lowerBinary(b, "or", constBool(true), constBool(false), false);
    expect(b.current.instructions[0]).toMatchObject({ op: "binary", operator: "or", result: { type: "i1" } });
  });

  test("a float logical operator is an internal error", () => {
    expect(() => lowerBinary(builder(), "and", constFloat(1), constFloat(2), true)).toThrow(
      "internal error: operator and has no float form"
    );
  });
});

describe("lowerUnary", () => {
  test("integer negation subtracts from zero", () => {
    const b = builder();
    const result = lowerUnary(b, "-", constInt(5), false);
    expect(b.current.instructions).toEqual([
      { op: "binary", result, operator: "sub", left: constInt(0), right: constInt(5) },
    ]);
  });

  test("float negation uses fneg", () => {
    const b = builder();
    const result = lowerUnary(b, "-", constFloat(5), true);
    expect(b.current.instructions).toEqual([{ op: "fneg", result, operand: constFloat(5) }]);
  });

  test("not is xor with true", () => {
    const b = builder();
    const result = lowerUnary(b, "not", constBool(false), false);
    expect(result.type).toBe("i1");
    expect(b.current.instructions).toEqual([
      { op: "binary", result, operator: "xor", left: constBool(false), right: constBool(true) },
    ]);
  });
});

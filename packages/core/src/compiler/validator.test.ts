/**
 * Validator tests
 */

import { describe, expect, test } from "vitest";
import type { BasicBlock, IRFunction, IRModule } from "../types/ir.js";
import { constInt } from "./ir-builder.js";
import { validateIR } from "./validator.js";

function createValidIR(): IRModule {
  return {
    name: "main",
    globals: [{ name: "G", type: "i32" }],
    strings: [{ name: ".str", value: "%d\n" }],
    declarations: [{ name: "printf", signature: { returnType: "i32", params: ["ptr"], variadic: true } }],
    functions: [
      {
        name: "main",
        returnType: "i32",
        params: [],
        blocks: [
          {
            label: "entry",
            instructions: [
              { op: "alloca", result: { kind: "register", type: "ptr", name: "X" }, allocated: "i32" },
              {
                op: "call",
                result: { kind: "register", type: "i32", name: "printf" },
                callee: "printf",
                signature: { returnType: "i32", params: ["ptr"], variadic: true },
                args: [{ kind: "global", type: "ptr", name: ".str" }, constInt(1)],
              },
            ],
            terminator: { op: "br", target: "exit" },
          },
          { label: "exit", instructions: [], terminator: { op: "ret", value: constInt(0) } },
        ],
      },
    ],
  };
}

function withMain(update: (main: IRFunction) => void): IRModule {
  const ir = createValidIR();
  const main = ir.functions[0];
  if (main) update(main);
  return ir;
}

function block(label: string, terminator?: BasicBlock["terminator"]): BasicBlock {
  return { label, instructions: [], terminator };
}

describe("Validator", () => {
  test("accepts a well-formed module", () => {
    expect(validateIR(createValidIR())).toEqual({ valid: true, errors: [], warnings: [] });
  });

  test("rejects symbols defined twice", () => {
    const ir = createValidIR();
    ir.globals.push({ name: "main", type: "i1" });
    const result = validateIR(ir);
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([{ code: "DUPLICATE_SYMBOL", message: "Function '@main' is defined more than once" }]);
  });

  test("rejects functions without blocks", () => {
    const result = validateIR(withMain((main) => (main.blocks = [])));
    expect(result.errors).toEqual([{ code: "EMPTY_FUNCTION", message: "Function @main has no blocks" }]);
  });

  test("rejects a label reused as a value name", () => {
    const result = validateIR(withMain((main) => main.blocks.push(block("X", { op: "br", target: "exit" }))));
    expect(result.errors).toEqual([
      { code: "DUPLICATE_NAME", message: "Label 'X' is defined more than once in @main" },
    ]);
  });

  test("rejects alloca outside the entry block", () => {
    const result = validateIR(
      withMain((main) => {
        const exit = main.blocks[1];
        exit?.instructions.push({
          op: "alloca",
          result: { kind: "register", type: "ptr", name: "Y" },
          allocated: "double",
        });
      })
    );
    expect(result.errors).toEqual([
      { code: "ALLOCA_OUTSIDE_ENTRY", message: "alloca '%Y' outside the entry block in @main" },
    ]);
  });

  test("rejects unterminated blocks and unknown targets", () => {
    const result = validateIR(
      withMain((main) => {
        main.blocks = [
          block("entry", {
            op: "condbr",
            condition: { kind: "const", type: "i1", value: true },
            ifTrue: "exit",
            ifFalse: "nowhere",
          }),
          block("exit"),
        ];
      })
    );
    expect(result.errors).toEqual([
      { code: "UNKNOWN_BLOCK", message: "Block 'entry' branches to unknown block 'nowhere' in @main" },
      { code: "MISSING_TERMINATOR", message: "Block 'exit' has no terminator in @main" },
    ]);
  });

  test("rejects returns of the wrong type", () => {
    const result = validateIR(
      withMain((main) => {
        main.blocks = [block("entry", { op: "ret" })];
      })
    );
    expect(result.errors).toEqual([
      { code: "RETURN_TYPE", message: "Block 'entry' returns void from a function returning i32 in @main" },
    ]);
  });

  describe("calls", () => {
    function callModule(callee: string, args: number, withResult: boolean): IRModule {
      const ir = createValidIR();
      ir.functions.push({
        name: "F",
        returnType: "void",
        params: [{ name: "A", type: "i32" }],
        blocks: [block("entry", { op: "ret" })],
      });
      const entry = ir.functions[0]?.blocks[0];
      entry?.instructions.push({
        op: "call",
        result: withResult ? { kind: "register", type: "i32", name: "r" } : undefined,
        callee,
        signature: { returnType: "void", params: ["i32"], variadic: false },
        args: Array.from({ length: args }, (_, i) => constInt(i)),
      });
      return ir;
    }

    test("accepts a matching call", () => {
      expect(validateIR(callModule("F", 1, false)).valid).toBe(true);
    });

    test("rejects calls to unknown functions", () => {
      expect(validateIR(callModule("G2", 1, false)).errors).toEqual([
        { code: "UNKNOWN_FUNCTION", message: "Call to undeclared function '@G2' in @main" },
      ]);
    });

    test("rejects a wrong argument count", () => {
      expect(validateIR(callModule("F", 2, false)).errors).toEqual([
        { code: "CALL_ARITY", message: "Call to '@F' passes 2 argument(s), expected 1 in @main" },
      ]);
    });

    test("rejects a named result on a void call", () => {
      expect(validateIR(callModule("F", 1, true)).errors).toEqual([
        { code: "CALL_RESULT", message: "Call to '@F' does not match its void result in @main" },
      ]);
    });

    test("variadic callees need at least the fixed arguments", () => {
      const ir = createValidIR();
      const call = ir.functions[0]?.blocks[0]?.instructions[1];
      if (call?.op === "call") call.args = [];
      expect(validateIR(ir).errors).toEqual([
        { code: "CALL_ARITY", message: "Call to '@printf' passes 0 argument(s), expected at least 1 in @main" },
      ]);
    });
  });

  test("warns when the first block is not the entry", () => {
    const result = validateIR(
      withMain((main) => {
        main.blocks = [block("start", { op: "ret", value: constInt(0) })];
      })
    );
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([{ code: "ENTRY_LABEL", message: "First block of @main is not labelled 'entry'" }]);
  });
});

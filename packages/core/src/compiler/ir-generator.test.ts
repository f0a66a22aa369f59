/**
 * IR generator tests
 */

import { describe, expect, test } from "vitest";
import { T } from "../types/primitives.js";
import type { IRFunction, IRModule } from "../types/ir.js";
import { ScopeTable } from "./matc/scope.js";
import { analyze } from "./matc/analyzer.js";
import { parse } from "./matc/parser.js";
import {
  type IRGeneratorResult,
  generateIR,
  globalSymbol,
  lowerType,
  matrixStorage,
} from "./ir-generator.js";
import { printFunction, printModule } from "./ir-printer.js";

function generate(source: string): IRGeneratorResult {
  return generateIR(analyze(parse(source)));
}

function moduleOf(source: string): IRModule {
  const result = generate(source);
  if (!result.ir) throw new Error(result.errors.map((e) => e.message).join("; "));
  return result.ir;
}

function fn(source: string, name: string): IRFunction {
  const found = moduleOf(source).functions.find((f) => f.name === name);
  if (!found) throw new Error(`no function ${name}`);
  return found;
}

/** Printed body lines of a function, without the define line and braces */
function body(source: string, name = "main"): string[] {
  return printFunction(fn(source, name)).split("\n").slice(1, -1);
}

describe("IR Generator", () => {
  describe("types", () => {
    test("maps source types", () => {
      expect([T.int, T.bool, T.float, T.string, T.void, T.matrix(T.int, 2, 2)].map(lowerType)).toEqual([
        "i32",
        "i1",
        "double",
        "ptr",
        "void",
        "ptr",
      ]);
    });

    test("auto never reaches generation", () => {
      expect(() => lowerType(T.auto)).toThrow("internal error: auto type reached code generation");
    });

    test("globals named like a function get their own symbol", () => {
      const functions = new Set(["F", "MAIN"]);
      expect(globalSymbol("F", functions)).toBe("F.global");
      expect(globalSymbol("G", functions)).toBe("G");
    });

    test("matrix storage is a nested array", () => {
      expect(matrixStorage(T.matrix(T.float, 2, 3))).toEqual({
        kind: "array",
        length: 2,
        element: { kind: "array", length: 3, element: "double" },
      });
    });
  });

  describe("modules", () => {
    test("prints a minimal program", () => {
      expect(printModule(moduleOf("int MAIN() { print(1 + 2); return 0; }"))).toBe(
        [
          "; ModuleID = 'main'",
          'source_filename = "main"',
          "",
          '@.str = private unnamed_addr constant [4 x i8] c"%d\\0A\\00"',
          "",
          "declare i32 @printf(ptr, ...)",
          "",
          "define i32 @main() {",
          "entry:",
          "  %tmp = add i32 1, 2",
          "  %printf = call i32 (ptr, ...) @printf(ptr @.str, i32 %tmp)",
          "  ret i32 0",
          "}",
          "",
        ].join("\n")
      );
    });

    test("lowers globals, if and while", () => {
      const source =
        "int G;\nint MAIN() { int X = 3; if (X > 2) { G = 1; } else { G = 2; } while (X > 0) { X = X - 1; } return G; }";
      expect(printModule(moduleOf(source))).toBe(
        [
          "; ModuleID = 'main'",
          'source_filename = "main"',
          "",
          "@G = global i32 0",
          "",
          "define i32 @main() {",
          "entry:",
          "  %X = alloca i32",
          "  store i32 3, ptr %X",
          "  %X1 = load i32, ptr %X",
          "  %tmp = icmp sgt i32 %X1, 2",
          "  br i1 %tmp, label %then, label %else",
          "",
          "then:",
          "  store i32 1, ptr @G",
          "  br label %merge",
          "",
          "else:",
          "  store i32 2, ptr @G",
          "  br label %merge",
          "",
          "merge:",
          "  br label %while",
          "",
          "while:",
          "  %X3 = load i32, ptr %X",
          "  %tmp2 = icmp sgt i32 %X3, 0",
          "  br i1 %tmp2, label %while_body, label %merge1",
          "",
          "while_body:",
          "  %X2 = load i32, ptr %X",
          "  %tmp1 = sub i32 %X2, 1",
          "  store i32 %tmp1, ptr %X",
          "  br label %while",
          "",
          "merge1:",
          "  %G = load i32, ptr @G",
          "  ret i32 %G",
          "}",
          "",
        ].join("\n")
      );
    });

    test("string constants and declarations appear in first-use order", () => {
      const module = moduleOf(
        'void SHOW(float F, bool B) { print(-F); print(not B); printstr("hi"); }\nint MAIN() { SHOW(1.5, true); return 0; }'
      );
      expect(module.strings.map((s) => s.value)).toEqual(["%f\n", "%d\n", "hi", "%s\n"]);
      expect(module.declarations.map((d) => d.name)).toEqual(["printf"]);
    });
  });

  describe("functions", () => {
    test("formals are copied into slots and bool is widened for print", () => {
      const source =
        'void SHOW(float F, bool B) { print(-F); print(not B); printstr("hi"); }\nint MAIN() { SHOW(1.5, true); return 0; }';
      expect(printFunction(fn(source, "SHOW")).split("\n")).toEqual([
        "define void @SHOW(double %F, i1 %B) {",
        "entry:",
        "  %F.addr = alloca double",
        "  %B.addr = alloca i1",
        "  store double %F, ptr %F.addr",
        "  store i1 %B, ptr %B.addr",
        "  %F1 = load double, ptr %F.addr",
        "  %tmp = fneg double %F1",
        "  %printf = call i32 (ptr, ...) @printf(ptr @.str, double %tmp)",
        "  %B1 = load i1, ptr %B.addr",
        "  %tmp1 = xor i1 %B1, true",
        "  %tmp2 = zext i1 %tmp1 to i32",
        "  %printf1 = call i32 (ptr, ...) @printf(ptr @.str.1, i32 %tmp2)",
        "  %printf2 = call i32 (ptr, ...) @printf(ptr @.str.3, ptr @.str.2)",
        "  ret void",
        "}",
      ]);
      expect(body(source)).toEqual([
        "entry:",
        "  call void @SHOW(double 0x3FF8000000000000, i1 true)",
        "  ret i32 0",
      ]);
    });

    test("non-void calls name their result after the callee", () => {
      const lines = body("int TWICE(int A) { return A * 2; }\nint MAIN() { return TWICE(4); }");
      expect(lines).toContain("  %TWICE_result = call i32 @TWICE(i32 4)");
      expect(lines).toContain("  ret i32 %TWICE_result");
    });

    test("arguments are evaluated left to right", () => {
      const lines = body("int SUB(int A, int B) { return A - B; }\nint MAIN() { int X = 1; int Y = 2; return SUB(X, Y); }");
      expect(lines.slice(-4)).toEqual([
        "  %X1 = load i32, ptr %X",
        "  %Y1 = load i32, ptr %Y",
        "  %SUB_result = call i32 @SUB(i32 %X1, i32 %Y1)",
        "  ret i32 %SUB_result",
      ]);
    });

    test("uninitialized locals start at zero", () => {
      const lines = body("int MAIN() { int A; float B; bool C; string D; matrix<int, 1, 1> E; return 0; }");
      expect(lines.filter((l) => l.startsWith("  store"))).toEqual([
        "  store i32 0, ptr %A",
        "  store double 0x0000000000000000, ptr %B",
        "  store i1 false, ptr %C",
        "  store ptr null, ptr %D",
        "  store ptr null, ptr %E",
      ]);
    });

    test("shadowed names get their own slots", () => {
      const lines = body("int MAIN() { int X = 1; { int X = 2; print(X); } return X; }");
      expect(lines).toEqual([
        "entry:",
        "  %X = alloca i32",
        "  %X1 = alloca i32",
        "  store i32 1, ptr %X",
        "  store i32 2, ptr %X1",
        "  %X2 = load i32, ptr %X1",
        "  %printf = call i32 (ptr, ...) @printf(ptr @.str, i32 %X2)",
        "  %X3 = load i32, ptr %X",
        "  ret i32 %X3",
      ]);
    });

    test("float operands select the float instructions", () => {
      const lines = body("bool LESS(float A, float B) { return A + B < 2.0; }", "LESS");
      expect(lines).toContain("  %tmp = fadd double %A1, %B1");
      expect(lines).toContain("  %tmp1 = fcmp olt double %tmp, 0x4000000000000000");
    });

    test("integer operands select the integer instructions", () => {
      const lines = body("bool LESS(int A, int B) { return A + B < 2; }", "LESS");
      expect(lines).toContain("  %tmp = add i32 %A1, %B1");
      expect(lines).toContain("  %tmp1 = icmp slt i32 %tmp, 2");
    });
  });

  describe("matrices", () => {
    test("a literal is heap storage filled row by row", () => {
      expect(body("int MAIN() { matrix<int, 2, 2> M = [[1, 2], [3, 4]]; return rows(M); }")).toEqual([
        "entry:",
        "  %M = alloca ptr",
        "  %matrix = call ptr @malloc(i64 16)",
        "  %elem = getelementptr [2 x [2 x i32]], ptr %matrix, i64 0, i64 0, i64 0",
        "  store i32 1, ptr %elem",
        "  %elem1 = getelementptr [2 x [2 x i32]], ptr %matrix, i64 0, i64 0, i64 1",
        "  store i32 2, ptr %elem1",
        "  %elem2 = getelementptr [2 x [2 x i32]], ptr %matrix, i64 0, i64 1, i64 0",
        "  store i32 3, ptr %elem2",
        "  %elem3 = getelementptr [2 x [2 x i32]], ptr %matrix, i64 0, i64 1, i64 1",
        "  store i32 4, ptr %elem3",
        "  store ptr %matrix, ptr %M",
        "  %M1 = load ptr, ptr %M",
        "  %isnull = icmp eq ptr %M1, null",
        "  %rows = select i1 %isnull, i32 0, i32 2",
        "  ret i32 %rows",
      ]);
    });

    test("element size follows the element type", () => {
      expect(body("int MAIN() { auto M = [[1.0, 2.0, 3.0]]; return 0; }")).toContain(
        "  %matrix = call ptr @malloc(i64 24)"
      );
      expect(body("int MAIN() { auto M = [[true], [false]]; return 0; }")).toContain(
        "  %matrix = call ptr @malloc(i64 2)"
      );
    });

    test("cols of an uninitialized matrix selects between 0 and the static dimension", () => {
      const lines = body("int MAIN() { matrix<float, 3, 1> M; return cols(M); }");
      expect(lines).toContain("  store ptr null, ptr %M");
      expect(lines).toContain("  %cols = select i1 %isnull, i32 0, i32 1");
    });

    test("the empty literal is the null reference", () => {
      const lines = body("int MAIN() { matrix<int, 2, 2> M = []; return 0; }");
      expect(lines).toContain("  store ptr null, ptr %M");
      expect(lines.some((l) => l.includes("malloc"))).toBe(false);
    });
  });

  describe("control flow", () => {
    test("for and the equivalent while produce the same code", () => {
      const viaFor = moduleOf("int MAIN() { int I; for (I = 0; I < 3; I = I + 1) { print(I); } return 0; }");
      const viaWhile = moduleOf(
        "int MAIN() { int I; { I = 0; while (I < 3) { print(I); I = I + 1; } } return 0; }"
      );
      expect(printModule(viaFor)).toBe(printModule(viaWhile));
    });

    test("a for update assigns the body's local when it shadows the counter", () => {
      const lines = body("int MAIN() { int I; for (I = 0; I < 3; I = I + 1) { int I = 100; } return 0; }");
      const start = lines.indexOf("while_body:");
      expect(lines.slice(start, lines.indexOf("", start))).toEqual([
        "while_body:",
        "  store i32 100, ptr %I1",
        "  %I2 = load i32, ptr %I1",
        "  %tmp = add i32 %I2, 1",
        "  store i32 %tmp, ptr %I1",
        "  br label %while",
      ]);
    });

    test("code after return goes to an unreachable block", () => {
      const main = fn("int MAIN() { return 1; print(2); }", "main");
      expect(main.blocks.map((b) => b.label)).toEqual(["entry", "unreachable"]);
      expect(main.blocks.map((b) => b.terminator)).toEqual([
        { op: "ret", value: { kind: "const", type: "i32", value: 1 } },
        { op: "ret", value: { kind: "const", type: "i32", value: 0 } },
      ]);
    });

    test("an if whose branches both return leaves an unreachable merge", () => {
      const result = generate("int F(bool B) { if (B) { return 1; } else { return 2; } }");
      expect(result.warnings).toEqual([]);
      const merge = result.ir?.functions[0]?.blocks.find((b) => b.label === "merge");
      expect(merge?.terminator).toEqual({ op: "ret", value: { kind: "const", type: "i32", value: 0 } });
    });

    test("a reachable synthesized return is reported", () => {
      const result = generate("int F(int A) {\n  if (A > 0) { return 1; }\n}");
      expect(result.success).toBe(true);
      expect(result.warnings).toEqual([
        {
          code: "IMPLICIT_RETURN",
          message: "Function F can reach its end without returning a value; a zero value is returned there",
          line: 1,
          column: 1,
          file: undefined,
        },
      ]);
    });

    test("void functions fall off the end silently", () => {
      const result = generate("void F() { print(1); }");
      expect(result.warnings).toEqual([]);
      expect(result.ir?.functions[0]?.blocks[0]?.terminator).toEqual({ op: "ret" });
    });
  });

  test("reports internal errors as a failed result", () => {
    const scopes = new ScopeTable();
    const result = generateIR({
      globals: [],
      scopes,
      functions: [
        {
          name: "F",
          formals: [],
          returnType: T.int,
          body: {
            kind: "block",
            scope: scopes.create(scopes.global),
            body: [{ kind: "return", value: { type: T.int, expr: { kind: "identifier", name: "MISSING" } } }],
          },
        },
      ],
    });
    expect(result.success).toBe(false);
    expect(result.ir).toBeUndefined();
    expect(result.errors).toEqual([{ code: "INTERNAL_ERROR", message: "internal error: no storage for MISSING" }]);
  });
});

/**
 * IR builder tests
 */

import { describe, expect, test } from "vitest";
import {
  FunctionBuilder,
  ModuleBuilder,
  NameAllocator,
  constInt,
  irTypeEquals,
  zeroValue,
} from "./ir-builder.js";

describe("NameAllocator", () => {
  test("numbers repeated names", () => {
    const names = new NameAllocator();
    expect([names.fresh("tmp"), names.fresh("tmp"), names.fresh("tmp")]).toEqual(["tmp", "tmp1", "tmp2"]);
  });

  test("skips names already taken", () => {
    const names = new NameAllocator();
    names.fresh("X1");
    expect([names.fresh("X"), names.fresh("X")]).toEqual(["X", "X2"]);
  });
});

describe("FunctionBuilder", () => {
  test("starts in an entry block and reserves parameter names", () => {
    const builder = new FunctionBuilder("F", "i32", [{ name: "A", type: "i32" }]);
    expect(builder.current.label).toBe("entry");
    expect(builder.register("A", "i32").name).toBe("A1");
  });

  test("places allocas at the top of the entry block", () => {
    const builder = new FunctionBuilder("F", "void", []);
    const first = builder.alloca("i32", "X");
    builder.emit({ op: "store", value: constInt(1), pointer: first });
    const next = builder.createBlock("next");
    builder.terminate({ op: "br", target: next.label });
    builder.positionAt(next);
    builder.alloca("double", "Y");

    expect(builder.fn.blocks[0]?.instructions.map((i) => i.op)).toEqual(["alloca", "alloca", "store"]);
    expect(next.instructions).toEqual([]);
  });

  test("opens an unreachable block after a terminator", () => {
    const builder = new FunctionBuilder("F", "void", []);
    builder.terminate({ op: "ret" });
    builder.emit({ op: "store", value: constInt(1), pointer: builder.alloca("i32", "X") });

    expect(builder.fn.blocks.map((b) => b.label)).toEqual(["entry", "unreachable"]);
    expect(builder.current.label).toBe("unreachable");
    expect(builder.isTerminated()).toBe(false);
  });

  test("branchIfOpen leaves a terminated block alone", () => {
    const builder = new FunctionBuilder("F", "void", []);
    const target = builder.createBlock("target");
    builder.terminate({ op: "ret" });
    builder.branchIfOpen(target);
    expect(builder.fn.blocks[0]?.terminator).toEqual({ op: "ret" });
  });

  test("labels share the value namespace", () => {
    const builder = new FunctionBuilder("F", "void", []);
    builder.register("then", "i32");
    expect(builder.createBlock("then").label).toBe("then1");
  });

  test("reachable follows branch targets from entry", () => {
    const builder = new FunctionBuilder("F", "void", []);
    const a = builder.createBlock("a");
    const b = builder.createBlock("b");
    const orphan = builder.createBlock("orphan");
    builder.terminate({ op: "condbr", condition: { kind: "const", type: "i1", value: true }, ifTrue: a.label, ifFalse: a.label });
    builder.positionAt(a);
    builder.terminate({ op: "br", target: b.label });
    builder.positionAt(orphan);
    builder.terminate({ op: "br", target: b.label });

    expect([...builder.reachable()].sort()).toEqual(["a", "b", "entry"]);
  });
});

describe("ModuleBuilder", () => {
  test("interns string constants in first-use order", () => {
    const module = new ModuleBuilder("m");
    expect(module.stringConstant("%d\n").name).toBe(".str");
    expect(module.stringConstant("hi").name).toBe(".str.1");
    expect(module.stringConstant("%d\n").name).toBe(".str");
    expect(module.build().strings).toEqual([
      { name: ".str", value: "%d\n" },
      { name: ".str.1", value: "hi" },
    ]);
  });

  test("declares each external function once", () => {
    const module = new ModuleBuilder("m", "m.mat");
    const signature = { returnType: "ptr" as const, params: ["i64" as const], variadic: false };
    module.declare("malloc", signature);
    module.declare("malloc", signature);
    const built = module.build();
    expect(built.declarations).toEqual([{ name: "malloc", signature }]);
    expect(built.sourceFile).toBe("m.mat");
  });

  test("globals are referenced as pointers", () => {
    const module = new ModuleBuilder("m");
    expect(module.addGlobal("G", "double")).toEqual({ kind: "global", type: "ptr", name: "G" });
    expect(module.build().globals).toEqual([{ name: "G", type: "double" }]);
  });
});

describe("values", () => {
  test("zero values per type", () => {
    expect(zeroValue("i32")).toEqual({ kind: "const", type: "i32", value: 0 });
    expect(zeroValue("i1")).toEqual({ kind: "const", type: "i1", value: false });
    expect(zeroValue("double")).toEqual({ kind: "const", type: "double", value: 0 });
    expect(zeroValue("ptr")).toEqual({ kind: "const", type: "ptr", value: null });
  });

  test("array types compare structurally", () => {
    const a = { kind: "array" as const, length: 2, element: "i32" as const };
    expect(irTypeEquals(a, { kind: "array", length: 2, element: "i32" })).toBe(true);
    expect(irTypeEquals(a, { kind: "array", length: 3, element: "i32" })).toBe(false);
    expect(irTypeEquals(a, "ptr")).toBe(false);
  });
});

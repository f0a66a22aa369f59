/**
 * IR Generator
 * Lowers the typed tree into an IR module
 */

import type { MatrixType, Type } from "../types/primitives.js";
import type {
  CallSignature,
  CompilationError,
  CompilationWarning,
  IRGlobalRef,
  IRModule,
  IRRegister,
  IRType,
  IRValue,
} from "../types/ir.js";
import { desugarFor, lowerIf, lowerWhile, type StatementLowerer } from "./control-flow.js";
import {
  FunctionBuilder,
  ModuleBuilder,
  constBool,
  constFloat,
  constInt,
  nullPointer,
  zeroValue,
} from "./ir-builder.js";
import { ENTRY_POINT } from "./matc/analyzer.js";
import { InternalError, MatcError } from "./matc/errors.js";
import type { ScopeId, ScopeTable } from "./matc/scope.js";
import type { TypedBlock, TypedExpr, TypedFunction, TypedProgram, TypedStmt } from "./matc/typed-ast.js";
import { lowerBinary, lowerUnary } from "./operators.js";

export interface IRGeneratorOptions {
  /** Module identifier; defaults to the source file name or "main" */
  moduleName?: string;
  sourceFile?: string;
}

export interface IRGeneratorResult {
  success: boolean;
  ir?: IRModule;
  errors: CompilationError[];
  warnings: CompilationWarning[];
}

const PRINTF: CallSignature = { returnType: "i32", params: ["ptr"], variadic: true };
const MALLOC: CallSignature = { returnType: "ptr", params: ["i64"], variadic: false };

const FORMATS = { int: "%d\n", float: "%f\n", string: "%s\n" } as const;

// =============================================================================
// TYPE MAPPING
// =============================================================================

/** IR type of a value of the given source type */
export function lowerType(type: Type): IRType {
  switch (type.kind) {
    case "int":
      return "i32";
    case "bool":
      return "i1";
    case "float":
      return "double";
    case "void":
      return "void";
    case "string":
    case "matrix":
      return "ptr";
    case "auto":
      throw new InternalError("auto type reached code generation");
  }
}

/** `[R x [C x T]]`, the storage a matrix reference points to */
export function matrixStorage(type: MatrixType): IRType {
  return {
    kind: "array",
    length: type.rows,
    element: { kind: "array", length: type.cols, element: lowerType(type.element) },
  };
}

function elementSize(type: Type): number {
  switch (type.kind) {
    case "float":
      return 8;
    case "bool":
      return 1;
    default:
      return 4;
  }
}

/** Symbol a source function is emitted under */
export function functionSymbol(name: string): string {
  return name === ENTRY_POINT ? "main" : name;
}

/**
 * Symbol a global variable is emitted under. Functions and variables have
 * separate source namespaces but share module symbols, so a global named
 * like a function takes a `.global` suffix.
 */
export function globalSymbol(name: string, functions: ReadonlySet<string>): string {
  return functions.has(name) ? `${name}.global` : name;
}

// =============================================================================
// FUNCTION GENERATION
// =============================================================================

/** Lowering state of one function */
class FunctionGenerator implements StatementLowerer {
  readonly builder: FunctionBuilder;
  private readonly module: ModuleBuilder;
  private readonly scopes: ScopeTable;
  private readonly globals: ReadonlyMap<string, IRGlobalRef>;
  private readonly signatures: ReadonlyMap<string, CallSignature>;
  /** Slots per scope, filled in emission order */
  private readonly slots = new Map<ScopeId, Map<string, IRRegister>>();
  private scope: ScopeId;

  constructor(
    fn: TypedFunction,
    module: ModuleBuilder,
    scopes: ScopeTable,
    globals: ReadonlyMap<string, IRGlobalRef>,
    signatures: ReadonlyMap<string, CallSignature>
  ) {
    this.module = module;
    this.scopes = scopes;
    this.globals = globals;
    this.signatures = signatures;
    this.scope = fn.body.scope;

    const params = fn.formals.map((f) => ({ name: f.name, type: lowerType(f.type) }));
    this.builder = new FunctionBuilder(functionSymbol(fn.name), lowerType(fn.returnType), params);

    for (const param of params) {
      const slot = this.builder.alloca(param.type, `${param.name}.addr`);
      this.builder.emit({
        op: "store",
        value: { kind: "register", type: param.type, name: param.name },
        pointer: slot,
      });
      this.bind(this.scope, param.name, slot);
    }
  }

  /**
   * Lower the body and close the last block. Returns true when a
   * synthesized return of a non-void function is reachable.
   */
  generate(body: TypedBlock): boolean {
    this.block(body);
    if (this.builder.isTerminated()) {
      return false;
    }

    const returnType = this.builder.fn.returnType;
    const label = this.builder.current.label;
    this.builder.terminate(returnType === "void" ? { op: "ret" } : { op: "ret", value: zeroValue(returnType) });
    return returnType !== "void" && this.builder.reachable().has(label);
  }

  // ===========================================================================
  // STATEMENTS
  // ===========================================================================

  block(block: TypedBlock): void {
    const outer = this.scope;
    this.scope = block.scope;
    for (const stmt of block.body) {
      this.statement(stmt);
    }
    this.scope = outer;
  }

  private statement(stmt: TypedStmt): void {
    switch (stmt.kind) {
      case "block":
        this.block(stmt);
        return;

      case "var": {
        const type = lowerType(stmt.type);
        const value = stmt.init ? this.expression(stmt.init) : zeroValue(type);
        const slot = this.builder.alloca(type, stmt.name);
        this.bind(this.scope, stmt.name, slot);
        this.builder.emit({ op: "store", value, pointer: slot });
        return;
      }

      case "expr":
        this.expression(stmt.expr);
        return;

      case "return":
        if (stmt.value) {
          this.builder.terminate({ op: "ret", value: this.expression(stmt.value) });
        } else {
          this.builder.terminate({ op: "ret" });
        }
        return;

      case "if":
        lowerIf(this, stmt.condition, stmt.thenBranch, stmt.elseBranch);
        return;

      case "while":
        lowerWhile(this, stmt.condition, stmt.body);
        return;

      case "for":
        this.block(desugarFor(stmt));
        return;
    }
  }

  // ===========================================================================
  // EXPRESSIONS
  // ===========================================================================

  expression(typed: TypedExpr): IRValue {
    const expr = typed.expr;

    switch (expr.kind) {
      case "int":
        return constInt(expr.value);
      case "float":
        return constFloat(expr.value);
      case "bool":
        return constBool(expr.value);
      case "string":
        return this.module.stringConstant(expr.value);
      case "noexpr":
        return constInt(0);

      case "identifier": {
        const result = this.builder.register(expr.name, lowerType(typed.type));
        this.builder.emit({ op: "load", result, pointer: this.lookup(expr.name) });
        return result;
      }

      case "assign": {
        const value = this.expression(expr.value);
        this.builder.emit({ op: "store", value, pointer: this.lookup(expr.name) });
        return value;
      }

      case "binary": {
        const left = this.expression(expr.left);
        const right = this.expression(expr.right);
        return lowerBinary(this.builder, expr.op, left, right, expr.left.type.kind === "float");
      }

      case "unary": {
        const operand = this.expression(expr.operand);
        return lowerUnary(this.builder, expr.op, operand, expr.operand.type.kind === "float");
      }

      case "matrix":
        return this.matrixLiteral(typed.type, expr.rows);

      case "builtin":
        return this.builtin(expr.name, expr.args);

      case "call": {
        const signature = this.signatures.get(expr.callee);
        if (!signature) {
          throw new InternalError(`call to unknown function ${expr.callee}`);
        }
        const args = expr.args.map((arg) => this.expression(arg));
        const callee = functionSymbol(expr.callee);

        if (signature.returnType === "void") {
          this.builder.emit({ op: "call", callee, signature, args });
          return constInt(0);
        }
        const result = this.builder.register(`${expr.callee}_result`, signature.returnType);
        this.builder.emit({ op: "call", result, callee, signature, args });
        return result;
      }
    }
  }

  private builtin(name: "print" | "printstr" | "rows" | "cols", args: TypedExpr[]): IRValue {
    const [arg] = args;
    if (!arg) {
      throw new InternalError(`${name} called without an argument`);
    }

    switch (name) {
      case "print": {
        let value = this.expression(arg);
        if (arg.type.kind === "bool") {
          const widened = this.builder.register("tmp", "i32");
          this.builder.emit({ op: "zext", result: widened, operand: value, to: "i32" });
          value = widened;
        }
        const format = arg.type.kind === "float" ? FORMATS.float : FORMATS.int;
        return this.printf(format, value);
      }

      case "printstr":
        return this.printf(FORMATS.string, this.expression(arg));

      case "rows":
      case "cols": {
        if (arg.type.kind !== "matrix") {
          throw new InternalError(`${name} applied to ${arg.type.kind}`);
        }
        const matrix = this.expression(arg);
        const isNull = this.builder.register("isnull", "i1");
        this.builder.emit({ op: "icmp", result: isNull, predicate: "eq", left: matrix, right: nullPointer() });

        const dimension = name === "rows" ? arg.type.rows : arg.type.cols;
        const result = this.builder.register(name, "i32");
        this.builder.emit({
          op: "select",
          result,
          condition: isNull,
          ifTrue: constInt(0),
          ifFalse: constInt(dimension),
        });
        return result;
      }
    }
  }

  private printf(format: string, value: IRValue): IRValue {
    this.module.declare("printf", PRINTF);
    const result = this.builder.register("printf", "i32");
    this.builder.emit({
      op: "call",
      result,
      callee: "printf",
      signature: PRINTF,
      args: [this.module.stringConstant(format), value],
    });
    return result;
  }

  /** Heap storage for a literal, filled row by row; `[]` is the null reference */
  private matrixLiteral(type: Type, rows: TypedExpr[][]): IRValue {
    if (type.kind !== "matrix") {
      throw new InternalError(`matrix literal typed as ${type.kind}`);
    }
    if (rows.length === 0) {
      return nullPointer();
    }

    this.module.declare("malloc", MALLOC);
    const bytes = type.rows * type.cols * elementSize(type.element);
    const storage = this.builder.register("matrix", "ptr");
    this.builder.emit({
      op: "call",
      result: storage,
      callee: "malloc",
      signature: MALLOC,
      args: [constInt(bytes, "i64")],
    });

    const layout = matrixStorage(type);
    rows.forEach((row, i) => {
      row.forEach((element, j) => {
        const value = this.expression(element);
        const pointer = this.builder.register("elem", "ptr");
        this.builder.emit({
          op: "gep",
          result: pointer,
          base: layout,
          pointer: storage,
          indices: [constInt(0, "i64"), constInt(i, "i64"), constInt(j, "i64")],
        });
        this.builder.emit({ op: "store", value, pointer });
      });
    });
    return storage;
  }

  // ===========================================================================
  // STORAGE
  // ===========================================================================

  private bind(scope: ScopeId, name: string, slot: IRRegister): void {
    let slots = this.slots.get(scope);
    if (!slots) {
      slots = new Map();
      this.slots.set(scope, slots);
    }
    slots.set(name, slot);
  }

  /** Innermost slot bound so far for `name`, falling back to globals */
  private lookup(name: string): IRValue {
    for (let id: ScopeId | undefined = this.scope; id !== undefined; id = this.scopes.parentOf(id)) {
      const slot = this.slots.get(id)?.get(name);
      if (slot) return slot;
    }
    const global = this.globals.get(name);
    if (!global) {
      throw new InternalError(`no storage for ${name}`);
    }
    return global;
  }
}

// =============================================================================
// MODULE GENERATION
// =============================================================================

/**
 * Generate an IR module from an analyzed program
 */
export function generateIR(program: TypedProgram, options: IRGeneratorOptions = {}): IRGeneratorResult {
  const warnings: CompilationWarning[] = [];

  try {
    const module = new ModuleBuilder(options.moduleName ?? options.sourceFile ?? "main", options.sourceFile);

    const functions = new Set(program.functions.map((fn) => fn.name));
    const globals = new Map<string, IRGlobalRef>();
    for (const global of program.globals) {
      globals.set(global.name, module.addGlobal(globalSymbol(global.name, functions), lowerType(global.type)));
    }

    const signatures = new Map<string, CallSignature>();
    for (const fn of program.functions) {
      signatures.set(fn.name, {
        returnType: lowerType(fn.returnType),
        params: fn.formals.map((f) => lowerType(f.type)),
        variadic: false,
      });
    }

    for (const fn of program.functions) {
      const generator = new FunctionGenerator(fn, module, program.scopes, globals, signatures);
      if (generator.generate(fn.body)) {
        warnings.push({
          code: "IMPLICIT_RETURN",
          message: `Function ${fn.name} can reach its end without returning a value; a zero value is returned there`,
          line: fn.location?.line,
          column: fn.location?.column,
          file: fn.location?.file,
        });
      }
      module.addFunction(generator.builder.fn);
    }

    return { success: true, ir: module.build(), errors: [], warnings };
  } catch (e) {
    if (!(e instanceof MatcError)) {
      throw e;
    }
    return {
      success: false,
      errors: [{ code: e.code, message: e.message }],
      warnings,
    };
  }
}

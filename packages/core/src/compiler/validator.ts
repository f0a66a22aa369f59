/**
 * Validator for IR modules
 * Checks structural well-formedness of generated code before it is printed
 */

import type {
  CallSignature,
  CompilationError,
  CompilationWarning,
  IRFunction,
  IRInstruction,
  IRModule,
  IRTerminator,
} from "../types/ir.js";
import { irTypeEquals } from "./ir-builder.js";
import { formatType } from "./ir-printer.js";

export interface ValidationResult {
  valid: boolean;
  errors: CompilationError[];
  warnings: CompilationWarning[];
}

/**
 * Validate an IR module
 */
export function validateIR(module: IRModule): ValidationResult {
  const errors: CompilationError[] = [];
  const warnings: CompilationWarning[] = [];

  // Module-level symbols share one namespace
  const symbols = new Set<string>();
  const callable = new Map<string, CallSignature>();

  const claim = (name: string, what: string): void => {
    if (symbols.has(name)) {
      errors.push({ code: "DUPLICATE_SYMBOL", message: `${what} '@${name}' is defined more than once` });
    }
    symbols.add(name);
  };

  for (const global of module.globals) claim(global.name, "Global");
  for (const constant of module.strings) claim(constant.name, "String constant");
  for (const declaration of module.declarations) {
    claim(declaration.name, "Declaration");
    callable.set(declaration.name, declaration.signature);
  }
  for (const fn of module.functions) {
    claim(fn.name, "Function");
    callable.set(fn.name, {
      returnType: fn.returnType,
      params: fn.params.map((p) => p.type),
      variadic: false,
    });
  }

  for (const fn of module.functions) {
    validateFunction(fn, callable, errors, warnings);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

function validateFunction(
  fn: IRFunction,
  callable: ReadonlyMap<string, CallSignature>,
  errors: CompilationError[],
  warnings: CompilationWarning[]
): void {
  const where = `in @${fn.name}`;

  if (fn.blocks.length === 0) {
    errors.push({ code: "EMPTY_FUNCTION", message: `Function @${fn.name} has no blocks` });
    return;
  }

  // Labels and values share one per-function namespace
  const names = new Set<string>();
  const claim = (name: string, what: string): void => {
    if (names.has(name)) {
      errors.push({ code: "DUPLICATE_NAME", message: `${what} '${name}' is defined more than once ${where}` });
    }
    names.add(name);
  };

  for (const param of fn.params) claim(param.name, "Parameter");
  for (const block of fn.blocks) {
    claim(block.label, "Label");
    for (const instruction of block.instructions) {
      const result = resultOf(instruction);
      if (result) claim(result, "Value");
    }
  }

  const labels = new Set(fn.blocks.map((b) => b.label));

  fn.blocks.forEach((block, index) => {
    for (const instruction of block.instructions) {
      if (instruction.op === "alloca" && index !== 0) {
        errors.push({
          code: "ALLOCA_OUTSIDE_ENTRY",
          message: `alloca '%${instruction.result.name}' outside the entry block ${where}`,
        });
      }
      if (instruction.op === "call") {
        validateCall(instruction, callable, where, errors);
      }
    }

    if (!block.terminator) {
      errors.push({ code: "MISSING_TERMINATOR", message: `Block '${block.label}' has no terminator ${where}` });
      return;
    }

    for (const target of targetsOf(block.terminator)) {
      if (!labels.has(target)) {
        errors.push({
          code: "UNKNOWN_BLOCK",
          message: `Block '${block.label}' branches to unknown block '${target}' ${where}`,
        });
      }
    }

    if (block.terminator.op === "ret") {
      const value = block.terminator.value;
      const returned = value ? value.type : "void";
      if (!irTypeEquals(returned, fn.returnType)) {
        errors.push({
          code: "RETURN_TYPE",
          message: `Block '${block.label}' returns ${formatType(returned)} from a function returning ${formatType(fn.returnType)} ${where}`,
        });
      }
    }
  });

  if (fn.blocks[0]?.label !== "entry") {
    warnings.push({ code: "ENTRY_LABEL", message: `First block of @${fn.name} is not labelled 'entry'` });
  }
}

function validateCall(
  instruction: Extract<IRInstruction, { op: "call" }>,
  callable: ReadonlyMap<string, CallSignature>,
  where: string,
  errors: CompilationError[]
): void {
  const signature = callable.get(instruction.callee);
  if (!signature) {
    errors.push({ code: "UNKNOWN_FUNCTION", message: `Call to undeclared function '@${instruction.callee}' ${where}` });
    return;
  }

  const count = instruction.args.length;
  const expected = signature.params.length;
  if (signature.variadic ? count < expected : count !== expected) {
    errors.push({
      code: "CALL_ARITY",
      message: `Call to '@${instruction.callee}' passes ${count} argument(s), expected ${signature.variadic ? "at least " : ""}${expected} ${where}`,
    });
  }

  if ((signature.returnType === "void") !== (instruction.result === undefined)) {
    errors.push({
      code: "CALL_RESULT",
      message: `Call to '@${instruction.callee}' does not match its ${formatType(signature.returnType)} result ${where}`,
    });
  }
}

function resultOf(instruction: IRInstruction): string | undefined {
  switch (instruction.op) {
    case "store":
      return undefined;
    case "call":
      return instruction.result?.name;
    default:
      return instruction.result.name;
  }
}

function targetsOf(terminator: IRTerminator): string[] {
  switch (terminator.op) {
    case "br":
      return [terminator.target];
    case "condbr":
      return [terminator.ifTrue, terminator.ifFalse];
    case "ret":
      return [];
  }
}

/**
 * Compiler exports
 */

import { readFile } from "node:fs/promises";

export { generateIR, lowerType, matrixStorage, functionSymbol, globalSymbol } from "./ir-generator.js";
export type { IRGeneratorOptions, IRGeneratorResult } from "./ir-generator.js";
export { validateIR, type ValidationResult } from "./validator.js";
export {
  printModule,
  printFunction,
  formatInstruction,
  formatTerminator,
  formatType,
  formatValue,
  formatDouble,
  escapeString,
} from "./ir-printer.js";
export { FunctionBuilder, ModuleBuilder, NameAllocator } from "./ir-builder.js";
export { desugarFor } from "./control-flow.js";
export { BINARY_OPERATORS, lowerBinary, lowerUnary } from "./operators.js";

export * from "./matc/index.js";

import type { CompilationResult } from "../types/ir.js";
import { type CompileOptions, compileMatc } from "./matc/index.js";

/**
 * Compile matc source from a string
 * This is the main entry point for compilation
 */
export function compile(source: string, options?: CompileOptions): CompilationResult {
  return compileMatc(source, options);
}

/**
 * Compile a .mat file from file path
 */
export async function compileFile(
  filePath: string,
  options: Omit<CompileOptions, "filePath"> = {}
): Promise<CompilationResult> {
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return {
      success: false,
      errors: [
        {
          code: "FILE_READ_ERROR",
          message: `Failed to read file: ${message}`,
        },
      ],
      warnings: [],
    };
  }
  return compile(content, { ...options, filePath });
}

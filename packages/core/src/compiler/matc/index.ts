/**
 * matc front end and compilation pipeline
 */

export * from "./errors.js";
export * from "./tokenizer.js";
export * from "./ast.js";
export * from "./typed-ast.js";
export { Preprocessor, preprocess, type PreprocessOptions, type Macro } from "./preprocessor.js";
export { type SourceHost, createFileSystemHost, createMemoryHost } from "./source-host.js";
export { Parser, parse, parseTokens } from "./parser.js";
export { ScopeTable, type ScopeId, type ScopeRecord } from "./scope.js";
export { Analyzer, analyze, ENTRY_POINT, type AnalyzeOptions, type FunctionSignature } from "./analyzer.js";

import type { CompilationError, CompilationResult } from "../../types/ir.js";
import { generateIR } from "../ir-generator.js";
import { printModule } from "../ir-printer.js";
import { validateIR } from "../validator.js";
import { analyze } from "./analyzer.js";
import { MatcError } from "./errors.js";
import { parseTokens } from "./parser.js";
import { preprocess } from "./preprocessor.js";
import type { SourceHost } from "./source-host.js";

export interface CompileOptions {
  /** Path of the source; anchors #include and names the module */
  filePath?: string;
  /** Directories searched by #include after the including file's own */
  includePaths?: readonly string[];
  /** Macros defined before the first line */
  defines?: Readonly<Record<string, string>>;
  /** Module identifier; defaults to the file path, then "main" */
  moduleName?: string;
  /** Source host used for #include; defaults to the file system */
  host?: SourceHost;
}

/** Diagnostic for a thrown compiler error */
export function toCompilationError(error: MatcError): CompilationError {
  const diagnostic: CompilationError = { code: error.code, message: error.message };
  if (error.location) {
    diagnostic.line = error.location.line;
    diagnostic.column = error.location.column;
    if (error.location.file !== undefined) diagnostic.file = error.location.file;
  }
  return diagnostic;
}

/**
 * Compile matc source to IR
 */
export function compileMatc(source: string, options: CompileOptions = {}): CompilationResult {
  try {
    // Step 1: Preprocess and tokenize
    const tokens = preprocess(source, {
      file: options.filePath,
      includePaths: options.includePaths,
      defines: options.defines,
      host: options.host,
    });

    // Step 2: Parse to AST
    const ast = parseTokens(tokens, source, options.filePath);

    // Step 3: Resolve scopes and types
    const program = analyze(ast, { source, file: options.filePath });

    // Step 4: Generate IR
    const irResult = generateIR(program, {
      moduleName: options.moduleName,
      sourceFile: options.filePath,
    });
    if (!irResult.success || !irResult.ir) {
      return {
        success: false,
        errors: irResult.errors,
        warnings: irResult.warnings,
      };
    }

    // Step 5: Validate
    const validationResult = validateIR(irResult.ir);
    if (!validationResult.valid) {
      return {
        success: false,
        errors: [...irResult.errors, ...validationResult.errors],
        warnings: [...irResult.warnings, ...validationResult.warnings],
      };
    }

    return {
      success: true,
      ir: irResult.ir,
      text: printModule(irResult.ir),
      errors: [],
      warnings: [...irResult.warnings, ...validationResult.warnings],
    };
  } catch (error) {
    if (error instanceof MatcError) {
      return { success: false, errors: [toCompilationError(error)], warnings: [] };
    }
    return {
      success: false,
      errors: [
        {
          code: "INTERNAL_ERROR",
          message: `internal error: ${error instanceof Error ? error.message : String(error)}`,
        },
      ],
      warnings: [],
    };
  }
}

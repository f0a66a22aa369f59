/**
 * @matc/core
 * Compiler for the matc matrix language
 */

// Types
export * from "./types/index.js";

// Compiler
export * from "./compiler/index.js";

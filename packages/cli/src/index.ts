#!/usr/bin/env -S npx tsx
/**
 * matc CLI
 * Command-line interface for compiling matc programs
 */

import { Command } from "commander";
import { checkCommand } from "./commands/check.js";
import { compileAllCommand } from "./commands/compile-all.js";
import { compileCommand } from "./commands/compile.js";

const collect = (value: string, previous: string[] = []): string[] => [...previous, value];

const program = new Command();

program.name("matc").description("Compiler for the matc matrix language").version("0.1.0");

// Compile command
program
  .command("compile [file]")
  .description("Compile a .mat file (or standard input) to LLVM IR")
  .option("-o, --output <file>", "Output file for the IR")
  .option("--format <format>", "Output format: text or json", "text")
  .option("-I, --include <dir>", "Add an #include search directory", collect)
  .option("-D, --define <macro>", "Define a macro as NAME or NAME=VALUE", collect)
  .action(compileCommand);

// Check command
program
  .command("check <file>")
  .description("Check a .mat file without writing IR")
  .option("--strict", "Treat warnings as errors")
  .option("-I, --include <dir>", "Add an #include search directory", collect)
  .option("-D, --define <macro>", "Define a macro as NAME or NAME=VALUE", collect)
  .action(checkCommand);

// Compile all command
program
  .command("compile-all [dir]")
  .description("Compile all .mat files in a directory (default: current directory)")
  .option("--fail-fast", "Stop after the first failure")
  .option("--json", "Output results as JSON")
  .option("-I, --include <dir>", "Add an #include search directory", collect)
  .option("-D, --define <macro>", "Define a macro as NAME or NAME=VALUE", collect)
  .action(compileAllCommand);

// Parse and run
await program.parseAsync();

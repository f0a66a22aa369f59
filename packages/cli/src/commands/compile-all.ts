/**
 * Compile All Command
 * Compiles every .mat file under a directory and reports each outcome
 */

import { readdir } from "node:fs/promises";
import { join, relative, resolve } from "node:path";
import { type CompilationError, type CompilationWarning, type CompileOptions, compileFile } from "@matc/core";
import chalk from "chalk";
import { type PipelineOptions, collectDefines, collectIncludePaths } from "./options.js";

/** Extension of matc source files */
export const SOURCE_EXTENSION = ".mat";

interface CompileAllOptions extends PipelineOptions {
  failFast?: boolean;
  json?: boolean;
}

export interface SourceSummary {
  file: string;
  success: boolean;
  /** Blocks across all functions; 0 when compilation failed */
  blocks: number;
  errors: CompilationError[];
  warnings: CompilationWarning[];
}

export interface CompileSourcesOptions extends Omit<CompileOptions, "filePath"> {
  /** Stop after the first file that fails */
  failFast?: boolean;
  /** Directory file names are reported relative to */
  cwd?: string;
}

/**
 * Compile each file in order. With `failFast` the list ends at the first
 * failure; otherwise every file has a summary. File names, including those
 * in diagnostics, are relative to `cwd`.
 */
export async function compileSources(
  files: readonly string[],
  options: CompileSourcesOptions = {}
): Promise<SourceSummary[]> {
  const { failFast, cwd = process.cwd(), ...compileOptions } = options;
  const summaries: SourceSummary[] = [];

  const located = <T extends CompilationError | CompilationWarning>(diagnostic: T): T =>
    diagnostic.file === undefined ? diagnostic : { ...diagnostic, file: relative(cwd, diagnostic.file) };

  for (const file of files) {
    const result = await compileFile(file, compileOptions);
    summaries.push({
      file: relative(cwd, file),
      success: result.success,
      blocks: result.ir?.functions.reduce((sum, fn) => sum + fn.blocks.length, 0) ?? 0,
      errors: result.errors.map(located),
      warnings: result.warnings.map(located),
    });
    if (failFast && !result.success) break;
  }

  return summaries;
}

/** `file:line:column`, or the file alone for diagnostics without a position */
function position(file: string, diagnostic: CompilationError | CompilationWarning): string {
  if (diagnostic.line === undefined) return diagnostic.file ?? file;
  return `${diagnostic.file ?? file}:${diagnostic.line}:${diagnostic.column ?? 1}`;
}

/** Plain report lines for one file; colour is applied by the caller */
export function formatSummary(summary: SourceSummary): string[] {
  const lines = [summary.success ? `✓ ${summary.file} (${summary.blocks} blocks)` : `✗ ${summary.file}`];
  for (const warning of summary.warnings) {
    lines.push(`  ${position(summary.file, warning)}: warning [${warning.code}] ${warning.message}`);
  }
  for (const error of summary.errors) {
    lines.push(`  ${position(summary.file, error)}: error [${error.code}] ${error.message}`);
  }
  return lines;
}

export async function compileAllCommand(
  directory: string | undefined,
  options: CompileAllOptions
): Promise<void> {
  const targetDir = resolve(directory ?? ".");
  const files = await collectSourceFiles(targetDir);

  if (files.length === 0) {
    console.log(chalk.yellow(`No ${SOURCE_EXTENSION} files found in ${targetDir}`));
    process.exit(1);
  }

  const summaries = await compileSources(files, {
    includePaths: collectIncludePaths(options.include),
    defines: collectDefines(options.define),
    failFast: options.failFast,
  });
  const failed = summaries.filter((s) => !s.success).length;

  if (options.json) {
    console.log(JSON.stringify(summaries, null, 2));
  } else {
    for (const summary of summaries) {
      const [head = "", ...details] = formatSummary(summary);
      console.log(summary.success ? chalk.green(head) : chalk.red(head));
      for (const line of details) {
        console.log(line.includes(": warning [") ? chalk.yellow(line) : chalk.red(line));
      }
    }
    console.log();
    console.log(chalk.dim(`${summaries.length - failed} compiled, ${failed} failed, ${files.length} found`));
  }

  if (failed > 0) {
    process.exit(1);
  }
}

/** Source files under `directory`, recursively, sorted by path */
export async function collectSourceFiles(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  const nested = await Promise.all(
    entries.map(async (entry): Promise<string[]> => {
      const fullPath = join(directory, entry.name);
      if (entry.isDirectory()) return collectSourceFiles(fullPath);
      return entry.isFile() && entry.name.endsWith(SOURCE_EXTENSION) ? [fullPath] : [];
    })
  );
  return nested.flat().sort();
}

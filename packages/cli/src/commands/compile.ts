/**
 * Compile Command
 * Compiles a .mat file (or standard input) to IR
 */

import { readFile, writeFile } from "node:fs/promises";
import { text } from "node:stream/consumers";
import { type CompilationResult, compile } from "@matc/core";
import chalk from "chalk";
import ora from "ora";
import { type PipelineOptions, collectDefines, collectIncludePaths } from "./options.js";

export type OutputFormat = "text" | "json";

interface CompileOptions extends PipelineOptions {
  output?: string;
  format?: string;
}

/** Read a source path, or standard input when the path is absent or "-" */
export async function readSource(
  sourcePath: string | undefined
): Promise<{ source: string; filePath?: string }> {
  if (sourcePath === undefined || sourcePath === "-") {
    return { source: await text(process.stdin) };
  }
  return { source: await readFile(sourcePath, "utf8"), filePath: sourcePath };
}

export function parseFormat(value: string | undefined): OutputFormat {
  if (value === undefined || value === "text" || value === "json") {
    return value ?? "text";
  }
  throw new Error(`Unknown output format '${value}' (expected text or json)`);
}

/** IR in the requested format; undefined when compilation failed */
export function renderOutput(result: CompilationResult, format: OutputFormat): string | undefined {
  if (!result.success || !result.ir || result.text === undefined) {
    return undefined;
  }
  return format === "json" ? `${JSON.stringify(result.ir, null, 2)}\n` : result.text;
}

export async function compileCommand(sourcePath: string | undefined, options: CompileOptions): Promise<void> {
  const label = sourcePath === undefined || sourcePath === "-" ? "<stdin>" : sourcePath;
  const spinner = ora(`Compiling ${label}...`).start();

  try {
    const format = parseFormat(options.format);
    const { source, filePath } = await readSource(sourcePath);
    const result = compile(source, {
      filePath,
      includePaths: collectIncludePaths(options.include),
      defines: collectDefines(options.define),
    });

    // Report warnings
    for (const warning of result.warnings) {
      const lineInfo = warning.line !== undefined ? ` (line ${warning.line})` : "";
      spinner.warn(chalk.yellow(`Warning [${warning.code}]: ${warning.message}${lineInfo}`));
    }

    // Report errors
    const output = renderOutput(result, format);
    if (output === undefined) {
      spinner.fail(chalk.red("Compilation failed"));
      for (const error of result.errors) {
        const where = error.line !== undefined ? ` at ${error.file ?? label}:${error.line}:${error.column ?? 1}` : "";
        console.error(chalk.red(`  Error [${error.code}]${where}: ${error.message}`));
      }
      process.exit(1);
    }

    spinner.succeed(chalk.green("Compilation successful"));

    if (options.output) {
      await writeFile(options.output, output);
      console.error(chalk.dim(`IR written to ${options.output}`));
    } else {
      process.stdout.write(output);
    }
  } catch (error) {
    spinner.fail(chalk.red(`Failed to compile: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  }
}

/**
 * Check Command
 * Runs the whole pipeline on a .mat file and reports diagnostics only
 */

import { compileFile } from "@matc/core";
import chalk from "chalk";
import ora from "ora";
import { type PipelineOptions, collectDefines, collectIncludePaths } from "./options.js";

interface CheckOptions extends PipelineOptions {
  strict?: boolean;
}

export async function checkCommand(sourcePath: string, options: CheckOptions): Promise<void> {
  const spinner = ora(`Checking ${sourcePath}...`).start();

  try {
    const result = await compileFile(sourcePath, {
      includePaths: collectIncludePaths(options.include),
      defines: collectDefines(options.define),
    });

    const errorCount = result.errors.length;
    const warningCount = result.warnings.length;

    if (warningCount > 0) {
      spinner.info(chalk.yellow(`${warningCount} warning(s)`));
      for (const warning of result.warnings) {
        console.log(chalk.yellow(`  [${warning.code}] ${warning.message}`));
        if (warning.line !== undefined) {
          console.log(chalk.dim(`    at line ${warning.line}`));
        }
      }
    }

    if (errorCount > 0) {
      spinner.fail(chalk.red(`${errorCount} error(s)`));
      for (const error of result.errors) {
        console.log(chalk.red(`  [${error.code}] ${error.message}`));
        if (error.line !== undefined) {
          console.log(chalk.dim(`    at ${error.file ?? sourcePath}:${error.line}:${error.column ?? 1}`));
        }
      }
    }

    if (!result.success) {
      console.log();
      console.log(chalk.red("✗ Check failed"));
      process.exit(1);
    }

    if (options.strict && warningCount > 0) {
      console.log();
      console.log(chalk.red("✗ Check failed (strict mode)"));
      process.exit(1);
    }

    if (warningCount === 0) {
      spinner.succeed(chalk.green("✓ Program is valid"));
    } else {
      spinner.succeed(chalk.green("✓ Program is valid (with warnings)"));
    }

    if (result.ir) {
      const blocks = result.ir.functions.reduce((sum, fn) => sum + fn.blocks.length, 0);
      console.log();
      console.log(chalk.dim("Module info:"));
      console.log(chalk.dim(`  Functions: ${result.ir.functions.length}`));
      console.log(chalk.dim(`  Globals: ${result.ir.globals.length}`));
      console.log(chalk.dim(`  Blocks: ${blocks}`));
    }
  } catch (error) {
    spinner.fail(chalk.red(`Failed to check: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  }
}

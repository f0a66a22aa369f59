/**
 * Option helpers shared by the commands
 */

import { delimiter } from "node:path";

/** Environment variable holding extra include directories */
export const INCLUDE_PATH_ENV = "MATC_INCLUDE_PATH";

export interface PipelineOptions {
  include?: string[];
  define?: string[];
}

/**
 * Split a `-D NAME[=VALUE]` argument. A bare name defines the macro with an
 * empty body.
 */
export function parseDefineOption(value: string): [string, string] {
  const eq = value.indexOf("=");
  const name = (eq === -1 ? value : value.slice(0, eq)).trim();
  if (!/^[A-Z_][A-Z0-9_]*$/.test(name)) {
    throw new Error(`Invalid macro name '${name}' in -D ${value} (macro names are uppercase)`);
  }
  return [name, eq === -1 ? "" : value.slice(eq + 1)];
}

export function collectDefines(values: readonly string[] = []): Record<string, string> {
  const defines: Record<string, string> = {};
  for (const value of values) {
    const [name, body] = parseDefineOption(value);
    defines[name] = body;
  }
  return defines;
}

/** `-I` directories first, then the entries of MATC_INCLUDE_PATH */
export function collectIncludePaths(
  values: readonly string[] = [],
  env: NodeJS.ProcessEnv = process.env
): string[] {
  const fromEnv = (env[INCLUDE_PATH_ENV] ?? "").split(delimiter).filter((entry) => entry.length > 0);
  return [...values, ...fromEnv];
}

/**
 * Source hosts resolve and read the units named by #include
 */

import { existsSync, readFileSync, statSync } from "node:fs";
import { dirname, isAbsolute, posix, resolve } from "node:path";

export interface SourceHost {
  /**
   * Resolve an include target to the path of an existing unit. Relative
   * targets are tried against the including unit's directory first, then
   * against each include path in order.
   */
  resolve(target: string, fromFile: string | undefined, includePaths: readonly string[]): string | undefined;

  /** Read a unit previously returned by resolve() */
  read(path: string): string;
}

function candidates(
  target: string,
  baseDir: string,
  includePaths: readonly string[],
  join: (base: string, target: string) => string
): string[] {
  if (isAbsolute(target)) return [target];
  return [baseDir, ...includePaths].map((base) => join(base, target));
}

/**
 * Host backed by the local file system
 */
export function createFileSystemHost(cwd: string = process.cwd()): SourceHost {
  return {
    resolve(target, fromFile, includePaths) {
      const baseDir = fromFile !== undefined ? dirname(resolve(cwd, fromFile)) : cwd;
      for (const path of candidates(target, baseDir, includePaths, (base, t) => resolve(cwd, base, t))) {
        if (existsSync(path) && statSync(path).isFile()) {
          return path;
        }
      }
      return undefined;
    },
    read(path) {
      return readFileSync(path, "utf8");
    },
  };
}

/**
 * Host over an in-memory map of POSIX paths to unit text
 */
export function createMemoryHost(files: Readonly<Record<string, string>>): SourceHost {
  const units = new Map<string, string>();
  for (const [path, text] of Object.entries(files)) {
    units.set(posix.normalize(path), text);
  }

  return {
    resolve(target, fromFile, includePaths) {
      const baseDir = fromFile !== undefined ? posix.dirname(fromFile) : "/";
      for (const path of candidates(target, baseDir, includePaths, (base, t) => posix.join(base, t))) {
        const normalized = posix.normalize(path);
        if (units.has(normalized)) return normalized;
      }
      return undefined;
    },
    read(path) {
      const text = units.get(path);
      if (text === undefined) {
        throw new Error(`No in-memory unit at ${path}`);
      }
      return text;
    },
  };
}

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { compile } from "@matc/core";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { parseFormat, readSource, renderOutput } from "./compile.js";

describe("compile command helpers", () => {
  it("parses output formats", () => {
    expect(parseFormat(undefined)).toBe("text");
    expect(parseFormat("json")).toBe("json");
    expect(() => parseFormat("yaml")).toThrow("Unknown output format 'yaml' (expected text or json)");
  });

  it("renders text and json", () => {
    const result = compile("int MAIN() { return 0; }");
    expect(renderOutput(result, "text")).toBe(result.text);
    const json = renderOutput(result, "json");
    expect(json?.endsWith("}\n")).toBe(true);
    expect(JSON.parse(json ?? "")).toEqual(result.ir);
  });

  it("renders nothing for a failed compilation", () => {
    expect(renderOutput(compile("int MAIN() { return Y; }"), "text")).toBeUndefined();
  });

  describe("on disk", () => {
    let dir = "";

    beforeAll(async () => {
      dir = await mkdtemp(join(tmpdir(), "matc-cli-"));
      await writeFile(join(dir, "a.mat"), "int MAIN() { return 1; }\n");
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("reads a named source file", async () => {
      const path = join(dir, "a.mat");
      expect(await readSource(path)).toEqual({ source: "int MAIN() { return 1; }\n", filePath: path });
    });
  });
});

import { delimiter } from "node:path";
import { describe, expect, it } from "vitest";
import { INCLUDE_PATH_ENV, collectDefines, collectIncludePaths, parseDefineOption } from "./options.js";

describe("option helpers", () => {
  it("splits -D arguments", () => {
    expect(parseDefineOption("SIZE=3")).toEqual(["SIZE", "3"]);
    expect(parseDefineOption("EXPR=A=B")).toEqual(["EXPR", "A=B"]);
    expect(parseDefineOption("DEBUG")).toEqual(["DEBUG", ""]);
  });

  it("rejects lowercase macro names", () => {
    expect(() => parseDefineOption("size=3")).toThrow(
      "Invalid macro name 'size' in -D size=3 (macro names are uppercase)"
    );
  });

  it("later definitions win", () => {
    expect(collectDefines(["N=1", "M", "N=2"])).toEqual({ N: "2", M: "" });
    expect(collectDefines()).toEqual({});
  });

  it("puts -I directories before the environment entries", () => {
    const env = { [INCLUDE_PATH_ENV]: ["/env/a", "", "/env/b"].join(delimiter) };
    expect(collectIncludePaths(["/cli"], env)).toEqual(["/cli", "/env/a", "/env/b"]);
  });

  it("works without the environment variable", () => {
    expect(collectIncludePaths(["/cli"], {})).toEqual(["/cli"]);
  });
});

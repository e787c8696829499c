import { describe, it, expect } from "vitest";
import { parseCliArgs } from "./cli";

describe("parseCliArgs", () => {
  it("should default to every source, the configured output and the cache", () => {
    expect(parseCliArgs([])).toEqual({ sources: [], outputPath: null, noCache: false });
  });

  it("should split the source list and drop blanks", () => {
    expect(parseCliArgs(["--sources=science-wire, games-hub,,"]).sources).toEqual([
      "science-wire",
      "games-hub",
    ]);
  });

  it("should read the output path and the cache switch", () => {
    expect(parseCliArgs(["--output=out/digest.json", "--no-cache"])).toEqual({
      sources: [],
      outputPath: "out/digest.json",
      noCache: true,
    });
  });

  it("should reject an empty output path", () => {
    expect(() => parseCliArgs(["--output="])).toThrow("--output requires a path");
  });

  it("should reject unknown arguments", () => {
    expect(() => parseCliArgs(["--verbose"])).toThrow("unknown argument: --verbose");
  });
});

import { describe, expect, it } from "vitest";
import { getConfigFromCli } from "../config/arg-parser.js";

describe("getConfigFromCli", () => {
  it("defaults to stdout with the prelude and access cache", () => {
    expect(getConfigFromCli([])).toEqual({
      elementTypes: [],
      outDir: undefined,
      headerDir: "keel_headers",
      accessCache: true,
      prelude: true,
    });
  });

  it("collects element types in order", () => {
    const config = getConfigFromCli(["u8", "list[Point]", "s32"]);
    expect(config.elementTypes).toEqual(["u8", "list[Point]", "s32"]);
  });

  it("reads output options", () => {
    const config = getConfigFromCli([
      "--out-dir",
      "build",
      "--header-dir",
      "gen/lists",
      "--no-access-cache",
      "--no-prelude",
      "f64",
    ]);
    expect(config).toEqual({
      elementTypes: ["f64"],
      outDir: "build",
      headerDir: "gen/lists",
      accessCache: false,
      prelude: false,
    });
  });
});

/**
 * Tests for shared command helpers.
 */

import { describe, it, expect } from "vitest";
import { Command, InvalidArgumentError } from "commander";
import { globalOptions, parsePositiveInt } from "./run.js";

describe("parsePositiveInt", () => {
  it("should accept positive integers", () => {
    expect(parsePositiveInt("4")).toBe(4);
  });

  it("should reject anything else", () => {
    expect(() => parsePositiveInt("0")).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt("2.5")).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt("x")).toThrow(InvalidArgumentError);
  });
});

describe("globalOptions", () => {
  it("should read options from the parent program", () => {
    const program = new Command()
      .option("--root <path>")
      .option("--json")
      .option("-q, --quiet")
      .option("-v, --verbose");
    const sub = new Command("extract").action(() => {});
    program.addCommand(sub);

    program.parse(["--json", "--root", "/notes", "extract"], { from: "user" });

    expect(globalOptions(sub)).toEqual({
      root: "/notes",
      json: true,
      quiet: false,
      verbose: false,
    });
  });
});

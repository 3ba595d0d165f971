import { describe, it, expect } from "vitest";
import { readArgs } from "../cliArgs.js";

describe("readArgs", () => {
  it("reads values, inline values and flags", () => {
    const args = readArgs(["--q", "How do I deploy?", "--k=5", "--debug", "--json"]);

    expect(args.string("q")).toBe("How do I deploy?");
    expect(args.number("k", 3)).toBe(5);
    expect(args.flag("debug")).toBe(true);
    expect(args.flag("json")).toBe(true);
    expect(args.flag("q")).toBe(false);
  });

  it("falls back when a number is missing or malformed", () => {
    const args = readArgs(["--threshold", "high", "--budget="]);

    expect(args.number("threshold", 0.55)).toBe(0.55);
    expect(args.number("budget", 6000)).toBe(6000);
    expect(args.number("k", 3)).toBe(3);
    expect(args.string("missing")).toBeUndefined();
  });

  it("accepts negative numbers as values", () => {
    expect(readArgs(["--threshold", "-0.2"]).number("threshold", 0)).toBe(-0.2);
  });
});

import { describe, it, expect } from "vitest";
import { parseTrafficArgs } from "./args.js";
import { UsageError } from "../domain/errors.js";

describe("parseTrafficArgs", () => {
  it("reads the positional arguments with defaults for every option", () => {
    expect(parseTrafficArgs(["net.gml", "12", "s", "t"])).toEqual({
      graphPath: "net.gml",
      vehicles: 12,
      start: "s",
      end: "t",
      plot: false,
      json: false,
      requireRoute: false,
    });
  });

  it("accepts options anywhere on the line", () => {
    const config = parseTrafficArgs([
      "--plot",
      "net.gml",
      "--dot",
      "out.dot",
      "5",
      "s",
      "--profile",
      "quick",
      "t",
      "--json",
      "--require-route",
    ]);

    expect(config).toEqual({
      graphPath: "net.gml",
      vehicles: 5,
      start: "s",
      end: "t",
      plot: true,
      json: true,
      requireRoute: true,
      dotPath: "out.dot",
      profile: "quick",
    });
  });

  it("keeps a negative count for the pipeline to reject", () => {
    expect(parseTrafficArgs(["net.gml", "-3", "s", "t"]).vehicles).toBe(-3);
  });

  it("rejects malformed command lines", () => {
    expect(() => parseTrafficArgs(["net.gml", "5", "s"])).toThrow(
      "Expected <graph.gml> <vehicles> <start> <end>",
    );
    expect(() => parseTrafficArgs(["net.gml", "5", "s", "t", "u"])).toThrow("Unexpected argument u");
    expect(() => parseTrafficArgs(["net.gml", "2.5", "s", "t"])).toThrow(
      'Vehicle count must be an integer (got "2.5")',
    );
    expect(() => parseTrafficArgs(["net.gml", "5", "s", "t", "--dot"])).toThrow("--dot needs a value");
    expect(() => parseTrafficArgs(["net.gml", "5", "s", "t", "--fast"])).toThrow(UsageError);
  });
});

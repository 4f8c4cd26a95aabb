import { describe, it, expect } from "vitest";
import { flowsToEdgeFlows } from "./flow-aggregator.js";
import type { Path } from "../domain/index.js";

function makePath(...nodeIds: string[]): Path {
  return {
    nodeIds,
    edgeIds: nodeIds.slice(1).map((to, i) => `${nodeIds[i] ?? ""}->${to}`),
  };
}

const BRAESS_PATHS = [makePath("s", "v", "t"), makePath("s", "v", "w", "t"), makePath("s", "w", "t")];

describe("flowsToEdgeFlows", () => {
  it("sums path flows onto shared edges", () => {
    const edgeFlows = flowsToEdgeFlows(BRAESS_PATHS, [1, 2, 3]);

    expect([...edgeFlows.entries()]).toEqual([
      ["s->v", 3],
      ["v->t", 1],
      ["v->w", 2],
      ["w->t", 5],
      ["s->w", 3],
    ]);
  });

  it("keeps edges with zero flow", () => {
    const edgeFlows = flowsToEdgeFlows(BRAESS_PATHS, [5, 0, 5]);
    expect(edgeFlows.get("v->w")).toBe(0);
    expect(edgeFlows.size).toBe(5);
  });

  it("leaves out edges no path uses", () => {
    const edgeFlows = flowsToEdgeFlows([makePath("s", "t")], [4]);
    expect(edgeFlows).toEqual(new Map([["s->t", 4]]));
    expect(edgeFlows.has("t->s")).toBe(false);
  });

  it("is deterministic across calls", () => {
    const first = flowsToEdgeFlows(BRAESS_PATHS, [0.5, 1.25, 2]);
    const second = flowsToEdgeFlows(BRAESS_PATHS, [0.5, 1.25, 2]);
    expect([...second.entries()]).toEqual([...first.entries()]);
  });

  it("returns an empty mapping for no paths", () => {
    expect(flowsToEdgeFlows([], []).size).toBe(0);
  });

  it("rejects a vector of the wrong length", () => {
    expect(() => flowsToEdgeFlows(BRAESS_PATHS, [1, 2])).toThrow(
      "Path-flow vector has 2 entries for 3 paths",
    );
  });
});

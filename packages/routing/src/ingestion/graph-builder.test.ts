import { describe, it, expect } from "vitest";
import { buildGraph } from "./graph-builder.js";

describe("buildGraph", () => {
  it("keeps listed nodes first and adds edge endpoints after them", () => {
    const graph = buildGraph({
      nodes: ["z", { id: "s", label: "Source" }],
      edges: [{ from: "s", to: "t", a: 1, b: 2 }],
    });

    expect([...graph.nodes.values()]).toEqual([
      { id: "z" },
      { id: "s", label: "Source" },
      { id: "t" },
    ]);
    expect(graph.adjacency.get("s")).toEqual(["s->t"]);
    expect(graph.adjacency.has("z")).toBe(false);
  });

  it("preserves edge order in adjacency lists", () => {
    const graph = buildGraph({
      edges: [
        { from: "s", to: "b", a: 0, b: 1 },
        { from: "s", to: "a", a: 0, b: 1 },
      ],
    });
    expect(graph.adjacency.get("s")).toEqual(["s->b", "s->a"]);
  });

  it("rejects duplicate nodes", () => {
    expect(() => buildGraph({ nodes: ["a", "a"], edges: [] })).toThrow('Duplicate node "a"');
  });

  it("rejects non-finite coefficients", () => {
    expect(() => buildGraph({ edges: [{ from: "s", to: "t", a: Infinity, b: 0 }] })).toThrow(
      'Edge s -> t: coefficient "a" must be a finite number',
    );
    expect(() => buildGraph({ edges: [{ from: "s", to: "t", a: 0, b: NaN }] })).toThrow(
      'Edge s -> t: coefficient "b" must be a finite number',
    );
  });
});

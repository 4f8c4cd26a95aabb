import { describe, it, expect } from "vitest";
import { enumeratePaths, describePath } from "./path-enumerator.js";
import { buildGraph } from "../ingestion/graph-builder.js";
import { NotFoundError } from "../domain/errors.js";
import type { Graph } from "../domain/index.js";

function makeGraph(edges: [string, string][], nodes: string[] = []): Graph {
  return buildGraph({ nodes, edges: edges.map(([from, to]) => ({ from, to, a: 1, b: 0 })) });
}

const BRAESS: [string, string][] = [
  ["s", "v"],
  ["s", "w"],
  ["v", "t"],
  ["w", "t"],
  ["v", "w"],
];

describe("enumeratePaths", () => {
  it("finds every simple path in depth-first, insertion order", () => {
    const paths = enumeratePaths(makeGraph(BRAESS), "s", "t");

    expect(paths.map(describePath)).toEqual(["s -> v -> t", "s -> v -> w -> t", "s -> w -> t"]);
    expect(paths[1]).toEqual({
      nodeIds: ["s", "v", "w", "t"],
      edgeIds: ["s->v", "v->w", "w->t"],
    });
  });

  it("returns the same order on repeated calls", () => {
    const graph = makeGraph(BRAESS);
    expect(enumeratePaths(graph, "s", "t")).toEqual(enumeratePaths(graph, "s", "t"));
  });

  it("never revisits a node on cyclic graphs", () => {
    const graph = makeGraph([
      ["s", "a"],
      ["a", "s"],
      ["a", "b"],
      ["b", "a"],
      ["b", "t"],
      ["a", "a"],
    ]);
    const paths = enumeratePaths(graph, "s", "t");
    expect(paths.map(describePath)).toEqual(["s -> a -> b -> t"]);
  });

  it("does not extend paths through the end node", () => {
    const graph = makeGraph([
      ["s", "t"],
      ["t", "x"],
      ["x", "t"],
    ]);
    expect(enumeratePaths(graph, "s", "t").map(describePath)).toEqual(["s -> t"]);
  });

  it("returns an empty list for disconnected nodes", () => {
    const graph = makeGraph([["s", "a"]], ["t"]);
    expect(enumeratePaths(graph, "s", "t")).toEqual([]);
  });

  it("respects edge direction", () => {
    const graph = makeGraph([["t", "s"]]);
    expect(enumeratePaths(graph, "s", "t")).toEqual([]);
  });

  it("returns an empty list when start and end coincide", () => {
    expect(enumeratePaths(makeGraph(BRAESS), "s", "s")).toEqual([]);
  });

  it("throws NotFoundError for unknown endpoints", () => {
    const graph = makeGraph(BRAESS);
    expect(() => enumeratePaths(graph, "x", "t")).toThrow(NotFoundError);
    expect(() => enumeratePaths(graph, "s", "y")).toThrow('End node "y" is not in the graph');
  });

  it("enumerates all routes through a grid", () => {
    // 2x3 grid moving right or down: C(3,1) = 3 monotone paths
    const graph = makeGraph([
      ["a1", "a2"],
      ["a2", "a3"],
      ["b1", "b2"],
      ["b2", "b3"],
      ["a1", "b1"],
      ["a2", "b2"],
      ["a3", "b3"],
    ]);
    expect(enumeratePaths(graph, "a1", "b3")).toHaveLength(3);
  });
});

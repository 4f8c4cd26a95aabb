import { describe, it, expect } from "vitest";
import { assignFlowSocialOptimum, solveSocialOptimum } from "./social-optimum.js";
import { assignFlowsNashEquilibrium } from "./nash-equilibrium.js";
import { buildGraph, type EdgeDefinition } from "../ingestion/graph-builder.js";
import { enumeratePaths } from "../paths/path-enumerator.js";
import { pathCostGradient, totalCostOfPathFlows } from "../flow/social-cost.js";
import { ConvergenceError, NotFoundError } from "../domain/errors.js";
import type { Graph } from "../domain/index.js";

/** Parallel routes s -> m_i -> t; the first hop carries the cost */
function parallelRoutes(costs: [number, number][]): Graph {
  const edges: EdgeDefinition[] = [];
  costs.forEach(([a, b], i) => {
    edges.push({ from: "s", to: `m${i}`, a, b });
    edges.push({ from: `m${i}`, to: "t", a: 0, b: 0 });
  });
  return buildGraph({ edges });
}

const sum = (xs: number[]): number => xs.reduce((acc, x) => acc + x, 0);

// s->v: x, s->w: 10, v->t: 10, w->t: x, v->w: 0
const braess = buildGraph({
  edges: [
    { from: "s", to: "v", a: 1, b: 0 },
    { from: "s", to: "w", a: 0, b: 10 },
    { from: "v", to: "t", a: 0, b: 10 },
    { from: "w", to: "t", a: 1, b: 0 },
    { from: "v", to: "w", a: 0, b: 0 },
  ],
});

/** Seeded uniform [0, 1) generator (mulberry32) */
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * s -> 1..3 hidden layers of 2-3 nodes -> t, fully connected between
 * neighbouring layers, so most paths share congested edges.
 */
function layeredNetwork(seed: number): Graph {
  const random = seededRandom(seed);
  const depth = 2 + Math.floor(random() * 3);
  const layers: string[][] = [["s"]];
  for (let l = 0; l < depth - 1; l++) {
    const width = 2 + Math.floor(random() * 2);
    layers.push(Array.from({ length: width }, (_, k) => `n${l}_${k}`));
  }
  layers.push(["t"]);

  const edges: EdgeDefinition[] = [];
  for (let l = 0; l + 1 < layers.length; l++) {
    for (const from of layers[l] ?? []) {
      for (const to of layers[l + 1] ?? []) {
        const a = random() < 0.3 ? 0 : Math.floor(random() * 500) / 100;
        const b = Math.floor(random() * 2000) / 100;
        edges.push({ from, to, a, b });
      }
    }
  }
  return buildGraph({ edges });
}

/** Optimality of a social-optimum assignment, checked from the outside */
function expectOptimalAssignment(graph: Graph, demand: number): void {
  const paths = enumeratePaths(graph, "s", "t");
  const flows = assignFlowSocialOptimum(paths, demand, graph);

  expect(Math.abs(sum(flows) - demand)).toBeLessThanOrEqual(1e-6 * demand);
  expect(flows.every((f) => f >= 0)).toBe(true);

  const optimum = totalCostOfPathFlows(paths, flows, graph);
  const nash = totalCostOfPathFlows(paths, assignFlowsNashEquilibrium(paths, demand), graph);
  expect(optimum).toBeLessThanOrEqual(nash * (1 + 1e-9));

  // used paths share one marginal cost; no path is cheaper at the margin
  const marginal = pathCostGradient(paths, flows, graph);
  const used = marginal.filter((_, i) => (flows[i] ?? 0) > 1e-3 * demand);
  const lowest = Math.min(...used);
  const highest = Math.max(...used);
  const scale = Math.max(1, highest);
  expect(highest - lowest).toBeLessThanOrEqual(1e-6 * scale);
  expect(Math.min(...marginal)).toBeGreaterThanOrEqual(lowest - 1e-6 * scale);
}

describe("assignFlowSocialOptimum", () => {
  it("balances marginal costs across two routes", () => {
    // min x1² + 10·x2 on x1 + x2 = 10  ->  2·x1 = 10
    const graph = parallelRoutes([
      [1, 0],
      [0, 10],
    ]);
    const paths = enumeratePaths(graph, "s", "t");
    const flows = assignFlowSocialOptimum(paths, 10, graph);

    expect(flows[0]).toBeCloseTo(5, 6);
    expect(flows[1]).toBeCloseTo(5, 6);
    expect(totalCostOfPathFlows(paths, flows, graph)).toBeCloseTo(75, 6);
  });

  it("abandons a route whose free-flow cost exceeds every marginal cost", () => {
    const graph = parallelRoutes([
      [1, 0],
      [0, 10],
      [0, 20],
    ]);
    const paths = enumeratePaths(graph, "s", "t");
    const flows = assignFlowSocialOptimum(paths, 10, graph);

    expect(flows[0]).toBeCloseTo(5, 5);
    expect(flows[1]).toBeCloseTo(5, 5);
    expect(flows[2]).toBeCloseTo(0, 5);
    expect(totalCostOfPathFlows(paths, flows, graph)).toBeCloseTo(75, 5);
  });

  it("never costs more than the equal split", () => {
    const graph = parallelRoutes([
      [1, 0],
      [0, 10],
      [0, 20],
    ]);
    const paths = enumeratePaths(graph, "s", "t");
    const optimum = totalCostOfPathFlows(paths, assignFlowSocialOptimum(paths, 10, graph), graph);
    const nash = totalCostOfPathFlows(paths, assignFlowsNashEquilibrium(paths, 10), graph);

    expect(nash).toBeCloseTo(1000 / 9, 9);
    expect(optimum).toBeLessThanOrEqual(nash);
  });

  it("avoids the Braess shortcut", () => {
    const paths = enumeratePaths(braess, "s", "t");
    const flows = assignFlowSocialOptimum(paths, 10, braess);

    // paths: s-v-t, s-v-w-t, s-w-t
    expect(flows[0]).toBeCloseTo(5, 5);
    expect(flows[1]).toBeCloseTo(0, 5);
    expect(flows[2]).toBeCloseTo(5, 5);
    expect(totalCostOfPathFlows(paths, flows, braess)).toBeCloseTo(150, 5);
  });

  it.each([
    [1, [0, 1, 0]],
    [6, [1, 4, 1]],
    [7, [2, 3, 2]],
    [9, [4, 1, 4]],
    [11, [5.5, 0, 5.5]],
  ])("splits %d vehicles over the Braess paths by marginal cost", (demand, expected) => {
    const paths = enumeratePaths(braess, "s", "t");
    const flows = assignFlowSocialOptimum(paths, demand, braess);

    expect(flows).toHaveLength(3);
    flows.forEach((flow, i) => expect(flow).toBeCloseTo(expected[i] ?? NaN, 6));
  });

  it("conserves demand and stays non-negative", () => {
    const graph = parallelRoutes([
      [0.5, 2],
      [2, 0],
      [0, 40],
      [1, 1],
    ]);
    const paths = enumeratePaths(graph, "s", "t");
    for (const demand of [1, 7, 250]) {
      const flows = assignFlowSocialOptimum(paths, demand, graph);
      expect(Math.abs(sum(flows) - demand)).toBeLessThanOrEqual(1e-6 * demand);
      expect(flows.every((f) => f >= 0)).toBe(true);
    }
  });

  it("handles the trivial cases without optimizing", () => {
    const graph = parallelRoutes([
      [1, 0],
      [0, 10],
    ]);
    const paths = enumeratePaths(graph, "s", "t");

    expect(assignFlowSocialOptimum([], 10, graph)).toEqual([]);
    expect(assignFlowSocialOptimum(paths, 0, graph)).toEqual([0, 0]);
    expect(assignFlowSocialOptimum(paths.slice(0, 1), 10, graph)).toEqual([10]);
    expect(solveSocialOptimum(paths, 0, graph).iterations).toBe(0);
  });

  it("rejects negative or non-finite demand", () => {
    const graph = parallelRoutes([[1, 0]]);
    const paths = enumeratePaths(graph, "s", "t");
    expect(() => assignFlowSocialOptimum(paths, -1, graph)).toThrow(NotFoundError);
    expect(() => assignFlowSocialOptimum(paths, NaN, graph)).toThrow(NotFoundError);
  });

  it("reports ConvergenceError instead of an unconverged iterate", () => {
    const graph = parallelRoutes([
      [1, 0],
      [0, 10],
      [0, 20],
    ]);
    const paths = enumeratePaths(graph, "s", "t");

    let caught: unknown;
    try {
      assignFlowSocialOptimum(paths, 10, graph, { maxIterations: 1 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConvergenceError);
    expect(caught).toMatchObject({ name: "ConvergenceError", iterations: 1, status: 422 });
  });
});

describe("assignFlowSocialOptimum on shared-edge networks", () => {
  it.each([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 100, 10_000])(
    "is optimal on the Braess network for %d vehicles",
    (demand) => {
      expectOptimalAssignment(braess, demand);
    },
  );

  it("is optimal on seeded layered networks across demands", () => {
    for (let seed = 1; seed <= 60; seed++) {
      const graph = layeredNetwork(seed);
      for (const demand of [1, 3, 7, 20, 150, 1000, 1e6]) {
        expectOptimalAssignment(graph, demand);
      }
    }
  });
});

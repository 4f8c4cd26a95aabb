/**
 * Social cost of a flow assignment, and the quantities derived from it.
 *
 * The social cost is the total travel time summed over all vehicles:
 * Σ_e x_e·cost_e(x_e). As a function of the path-flow vector it is a convex
 * quadratic (edge flows are sums of path flows), which is what lets the
 * social-optimum solver treat any converged local minimum as global.
 */

import type { EdgeFlowMap, Graph, GraphEdge, Path, PathFlowVector } from "../domain/index.js";
import { NotFoundError } from "../domain/errors.js";
import { edgeCost, edgeMarginalCost, edgeTotalCost } from "./edge-cost.js";
import { flowsToEdgeFlows } from "./flow-aggregator.js";

function requireEdge(graph: Graph, id: string): GraphEdge {
  const edge = graph.edges.get(id);
  if (!edge) {
    throw new NotFoundError(`Edge ${id} is not in the graph`);
  }
  return edge;
}

/** Total system cost of an edge-flow mapping */
export function totalCost(edgeFlows: EdgeFlowMap, graph: Graph): number {
  let total = 0;
  for (const [id, flow] of edgeFlows) {
    total += edgeTotalCost(requireEdge(graph, id), flow);
  }
  return total;
}

/** Aggregate path flows onto edges, then evaluate the total system cost */
export function totalCostOfPathFlows(
  paths: Path[],
  pathFlows: PathFlowVector,
  graph: Graph,
): number {
  return totalCost(flowsToEdgeFlows(paths, pathFlows), graph);
}

/**
 * Gradient of {@link totalCostOfPathFlows}: for each path, the sum of the
 * marginal costs of its edges at the current edge flows.
 */
export function pathCostGradient(
  paths: Path[],
  pathFlows: PathFlowVector,
  graph: Graph,
): number[] {
  const edgeFlows = flowsToEdgeFlows(paths, pathFlows);
  return paths.map((path) =>
    path.edgeIds.reduce(
      (sum, id) => sum + edgeMarginalCost(requireEdge(graph, id), edgeFlows.get(id) ?? 0),
      0,
    ),
  );
}

/** Per-vehicle travel time of each path at the given edge flows */
export function pathLatencies(paths: Path[], edgeFlows: EdgeFlowMap, graph: Graph): number[] {
  return paths.map((path) =>
    path.edgeIds.reduce(
      (sum, id) => sum + edgeCost(requireEdge(graph, id), edgeFlows.get(id) ?? 0),
      0,
    ),
  );
}

/**
 * {@link totalCostOfPathFlows} written as ½·xᵀHx + cᵀx over path flows x.
 *
 * H_ij = Σ 2a_e over edges shared by paths i and j, c_i = Σ b_e along path i.
 */
export function pathCostQuadratic(
  paths: Path[],
  graph: Graph,
): { hessian: number[][]; linear: number[] } {
  const edgeSets = paths.map((path) => new Set(path.edgeIds));
  const hessian = paths.map((path, i) =>
    paths.map((_, j) =>
      path.edgeIds.reduce(
        (sum, id) => (edgeSets[j]?.has(id) ? sum + 2 * requireEdge(graph, id).cost.a : sum),
        0,
      ),
    ),
  );
  const linear = paths.map((path) =>
    path.edgeIds.reduce((sum, id) => sum + requireEdge(graph, id).cost.b, 0),
  );
  return { hessian, linear };
}

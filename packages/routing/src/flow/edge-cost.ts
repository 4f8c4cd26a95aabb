/**
 * Affine edge cost model.
 *
 * cost(x) = a·x + b is the travel time of one vehicle on an edge carrying
 * x vehicles. The social objective charges every vehicle that time, so an
 * edge contributes x·cost(x) = a·x² + b·x.
 */

import type { GraphEdge } from "../domain/index.js";

/** Per-vehicle travel time on the edge at the given flow */
export function edgeCost(edge: GraphEdge, flow: number): number {
  return edge.cost.a * flow + edge.cost.b;
}

/** Total delay of all vehicles on the edge: flow * cost(flow) */
export function edgeTotalCost(edge: GraphEdge, flow: number): number {
  return flow * edgeCost(edge, flow);
}

/** Derivative of {@link edgeTotalCost} with respect to flow: 2a·x + b */
export function edgeMarginalCost(edge: GraphEdge, flow: number): number {
  return 2 * edge.cost.a * flow + edge.cost.b;
}

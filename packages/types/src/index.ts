/**
 * @flowlab/types
 *
 * Shared domain types for the traffic assignment engine.
 *
 * - Graph: Directed road network with affine edge costs
 * - Path: Simple path between the query endpoints
 * - Flow: Path/edge flow vectors and per-policy assignments
 * - Analysis: Social optimum vs. Nash comparison for one query
 */

export * from "./graph.js";
export * from "./flow.js";

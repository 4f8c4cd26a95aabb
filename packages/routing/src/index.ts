/**
 * @flowlab/routing
 *
 * Traffic assignment engine comparing centrally optimal routing with
 * selfish routing on small directed road networks.
 *
 * Key concepts:
 * - Graph: Directed network with affine edge costs a·x + b
 * - Path: Simple path between the query endpoints
 * - Assignment: Vehicles per path under one policy
 * - Social cost: Total travel time of all vehicles
 *
 * Pipeline:
 * 1. Load GML -> Graph
 * 2. Enumerate simple paths start -> end
 * 3. Assign demand (social optimum, Nash equal split)
 * 4. Aggregate to edge flows -> social cost
 * 5. Report / export the comparison
 */

// Domain types
export * from "./domain/index.js";

// Modules
export * from "./ingestion/index.js";
export * from "./paths/index.js";
export * from "./flow/index.js";
export * from "./assignment/index.js";
export * from "./analysis/index.js";
export * from "./export/index.js";
export * from "./cli/index.js";

/**
 * Core domain model for the assignment engine.
 *
 * - Graph, Path, flow vectors: shared types from @flowlab/types
 * - Errors: the failure taxonomy every module reports through
 */

export type {
  CostCoefficients,
  GraphNode,
  GraphEdge,
  Graph,
  Path,
  PathFlowVector,
  EdgeFlowMap,
  AssignmentPolicy,
  FlowAssignment,
  TrafficQuery,
  SolverDiagnostics,
  TrafficAnalysis,
} from "@flowlab/types";
export { edgeId } from "@flowlab/types";
export * from "./errors.js";

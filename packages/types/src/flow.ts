/**
 * Flow assignment results.
 *
 * A path-flow vector is always indexed in the order the path enumerator
 * returned the paths, so the same index refers to the same path in both
 * assignments of an analysis.
 */

/** A simple path (no repeated node) from the query start to the query end */
export interface Path {
  nodeIds: string[];
  /** Traversed edge ids; always nodeIds.length - 1 entries */
  edgeIds: string[];
}

/** Vehicles per path, indexed like the enumerated path list */
export type PathFlowVector = number[];

/** Vehicles per edge, for every edge referenced by at least one path */
export type EdgeFlowMap = Map<string, number>;

export type AssignmentPolicy = "social-optimum" | "nash-equilibrium";

/** One policy's assignment, with the quantities derived from it */
export interface FlowAssignment {
  policy: AssignmentPolicy;
  pathFlows: PathFlowVector;
  edgeFlows: EdgeFlowMap;
  /** Sum over edges of flow * cost(flow) */
  totalCost: number;
  /** Per-vehicle travel time on each path under this assignment */
  pathLatencies: number[];
}

/** Origin/destination query for a single run */
export interface TrafficQuery {
  start: string;
  end: string;
  /** Total demand routed from start to end */
  vehicles: number;
}

/** Diagnostics reported by the social-optimum solver */
export interface SolverDiagnostics {
  iterations: number;
  /** Norm of the final projected-gradient step */
  residual: number;
}

/** Side-by-side comparison of both policies for one query */
export interface TrafficAnalysis {
  query: TrafficQuery;
  paths: Path[];
  socialOptimum: FlowAssignment;
  nashEquilibrium: FlowAssignment;
  /** True when start and end are disconnected */
  noRoute: boolean;
  /** Nash cost / optimum cost; null when the optimum cost is 0 */
  priceOfAnarchy: number | null;
  solver: SolverDiagnostics;
}

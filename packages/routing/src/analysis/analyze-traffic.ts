/**
 * End-to-end comparison of the two assignment policies for one query.
 *
 * Pipeline:
 * 1. Enumerate simple paths start -> end
 * 2. Assign demand with both policies (same path order)
 * 3. Aggregate each path-flow vector onto edges
 * 4. Evaluate social cost and per-path latencies
 */

import type {
  AssignmentPolicy,
  FlowAssignment,
  Graph,
  Path,
  PathFlowVector,
  TrafficAnalysis,
  TrafficQuery,
} from "../domain/index.js";
import { EmptyPathSetError, NotFoundError } from "../domain/errors.js";
import { enumeratePaths } from "../paths/path-enumerator.js";
import { flowsToEdgeFlows } from "../flow/flow-aggregator.js";
import { pathLatencies, totalCost } from "../flow/social-cost.js";
import { solveSocialOptimum, type SocialOptimumOptions } from "../assignment/social-optimum.js";
import { assignFlowsNashEquilibrium } from "../assignment/nash-equilibrium.js";

export interface AnalyzeOptions {
  /** Solver settings for the social optimum */
  solver?: Partial<SocialOptimumOptions>;
  /** Throw EmptyPathSetError instead of reporting an empty comparison */
  requireRoute?: boolean;
}

/** Build the derived quantities for one policy's path flows */
export function evaluateAssignment(
  policy: AssignmentPolicy,
  paths: Path[],
  pathFlows: PathFlowVector,
  graph: Graph,
): FlowAssignment {
  const edgeFlows = flowsToEdgeFlows(paths, pathFlows);
  return {
    policy,
    pathFlows,
    edgeFlows,
    totalCost: totalCost(edgeFlows, graph),
    pathLatencies: pathLatencies(paths, edgeFlows, graph),
  };
}

/**
 * Compare the social optimum with the equal-split Nash assignment.
 *
 * @throws NotFoundError when an endpoint is missing or vehicles <= 0
 * @throws ConvergenceError when the social-optimum solver fails
 * @throws EmptyPathSetError when no route exists and `requireRoute` is set
 */
export function analyzeTraffic(
  graph: Graph,
  query: TrafficQuery,
  options: AnalyzeOptions = {},
): TrafficAnalysis {
  const { start, end, vehicles } = query;
  if (!Number.isFinite(vehicles) || vehicles <= 0) {
    throw new NotFoundError(`Vehicle count must be positive (got ${vehicles})`);
  }

  const startTime = performance.now();
  const paths = enumeratePaths(graph, start, end);

  if (paths.length === 0) {
    if (options.requireRoute) {
      throw new EmptyPathSetError(start, end);
    }
    console.warn(`[analysis] No route from ${start} to ${end}`);
  }

  const optimum = solveSocialOptimum(paths, vehicles, graph, options.solver);
  const socialOptimum = evaluateAssignment("social-optimum", paths, optimum.pathFlows, graph);
  const nashEquilibrium = evaluateAssignment(
    "nash-equilibrium",
    paths,
    assignFlowsNashEquilibrium(paths, vehicles),
    graph,
  );

  const priceOfAnarchy =
    socialOptimum.totalCost > 0 ? nashEquilibrium.totalCost / socialOptimum.totalCost : null;

  // diagnostics go to stderr so stdout stays machine-readable
  const elapsed = performance.now() - startTime;
  console.error(
    `[analysis] ${start} -> ${end}: ${paths.length} paths, ${vehicles} vehicles, ` +
      `optimum=${socialOptimum.totalCost.toFixed(4)} (${optimum.iterations} iterations), ` +
      `nash=${nashEquilibrium.totalCost.toFixed(4)}, ${elapsed.toFixed(1)}ms`,
  );

  return {
    query: { start, end, vehicles },
    paths,
    socialOptimum,
    nashEquilibrium,
    noRoute: paths.length === 0,
    priceOfAnarchy,
    solver: { iterations: optimum.iterations, residual: optimum.residual },
  };
}

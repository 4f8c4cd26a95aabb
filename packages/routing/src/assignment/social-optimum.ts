/**
 * Social-optimum assignment.
 *
 * Chooses the path-flow vector that minimizes total system travel time
 * subject to flow conservation (Σ flows = demand) and non-negativity. With
 * affine edge costs the objective is a convex quadratic in the path flows,
 * so any point satisfying the optimality conditions is the global optimum.
 *
 * An interior-point solve gets close regardless of how badly the paths'
 * shared edges condition the problem; a projected-gradient pass then
 * settles the result onto the boundary of the feasible set, where unused
 * paths sit at exactly zero. Ties between equivalent paths are broken by
 * wherever the solvers stop.
 */

import type { Graph, Path, PathFlowVector } from "../domain/index.js";
import { ConvergenceError } from "../domain/errors.js";
import { pathCostQuadratic } from "../flow/social-cost.js";
import {
  minimizeQuadraticOnSimplex,
  quadraticGradient,
  quadraticValue,
  type QuadraticObjective,
} from "./interior-point.js";
import { minimizeOnSimplex } from "./simplex-minimizer.js";
import { requireValidDemand } from "./demand.js";

/** Relative tolerance on Σ flows = demand */
const CONSERVATION_TOLERANCE = 1e-6;

export interface SocialOptimumOptions {
  /** Interior-point iteration budget */
  maxIterations: number;
  /** Interior-point stop threshold on the scaled optimality residual */
  tolerance: number;
  /** Projected-gradient polish budget; 0 skips the polish */
  polishIterations: number;
  /** Polish stop threshold on the scaled gradient-mapping norm */
  polishTolerance: number;
}

export const DEFAULT_SOCIAL_OPTIMUM_OPTIONS: SocialOptimumOptions = {
  maxIterations: 100,
  tolerance: 1e-10,
  polishIterations: 500,
  polishTolerance: 1e-9,
};

export interface SocialOptimumResult {
  pathFlows: PathFlowVector;
  /** Solver iterations, polish included; 0 when no optimization was needed */
  iterations: number;
  residual: number;
}

/**
 * Assign `demand` vehicles across `paths` to minimize total system cost.
 *
 * @throws NotFoundError for negative or non-finite demand
 * @throws ConvergenceError when the solver fails or conservation is violated
 */
export function assignFlowSocialOptimum(
  paths: Path[],
  demand: number,
  graph: Graph,
  options: Partial<SocialOptimumOptions> = {},
): PathFlowVector {
  return solveSocialOptimum(paths, demand, graph, options).pathFlows;
}

/** Projected-gradient pass from the interior-point answer; null if it stalls */
function polish(
  objective: QuadraticObjective,
  start: number[],
  demand: number,
  opts: SocialOptimumOptions,
): { x: number[]; iterations: number; residual: number } | null {
  if (opts.polishIterations === 0) return null;
  try {
    return minimizeOnSimplex(
      {
        value: (x) => quadraticValue(objective, x),
        gradient: (x) => quadraticGradient(objective, x),
      },
      start,
      demand,
      { maxIterations: opts.polishIterations, tolerance: opts.polishTolerance },
    );
  } catch (err) {
    if (err instanceof ConvergenceError) return null;
    throw err;
  }
}

/** {@link assignFlowSocialOptimum} with the solver diagnostics attached */
export function solveSocialOptimum(
  paths: Path[],
  demand: number,
  graph: Graph,
  options: Partial<SocialOptimumOptions> = {},
): SocialOptimumResult {
  requireValidDemand(demand);
  const opts = { ...DEFAULT_SOCIAL_OPTIMUM_OPTIONS, ...options };

  if (paths.length === 0) return { pathFlows: [], iterations: 0, residual: 0 };
  if (demand === 0) return { pathFlows: paths.map(() => 0), iterations: 0, residual: 0 };
  if (paths.length === 1) return { pathFlows: [demand], iterations: 0, residual: 0 };

  const objective = pathCostQuadratic(paths, graph);
  const interior = minimizeQuadraticOnSimplex(objective, demand, {
    maxIterations: opts.maxIterations,
    tolerance: opts.tolerance,
  });
  const polished = polish(objective, interior.x, demand, opts);
  const result = polished
    ? { ...polished, iterations: interior.iterations + polished.iterations }
    : interior;

  const pathFlows = result.x.map((flow) => (flow > 0 ? flow : 0));
  const assigned = pathFlows.reduce((sum, flow) => sum + flow, 0);
  if (
    pathFlows.some((flow) => !Number.isFinite(flow)) ||
    Math.abs(assigned - demand) > CONSERVATION_TOLERANCE * demand
  ) {
    throw new ConvergenceError(
      `Solver result assigns ${assigned} of ${demand} vehicles`,
      result.iterations,
      result.residual,
    );
  }

  return { pathFlows, iterations: result.iterations, residual: result.residual };
}

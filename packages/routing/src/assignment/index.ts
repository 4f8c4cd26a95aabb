/**
 * Flow assignment module.
 *
 * Paths + demand -> Policy -> Path-flow vector
 *
 * - Social optimum: interior-point solve of the total-cost quadratic,
 *   polished by projected gradient
 * - Nash equilibrium: equal split across all paths
 */

export {
  assignFlowSocialOptimum,
  solveSocialOptimum,
  DEFAULT_SOCIAL_OPTIMUM_OPTIONS,
  type SocialOptimumOptions,
  type SocialOptimumResult,
} from "./social-optimum.js";
export { assignFlowsNashEquilibrium } from "./nash-equilibrium.js";
export { requireValidDemand } from "./demand.js";
export {
  minimizeOnSimplex,
  projectOntoSimplex,
  DEFAULT_MINIMIZER_OPTIONS,
  type SimplexObjective,
  type SimplexMinimizerOptions,
  type SimplexMinimizerResult,
} from "./simplex-minimizer.js";
export {
  minimizeQuadraticOnSimplex,
  quadraticValue,
  quadraticGradient,
  DEFAULT_INTERIOR_POINT_OPTIONS,
  type QuadraticObjective,
  type InteriorPointOptions,
  type InteriorPointResult,
} from "./interior-point.js";
export {
  loadSolverConfig,
  loadBaseSolverConfig,
  listSolverProfiles,
  findConfigsRoot,
  type SolverConfig,
  type ProfileConfig,
  type ProfileInfo,
} from "./solver-config.js";

/**
 * Nash-equilibrium assignment, equal-split approximation.
 *
 * Every enumerated path receives demand / pathCount vehicles. A true
 * Wardrop equilibrium equalizes travel time across used paths rather than
 * flow; this module deliberately keeps the equal-flow simplification and
 * does not iterate towards that equilibrium.
 */

import type { Path, PathFlowVector } from "../domain/index.js";
import { requireValidDemand } from "./demand.js";

/**
 * Split `demand` evenly across `paths`.
 *
 * @throws NotFoundError for negative or non-finite demand
 */
export function assignFlowsNashEquilibrium(paths: Path[], demand: number): PathFlowVector {
  requireValidDemand(demand);
  if (paths.length === 0) return [];

  const share = demand / paths.length;
  return paths.map(() => share);
}

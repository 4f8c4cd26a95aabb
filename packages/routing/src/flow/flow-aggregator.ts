/**
 * Path flows -> edge flows.
 */

import type { EdgeFlowMap, Path, PathFlowVector } from "../domain/index.js";

/**
 * Sum the flow of every path onto the edges it traverses.
 *
 * Every edge referenced by at least one path appears in the result, at 0
 * if no flow crosses it; edges no path uses are absent. Map order follows
 * first appearance in path order.
 */
export function flowsToEdgeFlows(paths: Path[], pathFlows: PathFlowVector): EdgeFlowMap {
  if (paths.length !== pathFlows.length) {
    throw new RangeError(
      `Path-flow vector has ${pathFlows.length} entries for ${paths.length} paths`,
    );
  }

  const edgeFlows: EdgeFlowMap = new Map();
  for (const path of paths) {
    for (const id of path.edgeIds) {
      if (!edgeFlows.has(id)) edgeFlows.set(id, 0);
    }
  }

  paths.forEach((path, i) => {
    const flow = pathFlows[i] ?? 0;
    for (const id of path.edgeIds) {
      edgeFlows.set(id, (edgeFlows.get(id) ?? 0) + flow);
    }
  });

  return edgeFlows;
}

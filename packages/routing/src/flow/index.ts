/**
 * Flow evaluation module.
 *
 * Path-flow vector -> Edge flows -> Edge costs -> Social cost
 */

export { edgeCost, edgeTotalCost, edgeMarginalCost } from "./edge-cost.js";
export { flowsToEdgeFlows } from "./flow-aggregator.js";
export {
  totalCost,
  totalCostOfPathFlows,
  pathCostGradient,
  pathLatencies,
  pathCostQuadratic,
} from "./social-cost.js";

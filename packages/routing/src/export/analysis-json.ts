/**
 * JSON-friendly form of a TrafficAnalysis (Maps become plain objects).
 */

import type { FlowAssignment, TrafficAnalysis } from "@flowlab/types";

export interface FlowAssignmentJson extends Omit<FlowAssignment, "edgeFlows"> {
  edgeFlows: Record<string, number>;
}

export interface TrafficAnalysisJson
  extends Omit<TrafficAnalysis, "socialOptimum" | "nashEquilibrium"> {
  socialOptimum: FlowAssignmentJson;
  nashEquilibrium: FlowAssignmentJson;
}

function assignmentToJson(assignment: FlowAssignment): FlowAssignmentJson {
  return { ...assignment, edgeFlows: Object.fromEntries(assignment.edgeFlows) };
}

export function analysisToJson(analysis: TrafficAnalysis): TrafficAnalysisJson {
  return {
    ...analysis,
    socialOptimum: assignmentToJson(analysis.socialOptimum),
    nashEquilibrium: assignmentToJson(analysis.nashEquilibrium),
  };
}

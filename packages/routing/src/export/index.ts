export { analysisToDot, type FlowDotOptions } from "./flow-dot.js";
export { formatAnalysisReport, formatEdgeFlowChart } from "./report.js";
export {
  analysisToJson,
  type TrafficAnalysisJson,
  type FlowAssignmentJson,
} from "./analysis-json.js";

export { analyzeTraffic, evaluateAssignment, type AnalyzeOptions } from "./analyze-traffic.js";

export { parseTrafficArgs, USAGE, type TrafficConfig } from "./args.js";
export { runAnalyzeTraffic, type CliIo } from "./run.js";

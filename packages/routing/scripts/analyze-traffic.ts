/**
 * Compare the social optimum with the Nash equal split on a GML graph.
 *
 * Usage: npx tsx scripts/analyze-traffic.ts <graph.gml> <vehicles> <start> <end>
 *          [--plot] [--dot <file>] [--profile <name>] [--json] [--require-route]
 *
 * Example: npx tsx scripts/analyze-traffic.ts ../../data/braess.gml 10 s t --plot
 */

import { runAnalyzeTraffic } from "../src/cli/run.js";

runAnalyzeTraffic(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });

/**
 * Plain-text rendering of a flow comparison for the terminal.
 */

import type { FlowAssignment, Path, TrafficAnalysis } from "@flowlab/types";
import { describePath } from "../paths/path-enumerator.js";

const POLICY_TITLES: Record<FlowAssignment["policy"], string> = {
  "social-optimum": "Social optimum",
  "nash-equilibrium": "Nash equilibrium (equal split)",
};

function assignmentSection(assignment: FlowAssignment, paths: Path[]): string[] {
  const lines = [`${POLICY_TITLES[assignment.policy]}: total cost ${assignment.totalCost.toFixed(4)}`];
  const width = Math.max(0, ...paths.map((p) => describePath(p).length));
  paths.forEach((path, i) => {
    const flow = assignment.pathFlows[i] ?? 0;
    const latency = assignment.pathLatencies[i] ?? 0;
    lines.push(`  ${describePath(path).padEnd(width)}  flow ${flow.toFixed(4)}  time ${latency.toFixed(4)}`);
  });
  return lines;
}

/** Multi-line summary: paths, both assignments, price of anarchy */
export function formatAnalysisReport(analysis: TrafficAnalysis): string {
  const { query, paths } = analysis;
  const lines = [
    `Traffic analysis: ${query.start} -> ${query.end}, ${query.vehicles} vehicles, ${paths.length} paths`,
  ];

  if (analysis.noRoute) {
    lines.push(`No route from ${query.start} to ${query.end}; total cost 0`);
    return lines.join("\n") + "\n";
  }

  lines.push("", ...assignmentSection(analysis.socialOptimum, paths));
  lines.push("", ...assignmentSection(analysis.nashEquilibrium, paths));
  lines.push("");
  lines.push(
    analysis.priceOfAnarchy === null
      ? "Price of anarchy: n/a (optimum cost is 0)"
      : `Price of anarchy: ${analysis.priceOfAnarchy.toFixed(4)}`,
  );
  return lines.join("\n") + "\n";
}

/**
 * Horizontal bar chart of edge flows, one pair of bars per used edge:
 * `#` for the social optimum, `=` for the Nash split.
 */
export function formatEdgeFlowChart(analysis: TrafficAnalysis, barWidth = 30): string {
  const { socialOptimum, nashEquilibrium } = analysis;
  if (analysis.noRoute) {
    return "Edge flows: no route\n";
  }

  const edgeIds = [...socialOptimum.edgeFlows.keys()];
  let maxFlow = 0;
  for (const id of edgeIds) {
    maxFlow = Math.max(maxFlow, socialOptimum.edgeFlows.get(id) ?? 0, nashEquilibrium.edgeFlows.get(id) ?? 0);
  }

  const labelWidth = Math.max(...edgeIds.map((id) => id.length));
  const bar = (flow: number, ch: string): string =>
    ch.repeat(maxFlow > 0 ? Math.round((barWidth * flow) / maxFlow) : 0).padEnd(barWidth);

  const lines = ["Edge flows (# social optimum, = nash equilibrium)"];
  for (const id of edgeIds) {
    const optimum = socialOptimum.edgeFlows.get(id) ?? 0;
    const nash = nashEquilibrium.edgeFlows.get(id) ?? 0;
    lines.push(`  ${id.padEnd(labelWidth)}  ${bar(optimum, "#")}  ${optimum.toFixed(4)}`);
    lines.push(`  ${"".padEnd(labelWidth)}  ${bar(nash, "=")}  ${nash.toFixed(4)}`);
  }
  return lines.join("\n") + "\n";
}

/**
 * Graphviz export of a flow comparison.
 *
 * Every graph edge is drawn; edges used by some path are labelled with the
 * social-optimum and Nash flows and thickened by the optimum flow, edges no
 * path uses are dashed. Render with e.g. `dot -Tsvg flows.dot`.
 */

import type { Graph, TrafficAnalysis } from "@flowlab/types";

/** Edge colors: optimum routes more, Nash routes more, equal */
const MORE_OPTIMUM_COLOR = "#2563eb";
const MORE_NASH_COLOR = "#9333ea";
const EQUAL_COLOR = "#334155";
const UNUSED_COLOR = "#95a5a6";

const FLOW_EPSILON = 1e-9;

export interface FlowDotOptions {
  /** Graph name in the `digraph` header (default: flows) */
  name?: string;
  /** Pen width of the most loaded edge; the lightest used edge gets 1 */
  maxPenWidth?: number;
}

function quote(id: string): string {
  return `"${id.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

/** Render the comparison as a Graphviz digraph */
export function analysisToDot(
  graph: Graph,
  analysis: TrafficAnalysis,
  options: FlowDotOptions = {},
): string {
  const { name = "flows", maxPenWidth = 5 } = options;
  const { query, socialOptimum, nashEquilibrium } = analysis;

  const caption = analysis.noRoute
    ? `no route from ${query.start} to ${query.end}`
    : `${query.start} -> ${query.end}, ${query.vehicles} vehicles | ` +
      `optimum ${socialOptimum.totalCost.toFixed(2)} | nash ${nashEquilibrium.totalCost.toFixed(2)}`;

  let maxFlow = 0;
  for (const flow of socialOptimum.edgeFlows.values()) maxFlow = Math.max(maxFlow, flow);

  const lines: string[] = [
    `digraph ${quote(name)} {`,
    "  rankdir=LR;",
    "  node [shape=circle];",
    `  label=${quote(caption)};`,
  ];

  for (const node of graph.nodes.values()) {
    const emphasis = node.id === query.start || node.id === query.end ? " [penwidth=2]" : "";
    lines.push(`  ${quote(node.id)}${emphasis};`);
  }

  for (const edge of graph.edges.values()) {
    const optimumFlow = socialOptimum.edgeFlows.get(edge.id);
    const nashFlow = nashEquilibrium.edgeFlows.get(edge.id);
    const head = `  ${quote(edge.fromNodeId)} -> ${quote(edge.toNodeId)}`;

    if (optimumFlow === undefined || nashFlow === undefined) {
      lines.push(`${head} [style=dashed, color="${UNUSED_COLOR}"];`);
      continue;
    }

    const color =
      optimumFlow - nashFlow > FLOW_EPSILON
        ? MORE_OPTIMUM_COLOR
        : nashFlow - optimumFlow > FLOW_EPSILON
          ? MORE_NASH_COLOR
          : EQUAL_COLOR;
    const penWidth = maxFlow > 0 ? 1 + (maxPenWidth - 1) * (optimumFlow / maxFlow) : 1;
    const label = `SO ${optimumFlow.toFixed(2)} / NE ${nashFlow.toFixed(2)}`;

    lines.push(`${head} [label=${quote(label)}, penwidth=${penWidth.toFixed(2)}, color="${color}"];`);
  }

  lines.push("}");
  return lines.join("\n") + "\n";
}

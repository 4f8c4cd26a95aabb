/**
 * Graph ingestion module.
 *
 * Responsible for turning external graph descriptions into the domain
 * Graph. GML files are the on-disk format; plain node/edge definitions
 * come from the HTTP API and tests.
 *
 * GML file -> Parse -> Validate coefficients -> Graph
 */

import { readFile } from "node:fs/promises";

import type { Graph } from "../domain/index.js";
import { GraphLoadError } from "../domain/errors.js";
import { graphFromGml } from "./gml/graph-builder.js";

export { buildGraph, type GraphDefinition, type EdgeDefinition } from "./graph-builder.js";
export { graphFromGml } from "./gml/graph-builder.js";
export { parseGml, gmlGet, gmlLists, type GmlList, type GmlEntry, type GmlValue } from "./gml/parser.js";

/** Statistics about a loaded graph */
export interface GraphLoadStats {
  nodesCount: number;
  edgesCount: number;
  /** Edges whose cost grows with flow (a > 0) */
  congestibleEdges: number;
  loadTimeMs: number;
}

export interface GraphLoadResult {
  graph: Graph;
  stats: GraphLoadStats;
}

/**
 * Read and build a graph from a GML file.
 *
 * File-system failures are reported as GraphLoadError so callers see a
 * single error type for "could not load the graph".
 */
export async function loadGraphFromFile(path: string): Promise<GraphLoadResult> {
  const startTime = performance.now();

  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new GraphLoadError(`Cannot read graph file ${path}: ${reason}`);
  }

  const graph = graphFromGml(text);

  let congestibleEdges = 0;
  for (const edge of graph.edges.values()) {
    if (edge.cost.a > 0) congestibleEdges++;
  }

  return {
    graph,
    stats: {
      nodesCount: graph.nodes.size,
      edgesCount: graph.edges.size,
      congestibleEdges,
      loadTimeMs: performance.now() - startTime,
    },
  };
}

/**
 * Build a Graph from a parsed GML document.
 *
 * Nodes are named by their `label` (falling back to the numeric `id`),
 * while edges reference nodes by `id` through `source` and `target`. Every
 * edge must carry its cost coefficients as `a` and `b`.
 */

import type { Graph, GraphNode } from "../../domain/index.js";
import { GraphLoadError } from "../../domain/errors.js";
import { buildGraph, type EdgeDefinition } from "../graph-builder.js";
import { gmlGet, gmlLists, parseGml, type GmlList } from "./parser.js";

/** Parse GML text and build a directed graph from it */
export function graphFromGml(text: string): Graph {
  const document = parseGml(text);
  const graphs = gmlLists(document, "graph");
  const root = graphs[0];
  if (!root || graphs.length > 1) {
    throw new GraphLoadError("Expected exactly one top-level 'graph [...]' block");
  }

  const graphList = root.value;
  if (gmlGet(graphList, "directed") !== 1) {
    throw new GraphLoadError("Graph is not directed", root.line);
  }
  if (gmlGet(graphList, "multigraph") === 1) {
    throw new GraphLoadError("Multigraphs are not supported", root.line);
  }

  // GML node id -> graph node id
  const nodeIds = new Map<string, string>();
  const nodes: GraphNode[] = [];
  const labels = new Set<string>();

  for (const { value: nodeList, line } of gmlLists(graphList, "node")) {
    const rawId = gmlGet(nodeList, "id");
    if (typeof rawId !== "number" && typeof rawId !== "string") {
      throw new GraphLoadError("Node is missing an 'id'", line);
    }
    const gmlId = String(rawId);
    if (nodeIds.has(gmlId)) {
      throw new GraphLoadError(`Duplicate node id ${gmlId}`, line);
    }

    const rawLabel = gmlGet(nodeList, "label");
    if (rawLabel !== undefined && typeof rawLabel !== "string" && typeof rawLabel !== "number") {
      throw new GraphLoadError(`Node ${gmlId} has a list as its label`, line);
    }
    const name = rawLabel === undefined ? gmlId : String(rawLabel);
    if (labels.has(name)) {
      throw new GraphLoadError(`Duplicate node label "${name}"`, line);
    }
    labels.add(name);
    nodeIds.set(gmlId, name);
    nodes.push(rawLabel === undefined ? { id: name } : { id: name, label: name });
  }

  const edges: EdgeDefinition[] = [];
  for (const { value: edgeList, line } of gmlLists(graphList, "edge")) {
    const from = resolveEndpoint(edgeList, "source", nodeIds, line);
    const to = resolveEndpoint(edgeList, "target", nodeIds, line);
    edges.push({
      from,
      to,
      a: readCoefficient(edgeList, "a", from, to, line),
      b: readCoefficient(edgeList, "b", from, to, line),
    });
  }

  return buildGraph({ nodes, edges });
}

function resolveEndpoint(
  edgeList: GmlList,
  key: "source" | "target",
  nodeIds: Map<string, string>,
  line: number,
): string {
  const raw = gmlGet(edgeList, key);
  if (typeof raw !== "number" && typeof raw !== "string") {
    throw new GraphLoadError(`Edge is missing '${key}'`, line);
  }
  const nodeId = nodeIds.get(String(raw));
  if (nodeId === undefined) {
    throw new GraphLoadError(`Edge ${key} ${String(raw)} is not a known node id`, line);
  }
  return nodeId;
}

function readCoefficient(
  edgeList: GmlList,
  key: "a" | "b",
  from: string,
  to: string,
  line: number,
): number {
  const value = gmlGet(edgeList, key);
  if (typeof value !== "number") {
    throw new GraphLoadError(`Edge ${from} -> ${to} is missing numeric coefficient '${key}'`, line);
  }
  return value;
}

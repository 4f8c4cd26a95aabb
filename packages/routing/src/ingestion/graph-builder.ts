/**
 * Build a Graph from a plain node/edge definition.
 *
 * Shared by the GML loader, the HTTP API and tests. Validates the cost
 * coefficients and edge endpoints, and rejects parallel edges: an edge is
 * identified by its ordered node pair.
 */

import type { CostCoefficients, Graph, GraphEdge, GraphNode } from "../domain/index.js";
import { edgeId, GraphLoadError } from "../domain/index.js";

/** An edge as it appears in a graph definition */
export interface EdgeDefinition extends CostCoefficients {
  from: string;
  to: string;
}

/** Input to {@link buildGraph} */
export interface GraphDefinition {
  /**
   * Node ids, optionally with labels. Nodes referenced only by edges are
   * added implicitly, after the listed ones.
   */
  nodes?: (string | GraphNode)[];
  edges: EdgeDefinition[];
}

/**
 * Build a graph, failing with GraphLoadError on invalid input.
 *
 * Adjacency lists keep the order edges appear in the definition.
 */
export function buildGraph(definition: GraphDefinition): Graph {
  const nodes = new Map<string, GraphNode>();
  const edges = new Map<string, GraphEdge>();
  const adjacency = new Map<string, string[]>();

  for (const entry of definition.nodes ?? []) {
    const node: GraphNode = typeof entry === "string" ? { id: entry } : { ...entry };
    if (nodes.has(node.id)) {
      throw new GraphLoadError(`Duplicate node "${node.id}"`);
    }
    nodes.set(node.id, node);
  }

  for (const def of definition.edges) {
    validateCoefficients(def);

    for (const nodeId of [def.from, def.to]) {
      if (!nodes.has(nodeId)) nodes.set(nodeId, { id: nodeId });
    }

    const id = edgeId(def.from, def.to);
    if (edges.has(id)) {
      throw new GraphLoadError(`Parallel edge ${def.from} -> ${def.to} is not supported`);
    }

    edges.set(id, {
      id,
      fromNodeId: def.from,
      toNodeId: def.to,
      cost: { a: def.a, b: def.b },
    });

    let outgoing = adjacency.get(def.from);
    if (!outgoing) {
      outgoing = [];
      adjacency.set(def.from, outgoing);
    }
    outgoing.push(id);
  }

  return { nodes, edges, adjacency };
}

function validateCoefficients(def: EdgeDefinition): void {
  for (const key of ["a", "b"] as const) {
    const value = def[key];
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new GraphLoadError(`Edge ${def.from} -> ${def.to}: coefficient "${key}" must be a finite number`);
    }
    if (value < 0) {
      throw new GraphLoadError(`Edge ${def.from} -> ${def.to}: coefficient "${key}" must be >= 0 (got ${value})`);
    }
  }
}

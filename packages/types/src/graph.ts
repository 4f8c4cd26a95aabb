/**
 * Directed road network with affine congestion costs.
 *
 * Nodes are opaque identifiers. Each edge joins an ordered node pair and
 * carries the coefficients of its travel-time function cost(x) = a·x + b,
 * where x is the number of vehicles on the edge.
 */

/** Coefficients of an affine edge cost function */
export interface CostCoefficients {
  /** Congestion slope (cost added per extra vehicle), >= 0 */
  a: number;
  /** Free-flow cost, >= 0 */
  b: number;
}

/** A node in the graph, typically an intersection */
export interface GraphNode {
  id: string;
  /** Display label, if the source file carried one */
  label?: string;
}

/** A directed edge connecting two nodes */
export interface GraphEdge {
  /** Derived from the node pair, see {@link edgeId} */
  id: string;
  fromNodeId: string;
  toNodeId: string;
  cost: CostCoefficients;
}

/** The complete graph structure */
export interface Graph {
  nodes: Map<string, GraphNode>;
  edges: Map<string, GraphEdge>;
  /** Adjacency list: nodeId -> outgoing edgeIds, in insertion order */
  adjacency: Map<string, string[]>;
}

/** Edge identifier for an ordered node pair */
export function edgeId(fromNodeId: string, toNodeId: string): string {
  return `${fromNodeId}->${toNodeId}`;
}

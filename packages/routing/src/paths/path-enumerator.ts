/**
 * Simple-path enumeration between two nodes.
 *
 * Depth-first search over the adjacency lists, never revisiting a node that
 * is already on the current path. Outgoing edges are explored in insertion
 * order, so the same graph always yields the same path order; that order is
 * the index basis of every path-flow vector computed afterwards.
 */

import type { Graph, Path } from "@flowlab/types";
import { NotFoundError } from "../domain/errors.js";

/**
 * Enumerate every simple path from `start` to `end`.
 *
 * Returns an empty list when the nodes are disconnected or identical.
 * Throws NotFoundError when either node is absent from the graph.
 */
export function enumeratePaths(graph: Graph, start: string, end: string): Path[] {
  if (!graph.nodes.has(start)) {
    throw new NotFoundError(`Start node "${start}" is not in the graph`);
  }
  if (!graph.nodes.has(end)) {
    throw new NotFoundError(`End node "${end}" is not in the graph`);
  }

  const paths: Path[] = [];
  if (start === end) return paths;

  const nodeIds: string[] = [start];
  const edgeIds: string[] = [];
  const onPath = new Set<string>([start]);

  function visit(nodeId: string): void {
    for (const outgoingId of graph.adjacency.get(nodeId) ?? []) {
      const edge = graph.edges.get(outgoingId);
      if (!edge) continue;

      const next = edge.toNodeId;
      if (onPath.has(next)) continue;

      nodeIds.push(next);
      edgeIds.push(edge.id);

      if (next === end) {
        paths.push({ nodeIds: [...nodeIds], edgeIds: [...edgeIds] });
      } else {
        onPath.add(next);
        visit(next);
        onPath.delete(next);
      }

      nodeIds.pop();
      edgeIds.pop();
    }
  }

  visit(start);
  return paths;
}

/** Human-readable form of a path, e.g. "S -> A -> T" */
export function describePath(path: Path): string {
  return path.nodeIds.join(" -> ");
}

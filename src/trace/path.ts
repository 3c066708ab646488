import type { GraphModel, WeightedEdge } from "../graph/model.js";
import type { EdgeRef, ParentTable, TraceStep } from "./types.js";

/**
 * Walks parent links from {@link goal} back to the root and returns the path
 * root-first. Returns an empty array when the goal was never reached.
 */
export function reconstructPath(parents: ParentTable, goal: number): number[] {
  const path: number[] = [];
  let cursor: number = goal;
  // A well-formed table reaches the root within N hops.
  for (let hops = 0; hops <= parents.length; hops += 1) {
    const link = parents[cursor];
    if (link === null || link === undefined) {
      return [];
    }
    path.push(cursor);
    if (link === "root") {
      return path.reverse();
    }
    cursor = link;
  }
  throw new RangeError(`parent table contains a cycle reachable from node ${goal}`);
}

/** Sum of the edge weights along {@link path}; `Infinity` for an empty path. */
export function pathCost(graph: GraphModel, path: readonly number[]): number {
  if (path.length === 0) {
    return Number.POSITIVE_INFINITY;
  }
  let total = 0;
  for (let index = 1; index < path.length; index += 1) {
    total += graph.weight(path[index - 1], path[index]);
  }
  return total;
}

/** Attaches weights to tree edges and returns them with their total. */
export function weighTree(
  graph: GraphModel,
  edges: readonly EdgeRef[],
): { tree: WeightedEdge[]; totalWeight: number } {
  const tree = edges.map((edge) => ({ from: edge.from, to: edge.to, weight: graph.weight(edge.from, edge.to) }));
  const totalWeight = tree.reduce((sum, edge) => sum + edge.weight, 0);
  return { tree, totalWeight };
}

/**
 * Derives the final path from the last step of a trace that carries a parent
 * table. Returns an empty array for traces without one (spanning trees) and
 * for empty traces.
 */
export function finalPathFromTrace(steps: readonly TraceStep[], goal: number): number[] {
  const last = steps[steps.length - 1];
  if (!last || !("parents" in last)) {
    return [];
  }
  return reconstructPath(last.parents, goal);
}

/** Derives the accepted tree edges from the last step of a spanning-tree trace. */
export function finalTreeFromTrace(steps: readonly TraceStep[]): EdgeRef[] {
  const last = steps[steps.length - 1];
  if (!last || !("tree" in last)) {
    return [];
  }
  return [...last.tree];
}

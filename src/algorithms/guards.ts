import { NodeIndexError } from "../errors.js";
import type { GraphModel } from "../graph/model.js";
import type { ParentLink } from "../trace/types.js";

/** Throws {@link NodeIndexError} unless {@link index} is an integer in `[0, N)`. */
export function assertNodeIndex(graph: GraphModel, index: number, role: "start" | "goal"): void {
  if (!Number.isInteger(index) || index < 0 || index >= graph.nodeCount) {
    throw new NodeIndexError(role, index, graph.nodeCount);
  }
}

/** Parent table with every node unreached except {@link start}, the root. */
export function initialParents(graph: GraphModel, start: number): ParentLink[] {
  const parents: ParentLink[] = new Array<ParentLink>(graph.nodeCount).fill(null);
  parents[start] = "root";
  return parents;
}

/** Distance vector with `0` at {@link start} and `Infinity` elsewhere. */
export function initialDistances(graph: GraphModel, start: number): number[] {
  const distances = new Array<number>(graph.nodeCount).fill(Number.POSITIVE_INFINITY);
  distances[start] = 0;
  return distances;
}

import type { GraphModel } from "../graph/model.js";
import { MinHeap, type QueueEntry } from "../structures/minHeap.js";
import type { ParentLink } from "../trace/types.js";
import { initialDistances, initialParents } from "./guards.js";

/** Working state handed to the step callback whenever a node is finalised. */
export interface FinalisedNode {
  readonly current: number;
  /** Heap key the node was popped with. */
  readonly estimate: number;
  readonly visited: readonly number[];
  readonly distances: readonly number[];
  readonly parents: readonly ParentLink[];
}

export interface BestFirstOutcome {
  readonly distances: number[];
  readonly parents: ParentLink[];
}

/**
 * Lazy-deletion best-first search shared by Dijkstra and A*. Entries are keyed
 * by `g + heuristic(node)`; a node popped after it was finalised is skipped,
 * so stale duplicates never need to be removed from the heap. Distances only
 * change on strict improvement. The search stops right after {@link goal} is
 * finalised.
 *
 * Weights are assumed non-negative; this is a precondition, not checked here.
 */
export function bestFirstSearch(
  graph: GraphModel,
  start: number,
  goal: number,
  heuristic: (node: number) => number,
  onFinalised: (state: FinalisedNode) => void,
): BestFirstOutcome {
  const distances = initialDistances(graph, start);
  const parents = initialParents(graph, start);
  const finalised = new Array<boolean>(graph.nodeCount).fill(false);
  const visited: number[] = [];
  const heap = new MinHeap<QueueEntry>();
  heap.push({ priority: heuristic(start), node: start });

  let entry = heap.pop();
  while (entry !== undefined) {
    const current = entry.node;
    if (!finalised[current]) {
      finalised[current] = true;
      visited.push(current);
      onFinalised({ current, estimate: entry.priority, visited, distances, parents });
      if (current === goal) {
        break;
      }

      for (const { node, weight } of graph.neighbours(current)) {
        const candidate = distances[current] + weight;
        if (candidate < distances[node]) {
          distances[node] = candidate;
          parents[node] = current;
          heap.push({ priority: candidate + heuristic(node), node });
        }
      }
    }
    entry = heap.pop();
  }

  return { distances, parents };
}

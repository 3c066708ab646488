import type { GraphModel } from "../graph/model.js";
import { TraceRecorder, type TraceRecorderOptions } from "../trace/recorder.js";
import type { TraversalResult, TraversalStep } from "../trace/types.js";
import { assertNodeIndex, initialParents } from "./guards.js";

/**
 * Breadth-first traversal from {@link start}. A node's parent is fixed when it
 * is first discovered; one step is emitted per node dequeued, so steps come
 * in non-decreasing hop distance.
 */
export function runBfs(graph: GraphModel, start: number, options: TraceRecorderOptions = {}): TraversalResult {
  assertNodeIndex(graph, start, "start");

  const recorder = new TraceRecorder<TraversalStep>(options);
  const parents = initialParents(graph, start);
  const visited: number[] = [];
  const queue: number[] = [start];
  let head = 0;

  while (head < queue.length) {
    const current = queue[head];
    head += 1;
    visited.push(current);
    recorder.record({ algorithm: "bfs", index: recorder.nextIndex, current, visited, parents });

    for (const { node } of graph.neighbours(current)) {
      if (parents[node] === null) {
        parents[node] = current;
        queue.push(node);
      }
    }
  }

  return {
    algorithm: "bfs",
    start,
    steps: recorder.toArray(),
    order: [...visited],
    parents: [...parents],
  };
}

import type { GraphModel, Neighbour } from "../graph/model.js";
import { TraceRecorder, type TraceRecorderOptions } from "../trace/recorder.js";
import type { TraversalResult, TraversalStep } from "../trace/types.js";
import { assertNodeIndex, initialParents } from "./guards.js";

interface Frame {
  readonly node: number;
  readonly neighbours: readonly Neighbour[];
  /** Position of the next neighbour to inspect. */
  cursor: number;
}

/**
 * Pre-order depth-first traversal from {@link start}, visiting neighbours in
 * ascending index order. Uses an explicit frame stack; the visitation order
 * and parent assignment match the recursive formulation.
 */
export function runDfs(graph: GraphModel, start: number, options: TraceRecorderOptions = {}): TraversalResult {
  assertNodeIndex(graph, start, "start");

  const recorder = new TraceRecorder<TraversalStep>(options);
  const parents = initialParents(graph, start);
  const seen = new Array<boolean>(graph.nodeCount).fill(false);
  const visited: number[] = [];
  const stack: Frame[] = [];

  const enter = (node: number): void => {
    seen[node] = true;
    visited.push(node);
    recorder.record({ algorithm: "dfs", index: recorder.nextIndex, current: node, visited, parents });
    stack.push({ node, neighbours: graph.neighbours(node), cursor: 0 });
  };

  enter(start);
  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    let descended = false;
    while (frame.cursor < frame.neighbours.length) {
      const next = frame.neighbours[frame.cursor].node;
      frame.cursor += 1;
      if (!seen[next]) {
        parents[next] = frame.node;
        enter(next);
        descended = true;
        break;
      }
    }
    if (!descended) {
      stack.pop();
    }
  }

  return {
    algorithm: "dfs",
    start,
    steps: recorder.toArray(),
    order: [...visited],
    parents: [...parents],
  };
}

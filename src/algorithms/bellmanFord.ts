import type { GraphModel } from "../graph/model.js";
import { reconstructPath } from "../trace/path.js";
import { TraceRecorder, type TraceRecorderOptions } from "../trace/recorder.js";
import type { BellmanFordResult, BellmanFordStep } from "../trace/types.js";
import { assertNodeIndex, initialDistances, initialParents } from "./guards.js";

/**
 * Bellman-Ford from {@link origin}. Runs at most N-1 passes over every
 * directed edge (both directions of each undirected edge, row-major order) and
 * emits one step per successful relaxation. A pass that relaxes nothing emits a
 * single `no_change` step and ends the run early.
 *
 * Negative cycles are neither detected nor reported.
 */
export function runBellmanFord(
  graph: GraphModel,
  origin: number,
  goal: number,
  options: TraceRecorderOptions = {},
): BellmanFordResult {
  assertNodeIndex(graph, origin, "start");
  assertNodeIndex(graph, goal, "goal");

  const recorder = new TraceRecorder<BellmanFordStep>(options);
  const edges = graph.toEdgeList();
  const distances = initialDistances(graph, origin);
  const parents = initialParents(graph, origin);

  for (let iteration = 1; iteration < graph.nodeCount; iteration += 1) {
    let relaxed = false;
    for (const { from, to, weight } of edges) {
      if (distances[from] === Number.POSITIVE_INFINITY) {
        continue;
      }
      const previousDistance = distances[to];
      const candidate = distances[from] + weight;
      if (candidate < previousDistance) {
        distances[to] = candidate;
        parents[to] = from;
        relaxed = true;
        recorder.record({
          algorithm: "bellman-ford",
          kind: "relaxation",
          index: recorder.nextIndex,
          iteration,
          edge: { from, to },
          weight,
          previousDistance,
          newDistance: candidate,
          distances,
          parents,
        });
      }
    }

    if (!relaxed) {
      recorder.record({
        algorithm: "bellman-ford",
        kind: "no_change",
        index: recorder.nextIndex,
        iteration,
        distances,
        parents,
      });
      break;
    }
  }

  const path = reconstructPath(parents, goal);
  return {
    algorithm: "bellman-ford",
    start: origin,
    goal,
    steps: recorder.toArray(),
    path,
    distances: [...distances],
    cost: path.length > 0 ? distances[goal] : Number.POSITIVE_INFINITY,
  };
}

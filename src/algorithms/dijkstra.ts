import type { GraphModel } from "../graph/model.js";
import { reconstructPath } from "../trace/path.js";
import { TraceRecorder, type TraceRecorderOptions } from "../trace/recorder.js";
import type { DijkstraResult, DijkstraStep } from "../trace/types.js";
import { bestFirstSearch } from "./bestFirst.js";
import { assertNodeIndex } from "./guards.js";

/**
 * Dijkstra's shortest path from {@link start} to {@link goal}. Emits one step
 * per finalised node and stops once the goal is finalised, so the distance
 * vector is only complete for nodes finalised before the goal.
 */
export function runDijkstra(
  graph: GraphModel,
  start: number,
  goal: number,
  options: TraceRecorderOptions = {},
): DijkstraResult {
  assertNodeIndex(graph, start, "start");
  assertNodeIndex(graph, goal, "goal");

  const recorder = new TraceRecorder<DijkstraStep>(options);
  const { distances, parents } = bestFirstSearch(graph, start, goal, () => 0, (state) => {
    recorder.record({
      algorithm: "dijkstra",
      index: recorder.nextIndex,
      current: state.current,
      visited: state.visited,
      distances: state.distances,
      parents: state.parents,
    });
  });

  const path = reconstructPath(parents, goal);
  return {
    algorithm: "dijkstra",
    start,
    goal,
    steps: recorder.toArray(),
    path,
    distances: [...distances],
    cost: path.length > 0 ? distances[goal] : Number.POSITIVE_INFINITY,
  };
}

import { syntheticCoordinates, type GraphModel } from "../graph/model.js";
import { reconstructPath } from "../trace/path.js";
import { TraceRecorder, type TraceRecorderOptions } from "../trace/recorder.js";
import type { AStarResult, AStarStep } from "../trace/types.js";
import { bestFirstSearch } from "./bestFirst.js";
import { assertNodeIndex } from "./guards.js";

/**
 * Euclidean distance between synthetic grid coordinates of each node and the
 * goal. The grid has no relation to edge weights, so this estimate can
 * overestimate the remaining cost on some graphs; A* then may return a path
 * that is not the cheapest.
 */
export function gridHeuristic(graph: GraphModel, goal: number): (node: number) => number {
  const coordinates = syntheticCoordinates(graph.nodeCount);
  const target = coordinates[goal];
  return (node) => Math.hypot(target.x - coordinates[node].x, target.y - coordinates[node].y);
}

/**
 * A* search from {@link start} to {@link goal}. Same skeleton as Dijkstra;
 * only the heap key adds the grid heuristic. Relaxation compares true costs.
 */
export function runAStar(graph: GraphModel, start: number, goal: number, options: TraceRecorderOptions = {}): AStarResult {
  assertNodeIndex(graph, start, "start");
  assertNodeIndex(graph, goal, "goal");

  const recorder = new TraceRecorder<AStarStep>(options);
  const heuristic = gridHeuristic(graph, goal);
  const { distances, parents } = bestFirstSearch(graph, start, goal, heuristic, (state) => {
    recorder.record({
      algorithm: "astar",
      index: recorder.nextIndex,
      current: state.current,
      estimate: state.estimate,
      visited: state.visited,
      distances: state.distances,
      parents: state.parents,
    });
  });

  const path = reconstructPath(parents, goal);
  return {
    algorithm: "astar",
    start,
    goal,
    steps: recorder.toArray(),
    path,
    distances: [...distances],
    cost: path.length > 0 ? distances[goal] : Number.POSITIVE_INFINITY,
  };
}

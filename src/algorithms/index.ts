import { performance } from "node:perf_hooks";

import { normaliseError } from "../errors.js";
import type { GraphModel } from "../graph/model.js";
import type { StructuredLogger } from "../logger.js";
import type { TraceRecorderOptions } from "../trace/recorder.js";
import type { AlgorithmName, AlgorithmResult, ResultByAlgorithm } from "../trace/types.js";
import { runAStar } from "./astar.js";
import { runBellmanFord } from "./bellmanFord.js";
import { runBfs } from "./bfs.js";
import { runDfs } from "./dfs.js";
import { runDijkstra } from "./dijkstra.js";
import { runKruskal } from "./kruskal.js";
import { runPrim } from "./prim.js";

export { runAStar, gridHeuristic } from "./astar.js";
export { runBellmanFord } from "./bellmanFord.js";
export { runBfs } from "./bfs.js";
export { runDfs } from "./dfs.js";
export { runDijkstra } from "./dijkstra.js";
export { runKruskal } from "./kruskal.js";
export { runPrim } from "./prim.js";

export type AlgorithmFamily = "traversal" | "shortest-path" | "spanning-tree";

/** Endpoints of a run. Spanning-tree algorithms ignore both. */
export interface RunEndpoints {
  readonly start: number;
  readonly goal: number;
}

export interface AlgorithmDescriptor<A extends AlgorithmName> {
  /** Display name used in summaries. */
  readonly label: string;
  readonly family: AlgorithmFamily;
  readonly run: (graph: GraphModel, endpoints: RunEndpoints, options: TraceRecorderOptions) => ResultByAlgorithm[A];
}

export type AlgorithmRegistry = { readonly [A in AlgorithmName]: AlgorithmDescriptor<A> };

/** Every algorithm the engine ships, keyed by name. */
export const ALGORITHMS: AlgorithmRegistry = {
  bfs: { label: "BFS", family: "traversal", run: (graph, { start }, options) => runBfs(graph, start, options) },
  dfs: { label: "DFS", family: "traversal", run: (graph, { start }, options) => runDfs(graph, start, options) },
  dijkstra: {
    label: "Dijkstra",
    family: "shortest-path",
    run: (graph, { start, goal }, options) => runDijkstra(graph, start, goal, options),
  },
  astar: {
    label: "A*",
    family: "shortest-path",
    run: (graph, { start, goal }, options) => runAStar(graph, start, goal, options),
  },
  "bellman-ford": {
    label: "Bellman-Ford",
    family: "shortest-path",
    run: (graph, { start, goal }, options) => runBellmanFord(graph, start, goal, options),
  },
  kruskal: { label: "Kruskal", family: "spanning-tree", run: (graph, _endpoints, options) => runKruskal(graph, options) },
  prim: { label: "Prim", family: "spanning-tree", run: (graph, _endpoints, options) => runPrim(graph, options) },
};

export const ALGORITHM_NAMES: readonly AlgorithmName[] = [
  "bfs",
  "dfs",
  "dijkstra",
  "astar",
  "bellman-ford",
  "kruskal",
  "prim",
];

/** Narrows a user-supplied string to an {@link AlgorithmName}. */
export function isAlgorithmName(value: string): value is AlgorithmName {
  return Object.prototype.hasOwnProperty.call(ALGORITHMS, value);
}

export interface RunOptions extends TraceRecorderOptions {
  /** Start index; defaults to the first node. */
  readonly start?: number;
  /** Goal index; defaults to the last node. */
  readonly goal?: number;
  readonly logger?: StructuredLogger;
}

/**
 * Runs {@link algorithm} on {@link graph} and returns its complete trace. The
 * start defaults to node 0 and the goal to the last node. Invalid endpoints
 * fail before any step is produced.
 */
export function runAlgorithm<A extends AlgorithmName>(
  graph: GraphModel,
  algorithm: A,
  options: RunOptions = {},
): ResultByAlgorithm[A] {
  const descriptor: AlgorithmDescriptor<A> = ALGORITHMS[algorithm];
  const endpoints: RunEndpoints = {
    start: options.start ?? 0,
    goal: options.goal ?? graph.nodeCount - 1,
  };
  const logger = options.logger;
  logger?.debug("algorithm_run_started", { algorithm, graph: graph.name, ...endpoints });

  const startedAt = performance.now();
  let result: ResultByAlgorithm[A];
  try {
    result = descriptor.run(graph, endpoints, options.freeze === undefined ? {} : { freeze: options.freeze });
  } catch (error) {
    logger?.warn("algorithm_run_rejected", { algorithm, graph: graph.name, error: normaliseError(error) });
    throw error;
  }

  logger?.info("algorithm_run_completed", {
    algorithm,
    graph: graph.name,
    nodes: graph.nodeCount,
    steps: result.steps.length,
    duration_ms: Math.round((performance.now() - startedAt) * 1000) / 1000,
  });
  return result;
}

/** One-line human summary of a finished run. */
export function describeRun(graph: GraphModel, result: AlgorithmResult): string {
  const label = ALGORITHMS[result.algorithm].label;
  const names = (nodes: readonly number[]): string => nodes.map((node) => graph.labelOf(node)).join(" -> ");

  switch (result.algorithm) {
    case "bfs":
    case "dfs":
      return `${label}: ${result.order.length} nodes visited (${names(result.order)})`;
    case "dijkstra":
    case "astar":
    case "bellman-ford":
      if (result.path.length === 0) {
        return `${label}: ${graph.labelOf(result.goal)} is unreachable from ${graph.labelOf(result.start)}`;
      }
      return `${label}: ${names(result.path)} (cost ${result.cost})`;
    case "kruskal":
    case "prim":
      return `${label}: MST weight ${result.totalWeight} (${result.tree.length} edges)`;
  }
}

import type { WeightedEdge } from "../graph/model.js";

/** Closed set of algorithms the engine ships. */
export type AlgorithmName = "bfs" | "dfs" | "dijkstra" | "astar" | "bellman-ford" | "kruskal" | "prim";

/**
 * Parent of a node in a search tree: the parent's index, `"root"` for the node
 * the run started from, or `null` while the node has not been reached.
 */
export type ParentLink = number | "root" | null;

/** Parent link of every node, indexed by node. */
export type ParentTable = ReadonlyArray<ParentLink>;

/** Undirected edge reference as stored in spanning-tree traces. */
export interface EdgeRef {
  readonly from: number;
  readonly to: number;
}

interface StepBase {
  /** Position of the step inside its trace, starting at 0. */
  readonly index: number;
}

/** A node dequeued (BFS) or descended into (DFS) and marked visited. */
export interface TraversalStep extends StepBase {
  readonly algorithm: "bfs" | "dfs";
  readonly current: number;
  /** Visited nodes in visitation order, including {@link current}. */
  readonly visited: readonly number[];
  readonly parents: ParentTable;
}

/** A node finalised by Dijkstra. */
export interface DijkstraStep extends StepBase {
  readonly algorithm: "dijkstra";
  readonly current: number;
  /** Finalised nodes in finalisation order. */
  readonly visited: readonly number[];
  /** Best-known distance per node, `Infinity` when unreached. */
  readonly distances: readonly number[];
  readonly parents: ParentTable;
}

/** A node finalised by A*. */
export interface AStarStep extends StepBase {
  readonly algorithm: "astar";
  readonly current: number;
  /** `g + h` key the node was popped with. */
  readonly estimate: number;
  readonly visited: readonly number[];
  /** Accumulated cost `g` per node, `Infinity` when unreached. */
  readonly distances: readonly number[];
  readonly parents: ParentTable;
}

/** Successful relaxation of one directed edge during a Bellman-Ford pass. */
export interface BellmanFordRelaxationStep extends StepBase {
  readonly algorithm: "bellman-ford";
  readonly kind: "relaxation";
  /** 1-based pass number. */
  readonly iteration: number;
  readonly edge: EdgeRef;
  readonly weight: number;
  readonly previousDistance: number;
  readonly newDistance: number;
  readonly distances: readonly number[];
  readonly parents: ParentTable;
}

/** Emitted once when a whole pass relaxed nothing; the run ends with it. */
export interface BellmanFordNoChangeStep extends StepBase {
  readonly algorithm: "bellman-ford";
  readonly kind: "no_change";
  readonly iteration: number;
  readonly distances: readonly number[];
  readonly parents: ParentTable;
}

export type BellmanFordStep = BellmanFordRelaxationStep | BellmanFordNoChangeStep;

/** One edge examined by Kruskal, accepted or rejected. */
export interface KruskalStep extends StepBase {
  readonly algorithm: "kruskal";
  readonly edge: EdgeRef;
  readonly weight: number;
  readonly accepted: boolean;
  /** Accepted edges so far, in acceptance order. */
  readonly tree: readonly EdgeRef[];
}

/** A node pulled into Prim's tree. */
export interface PrimStep extends StepBase {
  readonly algorithm: "prim";
  readonly current: number;
  /** Tree node the inclusion edge comes from, `null` for the root. */
  readonly via: number | null;
  /** Weight of the inclusion edge, `0` for the root. */
  readonly weight: number;
  /** Included nodes in ascending index order. */
  readonly included: readonly number[];
  readonly tree: readonly EdgeRef[];
}

export type TraceStep =
  | TraversalStep
  | DijkstraStep
  | AStarStep
  | BellmanFordStep
  | KruskalStep
  | PrimStep;

/** Outcome of BFS/DFS: the trace plus the final visitation order and tree. */
export interface TraversalResult {
  readonly algorithm: "bfs" | "dfs";
  readonly start: number;
  readonly steps: readonly TraversalStep[];
  readonly order: readonly number[];
  readonly parents: ParentTable;
}

/** Outcome of a shortest-path run. */
export interface PathResult<S extends DijkstraStep | AStarStep | BellmanFordStep> {
  readonly algorithm: S["algorithm"];
  readonly start: number;
  readonly goal: number;
  readonly steps: readonly S[];
  /** Node indices from start to goal, empty when the goal is unreachable. */
  readonly path: readonly number[];
  /** Final distance vector, `Infinity` for unreached nodes. */
  readonly distances: readonly number[];
  /** `distances[goal]`, `Infinity` when unreachable. */
  readonly cost: number;
}

/** Outcome of a spanning-tree run. */
export interface TreeResult<S extends KruskalStep | PrimStep> {
  readonly algorithm: S["algorithm"];
  readonly steps: readonly S[];
  /** Accepted edges; fewer than N-1 when the graph is disconnected. */
  readonly tree: readonly WeightedEdge[];
  readonly totalWeight: number;
}

export type DijkstraResult = PathResult<DijkstraStep>;
export type AStarResult = PathResult<AStarStep>;
export type BellmanFordResult = PathResult<BellmanFordStep>;
export type KruskalResult = TreeResult<KruskalStep>;
export type PrimResult = TreeResult<PrimStep>;

/** Result type returned by each algorithm. */
export interface ResultByAlgorithm {
  bfs: TraversalResult;
  dfs: TraversalResult;
  dijkstra: DijkstraResult;
  astar: AStarResult;
  "bellman-ford": BellmanFordResult;
  kruskal: KruskalResult;
  prim: PrimResult;
}

export type AlgorithmResult = ResultByAlgorithm[AlgorithmName];

import { GraphShapeError } from "../errors.js";

/** Weighted edge `from -> to`. Undirected graphs list both directions where noted. */
export interface WeightedEdge {
  readonly from: number;
  readonly to: number;
  readonly weight: number;
}

/** Neighbour entry of the adjacency-list view. */
export interface Neighbour {
  readonly node: number;
  readonly weight: number;
}

/** Grid position used as A* heuristic input. */
export interface GridCoordinate {
  readonly x: number;
  readonly y: number;
}

/** Display name used when the caller does not supply one. */
export const DEFAULT_GRAPH_NAME = "Custom";

/**
 * Weighted undirected graph backed by an adjacency matrix. A weight of `0`
 * encodes "no edge". Instances are frozen once loaded and are replaced
 * wholesale when a different graph is needed.
 */
export class GraphModel {
  readonly nodeCount: number;
  readonly labels: readonly string[];
  private readonly matrix: ReadonlyArray<ReadonlyArray<number>>;
  private readonly labelIndex: ReadonlyMap<string, number>;

  private constructor(
    readonly name: string,
    matrix: ReadonlyArray<ReadonlyArray<number>>,
    labels: readonly string[],
  ) {
    this.nodeCount = matrix.length;
    this.matrix = Object.freeze(matrix.map((row) => Object.freeze([...row])));
    this.labels = Object.freeze([...labels]);
    this.labelIndex = new Map(labels.map((label, index) => [label, index]));
    Object.freeze(this);
  }

  /**
   * Validates the matrix/label pair and builds a graph. Throws
   * {@link GraphShapeError} when the matrix is empty or not square, when the
   * label count differs from the node count, or when the matrix is not a
   * symmetric non-negative matrix with a zero diagonal.
   */
  static load(
    matrix: ReadonlyArray<ReadonlyArray<number>>,
    labels: readonly string[],
    name: string = DEFAULT_GRAPH_NAME,
  ): GraphModel {
    const size = matrix.length;
    if (size === 0) {
      throw new GraphShapeError("matrix must contain at least one node", { rows: 0 });
    }
    matrix.forEach((row, rowIndex) => {
      if (row.length !== size) {
        throw new GraphShapeError(
          `matrix is not square: row ${rowIndex} has ${row.length} cells, expected ${size}`,
          { row: rowIndex, length: row.length, expected: size },
        );
      }
    });
    if (labels.length !== size) {
      throw new GraphShapeError(
        `expected ${size} labels but received ${labels.length}`,
        { labels: labels.length, nodes: size },
        "provide exactly one label per matrix row",
      );
    }
    if (new Set(labels).size !== labels.length) {
      throw new GraphShapeError("labels must be unique", { labels: [...labels] });
    }

    for (let i = 0; i < size; i += 1) {
      for (let j = 0; j < size; j += 1) {
        const weight = matrix[i][j];
        if (!Number.isFinite(weight) || weight < 0) {
          throw new GraphShapeError(`weight at (${i}, ${j}) must be a finite non-negative number`, {
            row: i,
            column: j,
            value: weight,
          });
        }
        if (i === j && weight !== 0) {
          throw new GraphShapeError(`self-loop at node ${i} is not supported`, { node: i, value: weight });
        }
        if (weight !== matrix[j][i]) {
          throw new GraphShapeError(`matrix is not symmetric at (${i}, ${j})`, {
            row: i,
            column: j,
            forward: weight,
            backward: matrix[j][i],
          });
        }
      }
    }

    return new GraphModel(name, matrix, labels);
  }

  /** Weight of the edge between `from` and `to`, `0` when absent. */
  weight(from: number, to: number): number {
    return this.matrix[from]?.[to] ?? 0;
  }

  hasEdge(from: number, to: number): boolean {
    return this.weight(from, to) !== 0;
  }

  /** Neighbours of {@link node} in ascending index order. */
  neighbours(node: number): Neighbour[] {
    const row = this.matrix[node] ?? [];
    const result: Neighbour[] = [];
    row.forEach((weight, index) => {
      if (weight !== 0) {
        result.push({ node: index, weight });
      }
    });
    return result;
  }

  labelOf(node: number): string {
    return this.labels[node] ?? String(node);
  }

  /** Index of the node carrying {@link label}, `undefined` when unknown. */
  indexOf(label: string): number | undefined {
    return this.labelIndex.get(label);
  }

  /** Copy of the adjacency matrix. */
  toMatrix(): number[][] {
    return this.matrix.map((row) => [...row]);
  }

  /**
   * Every nonzero cell as a directed edge, row-major. Undirected edges appear
   * in both directions, which Bellman-Ford relies on.
   */
  toEdgeList(): WeightedEdge[] {
    const edges: WeightedEdge[] = [];
    for (let i = 0; i < this.nodeCount; i += 1) {
      for (let j = 0; j < this.nodeCount; j += 1) {
        const weight = this.matrix[i][j];
        if (weight !== 0) {
          edges.push({ from: i, to: j, weight });
        }
      }
    }
    return edges;
  }

  /** Each undirected edge once (`from < to`), row-major. */
  toUpperEdgeList(): WeightedEdge[] {
    return this.toEdgeList().filter((edge) => edge.from < edge.to);
  }

  /** Per node, its `(neighbour, weight)` pairs in ascending neighbour order. */
  toAdjacencyList(): Neighbour[][] {
    return this.labels.map((_, node) => this.neighbours(node));
  }
}

/**
 * Deterministic grid position for each node index: `(i mod c, floor(i / c))`
 * with `c = ceil(sqrt(n))`. Only used as heuristic input, not as a layout.
 */
export function syntheticCoordinates(nodeCount: number): GridCoordinate[] {
  const columns = Math.ceil(Math.sqrt(nodeCount));
  return Array.from({ length: nodeCount }, (_, index) => ({
    x: index % columns,
    y: Math.floor(index / columns),
  }));
}

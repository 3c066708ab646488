import { readFile } from "node:fs/promises";
import { basename, extname } from "node:path";
import { z } from "zod";

import { resolveEngineConfig } from "../config/engine.js";
import { GraphLoadError } from "../errors.js";
import { DEFAULT_GRAPH_NAME, GraphModel } from "./model.js";

const endpointSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

/** Adjacency-matrix document: `{ matrix, labels?, name? }`. */
export const MatrixDocumentSchema = z.object({
  matrix: z.array(z.array(z.number().finite())).min(1),
  labels: z.array(z.string()).optional(),
  name: z.string().optional(),
});

/** Single undirected edge of an edge-list document. */
export const EdgeEntrySchema = z.object({
  origin: endpointSchema,
  destination: endpointSchema,
  weight: z.number().finite().default(1),
});

/** Edge-list document: `{ edges: [{ origin, destination, weight? }], name? }`. */
export const EdgeListDocumentSchema = z.object({
  edges: z.array(EdgeEntrySchema).min(1),
  name: z.string().optional(),
});

export type MatrixDocument = z.infer<typeof MatrixDocumentSchema>;
export type EdgeListDocument = z.infer<typeof EdgeListDocumentSchema>;

export interface LoadOptions {
  /** Display name overriding the one found in the document. */
  readonly name?: string;
  /** Largest accepted node count. Defaults to `GRAPH_TRACE_MAX_NODES`. */
  readonly maxNodes?: number;
}

/**
 * Normalised triple handed to {@link GraphModel.load}: a symmetric square
 * matrix, one label per row and a display name.
 */
export interface NormalisedGraphInput {
  readonly matrix: number[][];
  readonly labels: string[];
  readonly name: string;
}

/**
 * Default label for a node index: `A`..`Z` for the first 26 nodes, then
 * `N26`, `N27`, ...
 */
export function defaultLabel(index: number): string {
  return index < 26 ? String.fromCharCode(65 + index) : `N${index}`;
}

/**
 * Turns an already parsed JSON value into the normalised matrix/labels/name
 * triple. Matrix documents take precedence over edge lists when both keys are
 * present.
 */
export function normaliseGraphDocument(document: unknown, options: LoadOptions = {}): NormalisedGraphInput {
  if (typeof document !== "object" || document === null || Array.isArray(document)) {
    throw new GraphLoadError("MalformedInput", "graph document must be a JSON object");
  }

  const maxNodes = options.maxNodes ?? resolveEngineConfig().maxNodes;
  if ("matrix" in document) {
    return normaliseMatrixDocument(parseDocument(MatrixDocumentSchema, document), options, maxNodes);
  }
  if ("edges" in document) {
    return normaliseEdgeListDocument(parseDocument(EdgeListDocumentSchema, document), options, maxNodes);
  }
  throw new GraphLoadError("MissingRequiredKey", "graph document must contain 'matrix' or 'edges'", {
    keys: Object.keys(document),
  });
}

/** Parses {@link document} and builds the {@link GraphModel} it describes. */
export function parseGraphDocument(document: unknown, options: LoadOptions = {}): GraphModel {
  const input = normaliseGraphDocument(document, options);
  return GraphModel.load(input.matrix, input.labels, input.name);
}

/**
 * Reads a JSON graph document from disk. The display name falls back to the
 * file's base name when neither the options nor the document provide one.
 */
export async function loadGraphFile(path: string, options: LoadOptions = {}): Promise<GraphModel> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new GraphLoadError("FileNotFound", `graph file not found: ${path}`, { path }, { cause: error });
    }
    throw error;
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new GraphLoadError("MalformedInput", `graph file is not valid JSON: ${path}`, { path }, { cause: error });
  }

  const fallbackName = basename(path, extname(path));
  const hasOwnName = typeof document === "object" && document !== null && "name" in document;
  return parseGraphDocument(document, {
    ...options,
    name: options.name ?? (hasOwnName ? undefined : fallbackName),
  });
}

function parseDocument<T extends z.ZodTypeAny>(schema: T, document: object): z.output<T> {
  const parsed = schema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));
    throw new GraphLoadError("MalformedInput", "graph document has an invalid structure", { issues }, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/** Rejects node counts above {@link maxNodes} before any matrix is allocated. */
function assertNodeLimit(nodes: number, maxNodes: number): void {
  if (nodes > maxNodes) {
    throw new GraphLoadError(
      "TooLarge",
      `graph has ${nodes} nodes, the limit is ${maxNodes}`,
      { nodes, maxNodes },
      { hint: "raise GRAPH_TRACE_MAX_NODES or load a smaller graph" },
    );
  }
}

function normaliseMatrixDocument(
  document: MatrixDocument,
  options: LoadOptions,
  maxNodes: number,
): NormalisedGraphInput {
  const size = document.matrix.length;
  assertNodeLimit(size, maxNodes);
  document.matrix.forEach((row, index) => {
    if (row.length !== size) {
      throw new GraphLoadError("NonSquareMatrix", "matrix is not square", {
        row: index,
        length: row.length,
        expected: size,
      });
    }
  });

  // Asymmetric cells collapse to the larger of the two weights; self-loops are dropped.
  const matrix = document.matrix.map((row) => [...row]);
  for (let i = 0; i < size; i += 1) {
    matrix[i][i] = 0;
    for (let j = i + 1; j < size; j += 1) {
      const value = Math.max(matrix[i][j], matrix[j][i]);
      matrix[i][j] = value;
      matrix[j][i] = value;
    }
  }

  const labels =
    document.labels !== undefined && document.labels.length === size
      ? [...document.labels]
      : Array.from({ length: size }, (_, index) => defaultLabel(index));

  return { matrix, labels, name: options.name ?? document.name ?? DEFAULT_GRAPH_NAME };
}

function normaliseEdgeListDocument(
  document: EdgeListDocument,
  options: LoadOptions,
  maxNodes: number,
): NormalisedGraphInput {
  const names = new Set<string>();
  for (const edge of document.edges) {
    names.add(edge.origin);
    names.add(edge.destination);
  }
  assertNodeLimit(names.size, maxNodes);
  const labels = [...names].sort();
  const index = new Map(labels.map((label, position) => [label, position]));

  const matrix = labels.map(() => labels.map(() => 0));
  for (const edge of document.edges) {
    const from = index.get(edge.origin);
    const to = index.get(edge.destination);
    // A self-loop still names its node but never carries a weight.
    if (from === undefined || to === undefined || from === to) {
      continue;
    }
    matrix[from][to] = edge.weight;
    matrix[to][from] = edge.weight;
  }

  return { matrix, labels, name: options.name ?? document.name ?? DEFAULT_GRAPH_NAME };
}

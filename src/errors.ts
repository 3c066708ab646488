import { z } from "zod";

import { ERROR_CODES, fail, type ErrorCode, type GraphFailure } from "./types.js";

/** Error thrown when a matrix/label pair cannot describe a valid graph. */
export class GraphShapeError extends Error {
  public readonly code: typeof ERROR_CODES.GRAPH_SHAPE;
  public readonly hint?: string;
  public readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}, hint?: string) {
    super(message);
    this.name = "GraphShapeError";
    this.code = ERROR_CODES.GRAPH_SHAPE;
    this.hint = hint;
    this.details = details;
  }
}

/** Error thrown when a start or goal index falls outside `[0, N)`. */
export class NodeIndexError extends Error {
  public readonly code: typeof ERROR_CODES.GRAPH_INDEX;
  public readonly hint: string;
  public readonly details: { role: string; index: number; nodeCount: number };

  constructor(role: string, index: number, nodeCount: number) {
    super(`${role} index ${index} is outside [0, ${nodeCount})`);
    this.name = "NodeIndexError";
    this.code = ERROR_CODES.GRAPH_INDEX;
    this.hint = "pick a node index between 0 and the node count minus one";
    this.details = { role, index, nodeCount };
  }
}

/** Failure categories surfaced by the graph loader. */
export type GraphLoadFailureReason =
  | "FileNotFound"
  | "MalformedInput"
  | "NonSquareMatrix"
  | "MissingRequiredKey"
  | "TooLarge"
  | "UnknownSample";

/** Error thrown by the loader when a document cannot be turned into a graph. */
export class GraphLoadError extends Error {
  public readonly code: typeof ERROR_CODES.GRAPH_LOAD;
  public readonly hint?: string;
  public readonly details: { reason: GraphLoadFailureReason } & Record<string, unknown>;

  constructor(
    readonly reason: GraphLoadFailureReason,
    message: string,
    details: Record<string, unknown> = {},
    options: { hint?: string; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "GraphLoadError";
    this.code = ERROR_CODES.GRAPH_LOAD;
    this.hint = options.hint;
    this.details = { ...details, reason };
  }
}

/** Union of every typed error the engine throws on purpose. */
export type GraphEngineError = GraphShapeError | NodeIndexError | GraphLoadError;

/** Narrows an unknown value to one of the engine's typed errors. */
export function isGraphEngineError(error: unknown): error is GraphEngineError {
  return error instanceof GraphShapeError || error instanceof NodeIndexError || error instanceof GraphLoadError;
}

/**
 * Normalises an arbitrary thrown value into the failure payload printed by the
 * CLI. Zod validation errors that escaped the loader are mapped to the load
 * code so clients see the individual issues.
 */
export function normaliseError(error: unknown): GraphFailure<ErrorCode> {
  if (isGraphEngineError(error)) {
    return fail(error.code, error.message, error.hint, error.details);
  }
  if (error instanceof z.ZodError) {
    return fail(ERROR_CODES.GRAPH_LOAD, "graph document failed validation", "invalid_input", {
      issues: error.issues,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return fail(ERROR_CODES.GRAPH_UNEXPECTED, message);
}

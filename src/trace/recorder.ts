import { resolveEngineConfig } from "../config/engine.js";
import type { TraceStep } from "./types.js";

export interface TraceRecorderOptions {
  /** Deep-freeze recorded steps. Defaults to `GRAPH_TRACE_FREEZE_STEPS`. */
  readonly freeze?: boolean;
}

/**
 * Append-only log of steps. Every recorded step is structurally cloned before
 * it is stored, so callers may hand over their live working arrays: a later
 * mutation of the algorithm state never reaches an emitted step.
 */
export class TraceRecorder<S extends TraceStep> {
  private readonly steps: S[] = [];
  private readonly freeze: boolean;

  constructor(options: TraceRecorderOptions = {}) {
    this.freeze = options.freeze ?? resolveEngineConfig().freezeSteps;
  }

  /** Index the next recorded step will carry. */
  get nextIndex(): number {
    return this.steps.length;
  }

  record(step: S): S {
    if (step.index !== this.steps.length) {
      throw new RangeError(`step index ${step.index} does not match trace position ${this.steps.length}`);
    }
    const snapshot = structuredClone(step);
    if (this.freeze) {
      deepFreeze(snapshot);
    }
    this.steps.push(snapshot);
    return snapshot;
  }

  /** The recorded steps. The returned array is a frozen copy. */
  toArray(): readonly S[] {
    return Object.freeze([...this.steps]);
  }
}

/** Recursively freezes plain objects and arrays. */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

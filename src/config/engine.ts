import { readBool, readEnum, readInt, readOptionalString } from "./env.js";
import type { LogLevel } from "../logger.js";

/** Log levels accepted by `GRAPH_TRACE_LOG_LEVEL`. */
export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/** Default ceiling on the node count accepted by the loader. */
export const DEFAULT_MAX_NODES = 64;

/** Runtime knobs resolved from the environment. */
export interface EngineConfig {
  /** Minimum level written by the structured logger. */
  readonly logLevel: LogLevel;
  /** Optional file mirroring every log line. */
  readonly logFile: string | null;
  /** Largest graph the loader accepts. */
  readonly maxNodes: number;
  /** Whether {@link TraceRecorder} deep-freezes the steps it emits. */
  readonly freezeSteps: boolean;
}

/**
 * Resolves the engine configuration from `process.env`. Unknown or malformed
 * values silently fall back to the defaults, matching the env helpers.
 */
export function resolveEngineConfig(): EngineConfig {
  return {
    logLevel: readEnum("GRAPH_TRACE_LOG_LEVEL", LOG_LEVELS, "info"),
    logFile: readOptionalString("GRAPH_TRACE_LOG_FILE") ?? null,
    maxNodes: readInt("GRAPH_TRACE_MAX_NODES", DEFAULT_MAX_NODES, { min: 1, max: 4096 }),
    freezeSteps: readBool("GRAPH_TRACE_FREEZE_STEPS", true),
  };
}

#!/usr/bin/env node
import process from "node:process";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.
import { ALGORITHM_NAMES, describeRun, isAlgorithmName, runAlgorithm } from "./algorithms/index.js";
import { resolveEngineConfig } from "./config/engine.js";
import { normaliseError } from "./errors.js";
import { loadGraphFile } from "./graph/loader.js";
import type { GraphModel } from "./graph/model.js";
import { loadSampleGraph } from "./graph/samples.js";
import { StructuredLogger, serialiseNonFinite, type LogSink } from "./logger.js";
import type { AlgorithmName, TraceStep } from "./trace/types.js";
import { ERROR_CODES, fail } from "./types.js";

type GraphSource = { readonly kind: "file"; readonly path: string } | { readonly kind: "sample"; readonly id: string };

interface CliOptions {
  readonly source: GraphSource;
  readonly algorithm: AlgorithmName;
  readonly format: "text" | "json";
  readonly start?: string;
  readonly goal?: string;
}

export interface CliIo {
  readonly stdout: LogSink;
  readonly stderr: LogSink;
}

/** Raised for malformed command lines and unknown node labels. */
class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

/**
 * Runs the CLI with {@link argv} (without the node/script prefix) and returns
 * the process exit code. Traces go to stdout; logs and failures to stderr.
 */
export async function runCli(argv: string[], io: CliIo = { stdout: process.stdout, stderr: process.stderr }): Promise<number> {
  if (argv.length === 0 || argv.includes("--help")) {
    io.stdout.write(usage());
    return argv.length === 0 ? 1 : 0;
  }

  const config = resolveEngineConfig();
  const logger = new StructuredLogger({ level: config.logLevel, logFile: config.logFile, sink: io.stderr });
  try {
    const options = parseArgs(argv);
    const graph = await loadSource(options.source, config.maxNodes);
    const start = resolveLabel(graph, options.start, "--start") ?? 0;
    const goal = resolveLabel(graph, options.goal, "--goal") ?? graph.nodeCount - 1;
    const result = runAlgorithm(graph, options.algorithm, {
      start,
      goal,
      logger,
      freeze: config.freezeSteps,
    });

    const summary = describeRun(graph, result);
    if (options.format === "json") {
      const report = { graph: { name: graph.name, labels: graph.labels }, summary, result };
      io.stdout.write(`${JSON.stringify(report, serialiseNonFinite, 2)}\n`);
    } else {
      io.stdout.write(`# ${graph.name}\n`);
      for (const step of result.steps) {
        io.stdout.write(`${formatStep(graph, step)}\n`);
      }
      io.stdout.write(`${summary}\n`);
    }
    return 0;
  } catch (error) {
    const failure =
      error instanceof CliUsageError
        ? fail(ERROR_CODES.CLI_INVALID_ARGS, error.message, "run with --help to list the accepted flags")
        : normaliseError(error);
    logger.error("cli_failed", failure);
    io.stderr.write(`${JSON.stringify(failure)}\n`);
    return 1;
  } finally {
    await logger.flush();
  }
}

async function loadSource(source: GraphSource, maxNodes: number): Promise<GraphModel> {
  return source.kind === "file" ? loadGraphFile(source.path, { maxNodes }) : loadSampleGraph(source.id);
}

function resolveLabel(graph: GraphModel, label: string | undefined, flag: string): number | undefined {
  if (label === undefined) {
    return undefined;
  }
  const index = graph.indexOf(label);
  if (index === undefined) {
    throw new CliUsageError(`${flag} '${label}' is not a node of '${graph.name}'`);
  }
  return index;
}

/** Renders one step as a single human-readable line. */
export function formatStep(graph: GraphModel, step: TraceStep): string {
  const name = (node: number): string => graph.labelOf(node);
  const distance = (value: number): string => (Number.isFinite(value) ? String(value) : "inf");
  const prefix = `#${step.index + 1}`;

  switch (step.algorithm) {
    case "bfs":
    case "dfs":
      return `${prefix} visit ${name(step.current)} | visited: ${step.visited.map(name).join(", ")}`;
    case "dijkstra":
      return `${prefix} finalise ${name(step.current)} at ${distance(step.distances[step.current])}`;
    case "astar":
      return `${prefix} finalise ${name(step.current)} g=${distance(step.distances[step.current])} f=${distance(step.estimate)}`;
    case "bellman-ford":
      if (step.kind === "no_change") {
        return `${prefix} pass ${step.iteration}: no change, converged`;
      }
      return (
        `${prefix} pass ${step.iteration}: relax ${name(step.edge.from)}->${name(step.edge.to)} ` +
        `(w=${step.weight}) ${distance(step.previousDistance)} -> ${distance(step.newDistance)}`
      );
    case "kruskal":
      return (
        `${prefix} ${name(step.edge.from)}-${name(step.edge.to)} (w=${step.weight}) ` +
        `${step.accepted ? "accepted" : "rejected (cycle)"}`
      );
    case "prim":
      return step.via === null
        ? `${prefix} include ${name(step.current)} (root)`
        : `${prefix} include ${name(step.current)} via ${name(step.via)} (w=${step.weight})`;
  }
}

function parseArgs(argv: string[]): CliOptions {
  let source: GraphSource | undefined;
  let algorithm: AlgorithmName | undefined;
  let format: "text" | "json" = "text";
  let start: string | undefined;
  let goal: string | undefined;

  const valueOf = (flag: string, value: string | undefined): string => {
    if (value === undefined || value.startsWith("--")) {
      throw new CliUsageError(`${flag} expects a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    switch (token) {
      case "--sample":
        source = { kind: "sample", id: valueOf(token, argv[++i]) };
        break;
      case "--algorithm": {
        const value = valueOf(token, argv[++i]);
        if (!isAlgorithmName(value)) {
          throw new CliUsageError(`--algorithm must be one of ${ALGORITHM_NAMES.join(", ")}`);
        }
        algorithm = value;
        break;
      }
      case "--format": {
        const value = argv[++i];
        if (value !== "json" && value !== "text") {
          throw new CliUsageError("--format must be 'json' or 'text'");
        }
        format = value;
        break;
      }
      case "--start":
        start = valueOf(token, argv[++i]);
        break;
      case "--goal":
        goal = valueOf(token, argv[++i]);
        break;
      default:
        if (token.startsWith("--") || source !== undefined) {
          throw new CliUsageError(`Unknown argument '${token}'`);
        }
        source = { kind: "file", path: token };
    }
  }

  if (!source) {
    throw new CliUsageError("provide a graph file or --sample <id>");
  }
  if (!algorithm) {
    throw new CliUsageError("--algorithm is required");
  }
  return {
    source,
    algorithm,
    format,
    ...(start === undefined ? {} : { start }),
    ...(goal === undefined ? {} : { goal }),
  };
}

function usage(): string {
  return [
    "Usage: graph-trace (<graph.json> | --sample <id>) --algorithm <name> [--start <label>] [--goal <label>] [--format json|text]",
    "",
    `Algorithms: ${ALGORITHM_NAMES.join(", ")}`,
    "Examples:",
    "  graph-trace --sample seven-nodes --algorithm dijkstra --start S --goal W",
    "  graph-trace network.json --algorithm kruskal --format json",
    "",
  ].join("\n");
}

const isCliEntryPoint = (() => {
  const executedFromCli = process.argv[1];
  if (!executedFromCli) {
    return false;
  }

  const thisModulePath = fileURLToPath(import.meta.url);
  return thisModulePath === executedFromCli;
})();

if (isCliEntryPoint) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}

/**
 * Exposes internal helpers for the test suite without exporting them as part
 * of the runtime API surface.
 */
export const __testing = {
  parseArgs,
  resolveLabel,
  CliUsageError,
};

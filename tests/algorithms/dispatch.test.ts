import { before, describe, it } from "mocha";
import { expect } from "chai";

import {
  ALGORITHMS,
  ALGORITHM_NAMES,
  describeRun,
  isAlgorithmName,
  runAlgorithm,
} from "../../src/algorithms/index.js";
import { NodeIndexError } from "../../src/errors.js";
import type { GraphModel } from "../../src/graph/model.js";
import { loadSampleGraph } from "../../src/graph/samples.js";
import { ERROR_CODES } from "../../src/types.js";
import { graphFromEdges } from "../helpers/graphs.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";

describe("algorithm dispatch", () => {
  let sample: GraphModel;

  before(async () => {
    sample = await loadSampleGraph("seven-nodes");
  });

  it("registers every algorithm under its name", () => {
    expect(ALGORITHM_NAMES).to.deep.equal(["bfs", "dfs", "dijkstra", "astar", "bellman-ford", "kruskal", "prim"]);
    expect(Object.keys(ALGORITHMS).sort()).to.deep.equal([...ALGORITHM_NAMES].sort());
    expect(isAlgorithmName("prim")).to.equal(true);
    expect(isAlgorithmName("toString")).to.equal(false);
    expect(ALGORITHMS["bellman-ford"].family).to.equal("shortest-path");
  });

  it("defaults the start to the first node and the goal to the last", () => {
    const result = runAlgorithm(sample, "astar");

    expect(result.start).to.equal(0);
    expect(result.goal).to.equal(6);
    expect(result.path).to.deep.equal([0, 1, 6]);
  });

  it("logs the start and completion of a run", () => {
    const logger = new RecordingLogger();
    const result = runAlgorithm(sample, "dijkstra", { start: 0, goal: 4, logger });

    expect(result.cost).to.equal(26);
    expect(logger.entries.map((entry) => `${entry.level}:${entry.message}`)).to.deep.equal([
      "debug:algorithm_run_started",
      "info:algorithm_run_completed",
    ]);
    expect(logger.entries[0].payload).to.deep.equal({
      algorithm: "dijkstra",
      graph: "Sample 2 (7 nodes)",
      start: 0,
      goal: 4,
    });
    expect(logger.entries[1].payload).to.deep.include({
      algorithm: "dijkstra",
      graph: "Sample 2 (7 nodes)",
      nodes: 7,
      steps: 7,
    });
    expect(logger.entries[1].payload).to.have.property("duration_ms").that.is.a("number");
  });

  it("logs and rethrows invalid endpoints before any step is produced", () => {
    const logger = new RecordingLogger();

    expect(() => runAlgorithm(sample, "bfs", { start: 9, logger })).to.throw(NodeIndexError);
    expect(logger.entries.map((entry) => entry.message)).to.deep.equal([
      "algorithm_run_started",
      "algorithm_run_rejected",
    ]);
    expect(logger.entries[1].level).to.equal("warn");
    expect(logger.entries[1].payload).to.have.nested.property("error.code", ERROR_CODES.GRAPH_INDEX);
  });

  it("honours the freeze option", () => {
    const frozen = runAlgorithm(sample, "kruskal", { freeze: true });
    const thawed = runAlgorithm(sample, "kruskal", { freeze: false });

    expect(Object.isFrozen(frozen.steps[0])).to.equal(true);
    expect(Object.isFrozen(thawed.steps[0])).to.equal(false);
  });

  describe("summaries", () => {
    it("describes each family", () => {
      expect(describeRun(sample, runAlgorithm(sample, "dijkstra", { goal: 4 }))).to.equal(
        "Dijkstra: S -> T -> U -> X -> W (cost 26)",
      );
      expect(describeRun(sample, runAlgorithm(sample, "bfs"))).to.equal(
        "BFS: 7 nodes visited (S -> T -> U -> Y -> V -> X -> W)",
      );
      expect(describeRun(sample, runAlgorithm(sample, "kruskal"))).to.equal("Kruskal: MST weight 34 (6 edges)");
      expect(describeRun(sample, runAlgorithm(sample, "prim"))).to.equal("Prim: MST weight 34 (6 edges)");
    });

    it("reports unreachable goals", () => {
      const graph = graphFromEdges(4, [
        [0, 1, 1],
        [2, 3, 1],
      ]);
      expect(describeRun(graph, runAlgorithm(graph, "bellman-ford"))).to.equal(
        "Bellman-Ford: D is unreachable from A",
      );
    });
  });
});

import { before, describe, it } from "mocha";
import { expect } from "chai";

import { runKruskal } from "../../src/algorithms/kruskal.js";
import { runPrim } from "../../src/algorithms/prim.js";
import type { GraphModel } from "../../src/graph/model.js";
import { loadSampleGraph } from "../../src/graph/samples.js";
import { graphFromEdges } from "../helpers/graphs.js";

describe("spanning trees", () => {
  let sample: GraphModel;

  before(async () => {
    sample = await loadSampleGraph("seven-nodes");
  });

  describe("Kruskal", () => {
    it("examines every edge lightest first, ties in row-major order", () => {
      const { steps } = runKruskal(sample, { freeze: true });

      expect(steps.map((step) => [step.edge.from, step.edge.to, step.weight, step.accepted])).to.deep.equal([
        [5, 6, 2, true],
        [0, 1, 4, true],
        [2, 5, 4, true],
        [2, 3, 7, true],
        [1, 2, 8, true],
        [3, 4, 9, true],
        [4, 5, 10, false],
        [1, 6, 11, false],
        [3, 5, 14, false],
      ]);
    });

    it("builds the minimum spanning tree of the seven-node sample", () => {
      const result = runKruskal(sample, { freeze: true });

      expect(result.totalWeight).to.equal(34);
      expect(result.tree).to.have.length(6);
      expect(result.steps[result.steps.length - 1].tree).to.have.length(6);
    });

    it("keeps the partial tree of each step", () => {
      const { steps } = runKruskal(sample, { freeze: true });

      expect(steps[1].tree).to.deep.equal([
        { from: 5, to: 6 },
        { from: 0, to: 1 },
      ]);
    });

    it("returns a spanning forest on disconnected graphs", () => {
      const graph = graphFromEdges(4, [
        [0, 1, 3],
        [2, 3, 1],
      ]);
      const result = runKruskal(graph, { freeze: true });

      expect(result.tree).to.deep.equal([
        { from: 2, to: 3, weight: 1 },
        { from: 0, to: 1, weight: 3 },
      ]);
      expect(result.totalWeight).to.equal(4);
    });

    it("weighs the eleven-node sample at 57", async () => {
      const graph = await loadSampleGraph("eleven-nodes");
      expect(runKruskal(graph, { freeze: true }).totalWeight).to.equal(57);
    });
  });

  describe("Prim", () => {
    it("grows the tree from node 0 through the cheapest frontier edge", () => {
      const result = runPrim(sample, { freeze: true });

      expect(result.steps.map((step) => [step.current, step.via, step.weight])).to.deep.equal([
        [0, null, 0],
        [1, 0, 4],
        [2, 1, 8],
        [5, 2, 4],
        [6, 5, 2],
        [3, 2, 7],
        [4, 3, 9],
      ]);
      expect(result.tree).to.deep.equal([
        { from: 0, to: 1, weight: 4 },
        { from: 1, to: 2, weight: 8 },
        { from: 2, to: 5, weight: 4 },
        { from: 5, to: 6, weight: 2 },
        { from: 2, to: 3, weight: 7 },
        { from: 3, to: 4, weight: 9 },
      ]);
      expect(result.totalWeight).to.equal(34);
    });

    it("lists included nodes in ascending order", () => {
      const { steps } = runPrim(sample, { freeze: true });
      expect(steps[3].included).to.deep.equal([0, 1, 2, 5]);
    });

    it("agrees with Kruskal on the eleven-node sample", async () => {
      const graph = await loadSampleGraph("eleven-nodes");
      expect(runPrim(graph, { freeze: true }).totalWeight).to.equal(57);
    });

    it("stays inside node 0's component", () => {
      const graph = graphFromEdges(4, [
        [0, 1, 3],
        [2, 3, 1],
      ]);
      const result = runPrim(graph, { freeze: true });

      expect(result.steps.map((step) => step.current)).to.deep.equal([0, 1]);
      expect(result.totalWeight).to.equal(3);
    });
  });
});

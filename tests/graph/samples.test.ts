import { describe, it } from "mocha";
import { expect } from "chai";

import { GraphLoadError } from "../../src/errors.js";
import { loadSampleGraph, loadSampleGraphs } from "../../src/graph/samples.js";

describe("sample graphs", () => {
  it("ships the two bundled samples", async () => {
    const samples = await loadSampleGraphs();

    expect(samples.map((sample) => sample.id)).to.deep.equal(["eleven-nodes", "seven-nodes"]);
    expect(samples[0].graph.nodeCount).to.equal(11);
    expect(samples[1].graph.labels).to.deep.equal(["S", "T", "U", "V", "W", "X", "Y"]);
  });

  it("returns the same graph instance on repeated lookups", async () => {
    const first = await loadSampleGraph("seven-nodes");
    const second = await loadSampleGraph("seven-nodes");

    expect(first).to.equal(second);
    expect(first.name).to.equal("Sample 2 (7 nodes)");
    expect(first.weight(5, 6)).to.equal(2);
  });

  it("rejects unknown identifiers", async () => {
    let thrown: unknown;
    try {
      await loadSampleGraph("twelve-nodes");
    } catch (error) {
      thrown = error;
    }

    expect(thrown).to.be.instanceOf(GraphLoadError);
    if (thrown instanceof GraphLoadError) {
      expect(thrown.reason).to.equal("UnknownSample");
      expect(thrown.details).to.deep.include({ id: "twelve-nodes", available: ["eleven-nodes", "seven-nodes"] });
    }
  });
});

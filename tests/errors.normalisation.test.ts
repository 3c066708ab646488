import { describe, it } from "mocha";
import { expect } from "chai";
import { z } from "zod";

import { GraphLoadError, GraphShapeError, NodeIndexError, isGraphEngineError, normaliseError } from "../src/errors.js";
import {
  ERROR_CODES,
  ERROR_TEXT_MAX_LENGTH,
  fail,
  normaliseErrorHint,
  normaliseErrorMessage,
} from "../src/types.js";

/**
 * Unit tests covering the error message and hint normalisation logic along
 * with the mapping from thrown values to failure payloads.
 */
describe("error normalisation helpers", () => {
  it("collapses whitespace and enforces the maximum length on messages", () => {
    const messy = "  multi\nline\tmessage   with   spacing   issues  ";
    expect(normaliseErrorMessage(messy)).to.equal("multi line message with spacing issues");

    const oversized = "X".repeat(ERROR_TEXT_MAX_LENGTH + 12);
    const truncated = normaliseErrorMessage(oversized);
    expect(truncated.length).to.equal(ERROR_TEXT_MAX_LENGTH);
    expect(truncated.endsWith("…")).to.equal(true);
  });

  it("drops empty hints and trims or truncates longer ones", () => {
    expect(normaliseErrorHint("   ")).to.equal(undefined);
    expect(normaliseErrorHint("   retry   later  ")).to.equal("retry later");

    const truncated = normaliseErrorHint("R".repeat(ERROR_TEXT_MAX_LENGTH + 5));
    expect(truncated?.length).to.equal(ERROR_TEXT_MAX_LENGTH);
    expect(truncated?.endsWith("…")).to.equal(true);
  });

  it("ensures fail() responses use the normalised message and hint", () => {
    const longMessage = "Unexpected failure due to downstream issue".repeat(5);
    const result = fail(ERROR_CODES.GRAPH_UNEXPECTED, `${longMessage}\n`, "  consult logs for details   ");
    expect(result.ok).to.equal(false);
    expect(result.message.length).to.equal(ERROR_TEXT_MAX_LENGTH);
    expect(result.message.endsWith("…")).to.equal(true);
    expect(result.hint).to.equal("consult logs for details");
    expect(result).to.not.have.property("details");
  });

  it("maps engine errors to their stable codes", () => {
    const index = normaliseError(new NodeIndexError("goal", 9, 4));
    expect(index).to.deep.equal({
      ok: false,
      code: "E-GRAPH-INDEX",
      message: "goal index 9 is outside [0, 4)",
      hint: "pick a node index between 0 and the node count minus one",
      details: { role: "goal", index: 9, nodeCount: 4 },
    });

    const shape = normaliseError(new GraphShapeError("labels must be unique"));
    expect(shape).to.deep.equal({
      ok: false,
      code: "E-GRAPH-SHAPE",
      message: "labels must be unique",
      details: {},
    });

    const load = normaliseError(new GraphLoadError("TooLarge", "graph has 80 nodes, the limit is 64", { nodes: 80 }));
    expect(load.code).to.equal("E-GRAPH-LOAD");
    expect(load.details).to.deep.equal({ nodes: 80, reason: "TooLarge" });
    expect(isGraphEngineError(new Error("plain"))).to.equal(false);
  });

  it("normalises arbitrary thrown errors including validation failures", () => {
    const parseResult = z.object({ matrix: z.array(z.number()) }).safeParse({ matrix: "not-a-matrix" });
    if (parseResult.success) {
      throw new Error("expected validation to fail so the error normaliser is exercised");
    }

    const validation = normaliseError(parseResult.error);
    expect(validation.code).to.equal(ERROR_CODES.GRAPH_LOAD);
    expect(validation.hint).to.equal("invalid_input");
    expect(validation.message).to.equal("graph document failed validation");

    expect(normaliseError(new Error("   \n\t")).message).to.equal("unexpected error");
    expect(normaliseError("boom")).to.deep.equal({ ok: false, code: "E-GRAPH-UNEXPECTED", message: "boom" });
  });
});

import { readFile } from "node:fs/promises";
import { z } from "zod";

import { GraphLoadError } from "../errors.js";
import { MatrixDocumentSchema, parseGraphDocument } from "./loader.js";
import type { GraphModel } from "./model.js";

const SampleCatalogSchema = z.object({
  samples: z.array(MatrixDocumentSchema.extend({ id: z.string() })),
});

/** Catalog entry of a bundled sample graph. */
export interface SampleGraph {
  readonly id: string;
  readonly graph: GraphModel;
}

/**
 * Locations probed for the catalog: beside the sources when running through
 * tsx, one level further up from the compiled `dist/src/graph` directory.
 */
const CATALOG_CANDIDATES = [
  new URL("../../data/sample-graphs.json", import.meta.url),
  new URL("../../../data/sample-graphs.json", import.meta.url),
];

let catalogPromise: Promise<SampleGraph[]> | null = null;

/** Loads every bundled sample graph. The catalog is read once per process. */
export async function loadSampleGraphs(): Promise<SampleGraph[]> {
  if (!catalogPromise) {
    catalogPromise = readCatalog().catch((error: unknown) => {
      catalogPromise = null;
      throw error;
    });
  }
  return catalogPromise;
}

/** Returns the sample registered under {@link id}. */
export async function loadSampleGraph(id: string): Promise<GraphModel> {
  const samples = await loadSampleGraphs();
  const match = samples.find((sample) => sample.id === id);
  if (!match) {
    throw new GraphLoadError(
      "UnknownSample",
      `unknown sample graph '${id}'`,
      { id, available: samples.map((sample) => sample.id) },
      { hint: "pick one of the available sample identifiers" },
    );
  }
  return match.graph;
}

async function readCatalog(): Promise<SampleGraph[]> {
  const raw = await readFirstCandidate();
  const catalog = SampleCatalogSchema.parse(JSON.parse(raw));
  // Bundled samples are trusted, so the loader's node ceiling does not apply.
  return catalog.samples.map(({ id, ...document }) => ({
    id,
    graph: parseGraphDocument(document, { maxNodes: Number.POSITIVE_INFINITY }),
  }));
}

async function readFirstCandidate(): Promise<string> {
  let lastError: unknown;
  for (const candidate of CATALOG_CANDIDATES) {
    try {
      return await readFile(candidate, "utf8");
    } catch (error) {
      lastError = error;
    }
  }
  throw new GraphLoadError("FileNotFound", "sample graph catalog not found", {}, { cause: lastError });
}

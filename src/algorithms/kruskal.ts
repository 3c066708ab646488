import type { GraphModel } from "../graph/model.js";
import { UnionFind } from "../structures/unionFind.js";
import { weighTree } from "../trace/path.js";
import { TraceRecorder, type TraceRecorderOptions } from "../trace/recorder.js";
import type { EdgeRef, KruskalResult, KruskalStep } from "../trace/types.js";

/**
 * Kruskal's minimum spanning tree. Each undirected edge is considered once,
 * lightest first; equal weights keep their row-major enumeration order. Every
 * examined edge produces a step, including those examined after the tree is
 * already complete.
 */
export function runKruskal(graph: GraphModel, options: TraceRecorderOptions = {}): KruskalResult {
  const recorder = new TraceRecorder<KruskalStep>(options);
  // Array.prototype.sort is stable, which keeps ties in enumeration order.
  const edges = graph.toUpperEdgeList().sort((a, b) => a.weight - b.weight);
  const components = new UnionFind(graph.nodeCount);
  const tree: EdgeRef[] = [];

  for (const { from, to, weight } of edges) {
    const accepted = components.union(from, to);
    if (accepted) {
      tree.push({ from, to });
    }
    recorder.record({
      algorithm: "kruskal",
      index: recorder.nextIndex,
      edge: { from, to },
      weight,
      accepted,
      tree,
    });
  }

  return { algorithm: "kruskal", steps: recorder.toArray(), ...weighTree(graph, tree) };
}

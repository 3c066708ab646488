import type { GraphModel } from "../graph/model.js";
import { MinHeap, type QueueEntry } from "../structures/minHeap.js";
import { weighTree } from "../trace/path.js";
import { TraceRecorder, type TraceRecorderOptions } from "../trace/recorder.js";
import type { EdgeRef, PrimResult, PrimStep } from "../trace/types.js";

interface FrontierEntry extends QueueEntry {
  /** Tree node the candidate edge starts from, `null` for the seed. */
  readonly via: number | null;
}

/**
 * Lazy-deletion Prim from node 0. The frontier keeps every candidate edge;
 * entries pointing at an already included node are skipped when popped. Nodes
 * outside node 0's component never enter the tree.
 */
export function runPrim(graph: GraphModel, options: TraceRecorderOptions = {}): PrimResult {
  const recorder = new TraceRecorder<PrimStep>(options);
  const included = new Array<boolean>(graph.nodeCount).fill(false);
  const tree: EdgeRef[] = [];
  const frontier = new MinHeap<FrontierEntry>();
  frontier.push({ priority: 0, node: 0, via: null });

  let entry = frontier.pop();
  while (entry !== undefined) {
    const { node: current, via, priority } = entry;
    if (!included[current]) {
      included[current] = true;
      if (via !== null) {
        tree.push({ from: via, to: current });
      }
      recorder.record({
        algorithm: "prim",
        index: recorder.nextIndex,
        current,
        via,
        weight: priority,
        included: includedNodes(included),
        tree,
      });

      for (const { node, weight } of graph.neighbours(current)) {
        if (!included[node]) {
          frontier.push({ priority: weight, node, via: current });
        }
      }
    }
    entry = frontier.pop();
  }

  return { algorithm: "prim", steps: recorder.toArray(), ...weighTree(graph, tree) };
}

function includedNodes(included: readonly boolean[]): number[] {
  const nodes: number[] = [];
  included.forEach((flag, node) => {
    if (flag) {
      nodes.push(node);
    }
  });
  return nodes;
}

/**
 * Disjoint-set forest with path compression. `union` always attaches the root
 * of the first argument under the root of the second, without rank or size
 * balancing, so the resulting forest is fully determined by the call order.
 */
export class UnionFind {
  private readonly parent: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, index) => index);
  }

  /** Representative of {@link node}'s set. Compresses the visited chain. */
  find(node: number): number {
    let root = node;
    while (this.parent[root] !== root) {
      root = this.parent[root];
    }
    let cursor = node;
    while (this.parent[cursor] !== root) {
      const next = this.parent[cursor];
      this.parent[cursor] = root;
      cursor = next;
    }
    return root;
  }

  connected(a: number, b: number): boolean {
    return this.find(a) === this.find(b);
  }

  /**
   * Merges the sets of `a` and `b` by attaching `find(a)` under `find(b)`.
   * Returns false when both already share a root.
   */
  union(a: number, b: number): boolean {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) {
      return false;
    }
    this.parent[rootA] = rootB;
    return true;
  }

  /** Copy of the raw parent array, mainly for inspection in tests. */
  snapshot(): number[] {
    return [...this.parent];
  }
}

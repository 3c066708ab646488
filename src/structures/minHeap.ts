/** Entry stored in the priority queue. */
export interface QueueEntry {
  readonly priority: number;
  readonly node: number;
}

interface Slot<T extends QueueEntry> {
  readonly entry: T;
  readonly sequence: number;
}

/**
 * Binary min-heap ordered by `priority`, then `node`, then insertion order, so
 * equal keys always pop in the same order. Duplicate entries for the same node
 * are allowed: callers skip the stale ones when they pop them.
 */
export class MinHeap<T extends QueueEntry> {
  private readonly data: Slot<T>[] = [];
  private nextSequence = 0;

  get size(): number {
    return this.data.length;
  }

  isEmpty(): boolean {
    return this.data.length === 0;
  }

  push(entry: T): void {
    this.data.push({ entry, sequence: this.nextSequence });
    this.nextSequence += 1;
    this.bubbleUp(this.data.length - 1);
  }

  pop(): T | undefined {
    const top = this.data[0];
    const last = this.data.pop();
    if (top === undefined || last === undefined) {
      return undefined;
    }
    if (this.data.length > 0) {
      this.data[0] = last;
      this.bubbleDown(0);
    }
    return top.entry;
  }

  peek(): T | undefined {
    return this.data[0]?.entry;
  }

  private less(a: Slot<T>, b: Slot<T>): boolean {
    if (a.entry.priority !== b.entry.priority) {
      return a.entry.priority < b.entry.priority;
    }
    if (a.entry.node !== b.entry.node) {
      return a.entry.node < b.entry.node;
    }
    return a.sequence < b.sequence;
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parent = Math.floor((index - 1) / 2);
      if (!this.less(this.data[index], this.data[parent])) {
        break;
      }
      [this.data[parent], this.data[index]] = [this.data[index], this.data[parent]];
      index = parent;
    }
  }

  private bubbleDown(index: number): void {
    const length = this.data.length;
    while (true) {
      let smallest = index;
      const left = 2 * index + 1;
      const right = 2 * index + 2;
      if (left < length && this.less(this.data[left], this.data[smallest])) {
        smallest = left;
      }
      if (right < length && this.less(this.data[right], this.data[smallest])) {
        smallest = right;
      }
      if (smallest === index) {
        break;
      }
      [this.data[index], this.data[smallest]] = [this.data[smallest], this.data[index]];
      index = smallest;
    }
  }
}

type Entry<T> = { item: T; seq: number };

/** Min-heap on `at`; entries with equal `at` pop in push order. */
export class PriorityQueue<T extends { at: number }> {
  private heap: Entry<T>[] = [];
  private seq = 0;

  push(x: T) {
    this.heap.push({ item: x, seq: this.seq++ });
    this.bubbleUp(this.heap.length - 1);
  }

  pop(): T | undefined {
    const root = this.heap[0];
    const tail = this.heap.pop();
    if (!root || !tail) return undefined;
    if (this.heap.length > 0) {
      this.heap[0] = tail;
      this.bubbleDown(0);
    }
    return root.item;
  }

  peek(): T | undefined {
    return this.heap[0]?.item;
  }

  /** pop every entry with at < bound */
  drainBefore(bound: number): T[] {
    const out: T[] = [];
    for (let top = this.peek(); top && top.at < bound; top = this.peek()) {
      const x = this.pop();
      if (x) out.push(x);
    }
    return out;
  }

  get length() {
    return this.heap.length;
  }

  clear() {
    this.heap = [];
  }

  private less(i: number, j: number): boolean {
    const a = this.heap[i];
    const b = this.heap[j];
    if (!a || !b) return false;
    return a.item.at < b.item.at || (a.item.at === b.item.at && a.seq < b.seq);
  }

  private swap(i: number, j: number) {
    const a = this.heap[i];
    const b = this.heap[j];
    if (!a || !b) return;
    this.heap[i] = b;
    this.heap[j] = a;
  }

  private bubbleUp(idx: number) {
    while (idx > 0) {
      const parentIdx = Math.floor((idx - 1) / 2);
      if (!this.less(idx, parentIdx)) break;
      this.swap(idx, parentIdx);
      idx = parentIdx;
    }
  }

  private bubbleDown(idx: number) {
    const len = this.heap.length;
    while (true) {
      const leftIdx = 2 * idx + 1;
      const rightIdx = 2 * idx + 2;
      let smallest = idx;

      if (leftIdx < len && this.less(leftIdx, smallest)) smallest = leftIdx;
      if (rightIdx < len && this.less(rightIdx, smallest)) smallest = rightIdx;
      if (smallest === idx) break;

      this.swap(idx, smallest);
      idx = smallest;
    }
  }
}

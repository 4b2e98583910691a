interface Entry<T> {
  value: T;
  seq: number;
}

/**
 * Binary min-heap ordered by a comparator. Values the comparator treats as
 * equal come out in insertion order, which keeps searches reproducible.
 *
 * @example
 * ```ts
 * const frontier = new Frontier<SearchNode>(compareNodes);
 * frontier.push(createRootNode(start));
 * const next = frontier.pop();
 * ```
 */
export class Frontier<T> {
  private heap: Entry<T>[] = [];
  private nextSeq = 0;

  constructor(private readonly compare: (a: T, b: T) => number) {}

  size(): number {
    return this.heap.length;
  }

  isEmpty(): boolean {
    return this.heap.length === 0;
  }

  push(value: T): void {
    this.heap.push({ value, seq: this.nextSeq++ });
    this.bubbleUp(this.heap.length - 1);
  }

  /** Removes and returns the smallest value, or `undefined` when empty. */
  pop(): T | undefined {
    const top = this.heap[0];
    if (top === undefined) return undefined;
    const last = this.heap.pop();
    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last;
      this.bubbleDown(0);
    }
    return top.value;
  }

  peek(): T | undefined {
    return this.heap[0]?.value;
  }

  clear(): void {
    this.heap = [];
    this.nextSeq = 0;
  }

  private before(i: number, j: number): boolean {
    const a = this.heap[i];
    const b = this.heap[j];
    const order = this.compare(a.value, b.value);
    return order < 0 || (order === 0 && a.seq < b.seq);
  }

  private swap(i: number, j: number): void {
    [this.heap[i], this.heap[j]] = [this.heap[j], this.heap[i]];
  }

  private bubbleUp(i: number): void {
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.before(i, p)) break;
      this.swap(i, p);
      i = p;
    }
  }

  private bubbleDown(i: number): void {
    const n = this.heap.length;
    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let m = i;
      if (l < n && this.before(l, m)) m = l;
      if (r < n && this.before(r, m)) m = r;
      if (m === i) break;
      this.swap(m, i);
      i = m;
    }
  }
}

// Binary min-heap over dense node indices with a position table for
// O(1) membership and O(log n) decrease-key.

/**
 * Orders two nodes. Negative when `a` must come out first, zero when equal.
 * Keys live outside the heap (e.g. an fScore array) and may change between
 * calls, as long as the heap is told through decreaseKey.
 */
export type HeapComparator = (a: number, b: number) => number;

export class IndexedMinHeap {
  private heap: Int32Array;
  private position: Int32Array;
  private length = 0;

  constructor(
    capacity: number,
    private readonly compare: HeapComparator,
  ) {
    this.heap = new Int32Array(capacity);
    this.position = new Int32Array(capacity).fill(-1);
  }

  capacity(): number {
    return this.heap.length;
  }

  /** Reallocate storage; the heap is emptied. */
  resize(capacity: number): void {
    this.heap = new Int32Array(capacity);
    this.position = new Int32Array(capacity).fill(-1);
    this.length = 0;
  }

  size(): number {
    return this.length;
  }

  isEmpty(): boolean {
    return this.length === 0;
  }

  contains(node: number): boolean {
    return this.position[node] !== -1;
  }

  peek(): number {
    if (this.length === 0) {
      throw new Error("Cannot peek an empty heap");
    }
    return this.heap[0];
  }

  push(node: number): void {
    if (this.length === this.heap.length) {
      throw new Error(`Heap is full (capacity ${this.heap.length})`);
    }
    if (this.position[node] !== -1) {
      throw new Error(`Node ${node} is already in the heap`);
    }

    const i = this.length++;
    this.heap[i] = node;
    this.position[node] = i;
    this.siftUp(i);
  }

  popMin(): number {
    if (this.length === 0) {
      throw new Error("Cannot pop an empty heap");
    }

    const result = this.heap[0];
    this.position[result] = -1;

    this.length--;
    if (this.length > 0) {
      const last = this.heap[this.length];
      this.heap[0] = last;
      this.position[last] = 0;
      this.siftDown(0);
    }

    return result;
  }

  /**
   * Restore order after the node's key got smaller. Only sifts up: calling
   * this for a key that grew leaves the heap invalid.
   */
  decreaseKey(node: number): void {
    const i = this.position[node];
    if (i === -1) {
      throw new Error(`Node ${node} is not in the heap`);
    }
    this.siftUp(i);
  }

  clear(): void {
    this.position.fill(-1);
    this.length = 0;
  }

  /** Check the heap property and the position table. */
  isValid(): boolean {
    for (let i = 0; i < this.length; i++) {
      if (this.position[this.heap[i]] !== i) return false;
      if (i > 0) {
        const parent = (i - 1) >> 1;
        if (this.compare(this.heap[parent], this.heap[i]) > 0) return false;
      }
    }
    return true;
  }

  private siftUp(i: number): void {
    const heap = this.heap;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (this.compare(heap[parent], heap[i]) <= 0) break;
      this.swap(parent, i);
      i = parent;
    }
  }

  private siftDown(i: number): void {
    const heap = this.heap;
    while (true) {
      const left = (i << 1) + 1;
      if (left >= this.length) break;

      const right = left + 1;
      let smallest = left;
      if (right < this.length && this.compare(heap[right], heap[left]) < 0) {
        smallest = right;
      }

      if (this.compare(heap[i], heap[smallest]) <= 0) break;

      this.swap(i, smallest);
      i = smallest;
    }
  }

  private swap(a: number, b: number): void {
    const nodeA = this.heap[a];
    const nodeB = this.heap[b];
    this.heap[a] = nodeB;
    this.heap[b] = nodeA;
    this.position[nodeA] = b;
    this.position[nodeB] = a;
  }
}

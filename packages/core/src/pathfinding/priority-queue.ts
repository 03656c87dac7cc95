/**
 * PriorityQueue - binary min-heap ordered by a caller-supplied comparator.
 *
 * Items are tracked by identity, so the same search node is never queued
 * twice. Decrease-key is remove-then-reinsert, O(n) per update.
 */
export class PriorityQueue<T> {
  private readonly heap: T[] = [];
  private readonly members = new Set<T>();

  constructor(private readonly compare: (a: T, b: T) => number) {}

  get count(): number {
    return this.heap.length;
  }

  get isEmpty(): boolean {
    return this.heap.length === 0;
  }

  contains(item: T): boolean {
    return this.members.has(item);
  }

  /** No-op when the item is already queued. */
  enqueue(item: T): void {
    if (this.members.has(item)) {
      return;
    }
    this.members.add(item);
    this.heap.push(item);
    this.siftUp(this.heap.length - 1);
  }

  /**
   * Remove and return the minimum item.
   * @throws Error if the queue is empty
   */
  dequeue(): T {
    if (this.heap.length === 0) {
      throw new Error('PriorityQueue is empty');
    }
    const top = this.heap[0];
    this.removeAt(0);
    return top;
  }

  peek(): T | undefined {
    return this.heap[0];
  }

  /**
   * Re-position an item after its priority fields were changed in place.
   * Items that are not queued yet are simply enqueued.
   */
  updatePriority(item: T): void {
    if (this.members.has(item)) {
      this.removeAt(this.heap.indexOf(item));
    }
    this.enqueue(item);
  }

  clear(): void {
    this.heap.length = 0;
    this.members.clear();
  }

  private removeAt(index: number): void {
    const removed = this.heap[index];
    const last = this.heap.pop();
    this.members.delete(removed);
    if (last === undefined || index === this.heap.length) {
      return;
    }
    this.heap[index] = last;
    this.siftDown(index);
    this.siftUp(index);
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (this.compare(this.heap[child], this.heap[parent]) >= 0) {
        break;
      }
      this.swap(child, parent);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    let parent = index;
    for (;;) {
      const left = parent * 2 + 1;
      if (left >= this.heap.length) {
        break;
      }
      const right = left + 1;
      let smallest = left;
      if (right < this.heap.length && this.compare(this.heap[right], this.heap[left]) < 0) {
        smallest = right;
      }
      if (this.compare(this.heap[parent], this.heap[smallest]) <= 0) {
        break;
      }
      this.swap(parent, smallest);
      parent = smallest;
    }
  }

  private swap(i: number, j: number): void {
    const tmp = this.heap[i];
    this.heap[i] = this.heap[j];
    this.heap[j] = tmp;
  }
}

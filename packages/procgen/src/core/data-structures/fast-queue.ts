/**
 * FIFO queue with O(1) amortized enqueue and dequeue.
 *
 * Array-backed; dequeued slots are dropped by periodic compaction.
 *
 * @example
 * ```typescript
 * const queue = new FastQueue<number>();
 * queue.enqueue(1);
 * queue.enqueue(2);
 * queue.dequeue(); // 1
 * ```
 */
export class FastQueue<T> {
  private items: T[] = [];
  private head = 0;

  get length(): number {
    return this.items.length - this.head;
  }

  get isEmpty(): boolean {
    return this.length === 0;
  }

  enqueue(item: T): void {
    this.items.push(item);
  }

  dequeue(): T | undefined {
    if (this.isEmpty) return undefined;

    const item = this.items[this.head];
    this.head++;

    if (this.head > 1000 && this.head > this.items.length / 2) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }
}

/**
 * Bit set over the cells of a width x height grid.
 *
 * Callers are expected to pass in-bounds coordinates; an index past the end
 * of the backing array reads as absent and is ignored on write.
 *
 * @example
 * ```typescript
 * const visited = new CoordSet(100, 100);
 * visited.add(10, 20);
 * visited.has(10, 20); // true
 * ```
 */
export class CoordSet {
  private readonly bits: Uint32Array;
  private readonly width: number;

  constructor(width: number, height: number) {
    this.width = width;
    this.bits = new Uint32Array(Math.ceil((width * height) / 32));
  }

  has(x: number, y: number): boolean {
    const key = y * this.width + x;
    const value = this.bits[key >>> 5];
    return value !== undefined && (value & (1 << (key & 31))) !== 0;
  }

  add(x: number, y: number): void {
    const key = y * this.width + x;
    const index = key >>> 5;
    const current = this.bits[index];
    if (current !== undefined) {
      this.bits[index] = current | (1 << (key & 31));
    }
  }

  delete(x: number, y: number): void {
    const key = y * this.width + x;
    const index = key >>> 5;
    const current = this.bits[index];
    if (current !== undefined) {
      this.bits[index] = current & ~(1 << (key & 31));
    }
  }
}

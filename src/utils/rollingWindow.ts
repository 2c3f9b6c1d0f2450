/**
 * Bounded FIFO buffer. Pushing into a full window evicts the oldest entry.
 */
export class RollingWindow<T> {
  private readonly items: T[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Rolling window capacity must be a positive integer, got ${capacity}`);
    }
  }

  push(item: T): T | undefined {
    this.items.push(item);
    if (this.items.length > this.capacity) return this.items.shift();
    return undefined;
  }

  get size(): number {
    return this.items.length;
  }

  latest(): T | undefined {
    return this.items[this.items.length - 1];
  }

  toArray(): T[] {
    return [...this.items];
  }

  clear(): void {
    this.items.length = 0;
  }
}

/** Records waiting to be delivered, in enqueue order. Owned by the worker. */
export class Batch<T> {
  private items: T[] = [];

  get length(): number {
    return this.items.length;
  }

  get records(): readonly T[] {
    return this.items;
  }

  append(records: Iterable<T>): void {
    for (const record of records) {
      this.items.push(record);
    }
  }

  clear(): void {
    this.items = [];
  }

  discard(indices: ReadonlySet<number>): void {
    if (indices.size === 0) return;
    this.items = this.items.filter((_, index) => !indices.has(index));
  }
}

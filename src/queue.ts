import { ClientClosedError } from './errors.js';

export type Delivery<T> = { done: false; record: T } | { done: true };

interface Entry<T> {
  record: T;
}

interface BlockedProducer<T> extends Entry<T> {
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * Bounded FIFO channel between producers and the single worker that drains
 * it. Producers either wait for space ({@link RecordQueue.put}) or give up
 * immediately ({@link RecordQueue.offer}).
 */
export class RecordQueue<T> {
  private readonly entries: Entry<T>[] = [];
  private readonly blocked: BlockedProducer<T>[] = [];
  private readonly capacity: number;
  private listener: (() => void) | null = null;
  private closed = false;

  constructor(capacity: number) {
    this.capacity = capacity;
  }

  get size(): number {
    return this.entries.length;
  }

  get waiting(): number {
    return this.blocked.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  put(record: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ClientClosedError());
    }

    if (this.entries.length < this.capacity && this.blocked.length === 0) {
      this.entries.push({ record });
      this.notify();
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.blocked.push({ record, resolve, reject });
    });
  }

  offer(record: T): boolean {
    if (this.closed) {
      throw new ClientClosedError();
    }

    if (this.entries.length >= this.capacity) {
      return false;
    }

    this.entries.push({ record });
    this.notify();
    return true;
  }

  poll(): Delivery<T> | null {
    const entry = this.entries.shift();
    if (entry === undefined) {
      return this.closed ? { done: true } : null;
    }

    const next = this.blocked.shift();
    if (next !== undefined) {
      this.entries.push({ record: next.record });
      next.resolve();
    }

    return { done: false, record: entry.record };
  }

  /** Moves up to `limit` queued records out in one go. */
  drain(limit: number): T[] {
    const records: T[] = [];
    while (records.length < limit) {
      const delivery = this.poll();
      if (delivery === null || delivery.done) break;
      records.push(delivery.record);
    }
    return records;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const producer of this.blocked.splice(0)) {
      producer.reject(new ClientClosedError());
    }
    this.notify();
  }

  onReady(listener: () => void): void {
    this.listener = listener;
  }

  private notify(): void {
    this.listener?.();
  }
}

import type { Logger } from 'pino';
import { Batch } from './batch.js';
import { toError } from './errors.js';
import type { RecordQueue } from './queue.js';
import type { RetryBackoff } from './retry.js';
import { Ticker } from './ticker.js';
import type { FlushOutcome } from './types.js';

export interface BatchSender<T> {
  flush(batch: Batch<T>): Promise<FlushOutcome>;
}

export interface BatchWorkerOptions<T> {
  queue: RecordQueue<T>;
  sender: BatchSender<T>;
  backoff: RetryBackoff;
  batchSize: number;
  maxDelay: number;
  maxPendingRecords: number;
  logger: Logger;
  /** A flush attempt failed; the batch is kept for the next trigger. */
  onFailure?: (error: Error) => void;
  /** The worker hit an unrecoverable error and stopped. */
  onFatal?: (error: Error) => void;
}

/**
 * The single consumer of a {@link RecordQueue}. Only this loop touches the
 * batch, so nothing here needs locking: it handles one event at a time,
 * whether a delivered record, a timer tick or a flush request.
 */
export class BatchWorker<T> {
  private readonly queue: RecordQueue<T>;
  private readonly sender: BatchSender<T>;
  private readonly backoff: RetryBackoff;
  private readonly batchSize: number;
  private readonly maxPendingRecords: number;
  private readonly logger: Logger;
  private readonly onFailure?: (error: Error) => void;
  private readonly onFatal?: (error: Error) => void;
  private readonly ticker: Ticker;
  private readonly batch = new Batch<T>();
  private readonly flushRequests: Array<() => void> = [];
  private wake: (() => void) | null = null;
  private done: Promise<void> | null = null;
  private stopped = false;

  constructor(opts: BatchWorkerOptions<T>) {
    this.queue = opts.queue;
    this.sender = opts.sender;
    this.backoff = opts.backoff;
    this.batchSize = opts.batchSize;
    this.maxPendingRecords = opts.maxPendingRecords;
    this.logger = opts.logger;
    this.onFailure = opts.onFailure;
    this.onFatal = opts.onFatal;
    this.ticker = new Ticker(opts.maxDelay, () => this.notify());
  }

  /** Records taken off the queue and not yet delivered. */
  get pending(): number {
    return this.batch.length;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /** Starts the loop once; later calls return the same completion promise. */
  start(): Promise<void> {
    if (this.done === null) {
      this.queue.onReady(() => this.notify());
      this.ticker.start();
      this.done = this.run();
    }
    return this.done;
  }

  /** Resolves after the worker has attempted to send everything queued so far. */
  requestFlush(): Promise<void> {
    if (this.done === null || this.stopped) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.flushRequests.push(resolve);
      this.notify();
    });
  }

  private async run(): Promise<void> {
    try {
      await this.loop();
    } catch (err) {
      this.fail(toError(err));
    } finally {
      this.ticker.stop();
      this.stopped = true;
      for (const resolve of this.flushRequests.splice(0)) {
        resolve();
      }
    }
  }

  private async loop(): Promise<void> {
    for (;;) {
      if (this.ticker.take()) {
        if (!(await this.attempt())) return;
        continue;
      }

      if (this.flushRequests.length > 0) {
        const waiters = this.flushRequests.splice(0);
        this.batch.append(this.queue.drain(this.maxPendingRecords - this.batch.length));
        const ok = await this.attempt();
        for (const resolve of waiters) {
          resolve();
        }
        if (!ok) return;
        continue;
      }

      // Deliveries are failing and the batch is full: leave records in the
      // queue so producers feel the backpressure.
      if (this.batch.length >= this.maxPendingRecords && !this.queue.isClosed) {
        await this.idle();
        continue;
      }

      const delivery = this.queue.poll();
      if (delivery === null) {
        await this.idle();
        continue;
      }

      if (delivery.done) {
        await this.attempt();
        if (this.batch.length > 0) {
          this.logger.error({ count: this.batch.length }, 'dropping undelivered records on close');
        }
        return;
      }

      this.batch.append([delivery.record]);
      if (this.batch.length >= this.batchSize && this.backoff.ready()) {
        if (!(await this.attempt())) return;
      }
    }
  }

  /** Returns false when the worker must stop. */
  private async attempt(): Promise<boolean> {
    const outcome = await this.sender.flush(this.batch);

    switch (outcome.status) {
      case 'empty':
        return true;
      case 'delivered':
        this.backoff.recordSuccess();
        return true;
      case 'retry': {
        const delay = this.backoff.recordFailure();
        this.logger.debug(
          { count: this.batch.length, failures: this.backoff.failures, delay: Math.round(delay) },
          'flush failed, keeping batch for retry',
        );
        this.onFailure?.(outcome.error);
        return true;
      }
      case 'fatal':
        this.fail(outcome.error);
        return false;
    }
  }

  private fail(error: Error): void {
    this.logger.error({ err: error, count: this.batch.length }, 'ingest worker stopped');
    this.queue.close();
    this.onFatal?.(error);
  }

  private idle(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.wake = resolve;
    });
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

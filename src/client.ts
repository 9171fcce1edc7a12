import type { Logger } from 'pino';
import type {
  AuthDecorator,
  BackpressureMode,
  ClientState,
  IngestClientOptions,
  RetryOptions,
  Transport,
} from './types.js';
import { ClientClosedError, ConfigurationError } from './errors.js';
import { Flusher } from './flusher.js';
import { createLogger } from './logger.js';
import { RecordQueue } from './queue.js';
import { RetryBackoff } from './retry.js';
import { BatchWorker } from './worker.js';

const DEFAULT_QUEUE_CAPACITY = 10_000;
const DEFAULT_BATCH_SIZE = 1_000;
const DEFAULT_MAX_DELAY = 1_000;
const DEFAULT_BACKPRESSURE: BackpressureMode = 'block';
const DEFAULT_PENDING_BATCHES = 10;

const defaultTransport: Transport = (request) => fetch(request);

interface Runtime<T> {
  queue: RecordQueue<T>;
  worker: BatchWorker<T>;
  done: Promise<void>;
}

export interface ClientStats {
  state: ClientState;
  /** Records waiting in the queue. */
  queued: number;
  /** Records taken by the worker and not yet delivered. */
  pending: number;
}

/**
 * Buffers records and ships them to `{endpoint}/ingest` as JSONL from a
 * background worker. The worker starts on the first `ingest()`; settings
 * must be changed before that.
 */
export class IngestClient<T = unknown> {
  private readonly ingestUrl: string;
  private readonly logger: Logger;
  private readonly strict: boolean;
  private readonly onError?: (error: Error) => void;
  private readonly retry?: RetryOptions;
  private readonly maxPendingRecords?: number;

  private transport: Transport;
  private auth?: AuthDecorator;
  private batchSize: number;
  private maxDelay: number;
  private queueCapacity: number;
  private backpressure: BackpressureMode;

  private current: ClientState = 'uninitialized';
  private runtime: Runtime<T> | null = null;
  private closing: Promise<void> | null = null;

  constructor(options: IngestClientOptions) {
    if (!options.endpoint) {
      throw new ConfigurationError('IngestClient: endpoint is required');
    }

    this.ingestUrl = `${options.endpoint.replace(/\/+$/, '')}/ingest`;
    this.logger = options.logger ?? createLogger();
    this.strict = options.strict ?? false;
    this.onError = options.onError;
    this.retry = options.retry;
    this.maxPendingRecords = options.maxPendingRecords;

    this.transport = options.transport ?? defaultTransport;
    this.auth = options.auth;
    this.batchSize = positiveInt(options.batchSize, DEFAULT_BATCH_SIZE);
    this.maxDelay = positive(options.maxDelay, DEFAULT_MAX_DELAY);
    this.queueCapacity = positiveInt(options.queueCapacity, DEFAULT_QUEUE_CAPACITY);
    this.backpressure = options.backpressure ?? DEFAULT_BACKPRESSURE;
  }

  get state(): ClientState {
    return this.current;
  }

  /** The URL batches are posted to. */
  get endpoint(): string {
    return this.ingestUrl;
  }

  stats(): ClientStats {
    return {
      state: this.current,
      queued: this.runtime?.queue.size ?? 0,
      pending: this.runtime?.worker.pending ?? 0,
    };
  }

  setTransport(transport: Transport): void {
    if (this.configurable('transport')) {
      this.transport = transport;
    }
  }

  setAuth(auth: AuthDecorator | undefined): void {
    if (this.configurable('auth')) {
      this.auth = auth;
    }
  }

  setBatchSize(batchSize: number): void {
    if (this.configurable('batchSize')) {
      this.batchSize = positiveInt(batchSize, DEFAULT_BATCH_SIZE);
    }
  }

  setMaxDelay(maxDelay: number): void {
    if (this.configurable('maxDelay')) {
      this.maxDelay = positive(maxDelay, DEFAULT_MAX_DELAY);
    }
  }

  setQueueCapacity(capacity: number): void {
    if (this.configurable('queueCapacity')) {
      this.queueCapacity = positiveInt(capacity, DEFAULT_QUEUE_CAPACITY);
    }
  }

  setBackpressure(mode: BackpressureMode): void {
    if (this.configurable('backpressure')) {
      this.backpressure = mode;
    }
  }

  /**
   * Queues records for delivery. In `block` mode this waits while the queue
   * is full; in `drop` mode records that do not fit are discarded. Delivery
   * failures are never reported here.
   */
  async ingest(...records: T[]): Promise<void> {
    const { queue } = this.setup();

    for (const record of records) {
      if (this.backpressure === 'drop') {
        if (!queue.offer(record)) {
          this.logger.debug({ capacity: this.queueCapacity }, 'queue full, dropping record');
        }
      } else {
        await queue.put(record);
      }
    }
  }

  async flush(): Promise<void> {
    await this.runtime?.worker.requestFlush();
  }

  /**
   * Stops accepting records and resolves after the worker made its final
   * flush attempt. Safe to call more than once.
   */
  close(): Promise<void> {
    if (this.closing === null) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    const runtime = this.runtime;
    if (runtime === null) {
      this.current = 'stopped';
      return;
    }

    if (this.current === 'running') {
      this.current = 'draining';
    }
    runtime.queue.close();
    await runtime.done;
    this.current = 'stopped';
  }

  private setup(): Runtime<T> {
    if (this.current === 'draining' || this.current === 'stopped') {
      throw new ClientClosedError();
    }
    if (this.runtime !== null) {
      return this.runtime;
    }

    const queue = new RecordQueue<T>(this.queueCapacity);
    const flusher = new Flusher<T>({
      url: this.ingestUrl,
      transport: this.transport,
      auth: this.auth,
      logger: this.logger,
    });
    const worker = new BatchWorker<T>({
      queue,
      sender: flusher,
      backoff: new RetryBackoff(this.retry),
      batchSize: this.batchSize,
      maxDelay: this.maxDelay,
      maxPendingRecords: Math.max(
        this.batchSize,
        positiveInt(this.maxPendingRecords, this.batchSize * DEFAULT_PENDING_BATCHES),
      ),
      logger: this.logger,
      onFailure: (error) => this.onError?.(error),
      onFatal: (error) => {
        this.current = 'stopped';
        this.onError?.(error);
      },
    });

    this.current = 'running';
    this.logger.debug(
      { url: this.ingestUrl, batchSize: this.batchSize, maxDelay: this.maxDelay, backpressure: this.backpressure },
      'ingest worker started',
    );
    this.runtime = { queue, worker, done: worker.start() };
    return this.runtime;
  }

  private configurable(setting: string): boolean {
    if (this.current === 'uninitialized') {
      return true;
    }

    const message = `IngestClient: ${setting} cannot be changed once the client has started`;
    if (this.strict) {
      throw new ConfigurationError(message);
    }
    this.logger.warn({ setting, state: this.current }, message);
    return false;
  }
}

function positiveInt(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isInteger(value) && value > 0 ? value : fallback;
}

function positive(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : fallback;
}

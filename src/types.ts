import type { Logger } from 'pino';

export type ClientState = 'uninitialized' | 'running' | 'draining' | 'stopped';

export type BackpressureMode = 'block' | 'drop';

/** Executes an HTTP request. Rejections are treated as transport failures. */
export type Transport = (request: Request) => Promise<Response>;

/** Called right before every send attempt; may set or replace headers. */
export type AuthDecorator = (request: Request) => void | Promise<void>;

export interface RetryOptions {
  baseDelay?: number;
  maxDelay?: number;
}

export interface IngestClientOptions {
  /** Index endpoint, e.g. `http://localhost:7280/api/v1/my-index`. */
  endpoint: string;
  queueCapacity?: number;
  batchSize?: number;
  /** Flush timer period in milliseconds. */
  maxDelay?: number;
  backpressure?: BackpressureMode;
  transport?: Transport;
  auth?: AuthDecorator;
  retry?: RetryOptions;
  /**
   * Records the worker keeps buffered while deliveries fail before it stops
   * taking from the queue. Defaults to ten batches.
   */
  maxPendingRecords?: number;
  logger?: Logger;
  strict?: boolean;
  onError?: (error: Error) => void;
}

export type FlushOutcome =
  | { status: 'empty' }
  | { status: 'delivered'; count: number }
  | { status: 'retry'; error: Error }
  | { status: 'fatal'; error: Error };

import type { Logger } from 'pino';
import type { Batch } from './batch.js';
import { encodeBatch } from './encode.js';
import { IngestError, toError } from './errors.js';
import type { AuthDecorator, FlushOutcome, Transport } from './types.js';

export interface FlusherOptions {
  url: string;
  transport: Transport;
  auth?: AuthDecorator;
  logger: Logger;
}

/**
 * Sends a batch as one JSONL `POST` and settles what happens to it: cleared
 * on `200 OK`, left untouched on any other status or transport failure.
 */
export class Flusher<T> {
  private readonly url: string;
  private readonly transport: Transport;
  private readonly auth?: AuthDecorator;
  private readonly logger: Logger;

  constructor(opts: FlusherOptions) {
    this.url = opts.url;
    this.transport = opts.transport;
    this.auth = opts.auth;
    this.logger = opts.logger;
  }

  async flush(batch: Batch<T>): Promise<FlushOutcome> {
    if (batch.length === 0) {
      return { status: 'empty' };
    }

    const encoded = encodeBatch(batch.records);
    if (encoded.failures.length > 0) {
      for (const failure of encoded.failures) {
        this.logger.error({ index: failure.index, err: failure.error }, 'dropping record that cannot be encoded as JSON');
      }
      batch.discard(new Set(encoded.failures.map((failure) => failure.index)));
      if (batch.length === 0) {
        return { status: 'empty' };
      }
    }

    let request: Request;
    try {
      request = new Request(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-ndjson' },
        body: encoded.body,
      });
    } catch (err) {
      return { status: 'fatal', error: toError(err) };
    }

    try {
      await this.auth?.(request);
    } catch (err) {
      const error = toError(err);
      this.logger.warn({ url: this.url, err: error }, 'auth decorator failed');
      return { status: 'retry', error };
    }

    let res: Response;
    try {
      res = await this.transport(request);
    } catch (err) {
      const error = toError(err);
      this.logger.warn({ url: this.url, count: batch.length, err: error }, 'ingest request failed');
      return { status: 'retry', error };
    }

    if (res.status !== 200) {
      const error = await IngestError.fromResponse(res);
      this.logger.error(
        { url: this.url, count: batch.length, status: error.status, body: error.body },
        'ingest status not ok',
      );
      return { status: 'retry', error };
    }

    await this.discardBody(res);

    const count = batch.length;
    batch.clear();
    this.logger.debug({ url: this.url, count }, 'batch delivered');
    return { status: 'delivered', count };
  }

  private async discardBody(res: Response): Promise<void> {
    try {
      await res.arrayBuffer();
    } catch (err) {
      this.logger.debug({ err: toError(err) }, 'failed to drain response body');
    }
  }
}

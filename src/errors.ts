export class IngestError extends Error {
  readonly status: number;
  readonly statusText: string;
  readonly body: string;

  constructor(message: string, status: number, statusText: string, body: string) {
    super(message);
    this.name = 'IngestError';
    this.status = status;
    this.statusText = statusText;
    this.body = body;
  }

  /** Reads the whole body, so the connection can be reused. */
  static async fromResponse(res: Response): Promise<IngestError> {
    let body = '';

    try {
      body = await res.text();
    } catch {
      // body already consumed or stream aborted — keep it empty
    }

    const status = `${res.status}${res.statusText ? ` ${res.statusText}` : ''}`;
    return new IngestError(`ingest status not ok: ${status}`, res.status, res.statusText, body);
  }
}

export class ClientClosedError extends Error {
  constructor(message = 'IngestClient: client is closed') {
    super(message);
    this.name = 'ClientClosedError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

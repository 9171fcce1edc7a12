import { toError } from './errors.js';

export interface EncodeFailure {
  index: number;
  error: Error;
}

export interface EncodedBatch {
  body: string;
  count: number;
  failures: EncodeFailure[];
}

/** Serializes records as JSONL: one JSON value per line, `\n`-terminated. */
export function encodeBatch(records: readonly unknown[]): EncodedBatch {
  const lines: string[] = [];
  const failures: EncodeFailure[] = [];

  records.forEach((record, index) => {
    let line: string | undefined;
    try {
      line = JSON.stringify(record);
    } catch (err) {
      failures.push({ index, error: toError(err) });
      return;
    }

    if (line === undefined) {
      failures.push({ index, error: new TypeError(`record of type ${typeof record} has no JSON representation`) });
      return;
    }

    lines.push(`${line}\n`);
  });

  return { body: lines.join(''), count: lines.length, failures };
}

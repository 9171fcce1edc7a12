import { describe, it, expect } from 'vitest';
import { encodeBatch } from '../src/encode.js';

describe('encodeBatch', () => {
  it('writes one JSON value per line in order', () => {
    const encoded = encodeBatch([{ s: 'a' }, { s: 'b' }, 3, 'x', null]);

    expect(encoded.body).toBe('{"s":"a"}\n{"s":"b"}\n3\n"x"\nnull\n');
    expect(encoded.count).toBe(5);
    expect(encoded.failures).toEqual([]);
  });

  it('returns an empty body for no records', () => {
    expect(encodeBatch([])).toEqual({ body: '', count: 0, failures: [] });
  });

  it('keeps newlines inside string values escaped', () => {
    const encoded = encodeBatch([{ msg: 'line 1\nline 2' }]);
    expect(encoded.body).toBe('{"msg":"line 1\\nline 2"}\n');
  });

  it('reports records that have no JSON form', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;

    const encoded = encodeBatch([1n, { a: 1 }, undefined, cyclic, () => 1]);

    expect(encoded.body).toBe('{"a":1}\n');
    expect(encoded.count).toBe(1);
    expect(encoded.failures.map((failure) => failure.index)).toEqual([0, 2, 3, 4]);
    expect(encoded.failures[1]!.error.message).toBe('record of type undefined has no JSON representation');
  });

  it('produces identical output for identical records', () => {
    const records = [{ s: 'a', n: 1 }, { s: 'b', nested: { ok: true } }];
    expect(encodeBatch(records).body).toBe(encodeBatch(records).body);
  });
});

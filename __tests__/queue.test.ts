import { describe, it, expect, vi } from 'vitest';
import { RecordQueue } from '../src/queue.js';
import { ClientClosedError } from '../src/errors.js';

describe('RecordQueue', () => {
  it('delivers records in enqueue order', async () => {
    const queue = new RecordQueue<string>(10);

    await queue.put('a');
    await queue.put('b');
    expect(queue.offer('c')).toBe(true);
    expect(queue.size).toBe(3);

    expect(queue.poll()).toEqual({ done: false, record: 'a' });
    expect(queue.poll()).toEqual({ done: false, record: 'b' });
    expect(queue.poll()).toEqual({ done: false, record: 'c' });
    expect(queue.poll()).toBeNull();
  });

  it('suspends put() while full and admits waiters in arrival order', async () => {
    const queue = new RecordQueue<string>(1);
    await queue.put('a');

    const admitted: string[] = [];
    const b = queue.put('b').then(() => admitted.push('b'));
    const c = queue.put('c').then(() => admitted.push('c'));
    await Promise.resolve();

    expect(admitted).toEqual([]);
    expect(queue.waiting).toBe(2);

    expect(queue.poll()).toEqual({ done: false, record: 'a' });
    await b;
    expect(admitted).toEqual(['b']);

    expect(queue.poll()).toEqual({ done: false, record: 'b' });
    await c;
    expect(admitted).toEqual(['b', 'c']);
    expect(queue.poll()).toEqual({ done: false, record: 'c' });
  });

  it('does not let a new put() overtake a waiting one', async () => {
    const queue = new RecordQueue<string>(1);
    await queue.put('a');
    const b = queue.put('b');

    queue.poll();
    await b;
    const c = queue.put('c');

    expect(queue.waiting).toBe(1);
    expect(queue.poll()).toEqual({ done: false, record: 'b' });
    await c;
    expect(queue.poll()).toEqual({ done: false, record: 'c' });
  });

  it('offer() discards the record when the queue is full', () => {
    const queue = new RecordQueue<string>(2);

    expect(queue.offer('a')).toBe(true);
    expect(queue.offer('b')).toBe(true);
    expect(queue.offer('c')).toBe(false);

    expect(queue.drain(10)).toEqual(['a', 'b']);
  });

  it('signals done only once closed and drained', () => {
    const queue = new RecordQueue<string>(5);
    queue.offer('a');
    queue.close();

    expect(queue.poll()).toEqual({ done: false, record: 'a' });
    expect(queue.poll()).toEqual({ done: true });
    expect(queue.poll()).toEqual({ done: true });
  });

  it('rejects put() and offer() after close()', async () => {
    const queue = new RecordQueue<string>(5);
    queue.close();
    queue.close();

    await expect(queue.put('a')).rejects.toBeInstanceOf(ClientClosedError);
    expect(() => queue.offer('a')).toThrow(ClientClosedError);
  });

  it('rejects producers that were waiting when the queue closed', async () => {
    const queue = new RecordQueue<string>(1);
    await queue.put('a');
    const waiting = queue.put('b');

    queue.close();

    await expect(waiting).rejects.toBeInstanceOf(ClientClosedError);
    expect(queue.drain(10)).toEqual(['a']);
    expect(queue.poll()).toEqual({ done: true });
  });

  it('notifies the consumer on new records and on close', async () => {
    const queue = new RecordQueue<string>(5);
    const listener = vi.fn();
    queue.onReady(listener);

    await queue.put('a');
    queue.offer('b');
    queue.close();

    expect(listener).toHaveBeenCalledTimes(3);
  });

  it('drain() respects the limit', () => {
    const queue = new RecordQueue<number>(10);
    for (let i = 0; i < 5; i++) queue.offer(i);

    expect(queue.drain(3)).toEqual([0, 1, 2]);
    expect(queue.drain(0)).toEqual([]);
    expect(queue.size).toBe(2);
  });
});

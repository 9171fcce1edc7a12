import type { RetryOptions } from './types.js';

const DEFAULT_BASE_DELAY = 500;
const DEFAULT_MAX_DELAY = 30_000;

/**
 * Tracks consecutive failed flushes and the earliest time the next
 * size-triggered attempt may run.
 */
export class RetryBackoff {
  private readonly baseDelay: number;
  private readonly maxDelay: number;
  private consecutiveFailures = 0;
  private notBefore = 0;

  constructor(opts?: RetryOptions) {
    this.baseDelay = opts?.baseDelay ?? DEFAULT_BASE_DELAY;
    this.maxDelay = opts?.maxDelay ?? DEFAULT_MAX_DELAY;
  }

  get failures(): number {
    return this.consecutiveFailures;
  }

  ready(now: number = Date.now()): boolean {
    return now >= this.notBefore;
  }

  recordFailure(now: number = Date.now()): number {
    const delay = getDelay(this.consecutiveFailures, this.baseDelay, this.maxDelay);
    this.consecutiveFailures++;
    this.notBefore = now + delay;
    return delay;
  }

  recordSuccess(): void {
    this.consecutiveFailures = 0;
    this.notBefore = 0;
  }
}

export function getDelay(attempt: number, baseDelay: number, maxDelay: number): number {
  const exponential = baseDelay * 2 ** attempt;
  const capped = Math.min(exponential, maxDelay);
  const jitter = capped * Math.random();
  return capped + jitter;
}

/**
 * Fixed-period flush timer. The period runs from `start()` and is never
 * reset by flushes triggered elsewhere. While a tick is pending, later ticks
 * coalesce into it.
 */
export class Ticker {
  private timer: ReturnType<typeof setInterval> | null = null;
  private pending = false;
  private readonly period: number;
  private readonly onTick: () => void;

  constructor(period: number, onTick: () => void) {
    this.period = period;
    this.onTick = onTick;
  }

  start(): void {
    if (this.timer !== null) return;
    this.timer = setInterval(() => {
      this.pending = true;
      this.onTick();
    }, this.period);
  }

  take(): boolean {
    const pending = this.pending;
    this.pending = false;
    return pending;
  }

  stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.pending = false;
  }
}

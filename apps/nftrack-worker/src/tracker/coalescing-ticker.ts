/**
 * Coalescing Ticker
 *
 * Fixed-interval ticks for a single consumer. While the consumer is busy, at
 * most one tick is kept pending; every further tick is dropped and counted.
 * The consumer never runs two ticks at once because it pulls them with next().
 */

export class CoalescingTicker {
  private timer: ReturnType<typeof setInterval> | null = null;
  private pending = false;
  private droppedTicks = 0;
  private waiter: ((fired: boolean) => void) | null = null;

  constructor(private readonly intervalMs: number) {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new RangeError(`Tick interval must be a positive number of ms, got ${intervalMs}`);
    }
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => this.onTick(), this.intervalMs);
  }

  /**
   * Stop ticking. A consumer blocked in next() is released with `false`.
   */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.pending = false;
    this.release(false);
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  hasPendingTick(): boolean {
    return this.pending;
  }

  getDroppedTicks(): number {
    return this.droppedTicks;
  }

  /**
   * Wait for the next tick.
   *
   * @returns true when a tick fired, false when the ticker stopped or the signal aborted
   */
  next(signal?: AbortSignal): Promise<boolean> {
    if (!this.timer || signal?.aborted) {
      return Promise.resolve(false);
    }

    if (this.pending) {
      this.pending = false;
      return Promise.resolve(true);
    }

    if (this.waiter) {
      return Promise.reject(new Error('CoalescingTicker supports a single waiting consumer'));
    }

    return new Promise<boolean>((resolve) => {
      const onAbort = (): void => this.release(false);
      signal?.addEventListener('abort', onAbort, { once: true });

      this.waiter = (fired) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(fired);
      };
    });
  }

  private onTick(): void {
    if (this.waiter) {
      this.release(true);
      return;
    }

    if (this.pending) {
      this.droppedTicks++;
      return;
    }

    this.pending = true;
  }

  private release(fired: boolean): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.(fired);
  }
}

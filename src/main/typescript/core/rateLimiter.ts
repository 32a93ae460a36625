/**
 * INPUT: minimum interval between outbound generation calls
 * OUTPUT: RateLimiter (single-slot, per session)
 * POS: core module, spaces out paid API calls within one session
 */

export type Clock = () => number;
export type Sleep = (ms: number) => Promise<void>;

const realSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class RateLimiter {
  private lastCallAt: number | null = null;

  constructor(
    readonly delayMs: number,
    private readonly now: Clock = () => Date.now(),
    private readonly sleep: Sleep = realSleep,
  ) {
    if (!Number.isFinite(delayMs) || delayMs < 0) {
      throw new Error(`rate limit delay must be a non-negative number, got ${delayMs}`);
    }
  }

  /** Milliseconds until the next call may go out (0 when ready) */
  msUntilReady(): number {
    if (this.lastCallAt === null) return 0;
    const elapsed = this.now() - this.lastCallAt;
    return Math.max(0, this.delayMs - elapsed);
  }

  isReady(): boolean {
    return this.msUntilReady() === 0;
  }

  /**
   * Waits out the rest of the interval, then records the completion instant.
   * One waiter at a time; callers must not overlap acquire() on one limiter.
   */
  async acquire(): Promise<void> {
    // Timers may fire a little early, so re-check against the clock
    let wait = this.msUntilReady();
    while (wait > 0) {
      await this.sleep(wait);
      wait = this.msUntilReady();
    }
    this.lastCallAt = this.now();
  }

  reset(): void {
    this.lastCallAt = null;
  }
}

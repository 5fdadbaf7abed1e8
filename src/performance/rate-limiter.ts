/**
 * Sliding-window call counter.
 * A call let through records its timestamp; a denied call records nothing.
 */
export class SlidingWindowRateLimiter {
  private calls: number[] = [];

  constructor(
    readonly limit: number,
    readonly windowMs: number = 60_000
  ) {}

  /**
   * Record a call if fewer than `limit` happened within the window
   */
  tryAcquire(): boolean {
    const now = Date.now();
    this.prune(now);

    if (this.calls.length >= this.limit) {
      return false;
    }

    this.calls.push(now);
    return true;
  }

  /**
   * Calls recorded within the current window
   */
  count(): number {
    this.prune(Date.now());
    return this.calls.length;
  }

  reset(): void {
    this.calls = [];
  }

  private prune(now: number): void {
    const cutoff = now - this.windowMs;
    let drop = 0;
    while (drop < this.calls.length && (this.calls[drop] ?? now) <= cutoff) {
      drop++;
    }
    if (drop > 0) {
      this.calls.splice(0, drop);
    }
  }
}

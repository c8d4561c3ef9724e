/**
 * Token bucket shared by every worker of a batch.
 *
 * The bucket holds `max(1, floor(rps))` tokens and is topped up on an interval
 * sized so the long-run rate equals `rps`: 0.5 allows one request every two
 * seconds. A missing, non-positive or non-finite rate means no limit.
 */
class RateLimiter {
  readonly capacity: number;
  readonly refillMs: number;
  private tokens: number;
  private waiters: Array<() => void> = [];
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(rps?: number) {
    if (rps === undefined || !Number.isFinite(rps) || rps <= 0) {
      this.capacity = Infinity;
      this.refillMs = 0;
      this.tokens = Infinity;
      return;
    }
    this.capacity = Math.max(1, Math.floor(rps));
    this.refillMs = Math.round((this.capacity / rps) * 1000);
    this.tokens = this.capacity;
    this.timer = setInterval(() => this.refill(), this.refillMs);
  }

  get limited(): boolean {
    return this.capacity !== Infinity;
  }

  get pending(): number {
    return this.waiters.length;
  }

  private refill(): void {
    this.tokens = this.capacity;
    while (this.tokens > 0 && this.waiters.length > 0) {
      this.tokens -= 1;
      this.waiters.shift()?.();
    }
  }

  /** Resolves once the caller may send one request. */
  async acquire(): Promise<void> {
    if (!this.limited) return;
    if (this.tokens > 0) {
      this.tokens -= 1;
      return;
    }
    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Stop refilling and release anyone still waiting. */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    for (const release of this.waiters.splice(0)) release();
  }
}

export default RateLimiter;

/**
 * Minimum-interval rate limiter for SEC EDGAR requests.
 * SEC allows 10 requests per second per user-agent, counted across
 * every endpoint, so one limiter is shared by the whole run.
 *
 * Callers are served in arrival order: each acquire() waits for the
 * previous one, then for the remainder of the interval.
 */

export class RateLimiter {
  private lastRequest = 0;
  private queue: Promise<void> = Promise.resolve();
  readonly minIntervalMs: number;

  constructor(requestsPerSecond: number = 10) {
    if (!Number.isFinite(requestsPerSecond) || requestsPerSecond <= 0) {
      throw new RangeError(`requestsPerSecond must be a positive number, got ${requestsPerSecond}`);
    }
    this.minIntervalMs = 1000 / requestsPerSecond;
  }

  /** Timestamp (ms) of the last granted request, 0 before the first */
  get lastRequestAt(): number {
    return this.lastRequest;
  }

  acquire(): Promise<void> {
    const turn = this.queue.then(() => this.waitForSlot());
    this.queue = turn;
    return turn;
  }

  private async waitForSlot(): Promise<void> {
    const waitMs = this.lastRequest + this.minIntervalMs - Date.now();
    if (waitMs > 0) {
      await new Promise(resolve => setTimeout(resolve, Math.ceil(waitMs)));
    }
    this.lastRequest = Date.now();
  }
}

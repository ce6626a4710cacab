/**
 * Minimum-interval rate limiter for the academic search API.
 * arXiv asks for at most 1 request per 3 seconds; concurrent callers queue for their slot.
 */

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export class RateLimiter {
  private lastRequestTime = 0;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly minIntervalMs: number,
    private readonly sleep: Sleep = defaultSleep,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Resolves once the caller may issue its request
   */
  wait(): Promise<void> {
    const turn = this.tail.then(() => this.takeSlot());
    this.tail = turn;
    return turn;
  }

  private async takeSlot(): Promise<void> {
    const elapsed = this.now() - this.lastRequestTime;
    if (this.lastRequestTime > 0 && elapsed < this.minIntervalMs) {
      const waitTime = this.minIntervalMs - elapsed;
      console.error(`[arXiv] Rate limit: waiting ${waitTime}ms before next request`);
      await this.sleep(waitTime);
    }
    this.lastRequestTime = this.now();
  }
}

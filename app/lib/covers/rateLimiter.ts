/**
 * Time-based rate limiter: at least `minIntervalMs` between requests.
 *
 * MusicBrainz allows 1 request per second with no burst allowance.
 */

const MIN_INTERVAL_MS = 1_000;

export class IntervalRateLimiter {
  private lastRequestTime = 0;
  private minIntervalMs: number;
  private now: () => number;
  private wait: (ms: number) => Promise<void>;

  constructor(
    minIntervalMs: number = MIN_INTERVAL_MS,
    options: { now?: () => number; wait?: (ms: number) => Promise<void> } = {},
  ) {
    this.minIntervalMs = minIntervalMs;
    this.now = options.now ?? Date.now;
    this.wait =
      options.wait ?? ((ms) => new Promise<void>((resolve) => setTimeout(resolve, ms)));
  }

  /**
   * Wait until enough time has elapsed since the last request, then mark the
   * current timestamp.
   */
  async waitForToken(): Promise<void> {
    const remaining = this.minIntervalMs - (this.now() - this.lastRequestTime);
    if (remaining > 0) {
      await this.wait(remaining);
    }
    this.lastRequestTime = this.now();
  }
}

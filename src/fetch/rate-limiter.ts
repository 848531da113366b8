import { delay } from '../utils/delay.js';

/**
 * Fixed politeness delay between requests. A single limiter is shared by every domain a crawl touches.
 */
export class RateLimiter {
  readonly delayMs: number;

  constructor(requestsPerSecond = 2.0) {
    if (!(requestsPerSecond > 0)) {
      throw new Error(`Rate must be positive, got ${requestsPerSecond}`);
    }
    this.delayMs = Math.floor(1000 / requestsPerSecond);
  }

  wait(signal?: AbortSignal): Promise<void> {
    return delay(this.delayMs, signal);
  }
}

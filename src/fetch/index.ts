export { HttpPageFetcher } from './page-fetcher.js';
export { RateLimiter } from './rate-limiter.js';

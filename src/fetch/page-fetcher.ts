import axios, { type AxiosRequestConfig, type AxiosResponse } from 'axios';
import { SocksProxyAgent } from 'socks-proxy-agent';
import type { Logger } from 'winston';
import { delay } from '../utils/delay.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import { getRandomUserAgent } from '../utils/user-agents.js';
import type {
  FetchOptions,
  FetchResult,
  PageFetcher,
  PageFetcherOptions,
} from '../types/index.js';

// Rate limiting and bot walls; anything else is not worth another attempt
const DEFAULT_RETRY_STATUS_CODES = [429, 403];

export class HttpPageFetcher implements PageFetcher {
  private readonly timeout: number;
  private readonly retryAttempts: number;
  private readonly retryBaseDelayMs: number;
  private readonly retryStatusCodes: Set<number>;
  private readonly maxContentLength: number;
  private readonly proxyAgent: SocksProxyAgent | null;
  private readonly logger: Logger;

  constructor(options: PageFetcherOptions = {}) {
    this.timeout = options.timeout ?? 30000;
    this.retryAttempts = Math.max(1, options.retryAttempts ?? 1);
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
    this.retryStatusCodes = new Set(options.retryStatusCodes ?? DEFAULT_RETRY_STATUS_CODES);
    this.maxContentLength = options.maxContentLength ?? 5 * 1024 * 1024; // 5MB
    this.proxyAgent = options.proxyUrl ? new SocksProxyAgent(options.proxyUrl) : null;
    this.logger = createLogger({ name: 'fetcher' });
  }

  getRequestConfig(): AxiosRequestConfig {
    const config: AxiosRequestConfig = {
      timeout: this.timeout,
      responseType: 'text',
      responseEncoding: 'utf8',
      maxContentLength: this.maxContentLength,
      headers: {
        'User-Agent': getRandomUserAgent(),
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.5',
      },
      // Every status resolves; classification happens below
      validateStatus: () => true,
    };

    if (this.proxyAgent) {
      config.httpAgent = this.proxyAgent;
      config.httpsAgent = this.proxyAgent;
    }

    return config;
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    let lastError = 'Unknown error';
    let lastStatus: number | null = null;

    for (let attempt = 1; attempt <= this.retryAttempts; attempt++) {
      const startTime = Date.now();

      try {
        const response = await axios.request<string>({
          ...this.getRequestConfig(),
          url,
          method: 'GET',
          signal: options.signal,
        });

        if (response.status >= 200 && response.status < 300) {
          return {
            success: true,
            status: response.status,
            data: typeof response.data === 'string' ? response.data : JSON.stringify(response.data),
            headers: flattenHeaders(response.headers),
            url,
            timestamp: new Date().toISOString(),
            responseTime: Date.now() - startTime,
          };
        }

        lastStatus = response.status;
        lastError = `HTTP error: ${response.status}`;

        if (!this.retryStatusCodes.has(response.status)) break;
      } catch (error) {
        lastStatus = null;
        lastError = errorMessage(error);

        if (options.signal?.aborted) break;
      }

      if (attempt < this.retryAttempts) {
        const backoff = this.retryBaseDelayMs * 2 ** (attempt - 1);
        this.logger.warn(`Request failed, retrying in ${backoff}ms`, { url, attempt, error: lastError });
        await delay(backoff, options.signal);
      }
    }

    return {
      success: false,
      error: lastError,
      status: lastStatus,
      url,
      timestamp: new Date().toISOString(),
    };
  }
}

function flattenHeaders(headers: AxiosResponse['headers']): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || value === null) continue;
    flat[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return flat;
}

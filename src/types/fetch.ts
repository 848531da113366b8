export interface FetchSuccessResult {
  success: true;
  status: number;
  data: string;
  headers: Record<string, string>;
  url: string;
  timestamp: string;
  responseTime: number;
}

export interface FetchErrorResult {
  success: false;
  error: string;
  status: number | null;
  url: string;
  timestamp: string;
}

export type FetchResult = FetchSuccessResult | FetchErrorResult;

export interface FetchOptions {
  signal?: AbortSignal;
}

export interface PageFetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>;
}

export interface PageFetcherOptions {
  timeout?: number;
  retryAttempts?: number;
  retryBaseDelayMs?: number;
  retryStatusCodes?: number[];
  /** socks5:// or socks5h:// proxy */
  proxyUrl?: string;
  maxContentLength?: number;
}

import type { AutoSelectors, DetectedContent } from './page.js';

export type CrawlStatus = 'running' | 'completed' | 'partially_completed' | 'failed';

export interface DeepScrapeConfig {
  startUrls: string[];
  /** 0 crawls only the start URLs */
  maxDepth: number;
  maxPages: number;
  stayInDomain: boolean;
  stayInSubdomain: boolean;
  includePatterns: string[];
  excludePatterns: string[];
  /** Requests per second, applied globally across domains */
  rate: number;
  customSelectors?: AutoSelectors;
  /** Accepted for compatibility; has no effect on which links are followed */
  filterNavigation: boolean;
  minContentLength: number;
}

export interface CrawlItem {
  url: string;
  depth: number;
  parentUrl?: string;
}

export interface CrawlNode {
  url: string;
  depth: number;
  parent?: string;
  children: string[];
  scraped: boolean;
  error?: string;
}

export interface PageResult {
  url: string;
  depth: number;
  timestamp: string;
  statusCode: number;
  content: DetectedContent;
  /** True when one extracted content block reaches minContentLength */
  valuable: boolean;
}

export interface DeepScrapeResult {
  sessionId: string;
  startTime: string;
  endTime?: string;
  config: DeepScrapeConfig;
  pageResults: PageResult[];
  crawlTree: CrawlNode[];
  totalPagesCrawled: number;
  totalLinksDiscovered: number;
  totalLinksFiltered: number;
  domainsVisited: string[];
  errors: string[];
  status: CrawlStatus;
}

export interface CrawlOptions {
  signal?: AbortSignal;
}

export interface FilteredLinks {
  accepted: string[];
  rejected: number;
}

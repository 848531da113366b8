import { randomUUID } from 'crypto';
import type { Logger } from 'winston';
import { ContentExtractor } from '../extraction/content-extractor.js';
import { LinkFilter, normalizeUrl } from '../extraction/link-filter.js';
import { HttpPageFetcher } from '../fetch/page-fetcher.js';
import { RateLimiter } from '../fetch/rate-limiter.js';
import { DeepScrapeConfigSchema, type DeepScrapeConfigInput } from '../schemas/config.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import type {
  CrawlItem,
  CrawlNode,
  CrawlOptions,
  CrawlStatus,
  DeepScrapeConfig,
  DeepScrapeResult,
  DetectedContent,
  PageFetcher,
  PageResult,
} from '../types/index.js';

export interface DeepCrawlerDependencies {
  fetcher?: PageFetcher;
  logger?: Logger;
}

/**
 * Everything a single crawl run mutates. Owned by one `crawl()` call and passed through the loop.
 */
interface CrawlState {
  queue: CrawlItem[];
  head: number;
  visited: Set<string>;
  domains: Set<string>;
  pageResults: PageResult[];
  crawlTree: CrawlNode[];
  errors: string[];
  pagesCrawled: number;
  linksDiscovered: number;
  linksFiltered: number;
  cancelled: boolean;
}

export class DeepCrawler {
  private readonly config: DeepScrapeConfig;
  private readonly fetcher: PageFetcher;
  private readonly linkFilter: LinkFilter;
  private readonly extractor: ContentExtractor;
  private readonly rateLimiter: RateLimiter;
  private readonly logger: Logger;

  constructor(config: DeepScrapeConfigInput, dependencies: DeepCrawlerDependencies = {}) {
    this.config = DeepScrapeConfigSchema.parse(config);
    this.fetcher = dependencies.fetcher ?? new HttpPageFetcher();
    this.linkFilter = new LinkFilter(this.config);
    this.extractor = new ContentExtractor(this.config.customSelectors);
    this.rateLimiter = new RateLimiter(this.config.rate);
    this.logger = dependencies.logger ?? createLogger({ name: 'crawler' });
  }

  getConfig(): DeepScrapeConfig {
    return this.config;
  }

  async crawl(options: CrawlOptions = {}): Promise<DeepScrapeResult> {
    const { signal } = options;
    const sessionId = randomUUID();
    const startTime = new Date().toISOString();
    const state = this.createState();

    this.logger.info(
      `Starting deep crawl: ${this.config.startUrls.length} start URLs, max depth ${this.config.maxDepth}, max pages ${this.config.maxPages}`,
      { sessionId }
    );

    while (state.pagesCrawled < this.config.maxPages) {
      if (signal?.aborted) {
        this.logger.warn('Crawl cancelled', { sessionId, pagesCrawled: state.pagesCrawled });
        state.cancelled = true;
        break;
      }

      const item = this.dequeue(state);
      if (!item) break;

      if (state.visited.has(item.url)) continue;
      state.visited.add(item.url);
      this.recordDomain(state, item.url);

      this.logger.info(`Crawling [depth ${item.depth}]`, { url: item.url });
      await this.processItem(item, state, signal);

      if (state.pagesCrawled < this.config.maxPages && this.hasPending(state)) {
        await this.rateLimiter.wait(signal);
      }
    }

    const status = this.determineStatus(state);
    this.logger.info(
      `Deep crawl finished: ${state.pagesCrawled} pages, ${state.linksDiscovered} links discovered, ${state.errors.length} errors`,
      { sessionId, status }
    );

    return {
      sessionId,
      startTime,
      endTime: new Date().toISOString(),
      config: this.config,
      pageResults: state.pageResults,
      crawlTree: state.crawlTree,
      totalPagesCrawled: state.pagesCrawled,
      totalLinksDiscovered: state.linksDiscovered,
      totalLinksFiltered: state.linksFiltered,
      domainsVisited: Array.from(state.domains),
      errors: state.errors,
      status,
    };
  }

  private createState(): CrawlState {
    const queue: CrawlItem[] = this.config.startUrls.map((url) => ({
      url: normalizeUrl(url) ?? url,
      depth: 0,
    }));

    return {
      queue,
      head: 0,
      visited: new Set(),
      domains: new Set(),
      pageResults: [],
      crawlTree: [],
      errors: [],
      pagesCrawled: 0,
      linksDiscovered: 0,
      linksFiltered: 0,
      cancelled: false,
    };
  }

  private dequeue(state: CrawlState): CrawlItem | undefined {
    const item = state.queue[state.head];
    if (item) state.head++;
    return item;
  }

  private hasPending(state: CrawlState): boolean {
    return state.head < state.queue.length;
  }

  private async processItem(item: CrawlItem, state: CrawlState, signal?: AbortSignal): Promise<void> {
    try {
      const result = await this.fetcher.fetch(item.url, { signal });

      if (!result.success) {
        this.recordFailure(item, state, result.error);
        return;
      }

      const content = this.extractor.extract(result.data, item.url);
      state.linksDiscovered += content.links.length;

      let children: string[] = [];
      if (item.depth < this.config.maxDepth) {
        const { accepted, rejected } = this.linkFilter.filterLinks(
          item.url,
          content.links.map((link) => link.href)
        );
        state.linksFiltered += rejected;
        for (const url of accepted) {
          state.queue.push({ url, depth: item.depth + 1, parentUrl: item.url });
        }
        children = accepted;
      }

      state.pageResults.push({
        url: item.url,
        depth: item.depth,
        timestamp: result.timestamp,
        statusCode: result.status,
        content,
        valuable: this.isValuable(content),
      });
      state.pagesCrawled++;

      state.crawlTree.push({
        url: item.url,
        depth: item.depth,
        parent: item.parentUrl,
        children,
        scraped: true,
      });
    } catch (error) {
      this.recordFailure(item, state, errorMessage(error));
    }
  }

  private recordFailure(item: CrawlItem, state: CrawlState, message: string): void {
    this.logger.error('Failed to crawl page', { url: item.url, error: message });
    state.errors.push(`${item.url}: ${message}`);
    state.crawlTree.push({
      url: item.url,
      depth: item.depth,
      parent: item.parentUrl,
      children: [],
      scraped: false,
      error: message,
    });
  }

  private recordDomain(state: CrawlState, url: string): void {
    try {
      const host = new URL(url).hostname;
      if (host) state.domains.add(host);
    } catch {
      // Unparseable start URL; the fetch will record the error
    }
  }

  private isValuable(content: DetectedContent): boolean {
    return content.content.some((block) => block.length >= this.config.minContentLength);
  }

  private determineStatus(state: CrawlState): CrawlStatus {
    if (state.pagesCrawled === 0) return 'failed';
    if ((state.errors.length > 0 || state.cancelled) && state.pagesCrawled < this.config.maxPages) {
      return 'partially_completed';
    }
    return 'completed';
  }
}

export async function crawl(
  config: DeepScrapeConfigInput,
  dependencies: DeepCrawlerDependencies = {},
  options: CrawlOptions = {}
): Promise<DeepScrapeResult> {
  return new DeepCrawler(config, dependencies).crawl(options);
}

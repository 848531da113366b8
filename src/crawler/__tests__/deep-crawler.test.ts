import { describe, it, expect, vi, afterEach } from 'vitest';
import { ZodError } from 'zod';
import { DeepCrawler } from '../deep-crawler.js';
import { FakeFetcher } from '../../__tests__/fixtures.js';

const link = (href: string): string => `<a href="${href}">${href}</a>`;
const page = (...body: string[]): string => `<html><head></head><body>${body.join('')}</body></html>`;

// 1000 requests per second keeps the politeness delay at 1ms
const FAST = { rate: 1000 };

describe('DeepCrawler', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('waits 1/rate seconds between fetches and not after the last page', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
    const fetcher = new FakeFetcher({
      'https://example.com/a': page(link('/b')),
      'https://example.com/b': page(),
    });
    const fetchedAt: number[] = [];
    fetcher.onFetch = () => fetchedAt.push(Date.now());

    const running = new DeepCrawler({ startUrls: ['https://example.com/a'], rate: 2 }, { fetcher }).crawl();

    await vi.advanceTimersByTimeAsync(499);
    expect(fetcher.calls).toEqual(['https://example.com/a']);

    await vi.advanceTimersByTimeAsync(1);
    const result = await running;

    expect(fetcher.calls).toEqual(['https://example.com/a', 'https://example.com/b']);
    expect((fetchedAt[1] ?? 0) - (fetchedAt[0] ?? 0)).toBe(500);
    expect(result.totalPagesCrawled).toBe(2);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('crawls a linear three page site breadth first', async () => {
    const fetcher = new FakeFetcher({
      'https://example.com/a': page(link('/b')),
      'https://example.com/b': page(link('/c')),
      'https://example.com/c': page('<p>the end</p>'),
    });

    const result = await new DeepCrawler(
      { startUrls: ['https://example.com/a'], maxDepth: 2, maxPages: 10, ...FAST },
      { fetcher }
    ).crawl();

    expect(result.totalPagesCrawled).toBe(3);
    expect(result.status).toBe('completed');
    expect(result.crawlTree.map((node) => node.depth)).toEqual([0, 1, 2]);
    expect(result.crawlTree.map((node) => node.parent)).toEqual([
      undefined,
      'https://example.com/a',
      'https://example.com/b',
    ]);
    expect(result.crawlTree[0]?.children).toEqual(['https://example.com/b']);
    expect(result.totalLinksDiscovered).toBe(2);
    expect(result.totalLinksFiltered).toBe(0);
    expect(result.domainsVisited).toEqual(['example.com']);
    expect(result.errors).toEqual([]);
    expect(result.pageResults.map((r) => r.statusCode)).toEqual([200, 200, 200]);
    expect(fetcher.calls).toEqual(['https://example.com/a', 'https://example.com/b', 'https://example.com/c']);
  });

  it('never enqueues links past maxDepth', async () => {
    const fetcher = new FakeFetcher({
      'https://example.com/a': page(link('/b')),
      'https://example.com/b': page(link('/c')),
      'https://example.com/c': page(),
    });

    const result = await new DeepCrawler(
      { startUrls: ['https://example.com/a'], maxDepth: 1, ...FAST },
      { fetcher }
    ).crawl();

    expect(result.totalPagesCrawled).toBe(2);
    expect(result.crawlTree[1]?.children).toEqual([]);
    expect(fetcher.calls).not.toContain('https://example.com/c');
  });

  it('stops at the page budget', async () => {
    const fetcher = new FakeFetcher({
      'https://example.com/a': page(link('/b'), link('/c'), link('/d')),
      'https://example.com/b': page(),
      'https://example.com/c': page(),
      'https://example.com/d': page(),
    });

    const result = await new DeepCrawler(
      { startUrls: ['https://example.com/a'], maxPages: 2, ...FAST },
      { fetcher }
    ).crawl();

    expect(result.totalPagesCrawled).toBe(2);
    expect(result.status).toBe('completed');
    expect(fetcher.calls).toHaveLength(2);
  });

  it('fetches every URL at most once', async () => {
    const fetcher = new FakeFetcher({
      'https://example.com/a': page(link('/b'), link('/c')),
      'https://example.com/b': page(link('/c'), link('/a')),
      'https://example.com/c': page(link('/a#top')),
    });

    const result = await new DeepCrawler(
      { startUrls: ['https://example.com/a'], maxDepth: 3, ...FAST },
      { fetcher }
    ).crawl();

    expect(fetcher.calls).toEqual(['https://example.com/a', 'https://example.com/b', 'https://example.com/c']);
    expect(result.crawlTree).toHaveLength(3);
  });

  it('records fetch failures without stopping the crawl', async () => {
    const fetcher = new FakeFetcher({
      'https://example.com/a': page(link('/missing'), link('/c')),
      'https://example.com/c': page(),
    });

    const result = await new DeepCrawler(
      { startUrls: ['https://example.com/a'], ...FAST },
      { fetcher }
    ).crawl();

    expect(result.totalPagesCrawled).toBe(2);
    expect(result.status).toBe('partially_completed');
    expect(result.errors).toEqual(['https://example.com/missing: HTTP error: 404']);
    expect(result.crawlTree[1]).toEqual({
      url: 'https://example.com/missing',
      depth: 1,
      parent: 'https://example.com/a',
      children: [],
      scraped: false,
      error: 'HTTP error: 404',
    });
  });

  it('fails when no page could be crawled', async () => {
    const result = await new DeepCrawler(
      { startUrls: ['https://example.com/gone'], ...FAST },
      { fetcher: new FakeFetcher() }
    ).crawl();

    expect(result.totalPagesCrawled).toBe(0);
    expect(result.status).toBe('failed');
  });

  it('counts links rejected by the filter', async () => {
    const fetcher = new FakeFetcher({
      'https://example.com/a': page(link('https://other.org/x'), link('/report.pdf'), link('/b')),
      'https://example.com/b': page(),
    });

    const result = await new DeepCrawler(
      { startUrls: ['https://example.com/a'], ...FAST },
      { fetcher }
    ).crawl();

    expect(result.totalLinksDiscovered).toBe(3);
    expect(result.totalLinksFiltered).toBe(2);
    expect(result.crawlTree[0]?.children).toEqual(['https://example.com/b']);
  });

  it('marks pages with a content block of at least minContentLength as valuable', async () => {
    const fetcher = new FakeFetcher({
      'https://example.com/a': page('<p>This paragraph is comfortably long.</p>', link('/b')),
      'https://example.com/b': page('<p>Too short here</p>'),
    });

    const result = await new DeepCrawler(
      { startUrls: ['https://example.com/a'], minContentLength: 20, ...FAST },
      { fetcher }
    ).crawl();

    expect(result.pageResults.map((r) => r.valuable)).toEqual([true, false]);
  });

  it('stops when the signal is aborted', async () => {
    const fetcher = new FakeFetcher({
      'https://example.com/a': page(link('/b')),
      'https://example.com/b': page(),
    });
    const controller = new AbortController();
    fetcher.onFetch = () => controller.abort();

    const result = await new DeepCrawler(
      { startUrls: ['https://example.com/a'], rate: 0.001 },
      { fetcher }
    ).crawl({ signal: controller.signal });

    expect(fetcher.calls).toEqual(['https://example.com/a']);
    expect(result.totalPagesCrawled).toBe(1);
    expect(result.status).toBe('partially_completed');
  });

  it('does nothing for an already aborted signal', async () => {
    const fetcher = new FakeFetcher({ 'https://example.com/a': page() });
    const controller = new AbortController();
    controller.abort();

    const result = await new DeepCrawler({ startUrls: ['https://example.com/a'] }, { fetcher }).crawl({
      signal: controller.signal,
    });

    expect(fetcher.calls).toEqual([]);
    expect(result.status).toBe('failed');
  });

  it('applies configuration defaults', () => {
    const crawler = new DeepCrawler({ startUrls: ['https://example.com/'] }, { fetcher: new FakeFetcher() });
    expect(crawler.getConfig()).toMatchObject({
      maxDepth: 2,
      maxPages: 50,
      stayInDomain: true,
      stayInSubdomain: false,
      includePatterns: [],
      rate: 2,
      filterNavigation: true,
      minContentLength: 200,
    });
    expect(crawler.getConfig().excludePatterns).toContain('\\.pdf$');
  });

  it('rejects invalid configuration', () => {
    expect(() => new DeepCrawler({ startUrls: [] })).toThrow(ZodError);
    expect(() => new DeepCrawler({ startUrls: ['https://example.com/'], rate: 0 })).toThrow(ZodError);
  });
});

import type { Logger } from 'winston';
import { registrableDomain } from '../utils/domain.js';
import { createLogger } from '../utils/logger.js';
import { compilePatterns } from '../utils/selectors.js';
import type { DeepScrapeConfig, FilteredLinks } from '../types/index.js';

export type LinkFilterOptions = Pick<
  DeepScrapeConfig,
  'stayInDomain' | 'stayInSubdomain' | 'includePatterns' | 'excludePatterns'
>;

/**
 * Canonical form used for visited-set comparison: absolute http(s) URL, fragment removed.
 * WHATWG parsing already lowercases scheme and host and drops default ports.
 */
export function normalizeUrl(url: string): string | null {
  try {
    const urlObj = new URL(url);
    if (urlObj.protocol !== 'http:' && urlObj.protocol !== 'https:') return null;
    urlObj.hash = '';
    return urlObj.href;
  } catch {
    return null;
  }
}

export function resolveLink(href: string, pageUrl: string): string | null {
  const trimmed = href.trim();
  if (!trimmed) return null;

  try {
    return normalizeUrl(new URL(trimmed, pageUrl).href);
  } catch {
    return null;
  }
}

export class LinkFilter {
  private readonly stayInDomain: boolean;
  private readonly stayInSubdomain: boolean;
  private readonly includePatterns: RegExp[];
  private readonly excludePatterns: RegExp[];
  // An include list made only of malformed patterns still restricts the crawl
  private readonly hasIncludePatterns: boolean;
  private readonly logger: Logger;

  constructor(options: LinkFilterOptions) {
    this.logger = createLogger({ name: 'link-filter' });

    const onInvalid = (pattern: string, reason: string): void => {
      this.logger.debug('Ignoring malformed pattern', { pattern, reason });
    };

    this.stayInDomain = options.stayInDomain;
    this.stayInSubdomain = options.stayInSubdomain;
    this.includePatterns = compilePatterns(options.includePatterns, onInvalid);
    this.excludePatterns = compilePatterns(options.excludePatterns, onInvalid);
    this.hasIncludePatterns = options.includePatterns.length > 0;
  }

  shouldCrawl(url: string, baseUrl: string): boolean {
    let target: URL;
    let base: URL;
    try {
      target = new URL(url);
      base = new URL(baseUrl);
    } catch {
      return false;
    }

    if (this.stayInDomain && registrableDomain(target.hostname) !== registrableDomain(base.hostname)) {
      return false;
    }

    if (this.stayInSubdomain && target.hostname !== base.hostname) {
      return false;
    }

    if (this.excludePatterns.some((pattern) => pattern.test(url))) {
      return false;
    }

    if (this.hasIncludePatterns && !this.includePatterns.some((pattern) => pattern.test(url))) {
      return false;
    }

    return true;
  }

  /**
   * Resolve hrefs found on `pageUrl`, normalize them and keep the crawlable ones.
   * Hrefs that do not resolve to an http(s) URL are dropped, as are duplicates within one page;
   * neither counts as rejected.
   */
  filterLinks(pageUrl: string, hrefs: readonly string[]): FilteredLinks {
    const accepted: string[] = [];
    const seen = new Set<string>();
    let rejected = 0;

    for (const href of hrefs) {
      const resolved = resolveLink(href, pageUrl);
      if (!resolved || seen.has(resolved)) continue;
      seen.add(resolved);

      if (!this.shouldCrawl(resolved, pageUrl)) {
        rejected++;
        continue;
      }
      accepted.push(resolved);
    }

    return { accepted, rejected };
  }
}

export function shouldCrawl(url: string, baseUrl: string, config: LinkFilterOptions): boolean {
  return new LinkFilter(config).shouldCrawl(url, baseUrl);
}

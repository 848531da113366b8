import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { Logger } from 'winston';
import { DEFAULT_AUTO_SELECTORS } from '../schemas/config.js';
import { createLogger } from '../utils/logger.js';
import { filterValidSelectors } from '../utils/selectors.js';
import type {
  AutoSelectors,
  DetectedContent,
  ImageData,
  LinkData,
} from '../types/index.js';

const SKIPPED_HREF = /^(javascript|mailto|tel|data):/i;

export class ContentExtractor {
  private readonly selectors: AutoSelectors;
  private readonly logger: Logger;

  constructor(selectors: Partial<AutoSelectors> = {}) {
    this.logger = createLogger({ name: 'extractor' });

    const onInvalid = (selector: string, reason: string): void => {
      this.logger.debug('Dropping invalid selector', { selector, reason });
    };

    this.selectors = {
      title: filterValidSelectors(selectors.title ?? DEFAULT_AUTO_SELECTORS.title, onInvalid),
      content: filterValidSelectors(selectors.content ?? DEFAULT_AUTO_SELECTORS.content, onInvalid),
      links: filterValidSelectors(selectors.links ?? DEFAULT_AUTO_SELECTORS.links, onInvalid),
      images: filterValidSelectors(selectors.images ?? DEFAULT_AUTO_SELECTORS.images, onInvalid),
      metadata: filterValidSelectors(selectors.metadata ?? DEFAULT_AUTO_SELECTORS.metadata, onInvalid),
    };
  }

  getSelectors(): AutoSelectors {
    return this.selectors;
  }

  extract(html: string, baseUrl: string): DetectedContent {
    const $ = cheerio.load(html);

    return {
      title: this.detectTitle($),
      content: this.detectContent($),
      links: this.detectLinks($, baseUrl),
      images: this.detectImages($, baseUrl),
      metadata: this.detectMetadata($),
    };
  }

  private detectTitle($: CheerioAPI): string | undefined {
    for (const selector of this.selectors.title) {
      const element = $(selector).first();
      if (element.length === 0) continue;

      const text = selector.startsWith('meta')
        ? element.attr('content')?.trim()
        : element.text().trim();

      if (text) return text;
    }
    return undefined;
  }

  private detectContent($: CheerioAPI): string[] {
    const content: string[] = [];
    const seen = new Set<string>();

    for (const selector of this.selectors.content) {
      $(selector).each((_, element) => {
        const text = $(element).text().trim();
        if (text.length > 10 && !seen.has(text)) {
          seen.add(text);
          content.push(text);
        }
      });
    }

    return content;
  }

  private detectLinks($: CheerioAPI, baseUrl: string): LinkData[] {
    const links: LinkData[] = [];
    const seen = new Set<string>();
    const baseHost = hostOf(baseUrl);

    for (const selector of this.selectors.links) {
      $(selector).each((_, element) => {
        const $el = $(element);
        const href = $el.attr('href')?.trim();
        if (!href || href.startsWith('#') || SKIPPED_HREF.test(href)) return;

        const absoluteUrl = resolveAgainst(href, baseUrl);
        if (!absoluteUrl || seen.has(absoluteUrl)) return;
        seen.add(absoluteUrl);

        const text = $el.text().trim();
        links.push({
          text: text || href,
          href: absoluteUrl,
          isExternal: baseHost !== null && hostOf(absoluteUrl) !== baseHost,
        });
      });
    }

    return links;
  }

  private detectImages($: CheerioAPI, baseUrl: string): ImageData[] {
    const images: ImageData[] = [];
    const seen = new Set<string>();

    for (const selector of this.selectors.images) {
      $(selector).each((_, element) => {
        const $el = $(element);
        const src = ($el.attr('src') ?? $el.attr('data-src'))?.trim();
        if (!src) return;

        const absoluteUrl = src.startsWith('//') ? `https:${src}` : resolveAgainst(src, baseUrl);
        if (!absoluteUrl || seen.has(absoluteUrl)) return;
        seen.add(absoluteUrl);

        const image: ImageData = { src: absoluteUrl };
        const alt = $el.attr('alt');
        const title = $el.attr('title');
        if (alt !== undefined) image.alt = alt;
        if (title !== undefined) image.title = title;
        images.push(image);
      });
    }

    return images;
  }

  private detectMetadata($: CheerioAPI): Record<string, string> {
    const metadata: Record<string, string> = {};

    for (const selector of this.selectors.metadata) {
      $(selector).each((_, element) => {
        const $el = $(element);
        const content = $el.attr('content');
        if (content === undefined) return;

        const key = $el.attr('name') ?? $el.attr('property') ?? 'unknown';
        metadata[key] = content;
      });
    }

    return metadata;
  }
}

function resolveAgainst(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).href;
  } catch {
    return null;
  }
}

function hostOf(url: string): string | null {
  try {
    return new URL(url).host;
  } catch {
    return null;
  }
}

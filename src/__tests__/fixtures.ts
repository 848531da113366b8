import type {
  FetchOptions,
  FetchResult,
  PageFetcher,
  Section,
  SectionStats,
  StructureAnalysis,
} from '../types/index.js';

/** Serves markup from a map; unknown URLs answer 404. */
export class FakeFetcher implements PageFetcher {
  readonly calls: string[] = [];
  onFetch: ((url: string) => void) | null = null;

  constructor(private readonly pages: Record<string, string> = {}) {}

  async fetch(url: string, _options: FetchOptions = {}): Promise<FetchResult> {
    this.calls.push(url);
    this.onFetch?.(url);
    const timestamp = '2024-01-01T00:00:00.000Z';
    const html = this.pages[url];

    if (html === undefined) {
      return { success: false, error: 'HTTP error: 404', status: 404, url, timestamp };
    }
    return { success: true, status: 200, data: html, headers: {}, url, timestamp, responseTime: 1 };
  }
}

export const ZERO_STATS: SectionStats = {
  textLength: 0,
  wordCount: 0,
  linkCount: 0,
  imageCount: 0,
  paragraphCount: 0,
  headingCount: 0,
  densityScore: 0,
  linkDensity: 1,
  elementCount: 1,
};

export function makeSection(overrides: Partial<Section> = {}): Section {
  return {
    selector: 'article',
    semanticType: 'article',
    score: 0.8,
    confidence: 0.7,
    stats: ZERO_STATS,
    previewText: 'Preview',
    ...overrides,
  };
}

export function makeAnalysis(url: string, sections: Section[] = [makeSection()]): StructureAnalysis {
  return {
    url,
    timestamp: '2024-01-01T00:00:00.000Z',
    sections,
    recommendations: {
      bestMainContentSelector: sections.length > 0 ? 'article' : undefined,
      bestTitleSelector: 'h1, h2, title',
      suggestedMode: 'article',
      confidenceLevel: 'high',
    },
  };
}

const PARAGRAPH =
  'Structured content keeps readers engaged when every paragraph carries a complete thought and ' +
  'the surrounding markup stays out of the way of the words themselves.';

export const ARTICLE_PAGE = [
  '<html><head><title>Field notes</title></head><body>',
  `<article><h1>Field notes</h1><p>${PARAGRAPH}</p><p>${PARAGRAPH} Second.</p><p>${PARAGRAPH} Third.</p></article>`,
  '<aside><h3>Related reading</h3>',
  `<p>${PARAGRAPH} ${PARAGRAPH}</p>`,
  '<a href="/one">One</a><a href="/two">Two</a></aside>',
  '</body></html>',
].join('');

export { PARAGRAPH };

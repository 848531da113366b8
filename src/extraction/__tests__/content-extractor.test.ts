import { describe, it, expect } from 'vitest';
import { ContentExtractor } from '../content-extractor.js';

const PAGE = [
  '<html><head><title>Doc Title</title>',
  '<meta name="description" content="A page">',
  '<meta property="og:description" content="OG desc">',
  '</head><body>',
  '<h1>Main Heading</h1>',
  '<p>This paragraph is long enough.</p>',
  '<p>short</p>',
  '<a href="/about">About us</a>',
  '<a href="https://other.org/page">Other</a>',
  '<a href="#top">Top</a>',
  '<a href="mailto:someone@example.com">Mail</a>',
  '<a href="/about">About again</a>',
  '<a href="/empty"></a>',
  '<img src="//cdn.example.com/a.png" alt="A">',
  '<img data-src="/lazy.png">',
  '</body></html>',
].join('');

describe('ContentExtractor', () => {
  const extractor = new ContentExtractor();
  const content = extractor.extract(PAGE, 'https://example.com/page');

  it('takes the title from the first selector with text', () => {
    expect(content.title).toBe('Main Heading');
  });

  it('keeps text blocks longer than 10 characters', () => {
    expect(content.content).toEqual(['This paragraph is long enough.']);
  });

  it('resolves links, skips fragments and non-http schemes, and dedupes', () => {
    expect(content.links).toEqual([
      { text: 'About us', href: 'https://example.com/about', isExternal: false },
      { text: 'Other', href: 'https://other.org/page', isExternal: true },
      { text: '/empty', href: 'https://example.com/empty', isExternal: false },
    ]);
  });

  it('resolves images including protocol-relative and lazy ones', () => {
    expect(content.images).toEqual([
      { src: 'https://cdn.example.com/a.png', alt: 'A' },
      { src: 'https://example.com/lazy.png' },
    ]);
  });

  it('collects metadata by name or property', () => {
    expect(content.metadata).toEqual({ description: 'A page', 'og:description': 'OG desc' });
  });

  it('reads the content attribute for meta title selectors', () => {
    const metaOnly = new ContentExtractor({ title: ["meta[property='og:title']"] });
    const html = '<html><head><meta property="og:title" content="  From OG  "></head><body></body></html>';
    expect(metaOnly.extract(html, 'https://example.com/').title).toBe('From OG');
  });

  it('drops blank and invalid custom selectors at construction', () => {
    const custom = new ContentExtractor({ title: ['', 'p:bogus-pseudo', 'title'] });
    expect(custom.getSelectors().title).toEqual(['title']);
    expect(custom.extract(PAGE, 'https://example.com/').title).toBe('Doc Title');
  });

  it('returns empty collections for empty markup', () => {
    expect(extractor.extract('', 'https://example.com/')).toEqual({
      title: undefined,
      content: [],
      links: [],
      images: [],
      metadata: {},
    });
  });
});

import { describe, it, expect } from 'vitest';
import * as cheerio from 'cheerio';
import {
  DEFAULT_SCORING_WEIGHTS,
  calculateConfidence,
  calculateScore,
  calculateStats,
  countNodes,
  mergeWeights,
} from '../section-scorer.js';
import type { SectionStats } from '../../types/index.js';

const STATS: SectionStats = {
  textLength: 1000,
  wordCount: 200,
  linkCount: 2,
  imageCount: 0,
  paragraphCount: 5,
  headingCount: 1,
  densityScore: 0.8,
  linkDensity: 0.1,
  elementCount: 30,
};

describe('calculateStats', () => {
  it('counts text, descendants and densities', () => {
    const $ = cheerio.load('<div id="x"><p>Hello world</p><a href="/">link</a></div>');
    const stats = calculateStats($('#x'));

    expect(stats).toEqual({
      textLength: 15,
      wordCount: 2,
      linkCount: 1,
      imageCount: 0,
      paragraphCount: 1,
      headingCount: 0,
      densityScore: 1,
      linkDensity: 50 / 15,
      elementCount: 5,
    });
  });

  it('counts multi-byte text by its UTF-8 length', () => {
    const $ = cheerio.load('<div id="x">中文</div>');
    const stats = calculateStats($('#x'));
    expect(stats.textLength).toBe(6);
    expect(stats.densityScore).toBe(1);
  });

  it('uses a link density of 1 for elements without text', () => {
    const $ = cheerio.load('<div id="e"></div>');
    const stats = calculateStats($('#e'));
    expect(stats.linkDensity).toBe(1);
    expect(stats.densityScore).toBe(0);
    expect(stats.elementCount).toBe(1);
  });
});

describe('countNodes', () => {
  it('includes text and comment nodes', () => {
    const $ = cheerio.load('<section id="s"><!-- note --><b>bold</b> tail</section>');
    const node = $('#s').get(0);
    expect(node && countNodes(node)).toBe(5);
  });
});

describe('calculateScore', () => {
  it('scores content regions on density, link density, paragraphs and length', () => {
    const { score, terms } = calculateScore(STATS, 'article');
    expect(score).toBeCloseTo(0.65, 10);
    expect(Object.keys(terms)).toEqual(['density', 'linkDensity', 'paragraphs', 'textLength']);
  });

  it('scores main content the same way as articles', () => {
    expect(calculateScore(STATS, 'main_content').score).toBeCloseTo(0.65, 10);
  });

  it('scores sidebars on link count and short text', () => {
    expect(calculateScore(STATS, 'sidebar').score).toBeCloseTo(0.2, 10);
  });

  it('scores navigation, header and footer on link density and short text', () => {
    expect(calculateScore(STATS, 'navigation').score).toBeCloseTo(0.05, 10);
    expect(calculateScore(STATS, 'header').score).toBeCloseTo(0.05, 10);
    expect(calculateScore(STATS, 'footer').score).toBeCloseTo(0.05, 10);
  });

  it('scores comments on element count and distance from the target length', () => {
    expect(calculateScore(STATS, 'comments').score).toBeCloseTo(0.315, 10);
  });

  it('gives other types the fallback score', () => {
    expect(calculateScore(STATS, 'unknown').score).toBe(0.5);
    expect(calculateScore(STATS, 'advertisements').score).toBe(0.5);
  });

  it('clamps the score to 1', () => {
    const weights = mergeWeights({ content: { density: 5 } });
    expect(calculateScore(STATS, 'article', weights).score).toBe(1);
  });
});

describe('calculateConfidence', () => {
  it('adds paragraph weight for content regions only', () => {
    expect(calculateConfidence(STATS, 'article')).toBeCloseTo(0.68, 10);
    expect(calculateConfidence(STATS, 'sidebar')).toBeCloseTo(0.58, 10);
  });

  it('adds the balanced link bonus strictly inside the range', () => {
    const balanced = { ...STATS, linkDensity: 0.2 };
    expect(calculateConfidence(balanced, 'sidebar')).toBeCloseTo(0.68, 10);
  });

  it('stays within [0, 1]', () => {
    const weights = mergeWeights({ confidence: { base: 2 } });
    expect(calculateConfidence(STATS, 'article', weights)).toBe(1);
  });
});

describe('mergeWeights', () => {
  it('keeps defaults for fields that are not overridden', () => {
    const weights = mergeWeights({ navigation: { shortText: 0 }, fallbackScore: 0.25 });
    expect(weights.navigation).toEqual({ ...DEFAULT_SCORING_WEIGHTS.navigation, shortText: 0 });
    expect(weights.fallbackScore).toBe(0.25);
    expect(weights.content).toEqual(DEFAULT_SCORING_WEIGHTS.content);
  });
});

import type { Cheerio, CheerioAPI } from 'cheerio';
import { hasChildren, type AnyNode } from 'domhandler';
import type {
  ScoringWeightOverrides,
  ScoringWeights,
  SectionStats,
  SectionType,
} from '../types/index.js';
import { isContentType } from './taxonomy.js';

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  content: {
    density: 0.3,
    linkDensity: 0.3,
    paragraphs: 0.2,
    textLength: 0.2,
    paragraphCap: 10,
    textLengthCap: 5000,
  },
  sidebar: {
    links: 0.5,
    shortText: 0.3,
    linkCap: 20,
    textLengthCap: 2000,
  },
  navigation: {
    linkDensity: 0.5,
    shortText: 0.3,
    textLengthCap: 500,
  },
  comments: {
    elements: 0.4,
    textDeviation: 0.3,
    elementCap: 50,
    textTarget: 500,
    textDeviationScale: 2000,
  },
  fallbackScore: 0.5,
  confidence: {
    base: 0.5,
    words: 0.2,
    wordCap: 500,
    paragraphs: 0.2,
    paragraphCap: 10,
    balancedLinkBonus: 0.1,
    balancedLinkMin: 0.1,
    balancedLinkMax: 0.3,
  },
};

export function mergeWeights(overrides: ScoringWeightOverrides = {}): ScoringWeights {
  const base = DEFAULT_SCORING_WEIGHTS;
  return {
    content: { ...base.content, ...overrides.content },
    sidebar: { ...base.sidebar, ...overrides.sidebar },
    navigation: { ...base.navigation, ...overrides.navigation },
    comments: { ...base.comments, ...overrides.comments },
    fallbackScore: overrides.fallbackScore ?? base.fallbackScore,
    confidence: { ...base.confidence, ...overrides.confidence },
  };
}

export interface ScoreResult {
  score: number;
  terms: Record<string, number>;
}

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/** `min(value, cap) / cap`, or 0 for a non-positive cap. */
function capped(value: number, cap: number): number {
  return cap > 0 ? clamp01(Math.min(value, cap) / cap) : 0;
}

/** The node itself plus every descendant node, text and comment nodes included. */
export function countNodes(node: AnyNode): number {
  let count = 1;
  if (hasChildren(node)) {
    for (const child of node.children) count += countNodes(child);
  }
  return count;
}

export function calculateStats($el: Cheerio<AnyNode>): SectionStats {
  const rawText = $el.text();
  // UTF-8 bytes, so thresholds treat CJK and Latin text alike
  const textLength = Buffer.byteLength(rawText.trim(), 'utf8');
  const wordCount = rawText.split(/\s+/).filter((word) => word.length > 0).length;

  const linkCount = $el.find('a').length;
  const imageCount = $el.find('img').length;
  const paragraphCount = $el.find('p').length;
  const headingCount = $el.find('h1, h2, h3').length;

  const node = $el.get(0);
  const elementCount = node ? countNodes(node) : 0;

  const densityScore = elementCount > 0 ? Math.min(1, textLength / elementCount) : 0;
  const linkDensity = textLength > 0 ? (linkCount * 50) / textLength : 1;

  return {
    textLength,
    wordCount,
    linkCount,
    imageCount,
    paragraphCount,
    headingCount,
    densityScore,
    linkDensity,
    elementCount,
  };
}

export function calculateScore(
  stats: SectionStats,
  type: SectionType,
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): ScoreResult {
  const terms: Record<string, number> = {};

  if (isContentType(type)) {
    const w = weights.content;
    terms['density'] = w.density * clamp01(stats.densityScore);
    terms['linkDensity'] = w.linkDensity * (1 - clamp01(stats.linkDensity));
    terms['paragraphs'] = w.paragraphs * capped(stats.paragraphCount, w.paragraphCap);
    terms['textLength'] = w.textLength * capped(stats.textLength, w.textLengthCap);
  } else if (type === 'sidebar') {
    const w = weights.sidebar;
    terms['links'] = w.links * capped(stats.linkCount, w.linkCap);
    terms['shortText'] = w.shortText * (1 - capped(stats.textLength, w.textLengthCap));
  } else if (type === 'navigation' || type === 'header' || type === 'footer') {
    const w = weights.navigation;
    terms['linkDensity'] = w.linkDensity * clamp01(stats.linkDensity);
    terms['shortText'] = w.shortText * (1 - capped(stats.textLength, w.textLengthCap));
  } else if (type === 'comments') {
    const w = weights.comments;
    const deviation = Math.abs(stats.textLength - w.textTarget);
    terms['elements'] = w.elements * capped(stats.elementCount, w.elementCap);
    terms['textDeviation'] =
      w.textDeviation * (w.textDeviationScale > 0 ? clamp01(deviation / w.textDeviationScale) : 0);
  } else {
    terms['fallback'] = weights.fallbackScore;
  }

  const score = clamp01(Object.values(terms).reduce((sum, term) => sum + term, 0));
  return { score, terms };
}

export function calculateConfidence(
  stats: SectionStats,
  type: SectionType,
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): number {
  const w = weights.confidence;
  let confidence = w.base + w.words * capped(stats.wordCount, w.wordCap);

  if (isContentType(type)) {
    confidence += w.paragraphs * capped(stats.paragraphCount, w.paragraphCap);
  }

  if (stats.linkDensity > w.balancedLinkMin && stats.linkDensity < w.balancedLinkMax) {
    confidence += w.balancedLinkBonus;
  }

  return clamp01(confidence);
}

/** Total node count of a parsed document. */
export function countDocumentNodes($: CheerioAPI): number {
  return $.root()
    .contents()
    .toArray()
    .reduce((sum, node) => sum + countNodes(node), 0);
}

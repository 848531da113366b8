import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import { isTag, type AnyNode } from 'domhandler';
import type { Logger } from 'winston';
import { createLogger } from '../utils/logger.js';
import { filterValidSelectors } from '../utils/selectors.js';
import type {
  AnalyzerOptions,
  ConfidenceLevel,
  ExtractionMode,
  Recommendations,
  ScoringDetail,
  ScoringWeights,
  Section,
  SectionType,
  StructureAnalysis,
} from '../types/index.js';
import {
  calculateConfidence,
  calculateScore,
  calculateStats,
  countDocumentNodes,
  mergeWeights,
} from './section-scorer.js';
import {
  FALLBACK_CONTAINER_SELECTOR,
  STRUCTURAL_SELECTORS,
  isContentType,
  isStructuralChrome,
  type TaxonomyEntry,
} from './taxonomy.js';

export const DEFAULT_MIN_CONTENT_LENGTH = 200;
export const BEST_TITLE_SELECTOR = 'h1, h2, title';

const PREVIEW_LENGTH = 200;
const FINGERPRINT_LENGTH = 100;

interface ScoredSection {
  section: Section;
  terms: Record<string, number>;
}

/**
 * Classifies DOM regions by semantic role and ranks them. Pure with respect to its input:
 * identical markup and options always give identical sections and ordering.
 */
export class StructureAnalyzer {
  private readonly minContentLength: number;
  private readonly detectComments: boolean;
  private readonly debugMode: boolean;
  private readonly weights: ScoringWeights;
  private readonly taxonomy: TaxonomyEntry[];
  private readonly logger: Logger;

  constructor(options: AnalyzerOptions = {}) {
    this.minContentLength = options.minContentLength ?? DEFAULT_MIN_CONTENT_LENGTH;
    this.detectComments = options.detectComments ?? true;
    this.debugMode = options.debugMode ?? false;
    this.weights = mergeWeights(options.weights);
    this.logger = createLogger({ name: 'analyzer' });

    const entries = STRUCTURAL_SELECTORS.filter(
      (entry) => this.detectComments || entry.semanticType !== 'comments'
    );
    const valid = new Set(
      filterValidSelectors(
        entries.map((entry) => entry.selector),
        (selector, reason) => this.logger.warn('Skipping invalid structural selector', { selector, reason })
      )
    );
    this.taxonomy = entries.filter((entry) => valid.has(entry.selector));
  }

  analyze(html: string, url: string): StructureAnalysis {
    const startTime = Date.now();
    const $ = cheerio.load(html);

    const scored = this.findSections($);
    const sections = scored.map((entry) => entry.section);
    const recommendations = this.generateRecommendations(sections);

    this.logger.debug(`Analyzed ${url}: ${sections.length} sections`, {
      confidenceLevel: recommendations.confidenceLevel,
    });

    const analysis: StructureAnalysis = {
      url,
      timestamp: new Date().toISOString(),
      sections,
      recommendations,
    };

    if (this.debugMode) {
      analysis.debugInfo = {
        totalElements: countDocumentNodes($),
        analyzedSections: sections.length,
        processingTimeMs: Date.now() - startTime,
        scoringDetails: scored.map(
          ({ section, terms }): ScoringDetail => ({
            selector: section.selector,
            semanticType: section.semanticType,
            terms,
            finalScore: section.score,
          })
        ),
      };
    }

    return analysis;
  }

  private findSections($: CheerioAPI): ScoredSection[] {
    const found: ScoredSection[] = [];

    for (const { selector, semanticType } of this.taxonomy) {
      $(selector).each((_, element) => {
        const scored = this.analyzeElement($(element), selector, semanticType);
        if (!scored) return;

        const { section } = scored;
        if (section.stats.textLength >= this.minContentLength || isStructuralChrome(section.semanticType)) {
          found.push(scored);
        }
      });
    }

    if (!found.some(({ section }) => isContentType(section.semanticType))) {
      found.push(...this.analyzeContainers($));
    }

    // Array.prototype.sort is stable, so equal scores keep taxonomy order
    found.sort((a, b) => b.section.score - a.section.score);

    return this.deduplicate(found);
  }

  private analyzeElement(
    $el: Cheerio<AnyNode>,
    selector: string,
    declaredType: SectionType
  ): ScoredSection | null {
    const text = $el.text().trim();
    if (!text) return null;

    const stats = calculateStats($el);

    let semanticType = declaredType;
    if (semanticType === 'main_content' && stats.textLength > 500 && stats.densityScore > 0.7) {
      semanticType = 'article';
    }

    const { score, terms } = calculateScore(stats, semanticType, this.weights);

    return {
      section: {
        selector,
        semanticType,
        score,
        confidence: calculateConfidence(stats, semanticType, this.weights),
        stats,
        previewText: buildPreview(text),
      },
      terms,
    };
  }

  /**
   * Fallback when no tagged content region survived: look for generic containers that read like
   * an article body, under stricter thresholds.
   */
  private analyzeContainers($: CheerioAPI): ScoredSection[] {
    const found: ScoredSection[] = [];

    $(FALLBACK_CONTAINER_SELECTOR).each((_, element) => {
      const $el = $(element);
      const stats = calculateStats($el);

      if (
        stats.textLength < this.minContentLength * 2 ||
        stats.densityScore <= 0.6 ||
        stats.paragraphCount <= 2
      ) {
        return;
      }

      const { score, terms } = calculateScore(stats, 'main_content', this.weights);
      if (score <= 0.5) return;

      found.push({
        section: {
          selector: generateSelector(element),
          semanticType: 'main_content',
          score,
          confidence: calculateConfidence(stats, 'main_content', this.weights),
          stats,
          previewText: buildPreview($el.text().trim()),
        },
        terms,
      });
    });

    return found;
  }

  private deduplicate(sections: ScoredSection[]): ScoredSection[] {
    const seen = new Set<string>();
    return sections.filter(({ section }) => {
      const fingerprint = takeCodePoints(section.previewText, FINGERPRINT_LENGTH);
      if (seen.has(fingerprint)) return false;
      seen.add(fingerprint);
      return true;
    });
  }

  private generateRecommendations(sections: Section[]): Recommendations {
    const recommendations: Recommendations = {
      bestTitleSelector: BEST_TITLE_SELECTOR,
      suggestedMode: suggestMode(sections),
      confidenceLevel: confidenceLevelFor(sections[0]?.score),
    };

    const mainContent = sections.find((section) => isContentType(section.semanticType));
    if (mainContent) recommendations.bestMainContentSelector = mainContent.selector;

    const comments = sections.find((section) => section.semanticType === 'comments');
    if (comments) recommendations.bestCommentsSelector = comments.selector;

    return recommendations;
  }
}

/** Cuts on code points, never inside a surrogate pair. */
function takeCodePoints(text: string, count: number): string {
  return Array.from(text).slice(0, count).join('');
}

function buildPreview(text: string): string {
  const collapsed = text.replace(/\s+/g, ' ');
  const preview = takeCodePoints(collapsed, PREVIEW_LENGTH);
  return preview.length < collapsed.length ? `${preview}...` : collapsed;
}

function generateSelector(element: AnyNode): string {
  if (!isTag(element)) return FALLBACK_CONTAINER_SELECTOR;

  const id = element.attribs['id']?.trim();
  if (id) return `#${id}`;

  const firstClass = element.attribs['class']?.split(/\s+/).find((name) => name.length > 0);
  if (firstClass) return `.${firstClass}`;

  return element.name;
}

function suggestMode(sections: Section[]): ExtractionMode {
  if (sections.some((section) => section.selector.includes('product'))) return 'product';
  if (sections.some((section) => section.semanticType === 'article')) return 'article';
  if (sections.some((section) => section.semanticType === 'comments')) return 'forum';
  return 'generic';
}

export function confidenceLevelFor(topScore: number | undefined): ConfidenceLevel {
  if (topScore === undefined) return 'very_low';
  if (topScore > 0.8) return 'very_high';
  if (topScore > 0.6) return 'high';
  if (topScore > 0.4) return 'medium';
  return 'low';
}

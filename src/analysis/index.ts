export {
  StructureAnalyzer,
  BEST_TITLE_SELECTOR,
  DEFAULT_MIN_CONTENT_LENGTH,
  confidenceLevelFor,
} from './structure-analyzer.js';
export {
  DEFAULT_SCORING_WEIGHTS,
  calculateConfidence,
  calculateScore,
  calculateStats,
  clamp01,
  countNodes,
  mergeWeights,
  type ScoreResult,
} from './section-scorer.js';
export { STRUCTURAL_SELECTORS, isContentType, isStructuralChrome, type TaxonomyEntry } from './taxonomy.js';
export { SiteAnalysisService, type SiteAnalysisServiceOptions } from './analysis-service.js';

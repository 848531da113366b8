// Page types
export type {
  AutoSelectors,
  LinkData,
  ImageData,
  DetectedContent,
} from './page.js';

// Fetch types
export type {
  FetchSuccessResult,
  FetchErrorResult,
  FetchResult,
  FetchOptions,
  PageFetcher,
  PageFetcherOptions,
} from './fetch.js';

// Crawler types
export type {
  CrawlStatus,
  DeepScrapeConfig,
  CrawlItem,
  CrawlNode,
  PageResult,
  DeepScrapeResult,
  CrawlOptions,
  FilteredLinks,
} from './crawler.js';

// Analysis types
export type {
  SectionType,
  ExtractionMode,
  ConfidenceLevel,
  SectionStats,
  Section,
  Recommendations,
  ScoringDetail,
  DebugInfo,
  StructureAnalysis,
  ScoringWeights,
  ScoringWeightOverrides,
  AnalyzerOptions,
} from './analysis.js';

// Profile types
export type {
  SiteProfile,
  ProfileStats,
  ProfileStore,
  DatabaseConfig,
} from './profile.js';

// API types
export type {
  ApiOptions,
  AnalyzeOutcome,
  ResolveOutcome,
} from './api.js';

// Config schemas
export {
  DEFAULT_EXCLUDE_PATTERNS,
  DEFAULT_AUTO_SELECTORS,
  AutoSelectorsSchema,
  DeepScrapeConfigSchema,
  AnalyzerOptionsSchema,
  DatabaseConfigSchema,
  AppConfigSchema,
  type DeepScrapeConfigInput,
  type AnalyzerOptionsInput,
  type DatabaseConfigInput,
  type AppConfig,
} from './config.js';

// Database schemas
export {
  ExtractionModeSchema,
  ProfileRowSchema,
  ProfileStatsRowSchema,
  TableExistsRowSchema,
  type ProfileRow,
  type ProfileStatsRow,
} from './database.js';

// API schemas
export {
  AnalyzeRequestSchema,
  ResolveRequestSchema,
  UsageFeedbackSchema,
  SessionParamsSchema,
  type AnalyzeRequest,
  type ResolveRequest,
  type UsageFeedback,
} from './api.js';

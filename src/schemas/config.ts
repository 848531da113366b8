import { z } from 'zod';

export const DEFAULT_EXCLUDE_PATTERNS = [
  '\\.pdf$',
  '\\.zip$',
  '\\.jpg$',
  '\\.png$',
  '\\.gif$',
  '#.*$',
];

export const DEFAULT_AUTO_SELECTORS = {
  title: ['h1', 'h2', 'title', "meta[property='og:title']", '.title', '#title'],
  content: ['article', 'main', 'p', '.content', '.article-body', '.post-content', "[role='main']"],
  links: ['a[href]', 'nav a', '.nav-link'],
  images: ['img[src]', 'picture img', '[data-src]'],
  metadata: [
    "meta[name='description']",
    "meta[property='og:description']",
    "meta[name='keywords']",
    "meta[name='author']",
  ],
};

export const AutoSelectorsSchema = z.object({
  title: z.array(z.string()).default(() => [...DEFAULT_AUTO_SELECTORS.title]),
  content: z.array(z.string()).default(() => [...DEFAULT_AUTO_SELECTORS.content]),
  links: z.array(z.string()).default(() => [...DEFAULT_AUTO_SELECTORS.links]),
  images: z.array(z.string()).default(() => [...DEFAULT_AUTO_SELECTORS.images]),
  metadata: z.array(z.string()).default(() => [...DEFAULT_AUTO_SELECTORS.metadata]),
});

export const DeepScrapeConfigSchema = z.object({
  startUrls: z.array(z.string().url()).min(1, 'At least one start URL is required'),
  maxDepth: z.number().int().min(0).default(2),
  maxPages: z.number().int().min(0).default(50),
  stayInDomain: z.boolean().default(true),
  stayInSubdomain: z.boolean().default(false),
  includePatterns: z.array(z.string()).default(() => []),
  excludePatterns: z.array(z.string()).default(() => [...DEFAULT_EXCLUDE_PATTERNS]),
  rate: z.number().positive().default(2.0),
  customSelectors: AutoSelectorsSchema.optional(),
  filterNavigation: z.boolean().default(true),
  minContentLength: z.number().int().min(0).default(200),
});

export const AnalyzerOptionsSchema = z.object({
  minContentLength: z.number().int().min(0).optional(),
  detectComments: z.boolean().default(true),
  debugMode: z.boolean().default(false),
});

export const DatabaseConfigSchema = z.object({
  host: z.string().default('localhost'),
  port: z.coerce.number().int().min(1).max(65535).default(5432),
  database: z.string().default('site_profiles'),
  user: z.string().default('postgres'),
  password: z.string().default(''),
  max: z.number().int().positive().default(10),
  idleTimeoutMillis: z.number().int().positive().default(30000),
  connectionTimeoutMillis: z.number().int().positive().default(10000),
});

export const AppConfigSchema = z.object({
  host: z.string().default('127.0.0.1'),
  port: z.coerce.number().int().min(1).max(65535).default(8080),
  logLevel: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  profileStore: z.enum(['postgres', 'memory']).default('postgres'),
  database: DatabaseConfigSchema,
  fetch: z.object({
    timeout: z.coerce.number().int().positive().default(30000),
    proxyUrl: z.string().url().optional(),
  }),
  autoSaveThreshold: z.coerce.number().min(0).max(1).default(0.5),
});

export type DeepScrapeConfigInput = z.input<typeof DeepScrapeConfigSchema>;
export type AnalyzerOptionsInput = z.input<typeof AnalyzerOptionsSchema>;
export type DatabaseConfigInput = z.input<typeof DatabaseConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

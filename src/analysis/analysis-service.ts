import type { Logger } from 'winston';
import type {
  AnalyzeOutcome,
  AnalyzerOptions,
  FetchOptions,
  PageFetcher,
  ProfileStore,
  ResolveOutcome,
  SiteProfile,
  StructureAnalysis,
} from '../types/index.js';
import { extractHost } from '../utils/domain.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import { StructureAnalyzer } from './structure-analyzer.js';

export const DEFAULT_AUTO_SAVE_THRESHOLD = 0.5;

export interface SiteAnalysisServiceOptions {
  fetcher: PageFetcher;
  profileStore: ProfileStore;
  autoSaveThreshold?: number;
  logger?: Logger;
}

/**
 * Joins the fetcher, the structure analyzer and the profile store. Remembered profiles are
 * consulted before a page is analyzed again.
 */
export class SiteAnalysisService {
  private readonly fetcher: PageFetcher;
  private readonly profileStore: ProfileStore;
  private readonly autoSaveThreshold: number;
  private readonly logger: Logger;

  constructor(options: SiteAnalysisServiceOptions) {
    this.fetcher = options.fetcher;
    this.profileStore = options.profileStore;
    this.autoSaveThreshold = options.autoSaveThreshold ?? DEFAULT_AUTO_SAVE_THRESHOLD;
    this.logger = options.logger ?? createLogger({ name: 'analysis' });
  }

  async analyzeUrl(
    url: string,
    options: AnalyzerOptions = {},
    fetchOptions: FetchOptions = {}
  ): Promise<AnalyzeOutcome> {
    const page = await this.fetcher.fetch(url, fetchOptions);
    if (!page.success) {
      return { success: false, message: `Failed to fetch ${url}: ${page.error}` };
    }

    const analysis = new StructureAnalyzer(options).analyze(page.data, url);
    const outcome: AnalyzeOutcome = {
      success: true,
      message: `Found ${analysis.sections.length} sections`,
      analysis,
    };

    if (this.shouldAutoSave(analysis)) {
      try {
        outcome.savedProfile = await this.profileStore.saveFromAnalysis(analysis);
        outcome.message += ', profile saved';
      } catch (error) {
        this.logger.warn('Auto-save of profile failed', { url, error: errorMessage(error) });
      }
    }

    return outcome;
  }

  async resolveSelectors(
    url: string,
    options: AnalyzerOptions = {},
    fetchOptions: FetchOptions = {}
  ): Promise<ResolveOutcome> {
    const host = extractHost(url);
    if (host) {
      const profile = await this.profileStore.getByDomain(host);
      if (profile) {
        this.logger.debug(`Using stored profile for ${host}`, { id: profile.id });
        return { source: 'profile', profile };
      }
    }

    return { source: 'analysis', outcome: await this.analyzeUrl(url, options, fetchOptions) };
  }

  async recordFeedback(id: string, success: boolean): Promise<SiteProfile | null> {
    return this.profileStore.updateUsage(id, success);
  }

  private shouldAutoSave(analysis: StructureAnalysis): boolean {
    const top = analysis.sections[0];
    return (
      analysis.recommendations.bestMainContentSelector !== undefined &&
      top !== undefined &&
      top.score >= this.autoSaveThreshold
    );
  }
}

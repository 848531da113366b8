import type { StructureAnalysis } from './analysis.js';
import type { PageFetcher } from './fetch.js';
import type { ProfileStore, SiteProfile } from './profile.js';

export interface ApiOptions {
  host?: string;
  port?: number;
  profileStore: ProfileStore;
  fetcher?: PageFetcher;
  autoSaveThreshold?: number;
}

export interface AnalyzeOutcome {
  success: boolean;
  message: string;
  analysis?: StructureAnalysis;
  savedProfile?: SiteProfile;
}

export type ResolveOutcome =
  | { source: 'profile'; profile: SiteProfile }
  | { source: 'analysis'; outcome: AnalyzeOutcome };

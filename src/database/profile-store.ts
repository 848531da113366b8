import { randomUUID } from 'crypto';
import type { SiteProfile, StructureAnalysis } from '../types/index.js';
import { extractHost } from '../utils/domain.js';

/** Weight of the newest observation in the success-rate moving average. */
export const SUCCESS_RATE_ALPHA = 0.3;

export class ProfileStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProfileStoreError';
  }
}

export function calculateProfileConfidence(analysis: StructureAnalysis): number {
  const top = analysis.sections[0];
  if (!top) return 0;

  let confidence = top.score * 0.7;
  if (analysis.recommendations.bestMainContentSelector !== undefined) confidence += 0.2;
  if (analysis.recommendations.bestTitleSelector !== undefined) confidence += 0.1;

  return Math.min(1, confidence);
}

export function extractDomain(url: string): string {
  const host = extractHost(url);
  if (!host) {
    throw new ProfileStoreError(`Cannot determine domain of ${url}`);
  }
  return host;
}

export function buildProfileFromAnalysis(analysis: StructureAnalysis, now: Date = new Date()): SiteProfile {
  const { recommendations } = analysis;
  const timestamp = now.toISOString();

  const profile: SiteProfile = {
    id: randomUUID(),
    domain: extractDomain(analysis.url),
    extractionMode: recommendations.suggestedMode,
    confidence: calculateProfileConfidence(analysis),
    useCount: 0,
    successRate: 1.0,
    createdAt: timestamp,
    lastUsed: timestamp,
  };

  if (recommendations.bestMainContentSelector !== undefined) {
    profile.mainContentSelector = recommendations.bestMainContentSelector;
  }
  if (recommendations.bestTitleSelector !== undefined) {
    profile.titleSelector = recommendations.bestTitleSelector;
  }
  if (recommendations.bestCommentsSelector !== undefined) {
    profile.commentsSelector = recommendations.bestCommentsSelector;
  }

  return profile;
}

export function nextSuccessRate(current: number, success: boolean): number {
  const observation = success ? 1 : 0;
  return SUCCESS_RATE_ALPHA * observation + (1 - SUCCESS_RATE_ALPHA) * current;
}

export function applyUsage(profile: SiteProfile, success: boolean, now: Date = new Date()): SiteProfile {
  return {
    ...profile,
    useCount: profile.useCount + 1,
    successRate: nextSuccessRate(profile.successRate, success),
    lastUsed: now.toISOString(),
  };
}

/** Highest confidence first, most recently used breaking ties. */
export function compareProfiles(a: SiteProfile, b: SiteProfile): number {
  if (b.confidence !== a.confidence) return b.confidence - a.confidence;
  return Date.parse(b.lastUsed) - Date.parse(a.lastUsed);
}

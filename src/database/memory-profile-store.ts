import type { ExtractionMode, ProfileStats, ProfileStore, SiteProfile, StructureAnalysis } from '../types/index.js';
import type { Logger } from 'winston';
import { createLogger } from '../utils/logger.js';
import { applyUsage, buildProfileFromAnalysis, compareProfiles } from './profile-store.js';

/**
 * Map-backed store with the same ordering and feedback rules as the Postgres one.
 * Used by tests and by `PROFILE_STORE=memory`.
 */
export class InMemoryProfileStore implements ProfileStore {
  private readonly profiles = new Map<string, SiteProfile>();
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? createLogger({ name: 'profiles' });
  }

  async initialize(): Promise<void> {
    this.logger.info('Using in-memory profile store');
  }

  async saveFromAnalysis(analysis: StructureAnalysis): Promise<SiteProfile> {
    const profile = buildProfileFromAnalysis(analysis);
    await this.insertProfile(profile);
    this.logger.info(`Saved profile for domain: ${profile.domain}`, { id: profile.id });
    return { ...profile };
  }

  async insertProfile(profile: SiteProfile): Promise<void> {
    this.profiles.set(profile.id, { ...profile });
  }

  async getByDomain(domain: string): Promise<SiteProfile | null> {
    const matches = this.sorted().filter((profile) => profile.domain === domain);
    return matches[0] ?? null;
  }

  async getById(id: string): Promise<SiteProfile | null> {
    const profile = this.profiles.get(id);
    return profile ? { ...profile } : null;
  }

  async getAll(): Promise<SiteProfile[]> {
    return this.sorted();
  }

  async getByMode(mode: ExtractionMode): Promise<SiteProfile[]> {
    return this.sorted().filter((profile) => profile.extractionMode === mode);
  }

  async updateUsage(id: string, success: boolean): Promise<SiteProfile | null> {
    const profile = this.profiles.get(id);
    if (!profile) return null;

    const updated = applyUsage(profile, success);
    this.profiles.set(id, updated);
    this.logger.info(`Updated usage for profile: ${id}`, { success });
    return { ...updated };
  }

  async delete(id: string): Promise<boolean> {
    const removed = this.profiles.delete(id);
    if (removed) this.logger.info(`Deleted profile: ${id}`);
    return removed;
  }

  async clearAll(): Promise<number> {
    const count = this.profiles.size;
    this.profiles.clear();
    this.logger.info(`Cleared ${count} profiles`);
    return count;
  }

  async getStats(): Promise<ProfileStats> {
    const all = Array.from(this.profiles.values());
    if (all.length === 0) {
      return { totalProfiles: 0, totalUses: 0, avgConfidence: 0, avgSuccessRate: 0 };
    }

    const sum = (pick: (profile: SiteProfile) => number): number =>
      all.reduce((total, profile) => total + pick(profile), 0);

    return {
      totalProfiles: all.length,
      totalUses: sum((profile) => profile.useCount),
      avgConfidence: sum((profile) => profile.confidence) / all.length,
      avgSuccessRate: sum((profile) => profile.successRate) / all.length,
    };
  }

  async close(): Promise<void> {
    this.profiles.clear();
  }

  private sorted(): SiteProfile[] {
    return Array.from(this.profiles.values(), (profile) => ({ ...profile })).sort(compareProfiles);
  }
}

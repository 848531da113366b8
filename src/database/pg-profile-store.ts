import fs from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import type { Logger } from 'winston';
import {
  ProfileRowSchema,
  ProfileStatsRowSchema,
  TableExistsRowSchema,
  type ProfileRow,
} from '../schemas/database.js';
import type { ExtractionMode, ProfileStats, ProfileStore, SiteProfile, StructureAnalysis } from '../types/index.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import type { Queryable } from './database.js';
import { ProfileStoreError, SUCCESS_RATE_ALPHA, buildProfileFromAnalysis } from './profile-store.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const DEFAULT_SCHEMA_PATH = path.join(__dirname, '..', '..', 'schema.sql');

const PROFILE_COLUMNS = `
  id, domain, pattern, main_content_selector, title_selector, comments_selector,
  extraction_mode, confidence, use_count, success_rate, created_at, last_used, notes
`;

export interface PgProfileStoreOptions {
  schemaPath?: string;
  logger?: Logger;
}

export function rowToProfile(row: ProfileRow): SiteProfile {
  const profile: SiteProfile = {
    id: row.id,
    domain: row.domain,
    extractionMode: row.extraction_mode,
    confidence: row.confidence,
    useCount: row.use_count,
    successRate: row.success_rate,
    createdAt: row.created_at.toISOString(),
    lastUsed: row.last_used.toISOString(),
  };

  if (row.pattern !== null) profile.pattern = row.pattern;
  if (row.main_content_selector !== null) profile.mainContentSelector = row.main_content_selector;
  if (row.title_selector !== null) profile.titleSelector = row.title_selector;
  if (row.comments_selector !== null) profile.commentsSelector = row.comments_selector;
  if (row.notes !== null) profile.notes = row.notes;

  return profile;
}

export class PgProfileStore implements ProfileStore {
  private readonly schemaPath: string;
  private readonly logger: Logger;

  constructor(
    private readonly database: Queryable,
    options: PgProfileStoreOptions = {}
  ) {
    this.schemaPath = options.schemaPath ?? DEFAULT_SCHEMA_PATH;
    this.logger = options.logger ?? createLogger({ name: 'profiles' });
  }

  async initialize(): Promise<void> {
    await this.run('initialize', async () => {
      const result = await this.database.query(`
        SELECT table_name
        FROM information_schema.tables
        WHERE table_schema = 'public' AND table_name = 'profiles'
      `);

      if (result.rows.some((row) => TableExistsRowSchema.safeParse(row).success)) {
        this.logger.info('Profile schema already exists');
        return;
      }

      const schema = await fs.readFile(this.schemaPath, 'utf8');
      await this.database.query(schema);
      this.logger.info('Profile schema initialized');
    });
  }

  async saveFromAnalysis(analysis: StructureAnalysis): Promise<SiteProfile> {
    const profile = buildProfileFromAnalysis(analysis);
    await this.insertProfile(profile);
    this.logger.info(`Saved profile for domain: ${profile.domain}`, { id: profile.id });
    return profile;
  }

  async insertProfile(profile: SiteProfile): Promise<void> {
    await this.run('insertProfile', () =>
      this.database.query(
        `
        INSERT INTO profiles (${PROFILE_COLUMNS})
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
        ON CONFLICT (id)
        DO UPDATE SET
          domain = EXCLUDED.domain,
          pattern = EXCLUDED.pattern,
          main_content_selector = EXCLUDED.main_content_selector,
          title_selector = EXCLUDED.title_selector,
          comments_selector = EXCLUDED.comments_selector,
          extraction_mode = EXCLUDED.extraction_mode,
          confidence = EXCLUDED.confidence,
          use_count = EXCLUDED.use_count,
          success_rate = EXCLUDED.success_rate,
          created_at = EXCLUDED.created_at,
          last_used = EXCLUDED.last_used,
          notes = EXCLUDED.notes
        `,
        [
          profile.id,
          profile.domain,
          profile.pattern ?? null,
          profile.mainContentSelector ?? null,
          profile.titleSelector ?? null,
          profile.commentsSelector ?? null,
          profile.extractionMode,
          profile.confidence,
          profile.useCount,
          profile.successRate,
          profile.createdAt,
          profile.lastUsed,
          profile.notes ?? null,
        ]
      )
    );
  }

  async getByDomain(domain: string): Promise<SiteProfile | null> {
    const profiles = await this.select(
      'getByDomain',
      `SELECT ${PROFILE_COLUMNS} FROM profiles
       WHERE domain = $1
       ORDER BY confidence DESC, last_used DESC
       LIMIT 1`,
      [domain]
    );
    return profiles[0] ?? null;
  }

  async getById(id: string): Promise<SiteProfile | null> {
    const profiles = await this.select('getById', `SELECT ${PROFILE_COLUMNS} FROM profiles WHERE id = $1`, [id]);
    return profiles[0] ?? null;
  }

  async getAll(): Promise<SiteProfile[]> {
    return this.select(
      'getAll',
      `SELECT ${PROFILE_COLUMNS} FROM profiles ORDER BY confidence DESC, last_used DESC`
    );
  }

  async getByMode(mode: ExtractionMode): Promise<SiteProfile[]> {
    return this.select(
      'getByMode',
      `SELECT ${PROFILE_COLUMNS} FROM profiles
       WHERE extraction_mode = $1
       ORDER BY confidence DESC, last_used DESC`,
      [mode]
    );
  }

  /**
   * Moving-average update done in one statement, so concurrent feedback for the same profile
   * never loses an observation.
   */
  async updateUsage(id: string, success: boolean): Promise<SiteProfile | null> {
    const observationWeight = success ? SUCCESS_RATE_ALPHA : 0;
    const profiles = await this.select(
      'updateUsage',
      `UPDATE profiles
       SET use_count = use_count + 1,
           success_rate = LEAST(1, GREATEST(0, $2::double precision + $3::double precision * success_rate)),
           last_used = NOW()
       WHERE id = $1
       RETURNING ${PROFILE_COLUMNS}`,
      [id, observationWeight, 1 - SUCCESS_RATE_ALPHA]
    );

    const updated = profiles[0] ?? null;
    if (updated) {
      this.logger.info(`Updated usage for profile: ${id}`, { success });
    }
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.run('delete', () => this.database.query('DELETE FROM profiles WHERE id = $1', [id]));
    const removed = (result.rowCount ?? 0) > 0;
    if (removed) this.logger.info(`Deleted profile: ${id}`);
    return removed;
  }

  async clearAll(): Promise<number> {
    const result = await this.run('clearAll', () => this.database.query('DELETE FROM profiles'));
    const removed = result.rowCount ?? 0;
    this.logger.info(`Cleared ${removed} profiles`);
    return removed;
  }

  async getStats(): Promise<ProfileStats> {
    const result = await this.run('getStats', () =>
      this.database.query(`
        SELECT
          COUNT(*) AS total_profiles,
          COALESCE(SUM(use_count), 0) AS total_uses,
          COALESCE(AVG(confidence), 0) AS avg_confidence,
          COALESCE(AVG(success_rate), 0) AS avg_success_rate
        FROM profiles
      `)
    );

    const row = ProfileStatsRowSchema.parse(result.rows[0] ?? {
      total_profiles: 0,
      total_uses: 0,
      avg_confidence: 0,
      avg_success_rate: 0,
    });

    return {
      totalProfiles: row.total_profiles,
      totalUses: row.total_uses,
      avgConfidence: row.avg_confidence,
      avgSuccessRate: row.avg_success_rate,
    };
  }

  async close(): Promise<void> {
    await this.database.close();
  }

  private async select(operation: string, text: string, params: unknown[] = []): Promise<SiteProfile[]> {
    return this.run(operation, async () => {
      const result = await this.database.query(text, params);
      return result.rows.map((row) => rowToProfile(ProfileRowSchema.parse(row)));
    });
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      this.logger.error(`Profile store ${operation} failed`, { error: errorMessage(error) });
      throw new ProfileStoreError(`Profile store ${operation} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}

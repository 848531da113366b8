import type { ExtractionMode, StructureAnalysis } from './analysis.js';

export interface SiteProfile {
  id: string;
  domain: string;
  pattern?: string;
  mainContentSelector?: string;
  titleSelector?: string;
  commentsSelector?: string;
  extractionMode: ExtractionMode;
  confidence: number;
  useCount: number;
  successRate: number;
  createdAt: string;
  lastUsed: string;
  notes?: string;
}

export interface ProfileStats {
  totalProfiles: number;
  totalUses: number;
  avgConfidence: number;
  avgSuccessRate: number;
}

export interface ProfileStore {
  initialize(): Promise<void>;
  saveFromAnalysis(analysis: StructureAnalysis): Promise<SiteProfile>;
  insertProfile(profile: SiteProfile): Promise<void>;
  getByDomain(domain: string): Promise<SiteProfile | null>;
  getById(id: string): Promise<SiteProfile | null>;
  getAll(): Promise<SiteProfile[]>;
  getByMode(mode: ExtractionMode): Promise<SiteProfile[]>;
  updateUsage(id: string, success: boolean): Promise<SiteProfile | null>;
  delete(id: string): Promise<boolean>;
  clearAll(): Promise<number>;
  getStats(): Promise<ProfileStats>;
  close(): Promise<void>;
}

export interface DatabaseConfig {
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  max?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

export { Database, type Queryable, type QueryRows } from './database.js';
export { InMemoryProfileStore } from './memory-profile-store.js';
export { PgProfileStore, DEFAULT_SCHEMA_PATH, rowToProfile, type PgProfileStoreOptions } from './pg-profile-store.js';
export {
  ProfileStoreError,
  SUCCESS_RATE_ALPHA,
  applyUsage,
  buildProfileFromAnalysis,
  calculateProfileConfidence,
  compareProfiles,
  extractDomain,
  nextSuccessRate,
} from './profile-store.js';

import { SiteLensAPI } from './api/server.js';
import { loadConfig } from './config.js';
import { Database } from './database/database.js';
import { InMemoryProfileStore } from './database/memory-profile-store.js';
import { PgProfileStore } from './database/pg-profile-store.js';
import { HttpPageFetcher } from './fetch/page-fetcher.js';
import { createLogger, errorMessage } from './utils/logger.js';
import type { AppConfig } from './schemas/config.js';
import type { ProfileStore } from './types/index.js';

function createProfileStore(config: AppConfig): ProfileStore {
  if (config.profileStore === 'memory') {
    return new InMemoryProfileStore();
  }
  return new PgProfileStore(new Database(config.database));
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ name: 'main', level: config.logLevel });

  const profileStore = createProfileStore(config);
  const api = new SiteLensAPI({
    host: config.host,
    port: config.port,
    profileStore,
    fetcher: new HttpPageFetcher({ timeout: config.fetch.timeout, proxyUrl: config.fetch.proxyUrl }),
    autoSaveThreshold: config.autoSaveThreshold,
  });

  try {
    await profileStore.initialize();
    await api.start();
  } catch (error) {
    logger.error('Failed to start', { error: errorMessage(error) });
    if (config.profileStore === 'postgres') {
      logger.info('Check that PostgreSQL is running and the DB_* variables are set, or use PROFILE_STORE=memory');
    }
    process.exit(1);
  }

  const shutdown = (): void => {
    logger.info('Shutting down...');
    api.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error('Fatal:', errorMessage(error));
  process.exit(1);
});

export { SiteLensAPI, loadConfig };

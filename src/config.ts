import { AppConfigSchema, type AppConfig } from './schemas/config.js';

export type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Read the service configuration from environment variables. Throws a ZodError on invalid values.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return AppConfigSchema.parse({
    host: nonEmpty(env['HOST']),
    port: nonEmpty(env['PORT']),
    logLevel: nonEmpty(env['LOG_LEVEL']),
    profileStore: nonEmpty(env['PROFILE_STORE']),
    database: {
      host: nonEmpty(env['DB_HOST']),
      port: nonEmpty(env['DB_PORT']),
      database: nonEmpty(env['DB_NAME']),
      user: nonEmpty(env['DB_USER']),
      password: env['DB_PASSWORD'],
    },
    fetch: {
      timeout: nonEmpty(env['FETCH_TIMEOUT_MS']),
      proxyUrl: nonEmpty(env['FETCH_PROXY_URL']),
    },
    autoSaveThreshold: nonEmpty(env['AUTO_SAVE_THRESHOLD']),
  });
}

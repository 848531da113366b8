import pg from 'pg';
import type { QueryResult, QueryResultRow } from 'pg';
import type { Logger } from 'winston';
import { createLogger, errorMessage } from '../utils/logger.js';
import type { DatabaseConfig } from '../types/index.js';

const { Pool } = pg;

export interface QueryRows {
  rows: unknown[];
  rowCount: number | null;
}

/** The slice of the pool the profile store needs. Tests substitute an in-process fake. */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<QueryRows>;
  close(): Promise<void>;
}

export class Database implements Queryable {
  private readonly pool: pg.Pool;
  private readonly logger: Logger;

  constructor(config: DatabaseConfig = {}) {
    const poolConfig = {
      host: config.host ?? process.env['DB_HOST'] ?? 'localhost',
      port: config.port ?? parseInt(process.env['DB_PORT'] ?? '5432', 10),
      database: config.database ?? process.env['DB_NAME'] ?? 'site_profiles',
      user: config.user ?? process.env['DB_USER'] ?? process.env['USER'] ?? 'postgres',
      password: config.password ?? process.env['DB_PASSWORD'] ?? '',
      max: config.max ?? 10,
      idleTimeoutMillis: config.idleTimeoutMillis ?? 30000,
      connectionTimeoutMillis: config.connectionTimeoutMillis ?? 10000,
    };

    this.logger = createLogger({ name: 'database' });
    this.pool = new Pool(poolConfig);
    this.pool.on('error', (err) => {
      this.logger.error('Database pool error', { error: errorMessage(err) });
    });
  }

  async query<T extends QueryResultRow = QueryResultRow>(text: string, params: unknown[] = []): Promise<QueryResult<T>> {
    const client = await this.pool.connect();
    try {
      return await client.query<T>(text, params);
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

import { Pool, PoolConfig, QueryResult, QueryResultRow } from 'pg';
import { env } from '@/config/env';
import { logger } from '@/adapters/logging/LoggerFactory';
import { DB_QUERY_LIMITS } from '@/config/businessRules';

/**
 * Anything that can run a parameterised query
 * Repositories depend on this rather than on the pool
 */
export interface Queryable {
  query<T extends QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
}

/**
 * Pool settings
 *
 * - min 2: first requests after startup do not pay connection setup
 * - idle connections closed after 5 minutes
 * - acquiring a connection fails after 10 seconds when the pool is exhausted
 * - connections are recycled after 7,500 queries
 */
export function poolConfigFromEnv(): PoolConfig {
  return {
    host: env.DB_HOST,
    port: env.DB_PORT,
    database: env.DB_NAME,
    user: env.DB_USER,
    password: env.DB_PASSWORD,
    ssl: env.DB_SSL ? { rejectUnauthorized: false } : undefined,
    min: 2,
    max: env.DB_MAX_CONNECTIONS,
    idleTimeoutMillis: 300_000,
    connectionTimeoutMillis: 10_000,
    maxUses: 7_500,
  };
}

/**
 * PostgreSQL access
 *
 * Created once at startup (see server.ts), handed to every repository and
 * closed during graceful shutdown.
 */
export class Database implements Queryable {
  private readonly pool: Pool;

  constructor(config: PoolConfig = poolConfigFromEnv()) {
    this.pool = new Pool(config);

    // Let pool handle client recycling - don't crash the process
    this.pool.on('error', (err) => {
      logger.error({ err }, 'Unexpected error on idle PostgreSQL client');
    });

    this.pool.on('connect', (client) => {
      logger.debug('New PostgreSQL client connected to pool');
      client
        .query(`SET statement_timeout = ${DB_QUERY_LIMITS.STATEMENT_TIMEOUT_MS}`)
        .catch((error: unknown) => {
          logger.error({ error }, 'Failed to set statement timeout');
        });
    });
  }

  /**
   * Execute a SQL query with parameters
   */
  async query<T extends QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<QueryResult<T>> {
    const start = Date.now();
    try {
      const result = await this.pool.query<T>(text, params);
      const duration = Date.now() - start;

      if (duration >= DB_QUERY_LIMITS.SLOW_QUERY_THRESHOLD_MS) {
        logger.warn({ query: text, duration, rows: result.rowCount }, 'Slow SQL query');
      } else {
        logger.debug({ query: text, duration, rows: result.rowCount }, 'Executed SQL query');
      }

      return result;
    } catch (error) {
      logger.error(
        {
          error,
          query: text,
          paramCount: params?.length ?? 0,
        },
        'Database query error'
      );
      throw error;
    }
  }

  /**
   * Startup check used by server.ts
   */
  async testConnection(): Promise<boolean> {
    try {
      const result = await this.query<{ now: Date }>('SELECT NOW() AS now');
      logger.info({ time: result.rows[0]?.now }, 'Database connection successful');
      return true;
    } catch (error) {
      logger.error({ error }, 'Database connection failed');
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    logger.info('Database pool closed');
  }
}

/**
 * PostgreSQL unique_violation
 * Raised when an INSERT/UPDATE collides with a UNIQUE constraint
 */
export function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === '23505'
  );
}

/**
 * PostgreSQL foreign_key_violation
 */
export function isForeignKeyViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === '23503'
  );
}

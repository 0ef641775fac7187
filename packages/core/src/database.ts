/**
 * Database Client Factory
 * Wraps pg and mysql2 pools behind one client interface for the repositories
 *
 * Both wrappers return plain row objects and a row count (affected rows for
 * MySQL writes) so the repositories only differ in their SQL.
 */

import pg from 'pg';
import mysql from 'mysql2/promise';
import type { Pool as MySqlDriverPool, PoolOptions as MySqlPoolOptions } from 'mysql2/promise';

import type { DatabaseConfig } from './env.js';
import { DatabaseConfigError } from './errors.js';
import { createLogger, type Logger } from './logger/index.js';

export type SqlDialect = 'postgres' | 'mysql';

export type SqlRow = Record<string, unknown>;

/**
 * Database query result type
 */
export interface QueryResult {
  rows: SqlRow[];
  /** Rows returned, or rows affected by a write */
  rowCount: number | null;
}

/**
 * Database client interface
 */
export interface SqlClient {
  query(sql: string, params?: readonly unknown[]): Promise<QueryResult>;
}

/**
 * Database pool interface for connection management
 */
export interface SqlPool extends SqlClient {
  readonly dialect: SqlDialect;
  /** Run fn on one connection inside BEGIN/COMMIT, rolling back on error */
  transaction<T>(fn: (client: SqlClient) => Promise<T>): Promise<T>;
  end(): Promise<void>;
}

function isRow(value: unknown): value is SqlRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// POSTGRESQL
// =============================================================================

/**
 * PostgreSQL database pool wrapper
 */
export class PostgresSqlPool implements SqlPool {
  readonly dialect = 'postgres' as const;

  constructor(
    private readonly pool: pg.Pool,
    private readonly logger: Logger
  ) {
    this.pool.on('error', (error) => {
      this.logger.error({ err: error }, 'Idle PostgreSQL client error');
    });
  }

  async query(sql: string, params: readonly unknown[] = []): Promise<QueryResult> {
    const result = await this.pool.query(sql, [...params]);
    return { rows: result.rows.filter(isRow), rowCount: result.rowCount };
  }

  async transaction<T>(fn: (client: SqlClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    const scoped: SqlClient = {
      query: async (sql, params = []) => {
        const result = await client.query(sql, [...params]);
        return { rows: result.rows.filter(isRow), rowCount: result.rowCount };
      },
    };

    try {
      await client.query('BEGIN');
      const value = await fn(scoped);
      await client.query('COMMIT');
      return value;
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        this.logger.error({ err: rollbackError }, 'Rollback failed');
      });
      throw error;
    } finally {
      client.release();
    }
  }

  async end(): Promise<void> {
    await this.pool.end();
    this.logger.info('Database pool closed');
  }
}

/**
 * Create a PostgreSQL pool from the configuration struct
 *
 * @example
 * ```typescript
 * const pool = createPostgresPool(loadConfig().database);
 * const { rows } = await pool.query('SELECT * FROM ratings WHERE id = $1', [ratingId]);
 * ```
 */
export function createPostgresPool(config: DatabaseConfig, logger?: Logger): SqlPool {
  if (!config.url) {
    throw new DatabaseConfigError('DATABASE_URL is required for the postgres driver');
  }

  const log = logger ?? createLogger({ name: 'database' });
  log.info({ ssl: config.ssl, poolMax: config.poolMax }, 'Creating PostgreSQL pool');

  const pool = new pg.Pool({
    connectionString: config.url,
    max: config.poolMax,
    idleTimeoutMillis: config.idleTimeoutMs,
    connectionTimeoutMillis: config.connectionTimeoutMs,
    statement_timeout: config.queryTimeoutMs,
    ssl: config.ssl ? { rejectUnauthorized: true } : undefined,
  });

  return new PostgresSqlPool(pool, log);
}

// =============================================================================
// MYSQL
// =============================================================================

/**
 * MySQL database pool wrapper
 */
export class MySqlSqlPool implements SqlPool {
  readonly dialect = 'mysql' as const;

  constructor(
    private readonly pool: MySqlDriverPool,
    private readonly logger: Logger,
    private readonly queryTimeoutMs?: number
  ) {}

  async query(sql: string, params: readonly unknown[] = []): Promise<QueryResult> {
    const [result] = await this.pool.query({ sql, timeout: this.queryTimeoutMs }, [...params]);
    return toQueryResult(result);
  }

  async transaction<T>(fn: (client: SqlClient) => Promise<T>): Promise<T> {
    const connection = await this.pool.getConnection();
    const scoped: SqlClient = {
      query: async (sql, params = []) => {
        const [result] = await connection.query({ sql, timeout: this.queryTimeoutMs }, [
          ...params,
        ]);
        return toQueryResult(result);
      },
    };

    try {
      await connection.beginTransaction();
      const value = await fn(scoped);
      await connection.commit();
      return value;
    } catch (error) {
      await connection.rollback().catch((rollbackError: unknown) => {
        this.logger.error({ err: rollbackError }, 'Rollback failed');
      });
      throw error;
    } finally {
      connection.release();
    }
  }

  async end(): Promise<void> {
    await this.pool.end();
    this.logger.info('Database pool closed');
  }
}

function toQueryResult(result: unknown): QueryResult {
  if (Array.isArray(result)) {
    const rows = result.filter(isRow);
    return { rows, rowCount: rows.length };
  }
  if (isRow(result) && typeof result.affectedRows === 'number') {
    return { rows: [], rowCount: result.affectedRows };
  }
  return { rows: [], rowCount: null };
}

/**
 * Create a MySQL pool from the configuration struct
 *
 * DATETIME columns are read and written as UTC.
 */
export function createMySqlPool(config: DatabaseConfig, logger?: Logger): SqlPool {
  const log = logger ?? createLogger({ name: 'database' });

  const shared: MySqlPoolOptions = {
    connectionLimit: config.poolMax,
    idleTimeout: config.idleTimeoutMs,
    connectTimeout: config.connectionTimeoutMs,
    timezone: 'Z',
    ssl: config.ssl ? { rejectUnauthorized: true } : undefined,
  };

  let options: MySqlPoolOptions;
  if (config.url) {
    options = { ...shared, uri: config.url };
  } else if (config.mysql) {
    options = {
      ...shared,
      host: config.mysql.host,
      port: config.mysql.port,
      user: config.mysql.user,
      password: config.mysql.password,
      database: config.mysql.database,
    };
  } else {
    throw new DatabaseConfigError(
      'DATABASE_URL or MYSQL_HOST, MYSQL_USER and MYSQL_DATABASE are required for the mysql driver'
    );
  }

  log.info({ ssl: config.ssl, poolMax: config.poolMax }, 'Creating MySQL pool');

  return new MySqlSqlPool(mysql.createPool(options), log, config.queryTimeoutMs);
}

// =============================================================================
// HEALTH
// =============================================================================

/**
 * Liveness query against the pool
 *
 * @returns round-trip time in milliseconds
 */
export async function ping(pool: SqlClient): Promise<number> {
  const startedAt = Date.now();
  await pool.query('SELECT 1');
  return Date.now() - startedAt;
}

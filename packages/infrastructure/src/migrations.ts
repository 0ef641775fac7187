/**
 * Database Migration Utilities
 *
 * Applies the per-dialect SQL files under packages/infrastructure/migrations
 * and records each applied file with its checksum.
 */

import crypto from 'node:crypto';
import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { createLogger, toError, type Logger, type SqlDialect, type SqlPool } from '@rateboard/core';

// =============================================================================
// Types
// =============================================================================

/**
 * Migration file information
 */
export interface MigrationFile {
  filename: string;
  content: string;
  checksum: string;
}

/**
 * Migration record from database
 */
export interface MigrationRecord {
  filename: string;
  checksum: string;
  appliedAt: Date;
  executionTimeMs: number;
}

/**
 * Migration execution result
 */
export interface MigrationResult {
  filename: string;
  status: 'applied' | 'skipped' | 'failed';
  executionTimeMs?: number;
  error?: string;
}

/**
 * Migration run summary
 */
export interface MigrationSummary {
  applied: number;
  skipped: number;
  failed: number;
  results: MigrationResult[];
  totalTimeMs: number;
}

export interface ChecksumMismatch {
  filename: string;
  expected: string;
  actual: string;
}

/**
 * Migration manager configuration
 */
export interface MigrationConfig {
  pool: SqlPool;
  /** Migrations table name (default: schema_migrations) */
  tableName?: string;
  logger?: Logger;
}

const TABLE_NAME_PATTERN = /^[a-z_][a-z0-9_]*$/;

export const MIGRATIONS_ROOT = fileURLToPath(new URL('../migrations/', import.meta.url));

// =============================================================================
// Utilities
// =============================================================================

/**
 * Compute SHA-256 checksum of content (first 16 chars)
 */
export function computeChecksum(content: string): string {
  return crypto.createHash('sha256').update(content).digest('hex').substring(0, 16);
}

/**
 * Sorted .sql files with checksums
 *
 * @param files - Record of filename to content
 */
export function parseMigrationFiles(files: Record<string, string>): MigrationFile[] {
  return Object.entries(files)
    .filter(([filename]) => filename.endsWith('.sql'))
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([filename, content]) => ({
      filename,
      content,
      checksum: computeChecksum(content),
    }));
}

/**
 * Split a file into statements on semicolons that end a line. Whole-line
 * `--` comments are dropped; the schema files contain no procedural bodies.
 */
export function splitStatements(content: string): string[] {
  const withoutComments = content
    .split('\n')
    .filter((line) => !line.trim().startsWith('--'))
    .join('\n');

  return withoutComments
    .split(/;\s*(?:\n|$)/)
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
}

/**
 * Read every migration file for a dialect
 *
 * @param directory - defaults to migrations/<dialect> in this package
 */
export async function loadMigrationFiles(
  dialect: SqlDialect,
  directory: string = path.join(MIGRATIONS_ROOT, dialect)
): Promise<Record<string, string>> {
  const entries = await readdir(directory);
  const files: Record<string, string> = {};
  for (const filename of entries.filter((entry) => entry.endsWith('.sql'))) {
    files[filename] = await readFile(path.join(directory, filename), 'utf8');
  }
  return files;
}

function trackingTableDdl(dialect: SqlDialect, tableName: string): string {
  if (dialect === 'mysql') {
    return `CREATE TABLE IF NOT EXISTS ${tableName} (
        filename VARCHAR(255) NOT NULL PRIMARY KEY,
        checksum VARCHAR(64) NOT NULL,
        applied_at DATETIME(3) NOT NULL DEFAULT CURRENT_TIMESTAMP(3),
        execution_time_ms INT NOT NULL
      )`;
  }
  return `CREATE TABLE IF NOT EXISTS ${tableName} (
        filename VARCHAR(255) PRIMARY KEY,
        checksum VARCHAR(64) NOT NULL,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        execution_time_ms INTEGER NOT NULL
      )`;
}

function readDate(value: unknown): Date {
  if (value instanceof Date) {
    return value;
  }
  return new Date(typeof value === 'string' || typeof value === 'number' ? value : NaN);
}

// =============================================================================
// Migration Manager
// =============================================================================

/**
 * Create a migration manager
 *
 * @example
 * ```typescript
 * const pool = createPostgresPool(config.database);
 * const migrations = createMigrationManager({ pool });
 *
 * const summary = await migrations.run(await loadMigrationFiles(pool.dialect));
 * ```
 */
export function createMigrationManager(config: MigrationConfig) {
  const { pool, tableName = 'schema_migrations' } = config;
  const logger = config.logger ?? createLogger({ name: 'migrations' });

  if (!TABLE_NAME_PATTERN.test(tableName)) {
    throw new Error(`Invalid migrations table name: ${tableName}`);
  }

  const param = (position: number): string => (pool.dialect === 'postgres' ? `$${position}` : '?');

  /**
   * Ensure migrations table exists
   */
  async function ensureTable(): Promise<void> {
    await pool.query(trackingTableDdl(pool.dialect, tableName));
  }

  /**
   * Get list of applied migrations
   */
  async function getApplied(): Promise<MigrationRecord[]> {
    const result = await pool.query(
      `SELECT filename, checksum, applied_at, execution_time_ms
       FROM ${tableName}
       ORDER BY filename`
    );
    return result.rows.map((row) => ({
      filename: String(row.filename),
      checksum: String(row.checksum),
      appliedAt: readDate(row.applied_at),
      executionTimeMs: Number(row.execution_time_ms),
    }));
  }

  /**
   * Check if a migration has been applied
   */
  async function isApplied(filename: string): Promise<boolean> {
    const result = await pool.query(`SELECT 1 FROM ${tableName} WHERE filename = ${param(1)}`, [
      filename,
    ]);
    return result.rows.length > 0;
  }

  /**
   * Run pending migrations, stopping at the first failure
   *
   * MySQL commits DDL implicitly, so a failed MySQL file may leave earlier
   * statements of that file applied.
   */
  async function run(
    files: Record<string, string>,
    options?: { dryRun?: boolean }
  ): Promise<MigrationSummary> {
    const startTime = Date.now();
    const migrations = parseMigrationFiles(files);
    const results: MigrationResult[] = [];
    let applied = 0;
    let skipped = 0;
    let failed = 0;

    await ensureTable();

    for (const migration of migrations) {
      if ((await isApplied(migration.filename)) || options?.dryRun) {
        results.push({ filename: migration.filename, status: 'skipped' });
        skipped++;
        continue;
      }

      const migrationStart = Date.now();

      try {
        const executionTimeMs = await pool.transaction(async (client) => {
          for (const statement of splitStatements(migration.content)) {
            await client.query(statement);
          }
          const elapsed = Date.now() - migrationStart;
          await client.query(
            `INSERT INTO ${tableName} (filename, checksum, execution_time_ms)
             VALUES (${param(1)}, ${param(2)}, ${param(3)})`,
            [migration.filename, migration.checksum, elapsed]
          );
          return elapsed;
        });

        logger.info({ filename: migration.filename, executionTimeMs }, 'Migration applied');
        results.push({ filename: migration.filename, status: 'applied', executionTimeMs });
        applied++;
      } catch (error) {
        const errorMessage = toError(error).message;
        logger.error({ err: error, filename: migration.filename }, 'Migration failed');
        results.push({
          filename: migration.filename,
          status: 'failed',
          executionTimeMs: Date.now() - migrationStart,
          error: errorMessage,
        });
        failed++;
        break;
      }
    }

    return {
      applied,
      skipped,
      failed,
      results,
      totalTimeMs: Date.now() - startTime,
    };
  }

  /**
   * Files whose content changed after they were applied
   */
  async function verifyChecksums(files: Record<string, string>): Promise<ChecksumMismatch[]> {
    const migrations = parseMigrationFiles(files);
    const appliedMap = new Map((await getApplied()).map((m) => [m.filename, m.checksum]));
    const mismatches: ChecksumMismatch[] = [];

    for (const migration of migrations) {
      const appliedChecksum = appliedMap.get(migration.filename);
      if (appliedChecksum && appliedChecksum !== migration.checksum) {
        mismatches.push({
          filename: migration.filename,
          expected: appliedChecksum,
          actual: migration.checksum,
        });
      }
    }

    return mismatches;
  }

  return {
    ensureTable,
    getApplied,
    isApplied,
    run,
    verifyChecksums,
  };
}

export type MigrationManager = ReturnType<typeof createMigrationManager>;

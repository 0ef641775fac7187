/**
 * @fileoverview Tests for Database Migration Utilities
 *
 * Checksums, statement splitting, the shipped schema files and the
 * migration manager over a mock pool.
 */

import { describe, it, expect, beforeEach } from 'vitest';

import {
  computeChecksum,
  createMigrationManager,
  loadMigrationFiles,
  parseMigrationFiles,
  splitStatements,
} from '../src/migrations.js';
import { EMPTY_RESULT, MockSqlPool } from './repositories/mock-sql-pool.js';

describe('Migration Utilities', () => {
  describe('computeChecksum', () => {
    it('should return the first 16 hex chars of the SHA-256 digest', () => {
      expect(computeChecksum('')).toBe('e3b0c44298fc1c14');
    });

    it('should change with the content', () => {
      expect(computeChecksum('CREATE TABLE a (id INT);')).not.toBe(
        computeChecksum('CREATE TABLE b (id INT);')
      );
    });
  });

  describe('parseMigrationFiles', () => {
    it('should keep only .sql files in filename order', () => {
      const files = parseMigrationFiles({
        '002_indexes.sql': 'CREATE INDEX i ON a (id);',
        'README.md': '# Migrations',
        '001_init.sql': 'CREATE TABLE a (id INT);',
      });

      expect(files.map((file) => file.filename)).toEqual(['001_init.sql', '002_indexes.sql']);
      expect(files[0]?.checksum).toBe(computeChecksum('CREATE TABLE a (id INT);'));
    });
  });

  describe('splitStatements', () => {
    it('should split on line-ending semicolons and drop comment lines', () => {
      const content = [
        '-- create things',
        'CREATE TABLE a (',
        '    id INT',
        ');',
        '',
        'CREATE INDEX i ON a (id);',
      ].join('\n');

      expect(splitStatements(content)).toEqual([
        'CREATE TABLE a (\n    id INT\n)',
        'CREATE INDEX i ON a (id)',
      ]);
    });

    it('should return nothing for a comment-only file', () => {
      expect(splitStatements('-- nothing yet\n')).toEqual([]);
    });
  });

  describe('schema files', () => {
    it('should ship the postgres schema', async () => {
      const files = await loadMigrationFiles('postgres');
      const content = files['001_initial_schema.sql'] ?? '';

      expect(Object.keys(files)).toEqual(['001_initial_schema.sql']);
      expect(content).toContain('CONSTRAINT unique_user_service UNIQUE (user_id, service_id)');
      expect(content).toContain('CONSTRAINT unique_rating UNIQUE (rating_id)');
      expect(splitStatements(content)).toHaveLength(10);
    });

    it('should ship the mysql schema with the same constraint names', async () => {
      const files = await loadMigrationFiles('mysql');
      const content = files['001_initial_schema.sql'] ?? '';

      expect(content).toContain('UNIQUE KEY unique_user_service (user_id, service_id)');
      expect(content).toContain('UNIQUE KEY unique_rating (rating_id)');
      expect(content).toContain('UNIQUE KEY unique_email (email)');
      expect(splitStatements(content)).toHaveLength(4);
    });
  });

  describe('createMigrationManager', () => {
    let pool: MockSqlPool;

    beforeEach(() => {
      pool = new MockSqlPool('postgres');
    });

    it('should reject an unsafe table name', () => {
      expect(() => createMigrationManager({ pool, tableName: 'x; DROP TABLE users' })).toThrow(
        'Invalid migrations table name: x; DROP TABLE users'
      );
    });

    it('should apply a pending file statement by statement inside a transaction', async () => {
      const manager = createMigrationManager({ pool });

      const summary = await manager.run({
        '001_init.sql': 'CREATE TABLE a (id INT);\nCREATE TABLE b (id INT);\n',
      });

      expect(summary).toMatchObject({ applied: 1, skipped: 0, failed: 0 });
      expect(pool.transactions).toBe(1);
      expect(pool.sql(0)).toContain('CREATE TABLE IF NOT EXISTS schema_migrations');
      expect(pool.sql(0)).toContain('TIMESTAMPTZ');
      expect(pool.sql(1)).toBe('SELECT 1 FROM schema_migrations WHERE filename = $1');
      expect(pool.sql(2)).toBe('CREATE TABLE a (id INT)');
      expect(pool.sql(3)).toBe('CREATE TABLE b (id INT)');
      expect(pool.sql(4)).toContain('INSERT INTO schema_migrations');
      expect(pool.params(4)?.slice(0, 2)).toEqual([
        '001_init.sql',
        computeChecksum('CREATE TABLE a (id INT);\nCREATE TABLE b (id INT);\n'),
      ]);
    });

    it('should use mysql placeholders and column types', async () => {
      pool = new MockSqlPool('mysql');
      const manager = createMigrationManager({ pool, tableName: 'ratings_migrations' });

      await manager.run({ '001_init.sql': 'CREATE TABLE a (id INT);' });

      expect(pool.sql(0)).toContain('DATETIME(3)');
      expect(pool.sql(1)).toBe('SELECT 1 FROM ratings_migrations WHERE filename = ?');
    });

    it('should skip applied files', async () => {
      pool.query.mockImplementation(async (sql: string) =>
        sql.startsWith('SELECT 1') ? { rows: [{ applied: 1 }], rowCount: 1 } : EMPTY_RESULT
      );
      const manager = createMigrationManager({ pool });

      const summary = await manager.run({ '001_init.sql': 'CREATE TABLE a (id INT);' });

      expect(summary).toMatchObject({ applied: 0, skipped: 1, failed: 0 });
      expect(pool.transactions).toBe(0);
    });

    it('should skip everything on a dry run', async () => {
      const manager = createMigrationManager({ pool });

      const summary = await manager.run(
        { '001_init.sql': 'CREATE TABLE a (id INT);' },
        { dryRun: true }
      );

      expect(summary.results).toEqual([{ filename: '001_init.sql', status: 'skipped' }]);
    });

    it('should stop at the first failing file', async () => {
      pool.query.mockImplementation(async (sql: string) => {
        if (sql.includes('broken')) {
          throw new Error('syntax error at or near "broken"');
        }
        return EMPTY_RESULT;
      });
      const manager = createMigrationManager({ pool });

      const summary = await manager.run({
        '001_init.sql': 'CREATE TABLE broken;',
        '002_next.sql': 'CREATE TABLE next (id INT);',
      });

      expect(summary).toMatchObject({ applied: 0, skipped: 0, failed: 1 });
      expect(summary.results).toHaveLength(1);
      expect(summary.results[0]).toMatchObject({
        filename: '001_init.sql',
        status: 'failed',
        error: 'syntax error at or near "broken"',
      });
    });

    it('should report files changed after they were applied', async () => {
      pool.query.mockResolvedValueOnce({
        rows: [
          {
            filename: '001_init.sql',
            checksum: '0000000000000000',
            applied_at: new Date('2026-01-01T00:00:00.000Z'),
            execution_time_ms: 12,
          },
        ],
        rowCount: 1,
      });
      const manager = createMigrationManager({ pool });

      const mismatches = await manager.verifyChecksums({
        '001_init.sql': 'CREATE TABLE a (id INT);',
        '002_new.sql': 'CREATE TABLE b (id INT);',
      });

      expect(mismatches).toEqual([
        {
          filename: '001_init.sql',
          expected: '0000000000000000',
          actual: computeChecksum('CREATE TABLE a (id INT);'),
        },
      ]);
    });

    it('should map applied rows', async () => {
      pool.query.mockResolvedValueOnce({
        rows: [
          {
            filename: '001_init.sql',
            checksum: 'abc',
            applied_at: '2026-01-01T00:00:00.000Z',
            execution_time_ms: '7',
          },
        ],
        rowCount: 1,
      });
      const manager = createMigrationManager({ pool });

      expect(await manager.getApplied()).toEqual([
        {
          filename: '001_init.sql',
          checksum: 'abc',
          appliedAt: new Date('2026-01-01T00:00:00.000Z'),
          executionTimeMs: 7,
        },
      ]);
    });
  });
});

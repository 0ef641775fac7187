/**
 * @fileoverview MySQL Ratings Repository (Infrastructure Layer)
 *
 * Concrete MySQL adapter implementing the RatingsRepository port. Ids are
 * CHAR(36) and timestamps DATETIME(3) stored as UTC.
 *
 * @module @rateboard/infrastructure/repositories/mysql-ratings-repository
 *
 * @example
 * ```typescript
 * import { createMySqlPool, loadConfig } from '@rateboard/core';
 * import { MySqlRatingsRepository } from '@rateboard/infrastructure';
 *
 * const repository = new MySqlRatingsRepository({ pool: createMySqlPool(loadConfig().database) });
 * ```
 */

import type { SqlRow } from '@rateboard/core';
import type { Rating } from '@rateboard/domain';

import { SqlRatingsRepository, type SqlRatingsRepositoryConfig } from './SqlRatingsRepository.js';

const ER_DUP_ENTRY = 1062;

/** "Duplicate entry 'x' for key 'ratings.unique_user_service'" (older servers omit the table) */
const DUPLICATE_KEY_PATTERN = /for key '(?:[^'.]+\.)?([^']+)'/;

/** DATETIME as text: 2026-03-01 10:00:00.000 */
const DATETIME_TEXT_PATTERN = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}(\.\d+)?$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export class MySqlRatingsRepository extends SqlRatingsRepository {
  protected override readonly repositoryName = 'MySqlRatingsRepository';

  constructor(config: SqlRatingsRepositoryConfig) {
    super(config, 'mysql-ratings-repository');
  }

  protected override placeholder(): string {
    return '?';
  }

  protected override uniqueViolation(error: unknown): string | undefined {
    if (!isRecord(error) || (error.errno !== ER_DUP_ENTRY && error.code !== 'ER_DUP_ENTRY')) {
      return undefined;
    }
    const message = typeof error.message === 'string' ? error.message : '';
    return DUPLICATE_KEY_PATTERN.exec(message)?.[1] ?? 'unknown';
  }

  protected override parseTimestamp(value: unknown): Date | undefined {
    if (value instanceof Date) {
      return value;
    }
    if (typeof value === 'string' && DATETIME_TEXT_PATTERN.test(value)) {
      return new Date(`${value.replace(' ', 'T')}Z`);
    }
    return undefined;
  }

  /**
   * ON DUPLICATE KEY UPDATE followed by a read of the stored row. The insert
   * happened when the stored id is the one we sent. The row alias needs
   * MySQL 8.0.19 or later.
   */
  protected override async executeUpsert(rating: Rating): Promise<{ row: SqlRow; created: boolean }> {
    const upsert = `INSERT INTO ratings (id, user_id, service_id, score, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?) AS incoming
       ON DUPLICATE KEY UPDATE score = incoming.score, updated_at = incoming.updated_at`;
    const select = `SELECT id, user_id, service_id, score, created_at, updated_at
       FROM ratings WHERE user_id = ? AND service_id = ?`;

    return this.pool.transaction(async (client) => {
      this.logger.debug({ operation: 'upsertRating', sql: upsert }, 'Executing query');
      await client.query(upsert, [
        rating.id,
        rating.userId,
        rating.serviceId,
        rating.score,
        rating.createdAt,
        rating.updatedAt,
      ]);

      const result = await client.query(select, [rating.userId, rating.serviceId]);
      const row = result.rows[0];
      if (!row) {
        throw new Error('Upserted rating could not be read back');
      }
      return { row, created: row.id === rating.id };
    });
  }
}

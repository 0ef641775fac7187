/**
 * @fileoverview PostgreSQL Ratings Repository (Infrastructure Layer)
 *
 * Concrete PostgreSQL adapter implementing the RatingsRepository port from
 * the domain layer.
 *
 * @module @rateboard/infrastructure/repositories/postgres-ratings-repository
 *
 * @example
 * ```typescript
 * import { createPostgresPool, loadConfig } from '@rateboard/core';
 * import { PostgresRatingsRepository } from '@rateboard/infrastructure';
 *
 * const repository = new PostgresRatingsRepository({
 *   pool: createPostgresPool(loadConfig().database),
 * });
 *
 * const average = await repository.calculateAverageRating(serviceId);
 * ```
 */

import type { SqlRow } from '@rateboard/core';
import type { Rating } from '@rateboard/domain';

import { SqlRatingsRepository, type SqlRatingsRepositoryConfig } from './SqlRatingsRepository.js';

/** SQLSTATE unique_violation */
const UNIQUE_VIOLATION = '23505';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export class PostgresRatingsRepository extends SqlRatingsRepository {
  protected override readonly repositoryName = 'PostgresRatingsRepository';

  constructor(config: SqlRatingsRepositoryConfig) {
    super(config, 'postgres-ratings-repository');
  }

  protected override placeholder(position: number): string {
    return `$${position}`;
  }

  protected override uniqueViolation(error: unknown): string | undefined {
    if (!isRecord(error) || error.code !== UNIQUE_VIOLATION) {
      return undefined;
    }
    return typeof error.constraint === 'string' ? error.constraint : 'unknown';
  }

  protected override parseTimestamp(value: unknown): Date | undefined {
    if (value instanceof Date) {
      return value;
    }
    return typeof value === 'string' ? new Date(value) : undefined;
  }

  /**
   * xmax is 0 only on a freshly inserted tuple
   */
  protected override async executeUpsert(rating: Rating): Promise<{ row: SqlRow; created: boolean }> {
    const sql = `INSERT INTO ratings (id, user_id, service_id, score, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT ON CONSTRAINT unique_user_service
       DO UPDATE SET score = EXCLUDED.score, updated_at = EXCLUDED.updated_at
       RETURNING id, user_id, service_id, score, created_at, updated_at, (xmax = 0) AS was_created`;
    this.logger.debug({ operation: 'upsertRating', sql }, 'Executing query');

    const result = await this.pool.query(sql, [
      rating.id,
      rating.userId,
      rating.serviceId,
      rating.score,
      rating.createdAt,
      rating.updatedAt,
    ]);
    const row = result.rows[0];
    if (!row) {
      throw new Error('Upsert returned no row');
    }
    return { row, created: row.was_created === true };
  }
}

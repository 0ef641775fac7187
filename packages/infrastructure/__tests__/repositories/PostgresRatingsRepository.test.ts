/**
 * @fileoverview PostgresRatingsRepository dialect tests
 *
 * Runs against a mock pool: placeholders, ORDER BY interpolation, row
 * coercion and error translation.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ConflictError,
  OperationCancelledError,
  RecordNotFoundError,
  RepositoryError,
} from '@rateboard/core';
import { Pagination, Rating } from '@rateboard/domain';

import { PostgresRatingsRepository } from '../../src/repositories/PostgresRatingsRepository.js';
import { captureError } from './ratings-repository.conformance.js';
import { MockSqlPool } from './mock-sql-pool.js';

const RATING_ID = '4b3a2918-0706-4f5e-8d4c-3b2a19080706';
const USER_ID = '5c4b3a29-1807-4e6f-9a5b-4c3b2a190807';
const SERVICE_ID = '6d5c4b3a-2918-4f70-8b6c-5d4c3b2a1908';
const CREATED_AT = new Date('2026-06-01T08:00:00.000Z');

function ratingRow(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: RATING_ID,
    user_id: USER_ID,
    service_id: SERVICE_ID,
    score: 4,
    created_at: CREATED_AT,
    updated_at: CREATED_AT,
    ...overrides,
  };
}

describe('PostgresRatingsRepository', () => {
  let pool: MockSqlPool;
  let repository: PostgresRatingsRepository;

  beforeEach(() => {
    pool = new MockSqlPool('postgres');
    repository = new PostgresRatingsRepository({ pool });
  });

  describe('queries', () => {
    it('should look up a rating with a numbered placeholder', async () => {
      pool.query.mockResolvedValueOnce({ rows: [ratingRow()], rowCount: 1 });

      const rating = await repository.getRatingById(RATING_ID);

      expect(pool.sql(0)).toBe(
        'SELECT id, user_id, service_id, score, created_at, updated_at FROM ratings WHERE id = $1'
      );
      expect(pool.params(0)).toEqual([RATING_ID]);
      expect(rating.toJSON()).toEqual({
        id: RATING_ID,
        userId: USER_ID,
        serviceId: SERVICE_ID,
        score: 4,
        createdAt: CREATED_AT,
        updatedAt: CREATED_AT,
      });
    });

    it('should throw not found for an empty result', async () => {
      const error = await captureError(repository.getRatingById(RATING_ID));

      expect(error).toBeInstanceOf(RecordNotFoundError);
      expect(error instanceof RecordNotFoundError && error.message).toBe(
        `Rating not found: ${RATING_ID}`
      );
    });

    it('should page with bound limit and offset and count separately', async () => {
      pool.query
        .mockResolvedValueOnce({ rows: [ratingRow()], rowCount: 1 })
        .mockResolvedValueOnce({ rows: [{ total: '12' }], rowCount: 1 });

      const result = await repository.listRatingsByService(
        SERVICE_ID,
        Pagination.fromOffset({ limit: 5, offset: 10, sortBy: 'Score', sortDirection: 'ASC' })
      );

      expect(pool.sql(0)).toContain('ORDER BY score ASC, id ASC');
      expect(pool.sql(0)).toContain('LIMIT $2 OFFSET $3');
      expect(pool.params(0)).toEqual([SERVICE_ID, 5, 10]);
      expect(pool.sql(1)).toBe('SELECT COUNT(*) AS total FROM ratings WHERE service_id = $1');
      expect(result).toMatchObject({ total: 12, limit: 5, offset: 10, hasMore: true });
      expect(result.items).toHaveLength(1);
    });

    it('should never interpolate an unknown sort column', async () => {
      await repository.listRatingsByService(
        SERVICE_ID,
        Pagination.fromOffset({ sortBy: 'score; DROP TABLE ratings', sortDirection: 'asc' })
      );

      expect(pool.sql(0)).toContain('ORDER BY created_at ASC, id ASC');
      expect(pool.sql(0)).not.toContain('DROP');
    });

    it('should qualify review sort columns across the join', async () => {
      await repository.listReviewsByService(
        SERVICE_ID,
        Pagination.fromOffset({ sortBy: 'score', sortDirection: 'desc' })
      );
      await repository.listReviewsByService(SERVICE_ID, Pagination.default());

      expect(pool.sql(0)).toContain('ORDER BY rt.score DESC, r.id ASC');
      expect(pool.sql(0)).toContain('JOIN ratings rt ON rt.id = r.rating_id');
      expect(pool.sql(2)).toContain('ORDER BY r.created_at DESC, r.id ASC');
    });

    it('should list comments oldest first by default', async () => {
      await repository.listCommentsByReview(RATING_ID, Pagination.default());

      expect(pool.sql(0)).toContain('ORDER BY created_at ASC, id ASC');
    });
  });

  describe('calculateAverageRating', () => {
    it('should coerce numeric strings', async () => {
      pool.query.mockResolvedValueOnce({
        rows: [{ average_score: '4.0000000000000000', total_ratings: '3' }],
        rowCount: 1,
      });

      expect(await repository.calculateAverageRating(SERVICE_ID)).toEqual({
        serviceId: SERVICE_ID,
        averageScore: 4,
        totalRatings: 3,
      });
    });

    it('should map a null average to zero', async () => {
      pool.query.mockResolvedValueOnce({
        rows: [{ average_score: null, total_ratings: '0' }],
        rowCount: 1,
      });

      expect(await repository.calculateAverageRating(SERVICE_ID)).toEqual({
        serviceId: SERVICE_ID,
        averageScore: 0,
        totalRatings: 0,
      });
    });
  });

  describe('upsertRating', () => {
    it('should upsert in one statement and report insertion from xmax', async () => {
      pool.query.mockResolvedValueOnce({ rows: [ratingRow({ was_created: true })], rowCount: 1 });
      const rating = Rating.create({ userId: USER_ID, serviceId: SERVICE_ID, score: 4 }, CREATED_AT);

      const result = await repository.upsertRating(rating);

      expect(pool.query).toHaveBeenCalledTimes(1);
      expect(pool.sql(0)).toContain('ON CONFLICT ON CONSTRAINT unique_user_service');
      expect(pool.params(0)).toEqual([rating.id, USER_ID, SERVICE_ID, 4, CREATED_AT, CREATED_AT]);
      expect(result.created).toBe(true);
      expect(result.rating.id).toBe(RATING_ID);
    });

    it('should report an overwrite', async () => {
      pool.query.mockResolvedValueOnce({
        rows: [ratingRow({ score: 2, was_created: false })],
        rowCount: 1,
      });
      const rating = Rating.create({ userId: USER_ID, serviceId: SERVICE_ID, score: 2 });

      const result = await repository.upsertRating(rating);

      expect(result.created).toBe(false);
      expect(result.rating.score).toBe(2);
    });
  });

  describe('error translation', () => {
    it('should turn SQLSTATE 23505 into a conflict named by the constraint', async () => {
      pool.query.mockRejectedValueOnce(
        Object.assign(new Error('duplicate key value violates unique constraint'), {
          code: '23505',
          constraint: 'unique_user_service',
        })
      );
      const rating = Rating.create({ userId: USER_ID, serviceId: SERVICE_ID, score: 3 });

      const error = await captureError(repository.createRating(rating));

      expect(error).toBeInstanceOf(ConflictError);
      expect(error instanceof ConflictError && error.toSafeError()).toEqual({
        kind: 'CONFLICT',
        code: 'ALREADY_EXISTS',
        message: 'Rating already exists for this user and service',
      });
    });

    it('should wrap other failures with the operation', async () => {
      const cause = Object.assign(new Error('connection terminated'), { code: '57P01' });
      pool.query.mockRejectedValueOnce(cause);

      const error = await captureError(repository.getRatingById(RATING_ID));

      expect(error).toBeInstanceOf(RepositoryError);
      if (error instanceof RepositoryError) {
        expect(error.repository).toBe('PostgresRatingsRepository');
        expect(error.operation).toBe('getRatingById');
        expect(error.originalError).toBe(cause);
      }
    });

    it('should throw not found when an update matches no row', async () => {
      const rating = Rating.create({ userId: USER_ID, serviceId: SERVICE_ID, score: 3 });

      const error = await captureError(repository.updateRating(rating));

      expect(error).toBeInstanceOf(RecordNotFoundError);
    });

    it('should reject an unreadable timestamp as a storage error', async () => {
      pool.query.mockResolvedValueOnce({ rows: [ratingRow({ created_at: 17 })], rowCount: 1 });

      const error = await captureError(repository.getRatingById(RATING_ID));

      expect(error).toBeInstanceOf(RepositoryError);
      expect(error instanceof RepositoryError && error.message).toBe(
        'Unexpected number in column created_at'
      );
    });
  });

  describe('cancellation', () => {
    it('should not send a query when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const error = await captureError(
        repository.getRatingById(RATING_ID, { signal: controller.signal })
      );

      expect(error).toBeInstanceOf(OperationCancelledError);
      expect(pool.query).not.toHaveBeenCalled();
    });

    it('should settle promptly when aborted mid-query', async () => {
      pool.query.mockReturnValueOnce(new Promise(() => undefined));
      const controller = new AbortController();

      const pending = captureError(
        repository.getRatingById(RATING_ID, { signal: controller.signal })
      );
      controller.abort();

      const error = await pending;
      expect(error).toBeInstanceOf(OperationCancelledError);
      expect(error instanceof OperationCancelledError && error.operation).toBe('getRatingById');
    });
  });
});

/**
 * @fileoverview MySqlRatingsRepository dialect tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ConflictError, RepositoryError } from '@rateboard/core';
import { Pagination, Rating, User } from '@rateboard/domain';

import { MySqlRatingsRepository } from '../../src/repositories/MySqlRatingsRepository.js';
import { captureError } from './ratings-repository.conformance.js';
import { MockSqlPool } from './mock-sql-pool.js';

const USER_ID = 'a1b2c3d4-e5f6-4a7b-8c9d-0e1f2a3b4c5d';
const SERVICE_ID = 'b2c3d4e5-f6a7-4b8c-9d0e-1f2a3b4c5d6e';
const STORED_ID = 'c3d4e5f6-a7b8-4c9d-8e1f-2a3b4c5d6e7f';

function duplicateEntry(key: string): Error {
  return Object.assign(new Error(`Duplicate entry 'x' for key '${key}'`), {
    errno: 1062,
    code: 'ER_DUP_ENTRY',
  });
}

describe('MySqlRatingsRepository', () => {
  let pool: MockSqlPool;
  let repository: MySqlRatingsRepository;

  beforeEach(() => {
    pool = new MockSqlPool('mysql');
    repository = new MySqlRatingsRepository({ pool });
  });

  it('should use positional placeholders', async () => {
    await repository.listCommentsByReview(
      SERVICE_ID,
      Pagination.fromOffset({ limit: 20, offset: 40 })
    );

    expect(pool.sql(0)).toContain('WHERE review_id = ?');
    expect(pool.sql(0)).toContain('LIMIT ? OFFSET ?');
    expect(pool.params(0)).toEqual([SERVICE_ID, 20, 40]);
    expect(pool.sql(1)).toBe('SELECT COUNT(*) AS total FROM comments WHERE review_id = ?');
  });

  it('should read DATETIME text as UTC and numeric counts', async () => {
    pool.query
      .mockResolvedValueOnce({
        rows: [
          {
            id: STORED_ID,
            user_id: USER_ID,
            service_id: SERVICE_ID,
            score: 5,
            created_at: '2026-03-01 10:00:00.250',
            updated_at: new Date('2026-03-02T00:00:00.000Z'),
          },
        ],
        rowCount: 1,
      })
      .mockResolvedValueOnce({ rows: [{ total: 1 }], rowCount: 1 });

    const result = await repository.listRatingsByService(SERVICE_ID, Pagination.default());

    expect(result.total).toBe(1);
    expect(result.items[0]?.createdAt).toEqual(new Date('2026-03-01T10:00:00.250Z'));
    expect(result.items[0]?.updatedAt).toEqual(new Date('2026-03-02T00:00:00.000Z'));
  });

  describe('duplicate keys', () => {
    it('should read the key name from a table-qualified message', async () => {
      pool.query.mockRejectedValueOnce(duplicateEntry('ratings.unique_user_service'));
      const rating = Rating.create({ userId: USER_ID, serviceId: SERVICE_ID, score: 3 });

      const error = await captureError(repository.createRating(rating));

      expect(error).toBeInstanceOf(ConflictError);
      expect(error instanceof ConflictError && error.constraint).toBe('unique_user_service');
      expect(error instanceof ConflictError && error.recordType).toBe('Rating');
    });

    it('should read the key name from an unqualified message', async () => {
      pool.query.mockRejectedValueOnce(duplicateEntry('unique_email'));
      const user = User.create({
        username: 'sam',
        email: 'sam@example.com',
        passwordHash: 'hashed',
      });

      const error = await captureError(repository.createUser(user));

      expect(error instanceof ConflictError && error.message).toBe('Email is already registered');
    });

    it('should leave other errors as storage failures', async () => {
      pool.query.mockRejectedValueOnce(
        Object.assign(new Error('Cannot add or update a child row'), { errno: 1452 })
      );
      const rating = Rating.create({ userId: USER_ID, serviceId: SERVICE_ID, score: 3 });

      const error = await captureError(repository.createRating(rating));

      expect(error).toBeInstanceOf(RepositoryError);
      expect(error instanceof RepositoryError && error.repository).toBe('MySqlRatingsRepository');
    });
  });

  describe('upsertRating', () => {
    function storedRow(id: string, score: number): Record<string, unknown> {
      return {
        id,
        user_id: USER_ID,
        service_id: SERVICE_ID,
        score,
        created_at: new Date('2026-01-01T00:00:00.000Z'),
        updated_at: new Date('2026-01-02T00:00:00.000Z'),
      };
    }

    it('should report an insert when the stored id is the new one', async () => {
      const rating = Rating.create({ userId: USER_ID, serviceId: SERVICE_ID, score: 4 });
      pool.query
        .mockResolvedValueOnce({ rows: [], rowCount: 1 })
        .mockResolvedValueOnce({ rows: [storedRow(rating.id, 4)], rowCount: 1 });

      const result = await repository.upsertRating(rating);

      expect(pool.transactions).toBe(1);
      expect(pool.sql(0)).toContain('VALUES (?, ?, ?, ?, ?, ?) AS incoming');
      expect(pool.sql(0)).toContain(
        'ON DUPLICATE KEY UPDATE score = incoming.score, updated_at = incoming.updated_at'
      );
      expect(pool.sql(0)).not.toContain('VALUES(score)');
      expect(pool.params(1)).toEqual([USER_ID, SERVICE_ID]);
      expect(result.created).toBe(true);
    });

    it('should report an overwrite when an older row kept its id', async () => {
      const rating = Rating.create({ userId: USER_ID, serviceId: SERVICE_ID, score: 1 });
      pool.query
        .mockResolvedValueOnce({ rows: [], rowCount: 2 })
        .mockResolvedValueOnce({ rows: [storedRow(STORED_ID, 1)], rowCount: 1 });

      const result = await repository.upsertRating(rating);

      expect(result.created).toBe(false);
      expect(result.rating.id).toBe(STORED_ID);
      expect(result.rating.score).toBe(1);
    });
  });
});

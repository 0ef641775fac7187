import { describe, it, expect } from 'vitest';
import { Pagination } from '@rateboard/domain';

import { orderByClause, resolveSort } from '../../src/repositories/sort-columns.js';

describe('resolveSort', () => {
  it.each([
    ['ratings', 'desc'],
    ['reviews', 'desc'],
    ['comments', 'asc'],
  ] as const)('should default %s to created_at %s', (entity, direction) => {
    expect(resolveSort(entity, Pagination.default())).toEqual({ column: 'created_at', direction });
  });

  it('should match allowed columns case-insensitively', () => {
    const pagination = Pagination.fromOffset({ sortBy: 'Updated_At', sortDirection: 'asc' });

    expect(resolveSort('comments', pagination)).toEqual({ column: 'updated_at', direction: 'asc' });
  });

  it('should keep allow-lists per entity', () => {
    const byScore = Pagination.fromOffset({ sortBy: 'score', sortDirection: 'asc' });
    const byTitle = Pagination.fromOffset({ sortBy: 'title', sortDirection: 'asc' });

    expect(resolveSort('reviews', byScore).column).toBe('score');
    expect(resolveSort('comments', byScore).column).toBe('created_at');
    expect(resolveSort('reviews', byTitle).column).toBe('title');
    expect(resolveSort('ratings', byTitle).column).toBe('created_at');
  });

  it('should keep the requested direction when falling back', () => {
    const pagination = Pagination.fromOffset({ sortBy: 'user_id' });

    expect(resolveSort('comments', pagination)).toEqual({
      column: 'created_at',
      direction: 'desc',
    });
  });
});

describe('orderByClause', () => {
  it('should add the id tie-breaker', () => {
    expect(orderByClause('ratings', Pagination.default())).toBe('ORDER BY created_at DESC, id ASC');
  });

  it('should apply the qualifier to both keys', () => {
    const clause = orderByClause(
      'reviews',
      Pagination.fromOffset({ sortBy: 'content', sortDirection: 'asc' }),
      (column) => `r.${column}`
    );

    expect(clause).toBe('ORDER BY r.content ASC, r.id ASC');
  });
});

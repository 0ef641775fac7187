/**
 * Sort column allow-lists
 *
 * Only names in these lists are ever interpolated into ORDER BY; everything
 * else falls back to created_at.
 */

import type { Pagination, SortDirection } from '@rateboard/domain';

export type SortableEntity = 'ratings' | 'reviews' | 'comments';

export const SORT_COLUMNS = {
  ratings: ['score', 'created_at', 'updated_at'],
  reviews: ['score', 'created_at', 'updated_at', 'title', 'content'],
  comments: ['created_at', 'updated_at', 'content'],
} as const satisfies Record<SortableEntity, readonly string[]>;

export type SortColumn = (typeof SORT_COLUMNS)[SortableEntity][number];

/** Direction used when the caller asked for no sort at all */
const UNSORTED_DIRECTION: Record<SortableEntity, SortDirection> = {
  ratings: 'desc',
  reviews: 'desc',
  comments: 'asc',
};

const FALLBACK_COLUMN: SortColumn = 'created_at';

export interface ResolvedSort {
  column: SortColumn;
  direction: SortDirection;
}

function isAllowed(entity: SortableEntity, column: string): column is SortColumn {
  const allowed: readonly string[] = SORT_COLUMNS[entity];
  return allowed.includes(column);
}

/**
 * Map the requested sort onto an allowed column, case-insensitively
 *
 * @example
 * ```typescript
 * resolveSort('comments', Pagination.default()); // { column: 'created_at', direction: 'asc' }
 * resolveSort('ratings', Pagination.fromOffset({ sortBy: 'SCORE', sortDirection: 'asc' }));
 * // { column: 'score', direction: 'asc' }
 * ```
 */
export function resolveSort(entity: SortableEntity, pagination: Pagination): ResolvedSort {
  if (pagination.sortBy === undefined) {
    return { column: FALLBACK_COLUMN, direction: UNSORTED_DIRECTION[entity] };
  }

  const requested = pagination.sortBy.toLowerCase();
  return {
    column: isAllowed(entity, requested) ? requested : FALLBACK_COLUMN,
    direction: pagination.sortDirection,
  };
}

/**
 * ORDER BY clause with id as the tie-breaker
 *
 * @param qualify - prefixes a column with its table alias
 */
export function orderByClause(
  entity: SortableEntity,
  pagination: Pagination,
  qualify: (column: string) => string = (column) => column
): string {
  const { column, direction } = resolveSort(entity, pagination);
  return `ORDER BY ${qualify(column)} ${direction.toUpperCase()}, ${qualify('id')} ASC`;
}

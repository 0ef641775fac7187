/**
 * @fileoverview Pagination Contract
 *
 * One value object for both page-based and offset-based callers. The offset
 * is authoritative; the page number is derived from it.
 *
 * @module domain/shared/pagination
 */

export type SortDirection = 'asc' | 'desc';

export const DEFAULT_LIMIT = 10;
export const DEFAULT_SORT_DIRECTION: SortDirection = 'desc';

export interface OffsetPaginationInput {
  limit?: number;
  offset?: number;
  sortBy?: string;
  sortDirection?: string;
}

export interface PagePaginationInput {
  page?: number;
  limit?: number;
  sortBy?: string;
  sortDirection?: string;
}

function normalizeLimit(limit: number | undefined): number {
  return limit !== undefined && Number.isInteger(limit) && limit > 0 ? limit : DEFAULT_LIMIT;
}

function normalizeOffset(offset: number | undefined): number {
  return offset !== undefined && Number.isInteger(offset) && offset >= 0 ? offset : 0;
}

function normalizePage(page: number | undefined): number {
  return page !== undefined && Number.isInteger(page) && page > 0 ? page : 1;
}

function normalizeSortBy(sortBy: string | undefined): string | undefined {
  const trimmed = sortBy?.trim();
  return trimmed ? trimmed : undefined;
}

function normalizeSortDirection(direction: string | undefined): SortDirection {
  const lowered = direction?.trim().toLowerCase();
  return lowered === 'asc' || lowered === 'desc' ? lowered : DEFAULT_SORT_DIRECTION;
}

/**
 * Normalised pagination and sorting parameters
 *
 * @example
 * ```typescript
 * Pagination.fromPage({ page: 3, limit: 20 }).offset; // 40
 * Pagination.fromOffset({ limit: 20, offset: 45 }).page; // 3, offset stays 45
 * ```
 */
export class Pagination {
  private constructor(
    readonly limit: number,
    readonly offset: number,
    readonly sortBy: string | undefined,
    readonly sortDirection: SortDirection
  ) {}

  /**
   * limit <= 0 becomes 10, offset < 0 becomes 0, unknown direction becomes desc
   */
  static fromOffset(input: OffsetPaginationInput = {}): Pagination {
    return new Pagination(
      normalizeLimit(input.limit),
      normalizeOffset(input.offset),
      normalizeSortBy(input.sortBy),
      normalizeSortDirection(input.sortDirection)
    );
  }

  /**
   * page <= 0 becomes 1; offset is (page - 1) * limit
   */
  static fromPage(input: PagePaginationInput = {}): Pagination {
    const limit = normalizeLimit(input.limit);
    const page = normalizePage(input.page);
    return new Pagination(
      limit,
      (page - 1) * limit,
      normalizeSortBy(input.sortBy),
      normalizeSortDirection(input.sortDirection)
    );
  }

  static default(): Pagination {
    return new Pagination(DEFAULT_LIMIT, 0, undefined, DEFAULT_SORT_DIRECTION);
  }

  /** 1-based page containing the first item */
  get page(): number {
    return Math.floor(this.offset / this.limit) + 1;
  }

  equals(other: Pagination): boolean {
    return (
      this.limit === other.limit &&
      this.offset === other.offset &&
      this.sortBy === other.sortBy &&
      this.sortDirection === other.sortDirection
    );
  }
}

export interface PaginatedResult<T> {
  items: T[];
  /** Count over the same predicate, taken independently of the page query */
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

export function toPaginatedResult<T>(
  items: T[],
  total: number,
  pagination: Pagination
): PaginatedResult<T> {
  return {
    items,
    total,
    limit: pagination.limit,
    offset: pagination.offset,
    hasMore: pagination.offset + items.length < total,
  };
}

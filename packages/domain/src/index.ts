/**
 * @fileoverview Domain Package Exports
 *
 * Entities, validation schemas, the Pagination Contract and the repository
 * port for ratings, reviews and comments.
 *
 * @module @rateboard/domain
 *
 * @example
 * ```typescript
 * import { Rating, Pagination, type RatingsRepository } from '@rateboard/domain';
 *
 * const rating = Rating.create({ userId, serviceId, score: 4 });
 * const page = await repository.listRatingsByService(serviceId, Pagination.fromPage({ page: 2 }));
 * ```
 */

export * from './ratings/index.js';

export {
  Pagination,
  toPaginatedResult,
  DEFAULT_LIMIT,
  DEFAULT_SORT_DIRECTION,
  type SortDirection,
  type PaginatedResult,
  type OffsetPaginationInput,
  type PagePaginationInput,
} from './shared/pagination.js';

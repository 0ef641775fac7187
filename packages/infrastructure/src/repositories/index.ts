/**
 * Ratings repository adapters
 */

export {
  SqlRatingsRepository,
  type SqlRatingsRepositoryConfig,
} from './SqlRatingsRepository.js';
export { PostgresRatingsRepository } from './PostgresRatingsRepository.js';
export { MySqlRatingsRepository } from './MySqlRatingsRepository.js';
export {
  InMemoryRatingsRepository,
  type InMemoryRatingsRepositoryConfig,
} from './InMemoryRatingsRepository.js';
export {
  SORT_COLUMNS,
  resolveSort,
  orderByClause,
  type SortableEntity,
  type SortColumn,
  type ResolvedSort,
} from './sort-columns.js';
export { UNIQUE_CONSTRAINTS, conflictFor, type UniqueConstraint } from './constraints.js';

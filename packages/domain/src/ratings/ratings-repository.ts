/**
 * Ratings Repository Interface (Port)
 *
 * Defines the contract for users, ratings, reviews and comments persistence.
 * This is a PORT in hexagonal architecture - implementations (adapters)
 * are provided by the infrastructure layer (@rateboard/infrastructure).
 *
 * Available Adapters:
 * - PostgresRatingsRepository: PostgreSQL implementation (pg)
 * - MySqlRatingsRepository: MySQL implementation (mysql2)
 * - InMemoryRatingsRepository: Test/development implementation
 *
 * Error contract:
 * - RecordNotFoundError for absent rows on lookups and updates
 * - ConflictError for uniqueness violations, whatever the backend
 * - OperationCancelledError when options.signal aborts
 * - RepositoryError for every other storage failure
 *
 * @module domain/ratings/ratings-repository
 */

import type { QueryOptions } from '@rateboard/core';

import type { PaginatedResult, Pagination } from '../shared/pagination.js';
import type { Comment } from './entities/comment.js';
import type { AverageRating, Rating } from './entities/rating.js';
import type { Review, ReviewWithRating } from './entities/review.js';
import type { User } from './entities/user.js';

export interface UpsertRatingResult {
  rating: Rating;
  /** false when an existing (user, service) rating was overwritten */
  created: boolean;
}

/**
 * Ratings Repository Interface (Port)
 *
 * @example
 * ```typescript
 * import { PostgresRatingsRepository } from '@rateboard/infrastructure';
 *
 * const repository = new PostgresRatingsRepository({ pool: createPostgresPool(config.database) });
 * const service = new RatingService({ repository });
 * ```
 */
export interface RatingsRepository {
  // ==========================================================================
  // Users
  // ==========================================================================

  createUser(user: User, options?: QueryOptions): Promise<void>;

  getUserById(id: string, options?: QueryOptions): Promise<User>;

  getUserByEmail(email: string, options?: QueryOptions): Promise<User>;

  getUserByUsername(username: string, options?: QueryOptions): Promise<User>;

  // ==========================================================================
  // Ratings
  // ==========================================================================

  /**
   * Plain insert; a duplicate (user, service) pair throws ConflictError
   */
  createRating(rating: Rating, options?: QueryOptions): Promise<void>;

  /**
   * Insert, or overwrite the score of the existing (user, service) rating in
   * one statement. The stored id and createdAt survive an overwrite.
   */
  upsertRating(rating: Rating, options?: QueryOptions): Promise<UpsertRatingResult>;

  getRatingById(id: string, options?: QueryOptions): Promise<Rating>;

  getRatingByUserAndService(
    userId: string,
    serviceId: string,
    options?: QueryOptions
  ): Promise<Rating>;

  listRatingsByService(
    serviceId: string,
    pagination: Pagination,
    options?: QueryOptions
  ): Promise<PaginatedResult<Rating>>;

  updateRating(rating: Rating, options?: QueryOptions): Promise<void>;

  /**
   * averageScore is 0 for a service with no ratings
   */
  calculateAverageRating(serviceId: string, options?: QueryOptions): Promise<AverageRating>;

  // ==========================================================================
  // Reviews
  // ==========================================================================

  /**
   * A second review for the same rating throws ConflictError
   */
  createReview(review: Review, options?: QueryOptions): Promise<void>;

  getReviewById(id: string, options?: QueryOptions): Promise<ReviewWithRating>;

  listReviewsByService(
    serviceId: string,
    pagination: Pagination,
    options?: QueryOptions
  ): Promise<PaginatedResult<ReviewWithRating>>;

  /**
   * Persists title, content and updatedAt
   */
  updateReview(review: Review, options?: QueryOptions): Promise<void>;

  // ==========================================================================
  // Comments
  // ==========================================================================

  createComment(comment: Comment, options?: QueryOptions): Promise<void>;

  getCommentById(id: string, options?: QueryOptions): Promise<Comment>;

  /**
   * Oldest first unless a sort is requested
   */
  listCommentsByReview(
    reviewId: string,
    pagination: Pagination,
    options?: QueryOptions
  ): Promise<PaginatedResult<Comment>>;

  updateComment(comment: Comment, options?: QueryOptions): Promise<void>;
}

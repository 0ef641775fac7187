/**
 * @fileoverview Primary Port - RatingUseCases
 *
 * Defines what the application offers to the outside world (driving side).
 * An HTTP or CLI adapter authenticates the caller, parses identifiers and
 * calls these operations; it maps `error.kind` to its own status codes.
 *
 * @module application/ports/primary/RatingUseCases
 */

import type {
  ConflictError,
  OperationCancelledError,
  OwnershipMismatchError,
  QueryOptions,
  RecordNotFoundError,
  RepositoryError,
  ValidationError,
} from '@rateboard/core';
import type {
  AverageRating,
  Comment,
  PaginatedResult,
  Pagination,
  Rating,
  ReviewWithRating,
  User,
} from '@rateboard/domain';

import type { Result } from '../../shared/Result.js';

/**
 * Every failure a use case can return
 */
export type RatingServiceError =
  | ValidationError
  | RecordNotFoundError
  | OwnershipMismatchError
  | ConflictError
  | RepositoryError
  | OperationCancelledError;

export type UseCaseResult<T> = Promise<Result<T, RatingServiceError>>;

// ============================================================================
// REQUEST TYPES
// ============================================================================

export interface CreateRatingRequest {
  userId: string;
  serviceId: string;
  score: number;
}

export interface UpdateRatingRequest {
  id: string;
  score: number;
  /** Required when edits are restricted to authors */
  actorId?: string;
}

export interface CreateReviewRequest {
  userId: string;
  serviceId: string;
  ratingId: string;
  title: string;
  content: string;
}

export interface UpdateReviewRequest {
  id: string;
  title: string;
  content: string;
  /** Required when edits are restricted to authors */
  actorId?: string;
}

export interface CreateCommentRequest {
  userId: string;
  reviewId: string;
  content: string;
}

export interface UpdateCommentRequest {
  id: string;
  content: string;
  /** Required when edits are restricted to authors */
  actorId?: string;
}

export interface RegisterUserRequest {
  username: string;
  email: string;
  /** Already hashed by the authentication collaborator */
  passwordHash: string;
}

/**
 * PRIMARY PORT: ratings, reviews and comments
 *
 * @example
 * ```typescript
 * const result = await useCases.createReview(request, { signal: req.signal });
 * if (isErr(result)) {
 *   return reply.status(statusFor(result.error.kind)).send(result.error.toSafeError());
 * }
 * return reply.status(201).send(result.value);
 * ```
 */
export interface RatingUseCases {
  // Ratings

  /**
   * Business Rules:
   * - score is an integer in [1, 5]
   * - a repeat rating for the same service overwrites the score
   */
  createRating(request: CreateRatingRequest, options?: QueryOptions): UseCaseResult<Rating>;

  getRatingById(id: string, options?: QueryOptions): UseCaseResult<Rating>;

  getRatingByUserAndService(
    userId: string,
    serviceId: string,
    options?: QueryOptions
  ): UseCaseResult<Rating>;

  listRatingsByService(
    serviceId: string,
    pagination?: Pagination,
    options?: QueryOptions
  ): UseCaseResult<PaginatedResult<Rating>>;

  updateRating(request: UpdateRatingRequest, options?: QueryOptions): UseCaseResult<Rating>;

  getAverageRating(serviceId: string, options?: QueryOptions): UseCaseResult<AverageRating>;

  // Reviews

  /**
   * Business Rules:
   * - the rating exists and belongs to the same user and service
   * - one review per rating
   */
  createReview(
    request: CreateReviewRequest,
    options?: QueryOptions
  ): UseCaseResult<ReviewWithRating>;

  getReviewById(id: string, options?: QueryOptions): UseCaseResult<ReviewWithRating>;

  listReviewsByService(
    serviceId: string,
    pagination?: Pagination,
    options?: QueryOptions
  ): UseCaseResult<PaginatedResult<ReviewWithRating>>;

  updateReview(
    request: UpdateReviewRequest,
    options?: QueryOptions
  ): UseCaseResult<ReviewWithRating>;

  // Comments

  /**
   * Business Rules:
   * - the review exists; anyone may comment
   */
  createComment(request: CreateCommentRequest, options?: QueryOptions): UseCaseResult<Comment>;

  getCommentById(id: string, options?: QueryOptions): UseCaseResult<Comment>;

  listCommentsByReview(
    reviewId: string,
    pagination?: Pagination,
    options?: QueryOptions
  ): UseCaseResult<PaginatedResult<Comment>>;

  updateComment(request: UpdateCommentRequest, options?: QueryOptions): UseCaseResult<Comment>;

  // Users

  registerUser(request: RegisterUserRequest, options?: QueryOptions): UseCaseResult<User>;

  getUserById(id: string, options?: QueryOptions): UseCaseResult<User>;
}

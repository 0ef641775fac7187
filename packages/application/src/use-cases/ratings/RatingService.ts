/**
 * @fileoverview Rating Service
 *
 * Application service implementing the RatingUseCases primary port.
 * Enforces the cross-entity rules (one rating per user and service, reviews
 * only on the reviewer's own rating, comments only on existing reviews) and
 * turns thrown domain and storage errors into Result values.
 *
 * @module application/use-cases/ratings/RatingService
 *
 * ## Hexagonal Architecture
 *
 * - Implements the primary port (RatingUseCases)
 * - Depends on the secondary port (RatingsRepository)
 * - Field validation lives in the domain entities
 */

import {
  ConflictError,
  createLogger,
  OperationCancelledError,
  OwnershipMismatchError,
  RecordNotFoundError,
  RepositoryError,
  toError,
  ValidationError,
  type Logger,
  type QueryOptions,
  type ReviewEditPolicy,
} from '@rateboard/core';
import {
  Comment,
  idSchema,
  Pagination,
  parseOrThrow,
  Rating,
  Review,
  ReviewWithRating,
  User,
  type AverageRating,
  type PaginatedResult,
  type RatingsRepository,
} from '@rateboard/domain';

import type {
  CreateCommentRequest,
  CreateRatingRequest,
  CreateReviewRequest,
  RatingServiceError,
  RatingUseCases,
  RegisterUserRequest,
  UpdateCommentRequest,
  UpdateRatingRequest,
  UpdateReviewRequest,
  UseCaseResult,
} from '../../ports/primary/RatingUseCases.js';
import { Err, Ok } from '../../shared/Result.js';

export interface RatingServiceOptions {
  repository: RatingsRepository;
  /**
   * 'open' lets anyone edit a rating, review or comment; 'author-only'
   * requires actorId to match the author
   */
  editPolicy?: ReviewEditPolicy;
  logger?: Logger;
  /** Time source for new and updated entities */
  clock?: () => Date;
}

type LogContext = Record<string, unknown>;

function validateId(label: string, value: string): string {
  return parseOrThrow(idSchema(label), value);
}

export class RatingService implements RatingUseCases {
  private readonly repository: RatingsRepository;
  private readonly editPolicy: ReviewEditPolicy;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(options: RatingServiceOptions) {
    this.repository = options.repository;
    this.editPolicy = options.editPolicy ?? 'open';
    this.logger = options.logger ?? createLogger({ name: 'rating-service' });
    this.clock = options.clock ?? (() => new Date());
  }

  // ===========================================================================
  // RATINGS
  // ===========================================================================

  createRating(request: CreateRatingRequest, options?: QueryOptions): UseCaseResult<Rating> {
    const context = { userId: request.userId, serviceId: request.serviceId };
    return this.execute('createRating', context, async () => {
      const rating = Rating.create(request, this.clock());
      const { rating: stored, created } = await this.repository.upsertRating(rating, options);
      this.logger.info({ ...context, ratingId: stored.id, created }, 'Rating stored');
      return stored;
    });
  }

  getRatingById(id: string, options?: QueryOptions): UseCaseResult<Rating> {
    return this.execute('getRatingById', { ratingId: id }, () =>
      this.repository.getRatingById(validateId('rating_id', id), options)
    );
  }

  getRatingByUserAndService(
    userId: string,
    serviceId: string,
    options?: QueryOptions
  ): UseCaseResult<Rating> {
    return this.execute('getRatingByUserAndService', { userId, serviceId }, () =>
      this.repository.getRatingByUserAndService(
        validateId('user_id', userId),
        validateId('service_id', serviceId),
        options
      )
    );
  }

  listRatingsByService(
    serviceId: string,
    pagination: Pagination = Pagination.default(),
    options?: QueryOptions
  ): UseCaseResult<PaginatedResult<Rating>> {
    return this.execute('listRatingsByService', { serviceId }, () =>
      this.repository.listRatingsByService(validateId('service_id', serviceId), pagination, options)
    );
  }

  updateRating(request: UpdateRatingRequest, options?: QueryOptions): UseCaseResult<Rating> {
    return this.execute('updateRating', { ratingId: request.id }, async () => {
      const rating = await this.repository.getRatingById(validateId('rating_id', request.id), options);
      this.assertCanEdit('Rating', rating.id, rating.userId, request.actorId);
      rating.updateScore(request.score, this.clock());
      await this.repository.updateRating(rating, options);
      return rating;
    });
  }

  getAverageRating(serviceId: string, options?: QueryOptions): UseCaseResult<AverageRating> {
    return this.execute('getAverageRating', { serviceId }, () =>
      this.repository.calculateAverageRating(validateId('service_id', serviceId), options)
    );
  }

  // ===========================================================================
  // REVIEWS
  // ===========================================================================

  createReview(
    request: CreateReviewRequest,
    options?: QueryOptions
  ): UseCaseResult<ReviewWithRating> {
    const context = {
      userId: request.userId,
      serviceId: request.serviceId,
      ratingId: request.ratingId,
    };
    return this.execute('createReview', context, async () => {
      const userId = validateId('user_id', request.userId);
      const serviceId = validateId('service_id', request.serviceId);
      const ratingId = validateId('rating_id', request.ratingId);

      const rating = await this.repository.getRatingById(ratingId, options);
      if (!rating.isOwnedBy(userId, serviceId)) {
        throw new OwnershipMismatchError(
          'Rating',
          ratingId,
          'Rating does not belong to this user or service'
        );
      }

      const review = Review.create(request, this.clock());
      await this.repository.createReview(review, options);
      this.logger.info({ ...context, reviewId: review.id }, 'Review created');
      return ReviewWithRating.of(review, rating.score);
    });
  }

  getReviewById(id: string, options?: QueryOptions): UseCaseResult<ReviewWithRating> {
    return this.execute('getReviewById', { reviewId: id }, () =>
      this.repository.getReviewById(validateId('review_id', id), options)
    );
  }

  listReviewsByService(
    serviceId: string,
    pagination: Pagination = Pagination.default(),
    options?: QueryOptions
  ): UseCaseResult<PaginatedResult<ReviewWithRating>> {
    return this.execute('listReviewsByService', { serviceId }, () =>
      this.repository.listReviewsByService(validateId('service_id', serviceId), pagination, options)
    );
  }

  updateReview(
    request: UpdateReviewRequest,
    options?: QueryOptions
  ): UseCaseResult<ReviewWithRating> {
    return this.execute('updateReview', { reviewId: request.id }, async () => {
      const existing = await this.repository.getReviewById(
        validateId('review_id', request.id),
        options
      );
      this.assertCanEdit('Review', existing.id, existing.userId, request.actorId);

      const review = existing.review;
      review.updateContent(request.title, request.content, this.clock());
      await this.repository.updateReview(review, options);
      return ReviewWithRating.of(review, existing.score);
    });
  }

  // ===========================================================================
  // COMMENTS
  // ===========================================================================

  createComment(request: CreateCommentRequest, options?: QueryOptions): UseCaseResult<Comment> {
    const context = { userId: request.userId, reviewId: request.reviewId };
    return this.execute('createComment', context, async () => {
      validateId('user_id', request.userId);
      await this.repository.getReviewById(validateId('review_id', request.reviewId), options);

      const comment = Comment.create(request, this.clock());
      await this.repository.createComment(comment, options);
      this.logger.info({ ...context, commentId: comment.id }, 'Comment created');
      return comment;
    });
  }

  getCommentById(id: string, options?: QueryOptions): UseCaseResult<Comment> {
    return this.execute('getCommentById', { commentId: id }, () =>
      this.repository.getCommentById(validateId('comment_id', id), options)
    );
  }

  listCommentsByReview(
    reviewId: string,
    pagination: Pagination = Pagination.default(),
    options?: QueryOptions
  ): UseCaseResult<PaginatedResult<Comment>> {
    return this.execute('listCommentsByReview', { reviewId }, () =>
      this.repository.listCommentsByReview(validateId('review_id', reviewId), pagination, options)
    );
  }

  updateComment(request: UpdateCommentRequest, options?: QueryOptions): UseCaseResult<Comment> {
    return this.execute('updateComment', { commentId: request.id }, async () => {
      const comment = await this.repository.getCommentById(
        validateId('comment_id', request.id),
        options
      );
      this.assertCanEdit('Comment', comment.id, comment.userId, request.actorId);
      comment.updateContent(request.content, this.clock());
      await this.repository.updateComment(comment, options);
      return comment;
    });
  }

  // ===========================================================================
  // USERS
  // ===========================================================================

  registerUser(request: RegisterUserRequest, options?: QueryOptions): UseCaseResult<User> {
    return this.execute('registerUser', { username: request.username }, async () => {
      const user = User.create(request, this.clock());
      await this.repository.createUser(user, options);
      this.logger.info({ userId: user.id }, 'User registered');
      return user;
    });
  }

  getUserById(id: string, options?: QueryOptions): UseCaseResult<User> {
    return this.execute('getUserById', { userId: id }, () =>
      this.repository.getUserById(validateId('user_id', id), options)
    );
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  /**
   * Under 'author-only', the actor must be the record's author
   */
  private assertCanEdit(
    recordType: string,
    recordId: string,
    authorId: string,
    actorId: string | undefined
  ): void {
    if (this.editPolicy === 'open') {
      return;
    }
    if (actorId === undefined) {
      throw ValidationError.forField('actorId', 'actor_id is required to edit');
    }
    if (validateId('actor_id', actorId) !== authorId) {
      throw new OwnershipMismatchError(
        recordType,
        recordId,
        `Only the author may edit this ${recordType.toLowerCase()}`
      );
    }
  }

  private async execute<T>(
    operation: string,
    context: LogContext,
    fn: () => Promise<T>
  ): UseCaseResult<T> {
    try {
      return Ok(await fn());
    } catch (error) {
      return Err(this.toServiceError(operation, context, error));
    }
  }

  private toServiceError(operation: string, context: LogContext, error: unknown): RatingServiceError {
    if (error instanceof ValidationError || error instanceof OwnershipMismatchError) {
      this.logger.warn({ ...context, operation, code: error.code }, error.message);
      return error;
    }

    if (error instanceof RecordNotFoundError || error instanceof ConflictError) {
      this.logger.info({ ...context, operation, code: error.code }, error.message);
      return error;
    }

    if (error instanceof OperationCancelledError) {
      this.logger.debug({ ...context, operation }, 'Operation cancelled by caller');
      return error;
    }

    if (error instanceof RepositoryError) {
      this.logger.error({ ...context, operation, err: error.originalError ?? error }, 'Storage failure');
      return error;
    }

    this.logger.error({ ...context, operation, err: error }, 'Unexpected failure');
    return new RepositoryError('RatingService', operation, 'Unexpected storage failure', toError(error));
  }
}

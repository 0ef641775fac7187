/**
 * @fileoverview In-Memory Ratings Repository
 *
 * RatingsRepository adapter for tests and local development. Enforces the
 * same named uniqueness constraints and parent references as the SQL schema,
 * and stores copies so callers mutate nothing until they call an update.
 *
 * @module @rateboard/infrastructure/repositories/in-memory-ratings-repository
 */

import {
  createLogger,
  RecordNotFoundError,
  RepositoryError,
  throwIfAborted,
  type Logger,
  type QueryOptions,
} from '@rateboard/core';
import {
  Comment,
  Rating,
  ReviewWithRating,
  toAverageRating,
  toPaginatedResult,
  User,
  type AverageRating,
  type CommentProps,
  type PaginatedResult,
  type Pagination,
  type RatingProps,
  type RatingsRepository,
  type Review,
  type ReviewProps,
  type UpsertRatingResult,
  type UserProps,
} from '@rateboard/domain';

import { conflictFor } from './constraints.js';
import { resolveSort, type SortableEntity } from './sort-columns.js';

type SortValue = string | number | Date;

/** Row values addressable by the allow-listed sort columns */
type SortableRow = Record<string, SortValue> & { id: string };

/**
 * Text compares by UTF-16 code unit, not by a database collation, so title,
 * content and id ordering can differ from the SQL adapters for mixed-case or
 * accented text.
 */
function compareValues(left: SortValue, right: SortValue): number {
  const a = left instanceof Date ? left.getTime() : left;
  const b = right instanceof Date ? right.getTime() : right;
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function sortRows<T extends SortableRow>(
  entity: SortableEntity,
  rows: T[],
  pagination: Pagination
): T[] {
  const { column, direction } = resolveSort(entity, pagination);
  const sign = direction === 'asc' ? 1 : -1;
  return [...rows].sort((left, right) => {
    const leftValue = left[column];
    const rightValue = right[column];
    const primary =
      leftValue === undefined || rightValue === undefined ? 0 : compareValues(leftValue, rightValue);
    return primary !== 0 ? sign * primary : compareValues(left.id, right.id);
  });
}

function page<T>(rows: T[], pagination: Pagination): T[] {
  return rows.slice(pagination.offset, pagination.offset + pagination.limit);
}

function ratingRow(props: RatingProps): SortableRow {
  return {
    id: props.id,
    score: props.score,
    created_at: props.createdAt,
    updated_at: props.updatedAt,
  };
}

export interface InMemoryRatingsRepositoryConfig {
  logger?: Logger;
}

export class InMemoryRatingsRepository implements RatingsRepository {
  private readonly users = new Map<string, UserProps>();
  private readonly ratings = new Map<string, RatingProps>();
  private readonly reviews = new Map<string, ReviewProps>();
  private readonly comments = new Map<string, CommentProps>();
  private readonly logger: Logger;

  constructor(config: InMemoryRatingsRepositoryConfig = {}) {
    this.logger = config.logger ?? createLogger({ name: 'in-memory-ratings-repository' });
  }

  // ==========================================================================
  // USERS
  // ==========================================================================

  async createUser(user: User, options?: QueryOptions): Promise<void> {
    throwIfAborted(options?.signal, 'createUser');
    const props = user.toProps();
    for (const existing of this.users.values()) {
      if (existing.username === props.username) {
        throw conflictFor('unique_username');
      }
      if (existing.email === props.email) {
        throw conflictFor('unique_email');
      }
    }
    this.insert(this.users, props, 'createUser');
  }

  async getUserById(id: string, options?: QueryOptions): Promise<User> {
    throwIfAborted(options?.signal, 'getUserById');
    return this.findUser((props) => props.id === id, id);
  }

  async getUserByEmail(email: string, options?: QueryOptions): Promise<User> {
    throwIfAborted(options?.signal, 'getUserByEmail');
    return this.findUser((props) => props.email === email, email);
  }

  async getUserByUsername(username: string, options?: QueryOptions): Promise<User> {
    throwIfAborted(options?.signal, 'getUserByUsername');
    return this.findUser((props) => props.username === username, username);
  }

  private findUser(predicate: (props: UserProps) => boolean, lookup: string): User {
    for (const props of this.users.values()) {
      if (predicate(props)) {
        return User.reconstitute(props);
      }
    }
    throw new RecordNotFoundError('User', lookup);
  }

  // ==========================================================================
  // RATINGS
  // ==========================================================================

  async createRating(rating: Rating, options?: QueryOptions): Promise<void> {
    throwIfAborted(options?.signal, 'createRating');
    if (this.findRating(rating.userId, rating.serviceId)) {
      throw conflictFor('unique_user_service');
    }
    this.insert(this.ratings, rating.toJSON(), 'createRating');
  }

  async upsertRating(rating: Rating, options?: QueryOptions): Promise<UpsertRatingResult> {
    throwIfAborted(options?.signal, 'upsertRating');
    const existing = this.findRating(rating.userId, rating.serviceId);
    if (!existing) {
      this.insert(this.ratings, rating.toJSON(), 'upsertRating');
      return { rating: Rating.reconstitute(rating.toJSON()), created: true };
    }

    const updated: RatingProps = { ...existing, score: rating.score, updatedAt: rating.updatedAt };
    this.ratings.set(updated.id, updated);
    this.logger.debug({ ratingId: updated.id }, 'Rating overwritten');
    return { rating: Rating.reconstitute(updated), created: false };
  }

  async getRatingById(id: string, options?: QueryOptions): Promise<Rating> {
    throwIfAborted(options?.signal, 'getRatingById');
    const props = this.ratings.get(id);
    if (!props) {
      throw new RecordNotFoundError('Rating', id);
    }
    return Rating.reconstitute(props);
  }

  async getRatingByUserAndService(
    userId: string,
    serviceId: string,
    options?: QueryOptions
  ): Promise<Rating> {
    throwIfAborted(options?.signal, 'getRatingByUserAndService');
    const props = this.findRating(userId, serviceId);
    if (!props) {
      throw new RecordNotFoundError('Rating', `${userId}/${serviceId}`);
    }
    return Rating.reconstitute(props);
  }

  async listRatingsByService(
    serviceId: string,
    pagination: Pagination,
    options?: QueryOptions
  ): Promise<PaginatedResult<Rating>> {
    throwIfAborted(options?.signal, 'listRatingsByService');
    const matching = [...this.ratings.values()].filter((props) => props.serviceId === serviceId);
    const byId = new Map(matching.map((props) => [props.id, props]));
    const items = page(sortRows('ratings', matching.map(ratingRow), pagination), pagination)
      .map((row) => byId.get(row.id))
      .filter((props): props is RatingProps => props !== undefined)
      .map((props) => Rating.reconstitute(props));
    return toPaginatedResult(items, matching.length, pagination);
  }

  async updateRating(rating: Rating, options?: QueryOptions): Promise<void> {
    throwIfAborted(options?.signal, 'updateRating');
    const existing = this.ratings.get(rating.id);
    if (!existing) {
      throw new RecordNotFoundError('Rating', rating.id);
    }
    this.ratings.set(rating.id, { ...existing, score: rating.score, updatedAt: rating.updatedAt });
  }

  async calculateAverageRating(serviceId: string, options?: QueryOptions): Promise<AverageRating> {
    throwIfAborted(options?.signal, 'calculateAverageRating');
    const scores = [...this.ratings.values()]
      .filter((props) => props.serviceId === serviceId)
      .map((props) => props.score);
    if (scores.length === 0) {
      return toAverageRating(serviceId, null, 0);
    }
    const sum = scores.reduce((total, score) => total + score, 0);
    return toAverageRating(serviceId, sum / scores.length, scores.length);
  }

  private findRating(userId: string, serviceId: string): RatingProps | undefined {
    for (const props of this.ratings.values()) {
      if (props.userId === userId && props.serviceId === serviceId) {
        return props;
      }
    }
    return undefined;
  }

  // ==========================================================================
  // REVIEWS
  // ==========================================================================

  async createReview(review: Review, options?: QueryOptions): Promise<void> {
    throwIfAborted(options?.signal, 'createReview');
    if (!this.ratings.has(review.ratingId)) {
      throw this.foreignKeyError('createReview', `rating ${review.ratingId} does not exist`);
    }
    for (const existing of this.reviews.values()) {
      if (existing.ratingId === review.ratingId) {
        throw conflictFor('unique_rating');
      }
    }
    this.insert(this.reviews, review.toJSON(), 'createReview');
  }

  async getReviewById(id: string, options?: QueryOptions): Promise<ReviewWithRating> {
    throwIfAborted(options?.signal, 'getReviewById');
    const joined = this.joinReview(this.reviews.get(id));
    if (!joined) {
      throw new RecordNotFoundError('Review', id);
    }
    return joined;
  }

  async listReviewsByService(
    serviceId: string,
    pagination: Pagination,
    options?: QueryOptions
  ): Promise<PaginatedResult<ReviewWithRating>> {
    throwIfAborted(options?.signal, 'listReviewsByService');
    const matching = [...this.reviews.values()]
      .filter((props) => props.serviceId === serviceId)
      .map((props) => this.joinReview(props))
      .filter((joined): joined is ReviewWithRating => joined !== undefined);
    const byId = new Map(matching.map((joined) => [joined.id, joined]));
    const rows = matching.map(
      (joined): SortableRow => ({
        id: joined.id,
        score: joined.score,
        title: joined.title,
        content: joined.content,
        created_at: joined.createdAt,
        updated_at: joined.updatedAt,
      })
    );
    const items = page(sortRows('reviews', rows, pagination), pagination)
      .map((row) => byId.get(row.id))
      .filter((joined): joined is ReviewWithRating => joined !== undefined);
    return toPaginatedResult(items, matching.length, pagination);
  }

  async updateReview(review: Review, options?: QueryOptions): Promise<void> {
    throwIfAborted(options?.signal, 'updateReview');
    const existing = this.reviews.get(review.id);
    if (!existing) {
      throw new RecordNotFoundError('Review', review.id);
    }
    this.reviews.set(review.id, {
      ...existing,
      title: review.title,
      content: review.content,
      updatedAt: review.updatedAt,
    });
  }

  private joinReview(props: ReviewProps | undefined): ReviewWithRating | undefined {
    if (!props) {
      return undefined;
    }
    const rating = this.ratings.get(props.ratingId);
    return rating ? ReviewWithRating.reconstitute({ ...props, score: rating.score }) : undefined;
  }

  // ==========================================================================
  // COMMENTS
  // ==========================================================================

  async createComment(comment: Comment, options?: QueryOptions): Promise<void> {
    throwIfAborted(options?.signal, 'createComment');
    if (!this.reviews.has(comment.reviewId)) {
      throw this.foreignKeyError('createComment', `review ${comment.reviewId} does not exist`);
    }
    this.insert(this.comments, comment.toJSON(), 'createComment');
  }

  async getCommentById(id: string, options?: QueryOptions): Promise<Comment> {
    throwIfAborted(options?.signal, 'getCommentById');
    const props = this.comments.get(id);
    if (!props) {
      throw new RecordNotFoundError('Comment', id);
    }
    return Comment.reconstitute(props);
  }

  async listCommentsByReview(
    reviewId: string,
    pagination: Pagination,
    options?: QueryOptions
  ): Promise<PaginatedResult<Comment>> {
    throwIfAborted(options?.signal, 'listCommentsByReview');
    const matching = [...this.comments.values()].filter((props) => props.reviewId === reviewId);
    const byId = new Map(matching.map((props) => [props.id, props]));
    const rows = matching.map(
      (props): SortableRow => ({
        id: props.id,
        content: props.content,
        created_at: props.createdAt,
        updated_at: props.updatedAt,
      })
    );
    const items = page(sortRows('comments', rows, pagination), pagination)
      .map((row) => byId.get(row.id))
      .filter((props): props is CommentProps => props !== undefined)
      .map((props) => Comment.reconstitute(props));
    return toPaginatedResult(items, matching.length, pagination);
  }

  async updateComment(comment: Comment, options?: QueryOptions): Promise<void> {
    throwIfAborted(options?.signal, 'updateComment');
    const existing = this.comments.get(comment.id);
    if (!existing) {
      throw new RecordNotFoundError('Comment', comment.id);
    }
    this.comments.set(comment.id, {
      ...existing,
      content: comment.content,
      updatedAt: comment.updatedAt,
    });
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  /** Drop all stored rows */
  clear(): void {
    this.users.clear();
    this.ratings.clear();
    this.reviews.clear();
    this.comments.clear();
  }

  private insert<T extends { id: string }>(table: Map<string, T>, props: T, operation: string): void {
    if (table.has(props.id)) {
      throw new RepositoryError(
        'InMemoryRatingsRepository',
        operation,
        `Duplicate primary key ${props.id}`
      );
    }
    table.set(props.id, props);
  }

  private foreignKeyError(operation: string, detail: string): RepositoryError {
    this.logger.error({ operation }, 'Foreign key violation');
    return new RepositoryError(
      'InMemoryRatingsRepository',
      operation,
      `Foreign key violation: ${detail}`
    );
  }
}

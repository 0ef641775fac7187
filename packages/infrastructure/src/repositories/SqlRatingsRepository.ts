/**
 * @fileoverview Shared SQL Ratings Repository (Infrastructure Layer)
 *
 * Holds every ratings, reviews, comments and users query once. Dialect
 * adapters supply placeholders, date coercion, the atomic rating upsert and
 * unique-violation detection.
 *
 * @module @rateboard/infrastructure/repositories/sql-ratings-repository
 *
 * ## Hexagonal Architecture
 *
 * This is an **ADAPTER** base - subclasses implement the RatingsRepository
 * port defined in the domain.
 */

import {
  createLogger,
  OperationCancelledError,
  raceAbort,
  RecordNotFoundError,
  RepositoryError,
  throwIfAborted,
  toError,
  type AppError,
  type Logger,
  type QueryOptions,
  type QueryResult,
  type SqlPool,
  type SqlRow,
} from '@rateboard/core';
import {
  Comment,
  Rating,
  ReviewWithRating,
  toAverageRating,
  toPaginatedResult,
  User,
  type AverageRating,
  type PaginatedResult,
  type Pagination,
  type RatingsRepository,
  type Review,
  type UpsertRatingResult,
} from '@rateboard/domain';

import { conflictFor } from './constraints.js';
import { orderByClause } from './sort-columns.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface SqlRatingsRepositoryConfig {
  pool: SqlPool;
  logger?: Logger;
}

const USER_COLUMNS = 'id, username, email, password_hash, created_at, updated_at';
const RATING_COLUMNS = 'id, user_id, service_id, score, created_at, updated_at';
const COMMENT_COLUMNS = 'id, user_id, review_id, content, created_at, updated_at';
const REVIEW_COLUMNS =
  'r.id, r.user_id, r.service_id, r.rating_id, r.title, r.content, r.created_at, r.updated_at, rt.score';
const REVIEW_JOIN = 'FROM reviews r JOIN ratings rt ON rt.id = r.rating_id';

function qualifyReviewColumn(column: string): string {
  return column === 'score' ? 'rt.score' : `r.${column}`;
}

// ============================================================================
// REPOSITORY BASE
// ============================================================================

export abstract class SqlRatingsRepository implements RatingsRepository {
  protected readonly pool: SqlPool;
  protected readonly logger: Logger;

  /** Name carried by RepositoryError */
  protected abstract readonly repositoryName: string;

  constructor(config: SqlRatingsRepositoryConfig, loggerName: string) {
    this.pool = config.pool;
    this.logger = config.logger ?? createLogger({ name: loggerName });
  }

  // ==========================================================================
  // DIALECT HOOKS
  // ==========================================================================

  /** Bind marker for the 1-based parameter position */
  protected abstract placeholder(position: number): string;

  /** Constraint or key name when the error is a unique violation */
  protected abstract uniqueViolation(error: unknown): string | undefined;

  /** Driver value of a timestamp column, or undefined when unreadable */
  protected abstract parseTimestamp(value: unknown): Date | undefined;

  /**
   * Insert the rating or overwrite the score of the existing
   * (user_id, service_id) row; returns the stored row
   */
  protected abstract executeUpsert(rating: Rating): Promise<{ row: SqlRow; created: boolean }>;

  // ==========================================================================
  // USERS
  // ==========================================================================

  async createUser(user: User, options?: QueryOptions): Promise<void> {
    const props = user.toProps();
    await this.run(
      'createUser',
      `INSERT INTO users (${USER_COLUMNS}) VALUES (${this.placeholders(6)})`,
      [props.id, props.username, props.email, props.passwordHash, props.createdAt, props.updatedAt],
      options
    );
  }

  async getUserById(id: string, options?: QueryOptions): Promise<User> {
    return this.findUser('getUserById', 'id', id, options);
  }

  async getUserByEmail(email: string, options?: QueryOptions): Promise<User> {
    return this.findUser('getUserByEmail', 'email', email, options);
  }

  async getUserByUsername(username: string, options?: QueryOptions): Promise<User> {
    return this.findUser('getUserByUsername', 'username', username, options);
  }

  private async findUser(
    operation: string,
    column: 'id' | 'email' | 'username',
    value: string,
    options?: QueryOptions
  ): Promise<User> {
    const result = await this.run(
      operation,
      `SELECT ${USER_COLUMNS} FROM users WHERE ${column} = ${this.placeholder(1)}`,
      [value],
      options
    );
    const row = result.rows[0];
    if (!row) {
      throw new RecordNotFoundError('User', value);
    }
    return this.mapUser(row);
  }

  // ==========================================================================
  // RATINGS
  // ==========================================================================

  async createRating(rating: Rating, options?: QueryOptions): Promise<void> {
    await this.run(
      'createRating',
      `INSERT INTO ratings (${RATING_COLUMNS}) VALUES (${this.placeholders(6)})`,
      [rating.id, rating.userId, rating.serviceId, rating.score, rating.createdAt, rating.updatedAt],
      options
    );
  }

  async upsertRating(rating: Rating, options?: QueryOptions): Promise<UpsertRatingResult> {
    const { row, created } = await this.guard('upsertRating', options, () =>
      this.executeUpsert(rating)
    );
    return { rating: this.mapRating(row), created };
  }

  async getRatingById(id: string, options?: QueryOptions): Promise<Rating> {
    const result = await this.run(
      'getRatingById',
      `SELECT ${RATING_COLUMNS} FROM ratings WHERE id = ${this.placeholder(1)}`,
      [id],
      options
    );
    const row = result.rows[0];
    if (!row) {
      throw new RecordNotFoundError('Rating', id);
    }
    return this.mapRating(row);
  }

  async getRatingByUserAndService(
    userId: string,
    serviceId: string,
    options?: QueryOptions
  ): Promise<Rating> {
    const result = await this.run(
      'getRatingByUserAndService',
      `SELECT ${RATING_COLUMNS} FROM ratings
       WHERE user_id = ${this.placeholder(1)} AND service_id = ${this.placeholder(2)}`,
      [userId, serviceId],
      options
    );
    const row = result.rows[0];
    if (!row) {
      throw new RecordNotFoundError('Rating', `${userId}/${serviceId}`);
    }
    return this.mapRating(row);
  }

  async listRatingsByService(
    serviceId: string,
    pagination: Pagination,
    options?: QueryOptions
  ): Promise<PaginatedResult<Rating>> {
    const page = await this.run(
      'listRatingsByService',
      `SELECT ${RATING_COLUMNS} FROM ratings
       WHERE service_id = ${this.placeholder(1)}
       ${orderByClause('ratings', pagination)}
       LIMIT ${this.placeholder(2)} OFFSET ${this.placeholder(3)}`,
      [serviceId, pagination.limit, pagination.offset],
      options
    );
    const total = await this.count(
      'countRatingsByService',
      `SELECT COUNT(*) AS total FROM ratings WHERE service_id = ${this.placeholder(1)}`,
      [serviceId],
      options
    );
    return toPaginatedResult(
      page.rows.map((row) => this.mapRating(row)),
      total,
      pagination
    );
  }

  async updateRating(rating: Rating, options?: QueryOptions): Promise<void> {
    const result = await this.run(
      'updateRating',
      `UPDATE ratings SET score = ${this.placeholder(1)}, updated_at = ${this.placeholder(2)}
       WHERE id = ${this.placeholder(3)}`,
      [rating.score, rating.updatedAt, rating.id],
      options
    );
    if (result.rowCount === 0) {
      throw new RecordNotFoundError('Rating', rating.id);
    }
  }

  async calculateAverageRating(serviceId: string, options?: QueryOptions): Promise<AverageRating> {
    const result = await this.run(
      'calculateAverageRating',
      `SELECT AVG(score) AS average_score, COUNT(*) AS total_ratings
       FROM ratings WHERE service_id = ${this.placeholder(1)}`,
      [serviceId],
      options
    );
    const row = result.rows[0];
    if (!row) {
      return toAverageRating(serviceId, null, 0);
    }
    const average = row.average_score === null ? null : this.readNumber(row, 'average_score');
    return toAverageRating(serviceId, average, this.readNumber(row, 'total_ratings'));
  }

  // ==========================================================================
  // REVIEWS
  // ==========================================================================

  async createReview(review: Review, options?: QueryOptions): Promise<void> {
    await this.run(
      'createReview',
      `INSERT INTO reviews (id, user_id, service_id, rating_id, title, content, created_at, updated_at)
       VALUES (${this.placeholders(8)})`,
      [
        review.id,
        review.userId,
        review.serviceId,
        review.ratingId,
        review.title,
        review.content,
        review.createdAt,
        review.updatedAt,
      ],
      options
    );
  }

  async getReviewById(id: string, options?: QueryOptions): Promise<ReviewWithRating> {
    const result = await this.run(
      'getReviewById',
      `SELECT ${REVIEW_COLUMNS} ${REVIEW_JOIN} WHERE r.id = ${this.placeholder(1)}`,
      [id],
      options
    );
    const row = result.rows[0];
    if (!row) {
      throw new RecordNotFoundError('Review', id);
    }
    return this.mapReview(row);
  }

  async listReviewsByService(
    serviceId: string,
    pagination: Pagination,
    options?: QueryOptions
  ): Promise<PaginatedResult<ReviewWithRating>> {
    const page = await this.run(
      'listReviewsByService',
      `SELECT ${REVIEW_COLUMNS} ${REVIEW_JOIN}
       WHERE r.service_id = ${this.placeholder(1)}
       ${orderByClause('reviews', pagination, qualifyReviewColumn)}
       LIMIT ${this.placeholder(2)} OFFSET ${this.placeholder(3)}`,
      [serviceId, pagination.limit, pagination.offset],
      options
    );
    const total = await this.count(
      'countReviewsByService',
      `SELECT COUNT(*) AS total ${REVIEW_JOIN} WHERE r.service_id = ${this.placeholder(1)}`,
      [serviceId],
      options
    );
    return toPaginatedResult(
      page.rows.map((row) => this.mapReview(row)),
      total,
      pagination
    );
  }

  async updateReview(review: Review, options?: QueryOptions): Promise<void> {
    const result = await this.run(
      'updateReview',
      `UPDATE reviews
       SET title = ${this.placeholder(1)}, content = ${this.placeholder(2)}, updated_at = ${this.placeholder(3)}
       WHERE id = ${this.placeholder(4)}`,
      [review.title, review.content, review.updatedAt, review.id],
      options
    );
    if (result.rowCount === 0) {
      throw new RecordNotFoundError('Review', review.id);
    }
  }

  // ==========================================================================
  // COMMENTS
  // ==========================================================================

  async createComment(comment: Comment, options?: QueryOptions): Promise<void> {
    await this.run(
      'createComment',
      `INSERT INTO comments (${COMMENT_COLUMNS}) VALUES (${this.placeholders(6)})`,
      [
        comment.id,
        comment.userId,
        comment.reviewId,
        comment.content,
        comment.createdAt,
        comment.updatedAt,
      ],
      options
    );
  }

  async getCommentById(id: string, options?: QueryOptions): Promise<Comment> {
    const result = await this.run(
      'getCommentById',
      `SELECT ${COMMENT_COLUMNS} FROM comments WHERE id = ${this.placeholder(1)}`,
      [id],
      options
    );
    const row = result.rows[0];
    if (!row) {
      throw new RecordNotFoundError('Comment', id);
    }
    return this.mapComment(row);
  }

  async listCommentsByReview(
    reviewId: string,
    pagination: Pagination,
    options?: QueryOptions
  ): Promise<PaginatedResult<Comment>> {
    const page = await this.run(
      'listCommentsByReview',
      `SELECT ${COMMENT_COLUMNS} FROM comments
       WHERE review_id = ${this.placeholder(1)}
       ${orderByClause('comments', pagination)}
       LIMIT ${this.placeholder(2)} OFFSET ${this.placeholder(3)}`,
      [reviewId, pagination.limit, pagination.offset],
      options
    );
    const total = await this.count(
      'countCommentsByReview',
      `SELECT COUNT(*) AS total FROM comments WHERE review_id = ${this.placeholder(1)}`,
      [reviewId],
      options
    );
    return toPaginatedResult(
      page.rows.map((row) => this.mapComment(row)),
      total,
      pagination
    );
  }

  async updateComment(comment: Comment, options?: QueryOptions): Promise<void> {
    const result = await this.run(
      'updateComment',
      `UPDATE comments SET content = ${this.placeholder(1)}, updated_at = ${this.placeholder(2)}
       WHERE id = ${this.placeholder(3)}`,
      [comment.content, comment.updatedAt, comment.id],
      options
    );
    if (result.rowCount === 0) {
      throw new RecordNotFoundError('Comment', comment.id);
    }
  }

  // ==========================================================================
  // QUERY EXECUTION
  // ==========================================================================

  protected placeholders(count: number): string {
    return Array.from({ length: count }, (_, index) => this.placeholder(index + 1)).join(', ');
  }

  /**
   * Run one statement under the caller's signal with error translation
   */
  protected async run(
    operation: string,
    sql: string,
    params: readonly unknown[],
    options?: QueryOptions
  ): Promise<QueryResult> {
    this.logger.debug({ operation, sql }, 'Executing query');
    return this.guard(operation, options, () => this.pool.query(sql, params));
  }

  protected async guard<T>(
    operation: string,
    options: QueryOptions | undefined,
    work: () => Promise<T>
  ): Promise<T> {
    throwIfAborted(options?.signal, operation);
    try {
      return await raceAbort(work(), { signal: options?.signal, operation, logger: this.logger });
    } catch (error) {
      throw this.translateError(operation, error);
    }
  }

  private async count(
    operation: string,
    sql: string,
    params: readonly unknown[],
    options?: QueryOptions
  ): Promise<number> {
    const result = await this.run(operation, sql, params, options);
    const row = result.rows[0];
    return row ? this.readNumber(row, 'total') : 0;
  }

  private translateError(operation: string, error: unknown): AppError {
    if (error instanceof OperationCancelledError || error instanceof RepositoryError) {
      return error;
    }

    const constraint = this.uniqueViolation(error);
    if (constraint !== undefined) {
      this.logger.info({ operation, constraint }, 'Unique constraint violated');
      return conflictFor(constraint);
    }

    this.logger.error({ err: error, operation }, 'Query failed');
    return new RepositoryError(this.repositoryName, operation, `Failed to ${operation}`, toError(error));
  }

  // ==========================================================================
  // ROW MAPPING
  // ==========================================================================

  private mapUser(row: SqlRow): User {
    return User.reconstitute({
      id: this.readString(row, 'id'),
      username: this.readString(row, 'username'),
      email: this.readString(row, 'email'),
      passwordHash: this.readString(row, 'password_hash'),
      createdAt: this.readDate(row, 'created_at'),
      updatedAt: this.readDate(row, 'updated_at'),
    });
  }

  protected mapRating(row: SqlRow): Rating {
    return Rating.reconstitute({
      id: this.readString(row, 'id'),
      userId: this.readString(row, 'user_id'),
      serviceId: this.readString(row, 'service_id'),
      score: this.readNumber(row, 'score'),
      createdAt: this.readDate(row, 'created_at'),
      updatedAt: this.readDate(row, 'updated_at'),
    });
  }

  private mapReview(row: SqlRow): ReviewWithRating {
    return ReviewWithRating.reconstitute({
      id: this.readString(row, 'id'),
      userId: this.readString(row, 'user_id'),
      serviceId: this.readString(row, 'service_id'),
      ratingId: this.readString(row, 'rating_id'),
      title: this.readString(row, 'title'),
      content: this.readString(row, 'content'),
      createdAt: this.readDate(row, 'created_at'),
      updatedAt: this.readDate(row, 'updated_at'),
      score: this.readNumber(row, 'score'),
    });
  }

  private mapComment(row: SqlRow): Comment {
    return Comment.reconstitute({
      id: this.readString(row, 'id'),
      userId: this.readString(row, 'user_id'),
      reviewId: this.readString(row, 'review_id'),
      content: this.readString(row, 'content'),
      createdAt: this.readDate(row, 'created_at'),
      updatedAt: this.readDate(row, 'updated_at'),
    });
  }

  protected readString(row: SqlRow, column: string): string {
    const value = row[column];
    if (typeof value === 'string') {
      return value;
    }
    throw this.columnError(column, value);
  }

  /** COUNT and AVG arrive as strings from pg and as DECIMAL strings from mysql2 */
  protected readNumber(row: SqlRow, column: string): number {
    const value = row[column];
    let parsed = NaN;
    if (typeof value === 'number') {
      parsed = value;
    } else if (typeof value === 'string' || typeof value === 'bigint') {
      parsed = Number(value);
    }
    if (Number.isFinite(parsed)) {
      return parsed;
    }
    throw this.columnError(column, value);
  }

  protected readDate(row: SqlRow, column: string): Date {
    const value = row[column];
    const parsed = this.parseTimestamp(value);
    if (parsed && !Number.isNaN(parsed.getTime())) {
      return parsed;
    }
    throw this.columnError(column, value);
  }

  private columnError(column: string, value: unknown): RepositoryError {
    return new RepositoryError(
      this.repositoryName,
      'mapRow',
      `Unexpected ${typeof value} in column ${column}`
    );
  }
}

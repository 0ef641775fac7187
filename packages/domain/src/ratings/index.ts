/**
 * Ratings bounded context
 *
 * @module domain/ratings
 */

export {
  Rating,
  toAverageRating,
  type RatingProps,
  type CreateRatingInput,
  type AverageRating,
} from './entities/rating.js';
export {
  Review,
  ReviewWithRating,
  type ReviewProps,
  type ReviewWithRatingProps,
  type CreateReviewInput,
} from './entities/review.js';
export { Comment, type CommentProps, type CreateCommentInput } from './entities/comment.js';
export { User, type UserProps, type CreateUserInput, type PublicUser } from './entities/user.js';

export {
  idSchema,
  requiredTextSchema,
  ScoreSchema,
  TitleSchema,
  ContentSchema,
  CreateUserSchema,
  CreateRatingSchema,
  CreateReviewSchema,
  CreateCommentSchema,
  ReviewContentSchema,
  MIN_SCORE,
  MAX_SCORE,
  MAX_TITLE_LENGTH,
  parseOrThrow,
  toFieldErrors,
} from './schemas.js';

export type { RatingsRepository, UpsertRatingResult } from './ratings-repository.js';

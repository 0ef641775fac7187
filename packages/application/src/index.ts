/**
 * @fileoverview Application Package Exports
 *
 * Use cases for ratings, reviews and comments, and the Result type they
 * return.
 *
 * @module @rateboard/application
 */

// Shared
export {
  Ok,
  Err,
  isOk,
  isErr,
  unwrap,
  unwrapOr,
  map,
  mapErr,
  type Result,
} from './shared/Result.js';

// Primary port
export type {
  RatingUseCases,
  RatingServiceError,
  UseCaseResult,
  CreateRatingRequest,
  UpdateRatingRequest,
  CreateReviewRequest,
  UpdateReviewRequest,
  CreateCommentRequest,
  UpdateCommentRequest,
  RegisterUserRequest,
} from './ports/primary/RatingUseCases.js';

// Use cases
export { RatingService, type RatingServiceOptions } from './use-cases/ratings/index.js';

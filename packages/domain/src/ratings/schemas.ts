/**
 * @fileoverview Zod Validation Schemas for the ratings context
 *
 * Field-level rules shared by the entities and the orchestration service.
 * Messages name the field in lower snake case, the way callers send it.
 *
 * @module domain/ratings/schemas
 */

import { z } from 'zod';
import { ValidationError } from '@rateboard/core';

// ============================================================================
// COMMON SCHEMAS
// ============================================================================

const NIL_UUID = '00000000-0000-0000-0000-000000000000';

/** Score bounds, inclusive */
export const MIN_SCORE = 1;
export const MAX_SCORE = 5;

/** Review title column width */
export const MAX_TITLE_LENGTH = 255;

/**
 * UUID identifier; the nil UUID counts as empty
 *
 * Output is lower case, the form PostgreSQL returns, so ids compare equal
 * across backends whatever case the caller sent.
 */
export function idSchema(label: string) {
  return z
    .string({ required_error: `${label} is required`, invalid_type_error: `${label} must be a string` })
    .uuid(`${label} must be a valid UUID`)
    .refine((value) => value !== NIL_UUID, `${label} cannot be empty`)
    .transform((value) => value.toLowerCase());
}

/**
 * Text that must be non-empty after trimming whitespace
 */
export function requiredTextSchema(label: string, maxLength?: number) {
  const base = z.string({
    required_error: `${label} is required`,
    invalid_type_error: `${label} must be a string`,
  });
  const bounded =
    maxLength === undefined
      ? base
      : base.max(maxLength, `${label} must not exceed ${maxLength} characters`);
  return bounded.refine((value) => value.trim().length > 0, `${label} cannot be empty`);
}

/**
 * Rating score, an integer in [1, 5]
 */
export const ScoreSchema = z
  .number({ required_error: 'score is required', invalid_type_error: 'score must be a number' })
  .int('score must be an integer')
  .min(MIN_SCORE, `score must be between ${MIN_SCORE} and ${MAX_SCORE}`)
  .max(MAX_SCORE, `score must be between ${MIN_SCORE} and ${MAX_SCORE}`);

export const TitleSchema = requiredTextSchema('title', MAX_TITLE_LENGTH);
export const ContentSchema = requiredTextSchema('content');

// ============================================================================
// ENTITY INPUT SCHEMAS
// ============================================================================

export const CreateUserSchema = z.object({
  username: requiredTextSchema('username', 50),
  email: z
    .string({ required_error: 'email is required' })
    .max(255, 'email must not exceed 255 characters')
    .email('email must be a valid email address'),
  passwordHash: requiredTextSchema('password_hash'),
});

export const CreateRatingSchema = z.object({
  userId: idSchema('user_id'),
  serviceId: idSchema('service_id'),
  score: ScoreSchema,
});

export const CreateReviewSchema = z.object({
  userId: idSchema('user_id'),
  serviceId: idSchema('service_id'),
  ratingId: idSchema('rating_id'),
  title: TitleSchema,
  content: ContentSchema,
});

export const ReviewContentSchema = z.object({
  title: TitleSchema,
  content: ContentSchema,
});

export const CreateCommentSchema = z.object({
  userId: idSchema('user_id'),
  reviewId: idSchema('review_id'),
  content: ContentSchema,
});

// ============================================================================
// VALIDATION HELPERS
// ============================================================================

/**
 * Group zod issues by field path
 */
export function toFieldErrors(error: z.ZodError): Record<string, string[]> {
  const fieldErrors: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : '_root';
    (fieldErrors[key] ??= []).push(issue.message);
  }
  return fieldErrors;
}

/**
 * Parse input or throw a ValidationError carrying every failing field
 *
 * @example
 * ```typescript
 * const score = parseOrThrow(ScoreSchema, 7); // throws: score must be between 1 and 5
 * ```
 */
export function parseOrThrow<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  data: unknown
): z.output<TSchema> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const message = result.error.issues.map((issue) => issue.message).join('; ');
    throw new ValidationError(message, toFieldErrors(result.error));
  }
  return result.data;
}

/**
 * @fileoverview Result Type for Functional Error Handling
 *
 * Use cases return a Result instead of throwing, so callers handle every
 * failure kind at the boundary.
 *
 * @module application/shared/Result
 */

/**
 * Success result variant
 */
export interface Ok<T> {
  readonly _tag: 'Ok';
  readonly value: T;
}

/**
 * Error result variant
 */
export interface Err<E> {
  readonly _tag: 'Err';
  readonly error: E;
}

/**
 * Result type - Either a success (Ok) or failure (Err)
 *
 * @example
 * ```typescript
 * const result = await ratingService.getAverageRating(serviceId);
 * if (isOk(result)) {
 *   render(result.value.averageScore);
 * } else if (result.error.kind === ErrorKind.VALIDATION) {
 *   reject(result.error.fieldErrors);
 * }
 * ```
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

export function Ok<T>(value: T): Ok<T> {
  return { _tag: 'Ok', value };
}

export function Err<E>(error: E): Err<E> {
  return { _tag: 'Err', error };
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result._tag === 'Ok';
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result._tag === 'Err';
}

/**
 * Unwrap a result, throwing the error when it failed
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (isOk(result)) {
    return result.value;
  }
  throw result.error;
}

export function unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
  return isOk(result) ? result.value : defaultValue;
}

/**
 * Transform the success value, passing failures through
 */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return isOk(result) ? Ok(fn(result.value)) : result;
}

/**
 * Transform the error, passing successes through
 */
export function mapErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
  return isErr(result) ? Err(fn(result.error)) : result;
}

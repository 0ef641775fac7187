/**
 * AbortSignal helpers for storage calls
 *
 * Neither database driver takes an AbortSignal, so a cancelled call settles
 * early and the in-flight query is left to finish on its own connection.
 */

import type { Logger } from 'pino';

import { OperationCancelledError } from './errors.js';

export interface QueryOptions {
  /** Aborting rejects the pending call with OperationCancelledError */
  signal?: AbortSignal;
}

export interface RaceAbortOptions {
  signal: AbortSignal | undefined;
  operation: string;
  logger: Logger;
}

/**
 * Fail fast when the caller has already given up
 */
export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(operation, signal.reason);
  }
}

/**
 * Settle with the promise or with OperationCancelledError, whichever comes first
 */
export function raceAbort<T>(promise: Promise<T>, options: RaceAbortOptions): Promise<T> {
  const { signal, operation, logger } = options;

  if (!signal) {
    return promise;
  }

  const logAbandoned = (error: unknown): void => {
    logger.debug({ err: error, operation }, 'Abandoned query failed after cancellation');
  };

  if (signal.aborted) {
    void promise.catch(logAbandoned);
    return Promise.reject(new OperationCancelledError(operation, signal.reason));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      void promise.catch(logAbandoned);
      reject(new OperationCancelledError(operation, signal.reason));
    };

    signal.addEventListener('abort', onAbort, { once: true });

    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

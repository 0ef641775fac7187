import { describe, it, expect, vi } from 'vitest';
import { raceAbort, throwIfAborted } from '../cancellation.js';
import { ErrorKind, OperationCancelledError } from '../errors.js';
import { createLogger } from '../logger/index.js';

const logger = createLogger({ name: 'cancellation-test', level: 'silent', pretty: false });

function deferred<T>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
} {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('throwIfAborted', () => {
  it('should do nothing without a signal', () => {
    expect(() => throwIfAborted(undefined, 'getRatingById')).not.toThrow();
  });

  it('should throw for an aborted signal', () => {
    const controller = new AbortController();
    controller.abort('caller left');

    expect(() => throwIfAborted(controller.signal, 'getRatingById')).toThrow(
      OperationCancelledError
    );
  });
});

describe('raceAbort', () => {
  it('should return the promise untouched without a signal', async () => {
    const promise = Promise.resolve(42);
    await expect(
      raceAbort(promise, { signal: undefined, operation: 'op', logger })
    ).resolves.toBe(42);
  });

  it('should resolve with the query value when not aborted', async () => {
    const controller = new AbortController();
    const pending = deferred<string>();

    const raced = raceAbort(pending.promise, { signal: controller.signal, operation: 'op', logger });
    pending.resolve('row');

    await expect(raced).resolves.toBe('row');
  });

  it('should pass through query failures', async () => {
    const controller = new AbortController();
    const failure = new Error('syntax error');

    await expect(
      raceAbort(Promise.reject(failure), { signal: controller.signal, operation: 'op', logger })
    ).rejects.toBe(failure);
  });

  it('should reject promptly when aborted mid-query', async () => {
    const controller = new AbortController();
    const pending = deferred<string>();

    const raced = raceAbort(pending.promise, {
      signal: controller.signal,
      operation: 'listReviewsByService',
      logger,
    });
    controller.abort('timeout');

    const error = await raced.catch((e: unknown) => e);
    expect(error).toBeInstanceOf(OperationCancelledError);
    expect(error).toMatchObject({
      kind: ErrorKind.CANCELLED,
      operation: 'listReviewsByService',
      reason: 'timeout',
    });

    // the abandoned query settles later without an unhandled rejection
    pending.reject(new Error('connection closed'));
    await Promise.resolve();
  });

  it('should log abandoned failures at debug', async () => {
    const debugLogger = createLogger({ name: 'cancellation-test', level: 'silent', pretty: false });
    const debugSpy = vi.spyOn(debugLogger, 'debug');
    const controller = new AbortController();
    controller.abort();
    const failure = new Error('late failure');

    await expect(
      raceAbort(Promise.reject(failure), {
        signal: controller.signal,
        operation: 'createRating',
        logger: debugLogger,
      })
    ).rejects.toBeInstanceOf(OperationCancelledError);
    await new Promise((resolve) => setImmediate(resolve));

    expect(debugSpy).toHaveBeenCalledWith(
      { err: failure, operation: 'createRating' },
      'Abandoned query failed after cancellation'
    );
  });
});

/**
 * Bounded waits for collaborator calls.
 */

import { CollaboratorTimeoutError } from '../../domain/stream/errors.js';

/**
 * Settle with the promise, or reject with CollaboratorTimeoutError once
 * `timeoutMs` elapses. A non-positive timeout disables the bound.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  if (timeoutMs <= 0) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      reject(new CollaboratorTimeoutError(operation, timeoutMs));
    }, timeoutMs);

    promise
      .then((value) => {
        clearTimeout(timeoutId);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timeoutId);
        reject(error);
      });
  });
}

/**
 * Run `fn` lazily under a timeout so synchronous throws reject the result.
 */
export function callWithTimeout<T>(fn: () => Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let promise: Promise<T>;
  try {
    promise = fn();
  } catch (error) {
    return Promise.reject(error);
  }
  return withTimeout(promise, timeoutMs, operation);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const abortHandler = () => {
      clearTimeout(timeoutId);
      resolve();
    };

    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', abortHandler);
      resolve();
    }, ms);

    signal?.addEventListener('abort', abortHandler, { once: true });
  });
}

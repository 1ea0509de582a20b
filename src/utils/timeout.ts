/**
 * Timeout utilities for async operations
 */

import { timeoutError } from './errors.js';

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  /** Time allowed to establish the TCP connection */
  connect: 5_000,
  /** Inactivity allowed while the request body is written */
  write: 10_000,
  /** Inactivity allowed while waiting for the response */
  read: 10_000,
  /** Read timeout for the liveness probe */
  probeRead: 5_000,
} as const;

/**
 * Wrap a promise with a timeout
 *
 * @throws StreamError with TimeoutError if timeout is exceeded
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operationName: string = 'Operation'
): Promise<T> {
  let timeoutId: NodeJS.Timeout | null = null;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(timeoutError(`${operationName} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}

/**
 * Abort controller that aborts itself after a timeout
 * Useful for operations that support AbortSignal
 */
export function createTimeoutAbortController(timeoutMs: number): {
  controller: AbortController;
  cleanup: () => void;
} {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort(timeoutError(`Operation timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  return {
    controller,
    cleanup: () => clearTimeout(timeoutId),
  };
}

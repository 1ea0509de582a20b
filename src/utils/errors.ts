/**
 * Standardized error utilities for the frame pipeline
 *
 * Failures are classified by name so callers can branch on the kind of
 * failure without string matching on messages:
 * - EncodingError: compressor failure or corrupt raw input (frame skipped)
 * - QuotaExceededError: encoded payload above the frame-size ceiling (frame skipped)
 * - DataError: malformed compressed payload on the receiving side (frame skipped)
 * - NetworkError: connection refused/reset or receiver unreachable (session-ending)
 * - TimeoutError: connect/read/write deadline exceeded (session-ending)
 * - AbortError: in-flight work cancelled by stop()
 * - InvalidStateError: operation in the wrong session state
 *
 * Malformed configuration is reported with a plain TypeError at startup.
 */

export type StreamErrorName =
  | 'EncodingError'
  | 'QuotaExceededError'
  | 'DataError'
  | 'NetworkError'
  | 'TimeoutError'
  | 'AbortError'
  | 'InvalidStateError';

export class StreamError extends Error {
  override readonly name: StreamErrorName;

  constructor(message: string, name: StreamErrorName, options?: { cause?: unknown }) {
    super(message, options);
    this.name = name;
  }
}

export function encodingError(message: string, cause?: unknown): StreamError {
  return new StreamError(message, 'EncodingError', { cause });
}

/**
 * Create a QuotaExceededError (payload over the size ceiling)
 */
export function quotaExceededError(message: string): StreamError {
  return new StreamError(message, 'QuotaExceededError');
}

/**
 * Create a DataError (e.g., truncated or corrupt JPEG)
 */
export function dataError(message: string, cause?: unknown): StreamError {
  return new StreamError(message, 'DataError', { cause });
}

export function networkError(message: string, cause?: unknown): StreamError {
  return new StreamError(message, 'NetworkError', { cause });
}

export function timeoutError(message: string): StreamError {
  return new StreamError(message, 'TimeoutError');
}

export function abortError(message: string): StreamError {
  return new StreamError(message, 'AbortError');
}

export function invalidStateError(message: string): StreamError {
  return new StreamError(message, 'InvalidStateError');
}

/**
 * Wrap an error as a StreamError if it isn't already
 *
 * @param error - The error to wrap
 * @param defaultName - The error name to use if error is not a StreamError
 */
export function wrapAsStreamError(
  error: unknown,
  defaultName: StreamErrorName = 'EncodingError'
): StreamError {
  if (error instanceof StreamError) {
    return error;
  }
  if (error instanceof Error) {
    return new StreamError(error.message, defaultName, { cause: error });
  }
  return new StreamError(String(error), defaultName);
}

/**
 * Check if an error is a specific stream error type
 */
export function isStreamError<N extends StreamErrorName>(
  error: unknown,
  name: N
): error is StreamError & { name: N } {
  return error instanceof StreamError && error.name === name;
}

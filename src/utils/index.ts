/**
 * Utility exports
 */

// Logger
export {
  Logger,
  createLogger,
  setDebugMode,
  setSilent,
  type LogLevel,
  type LogEntry,
} from './logger.js';

// Timeout utilities
export {
  withTimeout,
  createTimeoutAbortController,
  DEFAULT_TIMEOUTS,
} from './timeout.js';

// Error utilities
export {
  StreamError,
  encodingError,
  quotaExceededError,
  dataError,
  networkError,
  timeoutError,
  abortError,
  invalidStateError,
  wrapAsStreamError,
  isStreamError,
  type StreamErrorName,
} from './errors.js';

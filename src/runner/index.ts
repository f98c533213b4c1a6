/**
 * Runner infrastructure shared by the retry loop: structured logging
 * and error envelopes.
 */

// Logger
export {
  createLogger,
  type StructuredLogger,
  type LoggerOptions,
  type LogEntry,
  type LogLevel,
} from './logger.js';

// Errors
export {
  createErrorEnvelope,
  wrapError,
  describeThrown,
  RetryError,
  FailNowSignal,
  RetryConfigError,
  RetryAbandonedError,
  type RetryErrorEnvelope,
  type ErrorCode,
} from './errors.js';

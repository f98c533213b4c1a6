/**
 * Shared error envelope for the retry harness.
 *
 * Every error the harness raises carries an envelope so reporters and
 * structured logs see the same shape whatever went wrong.
 */

export type ErrorCode =
  | 'INVALID_CONFIG'
  | 'ABANDONED'
  | 'ASYNC_CHECK'
  | 'CHECK_THREW';

export interface RetryErrorEnvelope {
  code: ErrorCode;
  message: string;
  /** Whether the condition goes away on another attempt. */
  retryable: boolean;
  cause?: string;
  context?: Record<string, unknown>;
}

const NON_RETRYABLE = new Set<ErrorCode>(['INVALID_CONFIG', 'ABANDONED']);

/**
 * Best-effort message for any thrown value.
 */
export function describeThrown(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  opts: { cause?: unknown; context?: Record<string, unknown> } = {},
): RetryErrorEnvelope {
  const causeMsg = opts.cause != null ? describeThrown(opts.cause) : undefined;

  return {
    code,
    message,
    retryable: !NON_RETRYABLE.has(code),
    ...(causeMsg !== undefined && { cause: causeMsg }),
    ...(opts.context && { context: opts.context }),
  };
}

/**
 * Wrap a value thrown out of a check function into an envelope.
 */
export function wrapError(err: unknown): RetryErrorEnvelope {
  return createErrorEnvelope('CHECK_THREW', describeThrown(err), { cause: err });
}

// ---- Error classes ---------------------------------------------------

export class RetryError extends Error {
  readonly envelope: RetryErrorEnvelope;

  constructor(envelope: RetryErrorEnvelope) {
    super(envelope.message);
    this.name = new.target.name;
    this.envelope = envelope;
  }

  get code(): ErrorCode {
    return this.envelope.code;
  }
}

/**
 * Thrown by `R.failNow()` to unwind the current attempt. The retry loop
 * catches it at the attempt boundary; it never reaches the caller.
 */
export class FailNowSignal extends Error {
  constructor() {
    super('attempt aborted');
    this.name = 'FailNowSignal';
  }
}

export class RetryConfigError extends RetryError {
  constructor(message: string, issues: string[]) {
    super(createErrorEnvelope('INVALID_CONFIG', message, { context: { issues } }));
  }
}

export class RetryAbandonedError extends RetryError {
  constructor(output: string) {
    super(createErrorEnvelope('ABANDONED', output === '' ? 'retry abandoned' : output));
  }
}

/**
 * Host reporter: the minimal surface the retry loop needs from a test
 * runner. Any runner's test handle can be adapted to it.
 */

import { RetryAbandonedError } from '../runner/errors.js';

export interface T {
  /** Called once with the final, deduplicated output. */
  log(...args: unknown[]): void;

  /** Called when retrying is abandoned. */
  failNow(): void;
}

export interface ThrowingReporter extends T {
  /** Everything passed to `log`, one entry per call. */
  readonly logged: readonly string[];
}

/**
 * Reporter for runners that fail a test by throwing (vitest, jest,
 * node:test). `failNow` throws a {@link RetryAbandonedError} whose message
 * is the logged output.
 */
export function createThrowingReporter(): ThrowingReporter {
  const logged: string[] = [];

  return {
    logged,
    log: (...args: unknown[]) => {
      logged.push(args.map(String).join(' '));
    },
    failNow: () => {
      throw new RetryAbandonedError(logged.join('\n'));
    },
  };
}

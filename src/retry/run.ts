/**
 * The retry loop.
 *
 * Each attempt runs inside its own try/catch boundary, so `R.failNow()`
 * (and anything else the check throws) unwinds only that attempt. The
 * loop itself returns normally whether the check passed or the policy
 * gave up; giving up is reported through `T.failNow()`.
 */

import { FailNowSignal, createErrorEnvelope, wrapError } from '../runner/errors.js';
import type { StructuredLogger } from '../runner/logger.js';
import { callSiteFromStack, captureCallSite, type CallSite } from './call-site.js';
import { resolveTimerOptions } from './config.js';
import { R } from './context.js';
import { dedup } from './dedup.js';
import { Timer, type Retryer, type SyncRetryer } from './policy.js';
import type { T } from './reporter.js';

export type CheckFn = (r: R) => void | Promise<void>;
export type SyncCheckFn = (r: R) => void;

export type RunOutcome = 'succeeded' | 'gave-up';

export interface RunResult {
  outcome: RunOutcome;
  /** Attempts that actually ran. */
  attempts: number;
}

export interface RunOptions {
  /** Receives one event per attempt plus the final outcome. */
  logger?: StructuredLogger;
}

// ---------------------------------------------------------------------------
// Shared plumbing
// ---------------------------------------------------------------------------

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

function stackOf(err: unknown): string | undefined {
  return err instanceof Error ? err.stack : undefined;
}

/**
 * Fold whatever an attempt threw into the context. The abort signal has
 * already marked the attempt; anything else is recorded at its origin.
 */
function contain(r: R, err: unknown): void {
  if (!(err instanceof FailNowSignal)) {
    r.recordAt(callSiteFromStack(stackOf(err)), wrapError(err).message);
  }
  r.markFailed();
}

/**
 * Bookkeeping common to the async and blocking loops: the context, the
 * give-up callback and the log events.
 */
class RunState {
  readonly r = new R();
  attempts = 0;
  readonly giveUp: () => void;

  constructor(
    private readonly t: T,
    private readonly logger: StructuredLogger | undefined,
  ) {
    this.giveUp = () => {
      this.logger?.warn('run.gave_up', 'retry policy gave up', { attempts: this.attempts });
      const out = dedup(this.r.output);
      if (out !== '') {
        this.t.log(out);
      }
      this.t.failNow();
    };
  }

  begin(): void {
    this.attempts++;
    this.logger?.debug('attempt.start', `attempt ${this.attempts}`, { attempt: this.attempts });
  }

  /** True when the attempt passed; otherwise clears the flag for the next one. */
  settle(): boolean {
    if (this.r.failed) {
      this.logger?.debug('attempt.failed', `attempt ${this.attempts} failed`, { attempt: this.attempts });
      this.r.reset();
      return false;
    }
    this.logger?.info('run.succeeded', `passed after ${this.attempts} attempt(s)`, { attempts: this.attempts });
    return true;
  }

  result(outcome: RunOutcome): RunResult {
    return { outcome, attempts: this.attempts };
  }
}

// ---------------------------------------------------------------------------
// Async loop
// ---------------------------------------------------------------------------

/**
 * Retry `f` every 25ms for up to 2s, stopping as soon as it passes.
 * `RETRY_TIMEOUT_MS` / `RETRY_WAIT_MS` override the defaults.
 */
export async function run(t: T, f: CheckFn, options: RunOptions = {}): Promise<RunResult> {
  return runWith(t, new Timer(resolveTimerOptions()), f, options);
}

export async function runWith(
  t: T,
  retryer: Retryer,
  f: CheckFn,
  options: RunOptions = {},
): Promise<RunResult> {
  const state = new RunState(t, options.logger);

  while (await retryer.next(state.giveUp)) {
    state.begin();
    try {
      await f(state.r);
    } catch (err) {
      contain(state.r, err);
    }
    if (state.settle()) return state.result('succeeded');
  }
  return state.result('gave-up');
}

// ---------------------------------------------------------------------------
// Blocking loop
// ---------------------------------------------------------------------------

/**
 * Blocking form of {@link run}. Waits between attempts hold the thread.
 */
export function runSync(t: T, f: SyncCheckFn, options: RunOptions = {}): RunResult {
  return loopSync(t, new Timer(resolveTimerOptions()), f, options, captureCallSite(runSync));
}

export function runWithSync(
  t: T,
  retryer: SyncRetryer,
  f: SyncCheckFn,
  options: RunOptions = {},
): RunResult {
  return loopSync(t, retryer, f, options, captureCallSite(runWithSync));
}

function loopSync(
  t: T,
  retryer: SyncRetryer,
  f: SyncCheckFn,
  options: RunOptions,
  entry: CallSite,
): RunResult {
  const state = new RunState(t, options.logger);

  while (retryer.nextSync(state.giveUp)) {
    state.begin();
    try {
      const returned: unknown = f(state.r);
      if (isPromiseLike(returned)) {
        rejectAsync(state, returned, entry, options.logger);
      }
    } catch (err) {
      contain(state.r, err);
    }
    if (state.settle()) return state.result('succeeded');
  }
  return state.result('gave-up');
}

function rejectAsync(
  state: RunState,
  returned: PromiseLike<unknown>,
  entry: CallSite,
  logger: StructuredLogger | undefined,
): void {
  const envelope = createErrorEnvelope(
    'ASYNC_CHECK',
    'check function returned a promise; use runWith for async checks',
  );
  state.r.recordAt(entry, envelope.message);
  state.r.markFailed();
  // The blocking loop cannot await it, but a rejection must not go unhandled.
  Promise.resolve(returned).catch((err: unknown) => {
    logger?.warn('attempt.async_rejected', wrapError(err).message, { attempt: state.attempts });
  });
}

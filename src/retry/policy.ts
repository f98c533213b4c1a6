/**
 * Retry policies: decide before each attempt whether another one runs.
 *
 * A policy is called from one control flow at a time and is stateful,
 * so use a fresh instance per run.
 */

import { systemClock, type Clock } from './clock.js';
import {
  DEFAULT_TIMER_OPTIONS,
  validateCounterOptions,
  validateTimerOptions,
  type CounterOptions,
  type TimerOptions,
} from './config.js';

/**
 * Repeats an operation until it succeeds or an exit condition is met.
 */
export interface Retryer {
  /**
   * Resolve `true` if the operation should run (again). Otherwise call
   * `fail` and resolve `false`.
   */
  next(fail: () => void): Promise<boolean>;
}

/** Blocking counterpart of {@link Retryer}. */
export interface SyncRetryer {
  nextSync(fail: () => void): boolean;
}

/** Outcome of one policy decision. */
type Verdict = 'run' | 'wait' | 'stop';

/**
 * Shared plumbing for policies that pause `wait` ms between attempts.
 * `'wait'` runs another attempt after a pause.
 */
abstract class WaitingRetryer implements Retryer, SyncRetryer {
  abstract readonly wait: number;
  protected abstract readonly clock: Clock;

  protected abstract decide(fail: () => void): Verdict;

  async next(fail: () => void): Promise<boolean> {
    const verdict = this.decide(fail);
    if (verdict === 'wait') {
      await this.clock.sleep(this.wait);
    }
    return verdict !== 'stop';
  }

  nextSync(fail: () => void): boolean {
    const verdict = this.decide(fail);
    if (verdict === 'wait') {
      this.clock.sleepSync(this.wait);
    }
    return verdict !== 'stop';
  }
}

/**
 * Repeats an operation for `timeout` ms, waiting `wait` ms between
 * attempts. The deadline is fixed by the first decision, which always
 * allows an attempt; a decision made at or after it gives up. With
 * instant attempts that is `floor(timeout / wait) + 1` attempts when
 * `wait` divides `timeout`.
 */
export class Timer extends WaitingRetryer {
  readonly timeout: number;
  readonly wait: number;
  protected readonly clock: Clock;
  private deadline: number | undefined;

  constructor(options: Partial<TimerOptions> = {}, clock: Clock = systemClock) {
    super();
    const resolved = validateTimerOptions({
      timeout: options.timeout ?? DEFAULT_TIMER_OPTIONS.timeout,
      wait: options.wait ?? DEFAULT_TIMER_OPTIONS.wait,
    });
    this.timeout = resolved.timeout;
    this.wait = resolved.wait;
    this.clock = clock;
  }

  protected decide(fail: () => void): Verdict {
    const now = this.clock.now();
    if (this.deadline === undefined) {
      this.deadline = now + this.timeout;
      return 'run';
    }
    if (now >= this.deadline) {
      fail();
      return 'stop';
    }
    return 'wait';
  }
}

/**
 * Repeats an operation at most `count` times, waiting `wait` ms between
 * attempts.
 */
export class Counter extends WaitingRetryer {
  readonly count: number;
  readonly wait: number;
  protected readonly clock: Clock;
  private attempts = 0;

  constructor(options: Partial<CounterOptions> = {}, clock: Clock = systemClock) {
    super();
    const resolved = validateCounterOptions({
      count: options.count ?? 3,
      wait: options.wait ?? DEFAULT_TIMER_OPTIONS.wait,
    });
    this.count = resolved.count;
    this.wait = resolved.wait;
    this.clock = clock;
  }

  protected decide(fail: () => void): Verdict {
    if (this.attempts >= this.count) {
      fail();
      return 'stop';
    }
    this.attempts++;
    return this.attempts === 1 ? 'run' : 'wait';
  }
}

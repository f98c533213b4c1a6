/**
 * Retry-until-success harness for test assertions.
 *
 * Re-exports the loop, the attempt context, the policies and the host
 * reporter surface.
 */

// Loop
export {
  run,
  runWith,
  runSync,
  runWithSync,
  type CheckFn,
  type SyncCheckFn,
  type RunOptions,
  type RunOutcome,
  type RunResult,
} from './run.js';

// Attempt context
export { R } from './context.js';
export { dedup } from './dedup.js';
export {
  captureCallSite,
  callSiteFromStack,
  decorate,
  UNKNOWN_CALL_SITE,
  type CallSite,
} from './call-site.js';

// Policies
export { Timer, Counter, type Retryer, type SyncRetryer } from './policy.js';
export { systemClock, type Clock } from './clock.js';

// Configuration
export {
  TimerOptionsSchema,
  CounterOptionsSchema,
  DEFAULT_TIMER_OPTIONS,
  resolveTimerOptions,
  validateTimerOptions,
  validateCounterOptions,
  type TimerOptions,
  type CounterOptions,
} from './config.js';

// Host reporter
export { createThrowingReporter, type T, type ThrowingReporter } from './reporter.js';

/**
 * retry-until
 *
 * Re-run a check function until it passes or a retry policy gives up,
 * then hand the deduplicated failure output to the test runner.
 *
 * Boundary Statement:
 * - One attempt at a time, never concurrent
 * - Deadline- or count-based policies only; no jitter or backoff
 * - No CLI, no network, no persisted state
 */

export * from './retry/index.js';
export * from './runner/index.js';

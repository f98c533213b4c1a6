/**
 * Policy configuration: defaults, environment overrides and validation.
 */

import { z } from 'zod';
import { RetryConfigError } from '../runner/errors.js';

const Millis = z.number().int().nonnegative();

export const TimerOptionsSchema = z.object({
  timeout: Millis,
  wait: Millis,
});

export const CounterOptionsSchema = z.object({
  count: z.number().int().min(1),
  wait: Millis,
});

export type TimerOptions = z.infer<typeof TimerOptionsSchema>;
export type CounterOptions = z.infer<typeof CounterOptionsSchema>;

/** Retry every 25ms for up to 2s. */
export const DEFAULT_TIMER_OPTIONS: Readonly<TimerOptions> = {
  timeout: 2_000,
  wait: 25,
};

const EnvSchema = z.object({
  RETRY_TIMEOUT_MS: z.coerce.number().pipe(Millis).optional(),
  RETRY_WAIT_MS: z.coerce.number().pipe(Millis).optional(),
});

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new RetryConfigError(`invalid ${what}`, issuesOf(result.error));
  }
  return result.data;
}

export function validateTimerOptions(input: unknown): TimerOptions {
  return parseOrThrow(TimerOptionsSchema, input, 'timer options');
}

export function validateCounterOptions(input: unknown): CounterOptions {
  return parseOrThrow(CounterOptionsSchema, input, 'counter options');
}

function definedOnly(opts: Partial<TimerOptions>): Partial<TimerOptions> {
  const out: Partial<TimerOptions> = {};
  if (opts.timeout !== undefined) out.timeout = opts.timeout;
  if (opts.wait !== undefined) out.wait = opts.wait;
  return out;
}

/**
 * Merge defaults, `RETRY_TIMEOUT_MS` / `RETRY_WAIT_MS` and explicit
 * overrides, later sources winning. Empty variables count as unset.
 */
export function resolveTimerOptions(
  overrides: Partial<TimerOptions> = {},
  env: NodeJS.ProcessEnv = process.env,
): TimerOptions {
  const raw = {
    RETRY_TIMEOUT_MS: env.RETRY_TIMEOUT_MS || undefined,
    RETRY_WAIT_MS: env.RETRY_WAIT_MS || undefined,
  };
  const fromEnv = parseOrThrow(EnvSchema, raw, 'retry environment');

  return validateTimerOptions({
    ...DEFAULT_TIMER_OPTIONS,
    ...definedOnly({ timeout: fromEnv.RETRY_TIMEOUT_MS, wait: fromEnv.RETRY_WAIT_MS }),
    ...definedOnly(overrides),
  });
}

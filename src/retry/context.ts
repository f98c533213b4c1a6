import { format, inspect } from 'util';
import { FailNowSignal, describeThrown } from '../runner/errors.js';
import { captureCallSite, decorate, type CallSite } from './call-site.js';

function sprint(args: readonly unknown[]): string {
  return args.map((arg) => (typeof arg === 'string' ? arg : inspect(arg))).join(' ');
}

/**
 * Context handed to the check function for one attempt.
 *
 * Output accumulates over the whole run; the failure flag is owned by the
 * retry loop, which clears it between attempts. The recording methods are
 * bound to the instance, so assertion helpers may destructure them.
 */
export class R {
  private fail = false;
  private readonly lines: string[] = [];

  get failed(): boolean {
    return this.fail;
  }

  /** Lines recorded so far, oldest first. */
  get output(): readonly string[] {
    return [...this.lines];
  }

  /**
   * Mark the attempt failed and stop it. Code after this call in the
   * same attempt does not run.
   */
  readonly failNow = (): never => {
    this.fail = true;
    throw new FailNowSignal();
  };

  readonly fatal = (...args: unknown[]): never => {
    this.record(sprint(args), captureCallSite(this.fatal));
    return this.failNow();
  };

  readonly fatalf = (fmt: string, ...args: unknown[]): never => {
    this.record(format(fmt, ...args), captureCallSite(this.fatalf));
    return this.failNow();
  };

  /** Record a failure and keep going; the attempt still counts as failed. */
  readonly error = (...args: unknown[]): void => {
    this.record(sprint(args), captureCallSite(this.error));
    this.fail = true;
  };

  readonly errorf = (fmt: string, ...args: unknown[]): void => {
    this.record(format(fmt, ...args), captureCallSite(this.errorf));
    this.fail = true;
  };

  /** Abort the attempt if `err` is set. */
  readonly check = (err: unknown): void => {
    if (err == null) return;
    this.record(describeThrown(err), captureCallSite(this.check));
    this.failNow();
  };

  readonly log = (...args: unknown[]): void => {
    this.record(sprint(args), captureCallSite(this.log));
  };

  readonly logf = (fmt: string, ...args: unknown[]): void => {
    this.record(format(fmt, ...args), captureCallSite(this.logf));
  };

  /** @internal Used by the retry loop. */
  recordAt(site: CallSite, message: string): void {
    this.record(message, site);
  }

  /** @internal Used by the retry loop. */
  markFailed(): void {
    this.fail = true;
  }

  /** @internal Used by the retry loop between attempts. */
  reset(): void {
    this.fail = false;
  }

  private record(message: string, site: CallSite): void {
    this.lines.push(decorate(site, message));
  }
}

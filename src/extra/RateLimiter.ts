import {
  ConfigurationError,
  GeocoderError,
  RateLimitedError,
  ServiceError,
  TransportTimeoutError,
  TransportUnavailableError,
} from '../utils/errors';
import { logger } from '../utils/logger';

export type Sleep = (ms: number) => Promise<void>;

export interface RateLimiterOptions {
  /** Minimum gap between the starts of two consecutive calls. */
  minDelayMs?: number;
  maxRetries?: number;
  /** Wait before a retry when the error carries no Retry-After hint. */
  errorWaitMs?: number;
  /** Resolve to null instead of rejecting once a geocoder error is final. */
  swallowErrors?: boolean;
  now?: () => number;
  sleep?: Sleep;
}

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Wraps a geocoder call so that invocations run one at a time, spaced at
 * least `minDelayMs` apart, with retries on transient failures.
 *
 * @example
 * const geocode = new RateLimiter((q: string) => yandex.geocode(q), { minDelayMs: 1000 });
 * const location = await geocode.call('Moscow');
 */
export class RateLimiter<A extends unknown[], T> {
  readonly minDelayMs: number;
  readonly maxRetries: number;
  readonly errorWaitMs: number;
  readonly swallowErrors: boolean;
  private readonly now: () => number;
  private readonly sleep: Sleep;
  private lastStartedAt: number | null = null;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly fn: (...args: A) => Promise<T>,
    options: RateLimiterOptions = {}
  ) {
    this.minDelayMs = nonNegative(options.minDelayMs ?? 0, 'minDelayMs');
    this.maxRetries = nonNegative(options.maxRetries ?? 2, 'maxRetries');
    this.errorWaitMs = nonNegative(options.errorWaitMs ?? 5000, 'errorWaitMs');
    this.swallowErrors = options.swallowErrors ?? true;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  call(...args: A): Promise<T | null> {
    const run = this.tail.then(() => this.execute(args));
    // The next call waits for this one to settle either way; its outcome is
    // delivered through `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async execute(args: A): Promise<T | null> {
    for (let attempt = 1; ; attempt++) {
      await this.waitForSlot();
      this.lastStartedAt = this.now();

      try {
        return await this.fn(...args);
      } catch (error) {
        if (!(error instanceof GeocoderError)) {
          throw error;
        }
        if (attempt > this.maxRetries || !isRetryable(error)) {
          if (this.swallowErrors) {
            logger.warn(`[RateLimiter] Giving up after ${attempt} attempt(s): ${error.message}`);
            return null;
          }
          throw error;
        }

        const waitMs = this.retryWait(error);
        logger.warn(`[RateLimiter] Attempt ${attempt} failed (${error.code}), retrying in ${waitMs}ms`);
        await this.sleep(waitMs);
      }
    }
  }

  private async waitForSlot(): Promise<void> {
    if (this.lastStartedAt === null || this.minDelayMs === 0) return;
    const remaining = this.lastStartedAt + this.minDelayMs - this.now();
    if (remaining > 0) {
      logger.debug(`[RateLimiter] Waiting ${remaining}ms before next call`);
      await this.sleep(remaining);
    }
  }

  private retryWait(error: GeocoderError): number {
    if (error instanceof RateLimitedError && error.retryAfterSeconds !== undefined) {
      return error.retryAfterSeconds * 1000;
    }
    return this.errorWaitMs;
  }
}

export function isRetryable(error: GeocoderError): boolean {
  return (
    error instanceof TransportTimeoutError ||
    error instanceof TransportUnavailableError ||
    error instanceof ServiceError ||
    error instanceof RateLimitedError
  );
}

function nonNegative(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${field} must be a non-negative number, got ${value}`, field);
  }
  return value;
}

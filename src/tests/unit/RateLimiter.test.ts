import { RateLimiter, isRetryable } from '../../extra/RateLimiter';
import {
  AuthError,
  ConfigurationError,
  ParseError,
  QueryError,
  QuotaExceededError,
  RateLimitedError,
  ServiceError,
  TransportTimeoutError,
  TransportUnavailableError,
} from '../../utils/errors';
import { silenceConsole } from '../helpers/transport';

function fakeClock() {
  let now = 0;
  const sleep = jest.fn(async (ms: number) => {
    now += ms;
  });
  return { now: () => now, sleep };
}

describe('RateLimiter', () => {
  beforeEach(() => {
    silenceConsole();
  });

  describe('Pacing', () => {
    it('should run calls one at a time in submission order', async () => {
      const clock = fakeClock();
      const started: string[] = [];
      const fn = jest.fn(async (query: string) => {
        started.push(query);
        return query.toUpperCase();
      });
      const limiter = new RateLimiter(fn, { minDelayMs: 1000, ...clock });

      const results = await Promise.all([limiter.call('a'), limiter.call('b'), limiter.call('c')]);

      expect(results).toEqual(['A', 'B', 'C']);
      expect(started).toEqual(['a', 'b', 'c']);
    });

    it('should space call starts by minDelayMs', async () => {
      const clock = fakeClock();
      const limiter = new RateLimiter(async (query: string) => query, { minDelayMs: 1000, ...clock });

      await Promise.all([limiter.call('a'), limiter.call('b')]);

      expect(clock.sleep.mock.calls).toEqual([[1000]]);
    });

    it('should not wait when minDelayMs is zero', async () => {
      const clock = fakeClock();
      const limiter = new RateLimiter(async (query: string) => query, clock);

      await Promise.all([limiter.call('a'), limiter.call('b')]);

      expect(clock.sleep).not.toHaveBeenCalled();
    });
  });

  describe('Retries', () => {
    it('should retry a timeout after errorWaitMs', async () => {
      const clock = fakeClock();
      const fn = jest
        .fn<Promise<string>, [string]>()
        .mockRejectedValueOnce(new TransportTimeoutError('timed out', 1000))
        .mockResolvedValueOnce('ok');
      const limiter = new RateLimiter(fn, clock);

      await expect(limiter.call('Moscow')).resolves.toBe('ok');
      expect(fn).toHaveBeenCalledTimes(2);
      expect(clock.sleep.mock.calls).toEqual([[5000]]);
    });

    it('should honour the Retry-After hint of a rate-limited response', async () => {
      const clock = fakeClock();
      const fn = jest
        .fn<Promise<string>, [string]>()
        .mockRejectedValueOnce(new RateLimitedError('slow down', undefined, 3, 429))
        .mockResolvedValueOnce('ok');
      const limiter = new RateLimiter(fn, { errorWaitMs: 100, ...clock });

      await expect(limiter.call('Moscow')).resolves.toBe('ok');
      expect(clock.sleep.mock.calls).toEqual([[3000]]);
    });

    it('should give up after maxRetries and resolve to null', async () => {
      const clock = fakeClock();
      const fn = jest.fn<Promise<string>, [string]>().mockRejectedValue(new ServiceError('upstream failure'));
      const limiter = new RateLimiter(fn, clock);

      await expect(limiter.call('Moscow')).resolves.toBeNull();
      expect(fn).toHaveBeenCalledTimes(3);
      expect(clock.sleep.mock.calls).toEqual([[5000], [5000]]);
    });

    it('should reject with the last error when swallowErrors is off', async () => {
      const clock = fakeClock();
      const failure = new TransportUnavailableError('connection refused');
      const fn = jest.fn<Promise<string>, [string]>().mockRejectedValue(failure);
      const limiter = new RateLimiter(fn, { maxRetries: 1, swallowErrors: false, ...clock });

      await expect(limiter.call('Moscow')).rejects.toBe(failure);
      expect(fn).toHaveBeenCalledTimes(2);
    });

    it.each([
      ['QueryError', new QueryError('bad query')],
      ['AuthError', new AuthError('denied')],
      ['ParseError', new ParseError('garbled')],
      ['QuotaExceededError', new QuotaExceededError('quota used up')],
    ])('should not retry %s', async (_name, failure) => {
      const clock = fakeClock();
      const fn = jest.fn<Promise<string>, [string]>().mockRejectedValue(failure);
      const limiter = new RateLimiter(fn, { swallowErrors: false, ...clock });

      await expect(limiter.call('Moscow')).rejects.toBe(failure);
      expect(fn).toHaveBeenCalledTimes(1);
      expect(clock.sleep).not.toHaveBeenCalled();
    });

    it('should rethrow errors from outside the geocoder taxonomy', async () => {
      const bug = new TypeError('undefined is not a function');
      const limiter = new RateLimiter(jest.fn<Promise<string>, []>().mockRejectedValue(bug), fakeClock());

      await expect(limiter.call()).rejects.toBe(bug);
    });

    it('should keep serving calls after one fails', async () => {
      const clock = fakeClock();
      const fn = jest
        .fn<Promise<string>, [string]>()
        .mockRejectedValueOnce(new QueryError('bad query'))
        .mockResolvedValueOnce('ok');
      const limiter = new RateLimiter(fn, { swallowErrors: false, ...clock });

      const first = limiter.call('');
      const second = limiter.call('Moscow');

      await expect(first).rejects.toThrow(QueryError);
      await expect(second).resolves.toBe('ok');
    });
  });

  describe('Configuration', () => {
    it('should expose the defaults', () => {
      const limiter = new RateLimiter(async () => 'ok');

      expect(limiter.minDelayMs).toBe(0);
      expect(limiter.maxRetries).toBe(2);
      expect(limiter.errorWaitMs).toBe(5000);
      expect(limiter.swallowErrors).toBe(true);
    });

    it('should reject negative delays', () => {
      expect(() => new RateLimiter(async () => 'ok', { minDelayMs: -1 })).toThrow(ConfigurationError);
    });

    it('should classify retryable errors', () => {
      expect(isRetryable(new TransportTimeoutError('timed out', null))).toBe(true);
      expect(isRetryable(new RateLimitedError('slow down'))).toBe(true);
      expect(isRetryable(new QuotaExceededError('quota used up'))).toBe(false);
    });
  });
});

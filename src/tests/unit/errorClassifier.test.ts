import {
  classifyHttpStatus,
  classifyStatusToken,
  normalizeTransportFailure,
  parseRetryAfter,
  StatusTable,
} from '../../geocoders/errorClassifier';
import {
  AuthError,
  ConfigurationError,
  GeocoderError,
  QueryError,
  QuotaExceededError,
  RateLimitedError,
  ServiceError,
  TransportTimeoutError,
  TransportUnavailableError,
} from '../../utils/errors';

describe('Error classification', () => {
  describe('HTTP status table', () => {
    it('should map 400 to QueryError keeping the detail', () => {
      const error = classifyHttpStatus(400, 'missing text');

      expect(error).toBeInstanceOf(QueryError);
      expect(error.code).toBe('QUERY_ERROR');
      expect(error.detail).toBe('missing text');
      expect(error.message).toBe('Non-successful status code 400: missing text');
    });

    it.each([412, 413, 414])('should map %i to QueryError', (status) => {
      expect(classifyHttpStatus(status)).toBeInstanceOf(QueryError);
    });

    it.each([401, 403, 407])('should map %i to AuthError', (status) => {
      const error = classifyHttpStatus(status);

      expect(error).toBeInstanceOf(AuthError);
      expect(error.message).toBe(`Non-successful status code ${status}`);
    });

    it('should map 402 to a plain QuotaExceededError', () => {
      const error = classifyHttpStatus(402);

      expect(error).toBeInstanceOf(QuotaExceededError);
      expect(error).not.toBeInstanceOf(RateLimitedError);
      expect(error.code).toBe('QUOTA_EXCEEDED');
    });

    it('should map 429 to RateLimitedError with the retry hint', () => {
      const error = classifyHttpStatus(429, 'slow down', 30);

      expect(error).toBeInstanceOf(RateLimitedError);
      expect(error).toBeInstanceOf(QuotaExceededError);
      expect(error.code).toBe('RATE_LIMITED');
      expect(error instanceof RateLimitedError && error.retryAfterSeconds).toBe(30);
      expect(error instanceof RateLimitedError && error.statusCode).toBe(429);
    });

    it.each([408, 504])('should map %i to TransportTimeoutError', (status) => {
      const error = classifyHttpStatus(status);

      expect(error).toBeInstanceOf(TransportTimeoutError);
      expect(error instanceof TransportTimeoutError && error.timeoutMs).toBeNull();
    });

    it.each([502, 503])('should map %i to TransportUnavailableError', (status) => {
      expect(classifyHttpStatus(status)).toBeInstanceOf(TransportUnavailableError);
    });

    it.each([418, 500])('should map unlisted status %i to ServiceError', (status) => {
      const error = classifyHttpStatus(status, 'teapot');

      expect(error).toBeInstanceOf(ServiceError);
      expect(error instanceof ServiceError && error.statusCode).toBe(status);
      expect(error.detail).toBe('teapot');
    });
  });

  describe('Status tokens', () => {
    const table: StatusTable<string> = {
      OVER_LIMIT: 'quota',
      DENIED: 'auth',
      BAD_INPUT: 'query',
    };

    it('should keep the token as detail and include the provider message', () => {
      const error = classifyStatusToken('Example', 'OVER_LIMIT', table, 'Daily quota used up');

      expect(error).toBeInstanceOf(QuotaExceededError);
      expect(error.detail).toBe('OVER_LIMIT');
      expect(error.message).toBe('Example returned status OVER_LIMIT: Daily quota used up');
    });

    it('should map unknown tokens to ServiceError', () => {
      const error = classifyStatusToken('Example', 'SOMETHING_NEW', table);

      expect(error).toBeInstanceOf(ServiceError);
      expect(error.detail).toBe('SOMETHING_NEW');
      expect(error.message).toBe('Example returned status SOMETHING_NEW');
    });

    it('should not match inherited object keys', () => {
      expect(classifyStatusToken('Example', 'toString', table)).toBeInstanceOf(ServiceError);
    });
  });

  describe('Retry-After', () => {
    it('should read delay seconds', () => {
      expect(parseRetryAfter({ 'retry-after': '120' })).toBe(120);
    });

    it('should convert an HTTP date into seconds from now', () => {
      const now = Date.parse('Wed, 21 Oct 2015 07:28:00 GMT');

      expect(parseRetryAfter({ 'retry-after': 'Wed, 21 Oct 2015 07:28:30 GMT' }, now)).toBe(30);
    });

    it('should ignore missing or unreadable values', () => {
      expect(parseRetryAfter({})).toBeUndefined();
      expect(parseRetryAfter({ 'retry-after': 'soon' })).toBeUndefined();
    });
  });

  describe('Transport failures', () => {
    it('should pass taxonomy errors through unchanged', () => {
      const original = new TransportTimeoutError('timed out', 1000);

      expect(normalizeTransportFailure(original, 'https://geo.example.com/search')).toBe(original);
    });

    it('should wrap foreign errors as TransportUnavailableError', () => {
      const cause = new Error('socket hang up');
      const error = normalizeTransportFailure(cause, 'https://geo.example.com/search');

      expect(error).toBeInstanceOf(TransportUnavailableError);
      expect(error.message).toBe('Request to https://geo.example.com/search failed: socket hang up');
      expect(error.originalError).toBe(cause);
    });
  });

  describe('Error hierarchy', () => {
    it('should make ConfigurationError a QueryError with its own code', () => {
      const error = new ConfigurationError('Timeout must be positive', 'timeoutMs');

      expect(error).toBeInstanceOf(QueryError);
      expect(error).toBeInstanceOf(GeocoderError);
      expect(error.code).toBe('CONFIGURATION_ERROR');
      expect(error.field).toBe('timeoutMs');
      expect(error.name).toBe('ConfigurationError');
    });
  });
});

// Normalized error taxonomy shared by every geocoder adapter

export type GeocoderErrorCode =
  | 'QUERY_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'TIMEOUT_ERROR'
  | 'UNAVAILABLE_ERROR'
  | 'SERVICE_ERROR'
  | 'QUOTA_EXCEEDED'
  | 'RATE_LIMITED'
  | 'PARSE_ERROR'
  | 'AUTH_ERROR';

export class GeocoderError extends Error {
  constructor(
    message: string,
    public readonly code: GeocoderErrorCode,
    public readonly detail?: string,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'GeocoderError';
  }
}

/**
 * Caller input was rejected before any network call.
 */
export class QueryError extends GeocoderError {
  constructor(
    message: string,
    detail?: string,
    public readonly field?: string,
    originalError?: unknown,
    code: 'QUERY_ERROR' | 'CONFIGURATION_ERROR' = 'QUERY_ERROR'
  ) {
    super(message, code, detail, originalError);
    this.name = 'QueryError';
  }
}

/**
 * Raised from adapter constructors (and when process defaults are configured)
 * for invalid or conflicting settings.
 */
export class ConfigurationError extends QueryError {
  constructor(message: string, field?: string) {
    super(message, undefined, field, undefined, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class TransportTimeoutError extends GeocoderError {
  constructor(
    message: string,
    public readonly timeoutMs: number | null,
    detail?: string,
    originalError?: unknown
  ) {
    super(message, 'TIMEOUT_ERROR', detail, originalError);
    this.name = 'TransportTimeoutError';
  }
}

export class TransportUnavailableError extends GeocoderError {
  constructor(message: string, detail?: string, originalError?: unknown) {
    super(message, 'UNAVAILABLE_ERROR', detail, originalError);
    this.name = 'TransportUnavailableError';
  }
}

export class ServiceError extends GeocoderError {
  constructor(message: string, detail?: string, public readonly statusCode?: number) {
    super(message, 'SERVICE_ERROR', detail);
    this.name = 'ServiceError';
  }
}

export class QuotaExceededError extends GeocoderError {
  constructor(
    message: string,
    detail?: string,
    public readonly statusCode?: number,
    code: 'QUOTA_EXCEEDED' | 'RATE_LIMITED' = 'QUOTA_EXCEEDED'
  ) {
    super(message, code, detail);
    this.name = 'QuotaExceededError';
  }
}

export class RateLimitedError extends QuotaExceededError {
  constructor(
    message: string,
    detail?: string,
    public readonly retryAfterSeconds?: number,
    statusCode?: number
  ) {
    super(message, detail, statusCode, 'RATE_LIMITED');
    this.name = 'RateLimitedError';
  }
}

export class ParseError extends GeocoderError {
  constructor(message: string, public readonly body?: unknown, originalError?: unknown) {
    super(message, 'PARSE_ERROR', undefined, originalError);
    this.name = 'ParseError';
  }
}

export class AuthError extends GeocoderError {
  constructor(message: string, detail?: string, public readonly statusCode?: number) {
    super(message, 'AUTH_ERROR', detail);
    this.name = 'AuthError';
  }
}

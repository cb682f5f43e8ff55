import {
  AuthError,
  GeocoderError,
  QueryError,
  QuotaExceededError,
  RateLimitedError,
  ServiceError,
  TransportTimeoutError,
  TransportUnavailableError,
} from '../utils/errors';

export type ErrorKind = 'query' | 'auth' | 'quota' | 'rate_limited' | 'service' | 'timeout' | 'unavailable';

export type StatusTable<K extends string | number> = Readonly<Record<K, ErrorKind>>;

/**
 * Shared mapping for non-2xx responses. Statuses not listed here become
 * ServiceError.
 */
export const HTTP_STATUS_ERRORS: StatusTable<number> = {
  400: 'query',
  401: 'auth',
  402: 'quota',
  403: 'auth',
  407: 'auth',
  408: 'timeout',
  412: 'query',
  413: 'query',
  414: 'query',
  429: 'rate_limited',
  502: 'unavailable',
  503: 'unavailable',
  504: 'timeout',
};

export interface ErrorDetails {
  detail?: string;
  statusCode?: number;
  retryAfterSeconds?: number;
}

export function createError(kind: ErrorKind, message: string, details: ErrorDetails = {}): GeocoderError {
  const { detail, statusCode, retryAfterSeconds } = details;
  switch (kind) {
    case 'query':
      return new QueryError(message, detail);
    case 'auth':
      return new AuthError(message, detail, statusCode);
    case 'quota':
      return new QuotaExceededError(message, detail, statusCode);
    case 'rate_limited':
      return new RateLimitedError(message, detail, retryAfterSeconds, statusCode);
    case 'timeout':
      return new TransportTimeoutError(message, null, detail);
    case 'unavailable':
      return new TransportUnavailableError(message, detail);
    case 'service':
      return new ServiceError(message, detail, statusCode);
  }
}

function lookup<K extends string | number>(table: StatusTable<K>, key: K): ErrorKind | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

export function classifyHttpStatus(
  status: number,
  detail?: string,
  retryAfterSeconds?: number
): GeocoderError {
  const kind = lookup(HTTP_STATUS_ERRORS, status) ?? 'service';
  const message = detail
    ? `Non-successful status code ${status}: ${detail}`
    : `Non-successful status code ${status}`;
  return createError(kind, message, { detail, statusCode: status, retryAfterSeconds });
}

/**
 * Map a provider status token (e.g. `OVER_QUERY_LIMIT`). Unknown tokens become
 * ServiceError; the token itself is always kept as the error detail.
 */
export function classifyStatusToken(
  provider: string,
  token: string,
  table: StatusTable<string>,
  providerMessage?: string
): GeocoderError {
  const kind = lookup(table, token) ?? 'service';
  const message = providerMessage
    ? `${provider} returned status ${token}: ${providerMessage}`
    : `${provider} returned status ${token}`;
  return createError(kind, message, { detail: token });
}

/**
 * Retry-After is either delay-seconds or an HTTP date.
 */
export function parseRetryAfter(headers: Record<string, string>, now: number = Date.now()): number | undefined {
  const header = headers['retry-after'];
  if (!header) return undefined;

  const trimmed = header.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed);
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, Math.ceil((date - now) / 1000));
}

/**
 * Custom transports may throw anything; only taxonomy errors leave the core.
 */
export function normalizeTransportFailure(error: unknown, url: string): GeocoderError {
  if (error instanceof GeocoderError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportUnavailableError(`Request to ${url} failed: ${message}`, undefined, error);
}

import { createHmac } from 'crypto';
import { Location } from '../../geo/Location';
import { BoundsLike, Point, formatCoordinate } from '../../geo/Point';
import { ConfigurationError, GeocoderError, ParseError, QueryError } from '../../utils/errors';
import { TransportResponse } from '../../utils/http';
import { logger } from '../../utils/logger';
import { coerceBounds, getPath, isRecord, nonEmptyString, pointFromNumbers, validateDomain } from '../../utils/validation';
import { StatusTable, classifyStatusToken } from '../errorClassifier';
import { Geocoder } from '../Geocoder';
import { GeocodeOptions, GeocoderConfig, GeocoderRequest, QueryParams, ReverseOptions } from '../types';

/**
 * Component filters, either as a record or as pairs when a key repeats
 * (e.g. two `route` components).
 */
export type GoogleComponents = Readonly<Record<string, string>> | ReadonlyArray<readonly [string, string]>;

export interface GoogleV3Config extends GeocoderConfig {
  apiKey?: string;
  /** Premier (enterprise) client id; requires `secretKey`. */
  clientId?: string;
  /** URL-safe base64 signing secret; requires `clientId`. */
  secretKey?: string;
  /** Premier usage reporting channel. */
  channel?: string;
  domain?: string;
}

export interface GoogleV3GeocodeOptions extends GeocodeOptions {
  /** Viewport to bias results toward. */
  bounds?: BoundsLike;
  region?: string;
  components?: GoogleComponents;
  placeId?: string;
  language?: string;
}

export interface GoogleV3ReverseOptions extends ReverseOptions {
  language?: string;
}

export const GOOGLE_STATUS_ERRORS: StatusTable<string> = {
  OVER_QUERY_LIMIT: 'quota',
  OVER_DAILY_LIMIT: 'quota',
  REQUEST_DENIED: 'auth',
  INVALID_REQUEST: 'query',
  UNKNOWN_ERROR: 'service',
};

const NON_ERROR_STATUSES = new Set(['OK', 'ZERO_RESULTS']);

function isComponentList(components: GoogleComponents): components is ReadonlyArray<readonly [string, string]> {
  return Array.isArray(components);
}

export function formatComponents(components: GoogleComponents): string {
  const entries = isComponentList(components) ? components : Object.entries(components);
  return entries
    .map(([key, value]) => {
      if (typeof key !== 'string' || typeof value !== 'string') {
        throw new QueryError('Components must map string keys to string values', undefined, 'components');
      }
      return `${key}:${value}`;
    })
    .join('|');
}

export function formatBounds(bounds: BoundsLike): string {
  const { south, west, north, east } = coerceBounds(bounds);
  return `${formatCoordinate(south)},${formatCoordinate(west)}|${formatCoordinate(north)},${formatCoordinate(east)}`;
}

/**
 * Google Maps Geocoding API v3.
 *
 * API docs: https://developers.google.com/maps/documentation/geocoding/
 *
 * Error signals: the body `status` token wins whenever it reports an error,
 * even on a non-2xx response; otherwise the HTTP status table applies.
 */
export class GoogleV3 extends Geocoder<GoogleV3GeocodeOptions, GoogleV3ReverseOptions> {
  readonly name: string = 'GoogleV3';
  readonly premier: boolean;
  protected readonly domain: string;
  private readonly apiPath = '/maps/api/geocode/json';
  private readonly apiKey?: string;
  private readonly clientId?: string;
  private readonly channel?: string;
  private readonly secret?: Buffer;

  constructor(config: GoogleV3Config = {}) {
    super(config);
    const { apiKey, clientId, secretKey, channel } = config;

    if (clientId && !secretKey) {
      throw new ConfigurationError('Must provide secretKey with clientId', 'secretKey');
    }
    if (secretKey && !clientId) {
      throw new ConfigurationError('Must provide clientId with secretKey', 'clientId');
    }
    this.premier = Boolean(clientId && secretKey);

    if (this.premier && apiKey) {
      throw new ConfigurationError('Use either apiKey or the premier clientId/secretKey pair, not both', 'apiKey');
    }
    if (channel && !this.premier) {
      throw new ConfigurationError('channel is only supported with premier clientId/secretKey credentials', 'channel');
    }
    if (!apiKey && !this.premier) {
      logger.warn('[GoogleV3] No apiKey configured: Google requires an API key or premier credentials on every request');
    }

    this.domain = validateDomain(config.domain ?? 'maps.googleapis.com');
    this.apiKey = apiKey;
    this.clientId = clientId;
    this.channel = channel;
    if (secretKey) {
      this.secret = decodeSecret(secretKey);
    }
  }

  protected formatGeocode(query: string, options: GoogleV3GeocodeOptions = {}): GeocoderRequest {
    const hasQuery = typeof query === 'string' && query.trim().length > 0;
    const components = options.components !== undefined ? formatComponents(options.components) : '';

    if (options.placeId !== undefined && (hasQuery || components)) {
      throw new QueryError('Only one of query, placeId or components may be used together with placeId', undefined, 'placeId');
    }
    if (!hasQuery && options.placeId === undefined && !components) {
      throw new QueryError('Either query, components or placeId must be set', undefined, 'query');
    }

    const params: QueryParams = {};
    if (options.placeId !== undefined) {
      params.place_id = options.placeId;
    }
    if (hasQuery) {
      params.address = this.formatQuery(query);
    }
    this.addApiKey(params);
    if (options.bounds) {
      params.bounds = formatBounds(options.bounds);
    }
    if (options.region) {
      params.region = options.region;
    }
    if (components) {
      params.components = components;
    }
    if (options.language) {
      params.language = options.language;
    }
    this.addPremierParams(params);
    return { path: this.apiPath, params };
  }

  protected formatReverse(point: Point, options: GoogleV3ReverseOptions = {}): GeocoderRequest {
    const params: QueryParams = { latlng: point.format('{lat},{lon}') };
    this.addApiKey(params);
    if (options.language) {
      params.language = options.language;
    }
    this.addPremierParams(params);
    return { path: this.apiPath, params };
  }

  protected parseResponse(body: unknown, exactlyOne: boolean): Location[] {
    if (!isRecord(body)) {
      throw new ParseError('Failed to parse GoogleV3 response: expected a JSON object', body);
    }

    const statusError = this.statusError(body);
    if (statusError) {
      throw statusError;
    }

    if (body.results === undefined && body.status === 'ZERO_RESULTS') {
      return [];
    }
    return this.parseEntries(body.results, exactlyOne, (place) => this.parsePlace(place));
  }

  protected classifyErrorResponse(response: TransportResponse, body: unknown): GeocoderError {
    return (isRecord(body) ? this.statusError(body) : undefined) ?? super.classifyErrorResponse(response, body);
  }

  /**
   * Premier requests carry `&signature=` computed over `path?query` with
   * HMAC-SHA1 and the decoded secret.
   */
  protected signPath(pathAndQuery: string): string {
    if (!this.secret) {
      return pathAndQuery;
    }
    const signature = createHmac('sha1', this.secret)
      .update(pathAndQuery)
      .digest('base64')
      .replace(/\+/g, '-')
      .replace(/\//g, '_');
    return `${pathAndQuery}&signature=${signature}`;
  }

  private addApiKey(params: QueryParams): void {
    if (this.apiKey) {
      params.key = this.apiKey;
    }
  }

  private addPremierParams(params: QueryParams): void {
    if (!this.premier || !this.clientId) return;
    params.client = this.clientId;
    if (this.channel) {
      params.channel = this.channel;
    }
  }

  private statusError(body: Record<string, unknown>): GeocoderError | undefined {
    const status = body.status;
    if (typeof status !== 'string' || NON_ERROR_STATUSES.has(status)) {
      return undefined;
    }
    return classifyStatusToken('GoogleV3', status, GOOGLE_STATUS_ERRORS, nonEmptyString(body.error_message));
  }

  private parsePlace(place: unknown): Location {
    if (!isRecord(place)) {
      throw new ParseError('Failed to parse GoogleV3 response: result entry is not an object', place);
    }
    const point = pointFromNumbers(
      getPath(place, ['geometry', 'location', 'lat']),
      getPath(place, ['geometry', 'location', 'lng']),
      place
    );
    return new Location(nonEmptyString(place.formatted_address) ?? '', point, place);
  }
}

function decodeSecret(secretKey: string): Buffer {
  if (!/^[A-Za-z0-9_\-+/]+={0,2}$/.test(secretKey)) {
    throw new ConfigurationError('secretKey must be URL-safe base64', 'secretKey');
  }
  const secret = Buffer.from(secretKey, 'base64');
  if (secret.length === 0) {
    throw new ConfigurationError('secretKey must not decode to an empty value', 'secretKey');
  }
  return secret;
}

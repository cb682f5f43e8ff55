import { Location } from '../../geo/Location';
import { BoundsLike, Point, formatCoordinate } from '../../geo/Point';
import { ParseError, QueryError, ServiceError } from '../../utils/errors';
import {
  coerceBounds,
  getPath,
  isRecord,
  nonEmptyString,
  pointFromNumbers,
  requireQueryText,
  validateDomain,
} from '../../utils/validation';
import { Geocoder } from '../Geocoder';
import { GeocodeOptions, GeocoderConfig, GeocoderRequest, QueryParams, ReverseOptions } from '../types';

export interface PeliasConfig extends GeocoderConfig {
  /** Host of the Pelias instance, without scheme. */
  domain: string;
  apiKey?: string;
}

export interface PeliasGeocodeOptions extends GeocodeOptions {
  /** Two opposite corners of the box results must fall into. */
  boundaryRect?: BoundsLike;
  /** ISO 3166 alpha-2 or alpha-3 codes. */
  countries?: readonly string[];
  language?: string;
}

export interface PeliasReverseOptions extends ReverseOptions {
  language?: string;
}

/**
 * Pelias, the open source geocoder.
 *
 * API docs: https://github.com/pelias/documentation
 *
 * Error signals: a non-2xx status is classified by status code with the
 * first `geocoding.errors` entry as detail; on 2xx a non-empty
 * `geocoding.errors` raises ServiceError.
 */
export class Pelias extends Geocoder<PeliasGeocodeOptions, PeliasReverseOptions> {
  readonly name: string = 'Pelias';
  protected readonly domain: string;
  protected readonly geocodePath: string = '/v1/search';
  protected readonly reversePath: string = '/v1/reverse';
  private readonly apiKey?: string;

  constructor(config: PeliasConfig) {
    super(config);
    this.domain = validateDomain(config.domain);
    this.apiKey = config.apiKey;
  }

  protected formatGeocode(query: string, options: PeliasGeocodeOptions = {}): GeocoderRequest {
    const params: QueryParams = { text: this.formatQuery(requireQueryText(query)) };
    this.addApiKey(params);

    if (options.boundaryRect) {
      const { south, west, north, east } = coerceBounds(options.boundaryRect, 'boundaryRect');
      params['boundary.rect.min_lon'] = formatCoordinate(west);
      params['boundary.rect.min_lat'] = formatCoordinate(south);
      params['boundary.rect.max_lon'] = formatCoordinate(east);
      params['boundary.rect.max_lat'] = formatCoordinate(north);
    }
    if (options.countries && options.countries.length > 0) {
      params['boundary.country'] = formatCountries(options.countries);
    }
    if (options.language) {
      params.lang = options.language;
    }
    return { path: this.geocodePath, params };
  }

  protected formatReverse(point: Point, options: PeliasReverseOptions = {}): GeocoderRequest {
    const params: QueryParams = {
      'point.lat': formatCoordinate(point.latitude),
      'point.lon': formatCoordinate(point.longitude),
    };
    this.addApiKey(params);
    if (options.language) {
      params.lang = options.language;
    }
    return { path: this.reversePath, params };
  }

  protected parseResponse(body: unknown, exactlyOne: boolean): Location[] {
    const errorMessage = firstGeocodingError(body);
    if (errorMessage) {
      throw new ServiceError(`${this.name} returned an error: ${errorMessage}`, errorMessage);
    }
    return this.parseEntries(getPath(body, ['features']), exactlyOne, (feature) => this.parseFeature(feature));
  }

  protected extractErrorMessage(body: unknown): string | undefined {
    return firstGeocodingError(body) ?? super.extractErrorMessage(body);
  }

  private addApiKey(params: QueryParams): void {
    if (this.apiKey) {
      params.api_key = this.apiKey;
    }
  }

  private parseFeature(feature: unknown): Location {
    if (!isRecord(feature)) {
      throw new ParseError(`Failed to parse ${this.name} response: feature is not an object`, feature);
    }
    const coordinates = getPath(feature, ['geometry', 'coordinates']);
    if (!Array.isArray(coordinates) || coordinates.length < 2) {
      throw new ParseError(`Failed to parse ${this.name} response: feature has no coordinates`, feature);
    }
    // GeoJSON order
    const point = pointFromNumbers(coordinates[1], coordinates[0], feature);
    return new Location(nonEmptyString(getPath(feature, ['properties', 'name'])) ?? '', point, feature);
  }
}

function formatCountries(countries: readonly string[]): string {
  return countries
    .map((country) => {
      const code = nonEmptyString(country);
      if (!code) {
        throw new QueryError('Country codes must be non-empty strings', undefined, 'countries');
      }
      return code.trim();
    })
    .join(',');
}

function firstGeocodingError(body: unknown): string | undefined {
  const errors = getPath(body, ['geocoding', 'errors']);
  if (!Array.isArray(errors) || errors.length === 0) return undefined;
  return nonEmptyString(errors[0]) ?? String(errors[0]);
}

import { Location } from '../../geo/Location';
import { Point } from '../../geo/Point';
import { ConfigurationError, ParseError, ServiceError } from '../../utils/errors';
import { getPath, isRecord, joinLabel, nonEmptyString, parseCoordinateText, requireQueryText, validateDomain } from '../../utils/validation';
import { Geocoder } from '../Geocoder';
import { GeocodeOptions, GeocoderConfig, GeocoderRequest, QueryParams, ReverseOptions } from '../types';

export const YANDEX_LANGS = ['ru_RU', 'uk_UA', 'be_BY', 'en_RU', 'en_US', 'tr_TR'] as const;

export type YandexLang = (typeof YANDEX_LANGS)[number];

export function isYandexLang(value: string): value is YandexLang {
  return YANDEX_LANGS.some((lang) => lang === value);
}

export type YandexKind = 'house' | 'street' | 'metro' | 'district' | 'locality';

export interface YandexConfig extends GeocoderConfig {
  /** Optional for the free tier. */
  apiKey?: string;
  lang?: YandexLang;
  domain?: string;
}

export type YandexGeocodeOptions = GeocodeOptions;

export interface YandexReverseOptions extends ReverseOptions {
  /** Type of toponym to look for. */
  kind?: YandexKind;
}

const RESULTS_PATH = ['response', 'GeoObjectCollection', 'featureMember'] as const;
const LABEL_FIELDS = ['name', 'description'] as const;

/**
 * Yandex geocoder.
 *
 * API docs: https://yandex.com/dev/maps/geocoder/
 *
 * Error signals: a non-2xx status is classified by status code; on 2xx a
 * body-level `error` raises ServiceError with the provider message.
 */
export class Yandex extends Geocoder<YandexGeocodeOptions, YandexReverseOptions> {
  readonly name: string = 'Yandex';
  protected readonly domain: string;
  private readonly apiPath = '/1.x/';
  private readonly apiKey?: string;
  private readonly lang?: YandexLang;

  constructor(config: YandexConfig = {}) {
    super(config);
    this.domain = validateDomain(config.domain ?? 'geocode-maps.yandex.ru');
    this.apiKey = config.apiKey;
    if (config.lang !== undefined && !isYandexLang(config.lang)) {
      throw new ConfigurationError(`Unsupported Yandex lang "${String(config.lang)}"`, 'lang');
    }
    this.lang = config.lang;
  }

  protected formatGeocode(query: string, options: YandexGeocodeOptions = {}): GeocoderRequest {
    const params: QueryParams = {
      geocode: this.formatQuery(requireQueryText(query)),
      format: 'json',
    };
    this.addCommonParams(params);
    if (options.exactlyOne ?? true) {
      params.results = '1';
    }
    return { path: this.apiPath, params };
  }

  protected formatReverse(point: Point, options: YandexReverseOptions = {}): GeocoderRequest {
    const params: QueryParams = {
      geocode: point.format('{lon},{lat}'),
      format: 'json',
    };
    this.addCommonParams(params);
    if (options.kind) {
      params.kind = options.kind;
    }
    return { path: this.apiPath, params };
  }

  protected parseResponse(body: unknown, exactlyOne: boolean): Location[] {
    const error = getPath(body, ['error']);
    if (error) {
      const message =
        nonEmptyString(getPath(error, ['message'])) ?? nonEmptyString(error) ?? 'Unknown Yandex error';
      throw new ServiceError(`Yandex returned an error: ${message}`, message);
    }

    const members = getPath(body, RESULTS_PATH);
    if (!Array.isArray(members)) {
      throw new ParseError('Failed to parse server response: featureMember collection is missing', body);
    }
    return this.parseEntries(members, exactlyOne, (member) => this.parseGeoObject(member));
  }

  private addCommonParams(params: QueryParams): void {
    if (this.apiKey) {
      params.apikey = this.apiKey;
    }
    if (this.lang) {
      params.lang = this.lang;
    }
  }

  private parseGeoObject(member: unknown): Location {
    const place = getPath(member, ['GeoObject']);
    if (!isRecord(place)) {
      throw new ParseError('Failed to parse server response: GeoObject is missing', member);
    }

    // Yandex writes positions as "longitude latitude"
    const point = parseCoordinateText(getPath(place, ['Point', 'pos']), ' ', 'lon-lat');
    return new Location(joinLabel(place, LABEL_FIELDS), point, place);
  }
}

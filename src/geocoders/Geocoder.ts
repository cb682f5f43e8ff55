import { Location } from '../geo/Location';
import { Point, PointLike } from '../geo/Point';
import { GeocoderError, ParseError } from '../utils/errors';
import { HttpTransport, ProxyConfig, TlsOptions, TransportResponse } from '../utils/http';
import { logger } from '../utils/logger';
import {
  Scheme,
  coercePoint,
  getPath,
  nonEmptyString,
  parseProxy,
  validateFormatString,
  validateScheme,
  validateTimeout,
  validateTls,
} from '../utils/validation';
import { classifyHttpStatus, normalizeTransportFailure, parseRetryAfter } from './errorClassifier';
import { getGeocoderDefaults } from './options';
import {
  CallOptions,
  GeocodeOptions,
  GeocoderAdapter,
  GeocoderConfig,
  GeocoderRequest,
  ResolvedCallSettings,
  ReverseOptions,
} from './types';

export type Operation = 'geocode' | 'reverse';

/**
 * Shared request pipeline. Providers supply the query formatters and the
 * response parser; everything between the two (settings precedence, URL
 * construction, transport call, status classification, JSON decoding and
 * result selection) lives here.
 */
export abstract class Geocoder<G extends GeocodeOptions, R extends ReverseOptions>
  implements GeocoderAdapter<G, R>
{
  abstract readonly name: string;
  protected abstract readonly domain: string;

  protected readonly formatString: string;
  protected readonly scheme: Scheme;
  protected readonly timeoutMs: number | null;
  protected readonly proxy: ProxyConfig | null;
  protected readonly tls: TlsOptions | null;
  protected readonly headers: Readonly<Record<string, string>>;
  protected readonly transport: HttpTransport;

  constructor(config: GeocoderConfig = {}) {
    const defaults = getGeocoderDefaults();

    this.formatString = validateFormatString(config.formatString ?? defaults.formatString);
    this.scheme = validateScheme(config.scheme ?? defaults.scheme);
    this.timeoutMs = config.timeoutMs !== undefined ? validateTimeout(config.timeoutMs) : defaults.timeoutMs;
    this.proxy = config.proxy !== undefined ? parseProxy(config.proxy) : defaults.proxy;
    this.tls = config.tls !== undefined ? validateTls(config.tls) : defaults.tls;
    this.headers = Object.freeze({ 'User-Agent': config.userAgent ?? defaults.userAgent });
    this.transport = config.transport ?? defaults.transport;
  }

  protected abstract formatGeocode(query: string, options: G | undefined): GeocoderRequest;

  protected abstract formatReverse(point: Point, options: R | undefined): GeocoderRequest;

  /**
   * Turn a decoded 2xx body into results. When `exactlyOne` is set only the
   * first entry needs to be parsed.
   */
  protected abstract parseResponse(body: unknown, exactlyOne: boolean): Location[];

  geocode(query: string, options: G & { exactlyOne: false }): Promise<Location[]>;
  geocode(query: string, options?: G & { exactlyOne?: true }): Promise<Location | null>;
  geocode(query: string, options?: G): Promise<Location | Location[] | null>;
  async geocode(query: string, options?: G): Promise<Location | Location[] | null> {
    const exactlyOne = options?.exactlyOne ?? true;
    const request = this.formatGeocode(query, options);
    const body = await this.callGeocoder(request, options, 'geocode');
    return this.select(this.parseResponse(body, exactlyOne), exactlyOne);
  }

  reverse(query: PointLike, options: R & { exactlyOne: false }): Promise<Location[]>;
  reverse(query: PointLike, options?: R & { exactlyOne?: true }): Promise<Location | null>;
  reverse(query: PointLike, options?: R): Promise<Location | Location[] | null>;
  async reverse(query: PointLike, options?: R): Promise<Location | Location[] | null> {
    const exactlyOne = options?.exactlyOne ?? true;
    const point = coercePoint(query);
    const request = this.formatReverse(point, options);
    const body = await this.callGeocoder(request, options, 'reverse');
    return this.select(this.parseResponse(body, exactlyOne), exactlyOne);
  }

  protected formatQuery(query: string): string {
    return this.formatString.replace('%s', () => query);
  }

  /**
   * Per-call option > adapter value (itself already resolved against the
   * process defaults at construction).
   */
  protected resolveSettings(options: CallOptions | undefined): ResolvedCallSettings {
    return {
      scheme: options?.scheme !== undefined ? validateScheme(options.scheme) : this.scheme,
      timeoutMs: options?.timeoutMs !== undefined ? validateTimeout(options.timeoutMs) : this.timeoutMs,
      proxy: options?.proxy !== undefined ? parseProxy(options.proxy) : this.proxy,
      tls: options?.tls !== undefined ? validateTls(options.tls) : this.tls,
    };
  }

  /**
   * Hook for providers whose requests must be signed. Receives `path?query`
   * and returns the string to send in its place.
   */
  protected signPath(pathAndQuery: string): string {
    return pathAndQuery;
  }

  protected buildUrl(request: GeocoderRequest, scheme: Scheme): string {
    const query = new URLSearchParams(request.params).toString();
    const pathAndQuery = query ? `${request.path}?${query}` : request.path;
    return `${scheme}://${this.domain}${this.signPath(pathAndQuery)}`;
  }

  protected async callGeocoder(
    request: GeocoderRequest,
    options: CallOptions | undefined,
    operation: Operation
  ): Promise<unknown> {
    const settings = this.resolveSettings(options);
    const url = this.buildUrl(request, settings.scheme);
    logger.debug(`[${this.name}] ${operation}: ${url}`);

    let response: TransportResponse;
    try {
      response = await this.transport.perform({
        method: 'GET',
        url,
        headers: { ...this.headers },
        timeoutMs: settings.timeoutMs,
        proxy: settings.proxy,
        tls: settings.tls,
      });
    } catch (error) {
      const failure = normalizeTransportFailure(error, url);
      logger.warn(`[${this.name}] ${operation} transport failure: ${failure.message}`);
      throw failure;
    }

    if (response.status < 200 || response.status >= 300) {
      const failure = this.classifyErrorResponse(response, decodeJsonLoose(response.body));
      logger.warn(`[${this.name}] ${operation} failed with HTTP ${response.status}: ${failure.message}`);
      throw failure;
    }

    try {
      return JSON.parse(response.body);
    } catch (error) {
      throw new ParseError(`Could not decode ${this.name} response as JSON`, response.body, error);
    }
  }

  /**
   * Default non-2xx handling: the HTTP status decides the kind, a message
   * found in the body becomes the detail.
   */
  protected classifyErrorResponse(response: TransportResponse, body: unknown): GeocoderError {
    const detail = this.extractErrorMessage(body) ?? nonEmptyString(response.statusText);
    return classifyHttpStatus(response.status, detail, parseRetryAfter(response.headers));
  }

  protected extractErrorMessage(body: unknown): string | undefined {
    return (
      nonEmptyString(getPath(body, ['error', 'message'])) ??
      nonEmptyString(getPath(body, ['error'])) ??
      nonEmptyString(getPath(body, ['message'])) ??
      nonEmptyString(getPath(body, ['error_message']))
    );
  }

  /**
   * Map a results collection, parsing only the first entry for `exactlyOne`.
   */
  protected parseEntries(
    entries: unknown,
    exactlyOne: boolean,
    parseEntry: (entry: unknown) => Location
  ): Location[] {
    if (!Array.isArray(entries)) {
      throw new ParseError(`Failed to parse ${this.name} response: results collection is missing`, entries);
    }
    const selected: unknown[] = exactlyOne ? entries.slice(0, 1) : entries;
    return selected.map((entry) => parseEntry(entry));
  }

  private select(results: Location[], exactlyOne: boolean): Location | Location[] | null {
    if (exactlyOne) {
      return results[0] ?? null;
    }
    return results;
  }
}

function decodeJsonLoose(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

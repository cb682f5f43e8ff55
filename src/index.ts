export { Point, formatCoordinate } from './geo/Point';
export type { BoundsLike, PointLike, PointTuple } from './geo/Point';
export { Location } from './geo/Location';
export type { JsonObject } from './geo/Location';

export { Geocoder } from './geocoders/Geocoder';
export type { Operation } from './geocoders/Geocoder';
export type {
  CallOptions,
  GeocodeOptions,
  GeocoderAdapter,
  GeocoderConfig,
  GeocoderRequest,
  QueryParams,
  ResolvedCallSettings,
  ReverseOptions,
} from './geocoders/types';
export {
  LIBRARY_VERSION,
  configureGeocoderDefaults,
  geocoderDefaultsFromEnv,
  getGeocoderDefaults,
  resetGeocoderDefaults,
} from './geocoders/options';
export type { GeocoderDefaults, GeocoderDefaultsInput } from './geocoders/options';
export {
  HTTP_STATUS_ERRORS,
  classifyHttpStatus,
  classifyStatusToken,
  parseRetryAfter,
} from './geocoders/errorClassifier';
export type { ErrorKind, StatusTable } from './geocoders/errorClassifier';
export { GEOCODER_SERVICES, getGeocoderForService, isGeocoderService } from './geocoders/registry';
export type { GeocoderService } from './geocoders/registry';

export { Yandex, YANDEX_LANGS } from './geocoders/providers/Yandex';
export type { YandexConfig, YandexGeocodeOptions, YandexKind, YandexLang, YandexReverseOptions } from './geocoders/providers/Yandex';
export { GoogleV3, GOOGLE_STATUS_ERRORS } from './geocoders/providers/GoogleV3';
export type { GoogleComponents, GoogleV3Config, GoogleV3GeocodeOptions, GoogleV3ReverseOptions } from './geocoders/providers/GoogleV3';
export { Pelias } from './geocoders/providers/Pelias';
export type { PeliasConfig, PeliasGeocodeOptions, PeliasReverseOptions } from './geocoders/providers/Pelias';
export { GeocodeEarth } from './geocoders/providers/GeocodeEarth';
export type { GeocodeEarthConfig } from './geocoders/providers/GeocodeEarth';

export { RateLimiter } from './extra/RateLimiter';
export type { RateLimiterOptions, Sleep } from './extra/RateLimiter';

export { HttpClient } from './utils/http';
export type { HttpMethod, HttpTransport, ProxyConfig, TlsOptions, TransportRequest, TransportResponse } from './utils/http';
export {
  AuthError,
  ConfigurationError,
  GeocoderError,
  ParseError,
  QueryError,
  QuotaExceededError,
  RateLimitedError,
  ServiceError,
  TransportTimeoutError,
  TransportUnavailableError,
} from './utils/errors';
export type { GeocoderErrorCode } from './utils/errors';
export { logger } from './utils/logger';
export type { LogLevel } from './utils/logger';

// Core interfaces shared by every geocoder adapter

import type { Location } from '../../geo/Location';
import type { PointLike } from '../../geo/Point';
import type { HttpTransport, ProxyConfig, TlsOptions } from '../../utils/http';
import type { Scheme } from '../../utils/validation';

export type QueryParams = Record<string, string>;

/**
 * Output of a query formatter: the provider path and its query parameters.
 */
export interface GeocoderRequest {
  path: string;
  params: QueryParams;
}

/**
 * Per-call overrides. An absent property inherits the adapter's value;
 * `null` explicitly disables the timeout, proxy or TLS options.
 */
export interface CallOptions {
  timeoutMs?: number | null;
  proxy?: string | ProxyConfig | null;
  tls?: TlsOptions | null;
  scheme?: Scheme;
}

export interface GeocodeOptions extends CallOptions {
  /** Defaults to true. */
  exactlyOne?: boolean;
}

export interface ReverseOptions extends CallOptions {
  /** Defaults to true. */
  exactlyOne?: boolean;
}

export interface GeocoderConfig {
  /** Template applied to forward queries; must contain `%s`. */
  formatString?: string;
  scheme?: Scheme;
  timeoutMs?: number | null;
  proxy?: string | ProxyConfig | null;
  tls?: TlsOptions | null;
  userAgent?: string;
  transport?: HttpTransport;
}

export interface ResolvedCallSettings {
  scheme: Scheme;
  timeoutMs: number | null;
  proxy: ProxyConfig | null;
  tls: TlsOptions | null;
}

/**
 * The contract every provider implements. Holding only this type, a caller can
 * switch providers without touching call sites.
 */
export interface GeocoderAdapter<
  G extends GeocodeOptions = GeocodeOptions,
  R extends ReverseOptions = ReverseOptions,
> {
  readonly name: string;

  geocode(query: string, options: G & { exactlyOne: false }): Promise<Location[]>;
  geocode(query: string, options?: G & { exactlyOne?: true }): Promise<Location | null>;
  geocode(query: string, options?: G): Promise<Location | Location[] | null>;

  reverse(query: PointLike, options: R & { exactlyOne: false }): Promise<Location[]>;
  reverse(query: PointLike, options?: R & { exactlyOne?: true }): Promise<Location | null>;
  reverse(query: PointLike, options?: R): Promise<Location | Location[] | null>;
}

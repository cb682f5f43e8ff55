import { HttpClient, HttpTransport, ProxyConfig, TlsOptions } from '../utils/http';
import { logger } from '../utils/logger';
import {
  Scheme,
  parseProxy,
  validateFormatString,
  validateScheme,
  validateTimeout,
  validateTls,
} from '../utils/validation';

export const LIBRARY_VERSION = '1.0.0';

/**
 * Process-wide fallbacks for adapter settings.
 *
 * Lifecycle: configure once at startup with `configureGeocoderDefaults`
 * before constructing adapters. Each adapter copies the defaults when it is
 * constructed, so later changes never affect existing instances.
 */
export interface GeocoderDefaults {
  readonly formatString: string;
  readonly scheme: Scheme;
  readonly timeoutMs: number | null;
  readonly proxy: ProxyConfig | null;
  readonly tls: TlsOptions | null;
  readonly userAgent: string;
  readonly transport: HttpTransport;
}

export interface GeocoderDefaultsInput {
  formatString?: string;
  scheme?: Scheme;
  timeoutMs?: number | null;
  proxy?: string | ProxyConfig | null;
  tls?: TlsOptions | null;
  userAgent?: string;
  transport?: HttpTransport;
}

function builtInDefaults(): GeocoderDefaults {
  const defaults: GeocoderDefaults = {
    formatString: '%s',
    scheme: 'https',
    timeoutMs: 1000,
    proxy: null,
    tls: null,
    userAgent: `geocoding-client/${LIBRARY_VERSION}`,
    transport: new HttpClient(),
  };
  return Object.freeze(defaults);
}

let currentDefaults: GeocoderDefaults = builtInDefaults();

export function getGeocoderDefaults(): GeocoderDefaults {
  return currentDefaults;
}

export function configureGeocoderDefaults(input: GeocoderDefaultsInput): GeocoderDefaults {
  const base = currentDefaults;
  const next: GeocoderDefaults = {
    formatString: input.formatString !== undefined ? validateFormatString(input.formatString) : base.formatString,
    scheme: input.scheme !== undefined ? validateScheme(input.scheme) : base.scheme,
    timeoutMs: input.timeoutMs !== undefined ? validateTimeout(input.timeoutMs) : base.timeoutMs,
    proxy: input.proxy !== undefined ? parseProxy(input.proxy) : base.proxy,
    tls: input.tls !== undefined ? validateTls(input.tls) : base.tls,
    userAgent: input.userAgent ?? base.userAgent,
    transport: input.transport ?? base.transport,
  };
  currentDefaults = Object.freeze(next);

  logger.info('[GeocoderDefaults] Configured:', {
    scheme: currentDefaults.scheme,
    timeoutMs: currentDefaults.timeoutMs,
    proxy: currentDefaults.proxy ? `${currentDefaults.proxy.host}:${currentDefaults.proxy.port}` : null,
    userAgent: currentDefaults.userAgent,
  });
  return currentDefaults;
}

export function resetGeocoderDefaults(): GeocoderDefaults {
  currentDefaults = builtInDefaults();
  return currentDefaults;
}

/**
 * Read GEOCODER_SCHEME, GEOCODER_TIMEOUT_MS (`none` disables the timeout),
 * GEOCODER_PROXY and GEOCODER_USER_AGENT.
 */
export function geocoderDefaultsFromEnv(env: NodeJS.ProcessEnv): GeocoderDefaultsInput {
  const input: GeocoderDefaultsInput = {};

  if (env.GEOCODER_SCHEME) {
    input.scheme = validateScheme(env.GEOCODER_SCHEME, 'GEOCODER_SCHEME');
  }
  if (env.GEOCODER_TIMEOUT_MS) {
    input.timeoutMs = env.GEOCODER_TIMEOUT_MS.toLowerCase() === 'none'
      ? null
      : validateTimeout(Number(env.GEOCODER_TIMEOUT_MS), 'GEOCODER_TIMEOUT_MS');
  }
  if (env.GEOCODER_PROXY) {
    input.proxy = parseProxy(env.GEOCODER_PROXY, 'GEOCODER_PROXY');
  }
  if (env.GEOCODER_USER_AGENT) {
    input.userAgent = env.GEOCODER_USER_AGENT;
  }
  return input;
}

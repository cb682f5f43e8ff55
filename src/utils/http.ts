import axios, { AxiosInstance, AxiosProxyConfig, AxiosResponse } from 'axios';
import * as https from 'https';
import { GeocoderError, TransportTimeoutError, TransportUnavailableError } from './errors';

export type HttpMethod = 'GET' | 'POST';

export interface ProxyConfig {
  protocol: 'http' | 'https';
  host: string;
  port: number;
  auth?: { username: string; password: string };
}

export type TlsOptions = Pick<
  https.AgentOptions,
  'ca' | 'cert' | 'key' | 'pfx' | 'passphrase' | 'rejectUnauthorized' | 'servername' | 'minVersion'
>;

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  /** `null` disables the timeout. */
  timeoutMs: number | null;
  proxy: ProxyConfig | null;
  tls: TlsOptions | null;
}

export interface TransportResponse {
  status: number;
  statusText: string;
  /** Header names are lower-cased. */
  headers: Record<string, string>;
  body: string;
}

/**
 * The network capability the geocoders depend on. Implementations return every
 * HTTP status as a response and throw only `TransportTimeoutError` or
 * `TransportUnavailableError`.
 */
export interface HttpTransport {
  perform(request: TransportRequest): Promise<TransportResponse>;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export class HttpClient implements HttpTransport {
  constructor(private readonly client: AxiosInstance = axios.create()) {}

  async perform(request: TransportRequest): Promise<TransportResponse> {
    try {
      const response = await this.client.request<string>({
        method: request.method,
        url: request.url,
        headers: request.headers,
        data: request.body,
        timeout: request.timeoutMs ?? 0,
        // axios reads HTTP_PROXY/HTTPS_PROXY when proxy is undefined
        proxy: request.proxy ? toAxiosProxy(request.proxy) : false,
        httpsAgent: request.tls ? new https.Agent(request.tls) : undefined,
        responseType: 'text',
        transformResponse: (data: unknown) => data,
        // Status classification belongs to the geocoder, not the transport
        validateStatus: () => true,
      });

      return {
        status: response.status,
        statusText: response.statusText ?? '',
        headers: flattenHeaders(response.headers),
        body: bodyToText(response.data),
      };
    } catch (error) {
      throw this.toTransportError(error, request);
    }
  }

  private toTransportError(error: unknown, request: TransportRequest): GeocoderError {
    if (error instanceof GeocoderError) {
      return error;
    }

    if (axios.isAxiosError(error)) {
      if (error.code && TIMEOUT_CODES.has(error.code)) {
        return new TransportTimeoutError(
          `${request.method} request to ${request.url} timed out after ${request.timeoutMs}ms`,
          request.timeoutMs,
          error.code,
          error
        );
      }

      return new TransportUnavailableError(
        `Network error during ${request.method} request to ${request.url}: ${error.message}`,
        error.code,
        error
      );
    }

    const message = error instanceof Error ? error.message : String(error);
    return new TransportUnavailableError(
      `Unexpected error during ${request.method} request to ${request.url}: ${message}`,
      undefined,
      error
    );
  }
}

function toAxiosProxy(proxy: ProxyConfig): AxiosProxyConfig {
  return {
    protocol: proxy.protocol,
    host: proxy.host,
    port: proxy.port,
    auth: proxy.auth,
  };
}

function flattenHeaders(headers: AxiosResponse['headers']): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || value === null) continue;
    flat[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return flat;
}

function bodyToText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (data === undefined || data === null) return '';
  return JSON.stringify(data);
}

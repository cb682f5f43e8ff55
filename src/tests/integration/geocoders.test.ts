import axios, { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { Point } from '../../geo/Point';
import { GeocodeEarth } from '../../geocoders/providers/GeocodeEarth';
import { GoogleV3 } from '../../geocoders/providers/GoogleV3';
import { Yandex } from '../../geocoders/providers/Yandex';
import { RateLimiter } from '../../extra/RateLimiter';
import { RateLimitedError, ServiceError, TransportTimeoutError } from '../../utils/errors';
import { HttpClient } from '../../utils/http';
import { readFixture, silenceConsole } from '../helpers/transport';

interface Route {
  status?: number;
  body: string;
  headers?: Record<string, string>;
}

/**
 * In-process stand-in for the provider: answers by URL pathname and records
 * every URL it was asked for.
 */
function stubService(routes: Record<string, Route | 'timeout'>) {
  const urls: string[] = [];
  const transport = new HttpClient(
    axios.create({
      adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
        const url = new URL(config.url ?? '');
        urls.push(url.toString());
        const route = routes[url.pathname];
        if (route === 'timeout') {
          throw new AxiosError(`timeout of ${config.timeout}ms exceeded`, 'ECONNABORTED', config);
        }
        if (!route) {
          return { data: 'Not Found', status: 404, statusText: 'Not Found', headers: {}, config };
        }
        const status = route.status ?? 200;
        return { data: route.body, status, statusText: status === 200 ? 'OK' : 'Error', headers: route.headers ?? {}, config };
      },
    })
  );
  return { transport, urls };
}

describe('Geocoders end to end', () => {
  beforeEach(() => {
    silenceConsole();
  });

  it('should geocode the Chicago address through GoogleV3', async () => {
    const { transport, urls } = stubService({
      '/maps/api/geocode/json': { body: readFixture('google/geocode-chicago.json') },
    });
    const geocoder = new GoogleV3({ apiKey: 'test-key', transport });

    const location = await geocoder.geocode('435 north michigan ave, chicago il 60611 usa');

    expect(urls).toEqual([
      'https://maps.googleapis.com/maps/api/geocode/json?address=435+north+michigan+ave%2C+chicago+il+60611+usa&key=test-key',
    ]);
    expect(location?.point.equals(new Point(41.8902, -87.624), 1e-6)).toBe(true);
  });

  it('should reverse geocode through GeocodeEarth', async () => {
    const { transport } = stubService({
      '/v1/reverse': { body: readFixture('pelias/reverse-manhattan.json') },
    });
    const geocoder = new GeocodeEarth({ apiKey: 'test-key', transport });

    const location = await geocoder.reverse(new Point(40.7538, -73.9849));

    expect(location?.label).toBe('5 West 42nd Street');
    expect(location?.point.equals(new Point(40.7538, -73.9849), 1e-6)).toBe(true);
  });

  it('should surface a Yandex error body as ServiceError', async () => {
    const { transport } = stubService({
      '/1.x/': { body: '{"error":{"message":"bad key"}}' },
    });

    const error = await new Yandex({ transport }).geocode('Moscow').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ServiceError);
    expect(error instanceof ServiceError && error.detail).toBe('bad key');
  });

  it('should report the configured timeout', async () => {
    const { transport } = stubService({ '/1.x/': 'timeout' });

    const error = await new Yandex({ transport, timeoutMs: 250 }).geocode('Moscow').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportTimeoutError);
    expect(error instanceof TransportTimeoutError && error.timeoutMs).toBe(250);
  });

  it('should read Retry-After from a 429 response', async () => {
    const { transport } = stubService({
      '/maps/api/geocode/json': { status: 429, body: 'Too Many Requests', headers: { 'Retry-After': '30' } },
    });

    const error = await new GoogleV3({ apiKey: 'test-key', transport })
      .geocode('Main St')
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error instanceof RateLimitedError && error.retryAfterSeconds).toBe(30);
  });

  it('should retry a rate-limited call through RateLimiter', async () => {
    let calls = 0;
    const transport = new HttpClient(
      axios.create({
        adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
          calls += 1;
          return calls === 1
            ? { data: '', status: 429, statusText: 'Too Many Requests', headers: { 'retry-after': '2' }, config }
            : { data: readFixture('yandex/geocode-tverskaya.json'), status: 200, statusText: 'OK', headers: {}, config };
        },
      })
    );
    const geocoder = new Yandex({ transport });
    const sleep = jest.fn(async (_ms: number) => undefined);
    const limiter = new RateLimiter((query: string) => geocoder.geocode(query), { sleep });

    const location = await limiter.call('Tverskaya 6, Moscow');

    expect(location?.label).toBe('Tverskaya Street, 6, Moscow, Russia');
    expect(sleep.mock.calls).toEqual([[2000]]);
  });
});

import { ConfigurationError } from '../utils/errors';
import { GeocodeEarth } from './providers/GeocodeEarth';
import { GoogleV3 } from './providers/GoogleV3';
import { Pelias } from './providers/Pelias';
import { Yandex } from './providers/Yandex';

export const SERVICE_TO_GEOCODER = {
  yandex: Yandex,
  googlev3: GoogleV3,
  pelias: Pelias,
  geocodeearth: GeocodeEarth,
} as const;

export type GeocoderService = keyof typeof SERVICE_TO_GEOCODER;

export const GEOCODER_SERVICES: readonly GeocoderService[] = Object.freeze<GeocoderService[]>([
  'yandex',
  'googlev3',
  'pelias',
  'geocodeearth',
]);

export function isGeocoderService(name: string): name is GeocoderService {
  return Object.prototype.hasOwnProperty.call(SERVICE_TO_GEOCODER, name);
}

/**
 * Look up an adapter class by service name, ignoring case.
 */
export function getGeocoderForService<S extends GeocoderService>(service: S): (typeof SERVICE_TO_GEOCODER)[S];
export function getGeocoderForService(service: string): (typeof SERVICE_TO_GEOCODER)[GeocoderService];
export function getGeocoderForService(service: string): (typeof SERVICE_TO_GEOCODER)[GeocoderService] {
  const key = service.toLowerCase();
  if (!isGeocoderService(key)) {
    throw new ConfigurationError(
      `Unknown geocoder "${service}"; options are: ${GEOCODER_SERVICES.join(', ')}`,
      'service'
    );
  }
  return SERVICE_TO_GEOCODER[key];
}

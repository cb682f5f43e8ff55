import { ConfigurationError } from '../../utils/errors';
import { Pelias, PeliasConfig } from './Pelias';

export interface GeocodeEarthConfig extends Omit<PeliasConfig, 'domain' | 'apiKey'> {
  apiKey: string;
  domain?: string;
}

/**
 * geocode.earth, the hosted Pelias service. Same protocol as {@link Pelias}
 * with its own default domain and a required API key.
 */
export class GeocodeEarth extends Pelias {
  readonly name: string = 'GeocodeEarth';

  constructor(config: GeocodeEarthConfig) {
    super({ ...config, apiKey: requireApiKey(config.apiKey), domain: config.domain ?? 'api.geocode.earth' });
  }
}

function requireApiKey(apiKey: unknown): string {
  if (typeof apiKey !== 'string' || apiKey.trim().length === 0) {
    throw new ConfigurationError('GeocodeEarth requires an apiKey', 'apiKey');
  }
  return apiKey;
}

#!/usr/bin/env node
import { Command, CommanderError } from 'commander';
import dotenv from 'dotenv';
import { Location } from './geo/Location';
import { configureGeocoderDefaults, geocoderDefaultsFromEnv } from './geocoders/options';
import { GeocodeEarth } from './geocoders/providers/GeocodeEarth';
import { GoogleV3 } from './geocoders/providers/GoogleV3';
import { Pelias } from './geocoders/providers/Pelias';
import { Yandex, YandexLang, isYandexLang } from './geocoders/providers/Yandex';
import { GEOCODER_SERVICES, GeocoderService, isGeocoderService } from './geocoders/registry';
import { GeocoderAdapter } from './geocoders/types';
import { ConfigurationError, GeocoderError } from './utils/errors';

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

type LookupCommand = 'geocode' | 'reverse';

interface LookupOptions {
  all?: boolean;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function requireEnv(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigurationError(`${name} must be set`, name);
  }
  return value;
}

function yandexLang(value: string | undefined): YandexLang | undefined {
  if (value === undefined || value === '') return undefined;
  if (!isYandexLang(value)) {
    throw new ConfigurationError(`YANDEX_LANG "${value}" is not supported`, 'YANDEX_LANG');
  }
  return value;
}

const FACTORIES: Record<GeocoderService, (env: NodeJS.ProcessEnv) => GeocoderAdapter> = {
  yandex: (env) => new Yandex({ apiKey: env.YANDEX_API_KEY || undefined, lang: yandexLang(env.YANDEX_LANG) }),
  googlev3: (env) =>
    new GoogleV3({
      apiKey: env.GOOGLE_API_KEY || undefined,
      clientId: env.GOOGLE_CLIENT_ID || undefined,
      secretKey: env.GOOGLE_SECRET_KEY || undefined,
      channel: env.GOOGLE_CHANNEL || undefined,
    }),
  pelias: (env) => new Pelias({ domain: requireEnv(env, 'PELIAS_DOMAIN'), apiKey: env.PELIAS_API_KEY || undefined }),
  geocodeearth: (env) => new GeocodeEarth({ apiKey: requireEnv(env, 'GEOCODE_EARTH_API_KEY') }),
};

/**
 * Build an adapter for `service` with credentials taken from the environment.
 */
export function createGeocoderFromEnv(service: string, env: NodeJS.ProcessEnv): GeocoderAdapter {
  const name = service.toLowerCase();
  if (!isGeocoderService(name)) {
    throw new ConfigurationError(`Unknown geocoder "${service}"; options are: ${GEOCODER_SERVICES.join(', ')}`, 'service');
  }
  return FACTORIES[name](env);
}

export function formatLocation(location: Location): string {
  return `${location.label} (${location.point.format('{lat}, {lon}')})`;
}

function toList(result: Location | Location[] | null): Location[] {
  if (result === null) return [];
  return Array.isArray(result) ? result : [result];
}

async function lookup(
  command: LookupCommand,
  service: string,
  query: string,
  options: LookupOptions,
  env: NodeJS.ProcessEnv,
  io: CliIO
): Promise<void> {
  const defaults = geocoderDefaultsFromEnv(env);
  if (Object.keys(defaults).length > 0) {
    configureGeocoderDefaults(defaults);
  }

  const geocoder = createGeocoderFromEnv(service, env);
  const exactlyOne = options.all !== true;
  const result =
    command === 'geocode'
      ? await geocoder.geocode(query, { exactlyOne })
      : await geocoder.reverse(query, { exactlyOne });

  const locations = toList(result);
  if (locations.length === 0) {
    io.out('No results');
  }
  for (const location of locations) {
    io.out(formatLocation(location));
  }
}

function createProgram(env: NodeJS.ProcessEnv, io: CliIO): Command {
  // Settings set here are copied onto every subcommand added below
  const program = new Command()
    .name('geocode-cli')
    .description('Forward and reverse geocoding from the command line.')
    .addHelpText('after', `\nServices: ${GEOCODER_SERVICES.join(', ')}`)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    });

  program
    .command('geocode')
    .description('Find the location of an address')
    .argument('<service>', 'geocoding service')
    .argument('<query...>', 'address to look up')
    .option('-a, --all', 'print every result instead of the best one')
    .action(async (service: string, query: string[], options: LookupOptions) => {
      await lookup('geocode', service, query.join(' '), options, env, io);
    });

  program
    .command('reverse')
    .description('Find the address at a coordinate')
    .argument('<service>', 'geocoding service')
    .argument('<point...>', 'coordinate as "lat,lon"')
    .option('-a, --all', 'print every result instead of the best one')
    .action(async (service: string, point: string[], options: LookupOptions) => {
      await lookup('reverse', service, point.join(' '), options, env, io);
    });

  return program;
}

export async function runCli(argv: readonly string[], env: NodeJS.ProcessEnv, io: CliIO = consoleIO): Promise<number> {
  const program = createProgram(env, io);

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (error) {
    // exitOverride throws on help, unknown options and missing arguments
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof GeocoderError) {
      io.err(`${error.name}: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

if (require.main === module) {
  dotenv.config();
  runCli(process.argv.slice(2), process.env)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('[CLI] Unexpected failure:', error);
      process.exitCode = 1;
    });
}

import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../lib/errors';

const unitInterval = z.coerce.number().min(0).max(1);
const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  AIRPORTS_CSV_PATH: z.string().trim().min(1).default(path.resolve(process.cwd(), 'data/airports.csv')),
  RESOLVER_ACCEPT_THRESHOLD: unitInterval.default(0.75),
  RESOLVER_FUZZY_THRESHOLD: unitInterval.default(0.8),
  GEOCODE_RADIUS_KM: z.coerce.number().positive().max(1000).default(100),
  RESOLVER_TIMEOUT_MS: z.coerce.number().int().positive().default(4000),
  NOMINATIM_URL: z.string().url().default('https://nominatim.openstreetmap.org'),
  NOMINATIM_USER_AGENT: z.string().trim().min(1).default('FlightFinder/1.0'),
  GEONAMES_URL: z.string().url().default('http://api.geonames.org'),
  GEONAMES_USERNAME: optionalString,
  GROQ_API_KEY: optionalString,
  GROQ_MODEL: z.string().trim().min(1).default('llama3-70b-8192'),
  GROQ_URL: z.string().url().default('https://api.groq.com/openai/v1'),
  AMADEUS_API_KEY: optionalString,
  AMADEUS_API_SECRET: optionalString,
  AMADEUS_URL: z.string().url().default('https://test.api.amadeus.com'),
  REDIS_URL: z.string().trim().min(1).default('redis://localhost:6379'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8010)
});

export interface AppConfig {
  airportsCsvPath: string;
  resolver: {
    acceptanceThreshold: number;
    fuzzyThreshold: number;
    geocodeRadiusKm: number;
    timeoutMs: number;
  };
  nominatim: { baseUrl: string; userAgent: string };
  geonames: { baseUrl: string; username?: string };
  groq: { apiKey?: string; model: string; baseUrl: string };
  amadeus: { apiKey?: string; apiSecret?: string; baseUrl: string };
  redisUrl: string;
  port: number;
}

/**
 * Reads configuration from the environment. Blank values count as unset;
 * anything present but malformed is a ConfigurationError naming the variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const blankAsUnset = Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => typeof entry[1] === 'string' && entry[1].trim() !== '')
  );

  const parsed = envSchema.safeParse(blankAsUnset);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const setting = String(issue?.path[0] ?? 'environment');
    throw new ConfigurationError(`Invalid ${setting}: ${issue?.message ?? 'invalid value'}`, setting);
  }

  const vars = parsed.data;
  return {
    airportsCsvPath: vars.AIRPORTS_CSV_PATH,
    resolver: {
      acceptanceThreshold: vars.RESOLVER_ACCEPT_THRESHOLD,
      fuzzyThreshold: vars.RESOLVER_FUZZY_THRESHOLD,
      geocodeRadiusKm: vars.GEOCODE_RADIUS_KM,
      timeoutMs: vars.RESOLVER_TIMEOUT_MS
    },
    nominatim: { baseUrl: vars.NOMINATIM_URL, userAgent: vars.NOMINATIM_USER_AGENT },
    geonames: { baseUrl: vars.GEONAMES_URL, username: vars.GEONAMES_USERNAME },
    groq: { apiKey: vars.GROQ_API_KEY, model: vars.GROQ_MODEL, baseUrl: vars.GROQ_URL },
    amadeus: { apiKey: vars.AMADEUS_API_KEY, apiSecret: vars.AMADEUS_API_SECRET, baseUrl: vars.AMADEUS_URL },
    redisUrl: vars.REDIS_URL,
    port: vars.PORT
  };
}

import { AppConfig } from '../config';
import { AirportTable } from '../data/airport-table';
import { CacheStore } from '../lib/cache';
import { Logger, consoleLogger } from '../lib/logger';
import { ResolverMetrics } from '../observability/metrics';
import { CachedGeocodingClient, GeocodingClient, NominatimClient } from '../clients/nominatim.client';
import { DirectoryClient, GeoNamesClient } from '../clients/geonames.client';
import { DirectoryLookupResolver } from './directory.resolver';
import { GeocodingResolver } from './geocoding.resolver';
import { LocalDatasetResolver } from './local-dataset.resolver';
import { ResolutionOrchestrator } from './orchestrator';

export interface PipelineDependencies {
  geocoder?: GeocodingClient;
  directory?: DirectoryClient;
  /** Geocoder answers are cached here when given. */
  cache?: CacheStore;
  logger?: Logger;
  metrics?: ResolverMetrics;
}

export type ResolverSettings = AppConfig['resolver'];

export interface PipelineConfig {
  resolver: ResolverSettings;
  nominatim?: AppConfig['nominatim'];
  geonames?: AppConfig['geonames'];
}

/** Wires the three resolvers over one table into an orchestrator. */
export function createResolutionPipeline(
  table: AirportTable,
  config: PipelineConfig,
  deps: PipelineDependencies = {}
): ResolutionOrchestrator {
  const logger = deps.logger ?? consoleLogger;
  const { resolver } = config;

  let geocoder: GeocodingClient =
    deps.geocoder ??
    new NominatimClient({
      baseUrl: config.nominatim?.baseUrl,
      userAgent: config.nominatim?.userAgent,
      timeoutMs: resolver.timeoutMs
    });
  if (deps.cache) {
    geocoder = new CachedGeocodingClient(geocoder, deps.cache, 86400, logger);
  }

  const directory =
    deps.directory ??
    new GeoNamesClient({
      baseUrl: config.geonames?.baseUrl,
      username: config.geonames?.username,
      timeoutMs: resolver.timeoutMs
    });

  const local = new LocalDatasetResolver(table, { fuzzyThreshold: resolver.fuzzyThreshold });

  return new ResolutionOrchestrator(
    {
      local,
      geocode: new GeocodingResolver(table, geocoder, { radiusKm: resolver.geocodeRadiusKm }),
      directory: new DirectoryLookupResolver(table, directory, local)
    },
    {
      acceptanceThreshold: resolver.acceptanceThreshold,
      timeoutMs: resolver.timeoutMs,
      logger,
      metrics: deps.metrics
    }
  );
}

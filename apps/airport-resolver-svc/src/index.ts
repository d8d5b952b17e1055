import { config as loadEnv } from 'dotenv';
import { collectDefaultMetrics, Registry } from 'prom-client';
import { createClient } from 'redis';
import {
  AirportTable,
  CacheStore,
  ConfigurationError,
  createResolutionPipeline,
  createResolverMetrics,
  loadAirportTable,
  loadConfig
} from '@flightfinder/shared';
import { AirportResolverService } from './service';

type RedisClient = ReturnType<typeof createClient>;

/** CacheStore over a node-redis v4 client. */
export class RedisCacheStore implements CacheStore {
  constructor(private readonly client: RedisClient) {}

  get ready(): boolean {
    return this.client.isReady;
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async setEx(key: string, ttlSeconds: number, value: string): Promise<void> {
    await this.client.setEx(key, ttlSeconds, value);
  }
}

async function connectRedis(url: string): Promise<RedisCacheStore | undefined> {
  const client = createClient({ url });
  client.on('error', (error) => console.error('❌ Redis error:', error));
  try {
    await client.connect();
    console.log('✅ Redis connected');
    return new RedisCacheStore(client);
  } catch (error) {
    console.error('❌ Redis connection failed, continuing without cache:', error);
    return undefined;
  }
}

async function bootstrap() {
  loadEnv();
  const config = loadConfig();

  const table = await loadAirportTable(config.airportsCsvPath);
  console.log(
    `✅ Loaded ${table.stats.loadedRows} airports from ${config.airportsCsvPath} (${table.stats.skippedRows} rows skipped)`
  );

  const registry = new Registry();
  collectDefaultMetrics({ register: registry });
  const metrics = createResolverMetrics(registry);
  const cache = await connectRedis(config.redisUrl);

  const service = new AirportResolverService(table, {
    createPipeline: (airports: AirportTable) =>
      createResolutionPipeline(airports, config, { cache, metrics, logger: console }),
    reloadTable: () => loadAirportTable(config.airportsCsvPath),
    cache,
    cacheReady: () => cache?.ready ?? false,
    registry
  });

  service.app.listen(config.port, () => {
    console.log(`🚀 Airport Resolver Service listening on port ${config.port}`);
    console.log(`📍 Health check: http://localhost:${config.port}/health`);
  });
}

bootstrap().catch((error) => {
  if (error instanceof ConfigurationError) {
    console.error(`❌ Invalid configuration (${error.setting}): ${error.message}`);
  } else {
    console.error('❌ Airport Resolver Service failed to start:', error);
  }
  process.exit(1);
});

/**
 * Airport Resolver Service
 * Autocomplete and orchestrated place -> airport code resolution over HTTP
 */

import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { Registry } from 'prom-client';
import {
  AirportLookup,
  AirportMatch,
  AirportRecord,
  AirportTable,
  CacheStore,
  ErrorCodes,
  HealthCheck,
  Logger,
  ValidationError,
  consoleLogger,
  errorResponse,
  findNearbyAirports,
  formatAirportLabel,
  generateTraceId,
  isLikelyAirportCode,
  successResponse,
  suggestAirports,
  validatePlaceQuery
} from '@flightfinder/shared';

export interface LookupPipeline extends AirportLookup {
  shutdown(): void;
}

export interface AirportResolverServiceOptions {
  createPipeline: (table: AirportTable) => LookupPipeline;
  reloadTable?: () => Promise<AirportTable>;
  cache?: CacheStore;
  cacheReady?: () => boolean;
  registry?: Registry;
  logger?: Logger;
  version?: string;
}

const SUGGEST_CACHE_TTL_SECONDS = 3600;
const MAX_SUGGESTIONS = 20;

function queryString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function traceIdOf(res: Response): string {
  return typeof res.locals.traceId === 'string' ? res.locals.traceId : '';
}

const toAirportView = (airport: AirportRecord) => ({
  code: airport.code,
  name: airport.name,
  city: airport.city,
  region: airport.region,
  country: airport.country,
  latitude: airport.latitude,
  longitude: airport.longitude,
  label: formatAirportLabel(airport)
});

const toSuggestion = (match: AirportMatch) => ({
  ...toAirportView(match.airport),
  score: match.score,
  matchedField: match.matchedField
});

export class AirportResolverService {
  public readonly app: express.Application;
  private table: AirportTable;
  private pipeline: LookupPipeline;
  private readonly logger: Logger;

  constructor(table: AirportTable, private readonly options: AirportResolverServiceOptions) {
    this.table = table;
    this.pipeline = options.createPipeline(table);
    this.logger = options.logger ?? consoleLogger;
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  get airports(): AirportTable {
    return this.table;
  }

  private setupMiddleware() {
    this.app.use(helmet());
    this.app.use(cors());
    this.app.use(express.json());

    this.app.use((req, res, next) => {
      const traceId = req.header('x-trace-id') || generateTraceId();
      res.locals.traceId = traceId;
      res.setHeader('X-Trace-Id', traceId);
      next();
    });
  }

  private setupRoutes() {
    this.app.get('/health', this.health.bind(this));

    // Autocomplete/suggest airports
    this.app.get('/airports/suggest', this.suggestAirports.bind(this));

    // Resolve a free-form place to a canonical code
    this.app.get('/airports/resolve', this.resolveAirport.bind(this));

    this.app.post('/airports/refresh', this.refreshAirports.bind(this));

    this.app.get('/airports/:code', this.getAirport.bind(this));
    this.app.get('/airports/:code/nearby', this.getNearbyAirports.bind(this));

    this.app.get('/metrics', this.metrics.bind(this));

    this.app.use((req, res) => {
      res
        .status(404)
        .json(errorResponse(ErrorCodes.NOT_FOUND, `Route ${req.method} ${req.path} not found`, traceIdOf(res)));
    });

    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      this.handleError(error, res, `${req.method} ${req.path}`);
    });
  }

  private health(_req: Request, res: Response) {
    const cacheStatus = !this.options.cache ? 'disabled' : this.options.cacheReady?.() === false ? 'unhealthy' : 'healthy';
    const datasetStatus = this.table.size > 0 ? 'healthy' : 'unhealthy';
    const health: HealthCheck = {
      status: datasetStatus === 'healthy' && cacheStatus !== 'unhealthy' ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      service: 'airport-resolver',
      version: this.options.version ?? '0.1.0',
      checks: { dataset: datasetStatus, cache: cacheStatus },
      airports: this.table.size
    };
    res.json(successResponse(health, traceIdOf(res)));
  }

  private async suggestAirports(req: Request, res: Response) {
    try {
      const query = queryString(req.query.q).trim();
      const maxResults = Math.min(Number(req.query.limit) || 8, MAX_SUGGESTIONS);
      const includeNearby = req.query.nearby !== 'false';

      if (query.length < 2) {
        return res.json(successResponse({ suggestions: [] }, traceIdOf(res)));
      }

      const cacheKey = `airport_suggest:${query.toLowerCase()}:${maxResults}:${includeNearby}`;
      const cached = await this.readCache(cacheKey);
      if (cached !== null) {
        return res.json({ ...successResponse(cached, traceIdOf(res)), cached: true });
      }

      const suggestions = suggestAirports(this.table, query, { maxResults, includeNearby }).map(toSuggestion);
      const response = { suggestions };
      await this.writeCache(cacheKey, response);

      res.json(successResponse(response, traceIdOf(res)));
    } catch (error) {
      this.handleError(error, res, 'Airport suggest');
    }
  }

  private async resolveAirport(req: Request, res: Response) {
    try {
      const query = validatePlaceQuery(req.query.q, 'q');
      const result = await this.pipeline.resolve(query);

      if (result.status === 'unresolved') {
        return res
          .status(404)
          .json(
            errorResponse(ErrorCodes.NOT_FOUND, `No airport found for "${result.query}"`, traceIdOf(res), {
              attempts: result.attempts
            })
          );
      }

      const airport = result.code ? this.table.getByCode(result.code) : undefined;
      res.json(
        successResponse(
          {
            ...result,
            airport: airport ? toAirportView(airport) : null,
            alternatives: result.candidates.slice(1).map((candidate) => candidate.code)
          },
          traceIdOf(res)
        )
      );
    } catch (error) {
      this.handleError(error, res, 'Airport resolve');
    }
  }

  private getAirport(req: Request, res: Response) {
    const airport = this.findByCodeParam(req.params.code);
    if (!airport) {
      return this.airportNotFound(req.params.code, res);
    }
    res.json(successResponse(toAirportView(airport), traceIdOf(res)));
  }

  private getNearbyAirports(req: Request, res: Response) {
    try {
      const airport = this.findByCodeParam(req.params.code);
      if (!airport) {
        return this.airportNotFound(req.params.code, res);
      }

      const radiusParam = req.query.radiusKm;
      const radiusKm = radiusParam === undefined ? undefined : Number(radiusParam);
      if (radiusKm !== undefined && !(radiusKm > 0 && radiusKm <= 500)) {
        throw new ValidationError('radiusKm must be a number between 0 and 500', 'radiusKm');
      }

      const airports = findNearbyAirports(this.table, airport.code, radiusKm).map(({ airport: nearby, distanceKm }) => ({
        ...toAirportView(nearby),
        distanceKm
      }));
      res.json(successResponse({ airport: airport.code, airports }, traceIdOf(res)));
    } catch (error) {
      this.handleError(error, res, 'Get nearby airports');
    }
  }

  private async refreshAirports(_req: Request, res: Response) {
    try {
      if (!this.options.reloadTable) {
        return res
          .status(503)
          .json(errorResponse(ErrorCodes.SERVICE_UNAVAILABLE, 'Dataset reload is not configured', traceIdOf(res)));
      }

      const table = await this.options.reloadTable();
      const previous = this.pipeline;
      this.table = table;
      this.pipeline = this.options.createPipeline(table);
      previous.shutdown();

      this.logger.info(`✅ Airport dataset reloaded (${table.size} airports)`);
      res.json(successResponse(table.stats, traceIdOf(res)));
    } catch (error) {
      this.handleError(error, res, 'Airport refresh');
    }
  }

  private async metrics(_req: Request, res: Response) {
    try {
      if (!this.options.registry) {
        return res.status(404).json(errorResponse(ErrorCodes.NOT_FOUND, 'Metrics are disabled', traceIdOf(res)));
      }
      res.set('Content-Type', this.options.registry.contentType);
      res.end(await this.options.registry.metrics());
    } catch (error) {
      this.handleError(error, res, 'Metrics');
    }
  }

  private findByCodeParam(code: string): AirportRecord | undefined {
    return isLikelyAirportCode(code) ? this.table.getByCode(code) : undefined;
  }

  private airportNotFound(code: string, res: Response) {
    res.status(404).json(errorResponse(ErrorCodes.NOT_FOUND, `Airport ${code} not found`, traceIdOf(res)));
  }

  private async readCache(key: string): Promise<unknown | null> {
    if (!this.options.cache || this.options.cacheReady?.() === false) {
      return null;
    }
    try {
      const cached = await this.options.cache.get(key);
      return cached === null ? null : JSON.parse(cached);
    } catch (error) {
      this.logger.warn(`Cache read failed for ${key}:`, error);
      return null;
    }
  }

  private async writeCache(key: string, value: unknown): Promise<void> {
    if (!this.options.cache || this.options.cacheReady?.() === false) {
      return;
    }
    try {
      await this.options.cache.setEx(key, SUGGEST_CACHE_TTL_SECONDS, JSON.stringify(value));
    } catch (error) {
      this.logger.warn(`Cache write failed for ${key}:`, error);
    }
  }

  private handleError(error: unknown, res: Response, context: string) {
    if (error instanceof ValidationError) {
      res
        .status(400)
        .json(errorResponse(ErrorCodes.VALIDATION_ERROR, error.message, traceIdOf(res), { field: error.field }));
      return;
    }

    this.logger.error(`${context} error:`, error);
    const message = error instanceof Error ? error.message : 'Unexpected error';
    res.status(500).json(errorResponse(ErrorCodes.INTERNAL_ERROR, message, traceIdOf(res)));
  }

  public stop() {
    this.pipeline.shutdown();
  }
}

/**
 * OpenStreetMap Nominatim geocoder.
 * Usage policy requires an identifying User-Agent and at most one request
 * per second, which is why successful lookups can be cached.
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { CacheStore } from '../lib/cache';
import { Logger, consoleLogger } from '../lib/logger';
import { classifyError, ok, ServiceResult } from './service-result';

export interface GeocodedPlace {
  latitude: number;
  longitude: number;
  displayName: string;
}

export interface GeocodingClient {
  geocode(place: string): Promise<ServiceResult<GeocodedPlace[]>>;
}

export interface NominatimClientOptions {
  baseUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
  limit?: number;
  http?: AxiosInstance;
}

const nominatimPlaceSchema = z.object({
  lat: z.coerce.number(),
  lon: z.coerce.number(),
  display_name: z.string()
});

const nominatimResponseSchema = z.array(nominatimPlaceSchema);

export const DEFAULT_NOMINATIM_URL = 'https://nominatim.openstreetmap.org';
export const DEFAULT_NOMINATIM_USER_AGENT = 'FlightFinder/1.0';

export class NominatimClient implements GeocodingClient {
  private readonly http: AxiosInstance;
  private readonly userAgent: string;
  private readonly limit: number;

  constructor(options: NominatimClientOptions = {}) {
    this.userAgent = options.userAgent ?? DEFAULT_NOMINATIM_USER_AGENT;
    this.limit = options.limit ?? 3;
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl ?? DEFAULT_NOMINATIM_URL,
        timeout: options.timeoutMs ?? 10000
      });
  }

  async geocode(place: string): Promise<ServiceResult<GeocodedPlace[]>> {
    try {
      const response = await this.http.get('/search', {
        params: { q: place, format: 'json', limit: this.limit },
        headers: { 'User-Agent': this.userAgent }
      });

      const places = nominatimResponseSchema
        .parse(response.data)
        .filter((item) => Number.isFinite(item.lat) && Number.isFinite(item.lon))
        .map((item) => ({ latitude: item.lat, longitude: item.lon, displayName: item.display_name }));

      return ok(places);
    } catch (error) {
      return { ok: false, error: classifyError(error) };
    }
  }
}

/**
 * Caches non-empty geocoder answers. Cache errors are logged and the
 * lookup falls through to the wrapped client.
 */
export class CachedGeocodingClient implements GeocodingClient {
  constructor(
    private readonly inner: GeocodingClient,
    private readonly cache: CacheStore,
    private readonly ttlSeconds: number = 86400,
    private readonly logger: Logger = consoleLogger
  ) {}

  async geocode(place: string): Promise<ServiceResult<GeocodedPlace[]>> {
    const cacheKey = `geocode:${place.trim().toLowerCase()}`;

    try {
      const cached = await this.cache.get(cacheKey);
      if (cached) {
        const places = z.array(z.object({ latitude: z.number(), longitude: z.number(), displayName: z.string() })).parse(
          JSON.parse(cached)
        );
        return ok(places);
      }
    } catch (error) {
      this.logger.warn(`Geocode cache read failed for "${place}":`, error);
    }

    const result = await this.inner.geocode(place);
    if (result.ok && result.value.length > 0) {
      try {
        await this.cache.setEx(cacheKey, this.ttlSeconds, JSON.stringify(result.value));
      } catch (error) {
        this.logger.warn(`Geocode cache write failed for "${place}":`, error);
      }
    }
    return result;
  }
}

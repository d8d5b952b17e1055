/**
 * GeoNames directory search restricted to airports (feature code AIRP).
 * GeoNames reports most failures in a 200 body as { status: { value, message } }.
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { classifyError, fail, ok, ServiceErrorKind, ServiceResult } from './service-result';

export interface DirectoryAirport {
  code: string | null;
  name: string;
  city?: string;
  country: string;
  latitude?: number;
  longitude?: number;
}

export interface DirectoryClient {
  searchAirports(place: string): Promise<ServiceResult<DirectoryAirport[]>>;
}

export interface GeoNamesClientOptions {
  username?: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxRows?: number;
  http?: AxiosInstance;
}

const geonameSchema = z.object({
  name: z.string(),
  lat: z.coerce.number().optional(),
  lng: z.coerce.number().optional(),
  countryName: z.string().optional(),
  countryCode: z.string().optional(),
  adminName1: z.string().optional(),
  alternateNames: z.array(z.object({ name: z.string(), lang: z.string().optional() })).optional()
});

const geonamesResponseSchema = z.object({
  geonames: z.array(geonameSchema).optional(),
  status: z.object({ message: z.string(), value: z.number() }).optional()
});

type Geoname = z.infer<typeof geonameSchema>;

export const DEFAULT_GEONAMES_URL = 'http://api.geonames.org';

const IATA_REGEX = /^[A-Z]{3}$/;

export function geonamesStatusKind(value: number): ServiceErrorKind {
  switch (value) {
    case 10:
      return 'auth';
    case 11:
    case 15:
      return 'not_found';
    case 18:
    case 19:
    case 20:
      return 'rate_limited';
    default:
      return 'server_error';
  }
}

/** IATA code from alternate names (lang "iata") or a trailing "(XYZ)" in the name. */
export function extractIataCode(geoname: Geoname): string | null {
  const alternate = geoname.alternateNames?.find((alt) => alt.lang === 'iata' && IATA_REGEX.test(alt.name.trim()));
  if (alternate) {
    return alternate.name.trim();
  }

  const fromName = geoname.name.match(/\(([A-Z]{3})\)\s*$/);
  return fromName ? fromName[1] : null;
}

export class GeoNamesClient implements DirectoryClient {
  private readonly http: AxiosInstance;
  private readonly username?: string;
  private readonly maxRows: number;

  constructor(options: GeoNamesClientOptions = {}) {
    this.username = options.username;
    this.maxRows = options.maxRows ?? 10;
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl ?? DEFAULT_GEONAMES_URL,
        timeout: options.timeoutMs ?? 10000
      });
  }

  async searchAirports(place: string): Promise<ServiceResult<DirectoryAirport[]>> {
    if (!this.username) {
      return fail('auth', 'GeoNames username is not configured (GEONAMES_USERNAME)');
    }

    try {
      const response = await this.http.get('/searchJSON', {
        params: {
          q: place,
          featureCode: 'AIRP',
          style: 'FULL',
          maxRows: this.maxRows,
          username: this.username
        }
      });

      const body = geonamesResponseSchema.parse(response.data);
      if (body.status) {
        return fail(geonamesStatusKind(body.status.value), `GeoNames: ${body.status.message}`);
      }

      const airports = (body.geonames ?? []).map(
        (geoname): DirectoryAirport => ({
          code: extractIataCode(geoname),
          name: geoname.name,
          city: geoname.adminName1,
          country: geoname.countryName ?? geoname.countryCode ?? '',
          latitude: geoname.lat,
          longitude: geoname.lng
        })
      );
      return ok(airports);
    } catch (error) {
      return { ok: false, error: classifyError(error) };
    }
  }
}

import { LookupQuery, ResolverOutcome, toCandidate, UnavailableReason } from '../models/airport.model';
import { AirportTable } from '../data/airport-table';
import { GeocodingClient } from '../clients/nominatim.client';
import { ServiceErrorKind } from '../clients/service-result';
import { haversineKm, roundTo } from '../lib/geo';
import { AirportResolver } from './resolver';

export interface GeocodingResolverOptions {
  radiusKm?: number;
  maxCandidates?: number;
}

export const DEFAULT_GEOCODE_RADIUS_KM = 100;

/** Maps a failed service call onto the reason carried by service_unavailable. */
export function unavailableReason(kind: Exclude<ServiceErrorKind, 'auth'>): UnavailableReason {
  return kind === 'not_found' ? 'no_results' : kind;
}

/**
 * Geocodes the place, then picks the nearest airports with known
 * coordinates. Nothing beyond radiusKm is ever returned.
 */
export class GeocodingResolver implements AirportResolver {
  readonly source = 'geocode' as const;

  private readonly radiusKm: number;
  private readonly maxCandidates: number;

  constructor(
    private readonly table: AirportTable,
    private readonly geocoder: GeocodingClient,
    options: GeocodingResolverOptions = {}
  ) {
    this.radiusKm = options.radiusKm ?? DEFAULT_GEOCODE_RADIUS_KM;
    this.maxCandidates = options.maxCandidates ?? 5;
  }

  async resolve(query: LookupQuery): Promise<ResolverOutcome> {
    const place = query.trim();
    if (!place) {
      return { kind: 'no_match', source: this.source, detail: 'empty place' };
    }

    const result = await this.geocoder.geocode(place);
    if (!result.ok) {
      const { kind, message } = result.error;
      if (kind === 'auth') {
        return { kind: 'auth_failure', source: this.source, message };
      }
      return { kind: 'service_unavailable', source: this.source, reason: unavailableReason(kind), message };
    }

    const [point] = result.value;
    if (!point) {
      return {
        kind: 'service_unavailable',
        source: this.source,
        reason: 'no_results',
        message: `Geocoder returned no coordinates for "${place}"`
      };
    }

    const nearby = this.table
      .withCoordinates()
      .map((airport) => ({
        airport,
        distanceKm: haversineKm(point.latitude, point.longitude, airport.latitude, airport.longitude)
      }))
      .filter((entry) => entry.distanceKm <= this.radiusKm)
      .sort((a, b) => a.distanceKm - b.distanceKm)
      .slice(0, this.maxCandidates);

    if (nearby.length === 0) {
      return {
        kind: 'no_match',
        source: this.source,
        detail: `No airport within ${this.radiusKm} km of ${point.displayName}`
      };
    }

    const candidates = nearby.map(({ airport, distanceKm }) =>
      toCandidate(airport, this.confidenceFor(distanceKm), roundTo(distanceKm, 1))
    );
    return { kind: 'match', source: this.source, confidence: candidates[0].confidence, candidates };
  }

  /** 1.0 at the geocoded point, falling linearly to 0.5 at the radius edge. */
  private confidenceFor(distanceKm: number): number {
    return roundTo(1 - 0.5 * (distanceKm / this.radiusKm), 3);
  }
}

/**
 * Airport and resolution models shared by the resolvers, the orchestrator
 * and the services built on top of them.
 */

export interface AirportRecord {
  readonly code: string; // IATA code, [A-Z]{3}
  readonly name: string;
  readonly city: string;
  readonly country: string;
  readonly region?: string; // e.g. US-TX
  readonly latitude: number | null;
  readonly longitude: number | null;
}

/** An AirportRecord whose coordinates are known. */
export interface LocatedAirportRecord extends AirportRecord {
  readonly latitude: number;
  readonly longitude: number;
}

/** Raw place string as typed by a user or extracted from a query. */
export type LookupQuery = string;

export type ResolverSource = 'local' | 'geocode' | 'directory';

export interface AirportCandidate {
  code: string;
  name: string;
  city: string;
  country: string;
  confidence: number;
  distanceKm?: number;
}

export type UnavailableReason =
  | 'network'
  | 'timeout'
  | 'rate_limited'
  | 'server_error'
  | 'invalid_response'
  | 'no_results'
  | 'circuit_open';

export type ResolverOutcome =
  | {
      kind: 'match';
      source: ResolverSource;
      confidence: number;
      candidates: AirportCandidate[];
    }
  | { kind: 'no_match'; source: ResolverSource; detail?: string }
  | {
      kind: 'service_unavailable';
      source: ResolverSource;
      reason: UnavailableReason;
      message: string;
    }
  | { kind: 'auth_failure'; source: ResolverSource; message: string };

export interface ResolverAttempt {
  source: ResolverSource;
  outcome: ResolverOutcome['kind'];
  confidence?: number;
  reason?: UnavailableReason;
}

export type LookupStatus = 'resolved' | 'low_confidence' | 'unresolved';

export interface LookupResult {
  status: LookupStatus;
  query: string;
  code: string | null;
  confidence: number;
  source: ResolverSource | null;
  candidates: AirportCandidate[];
  attempts: ResolverAttempt[];
}

export function toCandidate(
  airport: AirportRecord,
  confidence: number,
  distanceKm?: number
): AirportCandidate {
  const candidate: AirportCandidate = {
    code: airport.code,
    name: airport.name,
    city: airport.city,
    country: airport.country,
    confidence
  };
  if (distanceKm !== undefined) {
    candidate.distanceKm = distanceKm;
  }
  return candidate;
}

export function hasCoordinates(airport: AirportRecord): airport is LocatedAirportRecord {
  return airport.latitude !== null && airport.longitude !== null;
}

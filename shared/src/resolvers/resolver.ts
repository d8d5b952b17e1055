import { LookupQuery, LookupResult, ResolverOutcome, ResolverSource } from '../models/airport.model';

/**
 * A strategy that maps a place name to airport candidates using one data
 * source. Implementations report every failure as a ResolverOutcome and
 * never reject; the orchestrator still guards against it.
 */
export interface AirportResolver {
  readonly source: ResolverSource;
  resolve(query: LookupQuery): Promise<ResolverOutcome>;
}

/** Anything that turns a place into a final LookupResult. */
export interface AirportLookup {
  resolve(query: LookupQuery): Promise<LookupResult>;
}

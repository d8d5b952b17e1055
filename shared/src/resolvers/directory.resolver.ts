import { AirportCandidate, LookupQuery, ResolverOutcome } from '../models/airport.model';
import { AirportTable } from '../data/airport-table';
import { DirectoryAirport, DirectoryClient } from '../clients/geonames.client';
import { AirportResolver } from './resolver';
import { unavailableReason } from './geocoding.resolver';
import { LocalDatasetResolver } from './local-dataset.resolver';

export const DIRECTORY_CODE_CONFIDENCE = 0.9;
export const DIRECTORY_CROSS_REFERENCE_CONFIDENCE = 0.8;

/**
 * Searches the geo-directory by name. The first result carrying an IATA
 * code wins; results without one are cross-referenced by name against the
 * local table.
 */
export class DirectoryLookupResolver implements AirportResolver {
  readonly source = 'directory' as const;

  constructor(
    private readonly table: AirportTable,
    private readonly directory: DirectoryClient,
    private readonly local: LocalDatasetResolver = new LocalDatasetResolver(table)
  ) {}

  async resolve(query: LookupQuery): Promise<ResolverOutcome> {
    const place = query.trim();
    if (!place) {
      return { kind: 'no_match', source: this.source, detail: 'empty place' };
    }

    const result = await this.directory.searchAirports(place);
    if (!result.ok) {
      const { kind, message } = result.error;
      switch (kind) {
        case 'auth':
          return { kind: 'auth_failure', source: this.source, message };
        case 'not_found':
          return { kind: 'no_match', source: this.source, detail: message };
        default:
          return { kind: 'service_unavailable', source: this.source, reason: unavailableReason(kind), message };
      }
    }

    for (const entry of result.value) {
      const candidate = this.toCandidate(entry);
      if (candidate) {
        return { kind: 'match', source: this.source, confidence: candidate.confidence, candidates: [candidate] };
      }
    }

    return { kind: 'no_match', source: this.source, detail: `Directory had no airport code for "${place}"` };
  }

  private toCandidate(entry: DirectoryAirport): AirportCandidate | null {
    if (entry.code) {
      const known = this.table.getByCode(entry.code);
      return {
        code: entry.code,
        name: known?.name ?? entry.name,
        city: known?.city ?? entry.city ?? '',
        country: known?.country ?? entry.country,
        confidence: DIRECTORY_CODE_CONFIDENCE
      };
    }

    const byName = this.local.findByName(entry.name);
    if (!byName) {
      return null;
    }
    return {
      code: byName.code,
      name: byName.name,
      city: byName.city,
      country: byName.country,
      confidence: DIRECTORY_CROSS_REFERENCE_CONFIDENCE
    };
  }
}

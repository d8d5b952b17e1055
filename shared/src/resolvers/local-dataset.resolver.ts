import Fuse, { FuseResult, IFuseOptions } from 'fuse.js';
import { AirportRecord, LookupQuery, ResolverOutcome, toCandidate } from '../models/airport.model';
import { AirportTable } from '../data/airport-table';
import { isLikelyAirportCode } from '../lib/airports';
import { roundTo } from '../lib/geo';
import { LocaleHint, matchesHint, normalizeText, parsePlace, stripSuffixTokens } from '../lib/place-text';
import { AirportResolver } from './resolver';

export interface LocalDatasetResolverOptions {
  /** Minimum similarity in [0,1] for a fuzzy match to count. */
  fuzzyThreshold?: number;
  maxCandidates?: number;
}

interface IndexedAirport {
  airport: AirportRecord;
  position: number;
  city: string;
  name: string;
}

interface ScoredAirport {
  entry: IndexedAirport;
  confidence: number;
}

export const DEFAULT_FUZZY_THRESHOLD = 0.8;

/**
 * Exact then fuzzy matching against the in-memory table. Exact hits on
 * city, name or code score 1.0; ties go to records matching the locale
 * hint, then to dataset order.
 */
export class LocalDatasetResolver implements AirportResolver {
  readonly source = 'local' as const;

  private readonly entries: IndexedAirport[];
  private readonly fuse: Fuse<IndexedAirport>;
  private readonly fuzzyThreshold: number;
  private readonly maxCandidates: number;

  constructor(private readonly table: AirportTable, options: LocalDatasetResolverOptions = {}) {
    this.fuzzyThreshold = options.fuzzyThreshold ?? DEFAULT_FUZZY_THRESHOLD;
    this.maxCandidates = options.maxCandidates ?? 5;
    this.entries = table.all().map((airport, position) => ({
      airport,
      position,
      city: normalizeText(airport.city),
      name: stripSuffixTokens(normalizeText(airport.name))
    }));

    const fuseOptions: IFuseOptions<IndexedAirport> = {
      keys: ['city', 'name'],
      includeScore: true,
      includeMatches: true,
      ignoreLocation: true,
      ignoreFieldNorm: true,
      threshold: 1 - this.fuzzyThreshold
    };
    this.fuse = new Fuse(this.entries, fuseOptions);
  }

  async resolve(query: LookupQuery): Promise<ResolverOutcome> {
    return this.lookup(query);
  }

  /** Synchronous variant, used directly by the directory cross-reference. */
  lookup(query: LookupQuery): ResolverOutcome {
    const { place, hint } = parsePlace(query, this.table.countries());
    if (!place) {
      return { kind: 'no_match', source: this.source, detail: 'empty place' };
    }

    const exact = this.exactMatches(place, hint);
    if (exact.length > 0) {
      return this.toMatch(exact.map((entry) => ({ entry, confidence: 1 })));
    }

    const fuzzy = this.fuzzyMatches(place, hint);
    if (fuzzy.length > 0) {
      return this.toMatch(fuzzy);
    }

    return { kind: 'no_match', source: this.source };
  }

  /** Exact normalized-name lookup, used to cross-reference directory results. */
  findByName(name: string): AirportRecord | undefined {
    const normalized = stripSuffixTokens(normalizeText(name));
    if (!normalized) return undefined;
    return this.entries.find((entry) => entry.name === normalized)?.airport;
  }

  private exactMatches(place: string, hint: LocaleHint | null): IndexedAirport[] {
    const matches: IndexedAirport[] = [];

    if (isLikelyAirportCode(place)) {
      const byCode = this.table.getByCode(place);
      const entry = byCode && this.entries.find((candidate) => candidate.airport.code === byCode.code);
      if (entry) {
        matches.push(entry);
      }
    }

    for (const entry of this.entries) {
      if ((entry.city === place || entry.name === place) && !matches.includes(entry)) {
        matches.push(entry);
      }
    }

    return hint ? this.preferHint(matches, hint) : matches;
  }

  private fuzzyMatches(place: string, hint: LocaleHint | null): ScoredAirport[] {
    const scored = this.fuse
      .search(place)
      .map((result) => ({ entry: result.item, confidence: this.similarity(place, result) }))
      .filter((candidate) => candidate.confidence >= this.fuzzyThreshold);

    return scored.sort((a, b) => {
      if (a.confidence !== b.confidence) return b.confidence - a.confidence;
      if (hint) {
        const hintOrder = Number(matchesHint(b.entry.airport, hint)) - Number(matchesHint(a.entry.airport, hint));
        if (hintOrder !== 0) return hintOrder;
      }
      return a.entry.position - b.entry.position;
    });
  }

  /**
   * Fuse scores substrings as perfect hits ("jose" inside "san jose"), so the
   * score is scaled by how much of the matched field the query covers.
   */
  private similarity(place: string, result: FuseResult<IndexedAirport>): number {
    const fuseScore = result.score ?? 1;
    const coverage = (result.matches ?? []).reduce((best, match) => {
      const value = match.value ?? '';
      if (!value) return best;
      const ratio = Math.min(place.length, value.length) / Math.max(place.length, value.length);
      return Math.max(best, ratio);
    }, 0);
    return roundTo((1 - fuseScore) * coverage, 3);
  }

  private preferHint(entries: IndexedAirport[], hint: LocaleHint): IndexedAirport[] {
    const preferred = entries.filter((entry) => matchesHint(entry.airport, hint));
    const rest = entries.filter((entry) => !matchesHint(entry.airport, hint));
    return [...preferred, ...rest];
  }

  private toMatch(scored: ScoredAirport[]): ResolverOutcome {
    const candidates = scored
      .slice(0, this.maxCandidates)
      .map(({ entry, confidence }) => toCandidate(entry.airport, confidence));
    return {
      kind: 'match',
      source: this.source,
      confidence: candidates[0].confidence,
      candidates
    };
  }
}

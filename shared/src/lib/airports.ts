import { AirportRecord, hasCoordinates } from '../models/airport.model';
import { AirportTable } from '../data/airport-table';
import { haversineKm, roundTo } from './geo';
import { normalizeText, stripSuffixTokens } from './place-text';

export interface AirportMatch {
  airport: AirportRecord;
  score: number;
  matchedField: 'iata' | 'city' | 'name' | 'nearby';
  input: string;
}

export interface SuggestAirportOptions {
  includeNearby?: boolean;
  maxResults?: number;
  nearbyRadiusKm?: number;
}

export interface NearbyAirport {
  airport: AirportRecord;
  distanceKm: number;
}

const AIRPORT_CODE_REGEX = /^[A-Za-z]{3}$/;
const DEFAULT_NEARBY_RADIUS_KM = 80;

export const formatAirportLabel = (airport: AirportRecord) =>
  `${airport.city || airport.name}, ${airport.country} (${airport.code}) · ${airport.name}`;

export function isLikelyAirportCode(value?: string | null): value is string {
  if (!value) return false;
  return AIRPORT_CODE_REGEX.test(value.trim());
}

function scoreAirport(query: string, airport: AirportRecord): AirportMatch | null {
  const normalizedQuery = normalizeText(query);
  if (!normalizedQuery) {
    return null;
  }

  const normalizedCity = normalizeText(airport.city);
  const normalizedName = stripSuffixTokens(normalizeText(airport.name));
  const normalizedIata = airport.code.toLowerCase();

  let score = 0;
  let matchedField: AirportMatch['matchedField'] = 'name';

  if (normalizedIata === normalizedQuery) {
    score = 120;
    matchedField = 'iata';
  } else if (normalizedIata.startsWith(normalizedQuery)) {
    score = 95;
    matchedField = 'iata';
  }

  if (normalizedCity) {
    if (normalizedCity === normalizedQuery) {
      score = Math.max(score, 110);
      matchedField = score === 110 ? 'city' : matchedField;
    } else if (normalizedCity.startsWith(normalizedQuery)) {
      score = Math.max(score, 90);
      matchedField = score === 90 ? 'city' : matchedField;
    } else if (normalizedCity.includes(normalizedQuery)) {
      score = Math.max(score, 70);
      matchedField = score === 70 ? 'city' : matchedField;
    }
  }

  if (normalizedName === normalizedQuery) {
    score = Math.max(score, 100);
    matchedField = score === 100 ? 'name' : matchedField;
  } else if (normalizedName.includes(normalizedQuery)) {
    score = Math.max(score, 75);
    matchedField = score === 75 ? 'name' : matchedField;
  }

  if (score === 0) {
    return null;
  }

  return {
    airport,
    score,
    matchedField,
    input: query
  };
}

function dedupeAirports(matches: AirportMatch[]) {
  const seen = new Set<string>();
  return matches.filter((match) => {
    const key = match.airport.code;
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}

/** Ranked autocomplete over code, city and name. Ties keep dataset order. */
export function searchAirports(table: AirportTable, query: string, options?: SuggestAirportOptions): AirportMatch[] {
  if (!normalizeText(query)) {
    return [];
  }

  const matches = table
    .all()
    .map((airport) => scoreAirport(query, airport))
    .filter((match): match is AirportMatch => Boolean(match))
    .sort((a, b) => b.score - a.score);

  const maxResults = options?.maxResults ?? 8;
  return matches.slice(0, maxResults);
}

/** Airports within radiusKm of the given airport, nearest first, excluding itself. */
export function findNearbyAirports(
  table: AirportTable,
  code: string,
  radiusKm: number = DEFAULT_NEARBY_RADIUS_KM
): NearbyAirport[] {
  const anchor = table.getByCode(code);
  if (!anchor || !hasCoordinates(anchor)) {
    return [];
  }

  return table
    .withCoordinates()
    .filter((airport) => airport.code !== anchor.code)
    .map((airport) => ({
      airport,
      distanceKm: roundTo(haversineKm(anchor.latitude, anchor.longitude, airport.latitude, airport.longitude), 1)
    }))
    .filter((entry) => entry.distanceKm <= radiusKm)
    .sort((a, b) => a.distanceKm - b.distanceKm);
}

/**
 * Autocomplete with nearby airports of the top hit appended (score - 5),
 * so "Dallas" also offers the other airports serving the same area.
 */
export function suggestAirports(table: AirportTable, query: string, options?: SuggestAirportOptions): AirportMatch[] {
  if (!query?.trim()) {
    return [];
  }

  const baseMaxResults = options?.maxResults ?? 5;
  const baseMatches = searchAirports(table, query, { maxResults: baseMaxResults });
  if (baseMatches.length === 0 || options?.includeNearby === false) {
    return baseMatches;
  }

  const anchor = baseMatches[0];
  const nearbyMatches = findNearbyAirports(table, anchor.airport.code, options?.nearbyRadiusKm).map(
    ({ airport }): AirportMatch => ({
      airport,
      score: anchor.score - 5,
      matchedField: 'nearby',
      input: query
    })
  );

  return dedupeAirports([...baseMatches, ...nearbyMatches]).slice(0, baseMaxResults + nearbyMatches.length);
}

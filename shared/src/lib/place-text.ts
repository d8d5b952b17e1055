import { findUsStateCode } from '../validators/common';

/** Tokens that decorate a place name without identifying it. */
const SUFFIX_TOKENS = new Set(['airport', 'airports', 'international', 'intl', 'regional', 'municipal']);

const US_VARIANTS = ['united states', 'us', 'usa'];

const COUNTRY_ALIASES: Record<string, string[]> = {
  usa: US_VARIANTS,
  us: US_VARIANTS,
  america: US_VARIANTS,
  'united states': US_VARIANTS,
  'united states of america': US_VARIANTS,
  uk: ['united kingdom', 'gb', 'uk'],
  england: ['united kingdom', 'gb', 'uk'],
  britain: ['united kingdom', 'gb', 'uk'],
  'great britain': ['united kingdom', 'gb', 'uk'],
  'united kingdom': ['united kingdom', 'gb', 'uk'],
  uae: ['united arab emirates', 'ae']
};

export interface LocaleHint {
  countries: string[]; // normalized country names / codes
  region?: string; // lowercase state or region code, e.g. "tx"
}

export interface ParsedPlace {
  place: string;
  hint: LocaleHint | null;
}

/** Lowercase, strip diacritics and punctuation, collapse whitespace. */
export function normalizeText(value: string): string {
  return value
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/['’]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

export function stripSuffixTokens(text: string): string {
  const tokens = text.split(' ').filter(Boolean);
  while (tokens.length > 1 && SUFFIX_TOKENS.has(tokens[tokens.length - 1])) {
    tokens.pop();
  }
  return tokens.join(' ');
}

export function normalizePlace(value: string): string {
  return stripSuffixTokens(normalizeText(value));
}

function detectHint(
  text: string,
  knownCountries: ReadonlySet<string>,
  allowPostalCode: boolean
): LocaleHint | null {
  if (!text) return null;

  const stateCode = findUsStateCode(text, { allowPostalCode });
  if (stateCode) {
    return { countries: US_VARIANTS, region: stateCode.toLowerCase() };
  }

  const aliased = COUNTRY_ALIASES[text];
  if (aliased) {
    return { countries: aliased };
  }

  if (knownCountries.has(text)) {
    return { countries: [text] };
  }
  return null;
}

/**
 * Split a raw place into the place itself and an optional locale hint.
 * "Dallas, TX" and "Dallas Texas" both give { place: "dallas", region: "tx" }.
 * Postal codes are only trusted after a comma; trailing words must spell out
 * a state, a country alias or a country present in the dataset.
 */
export function parsePlace(raw: string, knownCountries: ReadonlySet<string>): ParsedPlace {
  const [head, ...qualifiers] = raw.split(',');
  let place = normalizePlace(head);

  if (qualifiers.length > 0) {
    const hint = detectHint(normalizeText(qualifiers.join(' ')), knownCountries, true);
    return { place, hint };
  }

  const tokens = place.split(' ').filter(Boolean);
  for (let take = Math.min(4, tokens.length - 1); take >= 1; take--) {
    const hint = detectHint(tokens.slice(-take).join(' '), knownCountries, false);
    if (hint) {
      place = stripSuffixTokens(tokens.slice(0, -take).join(' '));
      return { place, hint };
    }
  }

  return { place, hint: null };
}

export function matchesHint(
  airport: { country: string; region?: string },
  hint: LocaleHint
): boolean {
  if (!hint.countries.includes(normalizeText(airport.country))) {
    return false;
  }
  if (!hint.region || !airport.region) {
    return true;
  }
  const regionTokens = normalizeText(airport.region).split(' ');
  return regionTokens[regionTokens.length - 1] === hint.region;
}

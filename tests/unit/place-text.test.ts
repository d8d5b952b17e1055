import { matchesHint, normalizePlace, normalizeText, parsePlace } from '../../shared/src/lib/place-text';

const KNOWN_COUNTRIES = new Set(['united states', 'canada', 'united kingdom']);

describe('place text', () => {
  describe('normalizeText', () => {
    it('should lowercase, strip accents and punctuation', () => {
      expect(normalizeText('  São Paulo/Guarulhos ')).toBe('sao paulo guarulhos');
      expect(normalizeText("O'Hare International")).toBe('ohare international');
    });
  });

  describe('normalizePlace', () => {
    it('should strip trailing airport suffix tokens', () => {
      expect(normalizePlace('Oakland International Airport')).toBe('oakland');
      expect(normalizePlace('Dallas Love Field')).toBe('dallas love field');
    });

    it('should never strip the whole place', () => {
      expect(normalizePlace('International')).toBe('international');
    });
  });

  describe('parsePlace', () => {
    it('should read a state code after a comma', () => {
      expect(parsePlace('Portland, OR', KNOWN_COUNTRIES)).toEqual({
        place: 'portland',
        hint: { countries: ['united states', 'us', 'usa'], region: 'or' }
      });
    });

    it('should read a spelled-out state without a comma', () => {
      expect(parsePlace('Dallas Texas', KNOWN_COUNTRIES)).toEqual({
        place: 'dallas',
        hint: { countries: ['united states', 'us', 'usa'], region: 'tx' }
      });
    });

    it('should not treat a trailing word that looks like a postal code as a hint', () => {
      expect(parsePlace('San Jose', KNOWN_COUNTRIES)).toEqual({ place: 'san jose', hint: null });
      expect(parsePlace('Los Angeles', KNOWN_COUNTRIES)).toEqual({ place: 'los angeles', hint: null });
    });

    it('should accept country aliases and dataset countries', () => {
      expect(parsePlace('London, UK', KNOWN_COUNTRIES).hint).toEqual({ countries: ['united kingdom', 'gb', 'uk'] });
      expect(parsePlace('London Canada', KNOWN_COUNTRIES)).toEqual({ place: 'london', hint: { countries: ['canada'] } });
    });

    it('should keep a single word even when it names a state', () => {
      expect(parsePlace('Washington', KNOWN_COUNTRIES)).toEqual({ place: 'washington', hint: null });
    });
  });

  describe('matchesHint', () => {
    const hint = { countries: ['united states', 'us', 'usa'], region: 'or' };

    it('should compare the last token of the region', () => {
      expect(matchesHint({ country: 'United States', region: 'US-OR' }, hint)).toBe(true);
      expect(matchesHint({ country: 'United States', region: 'US-ME' }, hint)).toBe(false);
    });

    it('should require the country to match', () => {
      expect(matchesHint({ country: 'Canada', region: 'CA-ON' }, { countries: ['united kingdom'] })).toBe(false);
    });

    it('should accept records without a region', () => {
      expect(matchesHint({ country: 'United States' }, hint)).toBe(true);
    });
  });
});

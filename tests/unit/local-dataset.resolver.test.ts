import { AirportTable, LocalDatasetResolver } from '@flightfinder/shared';
import { loadFixtureTable } from '../helpers/fixtures';

describe('LocalDatasetResolver', () => {
  let table: AirportTable;
  let resolver: LocalDatasetResolver;

  beforeAll(async () => {
    table = await loadFixtureTable();
    resolver = new LocalDatasetResolver(table);
  });

  it('should resolve exact city names with confidence 1.0', async () => {
    const outcome = await resolver.resolve('San Francisco');
    expect(outcome).toEqual({
      kind: 'match',
      source: 'local',
      confidence: 1,
      candidates: [
        {
          code: 'SFO',
          name: 'San Francisco International Airport',
          city: 'San Francisco',
          country: 'United States',
          confidence: 1
        }
      ]
    });
  });

  it('should resolve every city in the dataset exactly', () => {
    for (const airport of table.all().filter((record) => record.city)) {
      const outcome = resolver.lookup(airport.city);
      expect(outcome.kind).toBe('match');
      if (outcome.kind === 'match') {
        expect(outcome.confidence).toBe(1);
        expect(outcome.candidates.map((candidate) => candidate.code)).toContain(airport.code);
      }
    }
  });

  it('should resolve airport codes and names, ignoring case and suffixes', () => {
    const byCode = resolver.lookup('sjc');
    const byName = resolver.lookup('Oakland International Airport');
    expect(byCode.kind === 'match' && byCode.candidates[0].code).toBe('SJC');
    expect(byName.kind === 'match' && byName.candidates[0].code).toBe('OAK');
  });

  it('should return both Dallas airports in dataset order', () => {
    const outcome = resolver.lookup('Dallas');
    expect(outcome.kind).toBe('match');
    if (outcome.kind === 'match') {
      expect(outcome.candidates.map((candidate) => candidate.code)).toEqual(['DFW', 'DAL']);
      expect(outcome.candidates.every((candidate) => candidate.confidence === 1)).toBe(true);
    }
  });

  it('should prefer records matching the locale hint', () => {
    const maine = resolver.lookup('Portland, ME');
    const oregon = resolver.lookup('Portland, OR');
    const canada = resolver.lookup('London, Canada');
    const uk = resolver.lookup('London, UK');
    expect(maine.kind === 'match' && maine.candidates.map((candidate) => candidate.code)).toEqual(['PWM', 'PDX']);
    expect(oregon.kind === 'match' && oregon.candidates.map((candidate) => candidate.code)).toEqual(['PDX', 'PWM']);
    expect(canada.kind === 'match' && canada.candidates[0].code).toBe('YXU');
    expect(uk.kind === 'match' && uk.candidates[0].code).toBe('LHR');
  });

  it('should accept close misspellings below 1.0 confidence', () => {
    const outcome = resolver.lookup('San Fransisco');
    expect(outcome.kind).toBe('match');
    if (outcome.kind === 'match') {
      expect(outcome.candidates[0].code).toBe('SFO');
      expect(outcome.confidence).toBeGreaterThanOrEqual(0.8);
      expect(outcome.confidence).toBeLessThan(1);
    }
  });

  it('should not accept a fragment of a longer name', () => {
    expect(resolver.lookup('Jose').kind).toBe('no_match');
  });

  it('should report absent places as no_match', () => {
    expect(resolver.lookup('Atlantis')).toEqual({ kind: 'no_match', source: 'local' });
    expect(resolver.lookup('   ')).toEqual({ kind: 'no_match', source: 'local', detail: 'empty place' });
  });

  it('should return the same outcome for repeated lookups', () => {
    expect(resolver.lookup('Portland')).toEqual(resolver.lookup('Portland'));
  });

  it('should cross-reference directory names', () => {
    expect(resolver.findByName('Dallas Love Field')?.code).toBe('DAL');
    expect(resolver.findByName('Heathrow Airport')?.code).toBe('LHR');
    expect(resolver.findByName('Unknown Aerodrome')).toBeUndefined();
  });
});

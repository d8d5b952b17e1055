import { AirportTable, GeocodedPlace, GeocodingClient, GeocodingResolver, ServiceResult, haversineKm } from '@flightfinder/shared';
import { fail, ok } from '../../shared/src/clients/service-result';
import { loadFixtureTable } from '../helpers/fixtures';

const DOWNTOWN_DALLAS: GeocodedPlace = { latitude: 32.7767, longitude: -96.797, displayName: 'Dallas, Texas' };
const MID_PACIFIC: GeocodedPlace = { latitude: 0, longitude: -150, displayName: 'Pacific Ocean' };

function geocoderReturning(result: ServiceResult<GeocodedPlace[]>): GeocodingClient & { geocode: jest.Mock } {
  return { geocode: jest.fn(async () => result) };
}

describe('GeocodingResolver', () => {
  let table: AirportTable;

  beforeAll(async () => {
    table = await loadFixtureTable();
  });

  it('should pick the nearest airports to the geocoded point', async () => {
    const geocoder = geocoderReturning(ok([DOWNTOWN_DALLAS]));
    const outcome = await new GeocodingResolver(table, geocoder).resolve('Dallas');

    expect(geocoder.geocode).toHaveBeenCalledWith('Dallas');
    expect(outcome.kind).toBe('match');
    if (outcome.kind === 'match') {
      expect(outcome.candidates.map((candidate) => candidate.code)).toEqual(['DAL', 'DFW']);
      expect(outcome.confidence).toBe(outcome.candidates[0].confidence);
      expect(outcome.confidence).toBeGreaterThan(0.9);
      expect(outcome.candidates[0].confidence).toBeGreaterThan(outcome.candidates[1].confidence);
    }
  });

  it('should never return an airport beyond the radius cap', async () => {
    const radiusKm = 15;
    const outcome = await new GeocodingResolver(table, geocoderReturning(ok([DOWNTOWN_DALLAS])), { radiusKm }).resolve(
      'Dallas'
    );

    expect(outcome.kind).toBe('match');
    if (outcome.kind === 'match') {
      expect(outcome.candidates.map((candidate) => candidate.code)).toEqual(['DAL']);
      for (const candidate of outcome.candidates) {
        const airport = table.getByCode(candidate.code);
        const distance = haversineKm(
          DOWNTOWN_DALLAS.latitude,
          DOWNTOWN_DALLAS.longitude,
          airport?.latitude ?? 0,
          airport?.longitude ?? 0
        );
        expect(distance).toBeLessThanOrEqual(radiusKm);
        expect(candidate.distanceKm).toBeLessThanOrEqual(radiusKm);
      }
    }
  });

  it('should respect the radius cap for every point and radius', async () => {
    const points: GeocodedPlace[] = [
      { latitude: 32.9, longitude: -97.0, displayName: 'Grapevine, Texas' },
      { latitude: 45.52, longitude: -122.68, displayName: 'Portland, Oregon' },
      { latitude: 51.5072, longitude: -0.1276, displayName: 'London, England' }
    ];
    let checked = 0;

    for (const point of points) {
      for (const radiusKm of [10, 50, 100]) {
        const outcome = await new GeocodingResolver(table, geocoderReturning(ok([point])), { radiusKm }).resolve(
          point.displayName
        );
        const candidates = outcome.kind === 'match' ? outcome.candidates : [];
        for (const candidate of candidates) {
          const airport = table.getByCode(candidate.code);
          const distance = haversineKm(point.latitude, point.longitude, airport?.latitude ?? 0, airport?.longitude ?? 0);
          expect(distance).toBeLessThanOrEqual(radiusKm);
          expect(candidate.distanceKm).toBeLessThanOrEqual(radiusKm);
          checked += 1;
        }
      }
    }
    expect(checked).toBeGreaterThan(0);
  });

  it('should treat a point with no airport in range as no_match', async () => {
    const outcome = await new GeocodingResolver(table, geocoderReturning(ok([MID_PACIFIC]))).resolve('Somewhere at sea');
    expect(outcome).toEqual({
      kind: 'no_match',
      source: 'geocode',
      detail: 'No airport within 100 km of Pacific Ocean'
    });
  });

  it('should report zero geocoding results as unavailable', async () => {
    const outcome = await new GeocodingResolver(table, geocoderReturning(ok([]))).resolve('Qwzx');
    expect(outcome).toMatchObject({ kind: 'service_unavailable', source: 'geocode', reason: 'no_results' });
  });

  it('should keep service failures distinct from auth failures', async () => {
    const timeout = await new GeocodingResolver(table, geocoderReturning(fail('timeout', 'timed out'))).resolve('Dallas');
    const limited = await new GeocodingResolver(table, geocoderReturning(fail('rate_limited', 'slow down'))).resolve(
      'Dallas'
    );
    const auth = await new GeocodingResolver(table, geocoderReturning(fail('auth', 'bad key', 403))).resolve('Dallas');

    expect(timeout).toEqual({ kind: 'service_unavailable', source: 'geocode', reason: 'timeout', message: 'timed out' });
    expect(limited).toMatchObject({ kind: 'service_unavailable', reason: 'rate_limited' });
    expect(auth).toEqual({ kind: 'auth_failure', source: 'geocode', message: 'bad key' });
  });

  it('should not call the geocoder for an empty place', async () => {
    const geocoder = geocoderReturning(ok([DOWNTOWN_DALLAS]));
    const outcome = await new GeocodingResolver(table, geocoder).resolve('  ');
    expect(outcome.kind).toBe('no_match');
    expect(geocoder.geocode).not.toHaveBeenCalled();
  });
});

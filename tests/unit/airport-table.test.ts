import path from 'path';
import { AirportTable, DatasetError, loadAirportTable, parseAirportCsv } from '@flightfinder/shared';
import { toAirportRecord } from '../../shared/src/data/airport-table';
import { FIXTURE_CSV, loadFixtureTable } from '../helpers/fixtures';

describe('AirportTable', () => {
  let table: AirportTable;

  beforeAll(async () => {
    table = await loadFixtureTable();
  });

  it('should load valid rows and skip malformed ones', () => {
    expect(table.size).toBe(10);
    expect(table.stats).toMatchObject({
      sourcePath: path.resolve(FIXTURE_CSV),
      totalRows: 14,
      loadedRows: 10,
      skippedRows: 4,
      withCoordinates: 9
    });
  });

  it('should keep dataset order', () => {
    expect(table.all().map((airport) => airport.code)).toEqual([
      'DFW',
      'DAL',
      'SFO',
      'OAK',
      'SJC',
      'PDX',
      'PWM',
      'LHR',
      'YXU',
      'ZZZ'
    ]);
  });

  it('should let the first record win on duplicate codes', () => {
    expect(table.getByCode('sfo')?.name).toBe('San Francisco International Airport');
  });

  it('should keep records without coordinates out of distance search', () => {
    expect(table.getByCode('ZZZ')).toMatchObject({ latitude: null, longitude: null });
    expect(table.withCoordinates().some((airport) => airport.code === 'ZZZ')).toBe(false);
  });

  it('should expose normalized countries', () => {
    expect([...table.countries()].sort()).toEqual(['canada', 'united kingdom', 'united states']);
  });

  it('should reject a missing dataset with DatasetError', async () => {
    await expect(loadAirportTable(path.join(__dirname, 'does-not-exist.csv'))).rejects.toBeInstanceOf(DatasetError);
  });

  it('should skip a row with a stray quote and keep loading', async () => {
    const parsed = await parseAirportCsv(
      [
        'code,name,city,country,latitude,longitude',
        'SFO,San Francisco International Airport,San Francisco,US,37.6213,-122.379',
        'BAD,"Broken" Field,Nowhere,US,1,2',
        'OAK,Oakland International Airport,Oakland,US,37.7126,-122.2197'
      ].join('\n')
    );

    expect(parsed.all().map((airport) => airport.code)).toEqual(['SFO', 'OAK']);
    expect(parsed.stats).toMatchObject({ totalRows: 3, loadedRows: 2, skippedRows: 1 });
  });

  it('should keep quoted fields that contain commas', async () => {
    const parsed = await parseAirportCsv(
      'code,name,city,country\nDCA,"Ronald Reagan Washington National Airport, Arlington",Arlington,US\n'
    );
    expect(parsed.getByCode('DCA')?.name).toBe('Ronald Reagan Washington National Airport, Arlington');
  });

  it('should accept alternative header spellings', async () => {
    const parsed = await parseAirportCsv(
      'iata_code,name,municipality,iso_country,latitude_deg,longitude_deg\nAUS,Austin-Bergstrom International Airport,Austin,US,30.1975,-97.6664\n'
    );
    expect(parsed.getByCode('AUS')).toEqual({
      code: 'AUS',
      name: 'Austin-Bergstrom International Airport',
      city: 'Austin',
      country: 'US',
      latitude: 30.1975,
      longitude: -97.6664
    });
  });
});

describe('toAirportRecord', () => {
  it('should null out-of-range coordinates instead of dropping the row', () => {
    expect(
      toAirportRecord({ code: 'abc', name: 'Test Field', city: 'Test', country: 'Nowhere', latitude: '95', longitude: '10' })
    ).toEqual({ code: 'ABC', name: 'Test Field', city: 'Test', country: 'Nowhere', latitude: null, longitude: null });
  });

  it('should reject rows without a usable code or name', () => {
    expect(toAirportRecord({ code: 'AB', name: 'Too Short' })).toBeNull();
    expect(toAirportRecord({ code: 'ABC', name: '' })).toBeNull();
  });
});


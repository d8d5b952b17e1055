import { promises as fs } from 'node:fs';
import { resolve } from 'node:path';
import { parseString, ParserOptionsArgs } from 'fast-csv';
import { AirportRecord, LocatedAirportRecord, hasCoordinates } from '../models/airport.model';
import { isValidLatitude, isValidLongitude } from '../lib/geo';
import { normalizeText } from '../lib/place-text';
import { DatasetError } from '../lib/errors';

type CsvRow = Record<string, string>;

const AIRPORT_CODE_REGEX = /^[A-Z]{3}$/;

// Accepted header spellings, first match wins
const COLUMNS = {
  code: ['code', 'iata_code', 'iata'],
  name: ['name'],
  city: ['city', 'municipality'],
  country: ['country', 'iso_country', 'country_code'],
  region: ['region', 'iso_region', 'state'],
  latitude: ['latitude', 'latitude_deg', 'lat'],
  longitude: ['longitude', 'longitude_deg', 'lon', 'lng']
} as const;

// Rows are parsed one line at a time so a malformed row only costs itself
const PARSER_OPTIONS: ParserOptionsArgs = {
  headers: false,
  trim: true
};

export interface AirportTableStats {
  sourcePath?: string;
  totalRows: number;
  loadedRows: number;
  skippedRows: number;
  withCoordinates: number;
  loadedAt: Date;
}

/**
 * Read-only airport table. Built once and handed to every resolver;
 * a refresh builds a new table rather than mutating this one.
 */
export class AirportTable {
  private readonly byCode = new Map<string, AirportRecord>();
  private readonly located: readonly LocatedAirportRecord[];
  private readonly countrySet: ReadonlySet<string>;
  public readonly stats: AirportTableStats;

  private constructor(
    private readonly records: readonly AirportRecord[],
    stats: Omit<AirportTableStats, 'loadedRows' | 'withCoordinates' | 'loadedAt'>
  ) {
    for (const record of records) {
      this.byCode.set(record.code, record);
    }
    this.located = Object.freeze(records.filter(hasCoordinates));
    this.countrySet = new Set(records.map((record) => normalizeText(record.country)).filter(Boolean));
    this.stats = Object.freeze({
      ...stats,
      loadedRows: records.length,
      withCoordinates: this.located.length,
      loadedAt: new Date()
    });
  }

  /**
   * Build a table from already-parsed records. Records with an invalid code
   * are dropped; on duplicate codes the first record wins.
   */
  static fromRecords(
    records: Iterable<AirportRecord>,
    source: { sourcePath?: string; totalRows?: number; skippedRows?: number } = {}
  ): AirportTable {
    const accepted: AirportRecord[] = [];
    const seen = new Set<string>();
    let offered = 0;

    for (const record of records) {
      offered += 1;
      if (!AIRPORT_CODE_REGEX.test(record.code) || seen.has(record.code)) {
        continue;
      }
      seen.add(record.code);
      accepted.push(Object.freeze({ ...record }));
    }

    const dropped = offered - accepted.length;
    return new AirportTable(Object.freeze(accepted), {
      sourcePath: source.sourcePath,
      totalRows: source.totalRows ?? offered,
      skippedRows: (source.skippedRows ?? 0) + dropped
    });
  }

  get size(): number {
    return this.records.length;
  }

  /** All records in dataset order. */
  all(): readonly AirportRecord[] {
    return this.records;
  }

  /** Records usable for distance search, in dataset order. */
  withCoordinates(): readonly LocatedAirportRecord[] {
    return this.located;
  }

  getByCode(code?: string | null): AirportRecord | undefined {
    if (!code) return undefined;
    return this.byCode.get(code.trim().toUpperCase());
  }

  /** Normalized country values present in the dataset. */
  countries(): ReadonlySet<string> {
    return this.countrySet;
  }
}

function pick(row: CsvRow, columns: readonly string[]): string {
  for (const column of columns) {
    const value = row[column];
    if (value !== undefined && value !== '') {
      return value.trim();
    }
  }
  return '';
}

function safeNumber(value: string): number | null {
  if (value === '') {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/** Map one CSV row to a record, or null when the row is unusable. */
export function toAirportRecord(row: CsvRow): AirportRecord | null {
  const code = pick(row, COLUMNS.code).toUpperCase();
  const name = pick(row, COLUMNS.name);
  if (!AIRPORT_CODE_REGEX.test(code) || !name) {
    return null;
  }

  const latitude = safeNumber(pick(row, COLUMNS.latitude));
  const longitude = safeNumber(pick(row, COLUMNS.longitude));
  const coordinatesValid = isValidLatitude(latitude) && isValidLongitude(longitude);
  const region = pick(row, COLUMNS.region);

  return {
    code,
    name,
    city: pick(row, COLUMNS.city),
    country: pick(row, COLUMNS.country),
    ...(region ? { region } : {}),
    latitude: coordinatesValid ? latitude : null,
    longitude: coordinatesValid ? longitude : null
  };
}

/** Parse a single CSV line into its fields; rejects on malformed quoting. */
function parseCsvLine(line: string): Promise<string[]> {
  return new Promise((resolvePromise, rejectPromise) => {
    let fields: string[] = [];
    parseString<string[], string[]>(line, PARSER_OPTIONS)
      .on('error', (error) => rejectPromise(error))
      .on('data', (row: string[]) => {
        fields = row;
      })
      .on('end', () => resolvePromise(fields));
  });
}

async function buildTable(text: string, sourcePath?: string): Promise<AirportTable> {
  const [headerLine, ...lines] = text.split(/\r?\n/).filter((line) => line.trim() !== '');
  if (headerLine === undefined) {
    return AirportTable.fromRecords([], { sourcePath, totalRows: 0 });
  }

  const headers = await parseCsvLine(headerLine);
  const records: AirportRecord[] = [];
  let totalRows = 0;
  let skippedRows = 0;

  for (const line of lines) {
    totalRows += 1;
    const fields = await parseCsvLine(line).catch(() => null);
    if (!fields || fields.length !== headers.length) {
      skippedRows += 1;
      continue;
    }

    const record = toAirportRecord(Object.fromEntries(headers.map((header, index) => [header, fields[index]])));
    if (!record) {
      skippedRows += 1;
      continue;
    }
    records.push(record);
  }

  return AirportTable.fromRecords(records, { sourcePath, totalRows, skippedRows });
}

/**
 * Parse CSV text. The first non-empty line is the header; every other line
 * is one airport. Rows that fail to parse or map are counted as skipped.
 */
export function parseAirportCsv(text: string): Promise<AirportTable> {
  return buildTable(text);
}

/**
 * Load the dataset from disk. A missing or unreadable file is a fatal
 * configuration problem and rejects with DatasetError.
 */
export async function loadAirportTable(csvPath: string): Promise<AirportTable> {
  const absolutePath = resolve(csvPath);
  let text: string;
  try {
    text = await fs.readFile(absolutePath, 'utf8');
  } catch (error) {
    throw new DatasetError(`Airport dataset not found at ${absolutePath}`, absolutePath, error);
  }

  try {
    return await buildTable(text, absolutePath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DatasetError(`Failed to read airport dataset ${absolutePath}: ${reason}`, absolutePath, error);
  }
}

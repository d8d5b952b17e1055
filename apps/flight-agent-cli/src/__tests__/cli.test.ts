import { describe, it, expect, jest } from '@jest/globals';
import {
  FlightSearchService,
  LookupResult,
  PatternQueryParser,
  QueryUnderstandingService,
  UpstreamServiceError,
  silentLogger
} from '@flightfinder/shared';
import { ok } from '../../../../shared/src/clients/service-result';
import { CliIo, describeFailure, runFlightAgent } from '../cli';

const NOW = new Date('2026-01-15T12:00:00Z');
const QUERY = 'from San Jose to Dallas on March 3';

const CODES: Record<string, string> = { 'San Jose': 'SJC', Dallas: 'DFW' };

function resolvePlace(place: string): LookupResult {
  const code = CODES[place];
  if (!code) {
    return { status: 'unresolved', query: place, code: null, confidence: 0, source: null, candidates: [], attempts: [] };
  }
  return {
    status: 'resolved',
    query: place,
    code,
    confidence: 1,
    source: 'local',
    candidates: [{ code, name: `${place} Airport`, city: place, country: 'United States', confidence: 1 }],
    attempts: [{ source: 'local', outcome: 'match', confidence: 1 }]
  };
}

function createSearch() {
  return new FlightSearchService(
    new QueryUnderstandingService(new PatternQueryParser(() => NOW), undefined, silentLogger),
    { resolve: async (place: string) => resolvePlace(place) },
    { searchOffers: async () => ok([]) },
    { now: () => NOW, logger: silentLogger }
  );
}

function createIo(answer = '') {
  const output: string[] = [];
  const io: CliIo = {
    write: (text) => {
      output.push(text);
    },
    prompt: jest.fn(async () => answer)
  };
  return { io, output };
}

describe('runFlightAgent', () => {
  it('should search for the query given as arguments', async () => {
    const { io, output } = createIo();

    const code = await runFlightAgent(QUERY.split(' '), createSearch(), io);

    expect(code).toBe(0);
    expect(io.prompt).not.toHaveBeenCalled();
    expect(output.join('')).toBe(
      ['Flight Search Results:', 'From: San Jose (SJC)', 'To: Dallas (DFW)', 'Date: 2026-03-03', 'Passengers: 1', 'Found 0 flights', '', ''].join(
        '\n'
      )
    );
  });

  it('should ask for a query when none is given', async () => {
    const { io, output } = createIo(`  ${QUERY}  `);

    const code = await runFlightAgent([], createSearch(), io);

    expect(code).toBe(0);
    expect(io.prompt).toHaveBeenCalledTimes(1);
    expect(output[0].startsWith('Flight Search Results:')).toBe(true);
  });

  it('should exit with 2 when the prompt is left empty', async () => {
    const { io, output } = createIo('   ');

    expect(await runFlightAgent([], createSearch(), io)).toBe(2);
    expect(output).toEqual(['Error: no query given\n']);
  });

  it('should print the failure and exit with 1', async () => {
    const { io, output } = createIo();

    const code = await runFlightAgent(['from', 'San', 'Jose', 'to', 'Atlantis', 'on', 'March', '3'], createSearch(), io);

    expect(code).toBe(1);
    expect(output).toEqual(['Error: Could not find an airport for destination "Atlantis"\n']);
  });
});

describe('describeFailure', () => {
  it('should tag upstream failures with their kind', () => {
    expect(describeFailure(new UpstreamServiceError('Flight search failed: HTTP 503', 'amadeus', 'server_error'))).toBe(
      'Error: Flight search failed: HTTP 503 [server_error]'
    );
    expect(describeFailure('boom')).toBe('Error: boom');
  });
});

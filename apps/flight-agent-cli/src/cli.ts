import {
  FlightSearchService,
  UnresolvedPlaceError,
  UpstreamServiceError,
  ValidationError,
  formatFlightResults
} from '@flightfinder/shared';

export interface CliIo {
  write(text: string): void;
  prompt(question: string): Promise<string>;
}

const EXAMPLE_QUERY = 'Find flights from San Jose to Dallas from March 3 to March 10 for 2 people, budget is $1000';

export function describeFailure(error: unknown): string {
  if (error instanceof UnresolvedPlaceError || error instanceof ValidationError) {
    return `Error: ${error.message}`;
  }
  if (error instanceof UpstreamServiceError) {
    return `Error: ${error.message} [${error.kind}]`;
  }
  return `Error: ${error instanceof Error ? error.message : String(error)}`;
}

/**
 * Searches once for the query given on the command line, or asks for one.
 * Resolves to the process exit code.
 */
export async function runFlightAgent(argv: string[], search: FlightSearchService, io: CliIo): Promise<number> {
  let text = argv.join(' ').trim();
  if (!text) {
    text = (await io.prompt(`Where do you want to fly? (e.g. "${EXAMPLE_QUERY}")\n> `)).trim();
  }
  if (!text) {
    io.write('Error: no query given\n');
    return 2;
  }

  try {
    const outcome = await search.search(text);
    io.write(`${formatFlightResults(outcome)}\n`);
    return 0;
  } catch (error) {
    io.write(`${describeFailure(error)}\n`);
    return 1;
  }
}

import { TravelQuery } from '../models/flight.model';
import { Logger, consoleLogger } from '../lib/logger';
import { ValidationError } from '../validators/common';
import { QueryExtractionClient } from '../clients/groq.client';
import { PatternQueryParser } from './pattern-query.parser';

/**
 * Turns free text into a TravelQuery: the LLM client first when there is
 * one, the pattern parser when it is missing, fails or leaves the route empty.
 */
export class QueryUnderstandingService {
  constructor(
    private readonly parser: PatternQueryParser = new PatternQueryParser(),
    private readonly llm?: QueryExtractionClient,
    private readonly logger: Logger = consoleLogger
  ) {}

  async understand(text: string): Promise<TravelQuery> {
    const trimmed = text.trim();
    if (!trimmed) {
      throw new ValidationError('Query text is required', 'query');
    }

    const query = (await this.fromLlm(trimmed)) ?? this.parser.parse(trimmed);
    this.ensureComplete(query);
    return query;
  }

  private async fromLlm(text: string): Promise<TravelQuery | null> {
    if (!this.llm) {
      return null;
    }

    const result = await this.llm.extract(text);
    if (!result.ok) {
      const message = `Query extraction unavailable (${result.error.kind}), using pattern parser: ${result.error.message}`;
      if (result.error.kind === 'auth') {
        this.logger.info(message);
      } else {
        this.logger.warn(message);
      }
      return null;
    }
    if (!result.value.originPlace || !result.value.destinationPlace) {
      this.logger.warn('Query extraction returned no route, using pattern parser');
      return null;
    }
    return result.value;
  }

  private ensureComplete(query: TravelQuery): void {
    if (!query.originPlace) {
      throw new ValidationError('Could not find an origin in the query (try "from <city> to <city>")', 'origin');
    }
    if (!query.destinationPlace) {
      throw new ValidationError('Could not find a destination in the query', 'destination');
    }
    if (!query.departureDate) {
      throw new ValidationError('Could not find a departure date in the query (e.g. "March 3")', 'departureDate');
    }
  }
}

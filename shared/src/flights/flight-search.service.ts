import { LookupResult } from '../models/airport.model';
import { FlightSearchOutcome, FlightSearchParams, ResolvedEndpoint } from '../models/flight.model';
import { FlightOfferClient } from '../clients/amadeus.client';
import { UnresolvedPlaceError, UpstreamServiceError } from '../lib/errors';
import { Logger, consoleLogger } from '../lib/logger';
import { AirportLookup } from '../resolvers/resolver';
import { QueryUnderstandingService } from '../query/query-understanding.service';
import { ValidationError } from '../validators/common';
import { validateFlightSearch } from '../validators/flight.validator';
import { filterOffers } from './flight-offers';

export interface FlightSearchServiceOptions {
  limit?: number;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Free text in, flight offers out: understand the query, resolve both
 * places concurrently, then fetch and filter offers.
 */
export class FlightSearchService {
  private readonly limit?: number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly understanding: QueryUnderstandingService,
    private readonly airports: AirportLookup,
    private readonly offers: FlightOfferClient,
    options: FlightSearchServiceOptions = {}
  ) {
    this.limit = options.limit;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? consoleLogger;
  }

  async search(text: string): Promise<FlightSearchOutcome> {
    const query = await this.understanding.understand(text);

    const [originResult, destinationResult] = await Promise.all([
      this.airports.resolve(query.originPlace),
      this.airports.resolve(query.destinationPlace)
    ]);
    const origin = this.toEndpoint(originResult, 'origin');
    const destination = this.toEndpoint(destinationResult, 'destination');

    const params: FlightSearchParams = {
      origin: origin.code,
      destination: destination.code,
      departureDate: query.departureDate ?? '',
      returnDate: query.returnDate ?? undefined,
      adults: query.passengers,
      maxPrice: query.maxPrice ?? undefined
    };

    const validation = validateFlightSearch(params, this.now());
    if (!validation.isValid) {
      const [field, message] = Object.entries(validation.errors)[0];
      throw new ValidationError(message, field);
    }

    this.logger.info(`Searching flights ${params.origin} -> ${params.destination} on ${params.departureDate}`);
    const result = await this.offers.searchOffers(params);
    if (!result.ok) {
      throw new UpstreamServiceError(`Flight search failed: ${result.error.message}`, 'amadeus', result.error.kind);
    }

    return {
      query,
      origin,
      destination,
      offers: filterOffers(result.value, { maxPrice: query.maxPrice, limit: this.limit }),
      totalOffers: result.value.length
    };
  }

  private toEndpoint(result: LookupResult, role: 'origin' | 'destination'): ResolvedEndpoint {
    const top = result.candidates[0];
    if (result.status === 'unresolved' || !result.code || !top) {
      throw new UnresolvedPlaceError(result.query, role);
    }
    if (result.status === 'low_confidence') {
      this.logger.warn(
        `Using low-confidence match ${result.code} (${result.confidence}) for ${role} "${result.query}"`
      );
    }
    return { place: result.query, code: result.code, city: top.city, name: top.name, confidence: result.confidence };
  }
}

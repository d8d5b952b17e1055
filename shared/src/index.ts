// Models and contracts
export type {
  AirportRecord,
  LocatedAirportRecord,
  AirportCandidate,
  LookupQuery,
  LookupResult,
  LookupStatus,
  ResolverAttempt,
  ResolverOutcome,
  ResolverSource,
  UnavailableReason
} from './models/airport.model';
export { toCandidate, hasCoordinates } from './models/airport.model';
export type {
  TravelQuery,
  TripType,
  FlightSearchParams,
  FlightOffer,
  FlightItinerary,
  FlightSegment,
  FlightSearchOutcome,
  ResolvedEndpoint
} from './models/flight.model';
export type { ApiResponse, ApiError, HealthCheck } from './contracts/common';
export { ErrorCodes, successResponse, errorResponse, generateTraceId } from './contracts/common';

// Configuration, errors and logging
export type { AppConfig } from './config';
export { loadConfig } from './config';
export { ConfigurationError, DatasetError, UnresolvedPlaceError, UpstreamServiceError } from './lib/errors';
export type { Logger } from './lib/logger';
export { consoleLogger, silentLogger } from './lib/logger';
export { ValidationError, US_STATES, US_STATES_FULL, findUsStateCode, validatePlaceQuery } from './validators/common';
export { validateFlightSearch, isValidIATACode, isValidDateString, isoDay } from './validators/flight.validator';

// Airport data and autocomplete
export type { AirportTableStats } from './data/airport-table';
export { AirportTable, loadAirportTable, parseAirportCsv } from './data/airport-table';
export type { AirportMatch, NearbyAirport, SuggestAirportOptions } from './lib/airports';
export {
  formatAirportLabel,
  searchAirports,
  suggestAirports,
  findNearbyAirports,
  isLikelyAirportCode
} from './lib/airports';
export { normalizePlace, parsePlace } from './lib/place-text';
export { haversineKm } from './lib/geo';
export type { CacheStore } from './lib/cache';
export { MemoryCacheStore } from './lib/cache';

// Resolution pipeline
export type { AirportResolver, AirportLookup } from './resolvers/resolver';
export { LocalDatasetResolver } from './resolvers/local-dataset.resolver';
export { GeocodingResolver } from './resolvers/geocoding.resolver';
export { DirectoryLookupResolver } from './resolvers/directory.resolver';
export type { ResolutionState, ResolverSet, ResolutionOrchestratorOptions } from './resolvers/orchestrator';
export { ResolutionOrchestrator, DEFAULT_ACCEPTANCE_THRESHOLD } from './resolvers/orchestrator';
export type { PipelineDependencies } from './resolvers/pipeline';
export { createResolutionPipeline } from './resolvers/pipeline';
export type { ResolverMetrics } from './observability/metrics';
export { createResolverMetrics } from './observability/metrics';

// External services
export type { ServiceResult, ServiceFailure, ServiceErrorKind } from './clients/service-result';
export type { GeocodingClient, GeocodedPlace } from './clients/nominatim.client';
export { NominatimClient, CachedGeocodingClient } from './clients/nominatim.client';
export type { DirectoryClient, DirectoryAirport } from './clients/geonames.client';
export { GeoNamesClient } from './clients/geonames.client';
export type { QueryExtractionClient } from './clients/groq.client';
export { GroqQueryClient } from './clients/groq.client';
export type { FlightOfferClient } from './clients/amadeus.client';
export { AmadeusFlightClient } from './clients/amadeus.client';

// Flight search
export { PatternQueryParser } from './query/pattern-query.parser';
export { QueryUnderstandingService } from './query/query-understanding.service';
export { FlightSearchService } from './flights/flight-search.service';
export { filterOffers } from './flights/flight-offers';
export { formatFlightResults } from './flights/format-results';

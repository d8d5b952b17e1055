export type TripType = 'roundtrip' | 'one-way';
export type TravelClass = 'ECONOMY' | 'PREMIUM_ECONOMY' | 'BUSINESS' | 'FIRST';

/** What a traveller asked for, before any place is resolved. */
export interface TravelQuery {
  originPlace: string;
  destinationPlace: string;
  departureDate: string | null; // YYYY-MM-DD
  returnDate: string | null;
  passengers: number;
  maxPrice: number | null;
  tripType: TripType;
}

export interface FlightSearchParams {
  origin: string; // IATA code
  destination: string; // IATA code
  departureDate: string;
  returnDate?: string;
  adults: number;
  travelClass?: TravelClass;
  maxPrice?: number;
  currency?: string;
  limit?: number;
}

export interface FlightSegment {
  departure: { iataCode: string; at: string };
  arrival: { iataCode: string; at: string };
  carrierCode: string;
  number: string;
  aircraft?: string;
}

export interface FlightItinerary {
  duration: string; // ISO-8601, e.g. PT5H30M
  stops: number;
  segments: FlightSegment[];
}

export interface FlightOffer {
  id: string;
  price: {
    total: number;
    currency: string;
  };
  validatingAirline?: string;
  itineraries: FlightItinerary[];
}

export interface ResolvedEndpoint {
  place: string;
  code: string;
  city: string;
  name: string;
  confidence: number;
}

export interface FlightSearchOutcome {
  query: TravelQuery;
  origin: ResolvedEndpoint;
  destination: ResolvedEndpoint;
  offers: FlightOffer[];
  totalOffers: number;
}

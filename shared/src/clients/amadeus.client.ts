/**
 * Amadeus Self-Service flight offers (client-credentials OAuth2).
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { FlightOffer, FlightSearchParams } from '../models/flight.model';
import { RetryOptions, retryWithBackoff } from '../lib/retry';
import { classifyError, fail, ok, ServiceResult } from './service-result';

export interface FlightOfferClient {
  searchOffers(params: FlightSearchParams): Promise<ServiceResult<FlightOffer[]>>;
}

export interface AmadeusClientOptions {
  apiKey?: string;
  apiSecret?: string;
  baseUrl?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
  retry?: RetryOptions;
  now?: () => number;
}

export const DEFAULT_AMADEUS_URL = 'https://test.api.amadeus.com';

const tokenSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().positive()
});

const endpointSchema = z.object({ iataCode: z.string(), at: z.string() });

const offerSchema = z.object({
  id: z.string(),
  price: z.object({ total: z.coerce.number(), currency: z.string() }),
  validatingAirlineCodes: z.array(z.string()).optional(),
  itineraries: z.array(
    z.object({
      duration: z.string(),
      segments: z
        .array(
          z.object({
            departure: endpointSchema,
            arrival: endpointSchema,
            carrierCode: z.string(),
            number: z.string(),
            aircraft: z.object({ code: z.string() }).optional()
          })
        )
        .min(1)
    })
  )
});

const offersResponseSchema = z.object({ data: z.array(offerSchema) });

type AmadeusOffer = z.infer<typeof offerSchema>;

// Refresh a little before Amadeus says the token expires
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

export function toFlightOffer(offer: AmadeusOffer): FlightOffer {
  return {
    id: offer.id,
    price: { total: offer.price.total, currency: offer.price.currency },
    validatingAirline: offer.validatingAirlineCodes?.[0] ?? offer.itineraries[0]?.segments[0]?.carrierCode,
    itineraries: offer.itineraries.map((itinerary) => ({
      duration: itinerary.duration,
      stops: itinerary.segments.length - 1,
      segments: itinerary.segments.map((segment) => ({
        departure: { iataCode: segment.departure.iataCode, at: segment.departure.at },
        arrival: { iataCode: segment.arrival.iataCode, at: segment.arrival.at },
        carrierCode: segment.carrierCode,
        number: segment.number,
        aircraft: segment.aircraft?.code
      }))
    }))
  };
}

export class AmadeusFlightClient implements FlightOfferClient {
  private readonly http: AxiosInstance;
  private readonly apiKey?: string;
  private readonly apiSecret?: string;
  private readonly retry: RetryOptions;
  private readonly now: () => number;
  private token: { value: string; expiresAt: number } | null = null;

  constructor(options: AmadeusClientOptions = {}) {
    this.apiKey = options.apiKey;
    this.apiSecret = options.apiSecret;
    this.retry = options.retry ?? {};
    this.now = options.now ?? Date.now;
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl ?? DEFAULT_AMADEUS_URL,
        timeout: options.timeoutMs ?? 15000
      });
  }

  async getAccessToken(): Promise<string> {
    if (this.token && this.token.expiresAt > this.now()) {
      return this.token.value;
    }

    const response = await this.http.post(
      '/v1/security/oauth2/token',
      new URLSearchParams({
        grant_type: 'client_credentials',
        client_id: this.apiKey ?? '',
        client_secret: this.apiSecret ?? ''
      }),
      { headers: { 'Content-Type': 'application/x-www-form-urlencoded' } }
    );

    const body = tokenSchema.parse(response.data);
    this.token = {
      value: body.access_token,
      expiresAt: this.now() + body.expires_in * 1000 - TOKEN_EXPIRY_MARGIN_MS
    };
    return body.access_token;
  }

  async searchOffers(params: FlightSearchParams): Promise<ServiceResult<FlightOffer[]>> {
    if (!this.apiKey || !this.apiSecret) {
      return fail('auth', 'Amadeus credentials are not configured (AMADEUS_API_KEY, AMADEUS_API_SECRET)');
    }

    try {
      const response = await retryWithBackoff(async () => {
        const token = await this.getAccessToken();
        return this.http.get('/v2/shopping/flight-offers', {
          headers: { Authorization: `Bearer ${token}` },
          params: {
            originLocationCode: params.origin,
            destinationLocationCode: params.destination,
            departureDate: params.departureDate,
            returnDate: params.returnDate,
            adults: params.adults,
            travelClass: params.travelClass ?? 'ECONOMY',
            maxPrice: params.maxPrice === undefined ? undefined : Math.floor(params.maxPrice),
            currencyCode: params.currency ?? 'USD',
            max: 50
          }
        });
      }, this.retry);

      const body = offersResponseSchema.parse(response.data);
      return ok(body.data.map(toFlightOffer));
    } catch (error) {
      const failure = classifyError(error);
      if (failure.kind === 'auth') {
        this.token = null;
      }
      return { ok: false, error: failure };
    }
  }
}

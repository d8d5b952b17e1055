import { FlightOffer } from '../models/flight.model';

export interface OfferFilter {
  maxPrice?: number | null;
  limit?: number;
}

export const DEFAULT_OFFER_LIMIT = 10;

/** Drops offers above maxPrice, cheapest first, at most `limit`. */
export function filterOffers(offers: FlightOffer[], filter: OfferFilter = {}): FlightOffer[] {
  const { maxPrice } = filter;
  return offers
    .filter((offer) => maxPrice === undefined || maxPrice === null || offer.price.total <= maxPrice)
    .sort((a, b) => a.price.total - b.price.total)
    .slice(0, filter.limit ?? DEFAULT_OFFER_LIMIT);
}

/** "PT5H30M" -> "5h 30m" */
export function formatIsoDuration(duration: string): string {
  const match = duration.match(/^PT(?:(\d+)H)?(?:(\d+)M)?$/);
  if (!match || (!match[1] && !match[2])) {
    return duration;
  }
  return [match[1] && `${Number(match[1])}h`, match[2] && `${Number(match[2])}m`].filter(Boolean).join(' ');
}

export function describeStops(stops: number): string {
  if (stops === 0) return 'nonstop';
  return stops === 1 ? '1 stop' : `${stops} stops`;
}

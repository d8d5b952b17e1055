import { FlightSearchOutcome } from '../models/flight.model';
import { describeStops, formatIsoDuration } from './flight-offers';

const SHOWN_OFFERS = 5;

export function formatFlightResults(outcome: FlightSearchOutcome): string {
  const { query, origin, destination, offers } = outcome;
  const output: string[] = [];

  output.push('Flight Search Results:');
  output.push(`From: ${origin.city || origin.place} (${origin.code})`);
  output.push(`To: ${destination.city || destination.place} (${destination.code})`);
  output.push(`Date: ${query.departureDate ?? 'n/a'}`);
  if (query.returnDate) {
    output.push(`Return: ${query.returnDate}`);
  }
  output.push(`Passengers: ${query.passengers}`);
  if (query.maxPrice !== null) {
    output.push(`Max Price: $${query.maxPrice}`);
  }
  output.push(`Found ${offers.length} flights`);
  output.push('');

  offers.slice(0, SHOWN_OFFERS).forEach((offer, index) => {
    output.push(`${index + 1}. Price: $${offer.price.total.toFixed(2)} ${offer.price.currency}`);
    if (offer.validatingAirline) {
      output.push(`   Airline: ${offer.validatingAirline}`);
    }
    offer.itineraries.forEach((itinerary, leg) => {
      const first = itinerary.segments[0];
      const last = itinerary.segments[itinerary.segments.length - 1];
      const flights = itinerary.segments.map((segment) => `${segment.carrierCode}${segment.number}`).join(', ');
      output.push(
        `   ${leg === 0 ? 'Outbound' : 'Return'}: ${first.departure.iataCode} -> ${last.arrival.iataCode}, ` +
          `${describeStops(itinerary.stops)}, ${formatIsoDuration(itinerary.duration)} (${flights})`
      );
    });
    output.push('');
  });

  return output.join('\n');
}

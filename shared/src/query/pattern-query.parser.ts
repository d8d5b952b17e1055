import { TravelQuery } from '../models/flight.model';
import { isoDay } from '../validators/flight.validator';

/** Share of a whole-trip budget that goes to flights. */
export const FLIGHT_BUDGET_SHARE = 0.4;

const MONTH = '(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)';
const DAY = '(\\d{1,2})(?:st|nd|rd|th)?';

const PLACE = "([A-Za-z][A-Za-z ,.'-]*?)";
const PLACE_END = "(?=\\s+(?:from|on|in|for|with|between|departing|leaving|returning|and|budget|next|this|under)\\b|\\s*[;!?]|[.,]?\\s*$|\\s+\\d)";

const ROUTE_REGEX = new RegExp(`\\bfrom\\s+${PLACE}\\s+to\\s+${PLACE}${PLACE_END}`, 'i');
const DESTINATION_REGEX = new RegExp(`\\b(?:to|into)\\s+${PLACE}${PLACE_END}`, 'i');
const DATE_RANGE_REGEX = new RegExp(
  `\\b${MONTH}\\s+${DAY}\\s*(?:to|-|until|through|till)\\s*(?:${MONTH}\\s+)?${DAY}\\b`,
  'i'
);
const SINGLE_DATE_REGEX = new RegExp(`\\b${MONTH}\\s+${DAY}\\b`, 'i');
const PASSENGERS_REGEX = /(\d+)\s+(?:people|persons|passengers|adults|travell?ers)\b/i;
const BUDGET_REGEX = /\bbudget\s+(?:is\s+|of\s+)?\$?(\d+(?:,\d{3})*(?:\.\d+)?)/i;
const PRICE_CAP_REGEX = /\b(?:under|below|less than|max(?:imum)?(?: price)?(?: of)?)\s+\$?(\d+(?:,\d{3})*(?:\.\d+)?)/i;
const ONE_WAY_REGEX = /\bone[\s-]way\b/i;

const MONTH_INDEX: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3, may: 4, jun: 5, jul: 6, aug: 7, sep: 8, oct: 9, nov: 10, dec: 11
};

function monthIndex(name: string): number | undefined {
  return MONTH_INDEX[name.slice(0, 3).toLowerCase()];
}

function toAmount(raw: string): number {
  return Number(raw.replace(/,/g, ''));
}

function cleanPlace(raw: string | undefined): string {
  return (raw ?? '').replace(/[\s,.]+$/, '').trim();
}

/** A UTC calendar date, or null when the day does not exist in that month. */
function calendarDay(year: number, month: number, day: number): Date | null {
  const date = new Date(Date.UTC(year, month, day));
  return date.getUTCMonth() === month && date.getUTCDate() === day ? date : null;
}

/**
 * Regex extraction for queries like
 * "from San Jose to Dallas March 3 to March 10, 2 people, budget $1000".
 * Dates without a year fall in the current year, or the next one when that
 * day has already passed.
 */
export class PatternQueryParser {
  constructor(private readonly now: () => Date = () => new Date()) {}

  parse(text: string): TravelQuery {
    const { originPlace, destinationPlace } = this.extractPlaces(text);
    const { departureDate, returnDate } = this.extractDates(text);

    const passengersMatch = text.match(PASSENGERS_REGEX);
    const passengers = passengersMatch ? Number(passengersMatch[1]) : 1;

    let maxPrice: number | null = null;
    const budgetMatch = text.match(BUDGET_REGEX);
    const capMatch = text.match(PRICE_CAP_REGEX);
    if (capMatch) {
      maxPrice = toAmount(capMatch[1]);
    } else if (budgetMatch) {
      maxPrice = Math.round(toAmount(budgetMatch[1]) * FLIGHT_BUDGET_SHARE * 100) / 100;
    }

    const oneWay = ONE_WAY_REGEX.test(text);
    return {
      originPlace,
      destinationPlace,
      departureDate,
      returnDate: oneWay ? null : returnDate,
      passengers,
      maxPrice,
      tripType: returnDate && !oneWay ? 'roundtrip' : 'one-way'
    };
  }

  private extractPlaces(text: string): { originPlace: string; destinationPlace: string } {
    const route = text.match(ROUTE_REGEX);
    if (route) {
      return { originPlace: cleanPlace(route[1]), destinationPlace: cleanPlace(route[2]) };
    }

    const destination = text.match(DESTINATION_REGEX);
    const place = cleanPlace(destination?.[1]);
    return { originPlace: '', destinationPlace: place && monthIndex(place) === undefined ? place : '' };
  }

  private extractDates(text: string): { departureDate: string | null; returnDate: string | null } {
    const today = this.now();
    const todayKey = isoDay(today);

    const range = text.match(DATE_RANGE_REGEX);
    const single = range ? null : text.match(SINGLE_DATE_REGEX);
    const departMonth = monthIndex((range ?? single)?.[1] ?? '');
    const departDay = Number((range ?? single)?.[2]);
    if (departMonth === undefined || !Number.isInteger(departDay)) {
      return { departureDate: null, returnDate: null };
    }

    let year = today.getUTCFullYear();
    let departure = calendarDay(year, departMonth, departDay);
    if (departure && isoDay(departure) < todayKey) {
      year += 1;
      departure = calendarDay(year, departMonth, departDay);
    }
    if (!departure) {
      return { departureDate: null, returnDate: null };
    }

    if (!range) {
      return { departureDate: isoDay(departure), returnDate: null };
    }

    const returnMonth = range[3] ? monthIndex(range[3]) : departMonth;
    const returnDay = Number(range[4]);
    if (returnMonth === undefined) {
      return { departureDate: isoDay(departure), returnDate: null };
    }
    let back = calendarDay(year, returnMonth, returnDay);
    if (back && back.getTime() < departure.getTime()) {
      back = calendarDay(year + 1, returnMonth, returnDay);
    }

    return { departureDate: isoDay(departure), returnDate: back ? isoDay(back) : null };
  }
}

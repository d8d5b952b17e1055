import { FlightSearchParams } from '../models/flight.model';

interface ValidationResult {
  isValid: boolean;
  errors: Record<string, string>;
}

const ISO_DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;

/** Calendar day of a date as YYYY-MM-DD (UTC). */
export function isoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function validateFlightSearch(params: Partial<FlightSearchParams>, now: Date = new Date()): ValidationResult {
  const errors: Record<string, string> = {};

  // Required fields validation
  if (!params.origin?.trim()) {
    errors.origin = 'Origin airport code is required';
  } else if (!isValidIATACode(params.origin)) {
    errors.origin = 'Origin must be a valid 3-letter IATA code';
  }

  if (!params.destination?.trim()) {
    errors.destination = 'Destination airport code is required';
  } else if (!isValidIATACode(params.destination)) {
    errors.destination = 'Destination must be a valid 3-letter IATA code';
  } else if (params.origin?.trim() === params.destination.trim()) {
    errors.destination = 'Destination must differ from origin';
  }

  if (!params.departureDate) {
    errors.departureDate = 'Departure date is required';
  } else if (!isValidDateString(params.departureDate)) {
    errors.departureDate = 'Invalid departure date format (expected YYYY-MM-DD)';
  } else if (params.departureDate < isoDay(now)) {
    errors.departureDate = 'Departure date must not be in the past';
  }

  if (params.returnDate) {
    if (!isValidDateString(params.returnDate)) {
      errors.returnDate = 'Invalid return date format (expected YYYY-MM-DD)';
    } else if (params.departureDate && params.returnDate < params.departureDate) {
      errors.returnDate = 'Return date must be after departure date';
    }
  }

  const adults = params.adults ?? 0;
  if (!Number.isInteger(adults) || adults < 1 || adults > 9) {
    errors.adults = 'Number of adults must be between 1 and 9';
  }

  if (params.maxPrice !== undefined && !(params.maxPrice > 0)) {
    errors.maxPrice = 'Maximum price must be positive';
  }

  return {
    isValid: Object.keys(errors).length === 0,
    errors
  };
}

export function isValidIATACode(code: string): boolean {
  return /^[A-Z]{3}$/.test(code.trim());
}

export function isValidDateString(dateString: string): boolean {
  if (!ISO_DATE_REGEX.test(dateString)) {
    return false;
  }
  const date = new Date(`${dateString}T00:00:00Z`);
  return !isNaN(date.getTime()) && isoDay(date) === dateString;
}

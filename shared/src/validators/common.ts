/**
 * Validators for common data validation across services
 */

export class ValidationError extends Error {
  constructor(message: string, public field: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// US States whitelist with full names (same order, so indexes line up)
export const US_STATES = [
  'AL', 'AK', 'AZ', 'AR', 'CA', 'CO', 'CT', 'DE', 'FL', 'GA',
  'HI', 'ID', 'IL', 'IN', 'IA', 'KS', 'KY', 'LA', 'ME', 'MD',
  'MA', 'MI', 'MN', 'MS', 'MO', 'MT', 'NE', 'NV', 'NH', 'NJ',
  'NM', 'NY', 'NC', 'ND', 'OH', 'OK', 'OR', 'PA', 'RI', 'SC',
  'SD', 'TN', 'TX', 'UT', 'VT', 'VA', 'WA', 'WV', 'WI', 'WY'
];

export const US_STATES_FULL = [
  'Alabama', 'Alaska', 'Arizona', 'Arkansas', 'California', 'Colorado', 'Connecticut', 'Delaware', 'Florida', 'Georgia',
  'Hawaii', 'Idaho', 'Illinois', 'Indiana', 'Iowa', 'Kansas', 'Kentucky', 'Louisiana', 'Maine', 'Maryland',
  'Massachusetts', 'Michigan', 'Minnesota', 'Mississippi', 'Missouri', 'Montana', 'Nebraska', 'Nevada', 'New Hampshire', 'New Jersey',
  'New Mexico', 'New York', 'North Carolina', 'North Dakota', 'Ohio', 'Oklahoma', 'Oregon', 'Pennsylvania', 'Rhode Island', 'South Carolina',
  'South Dakota', 'Tennessee', 'Texas', 'Utah', 'Vermont', 'Virginia', 'Washington', 'West Virginia', 'Wisconsin', 'Wyoming'
];

const MAX_PLACE_LENGTH = 120;

/**
 * Look up a US state by postal code or full name (case-insensitive).
 * Returns the postal code, e.g. "texas" -> "TX".
 */
export function findUsStateCode(value: string, options: { allowPostalCode?: boolean } = {}): string | undefined {
  const trimmed = value.trim();
  if (!trimmed) return undefined;

  const byName = US_STATES_FULL.findIndex((s) => s.toLowerCase() === trimmed.toLowerCase());
  if (byName >= 0) {
    return US_STATES[byName];
  }

  if (options.allowPostalCode !== false) {
    const upper = trimmed.toUpperCase();
    if (US_STATES.includes(upper)) {
      return upper;
    }
  }
  return undefined;
}

/**
 * Validate a free-text place before it enters the resolution pipeline.
 * Returns the trimmed value.
 */
export function validatePlaceQuery(place: unknown, field: string = 'q'): string {
  if (typeof place !== 'string' || !place.trim()) {
    throw new ValidationError(`Query parameter "${field}" is required`, field);
  }

  const trimmed = place.trim();
  if (trimmed.length > MAX_PLACE_LENGTH) {
    throw new ValidationError(`Place must be at most ${MAX_PLACE_LENGTH} characters`, field);
  }
  return trimmed;
}

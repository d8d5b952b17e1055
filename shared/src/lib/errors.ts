/**
 * Fatal start-up errors. Everything that can go wrong while resolving a
 * place is a result value instead (see ResolverOutcome).
 */

export class ConfigurationError extends Error {
  constructor(message: string, public setting: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class DatasetError extends Error {
  constructor(message: string, public path: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DatasetError';
  }
}

/** A place in a travel query that no resolver could map to an airport. */
export class UnresolvedPlaceError extends Error {
  constructor(public place: string, public role: 'origin' | 'destination') {
    super(`Could not find an airport for ${role} "${place}"`);
    this.name = 'UnresolvedPlaceError';
  }
}

export class UpstreamServiceError extends Error {
  constructor(message: string, public service: string, public kind: string) {
    super(message);
    this.name = 'UpstreamServiceError';
  }
}

/**
 * Error types raised by interval construction, lookup and series filtering
 */

export type TermPaceErrorCode =
  | 'MALFORMED_INTERVAL'
  | 'NO_COVERING_INTERVAL'
  | 'EMPTY_INTERVAL_TABLE'
  | 'EMPTY_SERIES_FILTER'
  | 'INVALID_DATE';

export class TermPaceError extends Error {
  readonly code: TermPaceErrorCode;

  constructor(code: TermPaceErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The inauguration source holds an unparsable date, a duplicate start,
 * or a start later than the current date
 */
export class MalformedIntervalError extends TermPaceError {
  constructor(message: string) {
    super('MALFORMED_INTERVAL', message);
  }
}

export class NoCoveringIntervalError extends TermPaceError {
  readonly date: string;

  constructor(date: string, firstStart: string) {
    super('NO_COVERING_INTERVAL', `${date} precedes the first term start (${firstStart})`);
    this.date = date;
  }
}

export class EmptyIntervalTableError extends TermPaceError {
  constructor() {
    super('EMPTY_INTERVAL_TABLE', 'No terms supplied');
  }
}

export class EmptySeriesFilterError extends TermPaceError {
  constructor(message = 'No terms match the requested filters') {
    super('EMPTY_SERIES_FILTER', message);
  }
}

export class InvalidDateError extends TermPaceError {
  readonly value: string;

  constructor(value: string, format: string) {
    super('INVALID_DATE', `Invalid date "${value}" (expected ${format})`);
    this.value = value;
  }
}

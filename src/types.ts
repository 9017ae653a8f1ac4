/**
 * Type definitions for the term comparison pipeline
 */

// =============================================================================
// RAW DATA TYPES (from Federal Register API)
// =============================================================================

export interface RawExecutiveOrder {
  document_number: string;
  executive_order_number: number | null;
  title: string;
  signing_date: string | null;
  publication_date: string;
  president: {
    name: string;
    identifier: string;
  } | null;
  html_url: string;
}

export interface CachedOrdersFile {
  orders: RawExecutiveOrder[];
  fetched_at: string;
  count: number;
}

// =============================================================================
// INTERVAL TYPES
// =============================================================================

/**
 * Inauguration dates as stored on disk: label -> MM/DD/YYYY strings
 */
export type InaugurationSource = Record<string, string[]>;

export interface IntervalEntry {
  label: string;
  start: string; // YYYY-MM-DD
}

/**
 * One presidential term. Built by buildIntervalTable and frozen afterwards.
 */
export interface Interval {
  readonly key: string;
  readonly label: string;
  readonly ordinal: number;
  readonly start: string;
  readonly startDay: number;
  readonly endOffsetDays: number;
}

/**
 * Intervals sorted ascending by start
 */
export type IntervalTable = readonly Interval[];

// =============================================================================
// ATTRIBUTION TYPES
// =============================================================================

export interface DatedDocument {
  signing_date: string | null;
}

export interface TermAttribution<D extends DatedDocument> {
  interval: Interval;
  documents: D[];
  dayCounts: Map<number, number>;
}

export interface AttributionFailure<D extends DatedDocument> {
  document: D;
  error: Error;
}

export interface AttributionResult<D extends DatedDocument> {
  terms: Map<string, TermAttribution<D>>;
  failures: AttributionFailure<D>[];
  earliestDate: string | null;
}

// =============================================================================
// SERIES TYPES
// =============================================================================

export interface CompareOptions {
  horizonDays?: number;
  terms?: string[];
  minStart?: string; // inclusive
  maxStart?: string; // exclusive
}

export interface TermSeries {
  key: string;
  label: string;
  ordinal: number;
  start: string;
  endOffsetDays: number;
  total: number;
  series: number[];
}

export interface SeriesChartFile {
  horizon_days: number;
  generated_at: string;
  terms: {
    key: string;
    label: string;
    ordinal: number;
    start: string;
    end_offset_days: number;
    total: number;
    series: number[];
  }[];
}

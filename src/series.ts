/**
 * Cumulative day-offset series for comparing issuance pace across terms
 */

import { DEFAULT_HORIZON_DAYS } from './config.js';
import { parseIsoDate } from './dates.js';
import { EmptySeriesFilterError } from './errors.js';
import type { AttributionResult, CompareOptions, DatedDocument, TermSeries } from './types.js';

/**
 * Running total of documents for offsets 0..min(horizonDays, endOffsetDays).
 * A term is never extended past its own end; days without documents repeat
 * the previous total.
 */
export function buildSeries(
  dayCounts: ReadonlyMap<number, number>,
  horizonDays: number,
  endOffsetDays: number
): number[] {
  if (!Number.isInteger(horizonDays) || horizonDays < 0) {
    throw new RangeError(`Horizon must be a non-negative integer, got ${horizonDays}`);
  }

  const last = Math.min(horizonDays, endOffsetDays);
  const series: number[] = [];
  let total = 0;

  for (let offset = 0; offset <= last; offset++) {
    total += dayCounts.get(offset) ?? 0;
    series.push(total);
  }

  return series;
}

/**
 * Build series for every term passing the filters, in chronological order
 */
export function compareTerms<D extends DatedDocument>(
  result: AttributionResult<D>,
  options: CompareOptions = {}
): TermSeries[] {
  const horizonDays = options.horizonDays ?? DEFAULT_HORIZON_DAYS;
  const allowed = options.terms ? new Set(options.terms) : null;
  const minDay = options.minStart ? parseIsoDate(options.minStart) : null;
  const maxDay = options.maxStart ? parseIsoDate(options.maxStart) : null;

  const selected = Array.from(result.terms.values())
    .filter(({ interval }) => {
      if (allowed && !allowed.has(interval.key)) return false;
      if (minDay !== null && interval.startDay < minDay) return false;
      if (maxDay !== null && interval.startDay >= maxDay) return false;
      return true;
    })
    .sort((a, b) => a.interval.startDay - b.interval.startDay);

  if (selected.length === 0) {
    throw new EmptySeriesFilterError();
  }

  return selected.map(({ interval, documents, dayCounts }) => ({
    key: interval.key,
    label: interval.label,
    ordinal: interval.ordinal,
    start: interval.start,
    endOffsetDays: interval.endOffsetDays,
    total: documents.length,
    series: buildSeries(dayCounts, horizonDays, interval.endOffsetDays)
  }));
}

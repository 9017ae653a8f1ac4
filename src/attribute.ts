/**
 * Attribute dated documents to the presidential term they were signed in
 */

import { parseIsoDate } from './dates.js';
import { TermPaceError } from './errors.js';
import { locateInterval } from './locate.js';
import type {
  AttributionResult,
  DatedDocument,
  IntervalTable,
  TermAttribution
} from './types.js';

/**
 * Group documents by term and count them per day offset from the term start.
 *
 * Every term gets an entry, even with no documents. Documents that can't be
 * placed (missing or invalid date, or signed before the first term) are
 * collected in `failures`; the caller decides whether to skip or abort.
 */
export function attribute<D extends DatedDocument>(
  documents: readonly D[],
  table: IntervalTable
): AttributionResult<D> {
  const terms = new Map<string, TermAttribution<D>>();
  for (const interval of table) {
    terms.set(interval.key, { interval, documents: [], dayCounts: new Map() });
  }

  const failures: AttributionResult<D>['failures'] = [];
  let earliestDay: number | null = null;
  let earliestDate: string | null = null;

  for (const document of documents) {
    if (!document.signing_date) {
      failures.push({ document, error: new Error('Missing signing date') });
      continue;
    }

    let day: number;
    let term: TermAttribution<D> | undefined;
    try {
      day = parseIsoDate(document.signing_date);
      term = terms.get(locateInterval(table, day).key);
    } catch (err) {
      if (err instanceof TermPaceError) {
        failures.push({ document, error: err });
        continue;
      }
      throw err;
    }

    if (!term) {
      throw new Error(`Located term is missing from the table: ${document.signing_date}`);
    }

    const offset = day - term.interval.startDay;
    term.documents.push(document);
    term.dayCounts.set(offset, (term.dayCounts.get(offset) ?? 0) + 1);

    if (earliestDay === null || day < earliestDay) {
      earliestDay = day;
      earliestDate = document.signing_date;
    }
  }

  return { terms, failures, earliestDate };
}

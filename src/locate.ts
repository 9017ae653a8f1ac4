/**
 * Find the term covering a date
 */

import { formatEpochDay } from './dates.js';
import { EmptyIntervalTableError, NoCoveringIntervalError } from './errors.js';
import type { Interval, IntervalTable } from './types.js';

/**
 * Return the interval with the greatest start on or before `day`.
 *
 * Binary search over the inclusive window [low, high]. Taking the upper
 * midpoint keeps `low = mid` moving forward, so a two-element window always
 * shrinks and the loop ends with exactly one candidate.
 */
export function locateInterval(table: IntervalTable, day: number): Interval {
  if (table.length === 0) {
    throw new EmptyIntervalTableError();
  }
  if (day < table[0].startDay) {
    throw new NoCoveringIntervalError(formatEpochDay(day), table[0].start);
  }

  let low = 0;
  let high = table.length - 1;

  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    if (table[mid].startDay > day) {
      high = mid - 1;
    } else {
      low = mid;
    }
  }

  return table[low];
}

/**
 * Presidential term table: loading inauguration dates and deriving
 * per-term ordinals and end boundaries
 */

import { Ajv } from 'ajv';
import { parseIsoDate, parseUsDate, formatEpochDay, epochDayOf } from './dates.js';
import { EmptyIntervalTableError, MalformedIntervalError, InvalidDateError } from './errors.js';
import { readJson } from './utils.js';
import type { InaugurationSource, Interval, IntervalEntry, IntervalTable } from './types.js';

const ajv = new Ajv({ allErrors: true });

const validateInaugurations = ajv.compile<InaugurationSource>({
  type: 'object',
  additionalProperties: {
    type: 'array',
    items: { type: 'string' }
  }
});

/**
 * Term key for a label and ordinal, e.g. "Barack Obama term 2"
 */
export function termKey(label: string, ordinal: number): string {
  return `${label} term ${ordinal}`;
}

/**
 * Convert the stored MM/DD/YYYY inauguration dates into interval entries
 */
export function parseInaugurations(source: InaugurationSource): IntervalEntry[] {
  const entries: IntervalEntry[] = [];

  for (const [label, dates] of Object.entries(source)) {
    for (const raw of dates) {
      let day: number;
      try {
        day = parseUsDate(raw);
      } catch (err) {
        if (err instanceof InvalidDateError) {
          throw new MalformedIntervalError(`${label}: ${err.message}`);
        }
        throw err;
      }
      entries.push({ label, start: formatEpochDay(day) });
    }
  }

  return entries;
}

/**
 * Load and parse the inauguration table from disk
 */
export async function loadInaugurations(filePath: string): Promise<IntervalEntry[]> {
  const data = await readJson(filePath);

  if (data === null) {
    throw new Error(`Inauguration file not found: ${filePath}`);
  }
  if (!validateInaugurations(data)) {
    throw new MalformedIntervalError(`${filePath}: ${ajv.errorsText(validateInaugurations.errors)}`);
  }

  return parseInaugurations(data);
}

/**
 * Build the sorted term table.
 *
 * Ordinals count prior terms with the same label in chronological order.
 * Each term ends where the next one starts; the last one is still open and
 * ends at `now`.
 */
export function buildIntervalTable(entries: readonly IntervalEntry[], now: Date): IntervalTable {
  if (entries.length === 0) {
    throw new EmptyIntervalTableError();
  }

  const sorted = entries
    .map(entry => {
      let startDay: number;
      try {
        startDay = parseIsoDate(entry.start);
      } catch (err) {
        if (err instanceof InvalidDateError) {
          throw new MalformedIntervalError(`${entry.label}: ${err.message}`);
        }
        throw err;
      }
      return { label: entry.label, startDay };
    })
    .sort((a, b) => a.startDay - b.startDay);

  const nowDay = epochDayOf(now);
  const ordinals = new Map<string, number>();
  const table: Interval[] = [];

  for (let i = 0; i < sorted.length; i++) {
    const { label, startDay } = sorted[i];
    const next = sorted[i + 1];

    if (next && next.startDay === startDay) {
      throw new MalformedIntervalError(
        `Duplicate term start ${formatEpochDay(startDay)} (${label}, ${next.label})`
      );
    }

    const endDay = next ? next.startDay : nowDay;
    if (endDay < startDay) {
      throw new MalformedIntervalError(
        `${label}: term start ${formatEpochDay(startDay)} is after the current date ${formatEpochDay(nowDay)}`
      );
    }

    const ordinal = (ordinals.get(label) ?? 0) + 1;
    ordinals.set(label, ordinal);

    table.push(Object.freeze({
      key: termKey(label, ordinal),
      label,
      ordinal,
      start: formatEpochDay(startDay),
      startDay,
      endOffsetDays: endDay - startDay
    }));
  }

  return Object.freeze(table);
}

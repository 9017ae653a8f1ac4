/**
 * Calendar-day helpers. Dates are handled as UTC epoch days so that day
 * offsets are plain integer differences.
 */

import { InvalidDateError } from './errors.js';

const MS_PER_DAY = 86_400_000;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

/**
 * Epoch day for a calendar date, or null if the parts don't name a real day
 */
function epochDay(year: number, month: number, day: number): number | null {
  const ms = Date.UTC(year, month - 1, day);
  const check = new Date(ms);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    return null;
  }
  return ms / MS_PER_DAY;
}

/**
 * Parse a YYYY-MM-DD date into its epoch day
 */
export function parseIsoDate(value: string): number {
  const match = ISO_DATE.exec(value);
  const day = match ? epochDay(Number(match[1]), Number(match[2]), Number(match[3])) : null;
  if (day === null) {
    throw new InvalidDateError(value, 'YYYY-MM-DD');
  }
  return day;
}

/**
 * Parse an MM/DD/YYYY date into its epoch day
 */
export function parseUsDate(value: string): number {
  const match = US_DATE.exec(value);
  const day = match ? epochDay(Number(match[3]), Number(match[1]), Number(match[2])) : null;
  if (day === null) {
    throw new InvalidDateError(value, 'MM/DD/YYYY');
  }
  return day;
}

/**
 * Format an epoch day as YYYY-MM-DD
 */
export function formatEpochDay(day: number): string {
  return new Date(day * MS_PER_DAY).toISOString().slice(0, 10);
}

/**
 * Epoch day of the UTC calendar date of an instant
 */
export function epochDayOf(date: Date): number {
  return Math.floor(date.getTime() / MS_PER_DAY);
}

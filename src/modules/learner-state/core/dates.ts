/**
 * Date helpers shared by the scheduler, streak tracker and queries.
 * All calendar arithmetic is done in UTC.
 */

import type { IsoDate, IsoTimestamp } from './types.js';

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Normalizes any parseable timestamp to `toISOString()` form.
 */
export function normalizeTimestamp(timestamp: string): IsoTimestamp {
  return new Date(timestamp).toISOString();
}

/**
 * Extracts the UTC calendar date (YYYY-MM-DD) from a timestamp.
 */
export function toIsoDate(timestamp: string | Date): IsoDate {
  const date = typeof timestamp === 'string' ? new Date(timestamp) : timestamp;
  return date.toISOString().slice(0, 10);
}

/**
 * Signed number of whole days from `from` to `to` (both YYYY-MM-DD).
 */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  return Math.round((Date.parse(to) - Date.parse(from)) / MS_PER_DAY);
}

/**
 * Returns a new Date `days` days after `date`.
 */
export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

/**
 * Returns whichever timestamp is later.
 */
export function laterTimestamp(a: IsoTimestamp | null, b: IsoTimestamp): IsoTimestamp {
  if (a === null) {
    return b;
  }
  return Date.parse(b) > Date.parse(a) ? b : a;
}

import type { SeededRandom } from './random';

export const SECOND_MS = 1000;
export const MINUTE_MS = 60 * SECOND_MS;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

/**
 * Whole-second timestamp drawn uniformly in
 * [reference - startDaysAgo, reference - endDaysAgo]
 */
export function randomTimestamp(
  rng: SeededRandom,
  reference: number,
  startDaysAgo: number,
  endDaysAgo = 0
): number {
  const start = reference - startDaysAgo * DAY_MS;
  const end = reference - endDaysAgo * DAY_MS;
  const seconds = Math.floor((end - start) / SECOND_MS);
  return start + rng.int(0, seconds) * SECOND_MS;
}

/**
 * UTC midnight at or before the timestamp, pre-1970 included
 */
export function utcDayStart(timestamp: number): number {
  return Math.floor(timestamp / DAY_MS) * DAY_MS;
}

/**
 * Same UTC day, minute and second, moved to the given hour
 */
export function atUtcHour(timestamp: number, hour: number): number {
  const d = new Date(timestamp);
  d.setUTCHours(hour);
  return d.getTime();
}

/**
 * Outside banking hours: after 22:00 or before 06:00 UTC
 */
export function isAfterHours(timestamp: number): boolean {
  const hour = new Date(timestamp).getUTCHours();
  return hour > 22 || hour < 6;
}

/** ISO-8601 UTC, sortable as text */
export function formatTimestamp(timestamp: number): string {
  return new Date(timestamp).toISOString();
}

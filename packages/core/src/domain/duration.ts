/**
 * @fileoverview Durations and calendar dates
 *
 * Durations are whole milliseconds. Daily files store them as decimal hours
 * with two places, so anything read back lands on a 36 second grid.
 */

export type DurationMs = number;

export const MS_PER_SECOND = 1000;
export const MS_PER_MINUTE = 60 * MS_PER_SECOND;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;

export function seconds(n: number): DurationMs {
  return Math.round(n * MS_PER_SECOND);
}

export function minutes(n: number): DurationMs {
  return Math.round(n * MS_PER_MINUTE);
}

export function hours(n: number): DurationMs {
  return Math.round(n * MS_PER_HOUR);
}

export function toHours(duration: DurationMs): number {
  return duration / MS_PER_HOUR;
}

/**
 * Format as fixed two-decimal hours: 4680000 -> "1.30h"
 */
export function formatHours(duration: DurationMs): string {
  return `${toHours(duration).toFixed(2)}h`;
}

/**
 * Parse "1.30h" / "1.3" into a duration rounded to whole seconds.
 * Returns null for anything that is not a finite, non-negative number.
 */
export function parseHours(text: string): DurationMs | null {
  const trimmed = text.trim().replace(/h$/i, '').trim();
  if (trimmed === '') return null;
  const value = Number(trimmed);
  if (!Number.isFinite(value) || value < 0) return null;
  return Math.round(value * 3600) * MS_PER_SECOND;
}

/**
 * Human form: "1h 30m", "2h", "45m". Whole minutes, rounded down.
 */
export function formatDuration(duration: DurationMs): string {
  const totalMinutes = Math.floor(Math.max(0, duration) / MS_PER_MINUTE);
  const h = Math.floor(totalMinutes / 60);
  const m = totalMinutes % 60;

  if (h > 0 && m > 0) return `${h}h ${m}m`;
  if (h > 0) return `${h}h`;
  return `${m}m`;
}

// =============================================================================
// Local calendar dates
// =============================================================================

const DATE_KEY_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad2(n: number): string {
  return n.toString().padStart(2, '0');
}

/**
 * Local calendar date of an instant as YYYY-MM-DD
 */
export function localDateKey(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

/**
 * Parse YYYY-MM-DD into local midnight of that day
 */
export function parseDateKey(key: string): Date | null {
  const match = DATE_KEY_REGEX.exec(key);
  if (!match) return null;
  const [, y, mo, d] = match;
  const date = new Date(Number(y), Number(mo) - 1, Number(d));
  return localDateKey(date) === key ? date : null;
}

/**
 * Shift a local date by whole calendar days (DST-safe)
 */
export function addDays(date: Date, days: number): Date {
  const shifted = new Date(date.getFullYear(), date.getMonth(), date.getDate() + days);
  shifted.setHours(date.getHours(), date.getMinutes(), date.getSeconds(), date.getMilliseconds());
  return shifted;
}

/**
 * Parse an RFC3339 timestamp, or the older "YYYY-MM-DD HH:MM:SS" local form
 */
export function parseTimestamp(text: string): Date | null {
  const trimmed = text.trim();
  const legacy = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/.exec(trimmed);
  if (legacy) {
    const [, y, mo, d, h, mi, s] = legacy;
    return new Date(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(s));
  }
  if (!/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}/.test(trimmed)) return null;
  const ms = Date.parse(trimmed);
  return Number.isNaN(ms) ? null : new Date(ms);
}

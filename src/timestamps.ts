import { TimestampError } from './errors.js';

const DAY_MS = 24 * 60 * 60 * 1000;

// YYYY-MM-DDTHH:MM:SS[.fff][Z|±HH:MM]
const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})(\.\d+)?(Z|[+-]\d{2}:\d{2})?$/i;

/**
 * Parse an API timestamp. A missing zone designator means UTC.
 * Throws TimestampError naming the field instead of returning an invalid Date.
 */
export function parseTimestamp(value: string, field: string): Date {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    throw new TimestampError(field, value);
  }

  const [, year, month, day, hour, minute, second, fraction, zone] = match;
  const y = Number(year);
  const mo = Number(month);
  const d = Number(day);
  const h = Number(hour);
  const mi = Number(minute);
  const s = Number(second);

  if (h > 23 || mi > 59 || s > 59) {
    throw new TimestampError(field, value);
  }

  const ms = fraction ? Math.round(Number(fraction) * 1000) : 0;
  const utc = new Date(Date.UTC(y, mo - 1, d, h, mi, s, ms));

  // Date.UTC rolls Feb 30 over into March; reject instead
  if (utc.getUTCFullYear() !== y || utc.getUTCMonth() !== mo - 1 || utc.getUTCDate() !== d) {
    throw new TimestampError(field, value);
  }

  return new Date(utc.getTime() - offsetMinutes(zone) * 60_000);
}

function offsetMinutes(zone: string | undefined): number {
  if (!zone || zone.toUpperCase() === 'Z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const [hours, minutes] = zone.slice(1).split(':').map(Number);
  return sign * (hours * 60 + minutes);
}

export function daysBefore(now: Date, days: number): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

/** True when the timestamp is strictly after `now - days` */
export function isWithinDays(value: string, field: string, now: Date, days: number): boolean {
  return parseTimestamp(value, field).getTime() > daysBefore(now, days).getTime();
}

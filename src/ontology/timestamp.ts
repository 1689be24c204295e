/**
 * ISO-8601 timestamp handling.
 *
 * Timestamps are held as `Date` in memory and written as
 * `Date#toISOString()` text. Input accepts the extended ISO-8601 forms
 * produced by common tracers: date only, date + time with optional
 * seconds/fraction, `T` or space separator, and an optional `Z` or
 * `±HH:MM` / `±HHMM` / `±HH` offset. Offset-less values are read as UTC.
 */

import { z } from 'zod';
import { MalformedTimestampError } from './errors.js';

const ISO_8601 =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?(?:([+-])(\d{2})(?::?(\d{2}))?)?$/;

/**
 * Parse ISO-8601 text into a Date, or `undefined` if it is not ISO-8601.
 * A trailing `Z` is normalized to `+00:00` first.
 */
export function tryParseTimestamp(text: string): Date | undefined {
  const normalized = text.endsWith('Z') ? `${text.slice(0, -1)}+00:00` : text;
  const match = ISO_8601.exec(normalized);
  if (!match) return undefined;

  const [, year, month, day, hour, minute, second, fraction, sign, offsetHour, offsetMinute] = match;
  const y = Number(year);
  const mo = Number(month);
  const d = Number(day);
  const h = hour === undefined ? 0 : Number(hour);
  const mi = minute === undefined ? 0 : Number(minute);
  const s = second === undefined ? 0 : Number(second);
  const ms = fraction === undefined ? 0 : Number(fraction.slice(0, 3).padEnd(3, '0'));

  if (mo < 1 || mo > 12 || d < 1 || d > daysInMonth(y, mo)) return undefined;
  if (h > 23 || mi > 59 || s > 59) return undefined;

  let offsetMinutes = 0;
  if (sign !== undefined && offsetHour !== undefined) {
    const oh = Number(offsetHour);
    const om = offsetMinute === undefined ? 0 : Number(offsetMinute);
    if (oh > 23 || om > 59) return undefined;
    offsetMinutes = (sign === '-' ? -1 : 1) * (oh * 60 + om);
  }

  // setUTCFullYear keeps years 0-99 literal; Date.UTC maps them to 19xx
  const date = new Date(0);
  date.setUTCFullYear(y, mo - 1, d);
  date.setUTCHours(h, mi, s, ms);
  return new Date(date.getTime() - offsetMinutes * 60_000);
}

/**
 * Parse an optional timestamp field of an external document.
 *
 * `undefined`/`null` map to `null`; anything that is not ISO-8601 throws
 * MalformedTimestampError naming `field`.
 */
export function parseTimestamp(value: string | null | undefined, field: string): Date | null {
  if (value === undefined || value === null) return null;
  const parsed = tryParseTimestamp(value);
  if (!parsed) {
    throw new MalformedTimestampError(field, value);
  }
  return parsed;
}

export function formatTimestamp(value: Date): string {
  return value.toISOString();
}

/** Seconds elapsed between two instants. */
export function secondsBetween(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / 1000;
}

/** Required timestamp field: ISO text or a Date in, Date out. */
export const TimestampSchema = z.union([z.date(), z.string()]).transform((value, ctx) => {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid date' });
      return z.NEVER;
    }
    return value;
  }
  const parsed = tryParseTimestamp(value);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not an ISO-8601 timestamp: "${value}"` });
    return z.NEVER;
  }
  return parsed;
});

/** Optional timestamp field: always present on output, `null` when unset. */
export const optionalTimestamp = () => TimestampSchema.nullable().default(null);

function daysInMonth(year: number, month: number): number {
  const date = new Date(0);
  date.setUTCFullYear(year, month, 0);
  return date.getUTCDate();
}

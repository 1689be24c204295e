import { describe, expect, it } from 'vitest';
import {
  TimestampSchema,
  optionalTimestamp,
  parseTimestamp,
  secondsBetween,
  tryParseTimestamp,
} from '../timestamp.js';
import { MalformedTimestampError } from '../errors.js';

describe('tryParseTimestamp', () => {
  it('normalizes a trailing Z to UTC', () => {
    expect(tryParseTimestamp('2024-01-01T00:00:00Z')?.toISOString()).toBe('2024-01-01T00:00:00.000Z');
  });

  it('applies numeric offsets', () => {
    expect(tryParseTimestamp('2024-01-01T05:30:00+05:30')?.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(tryParseTimestamp('2023-12-31T19:00:00-0500')?.toISOString()).toBe('2024-01-01T00:00:00.000Z');
  });

  it('accepts date-only and space-separated forms', () => {
    expect(tryParseTimestamp('2024-03-05')?.toISOString()).toBe('2024-03-05T00:00:00.000Z');
    expect(tryParseTimestamp('2024-01-01 12:00')?.toISOString()).toBe('2024-01-01T12:00:00.000Z');
  });

  it('truncates fractional seconds to milliseconds', () => {
    expect(tryParseTimestamp('2024-01-01T12:00:00.123456')?.toISOString()).toBe('2024-01-01T12:00:00.123Z');
    expect(tryParseTimestamp('2024-01-01T12:00:00.5Z')?.toISOString()).toBe('2024-01-01T12:00:00.500Z');
  });

  it('rejects text that is not ISO-8601', () => {
    expect(tryParseTimestamp('yesterday')).toBeUndefined();
    expect(tryParseTimestamp('01/02/2024')).toBeUndefined();
    expect(tryParseTimestamp('')).toBeUndefined();
  });

  it('rejects out-of-range fields', () => {
    expect(tryParseTimestamp('2024-02-30T00:00:00')).toBeUndefined();
    expect(tryParseTimestamp('2024-13-01')).toBeUndefined();
    expect(tryParseTimestamp('2024-01-01T24:00:00')).toBeUndefined();
  });

  it('accepts Feb 29 only in leap years', () => {
    expect(tryParseTimestamp('2024-02-29')?.toISOString()).toBe('2024-02-29T00:00:00.000Z');
    expect(tryParseTimestamp('2023-02-29')).toBeUndefined();
  });

  it('keeps years below 100 literal', () => {
    expect(tryParseTimestamp('0050-03-01T00:00:00Z')?.toISOString()).toBe('0050-03-01T00:00:00.000Z');
    expect(tryParseTimestamp('0000-02-29')?.toISOString()).toBe('0000-02-29T00:00:00.000Z');
    expect(tryParseTimestamp('0099-02-29')).toBeUndefined();
    expect(tryParseTimestamp('0001-01-01T00:30:00+01:00')?.toISOString()).toBe('0000-12-31T23:30:00.000Z');
  });
});

describe('parseTimestamp', () => {
  it('maps absent values to null', () => {
    expect(parseTimestamp(undefined, 'started_at')).toBeNull();
    expect(parseTimestamp(null, 'started_at')).toBeNull();
  });

  it('throws MalformedTimestampError naming the field', () => {
    try {
      parseTimestamp('not-a-time', 'steps.3.timestamp');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedTimestampError);
      if (error instanceof MalformedTimestampError) {
        expect(error.code).toBe('MALFORMED_TIMESTAMP');
        expect(error.field).toBe('steps.3.timestamp');
        expect(error.value).toBe('not-a-time');
        expect(error.message).toBe('Malformed timestamp in steps.3.timestamp: "not-a-time" is not ISO-8601');
      }
    }
  });
});

describe('TimestampSchema', () => {
  it('passes Dates through and parses ISO text', () => {
    const date = new Date('2024-01-01T00:00:00.000Z');
    expect(TimestampSchema.parse(date)).toBe(date);
    expect(TimestampSchema.parse('2024-01-01T00:00:00Z')).toEqual(date);
  });

  it('reports non-ISO text as an issue', () => {
    const result = TimestampSchema.safeParse('nope');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('Not an ISO-8601 timestamp: "nope"');
    }
  });

  it('optional timestamps default to null', () => {
    expect(optionalTimestamp().parse(undefined)).toBeNull();
    expect(optionalTimestamp().parse(null)).toBeNull();
  });
});

describe('secondsBetween', () => {
  it('returns elapsed seconds', () => {
    expect(secondsBetween(new Date('2024-01-01T00:00:00Z'), new Date('2024-01-01T00:01:30.500Z'))).toBe(90.5);
  });
});

import { describe, expect, it } from 'vitest';
import { isoDayOfWeek, nextPeriod, parseTimestamp, startOfUtcDay, startOfUtcIsoWeek } from '../time.js';

const iso = (d: Date | null) => d?.toISOString() ?? null;

describe('parseTimestamp', () => {
  it('reads naive dates and date-times as UTC', () => {
    expect(iso(parseTimestamp('2023-03-05'))).toBe('2023-03-05T00:00:00.000Z');
    expect(iso(parseTimestamp('2023-03-05 14:30'))).toBe('2023-03-05T14:30:00.000Z');
    expect(iso(parseTimestamp('2023-03-05T14:30:15'))).toBe('2023-03-05T14:30:15.000Z');
  });

  it('honours explicit offsets', () => {
    expect(iso(parseTimestamp('2023-03-05T14:30:00+02:00'))).toBe('2023-03-05T12:30:00.000Z');
    expect(iso(parseTimestamp('2023-03-05T14:30:00Z'))).toBe('2023-03-05T14:30:00.000Z');
  });

  it('accepts US dates, Date objects and epoch millis', () => {
    expect(iso(parseTimestamp('01/15/2023'))).toBe('2023-01-15T00:00:00.000Z');
    expect(iso(parseTimestamp('01/15/2023 08:05'))).toBe('2023-01-15T08:05:00.000Z');
    expect(iso(parseTimestamp(new Date('2023-01-01T00:00:00Z')))).toBe('2023-01-01T00:00:00.000Z');
    expect(iso(parseTimestamp(Date.UTC(2023, 0, 2)))).toBe('2023-01-02T00:00:00.000Z');
  });

  it('accepts slash-separated and unpadded year-first dates', () => {
    expect(iso(parseTimestamp('2023/01/05'))).toBe('2023-01-05T00:00:00.000Z');
    expect(iso(parseTimestamp('2023/01/05 10:00'))).toBe('2023-01-05T10:00:00.000Z');
    expect(iso(parseTimestamp('2023-1-5'))).toBe('2023-01-05T00:00:00.000Z');
    expect(iso(parseTimestamp('2023-1-05T06:30:00'))).toBe('2023-01-05T06:30:00.000Z');
    expect(parseTimestamp('2023-01/05')).toBeNull();
  });

  it('rejects instants outside the nanosecond epoch range', () => {
    expect(iso(parseTimestamp(0))).toBe('1970-01-01T00:00:00.000Z');
    expect(parseTimestamp(4e13)).toBeNull();
    expect(parseTimestamp(8.64e15)).toBeNull();
    expect(parseTimestamp(-8.64e15)).toBeNull();
    expect(parseTimestamp('2300-01-01')).toBeNull();
    expect(parseTimestamp('1600-01-01')).toBeNull();
    expect(parseTimestamp(new Date('9999-12-31T00:00:00Z'))).toBeNull();
    expect(iso(parseTimestamp('2262-04-11'))).toBe('2262-04-11T00:00:00.000Z');
    expect(iso(parseTimestamp('1677-09-22'))).toBe('1677-09-22T00:00:00.000Z');
  });

  it('returns null for junk', () => {
    for (const v of ['', '   ', 'not a date', '2023-02-30', '2023-13-01', null, undefined, NaN, true, {}]) {
      expect(parseTimestamp(v)).toBeNull();
    }
  });
});

describe('calendar buckets', () => {
  it('starts ISO weeks on Monday', () => {
    // 2023-01-01 is a Sunday
    expect(startOfUtcIsoWeek(new Date('2023-01-01T23:00:00Z')).toISOString()).toBe('2022-12-26T00:00:00.000Z');
    expect(startOfUtcIsoWeek(new Date('2023-01-02T00:00:00Z')).toISOString()).toBe('2023-01-02T00:00:00.000Z');
    expect(startOfUtcIsoWeek(new Date('2023-01-08T12:00:00Z')).toISOString()).toBe('2023-01-02T00:00:00.000Z');
  });

  it('steps days and weeks', () => {
    const day = startOfUtcDay(new Date('2023-03-25T18:00:00Z'));
    expect(day.toISOString()).toBe('2023-03-25T00:00:00.000Z');
    expect(nextPeriod(day, 'day').toISOString()).toBe('2023-03-26T00:00:00.000Z');
    expect(nextPeriod(day, 'week').toISOString()).toBe('2023-04-01T00:00:00.000Z');
  });

  it('numbers weekdays from Monday', () => {
    expect(isoDayOfWeek(new Date('2023-01-02T00:00:00Z'))).toBe(0);
    expect(isoDayOfWeek(new Date('2023-01-01T00:00:00Z'))).toBe(6);
  });
});

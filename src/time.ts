// src/time.ts
// Everything here works on UTC instants; naive input is read as UTC wall-clock.
import { addHours, isValid, parse, parseISO } from 'date-fns';
import type { Granularity } from './types.js';

/** year-first, `-` or `/`, month and day padded or not, optional time */
const NAIVE = /^(\d{4})([-/])(\d{1,2})\2(\d{1,2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d{1,3})?)?))?$/;
const ISO_WITH_OFFSET = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})$/;

/** US-style formats, tried in order */
const US_FORMATS = ['MM/dd/yyyy HH:mm:ss', 'MM/dd/yyyy HH:mm', 'MM/dd/yyyy'];
const REF = new Date(2000, 0, 1);

/** Span of a signed 64-bit nanosecond epoch clock, rounded inward to whole ms. */
export const MIN_TIMESTAMP = new Date('1677-09-21T00:12:43.146Z');
export const MAX_TIMESTAMP = new Date('2262-04-11T23:47:16.854Z');

function wallClockToUtc(d: Date): Date {
  return new Date(Date.UTC(
    d.getFullYear(), d.getMonth(), d.getDate(),
    d.getHours(), d.getMinutes(), d.getSeconds(), d.getMilliseconds(),
  ));
}

/** Returns null when the value is not a usable timestamp. */
export function parseTimestamp(value: unknown): Date | null {
  if (value instanceof Date) return checked(new Date(value.getTime()));
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    return checked(new Date(value));
  }
  if (typeof value !== 'string') return null;

  const s = value.trim();
  if (!s) return null;

  const naive = NAIVE.exec(s);
  if (naive) {
    const [, y = '', , m = '', d = '', time = '00:00:00'] = naive;
    return checked(parseISO(`${y}-${m.padStart(2, '0')}-${d.padStart(2, '0')}T${time}Z`));
  }

  if (ISO_WITH_OFFSET.test(s)) return checked(parseISO(s.replace(' ', 'T')));

  for (const fmt of US_FORMATS) {
    const d = parse(s, fmt, REF);
    if (isValid(d)) return checked(wallClockToUtc(d));
  }
  return null;
}

function checked(d: Date): Date | null {
  if (!isValid(d)) return null;
  const ms = d.getTime();
  return ms < MIN_TIMESTAMP.getTime() || ms > MAX_TIMESTAMP.getTime() ? null : d;
}

const HOURS_PER: Record<Granularity, number> = { day: 24, week: 24 * 7 };

export function startOfUtcDay(d: Date): Date {
  return new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate()));
}

/** ISO week: Monday 00:00 UTC */
export function startOfUtcIsoWeek(d: Date): Date {
  const day = startOfUtcDay(d);
  const sinceMonday = (day.getUTCDay() + 6) % 7;
  return addHours(day, -24 * sinceMonday);
}

export function periodStart(d: Date, g: Granularity): Date {
  return g === 'day' ? startOfUtcDay(d) : startOfUtcIsoWeek(d);
}

export function nextPeriod(start: Date, g: Granularity): Date {
  return addHours(start, HOURS_PER[g]);
}

/** Monday = 0 … Sunday = 6 */
export function isoDayOfWeek(d: Date): number {
  return (d.getUTCDay() + 6) % 7;
}

export function utcMonth(d: Date): number {
  return d.getUTCMonth() + 1;
}

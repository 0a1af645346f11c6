/**
 * Immutable calendar day on the proleptic Gregorian calendar.
 * Arithmetic goes through UTC-based JS Dates so that no timezone or
 * DST shift can move a day.
 */

import type { Weekday } from './weekday.js';
import { toWeekday } from './weekday.js';

export const MIN_YEAR = 0;
export const MAX_YEAR = 9999;

export interface CalendarDate {
  readonly year: number;
  readonly month: number; // 1-12
  readonly day: number; // 1-31
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29;
  return DAYS_IN_MONTH[month - 1] ?? 0;
}

/**
 * Construct a CalendarDate, or null if the triple is not a real day
 * (e.g. 2023-04-31, 2023-02-29, month 13).
 */
export function calendarDate(year: number, month: number, day: number): CalendarDate | null {
  if (![year, month, day].every(Number.isInteger)) return null;
  if (year < MIN_YEAR || year > MAX_YEAR) return null;
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return Object.freeze({ year, month, day });
}

/** UTC midnight of the given day (years 0-99 included) */
function toUtc(d: CalendarDate): Date {
  const r = new Date(Date.UTC(2000, d.month - 1, d.day));
  r.setUTCFullYear(d.year);
  return r;
}

function fromUtc(r: Date): CalendarDate | null {
  return calendarDate(r.getUTCFullYear(), r.getUTCMonth() + 1, r.getUTCDate());
}

/**
 * Add days to a date (returns a new CalendarDate).
 * Returns null when the result leaves the supported year range.
 */
export function addDays(d: CalendarDate, n: number): CalendarDate | null {
  const r = toUtc(d);
  r.setUTCDate(r.getUTCDate() + n);
  if (Number.isNaN(r.getTime())) return null;
  return fromUtc(r);
}

export function weekdayOf(d: CalendarDate): Weekday {
  return toWeekday(toUtc(d).getUTCDay());
}

/** Format a CalendarDate as yyyy-MM-dd */
export function formatDate(d: CalendarDate): string {
  const y = String(d.year).padStart(4, '0');
  const m = String(d.month).padStart(2, '0');
  const day = String(d.day).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

export function isSameDate(a: CalendarDate, b: CalendarDate): boolean {
  return compareDates(a, b) === 0;
}

/** The local calendar day of a JS Date */
export function fromJsDate(d: Date): CalendarDate {
  const date = calendarDate(d.getFullYear(), d.getMonth() + 1, d.getDate());
  if (!date) throw new RangeError(`Date out of supported range: ${d.toString()}`);
  return date;
}

/** Local midnight of a CalendarDate */
export function toJsDate(d: CalendarDate): Date {
  const r = new Date(2000, d.month - 1, d.day);
  r.setFullYear(d.year);
  return r;
}

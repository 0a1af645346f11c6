import { calendarDate } from '../src/types/calendar-date.js';
import type { CalendarDate } from '../src/types/calendar-date.js';
import type { ParseResult } from '../src/types/results.js';
import type { ParseError } from '../src/types/parse-error.js';

/** Build a known-valid CalendarDate for fixtures */
export function day(y: number, m: number, d: number): CalendarDate {
  const date = calendarDate(y, m, d);
  if (!date) throw new Error(`Invalid fixture date ${y}-${m}-${d}`);
  return date;
}

/** Unwrap a failure, failing the test if the result succeeded */
export function errorOf<T>(result: ParseResult<T>): ParseError {
  if (result.type === 'success') {
    throw new Error(`Expected a failure, got ${JSON.stringify(result.value)}`);
  }
  return result.error;
}

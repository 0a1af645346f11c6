import type { CalendarDate } from './calendar-date.js';
import type { DateField, ParseError, ParseErrorKind } from './parse-error.js';

/** Two-variant discriminated union returned by every matcher */
export type ParseResult<T> = ParseSuccess<T> | ParseFailure;

export type ParseSuccess<T> = { readonly type: 'success'; readonly value: T; readonly consumed: number };
export type ParseFailure = { readonly type: 'error'; readonly error: ParseError };

/** Result of a date recognizer: the resolved date and how much input it took */
export type MatchResult = ParseResult<CalendarDate>;

// Helper functions
export function ok<T>(value: T, consumed: number): ParseResult<T> {
  return { type: 'success', value, consumed };
}

export function fail(
  kind: ParseErrorKind,
  message: string,
  offset: number,
  extra: { field?: DateField; failures?: readonly ParseError[] } = {},
): ParseFailure {
  return { type: 'error', error: { kind, message, offset, ...extra } };
}

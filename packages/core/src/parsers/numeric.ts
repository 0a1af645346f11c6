/**
 * Numeric date recognizers.
 *
 * Field matchers check digit width and lexical range only; whether the
 * combination is a real calendar day is decided once, in `resolveFields`.
 *
 * Layouts (asterisk denotes a separator):
 * - dd, dd*mm, mm*dd
 * - dd*mm*yyyy, mm*dd*yyyy, yyyy*mm*dd
 */

import type { CalendarDate } from '../types/calendar-date.js';
import { calendarDate } from '../types/calendar-date.js';
import type { DateField } from '../types/parse-error.js';
import { ParseErrorKind } from '../types/parse-error.js';
import type { Recognizer } from '../types/recognizer.js';
import { recognizer } from '../types/recognizer.js';
import type { MatchResult, ParseResult } from '../types/results.js';
import { fail, ok } from '../types/results.js';

interface FieldSpec {
  readonly field: DateField;
  readonly minWidth: number;
  readonly maxWidth: number;
  readonly min: number;
  readonly max: number;
}

const DAY: FieldSpec = { field: 'day', minWidth: 1, maxWidth: 2, min: 1, max: 31 };
const MONTH: FieldSpec = { field: 'month', minWidth: 1, maxWidth: 2, min: 1, max: 12 };
const YEAR: FieldSpec = { field: 'year', minWidth: 4, maxWidth: 4, min: 0, max: 9999 };

const SEPARATOR_CHARS = new Set(['/', '-', '.', ' ', '\t']);

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

function matchField(spec: FieldSpec, input: string, from: number): ParseResult<number> {
  let end = from;
  while (end - from < spec.maxWidth && isDigit(input[end])) end++;

  const width = end - from;
  if (width < spec.minWidth) {
    const expected = spec.minWidth === spec.maxWidth
      ? `${spec.minWidth} digits`
      : `1-${spec.maxWidth} digits`;
    return fail(ParseErrorKind.LexicalMismatch, `Expected ${spec.field} (${expected})`, from);
  }

  const value = parseInt(input.slice(from, end), 10);
  if (value < spec.min || value > spec.max) {
    return fail(
      ParseErrorKind.OutOfRange,
      `${spec.field} ${value} is out of range ${spec.min}-${spec.max}`,
      from,
      { field: spec.field },
    );
  }
  return ok(value, width);
}

/** Recognizes one or two digits of a day (1-31) */
export function matchDay(input: string, from = 0): ParseResult<number> {
  return matchField(DAY, input, from);
}

/** Recognizes one or two digits of a month (1-12) */
export function matchMonth(input: string, from = 0): ParseResult<number> {
  return matchField(MONTH, input, from);
}

/** Recognizes exactly four digits of a year; a fifth digit is left over */
export function matchYear(input: string, from = 0): ParseResult<number> {
  return matchField(YEAR, input, from);
}

/** Consumes the maximal run of `/ - .` and blanks; an empty run is a match */
export function matchSeparator(input: string, from = 0): ParseResult<string> {
  const width = separatorWidth(input, from);
  return ok(input.slice(from, from + width), width);
}

function separatorWidth(input: string, from: number): number {
  let end = from;
  while (end < input.length && SEPARATOR_CHARS.has(input.charAt(end))) end++;
  return end - from;
}

// --- Defaulting ---

export interface ParsedFieldSet {
  day?: number;
  month?: number;
  year?: number;
}

/**
 * Fill absent fields from the reference date, then build the calendar date.
 * Every numeric layout converges here.
 */
export function resolveFields(
  fields: Readonly<ParsedFieldSet>,
  reference: CalendarDate,
  offset = 0,
): ParseResult<CalendarDate> {
  const year = fields.year ?? reference.year;
  const month = fields.month ?? reference.month;
  const day = fields.day ?? reference.day;

  const date = calendarDate(year, month, day);
  if (!date) {
    const shown = `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
    return fail(ParseErrorKind.CalendarInvalid, `${shown} is not a valid date`, offset);
  }
  return ok(date, 0);
}

// --- Layouts ---

const MATCHERS: Record<DateField, (input: string, from: number) => ParseResult<number>> = {
  day: matchDay,
  month: matchMonth,
  year: matchYear,
};

/** Match fields in order with a separator between consecutive ones */
function scanLayout(input: string, layout: readonly DateField[]): ParseResult<ParsedFieldSet> {
  const fields: ParsedFieldSet = {};
  let pos = 0;

  for (const [i, field] of layout.entries()) {
    if (i > 0) pos += separatorWidth(input, pos);

    const result = MATCHERS[field](input, pos);
    if (result.type === 'error') return result;
    fields[field] = result.value;
    pos += result.consumed;
  }
  return ok(fields, pos);
}

function layoutRecognizer(name: string, pattern: string, layout: readonly DateField[]): Recognizer {
  return recognizer(name, pattern, (input, reference): MatchResult => {
    const scanned = scanLayout(input, layout);
    if (scanned.type === 'error') return scanned;

    const resolved = resolveFields(scanned.value, reference);
    if (resolved.type === 'error') return resolved;
    return ok(resolved.value, scanned.consumed);
  });
}

/** Day only; month and year come from the reference date */
export const dd = layoutRecognizer('numeric.dd', 'dd', ['day']);

/** Day and month; year comes from the reference date */
export const ddMm = layoutRecognizer('numeric.dd_mm', 'dd*mm', ['day', 'month']);

/** Month and day; year comes from the reference date */
export const mmDd = layoutRecognizer('numeric.mm_dd', 'mm*dd', ['month', 'day']);

export const ddMmY4 = layoutRecognizer('numeric.dd_mm_yyyy', 'dd*mm*yyyy', ['day', 'month', 'year']);

export const mmDdY4 = layoutRecognizer('numeric.mm_dd_yyyy', 'mm*dd*yyyy', ['month', 'day', 'year']);

export const y4MmDd = layoutRecognizer('numeric.yyyy_mm_dd', 'yyyy*mm*dd', ['year', 'month', 'day']);

export const NUMERIC_RECOGNIZERS: readonly Recognizer[] = [dd, ddMm, mmDd, ddMmY4, mmDdY4, y4MmDd];


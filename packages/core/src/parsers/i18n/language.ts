/**
 * Builds a language's recognizers from its static lexicon.
 */

import type { CalendarDate } from '../../types/calendar-date.js';
import { addDays, formatDate, weekdayOf } from '../../types/calendar-date.js';
import { ParseErrorKind } from '../../types/parse-error.js';
import type { Recognizer } from '../../types/recognizer.js';
import { recognizer } from '../../types/recognizer.js';
import type { MatchResult, ParseResult } from '../../types/results.js';
import { fail, ok } from '../../types/results.js';
import type { Weekday } from '../../types/weekday.js';
import { WeekdayName } from '../../types/weekday.js';
import type { TokenTable } from '../lexicon.js';
import { matchToken, tokenTable, withSuffix } from '../lexicon.js';
import type { QuickParsers } from '../quick.js';
import { createQuickParsers } from '../quick.js';
import { nextWeekday, weekdayInWeekOf } from './weekday.js';

/** Recognizer names for the supported relative-day offsets */
export const RELATIVE_DAY_NAMES: Readonly<Record<number, string>> = {
  [-2]: 'day_before_yesterday',
  [-1]: 'yesterday',
  0: 'today',
  1: 'tomorrow',
  2: 'day_after_tomorrow',
};

export interface LanguageLexicon {
  readonly code: string;
  readonly name: string;
  readonly fullWeekdays: Readonly<Record<string, Weekday>>;
  readonly shortWeekdays: Readonly<Record<string, Weekday>>;
  /** Token to signed day offset */
  readonly relative: Readonly<Record<string, number>>;
  /** Quick-offset unit token to its length in days */
  readonly units: Readonly<Record<string, number>>;
}

export type TokenMatcher<T> = (input: string, from?: number) => ParseResult<T>;

export interface LanguageParsers {
  readonly code: string;
  readonly name: string;
  readonly fullNamedWeekday: TokenMatcher<Weekday>;
  readonly shortNamedWeekday: TokenMatcher<Weekday>;
  readonly shortNamedWeekdayDot: TokenMatcher<Weekday>;
  /** Full name, then short name with period, then bare short name */
  readonly namedWeekday: TokenMatcher<Weekday>;
  /** `named_weekday`: next occurrence on or after the reference date */
  readonly nextNamedWeekday: Recognizer;
  /** Succeeds only if the reference date falls on the named weekday */
  readonly currentNamedWeekdayOnly: Recognizer;
  /** The named weekday within the reference date's Monday-based week */
  readonly weekdayThisWeek: Recognizer;
  /** One recognizer per relative offset, ordered from past to future */
  readonly relative: readonly Recognizer[];
  readonly quick: QuickParsers;
  /** The weekday and relative-day recognizers above (quick parsers excluded) */
  readonly recognizers: readonly Recognizer[];
}

/** A language's parsers plus the bundles composed from them */
export interface LanguageModule extends LanguageParsers {
  readonly bundles: readonly Recognizer[];
}

function tokenMatcher<T>(table: TokenTable<T>): TokenMatcher<T> {
  return (input, from = 0) => matchToken(table, input, from);
}

function firstOf<T>(label: string, matchers: readonly TokenMatcher<T>[]): TokenMatcher<T> {
  return (input, from = 0) => {
    for (const m of matchers) {
      const result = m(input, from);
      if (result.type === 'success') return result;
    }
    return fail(ParseErrorKind.LexicalMismatch, `Expected ${label}`, from);
  };
}

function weekdayRecognizer(
  name: string,
  namedWeekday: TokenMatcher<Weekday>,
  resolve: (weekday: Weekday, reference: CalendarDate) => MatchResult,
): Recognizer {
  return recognizer(name, 'weekday', (input, reference) => {
    const token = namedWeekday(input);
    if (token.type === 'error') return token;

    const resolved = resolve(token.value, reference);
    if (resolved.type === 'error') return resolved;
    return ok(resolved.value, token.consumed);
  });
}

function outOfCalendar(): MatchResult {
  return fail(ParseErrorKind.CalendarInvalid, 'Result leaves the supported calendar range', 0);
}

export function defineLanguage(lexicon: LanguageLexicon): LanguageParsers {
  const { code } = lexicon;

  const fullNamedWeekday = tokenMatcher(tokenTable(`a weekday name (${lexicon.name})`, lexicon.fullWeekdays));
  const shortNamedWeekday = tokenMatcher(tokenTable(`a short weekday name (${lexicon.name})`, lexicon.shortWeekdays));
  const shortNamedWeekdayDot = tokenMatcher(
    tokenTable(`a short weekday name with a period (${lexicon.name})`, withSuffix(lexicon.shortWeekdays, '.')),
  );
  const namedWeekday = firstOf(`a weekday (${lexicon.name})`, [
    fullNamedWeekday,
    shortNamedWeekdayDot,
    shortNamedWeekday,
  ]);

  const nextNamedWeekday = weekdayRecognizer(`${code}.named_weekday`, namedWeekday, (weekday, reference) => {
    const date = nextWeekday(reference, weekday);
    return date ? ok(date, 0) : outOfCalendar();
  });

  const currentNamedWeekdayOnly = weekdayRecognizer(
    `${code}.current_named_weekday_only`,
    namedWeekday,
    (weekday, reference) => {
      if (weekdayOf(reference) !== weekday) {
        return fail(
          ParseErrorKind.DayMismatch,
          `${formatDate(reference)} is not a ${WeekdayName[weekday]}`,
          0,
        );
      }
      return ok(reference, 0);
    },
  );

  const weekdayThisWeek = weekdayRecognizer(`${code}.weekday_this_week`, namedWeekday, (weekday, reference) => {
    const date = weekdayInWeekOf(reference, weekday);
    return date ? ok(date, 0) : outOfCalendar();
  });

  const offsets = [...new Set(Object.values(lexicon.relative))].sort((a, b) => a - b);
  const relative = offsets.map(offset => {
    const tokens: Record<string, number> = {};
    for (const [token, value] of Object.entries(lexicon.relative)) {
      if (value === offset) tokens[token] = value;
    }
    const table = tokenTable(`"${Object.keys(tokens).join('" or "')}"`, tokens);
    const name = RELATIVE_DAY_NAMES[offset] ?? `offset_${offset}`;

    return recognizer(`${code}.${name}`, Object.keys(tokens).join(' | '), (input, reference) => {
      const token = matchToken(table, input);
      if (token.type === 'error') return token;
      const date = addDays(reference, token.value);
      return date ? ok(date, token.consumed) : outOfCalendar();
    });
  });

  const quick = createQuickParsers(`${code}.quick`, tokenTable(`a unit (${lexicon.name})`, lexicon.units));

  return Object.freeze({
    code,
    name: lexicon.name,
    fullNamedWeekday,
    shortNamedWeekday,
    shortNamedWeekdayDot,
    namedWeekday,
    nextNamedWeekday,
    currentNamedWeekdayOnly,
    weekdayThisWeek,
    relative: Object.freeze(relative),
    quick,
    recognizers: Object.freeze([
      ...relative,
      currentNamedWeekdayOnly,
      nextNamedWeekday,
      weekdayThisWeek,
    ]),
  });
}

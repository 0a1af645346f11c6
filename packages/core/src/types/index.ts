export { Weekday, WeekdayName, toWeekday } from './weekday.js';
export {
  MIN_YEAR, MAX_YEAR,
  calendarDate, isLeapYear, daysInMonth, addDays, weekdayOf,
  formatDate, compareDates, isSameDate, fromJsDate, toJsDate,
} from './calendar-date.js';
export type { CalendarDate } from './calendar-date.js';
export { ParseErrorKind, DateParseError, UnknownRecognizerError } from './parse-error.js';
export type { ParseError, DateField } from './parse-error.js';
export type { ParseResult, ParseSuccess, ParseFailure, MatchResult } from './results.js';
export { ok, fail } from './results.js';
export type { Recognizer } from './recognizer.js';
export { recognizer } from './recognizer.js';

import type { CalendarDate } from './calendar-date.js';
import type { MatchResult } from './results.js';

/**
 * A named, stateless function from (input, reference date) to a MatchResult.
 * `pattern` is the human-readable shape shown in listings and error messages.
 */
export interface Recognizer {
  readonly name: string;
  readonly pattern: string;
  match(input: string, reference: CalendarDate): MatchResult;
}

export function recognizer(
  name: string,
  pattern: string,
  match: (input: string, reference: CalendarDate) => MatchResult,
): Recognizer {
  return Object.freeze({ name, pattern, match });
}

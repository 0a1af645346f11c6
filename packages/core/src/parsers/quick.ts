/**
 * Quick offsets relative to the reference date: `+ 3`, `-10`, `+2 weeks`.
 * Bare numbers count days; a unit token from the language's table may
 * follow (separated by optional blanks) and scales the count.
 */

import type { CalendarDate } from '../types/calendar-date.js';
import { addDays } from '../types/calendar-date.js';
import { ParseErrorKind } from '../types/parse-error.js';
import type { Recognizer } from '../types/recognizer.js';
import { recognizer } from '../types/recognizer.js';
import type { MatchResult } from '../types/results.js';
import { fail, ok } from '../types/results.js';
import { bundle } from './combinators.js';
import type { TokenTable } from './lexicon.js';
import { matchToken, tokenTable } from './lexicon.js';

type Direction = 'forward' | 'backward';
type SignPolicy = 'optional' | 'required';

const SIGN: Record<Direction, string> = { forward: '+', backward: '-' };

export interface QuickParsers {
  /** `[+] N [unit]`: adds to the reference date */
  readonly forwardFromNow: Recognizer;
  /** `[-] N [unit]`: subtracts from the reference date */
  readonly backwardFromNow: Recognizer;
  /** `+N [unit]` or `-N [unit]`, the sign is mandatory */
  readonly bundle: Recognizer;
}

/** Unit table that only admits bare day counts */
export const NO_UNITS: TokenTable<number> = tokenTable<number>('a unit', {});

const LETTER = /\p{L}/u;

function skipBlanks(input: string, from: number): number {
  let pos = from;
  while (input[pos] === ' ' || input[pos] === '\t') pos++;
  return pos;
}

function matchOffset(
  input: string,
  reference: CalendarDate,
  direction: Direction,
  sign: SignPolicy,
  units: TokenTable<number>,
): MatchResult {
  const signChar = SIGN[direction];
  let pos = 0;

  if (input.startsWith(signChar)) {
    pos = skipBlanks(input, 1);
  } else if (sign === 'required') {
    return fail(ParseErrorKind.LexicalMismatch, `Expected "${signChar}"`, 0);
  }

  const digitsStart = pos;
  while (pos < input.length && input.charAt(pos) >= '0' && input.charAt(pos) <= '9') pos++;
  if (pos === digitsStart) {
    return fail(ParseErrorKind.LexicalMismatch, 'Expected a number', digitsStart);
  }
  const count = Number(input.slice(digitsStart, pos));

  let multiplier = 1;
  const unitStart = skipBlanks(input, pos);
  const unit = matchToken(units, input, unitStart);
  // A unit must be a whole word: "+1 wednesday" is one day, not a week
  if (unit.type === 'success' && !LETTER.test(input.charAt(unitStart + unit.consumed))) {
    multiplier = unit.value;
    pos = unitStart + unit.consumed;
  }

  const days = count * multiplier;
  if (!Number.isSafeInteger(days)) {
    return fail(ParseErrorKind.OutOfRange, 'Offset is too large', digitsStart);
  }

  const date = addDays(reference, direction === 'forward' ? days : -days);
  if (!date) {
    return fail(ParseErrorKind.CalendarInvalid, 'Offset leaves the supported calendar range', digitsStart);
  }
  return ok(date, pos);
}

function offsetRecognizer(
  name: string,
  direction: Direction,
  sign: SignPolicy,
  units: TokenTable<number>,
): Recognizer {
  const signChar = SIGN[direction];
  const pattern = sign === 'required' ? `${signChar}N` : `[${signChar}]N`;
  return recognizer(name, pattern, (input, reference) =>
    matchOffset(input, reference, direction, sign, units),
  );
}

/**
 * Build the quick offset recognizers for a unit table.
 * `prefix` namespaces the recognizer names (e.g. "quick", "en.quick").
 */
export function createQuickParsers(prefix: string, units: TokenTable<number> = NO_UNITS): QuickParsers {
  return Object.freeze({
    forwardFromNow: offsetRecognizer(`${prefix}.forward_from_now`, 'forward', 'optional', units),
    backwardFromNow: offsetRecognizer(`${prefix}.backward_from_now`, 'backward', 'optional', units),
    bundle: bundle(`${prefix}.bundle`, [
      offsetRecognizer(`${prefix}.forward_signed`, 'forward', 'required', units),
      offsetRecognizer(`${prefix}.backward_signed`, 'backward', 'required', units),
    ]),
  });
}

/** Language-neutral quick parsers: day counts only */
export const quick = createQuickParsers('quick');

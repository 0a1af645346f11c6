/**
 * Combinators over Recognizers: ordered alternation ("first match wins")
 * and whole-input ("standalone") matching.
 */

import type { Recognizer } from '../types/recognizer.js';
import { recognizer } from '../types/recognizer.js';
import type { ParseError } from '../types/parse-error.js';
import { ParseErrorKind } from '../types/parse-error.js';
import { fail } from '../types/results.js';

/**
 * Try each member in order and commit to the first success.
 * The member order is part of the bundle's contract: earlier, more specific
 * members must come before looser ones that would otherwise shadow them.
 */
export function bundle(name: string, members: readonly Recognizer[]): Recognizer {
  const order = Object.freeze([...members]);
  const pattern = order.map(m => m.pattern).join(' | ');

  return recognizer(name, pattern, (input, reference) => {
    const failures: ParseError[] = [];
    for (const member of order) {
      const result = member.match(input, reference);
      if (result.type === 'success') return result;
      failures.push({ ...result.error, recognizer: member.name });
    }
    return fail(
      ParseErrorKind.NoAlternativeMatched,
      `Could not recognize "${input}" as ${name}`,
      0,
      { failures },
    );
  });
}

/**
 * Require the wrapped recognizer to consume the whole input.
 * Trailing text is a lexical mismatch positioned where it starts.
 */
export function complete(inner: Recognizer): Recognizer {
  return recognizer(`${inner.name}.standalone`, inner.pattern, (input, reference) => {
    const result = inner.match(input, reference);
    if (result.type === 'error') return result;
    if (result.consumed !== input.length) {
      return fail(
        ParseErrorKind.LexicalMismatch,
        `Unexpected trailing input "${input.slice(result.consumed)}" after ${inner.pattern}`,
        result.consumed,
      );
    }
    return result;
  });
}

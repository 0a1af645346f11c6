/**
 * Static token tables. Built once at module load and frozen; matching is
 * case-insensitive and exact, trying longer tokens before their prefixes
 * ("tues" before "tue", "mon." before "mon").
 */

import { ParseErrorKind } from '../types/parse-error.js';
import type { ParseResult } from '../types/results.js';
import { fail, ok } from '../types/results.js';

export interface LexiconEntry<T> {
  readonly token: string;
  readonly value: T;
}

export interface TokenTable<T> {
  readonly label: string;
  readonly entries: readonly LexiconEntry<T>[];
}

export function tokenTable<T>(label: string, entries: Readonly<Record<string, T>>): TokenTable<T> {
  const sorted = Object.entries(entries)
    .map(([token, value]) => Object.freeze({ token: token.toLowerCase(), value }))
    .sort((a, b) => b.token.length - a.token.length);
  return Object.freeze({ label, entries: Object.freeze(sorted) });
}

/** A copy of `entries` with `suffix` appended to every token */
export function withSuffix<T>(entries: Readonly<Record<string, T>>, suffix: string): Record<string, T> {
  const result: Record<string, T> = {};
  for (const [token, value] of Object.entries(entries)) {
    result[token + suffix] = value;
  }
  return result;
}

export function matchToken<T>(table: TokenTable<T>, input: string, from = 0): ParseResult<T> {
  for (const { token, value } of table.entries) {
    if (input.slice(from, from + token.length).toLowerCase() === token) {
      return ok(value, token.length);
    }
  }
  return fail(ParseErrorKind.LexicalMismatch, `Expected ${table.label}`, from);
}

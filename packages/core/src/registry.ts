/**
 * Recognizer lookup by name, and the top-level parse entry points.
 *
 * Which recognizers exist is decided by a feature set: the numeric and
 * quick modes and the enabled languages, each toggled independently.
 */

import type { CalendarDate } from './types/calendar-date.js';
import { DateParseError, UnknownRecognizerError } from './types/parse-error.js';
import type { Recognizer } from './types/recognizer.js';
import type { MatchResult } from './types/results.js';
import { complete } from './parsers/combinators.js';
import { NUMERIC_RECOGNIZERS } from './parsers/numeric.js';
import { quick } from './parsers/quick.js';
import type { LanguageModule } from './parsers/i18n/language.js';
import { en } from './parsers/i18n/en.js';
import { ru } from './parsers/i18n/ru.js';

export const LANGUAGES = { en, ru } as const satisfies Record<string, LanguageModule>;

export type LanguageCode = keyof typeof LANGUAGES;

export function isLanguageCode(code: string): code is LanguageCode {
  return Object.hasOwn(LANGUAGES, code);
}

export interface Features {
  readonly numeric: boolean;
  readonly quick: boolean;
  readonly languages: readonly LanguageCode[];
}

export const DEFAULT_FEATURES: Features = Object.freeze({
  numeric: true,
  quick: true,
  languages: Object.freeze(['en'] as const),
});

const STANDALONE_SUFFIX = '.standalone';

export class RecognizerRegistry {
  readonly features: Features;
  private readonly byName = new Map<string, Recognizer>();

  constructor(features: Features = DEFAULT_FEATURES) {
    this.features = features;

    if (features.numeric) this.register(NUMERIC_RECOGNIZERS);
    if (features.quick) this.register([quick.forwardFromNow, quick.backwardFromNow, quick.bundle]);

    for (const code of new Set(features.languages)) {
      const language = LANGUAGES[code];
      this.register(language.recognizers);
      if (features.quick) {
        this.register([language.quick.forwardFromNow, language.quick.backwardFromNow, language.quick.bundle]);
      }
      // Bundles lead with numeric layouts
      if (features.numeric) this.register(language.bundles);
    }
  }

  private register(recognizers: readonly Recognizer[]): void {
    for (const r of recognizers) this.byName.set(r.name, r);
  }

  has(name: string): boolean {
    const base = name.endsWith(STANDALONE_SUFFIX) ? name.slice(0, -STANDALONE_SUFFIX.length) : name;
    return this.byName.has(base);
  }

  /**
   * Get a recognizer by name. A `.standalone` suffix returns the
   * whole-input variant of the named recognizer.
   */
  get(name: string): Recognizer {
    const direct = this.byName.get(name);
    if (direct) return direct;

    if (name.endsWith(STANDALONE_SUFFIX)) {
      const inner = this.byName.get(name.slice(0, -STANDALONE_SUFFIX.length));
      if (inner) return complete(inner);
    }
    throw new UnknownRecognizerError(name);
  }

  /** All registered recognizers in registration order */
  list(): Recognizer[] {
    return [...this.byName.values()];
  }
}

export const defaultRegistry = new RecognizerRegistry();

/**
 * Parse a prefix of `input` with a recognizer or a registered recognizer name.
 * Throws UnknownRecognizerError for unregistered names; parse failures are
 * returned, not thrown.
 */
export function parse(
  target: Recognizer | string,
  input: string,
  reference: CalendarDate,
  registry: RecognizerRegistry = defaultRegistry,
): MatchResult {
  const r = typeof target === 'string' ? registry.get(target) : target;
  return r.match(input, reference);
}

/** Like `parse`, but throws DateParseError on failure */
export function parseOrThrow(
  target: Recognizer | string,
  input: string,
  reference: CalendarDate,
  registry: RecognizerRegistry = defaultRegistry,
): { date: CalendarDate; consumed: number } {
  const result = parse(target, input, reference, registry);
  if (result.type === 'error') throw new DateParseError(result.error);
  return { date: result.value, consumed: result.consumed };
}

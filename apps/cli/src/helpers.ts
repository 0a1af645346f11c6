/**
 * CLI helpers: recognizer selection, error handling.
 */

import type { Recognizer } from '@dateparse/core';
import { bundle, complete, LANGUAGES, RecognizerRegistry } from '@dateparse/core';
import type { CliConfig } from './config.js';
import * as out from './output.js';

/** The registry for the configured language, with both numeric and quick modes */
export function createRegistry(config: CliConfig): RecognizerRegistry {
  return new RecognizerRegistry({ numeric: true, quick: true, languages: [config.language] });
}

/** The language bundle for the configured date order */
export function languageBundle(config: CliConfig): Recognizer {
  if (config.language === 'en') {
    return config.order === 'mdy' ? LANGUAGES.en.bundleMdy : LANGUAGES.en.bundleDmy;
  }
  return LANGUAGES.ru.bundle;
}

/** Signed quick offsets first, then the language bundle */
export function versatileParser(config: CliConfig): Recognizer {
  const language = LANGUAGES[config.language];
  return bundle('versatile', [language.quick.bundle, languageBundle(config)]);
}

/**
 * Pick the recognizer for a parse: a registered name, or the versatile
 * parser when none is given. `standalone` requires whole-input matches.
 */
export function selectRecognizer(
  config: CliConfig,
  registry: RecognizerRegistry,
  name: string | undefined,
  standalone: boolean,
): Recognizer {
  const r = name ? registry.get(name) : versatileParser(config);
  return standalone ? complete(r) : r;
}

/**
 * Wrap a command action with error handling.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof Error) {
      out.error(err.message);
    } else {
      out.error(String(err));
    }
  }
}

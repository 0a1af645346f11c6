/**
 * CLI configuration: command-line options first, then environment
 * variables, then defaults.
 */

import type { CalendarDate, LanguageCode } from '@dateparse/core';
import { complete, fromJsDate, isLanguageCode, y4MmDd } from '@dateparse/core';

export type DateOrder = 'dmy' | 'mdy';

export interface CliOptions {
  lang?: string;
  order?: string;
  today?: string;
  verbose?: boolean;
}

export interface CliConfig {
  readonly language: LanguageCode;
  readonly order: DateOrder;
  readonly reference: CalendarDate;
  readonly verbose: boolean;
}

export const ENV_LANG = 'DATEPARSE_LANG';
export const ENV_ORDER = 'DATEPARSE_ORDER';
export const ENV_TODAY = 'DATEPARSE_TODAY';

const DEFAULT_LANGUAGE: LanguageCode = 'en';
const DEFAULT_ORDER: DateOrder = 'dmy';

const isoDate = complete(y4MmDd);

function isDateOrder(value: string): value is DateOrder {
  return value === 'dmy' || value === 'mdy';
}

/** Parse a yyyy-MM-dd reference date */
export function parseReferenceDate(text: string, clock: CalendarDate): CalendarDate {
  const result = isoDate.match(text, clock);
  if (result.type === 'error') {
    throw new Error(`Invalid reference date "${text}": ${result.error.message}`);
  }
  return result.value;
}

export function resolveConfig(
  opts: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
  now: () => Date = () => new Date(),
): CliConfig {
  const language = opts.lang ?? env[ENV_LANG] ?? DEFAULT_LANGUAGE;
  if (!isLanguageCode(language)) {
    throw new Error(`Unsupported language "${language}" (expected en or ru)`);
  }

  const order = (opts.order ?? env[ENV_ORDER] ?? DEFAULT_ORDER).toLowerCase();
  if (!isDateOrder(order)) {
    throw new Error(`Unsupported date order "${order}" (expected dmy or mdy)`);
  }
  if (language === 'ru' && order === 'mdy') {
    throw new Error('Russian dates are day-month-year only');
  }

  const today = opts.today ?? env[ENV_TODAY];
  const clock = fromJsDate(now());
  const reference = today ? parseReferenceDate(today, clock) : clock;

  return { language, order, reference, verbose: opts.verbose ?? false };
}

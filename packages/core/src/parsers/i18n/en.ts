/**
 * English lexicon and bundles.
 */

import { Weekday } from '../../types/weekday.js';
import { bundle } from '../combinators.js';
import { dd, ddMm, ddMmY4, mmDd, mmDdY4 } from '../numeric.js';
import type { LanguageLexicon, LanguageModule } from './language.js';
import { defineLanguage } from './language.js';

export const EN_LEXICON: LanguageLexicon = {
  code: 'en',
  name: 'English',
  fullWeekdays: {
    monday: Weekday.Monday,
    tuesday: Weekday.Tuesday,
    wednesday: Weekday.Wednesday,
    thursday: Weekday.Thursday,
    friday: Weekday.Friday,
    saturday: Weekday.Saturday,
    sunday: Weekday.Sunday,
  },
  shortWeekdays: {
    mon: Weekday.Monday,
    tue: Weekday.Tuesday, tues: Weekday.Tuesday,
    wed: Weekday.Wednesday,
    thu: Weekday.Thursday, thur: Weekday.Thursday, thurs: Weekday.Thursday,
    fri: Weekday.Friday,
    sat: Weekday.Saturday,
    sun: Weekday.Sunday,
  },
  relative: {
    'day before yesterday': -2,
    yesterday: -1,
    today: 0,
    tomorrow: 1,
    'day after tomorrow': 2,
  },
  units: {
    d: 1, day: 1, days: 1,
    w: 7, week: 7, weeks: 7,
  },
};

const english = defineLanguage(EN_LEXICON);
const languageTail = [...english.relative, english.currentNamedWeekdayOnly, english.nextNamedWeekday];

/**
 * Day-month-year order:
 * dd*mm*yyyy, dd*mm, dd, then relative days (past to future),
 * current_named_weekday_only and named_weekday.
 *
 * While a same-day weekday counts as the next occurrence, named_weekday
 * returns whatever current_named_weekday_only would; both stay listed so
 * the member order holds if that distance changes.
 */
export const bundleDmy = bundle('en.bundle_dmy', [ddMmY4, ddMm, dd, ...languageTail]);

/** Month-day-year order: mm*dd*yyyy, mm*dd, dd, then the same language tail */
export const bundleMdy = bundle('en.bundle_mdy', [mmDdY4, mmDd, dd, ...languageTail]);

export const en: LanguageModule & {
  readonly bundleDmy: typeof bundleDmy;
  readonly bundleMdy: typeof bundleMdy;
} = Object.freeze({ ...english, bundleDmy, bundleMdy, bundles: [bundleDmy, bundleMdy] });

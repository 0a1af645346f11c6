/**
 * Russian lexicon and bundle (day-month-year order only).
 */

import { Weekday } from '../../types/weekday.js';
import { bundle as alternatives } from '../combinators.js';
import { dd, ddMm, ddMmY4 } from '../numeric.js';
import type { LanguageLexicon, LanguageModule } from './language.js';
import { defineLanguage } from './language.js';

export const RU_LEXICON: LanguageLexicon = {
  code: 'ru',
  name: 'Russian',
  fullWeekdays: {
    понедельник: Weekday.Monday,
    вторник: Weekday.Tuesday,
    среда: Weekday.Wednesday,
    четверг: Weekday.Thursday,
    пятница: Weekday.Friday,
    суббота: Weekday.Saturday,
    воскресенье: Weekday.Sunday,
  },
  shortWeekdays: {
    пн: Weekday.Monday,
    вт: Weekday.Tuesday,
    ср: Weekday.Wednesday,
    чт: Weekday.Thursday,
    пт: Weekday.Friday,
    сб: Weekday.Saturday,
    вс: Weekday.Sunday,
  },
  relative: {
    позавчера: -2,
    вчера: -1,
    сегодня: 0,
    завтра: 1,
    послезавтра: 2,
  },
  units: {
    д: 1, день: 1, дня: 1, дней: 1,
    н: 7, нед: 7, неделя: 7, недели: 7, недель: 7,
  },
};

const russian = defineLanguage(RU_LEXICON);

/**
 * dd*mm*yyyy, dd*mm, dd, then позавчера, вчера, сегодня, завтра,
 * послезавтра, current_named_weekday_only and named_weekday.
 * The last two agree on the reference weekday (see en.bundle_dmy).
 */
export const bundle = alternatives('ru.bundle', [
  ddMmY4,
  ddMm,
  dd,
  ...russian.relative,
  russian.currentNamedWeekdayOnly,
  russian.nextNamedWeekday,
]);

export const ru: LanguageModule & { readonly bundle: typeof bundle } =
  Object.freeze({ ...russian, bundle, bundles: [bundle] });

export { en, EN_LEXICON, bundleDmy, bundleMdy } from './en.js';
export { ru, RU_LEXICON } from './ru.js';
export { defineLanguage, RELATIVE_DAY_NAMES } from './language.js';
export type { LanguageLexicon, LanguageParsers, LanguageModule, TokenMatcher } from './language.js';
export { SAME_WEEKDAY_DISTANCE, daysUntilWeekday, nextWeekday, weekdayInWeekOf } from './weekday.js';

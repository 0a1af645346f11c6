export { bundle, complete } from './combinators.js';
export { tokenTable, withSuffix, matchToken } from './lexicon.js';
export type { LexiconEntry, TokenTable } from './lexicon.js';
export {
  matchDay, matchMonth, matchYear, matchSeparator, resolveFields,
  dd, ddMm, mmDd, ddMmY4, mmDdY4, y4MmDd, NUMERIC_RECOGNIZERS,
} from './numeric.js';
export type { ParsedFieldSet } from './numeric.js';
export { quick, createQuickParsers, NO_UNITS } from './quick.js';
export type { QuickParsers } from './quick.js';
export * from './i18n/index.js';

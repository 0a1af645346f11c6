// Types
export * from './types/index.js';

// Parsers
export * from './parsers/index.js';

// Registry and entry points
export {
  RecognizerRegistry, defaultRegistry, parse, parseOrThrow,
  LANGUAGES, DEFAULT_FEATURES, isLanguageCode,
} from './registry.js';
export type { Features, LanguageCode } from './registry.js';

export const ParseErrorKind = {
  LexicalMismatch: 'lexical-mismatch',
  OutOfRange: 'out-of-range',
  CalendarInvalid: 'calendar-invalid',
  DayMismatch: 'day-mismatch',
  NoAlternativeMatched: 'no-alternative-matched',
} as const;

export type ParseErrorKind = (typeof ParseErrorKind)[keyof typeof ParseErrorKind];

export type DateField = 'day' | 'month' | 'year';

export interface ParseError {
  readonly kind: ParseErrorKind;
  readonly message: string;
  /** Position in the input where the failing matcher started */
  readonly offset: number;
  /** Which field's range was violated (OutOfRange only) */
  readonly field?: DateField;
  /** Name of the bundle member that produced this failure */
  readonly recognizer?: string;
  /** Member failures of a bundle, in member order */
  readonly failures?: readonly ParseError[];
}

/** Thrown by the convenience entry points when a parse fails */
export class DateParseError extends Error {
  readonly kind: ParseErrorKind;
  readonly detail: ParseError;

  constructor(detail: ParseError) {
    super(detail.message);
    this.name = 'DateParseError';
    this.kind = detail.kind;
    this.detail = detail;
  }
}

export class UnknownRecognizerError extends Error {
  readonly recognizerName: string;

  constructor(recognizerName: string) {
    super(`Unknown recognizer: ${recognizerName}`);
    this.name = 'UnknownRecognizerError';
    this.recognizerName = recognizerName;
  }
}

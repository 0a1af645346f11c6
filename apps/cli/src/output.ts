/**
 * chalk-based output formatting.
 */

import chalk from 'chalk';
import { formatDate, WeekdayName, weekdayOf } from '@dateparse/core';
import type { CalendarDate, MatchResult, ParseError, ParseSuccess, Recognizer } from '@dateparse/core/types';

// --- Formatting functions ---

/** e.g. "2024-03-16 (Saturday)" */
export function formatRecognized(result: ParseSuccess<CalendarDate>): string {
  return `${formatDate(result.value)} (${WeekdayName[weekdayOf(result.value)]})`;
}

/** The part of the input a successful match left unconsumed, or null */
export function leftover(input: string, consumed: number): string | null {
  const rest = input.slice(consumed);
  return rest.length > 0 ? rest : null;
}

/** One line per failure; with `verbose`, one indented line per bundle member */
export function formatFailure(error: ParseError, verbose: boolean): string[] {
  const lines = [`${error.message} [${error.kind}]`];
  if (verbose && error.failures) {
    for (const f of error.failures) {
      lines.push(`  ${f.recognizer ?? '?'}: ${f.message} [${f.kind}] at ${f.offset}`);
    }
  }
  return lines;
}

export function formatRecognizerRow(r: Recognizer, width: number): string {
  return `${r.name.padEnd(width)}  ${r.pattern}`;
}

// --- Result output ---

export function printMatch(input: string, result: MatchResult, verbose: boolean): void {
  if (result.type === 'error') {
    const [first, ...rest] = formatFailure(result.error, verbose);
    error(`unable to recognize "${input}": ${first ?? ''}`);
    for (const line of rest) console.log(chalk.dim(line));
    return;
  }

  success(`recognized: ${formatRecognized(result)}`);
  const rest = leftover(input, result.consumed);
  if (rest !== null) warning(`ignored trailing input: "${rest}"`);
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

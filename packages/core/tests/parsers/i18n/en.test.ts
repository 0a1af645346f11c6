import { describe, it, expect } from 'vitest';
import { en, bundleDmy, bundleMdy } from '../../../src/parsers/i18n/en.js';
import { complete } from '../../../src/parsers/combinators.js';
import { addDays, weekdayOf, compareDates } from '../../../src/types/calendar-date.js';
import { Weekday } from '../../../src/types/weekday.js';
import { ParseErrorKind } from '../../../src/types/parse-error.js';
import { day, errorOf } from '../../helpers.js';

const ref = day(2024, 3, 15); // Friday

const EN_NAMES: Record<string, Weekday> = {
  monday: Weekday.Monday,
  tuesday: Weekday.Tuesday,
  wednesday: Weekday.Wednesday,
  thursday: Weekday.Thursday,
  friday: Weekday.Friday,
  saturday: Weekday.Saturday,
  sunday: Weekday.Sunday,
};

describe('weekday tokens', () => {
  it('matches short names case-insensitively', () => {
    expect(en.shortNamedWeekday('mon')).toEqual({ type: 'success', value: Weekday.Monday, consumed: 3 });
    expect(en.shortNamedWeekday('Wed')).toEqual({ type: 'success', value: Weekday.Wednesday, consumed: 3 });
  });

  it('tries longer short names first', () => {
    expect(en.shortNamedWeekday('tues')).toEqual({ type: 'success', value: Weekday.Tuesday, consumed: 4 });
    expect(en.shortNamedWeekday('Thurs')).toEqual({ type: 'success', value: Weekday.Thursday, consumed: 5 });
  });

  it('matches short names with a period as their own tokens', () => {
    expect(en.shortNamedWeekdayDot('TUE.')).toEqual({ type: 'success', value: Weekday.Tuesday, consumed: 4 });
    expect(errorOf(en.shortNamedWeekdayDot('tue')).kind).toBe(ParseErrorKind.LexicalMismatch);
  });

  it('matches full names', () => {
    expect(en.fullNamedWeekday('Wednesday')).toEqual({ type: 'success', value: Weekday.Wednesday, consumed: 9 });
  });

  it('namedWeekday prefers full, then dotted, then short names', () => {
    expect(en.namedWeekday('friday')).toEqual({ type: 'success', value: Weekday.Friday, consumed: 6 });
    expect(en.namedWeekday('mon.')).toEqual({ type: 'success', value: Weekday.Monday, consumed: 4 });
    expect(en.namedWeekday('Thurs.')).toEqual({ type: 'success', value: Weekday.Thursday, consumed: 6 });
    expect(en.namedWeekday('sun')).toEqual({ type: 'success', value: Weekday.Sunday, consumed: 3 });
    expect(errorOf(en.namedWeekday('someday')).message).toBe('Expected a weekday (English)');
  });
});

describe('relative days', () => {
  const byName = (name: string) => {
    const r = en.relative.find(x => x.name === `en.${name}`);
    if (!r) throw new Error(`missing ${name}`);
    return r;
  };

  it('is ordered from past to future', () => {
    expect(en.relative.map(r => r.name)).toEqual([
      'en.day_before_yesterday', 'en.yesterday', 'en.today', 'en.tomorrow', 'en.day_after_tomorrow',
    ]);
  });

  it('adds the token offset to the reference date', () => {
    expect(byName('yesterday').match('Yesterday', ref)).toEqual({ type: 'success', value: day(2024, 3, 14), consumed: 9 });
    expect(byName('tomorrow').match('tomorrow', ref)).toEqual({ type: 'success', value: day(2024, 3, 16), consumed: 8 });
    expect(byName('today').match('TODAY', ref)).toEqual({ type: 'success', value: ref, consumed: 5 });
    expect(byName('day_before_yesterday').match('day before yesterday', ref))
      .toEqual({ type: 'success', value: day(2024, 3, 13), consumed: 20 });
    expect(byName('day_after_tomorrow').match('Day after tomorrow', ref))
      .toEqual({ type: 'success', value: day(2024, 3, 17), consumed: 18 });
  });

  it('holds for any reference date', () => {
    for (const reference of [day(2024, 1, 1), day(2024, 2, 29), day(2023, 12, 31)]) {
      const yesterday = byName('yesterday').match('yesterday', reference);
      const tomorrow = byName('tomorrow').match('tomorrow', reference);
      expect(yesterday).toEqual({ type: 'success', value: addDays(reference, -1), consumed: 9 });
      expect(tomorrow).toEqual({ type: 'success', value: addDays(reference, 1), consumed: 8 });
    }
  });
});

describe('nextNamedWeekday', () => {
  it('returns the next occurrence, counting the reference day itself', () => {
    expect(en.nextNamedWeekday.match('fri', ref)).toEqual({ type: 'success', value: ref, consumed: 3 });
    expect(en.nextNamedWeekday.match('sat', ref)).toEqual({ type: 'success', value: day(2024, 3, 16), consumed: 3 });
    expect(en.nextNamedWeekday.match('thursday', ref)).toEqual({ type: 'success', value: day(2024, 3, 21), consumed: 8 });
  });

  it('moves forward by the minimal distance for every weekday', () => {
    const names = Object.keys(EN_NAMES);
    for (let i = 0; i < 7; i++) {
      const reference = day(2024, 3, 11 + i);
      for (const name of names) {
        const result = en.nextNamedWeekday.match(name, reference);
        if (result.type === 'error') throw new Error(result.error.message);

        const distance = (EN_NAMES[name]! - weekdayOf(reference) + 7) % 7;
        expect(weekdayOf(result.value)).toBe(EN_NAMES[name]);
        expect(compareDates(result.value, reference)).toBeGreaterThanOrEqual(0);
        expect(result.value).toEqual(addDays(reference, distance));
      }
    }
  });
});

describe('currentNamedWeekdayOnly', () => {
  it('returns the reference date when it falls on the weekday', () => {
    expect(en.currentNamedWeekdayOnly.match('Friday', ref)).toEqual({ type: 'success', value: ref, consumed: 6 });
  });

  it('fails with a day mismatch otherwise', () => {
    const err = errorOf(en.currentNamedWeekdayOnly.match('mon', ref));
    expect(err.kind).toBe(ParseErrorKind.DayMismatch);
    expect(err.message).toBe('2024-03-15 is not a Monday');
  });
});

describe('weekdayThisWeek', () => {
  const tuesday = day(2024, 7, 16);

  it('resolves within the Monday-based week of the reference date', () => {
    expect(en.weekdayThisWeek.match('mon', tuesday)).toEqual({ type: 'success', value: day(2024, 7, 15), consumed: 3 });
    expect(en.weekdayThisWeek.match('sat', tuesday)).toEqual({ type: 'success', value: day(2024, 7, 20), consumed: 3 });
    expect(en.weekdayThisWeek.match('Sun', tuesday)).toEqual({ type: 'success', value: day(2024, 7, 21), consumed: 3 });
  });
});

describe('bundleDmy', () => {
  it('parses numeric layouts in day-month-year order', () => {
    expect(bundleDmy.match('09', ref)).toEqual({ type: 'success', value: day(2024, 3, 9), consumed: 2 });
    expect(bundleDmy.match('03/12', ref)).toEqual({ type: 'success', value: day(2024, 12, 3), consumed: 5 });
    expect(bundleDmy.match('13    06\t2024', ref)).toEqual({ type: 'success', value: day(2024, 6, 13), consumed: 13 });
  });

  it('parses relative days and weekdays', () => {
    expect(bundleDmy.match('Yesterday', ref)).toEqual({ type: 'success', value: day(2024, 3, 14), consumed: 9 });
    expect(bundleDmy.match('Tomorrow', ref)).toEqual({ type: 'success', value: day(2024, 3, 16), consumed: 8 });
    expect(bundleDmy.match('fri', ref)).toEqual({ type: 'success', value: ref, consumed: 3 });
    expect(bundleDmy.match('mon', ref)).toEqual({ type: 'success', value: day(2024, 3, 18), consumed: 3 });
  });

  it('falls back to shorter layouts on an invalid full date', () => {
    // 31/04 does not exist, but day 31 of the reference month does
    expect(bundleDmy.match('31/04/2023', ref)).toEqual({ type: 'success', value: day(2024, 3, 31), consumed: 2 });
    const standalone = errorOf(complete(bundleDmy).match('31/04/2023', ref));
    expect(standalone.kind).toBe(ParseErrorKind.LexicalMismatch);
    expect(standalone.offset).toBe(2);
  });

  it('reports every member failure when nothing matches', () => {
    const err = errorOf(bundleDmy.match('someday', ref));
    expect(err.kind).toBe(ParseErrorKind.NoAlternativeMatched);
    expect(err.failures).toHaveLength(10);
  });

  it('tries its members in a fixed order', () => {
    const err = errorOf(bundleDmy.match('someday', ref));
    expect(err.failures?.map(f => f.recognizer)).toEqual([
      'numeric.dd_mm_yyyy',
      'numeric.dd_mm',
      'numeric.dd',
      'en.day_before_yesterday',
      'en.yesterday',
      'en.today',
      'en.tomorrow',
      'en.day_after_tomorrow',
      'en.current_named_weekday_only',
      'en.named_weekday',
    ]);
  });
});

describe('bundleMdy', () => {
  it('tries its members in a fixed order', () => {
    const err = errorOf(bundleMdy.match('someday', ref));
    expect(err.failures?.map(f => f.recognizer)).toEqual([
      'numeric.mm_dd_yyyy',
      'numeric.mm_dd',
      'numeric.dd',
      'en.day_before_yesterday',
      'en.yesterday',
      'en.today',
      'en.tomorrow',
      'en.day_after_tomorrow',
      'en.current_named_weekday_only',
      'en.named_weekday',
    ]);
  });

  it('parses numeric layouts in month-day-year order', () => {
    expect(bundleMdy.match('12/03', ref)).toEqual({ type: 'success', value: day(2024, 12, 3), consumed: 5 });
    expect(bundleMdy.match('06    13\t2024', ref)).toEqual({ type: 'success', value: day(2024, 6, 13), consumed: 13 });
    expect(bundleMdy.match('09', ref)).toEqual({ type: 'success', value: day(2024, 3, 9), consumed: 2 });
  });

  it('parses relative days', () => {
    expect(bundleMdy.match('yesterday', ref)).toEqual({ type: 'success', value: day(2024, 3, 14), consumed: 9 });
  });
});

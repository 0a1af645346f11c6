/**
 * Weekday arithmetic shared by every language.
 */

import type { CalendarDate } from '../../types/calendar-date.js';
import { addDays, weekdayOf } from '../../types/calendar-date.js';
import type { Weekday } from '../../types/weekday.js';

/**
 * Days to move forward when the reference date already falls on the
 * requested weekday: 0 returns the reference date itself, 7 would
 * return the same weekday of the following week.
 */
export const SAME_WEEKDAY_DISTANCE = 0;

/** Days from `reference` forward to the next `target` weekday (0-6) */
export function daysUntilWeekday(reference: CalendarDate, target: Weekday): number {
  const distance = (target - weekdayOf(reference) + 7) % 7;
  return distance === 0 ? SAME_WEEKDAY_DISTANCE : distance;
}

/** The nearest `target` weekday on or after `reference` */
export function nextWeekday(reference: CalendarDate, target: Weekday): CalendarDate | null {
  return addDays(reference, daysUntilWeekday(reference, target));
}

/**
 * The `target` weekday within the Monday-based week containing `reference`.
 * E.g. for Tuesday 2024-07-16, Monday is 2024-07-15 and Sunday 2024-07-21.
 */
export function weekdayInWeekOf(reference: CalendarDate, target: Weekday): CalendarDate | null {
  const mondayBased = (w: number) => (w + 6) % 7;
  return addDays(reference, mondayBased(target) - mondayBased(weekdayOf(reference)));
}

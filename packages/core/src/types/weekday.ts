export const Weekday = {
  Sunday: 0,
  Monday: 1,
  Tuesday: 2,
  Wednesday: 3,
  Thursday: 4,
  Friday: 5,
  Saturday: 6,
} as const;

export type Weekday = (typeof Weekday)[keyof typeof Weekday];

/** Reverse mapping for display purposes */
export const WeekdayName: Record<Weekday, string> = {
  [Weekday.Sunday]: 'Sunday',
  [Weekday.Monday]: 'Monday',
  [Weekday.Tuesday]: 'Tuesday',
  [Weekday.Wednesday]: 'Wednesday',
  [Weekday.Thursday]: 'Thursday',
  [Weekday.Friday]: 'Friday',
  [Weekday.Saturday]: 'Saturday',
};

const WEEKDAYS: readonly Weekday[] = [
  Weekday.Sunday, Weekday.Monday, Weekday.Tuesday, Weekday.Wednesday,
  Weekday.Thursday, Weekday.Friday, Weekday.Saturday,
];

/** Narrow a JS `getUTCDay()`-style index to a Weekday */
export function toWeekday(index: number): Weekday {
  const weekday = WEEKDAYS[((index % 7) + 7) % 7];
  if (weekday === undefined) throw new RangeError(`Invalid weekday index: ${index}`);
  return weekday;
}

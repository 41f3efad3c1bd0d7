import {
  CalendarDate,
  endOfMonth,
  fromDate,
  parseDate,
  parseDateTime,
  startOfMonth,
  toCalendarDate,
  toCalendarDateTime,
  toZoned,
} from '@internationalized/date';

/**
 * Plant-local calendar helpers
 *
 * Vendor charts are indexed by the plant's wall clock, so every conversion
 * between a chart slot and an instant goes through the plant's time zone.
 */

export function parseDay(value: string): CalendarDate {
  return parseDate(value);
}

/**
 * True for a well-formed YYYY-MM-DD string naming a real calendar day
 */
export function isValidDay(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return false;
  }
  try {
    // CalendarDate constrains out-of-range parts, so compare the round trip
    return parseDate(value).toString() === value;
  } catch {
    return false;
  }
}

export function isValidTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

export function plantToday(timezone: string, now: Date): CalendarDate {
  return toCalendarDate(fromDate(now, timezone));
}

/**
 * Inclusive list of days between two dates (empty when start > end)
 */
export function eachDay(start: CalendarDate, end: CalendarDate): CalendarDate[] {
  const days: CalendarDate[] = [];
  for (let day = start; day.compare(end) <= 0; day = day.add({ days: 1 })) {
    days.push(day);
  }
  return days;
}

/**
 * First day of every month touched by [start, end]
 */
export function eachMonth(start: CalendarDate, end: CalendarDate): CalendarDate[] {
  const months: CalendarDate[] = [];
  const last = startOfMonth(end);
  for (let month = startOfMonth(start); month.compare(last) <= 0; month = month.add({ months: 1 })) {
    months.push(month);
  }
  return months;
}

export function daysInMonth(month: CalendarDate): number {
  return endOfMonth(month).day;
}

/**
 * Instant of a wall-clock time, given in minutes after the plant's local
 * midnight. A repeated hour resolves to its first occurrence; a skipped one
 * moves forward past the gap.
 */
export function slotTime(day: CalendarDate, timezone: string, minutesAfterMidnight: number): Date {
  return toZoned(toCalendarDateTime(day).add({ minutes: minutesAfterMidnight }), timezone).toDate();
}

/**
 * False for wall-clock times skipped when the clocks go forward
 */
export function existsOnWallClock(day: CalendarDate, timezone: string, minutesAfterMidnight: number): boolean {
  const local = toCalendarDateTime(day).add({ minutes: minutesAfterMidnight });
  return toCalendarDateTime(toZoned(local, timezone)).compare(local) === 0;
}

/**
 * Parse a vendor "YYYY-MM-DD HH:mm:ss" local timestamp
 */
export function localDateTime(value: string, timezone: string): Date {
  return toZoned(parseDateTime(value.trim().replace(' ', 'T')), timezone).toDate();
}

export function monthKey(day: CalendarDate): string {
  return day.toString().slice(0, 7);
}

export function lastDayOfMonth(day: CalendarDate): CalendarDate {
  return endOfMonth(day);
}

export function laterDay(a: CalendarDate, b: CalendarDate): CalendarDate {
  return a.compare(b) >= 0 ? a : b;
}

export function earlierDay(a: CalendarDate, b: CalendarDate): CalendarDate {
  return a.compare(b) <= 0 ? a : b;
}

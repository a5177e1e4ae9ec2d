/**
 * Date Utilities
 * Local calendar-day helpers used for summary ids, index keys and schedule math
 */

const MS_PER_MINUTE = 60 * 1000;
const MS_PER_DAY = 24 * 60 * MS_PER_MINUTE;

export function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

export function addDays(date: Date, days: number): Date {
  return new Date(
    date.getFullYear(),
    date.getMonth(),
    date.getDate() + days,
    date.getHours(),
    date.getMinutes(),
    date.getSeconds(),
    date.getMilliseconds()
  );
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * MS_PER_MINUTE);
}

/**
 * Whole calendar days from `from` to `to` (negative when `to` is earlier)
 * Computed on calendar dates so DST shifts never produce fractional days
 */
export function calendarDaysBetween(from: Date, to: Date): number {
  const fromUtc = Date.UTC(from.getFullYear(), from.getMonth(), from.getDate());
  const toUtc = Date.UTC(to.getFullYear(), to.getMonth(), to.getDate());
  return Math.round((toUtc - fromUtc) / MS_PER_DAY);
}

/**
 * Format date as YYYY-MM-DD
 */
export function formatDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Parse YYYY-MM-DD as a local calendar date
 */
export function parseDate(value: string): Date | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    return null;
  }
  const year = Number(match[1]);
  const month = Number(match[2]) - 1;
  const day = Number(match[3]);
  const date = new Date(year, month, day);
  if (date.getFullYear() !== year || date.getMonth() !== month || date.getDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Format time of day as HH:mm
 */
export function formatTimeSlot(date: Date): string {
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  return `${hours}:${minutes}`;
}

/**
 * Monday of the week containing `date`, at midnight
 */
export function startOfWeek(date: Date): Date {
  const day = startOfDay(date);
  const offset = (day.getDay() + 6) % 7; // Monday = 0
  return addDays(day, -offset);
}

/**
 * ISO-8601 week id, e.g. "2025-W40"
 * The week belongs to the year that contains its Thursday
 */
export function formatWeekId(date: Date): string {
  const thursday = addDays(startOfWeek(date), 3);
  const isoYear = thursday.getFullYear();
  const firstThursday = addDays(startOfWeek(new Date(isoYear, 0, 4)), 3);
  const week = calendarDaysBetween(firstThursday, thursday) / 7 + 1;
  return `${isoYear}-W${String(week).padStart(2, '0')}`;
}

/**
 * Month id, e.g. "2025-10"
 */
export function formatMonthId(date: Date): string {
  return `${date.getFullYear()}-${String(date.getMonth() + 1).padStart(2, '0')}`;
}

export function startOfMonth(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), 1);
}

/**
 * First day of the month `months` away from `date`'s month
 */
export function addMonths(date: Date, months: number): Date {
  return new Date(date.getFullYear(), date.getMonth() + months, 1);
}

export function isSameDay(a: Date, b: Date): boolean {
  return formatDate(a) === formatDate(b);
}

/**
 * Next Monday at 09:00 strictly after `now`
 */
export function nextMondayAt9(now: Date): Date {
  const thisMonday = startOfWeek(now);
  const candidate = new Date(
    thisMonday.getFullYear(),
    thisMonday.getMonth(),
    thisMonday.getDate(),
    9,
    0
  );
  return candidate.getTime() > now.getTime() ? candidate : addDays(candidate, 7);
}

/**
 * Calendar helpers.
 *
 * Ledger dates are plain 'YYYY-MM-DD' strings in the business timezone.
 * Arithmetic runs on UTC midnights so DST never shifts a day count.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-CA', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Calendar date of an instant as seen in `timeZone`.
 */
export function businessDate(instant: Date, timeZone: string): string {
  const parts = formatterFor(timeZone).formatToParts(instant);
  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? '';
  return `${get('year')}-${get('month')}-${get('day')}`;
}

export function isCalendarDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const [, y, m, d] = match;
  const parsed = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return parsed.getUTCFullYear() === Number(y) && parsed.getUTCMonth() === Number(m) - 1 && parsed.getUTCDate() === Number(d);
}

function toUtcMs(date: string): number {
  const match = DATE_PATTERN.exec(date);
  if (!match) {
    throw new RangeError(`Invalid calendar date: ${date}`);
  }
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
}

export function addDays(date: string, days: number): string {
  return new Date(toUtcMs(date) + days * MS_PER_DAY).toISOString().slice(0, 10);
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: string, to: string): number {
  return Math.round((toUtcMs(to) - toUtcMs(from)) / MS_PER_DAY);
}

/** 'YYYY-MM', the leave-balance month key. */
export function monthKey(date: string): string {
  return date.slice(0, 7);
}

/** 'YYYYMM', the invoice numbering namespace. */
export function billingPeriod(date: string): string {
  return date.slice(0, 4) + date.slice(5, 7);
}

export function startOfMonth(date: string): string {
  return `${monthKey(date)}-01`;
}

/** Monday of the week containing `date`. */
export function startOfWeek(date: string): string {
  const weekday = new Date(toUtcMs(date)).getUTCDay();
  return addDays(date, -((weekday + 6) % 7));
}

export function startOfYear(date: string): string {
  return `${date.slice(0, 4)}-01-01`;
}

/**
 * Number of days of the inclusive range [start, end] falling in each month.
 */
export function daysPerMonth(start: string, end: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (let day = start; day <= end; day = addDays(day, 1)) {
    const key = monthKey(day);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

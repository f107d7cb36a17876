import { ValidationError, getErrorMessage } from '@/utils/error-handler';
import { DateRange, ReportType } from '@/utils/types';

const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export type DefaultWindow = 'yesterday' | 'last7' | 'today' | 'ytd';

export const DEFAULT_WINDOWS: Record<ReportType, DefaultWindow> = {
  daily: 'yesterday',
  weekly: 'last7',
  spend: 'today',
  performance: 'ytd'
};

export interface DateWindowOptions {
  startDate?: string | null;
  endDate?: string | null;
  days?: number | null;
}

export function toDateString(date: Date): string {
  return date.toISOString().split('T')[0];
}

/**
 * Calendar date of an instant as seen in `timeZone` (an IANA name such as
 * `America/New_York`); UTC without one.
 */
export function calendarDate(date: Date, timeZone?: string | null): string {
  if (!timeZone) {
    return toDateString(date);
  }

  let parts: Intl.DateTimeFormatPart[];
  try {
    parts = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit'
    }).formatToParts(date);
  } catch (error) {
    throw new ValidationError(`Unknown time zone "${timeZone}"`, { cause: getErrorMessage(error) });
  }

  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find(p => p.type === type)?.value ?? '';
  return `${part('year')}-${part('month')}-${part('day')}`;
}

export function parseDateString(value: string): Date {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    throw new ValidationError(`Invalid date "${value}", expected YYYY-MM-DD`);
  }
  const date = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
  // Rejects 2024-02-30 and friends, which Date.UTC silently rolls over
  if (toDateString(date) !== value) {
    throw new ValidationError(`Invalid date "${value}"`);
  }
  return date;
}

export function addDays(value: string, days: number): string {
  return toDateString(new Date(parseDateString(value).getTime() + days * DAY_MS));
}

/** Number of calendar days in an inclusive range. */
export function daysInRange(range: DateRange): number {
  const start = parseDateString(range.start).getTime();
  const end = parseDateString(range.end).getTime();
  return Math.round((end - start) / DAY_MS) + 1;
}

/** Default windows count calendar days in `timeZone`, the ad account's zone. */
export function resolveDateRange(
  options: DateWindowOptions,
  defaultWindow: DefaultWindow,
  now: Date = new Date(),
  timeZone?: string | null
): DateRange {
  const today = calendarDate(now, timeZone);

  if (options.startDate || options.endDate) {
    const start = options.startDate ?? options.endDate ?? today;
    const end = options.endDate ?? today;
    parseDateString(start);
    parseDateString(end);
    if (start > end) {
      throw new ValidationError(`Start date ${start} is after end date ${end}`);
    }
    return { start, end };
  }

  if (options.days !== undefined && options.days !== null) {
    if (!Number.isInteger(options.days) || options.days < 1) {
      throw new ValidationError(`Invalid day count ${options.days}, expected a positive integer`);
    }
    return { start: addDays(today, -options.days), end: addDays(today, -1) };
  }

  switch (defaultWindow) {
    case 'yesterday': {
      const yesterday = addDays(today, -1);
      return { start: yesterday, end: yesterday };
    }
    case 'last7':
      return { start: addDays(today, -7), end: addDays(today, -1) };
    case 'today':
      return { start: today, end: today };
    case 'ytd':
      return { start: `${today.slice(0, 4)}-01-01`, end: today };
  }
}

/** The window of the same length that ends the day before `range` starts. */
export function previousDateRange(range: DateRange): DateRange {
  const days = daysInRange(range);
  return { start: addDays(range.start, -days), end: addDays(range.start, -1) };
}

export function formatDateRange(range: DateRange): string {
  return range.start === range.end ? range.start : `${range.start} - ${range.end}`;
}

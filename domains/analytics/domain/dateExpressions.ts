import {
  differenceInCalendarDays,
  format,
  getYear,
  isSameDay,
  isValid,
  parseISO,
  startOfDay,
  startOfMonth,
  startOfWeek,
  startOfYear,
  subDays,
  subMonths,
  subWeeks,
  subYears,
} from 'date-fns';

import { UnparseableDateError, ValidationError } from '@errors';

/**
* Inclusive calendar range, both ends as YYYY-MM-DD
*/
export interface DateRange {
  startDate: string;
  endDate: string;
}

const ISO_FORMAT = 'yyyy-MM-dd';
const ISO_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const US_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const DAYS_AGO = /^(\d+)\s*days?\s*ago$/;
const WEEKS_AGO = /^(\d+)\s*weeks?\s*ago$/;
const MONTHS_AGO = /^(\d+)\s*months?\s*ago$/;

/** A month back is counted as 30 days */
const DAYS_PER_MONTH = 30;

const NAMED_RANGE_LENGTHS = new Set([7, 14, 28, 30, 90]);

const WEEK_OPTIONS = { weekStartsOn: 1 } as const;

/** Relative dates must land on a four-digit year */
const MIN_YEAR = 1000;

export function formatIsoDate(date: Date): string {
  return format(date, ISO_FORMAT);
}

function calendarDate(year: number, month: number, day: number): Date | undefined {
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return undefined;
  }
  return date;
}

function relativeDate(date: Date, expression: string): string {
  if (!isValid(date) || getYear(date) < MIN_YEAR) {
    throw new UnparseableDateError(expression);
  }
  return formatIsoDate(date);
}

function resolveNamed(text: string, today: Date): Date | undefined {
  switch (text.replace(/\s+/g, '')) {
    case 'today':
      return today;
    case 'yesterday':
      return subDays(today, 1);
    case 'thisweek':
      return startOfWeek(today, WEEK_OPTIONS);
    case 'lastweek':
      return startOfWeek(subWeeks(today, 1), WEEK_OPTIONS);
    case 'thismonth':
      return startOfMonth(today);
    case 'lastmonth':
      return startOfMonth(subMonths(today, 1));
    case 'thisyear':
    case 'ytd':
      return startOfYear(today);
    case 'lastyear':
      return startOfYear(subYears(today, 1));
    default:
      return undefined;
  }
}

/**
* Resolve a date expression to YYYY-MM-DD.
*
* Accepts YYYY-MM-DD, MM/DD/YYYY, today, yesterday, "N days|weeks|months ago"
* (also GA4's NdaysAgo), this/last week (weeks start Monday), this/last month,
* this/last year and ytd.
*
* @param today - Reference day for relative expressions
* @throws UnparseableDateError
*/
export function parseDateExpression(expression: string, today: Date = new Date()): string {
  const text = expression.trim().toLowerCase();
  if (!text) {
    throw new UnparseableDateError(expression);
  }
  const base = startOfDay(today);

  const iso = ISO_PATTERN.exec(text);
  if (iso) {
    const date = calendarDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
    if (!date) throw new UnparseableDateError(expression);
    return text;
  }

  const us = US_PATTERN.exec(text);
  if (us) {
    const date = calendarDate(Number(us[3]), Number(us[1]), Number(us[2]));
    if (!date) throw new UnparseableDateError(expression);
    return formatIsoDate(date);
  }

  const daysAgo = DAYS_AGO.exec(text);
  if (daysAgo) {
    return relativeDate(subDays(base, Number(daysAgo[1])), expression);
  }

  const weeksAgo = WEEKS_AGO.exec(text);
  if (weeksAgo) {
    return relativeDate(subWeeks(base, Number(weeksAgo[1])), expression);
  }

  const monthsAgo = MONTHS_AGO.exec(text);
  if (monthsAgo) {
    return relativeDate(subDays(base, Number(monthsAgo[1]) * DAYS_PER_MONTH), expression);
  }

  const named = resolveNamed(text, base);
  if (named) {
    return formatIsoDate(named);
  }

  throw new UnparseableDateError(expression);
}

/**
* Resolve both ends of a range
* @throws UnparseableDateError when either end cannot be parsed
* @throws ValidationError when the start falls after the end
*/
export function parseDateRange(start: string, end: string, today: Date = new Date()): DateRange {
  const startDate = parseDateExpression(start, today);
  const endDate = parseDateExpression(end, today);

  if (startDate > endDate) {
    throw new ValidationError(
      `Start date (${startDate}) must be before or equal to end date (${endDate})`,
      { startDate, endDate },
      'Swap the dates or pick an earlier start date.'
    );
  }

  return { startDate, endDate };
}

/**
* Human-readable label for a range, e.g. "Last 7 days" or
* "Jan 01 - Jan 31, 2024 (31 days)"
*/
export function describeDateRange(range: DateRange, today: Date = new Date()): string {
  const start = parseISO(range.startDate);
  const end = parseISO(range.endDate);
  const base = startOfDay(today);
  const days = differenceInCalendarDays(end, start) + 1;

  if (isSameDay(start, end)) {
    if (isSameDay(end, base)) return 'Today';
    if (isSameDay(end, subDays(base, 1))) return 'Yesterday';
    return format(start, 'MMMM dd, yyyy');
  }

  if (isSameDay(end, base) && NAMED_RANGE_LENGTHS.has(days)) {
    return `Last ${days} days`;
  }

  return `${format(start, 'MMM dd')} - ${format(end, 'MMM dd, yyyy')} (${days} days)`;
}

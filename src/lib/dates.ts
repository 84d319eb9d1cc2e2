import { isBefore, isValid, parse } from 'date-fns';

// date-fns takes 1-4 digit years; due dates and processing dates always carry four
const DAY_MONTH_YEAR = /^\d{1,2}\/\d{1,2}\/\d{4}$/;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Midnight UTC of the given calendar day. All date comparisons use these values.
 */
export function utcDay(year: number, monthIndex: number, day: number): Date {
  return new Date(Date.UTC(year, monthIndex, day));
}

export function toUtcDay(date: Date): Date {
  return utcDay(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

function parseWithFormat(value: string, shape: RegExp, format: string): Date | null {
  if (!shape.test(value)) {
    return null;
  }

  // parse() yields local midnight; keep only its calendar fields
  const parsed = parse(value, format, new Date());
  if (!isValid(parsed)) {
    return null;
  }
  return utcDay(parsed.getFullYear(), parsed.getMonth(), parsed.getDate());
}

/**
 * Parse a `dd/mm/yyyy` date. Returns null for anything that is not a real
 * calendar date in that format.
 */
export function parseDayMonthYear(value: string): Date | null {
  return parseWithFormat(value, DAY_MONTH_YEAR, 'd/M/yyyy');
}

export function parseIsoDay(value: string): Date | null {
  return parseWithFormat(value, ISO_DATE, 'yyyy-MM-dd');
}

export function isBeforeDay(date: Date, today: Date): boolean {
  return isBefore(date, today);
}

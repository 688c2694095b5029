import { differenceInCalendarDays, isValid, parse } from 'date-fns';

export const ISO_DATE_FORMAT = 'yyyy-MM-dd';

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** True for a real calendar date written as `YYYY-MM-DD` ("2021-02-30" is rejected). */
export function isIsoDate(value: string): boolean {
  if (!ISO_DATE_PATTERN.test(value)) return false;
  return isValid(parse(value, ISO_DATE_FORMAT, new Date()));
}

/** `YYYY-MM-DD` strings order chronologically as plain strings. */
export function compareIsoDates(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Keep rows whose date lies in `[minDate, maxDate]`, both ends inclusive. */
export function filterByDateRange<T>(
  rows: readonly T[],
  dateOf: (row: T) => string,
  minDate: string,
  maxDate: string,
): T[] {
  return rows.filter(r => {
    const date = dateOf(r);
    return compareIsoDates(date, minDate) >= 0 && compareIsoDates(date, maxDate) <= 0;
  });
}

export interface DateSpan {
  first: string;
  last: string;
  uniqueDates: number;
  calendarDays: number;
}

export function describeDateSpan<T>(rows: readonly T[], dateOf: (row: T) => string): DateSpan | null {
  if (rows.length === 0) return null;
  const uniqueDates = [...new Set(rows.map(dateOf))].sort(compareIsoDates);
  const first = uniqueDates[0];
  const last = uniqueDates[uniqueDates.length - 1];

  return {
    first,
    last,
    uniqueDates: uniqueDates.length,
    calendarDays:
      differenceInCalendarDays(parse(last, ISO_DATE_FORMAT, new Date()), parse(first, ISO_DATE_FORMAT, new Date())) + 1,
  };
}

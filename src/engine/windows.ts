/**
 * Grouped window primitives.
 *
 * Pure-logic module: every function takes an immutable sequence plus key and
 * date accessors and returns new arrays. Windows and lags are positional over
 * the date-ordered rows of one group and never reach across groups.
 */

import { compareIsoDates } from '../utils/date-range';
import { mean } from '../utils/math';

export const WINDOW_SIZE = 7;
export const MIN_PERIODS = 1;
export const LAG_OFFSET = 7;

export type KeyOf<T> = (row: T) => string;
export type DateOf<T> = (row: T) => string;
export type ValueOf<T> = (row: T) => number;

/**
 * Partition rows by key and order each partition by date ascending.
 * Groups keep first-appearance order; rows sharing a date keep input order.
 */
export function sortByDateWithinGroup<T>(
  rows: readonly T[],
  keyOf: KeyOf<T>,
  dateOf: DateOf<T>,
): ReadonlyMap<string, readonly T[]> {
  const groups = new Map<string, T[]>();
  for (const row of rows) {
    const key = keyOf(row);
    const group = groups.get(key);
    if (group) group.push(row);
    else groups.set(key, [row]);
  }

  for (const group of groups.values()) {
    group.sort((a, b) => compareIsoDates(dateOf(a), dateOf(b)));
  }
  return groups;
}

/** Trailing mean over up to `window` values ending at each position; null until `minPeriods` values exist. */
export function rollingMean(
  values: readonly number[],
  window = WINDOW_SIZE,
  minPeriods = MIN_PERIODS,
): (number | null)[] {
  return values.map((_, i) => {
    const slice = values.slice(Math.max(0, i - window + 1), i + 1);
    return slice.length >= minPeriods ? mean(slice) : null;
  });
}

/** Value `offset` positions earlier; null for the first `offset` positions. */
export function lag(values: readonly number[], offset = LAG_OFFSET): (number | null)[] {
  return values.map((_, i) => (i >= offset ? values[i - offset] : null));
}

export interface Windowed<T> {
  readonly row: T;
  readonly ma: number | null;
  readonly lag: number | null;
}

/**
 * Attach the trailing mean and lag of `valueOf` to every row, computed within
 * its key group in date order. Output is grouped, then date-ordered.
 */
export function withWindowFeatures<T>(
  rows: readonly T[],
  keyOf: KeyOf<T>,
  dateOf: DateOf<T>,
  valueOf: ValueOf<T>,
): Windowed<T>[] {
  const result: Windowed<T>[] = [];

  for (const group of sortByDateWithinGroup(rows, keyOf, dateOf).values()) {
    const values = group.map(valueOf);
    const means = rollingMean(values);
    const lags = lag(values);
    group.forEach((row, i) => {
      result.push({ row, ma: means[i], lag: lags[i] });
    });
  }

  return result;
}

export interface DailyTotal {
  readonly key: string;
  readonly date: string;
  readonly total: number;
}

/** Sum values per (key, date), one observation per day for the coarser levels. */
export function aggregateDaily<T>(
  rows: readonly T[],
  keyOf: KeyOf<T>,
  dateOf: DateOf<T>,
  valueOf: ValueOf<T>,
): DailyTotal[] {
  const totals = new Map<string, { key: string; date: string; total: number }>();

  for (const row of rows) {
    const key = keyOf(row);
    const date = dateOf(row);
    const id = JSON.stringify([key, date]);
    const entry = totals.get(id);
    if (entry) entry.total += valueOf(row);
    else totals.set(id, { key, date, total: valueOf(row) });
  }

  return [...totals.values()];
}

import { DEFAULT_CONFIG, type PipelineOptions } from '../config';
import type { FeatureRecord, SourceTables, WmapeRecord, ZeroSalesGroup } from '../types/data';
import { compareIsoDates, describeDateSpan, filterByDateRange, type DateSpan } from '../utils/date-range';
import { createLogger } from '../utils/logger';
import { compareIds } from '../utils/math';
import { computeFeatures } from './features';
import { mergeSalesTables, toSalesRecords } from './merge';
import { scoreAccuracy } from './wmape';

const logger = createLogger('pipeline');

export interface PipelineStats {
  salesRows: number;
  mergedRows: number;
  filteredRows: number;
  scoredGroups: number;
  dateSpan: DateSpan | null;
}

export interface PipelineResult {
  /** Ordered by (product_id, brand_id, store_id, date) */
  features: FeatureRecord[];
  /** Worst groups first, at most `top` */
  wmape: WmapeRecord[];
  zeroSalesGroups: ZeroSalesGroup[];
  stats: PipelineStats;
}

export function compareFeatureRecords(a: FeatureRecord, b: FeatureRecord): number {
  return (
    compareIds(a.product_id, b.product_id) ||
    compareIds(a.brand_id, b.brand_id) ||
    compareIds(a.store_id, b.store_id) ||
    compareIsoDates(a.date, b.date)
  );
}

export function sortFeatures(features: readonly FeatureRecord[]): FeatureRecord[] {
  return [...features].sort(compareFeatureRecords);
}

/** Highest WMAPE first; equal scores keep their incoming order. */
export function rankWorstGroups(scores: readonly WmapeRecord[], top: number): WmapeRecord[] {
  return [...scores].sort((a, b) => b.WMAPE - a.WMAPE).slice(0, top);
}

/**
 * merge → date filter → features → sort, then score → rank → truncate.
 * Both result tables are fully built before this returns.
 */
export function runPipeline(tables: SourceTables, options: Partial<PipelineOptions> = {}): PipelineResult {
  const { minDate, maxDate, top, onZeroSales } = { ...DEFAULT_CONFIG, ...options };

  const merged = mergeSalesTables(tables);
  const records = toSalesRecords(merged);
  const filtered = filterByDateRange(records, r => r.date, minDate, maxDate);
  if (filtered.length === 0) {
    logger.warn(`no sales rows between ${minDate} and ${maxDate}; outputs will be empty`);
  }

  const features = sortFeatures(computeFeatures(filtered));
  const { scores, zeroSalesGroups } = scoreAccuracy(features, { onZeroSales });
  const wmape = rankWorstGroups(scores, top);

  const stats: PipelineStats = {
    salesRows: tables.sales.length,
    mergedRows: merged.length,
    filteredRows: filtered.length,
    scoredGroups: scores.length,
    dateSpan: describeDateSpan(filtered, r => r.date),
  };
  logger.info(
    `${stats.salesRows} sales rows, ${stats.mergedRows} after merge, ${stats.filteredRows} in range; ` +
    `${stats.scoredGroups} group(s) scored`,
  );
  if (stats.dateSpan) {
    logger.debug(
      `features cover ${stats.dateSpan.first} to ${stats.dateSpan.last} ` +
      `(${stats.dateSpan.uniqueDates} of ${stats.dateSpan.calendarDays} calendar days)`,
    );
  }

  return { features, wmape, zeroSalesGroups, stats };
}

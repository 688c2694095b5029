import type { ZeroSalesPolicy } from '../config';
import { ZeroSalesError } from '../errors';
import type { FeatureRecord, GroupKey, WmapeRecord, ZeroSalesGroup } from '../types/data';
import { createLogger } from '../utils/logger';
import { compareIds, groupKey } from '../utils/math';

const logger = createLogger('wmape');

type Complete<T> = { [K in keyof T]: Exclude<T[K], null> };

export type CompleteFeatureRecord = Complete<FeatureRecord>;

/** Rows without enough history for a mean or a lag carry nulls and are not scored. */
export function isComplete(row: FeatureRecord): row is CompleteFeatureRecord {
  return Object.values(row).every(v => v !== null);
}

export function compareGroupKeys(a: GroupKey, b: GroupKey): number {
  return (
    compareIds(a.product_id, b.product_id) ||
    compareIds(a.store_id, b.store_id) ||
    compareIds(a.brand_id, b.brand_id)
  );
}

export interface ScoreOptions {
  onZeroSales?: ZeroSalesPolicy;
}

export interface AccuracyScore {
  /** One WMAPE per scored group, ordered by (product, store, brand) */
  scores: WmapeRecord[];
  /** Groups left out because their total quantity is zero */
  zeroSalesGroups: ZeroSalesGroup[];
}

interface GroupTotals {
  key: GroupKey;
  absErrorSum: number;
  salesSum: number;
  rowCount: number;
}

/**
 * Weighted MAPE of the trailing 7-day mean as a forecast of each day's sales:
 * sum(|sales_product - MA7_P|) / sum(sales_product) per (product, store, brand).
 */
export function scoreAccuracy(features: readonly FeatureRecord[], options: ScoreOptions = {}): AccuracyScore {
  const onZeroSales = options.onZeroSales ?? 'exclude';
  const groups = new Map<string, GroupTotals>();

  for (const row of features) {
    if (!isComplete(row)) continue;
    const id = groupKey(row.product_id, row.store_id, row.brand_id);
    let totals = groups.get(id);
    if (!totals) {
      totals = {
        key: { product_id: row.product_id, store_id: row.store_id, brand_id: row.brand_id },
        absErrorSum: 0,
        salesSum: 0,
        rowCount: 0,
      };
      groups.set(id, totals);
    }
    totals.absErrorSum += Math.abs(row.sales_product - row.MA7_P);
    totals.salesSum += row.sales_product;
    totals.rowCount++;
  }

  const ordered = [...groups.values()].sort((a, b) => compareGroupKeys(a.key, b.key));
  const scores: WmapeRecord[] = [];
  const zeroSalesGroups: ZeroSalesGroup[] = [];

  for (const g of ordered) {
    if (g.salesSum === 0) {
      zeroSalesGroups.push({ ...g.key, rowCount: g.rowCount });
      continue;
    }
    scores.push({ ...g.key, WMAPE: g.absErrorSum / g.salesSum });
  }

  if (zeroSalesGroups.length > 0) {
    if (onZeroSales === 'fail') throw new ZeroSalesError(zeroSalesGroups);
    for (const g of zeroSalesGroups) {
      logger.warn(
        `WMAPE undefined for product ${g.product_id}, store ${g.store_id}, brand ${g.brand_id}: ` +
        `zero total sales over ${g.rowCount} row(s); group left out`,
      );
    }
  }

  return { scores, zeroSalesGroups };
}

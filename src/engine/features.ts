/**
 * Hierarchical sales features.
 *
 * Product level windows run over the raw fact rows of each (product, store).
 * Brand and store levels first collapse to one daily total per
 * (brand, store, date) and (store, date), window over those daily series, and
 * attach the result back onto every product row of that day.
 */

import type { FeatureRecord, SalesRecord } from '../types/data';
import { groupKey } from '../utils/math';
import { aggregateDaily, withWindowFeatures, type Windowed } from './windows';

const byDate = (r: SalesRecord) => r.date;
const bySales = (r: SalesRecord) => r.sales_product;

export const productKey = (r: SalesRecord) => groupKey(r.product_id, r.store_id);
export const brandKey = (r: SalesRecord) => groupKey(r.brand_id, r.store_id);
export const storeKey = (r: SalesRecord) => groupKey(r.store_id);

interface LevelFeatures {
  total: number;
  ma: number | null;
  lag: number | null;
}

type LevelIndex = ReadonlyMap<string, LevelFeatures>;

/** Daily totals for one level, windowed, indexed by (key, date). */
function computeLevel(records: readonly SalesRecord[], keyOf: (r: SalesRecord) => string): LevelIndex {
  const daily = aggregateDaily(records, keyOf, byDate, bySales);
  const windowed = withWindowFeatures(daily, d => d.key, d => d.date, d => d.total);

  const index = new Map<string, LevelFeatures>();
  for (const { row, ma, lag } of windowed) {
    index.set(groupKey(row.key, row.date), { total: row.total, ma, lag });
  }
  return index;
}

function lookup(index: LevelIndex, key: string, date: string): LevelFeatures {
  const entry = index.get(groupKey(key, date));
  if (!entry) throw new Error(`no daily total for ${key} on ${date}`);
  return entry;
}

function toFeatureRecord(
  { row, ma, lag }: Windowed<SalesRecord>,
  brand: LevelFeatures,
  store: LevelFeatures,
): FeatureRecord {
  return {
    product_id: row.product_id,
    store_id: row.store_id,
    brand_id: row.brand_id,
    date: row.date,
    sales_product: row.sales_product,
    MA7_P: ma,
    LAG7_P: lag,
    sales_brand: brand.total,
    MA7_B: brand.ma,
    LAG7_B: brand.lag,
    sales_store: store.total,
    MA7_S: store.ma,
    LAG7_S: store.lag,
  };
}

/** One feature row per sales record; output order is not meaningful. */
export function computeFeatures(records: readonly SalesRecord[]): FeatureRecord[] {
  const product = withWindowFeatures(records, productKey, byDate, bySales);
  const brand = computeLevel(records, brandKey);
  const store = computeLevel(records, storeKey);

  return product.map(p =>
    toFeatureRecord(p, lookup(brand, brandKey(p.row), p.row.date), lookup(store, storeKey(p.row), p.row.date)),
  );
}

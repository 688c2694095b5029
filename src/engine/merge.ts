import { InputShapeError } from '../errors';
import type { Cell, Row, SalesRecord, SourceTables } from '../types/data';
import { isIsoDate } from '../utils/date-range';
import { createLogger } from '../utils/logger';

const logger = createLogger('merge');

export interface JoinOptions {
  leftOn: string;
  rightOn: string;
  /** Appended to a right-hand column whose name already exists on the left row */
  suffix: string;
}

/**
 * Hash inner join. Left rows without a match are dropped; a left row matching
 * several right rows yields one output row per match. Output follows left order.
 */
export function innerJoin(left: readonly Row[], right: readonly Row[], options: JoinOptions): Row[] {
  const { leftOn, rightOn, suffix } = options;

  const index = new Map<string, Row[]>();
  for (const r of right) {
    const key = r[rightOn];
    if (key === undefined) continue;
    const bucket = index.get(String(key));
    if (bucket) bucket.push(r);
    else index.set(String(key), [r]);
  }

  const joined: Row[] = [];
  for (const l of left) {
    const key = l[leftOn];
    if (key === undefined) continue;
    for (const r of index.get(String(key)) ?? []) {
      const combined: Record<string, Cell> = { ...l };
      for (const [column, value] of Object.entries(r)) {
        // same-named join keys hold equal values, keep one copy
        if (column === rightOn && leftOn === rightOn) continue;
        combined[column in l ? `${column}${suffix}` : column] = value;
      }
      joined.push(combined);
    }
  }
  return joined;
}

/** Where each `SalesRecord` field lives once the three joins have run. */
export const MERGED_COLUMNS = {
  product_id: 'product',
  store_id: 'store',
  brand_id: 'id_brand',
  date: 'date',
  sales_product: 'quantity',
} as const satisfies Record<keyof SalesRecord, string>;

/**
 * sales.product = product.id, product.brand = brand.name, sales.store = store.id.
 * Facts that miss on any of the three keys are left out, not reported as errors.
 */
export function mergeSalesTables(tables: SourceTables): Row[] {
  const withProduct = innerJoin(tables.sales, tables.product, { leftOn: 'product', rightOn: 'id', suffix: '_prod' });
  const withBrand = innerJoin(withProduct, tables.brand, { leftOn: 'brand', rightOn: 'name', suffix: '_brand' });
  const merged = innerJoin(withBrand, tables.store, { leftOn: 'store', rightOn: 'id', suffix: '_store' });

  const dropped = tables.sales.length - merged.length;
  if (dropped > 0) {
    logger.debug(`${dropped} of ${tables.sales.length} sales rows had no matching product, brand or store`);
  }
  return merged;
}

function readString(row: Row, column: string, index: number): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new InputShapeError(`merged record ${index + 1}: expected text in column "${column}"`);
  }
  return value;
}

function readDate(row: Row, column: string, index: number): string {
  const value = readString(row, column, index);
  if (!isIsoDate(value)) {
    throw new InputShapeError(`merged record ${index + 1}: "${value}" in column "${column}" is not a YYYY-MM-DD date`);
  }
  return value;
}

function readNumber(row: Row, column: string, index: number): number {
  const value = row[column];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InputShapeError(`merged record ${index + 1}: expected a number in column "${column}"`);
  }
  return value;
}

export function toSalesRecords(rows: readonly Row[]): SalesRecord[] {
  return rows.map((row, i) => ({
    product_id: readString(row, MERGED_COLUMNS.product_id, i),
    store_id: readString(row, MERGED_COLUMNS.store_id, i),
    brand_id: readString(row, MERGED_COLUMNS.brand_id, i),
    date: readDate(row, MERGED_COLUMNS.date, i),
    sales_product: readNumber(row, MERGED_COLUMNS.sales_product, i),
  }));
}

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import Papa from 'papaparse';
import type { FeatureRecord, WmapeRecord } from '../types/data';

export const FEATURE_COLUMNS = [
  'product_id', 'store_id', 'brand_id', 'date',
  'sales_product', 'MA7_P', 'LAG7_P',
  'sales_brand', 'MA7_B', 'LAG7_B',
  'sales_store', 'MA7_S', 'LAG7_S',
] as const satisfies readonly (keyof FeatureRecord)[];

export const WMAPE_COLUMNS = ['product_id', 'store_id', 'brand_id', 'WMAPE'] as const satisfies readonly (keyof WmapeRecord)[];

function toCsv<T>(columns: readonly (keyof T & string)[], rows: readonly T[]): string {
  const data = rows.map(r => columns.map(c => {
    const value = r[c];
    return value === null || value === undefined ? '' : value;
  }));
  const csv = Papa.unparse({ fields: [...columns], data }, { newline: '\n' });
  // an empty table already ends with the header's newline
  return csv.endsWith('\n') ? csv : csv + '\n';
}

/** Missing lag values become empty cells. */
export function featuresToCsv(rows: readonly FeatureRecord[]): string {
  return toCsv<FeatureRecord>(FEATURE_COLUMNS, rows);
}

export function wmapeToCsv(rows: readonly WmapeRecord[]): string {
  return toCsv<WmapeRecord>(WMAPE_COLUMNS, rows);
}

export async function writeCsv(filePath: string, contents: string): Promise<void> {
  await mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await writeFile(filePath, contents, 'utf8');
}

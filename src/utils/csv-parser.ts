import { readFile } from 'node:fs/promises';
import path from 'node:path';
import Papa from 'papaparse';
import { z } from 'zod';
import { InputShapeError } from '../errors';
import type { Cell, Row, SourceTables, TableName } from '../types/data';
import { isIsoDate } from './date-range';

const identifier = z.string().trim().min(1, 'must not be empty');

const calendarDate = z.string().trim().refine(isIsoDate, { message: 'expected a calendar date as YYYY-MM-DD' });

const quantity = z.string().trim().min(1, 'must not be empty').pipe(z.coerce.number().finite());

export const salesSchema = z.object({ date: calendarDate, product: identifier, store: identifier, quantity });
export const productSchema = z.object({ id: identifier, brand: identifier });
export const brandSchema = z.object({ id: identifier, name: identifier });
export const storeSchema = z.object({ id: identifier });

interface TableLayout {
  columns: readonly string[];
  schema: z.ZodType<Record<string, Cell>, z.ZodTypeDef, unknown>;
}

const TABLE_LAYOUTS: Record<TableName, TableLayout> = {
  sales: { columns: Object.keys(salesSchema.shape), schema: salesSchema },
  product: { columns: Object.keys(productSchema.shape), schema: productSchema },
  brand: { columns: Object.keys(brandSchema.shape), schema: brandSchema },
  store: { columns: Object.keys(storeSchema.shape), schema: storeSchema },
};

export const TABLE_FILES: Record<TableName, string> = {
  sales: 'sales.csv',
  product: 'product.csv',
  brand: 'brand.csv',
  store: 'store.csv',
};

/**
 * Parse one CSV table and validate the columns the joins and features read.
 * Extra columns pass through untouched as strings.
 */
export function parseTable(table: TableName, text: string): Row[] {
  const results = Papa.parse<Record<string, string>>(text, {
    header: true,
    delimiter: ',',
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  if (results.errors.length > 0) {
    const first = results.errors[0];
    const where = first.row !== undefined ? ` at record ${first.row + 1}` : '';
    throw new InputShapeError(`${table}: malformed CSV${where}: ${first.message}`);
  }

  const layout = TABLE_LAYOUTS[table];
  const fields = results.meta.fields ?? [];
  const missing = layout.columns.filter(c => !fields.includes(c));
  if (missing.length > 0) {
    throw new InputShapeError(`${table}: missing column(s) ${missing.map(c => `"${c}"`).join(', ')}`);
  }

  return results.data.map((raw, index) => {
    const parsed = layout.schema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InputShapeError(
        `${table}: record ${index + 1}, column "${issue.path.join('.')}": ${issue.message}`,
      );
    }
    const row: Record<string, Cell> = { ...raw, ...parsed.data };
    return row;
  });
}

export async function loadTable(table: TableName, filePath: string): Promise<Row[]> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new InputShapeError(`${table}: cannot read ${filePath}: ${reason}`, { cause: e });
  }
  return parseTable(table, text);
}

/** Read `sales.csv`, `product.csv`, `brand.csv` and `store.csv` from one directory. */
export async function loadSourceTables(dataDir: string): Promise<SourceTables> {
  const [sales, product, brand, store] = await Promise.all([
    loadTable('sales', path.join(dataDir, TABLE_FILES.sales)),
    loadTable('product', path.join(dataDir, TABLE_FILES.product)),
    loadTable('brand', path.join(dataDir, TABLE_FILES.brand)),
    loadTable('store', path.join(dataDir, TABLE_FILES.store)),
  ]);
  return { sales, product, brand, store };
}

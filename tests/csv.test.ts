import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { resolveConfig } from '../src/config';
import { InputShapeError, ZeroSalesError } from '../src/errors';
import { runFromFiles } from '../src/run';
import type { FeatureRecord } from '../src/types/data';
import { loadSourceTables, parseTable } from '../src/utils/csv-parser';
import { featuresToCsv, wmapeToCsv } from '../src/utils/csv-writer';

describe('parseTable', () => {
  it('converts quantities to numbers and trims headers and identifiers', () => {
    const rows = parseTable('sales', 'date, product ,store,quantity\n2021-01-01, 7,10,3.5\n\n');

    expect(rows).toEqual([{ date: '2021-01-01', product: '7', store: '10', quantity: 3.5 }]);
  });

  it('passes extra columns through unchanged', () => {
    const rows = parseTable('product', 'id,name,brand\n1,Sparkling Water,Acme\n');

    expect(rows).toEqual([{ id: '1', name: 'Sparkling Water', brand: 'Acme' }]);
  });

  it('reads a single-column table', () => {
    expect(parseTable('store', 'id\n10\n20\n')).toEqual([{ id: '10' }, { id: '20' }]);
  });

  it('rejects a table missing a required column', () => {
    expect(() => parseTable('sales', 'date,product,store\n2021-01-01,1,10\n')).toThrow(InputShapeError);
    expect(() => parseTable('sales', 'date,product,store\n2021-01-01,1,10\n')).toThrow(
      'sales: missing column(s) "quantity"',
    );
  });

  it('rejects an impossible calendar date', () => {
    expect(() => parseTable('sales', 'date,product,store,quantity\n2021-02-30,1,10,3\n')).toThrow(
      /^sales: record 1, column "date": expected a calendar date as YYYY-MM-DD$/,
    );
  });

  it('rejects a quantity that is not a number', () => {
    expect(() => parseTable('sales', 'date,product,store,quantity\n2021-01-01,1,10,lots\n')).toThrow(
      /sales: record 1, column "quantity"/,
    );
  });

  it('rejects an empty identifier', () => {
    expect(() => parseTable('store', 'id,name\n,Harbour Street\n')).toThrow(
      'store: record 1, column "id": must not be empty',
    );
  });

  it('rejects rows with too few fields', () => {
    expect(() => parseTable('sales', 'date,product,store,quantity\n2021-01-01,1,10\n')).toThrow(
      /^sales: malformed CSV at record 1/,
    );
  });
});

describe('csv writer', () => {
  const row: FeatureRecord = {
    product_id: '1', store_id: '10', brand_id: '100', date: '2021-01-01',
    sales_product: 1, MA7_P: 1, LAG7_P: null,
    sales_brand: 3, MA7_B: 3, LAG7_B: null,
    sales_store: 3, MA7_S: 3, LAG7_S: null,
  };

  it('writes feature columns in order with empty cells for missing lags', () => {
    expect(featuresToCsv([row])).toBe(
      'product_id,store_id,brand_id,date,sales_product,MA7_P,LAG7_P,sales_brand,MA7_B,LAG7_B,sales_store,MA7_S,LAG7_S\n' +
      '1,10,100,2021-01-01,1,1,,3,3,,3,3,\n',
    );
  });

  it('writes the WMAPE table', () => {
    expect(wmapeToCsv([{ product_id: '1', store_id: '10', brand_id: '100', WMAPE: 0.25 }])).toBe(
      'product_id,store_id,brand_id,WMAPE\n1,10,100,0.25\n',
    );
  });

  it('writes only the header for an empty table', () => {
    expect(wmapeToCsv([])).toBe('product_id,store_id,brand_id,WMAPE\n');
  });
});

describe('file round trip', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'sales-features-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    const sales = ['date,product,store,quantity'];
    for (let d = 1; d <= 9; d++) {
      sales.push(`2021-01-0${d},1,10,${d}`);
    }
    sales.push('2021-01-05,1,99,4');
    await writeFile(path.join(dir, 'sales.csv'), sales.join('\n') + '\n');
    await writeFile(path.join(dir, 'product.csv'), 'id,name,brand\n1,Sparkling Water,Acme\n');
    await writeFile(path.join(dir, 'brand.csv'), 'id,name\n100,Acme\n');
    await writeFile(path.join(dir, 'store.csv'), 'id,name\n10,Harbour Street\n');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('loads all four tables from a directory', async () => {
    const tables = await loadSourceTables(dir);

    expect(tables.sales).toHaveLength(10);
    expect(tables.product[0]).toEqual({ id: '1', name: 'Sparkling Water', brand: 'Acme' });
  });

  it('reports a missing file as an input error', async () => {
    await rm(path.join(dir, 'store.csv'));

    await expect(loadSourceTables(dir)).rejects.toThrow(InputShapeError);
  });

  it('writes both outputs', async () => {
    const config = resolveConfig({
      dataDir: dir,
      minDate: '2021-01-01',
      maxDate: '2021-01-31',
      featuresOut: path.join(dir, 'out', 'features.csv'),
      wmapeOut: path.join(dir, 'out', 'mapes.csv'),
    });

    const result = await runFromFiles(config);

    const features = (await readFile(config.featuresOut, 'utf8')).trimEnd().split('\n');
    expect(features).toHaveLength(10);
    expect(features[1]).toBe('1,10,100,2021-01-01,1,1,,1,1,,1,1,');
    expect(features[8]).toBe('1,10,100,2021-01-08,8,5,1,8,5,1,8,5,1');

    // days 8 and 9: |8-5| + |9-6| over 8 + 9
    const mapes = await readFile(config.wmapeOut, 'utf8');
    expect(mapes).toBe(`product_id,store_id,brand_id,WMAPE\n1,10,100,${6 / 17}\n`);
    expect(result.stats.mergedRows).toBe(9);
  });

  it('writes nothing when an input table is malformed', async () => {
    await writeFile(path.join(dir, 'sales.csv'), 'date,product,store,quantity\n2021-13-01,1,10,1\n');
    const featuresOut = path.join(dir, 'features.csv');

    await expect(runFromFiles(resolveConfig({ dataDir: dir, featuresOut }))).rejects.toThrow(InputShapeError);
    await expect(readFile(featuresOut, 'utf8')).rejects.toThrow();
  });

  it('writes neither output when a zero-sales group fails the run', async () => {
    const sales = ['date,product,store,quantity'];
    for (let d = 1; d <= 9; d++) {
      sales.push(`2021-01-0${d},1,10,${d <= 7 ? 5 : 0}`);
    }
    await writeFile(path.join(dir, 'sales.csv'), sales.join('\n') + '\n');
    const config = resolveConfig({
      dataDir: dir,
      minDate: '2021-01-01',
      maxDate: '2021-01-31',
      onZeroSales: 'fail',
      featuresOut: path.join(dir, 'out', 'features.csv'),
      wmapeOut: path.join(dir, 'out', 'mapes.csv'),
    });

    await expect(runFromFiles(config)).rejects.toThrow(ZeroSalesError);
    await expect(readFile(config.featuresOut, 'utf8')).rejects.toThrow();
    await expect(readFile(config.wmapeOut, 'utf8')).rejects.toThrow();
  });
});

/** A single CSV cell after validation: identifiers and dates stay strings, quantities become numbers. */
export type Cell = string | number;

export type Row = Readonly<Record<string, Cell>>;

export type TableName = 'sales' | 'product' | 'brand' | 'store';

export type SourceTables = Readonly<Record<TableName, readonly Row[]>>;

/** One sales fact after the merge, narrowed to what the feature engine reads. */
export interface SalesRecord {
  readonly product_id: string;
  readonly store_id: string;
  readonly brand_id: string;
  /** Calendar date as `YYYY-MM-DD` */
  readonly date: string;
  readonly sales_product: number;
}

export interface FeatureRecord extends SalesRecord {
  readonly MA7_P: number | null;
  readonly LAG7_P: number | null;
  readonly sales_brand: number;
  readonly MA7_B: number | null;
  readonly LAG7_B: number | null;
  readonly sales_store: number;
  readonly MA7_S: number | null;
  readonly LAG7_S: number | null;
}

export interface GroupKey {
  readonly product_id: string;
  readonly store_id: string;
  readonly brand_id: string;
}

export interface WmapeRecord extends GroupKey {
  readonly WMAPE: number;
}

/** A scored group whose realized quantity sums to zero, so WMAPE has no value. */
export interface ZeroSalesGroup extends GroupKey {
  readonly rowCount: number;
}

import { addDays, format, parseISO } from 'date-fns';
import type { Row, SalesRecord, SourceTables } from '../src/types/data';

export function dateAt(start: string, offset: number): string {
  return format(addDays(parseISO(start), offset), 'yyyy-MM-dd');
}

/** One record per consecutive day starting at `start`. */
export function dailyRecords(
  key: Omit<SalesRecord, 'date' | 'sales_product'>,
  start: string,
  quantities: readonly number[],
): SalesRecord[] {
  return quantities.map((q, i) => ({ ...key, date: dateAt(start, i), sales_product: q }));
}

export function dailySalesRows(product: string, store: string, start: string, quantities: readonly number[]): Row[] {
  return quantities.map((quantity, i) => ({ date: dateAt(start, i), product, store, quantity }));
}

export const PRODUCTS: Row[] = [
  { id: '1', name: 'Sparkling Water', brand: 'Acme' },
  { id: '2', name: 'Still Water', brand: 'Acme' },
  { id: '3', name: 'Orange Juice', brand: 'Birch' },
];

export const BRANDS: Row[] = [
  { id: '100', name: 'Acme' },
  { id: '200', name: 'Birch' },
];

export const STORES: Row[] = [
  { id: '10', name: 'Harbour Street', city: 'Porto' },
  { id: '20', name: 'Market Square', city: 'Braga' },
];

export function tablesWith(sales: Row[]): SourceTables {
  return { sales, product: PRODUCTS, brand: BRANDS, store: STORES };
}

export const RAMP = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];

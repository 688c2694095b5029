export function sum(arr: readonly number[]): number {
  return arr.reduce((a, b) => a + b, 0);
}

export function mean(arr: readonly number[]): number {
  if (arr.length === 0) return 0;
  return sum(arr) / arr.length;
}

const idCollator = new Intl.Collator('en', { numeric: true });

/**
 * Compare identifiers so that "2" sorts before "10" and "P2" before "P10".
 * Distinct ids the collator treats as equal ("01" and "1") fall back to code-unit order.
 */
export function compareIds(a: string, b: string): number {
  return idCollator.compare(a, b) || (a < b ? -1 : a > b ? 1 : 0);
}

/** Unambiguous map key for a tuple of identifiers. */
export function groupKey(...parts: string[]): string {
  return JSON.stringify(parts);
}

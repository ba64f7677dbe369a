/**
 * Minute aggregator helpers
 */

/**
 * Median of a non-empty list; mean of the two middle values for even counts
 *
 * @param values - Samples, any order
 * @returns Median value
 */
export function median(values: readonly number[]): number {
  const sorted = [...values].sort(function(a, b) {
    return a - b;
  });
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 0) {
    return (sorted[mid - 1] + sorted[mid]) / 2;
  }
  return sorted[mid];
}

/**
 * Column names derived from one field
 */
export function aggregateColumns(field: string): [string, string, string] {
  return [field + '_min', field + '_max', field + '_median'];
}

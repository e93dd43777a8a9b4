/**
 * Growth series data structures
 */

export interface GrowthPoint {
  month: number;
  value: number;
}

/**
 * Value at the final month of a series, or 0 for an empty series.
 */
export function finalValue(points: readonly GrowthPoint[]): number {
  return points.length > 0 ? points[points.length - 1].value : 0;
}

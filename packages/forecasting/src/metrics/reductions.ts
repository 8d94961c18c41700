/**
 * Reductions applied across components (`reduction`) and across series
 * (`interReduction`).
 */

export type Reduction = (values: number[]) => number;

export type InterReduction = (values: number[]) => number | number[];

export const mean: Reduction = values =>
  values.length === 0 ? NaN : values.reduce((a, b) => a + b, 0) / values.length;

export const median: Reduction = values => {
  if (values.length === 0) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
};

export const identity: InterReduction = values => values;

export function sum(values: readonly number[]): number {
  return values.reduce((a, b) => a + b, 0);
}

/**
 * Metric input classification and coercion
 *
 * Inputs are tagged once at the boundary; everything downstream matches on
 * the tag.
 */

import { DataTable, IndexedSeries, TimeSeries } from '@tsforge/core';
import {
  NormalizationError,
  TypeMismatchError,
  UnsupportedShapeError,
} from '../errors.js';

/**
 * Representations accepted from callers
 */
export type MetricInput = readonly number[] | IndexedSeries | DataTable;

export type InputRole = 'actual' | 'predicted' | 'insample';

export type ClassifiedInput =
  | { kind: 'array'; values: readonly number[] }
  | { kind: 'indexed'; series: IndexedSeries }
  | { kind: 'table'; table: DataTable };

export type InputKind = ClassifiedInput['kind'];

/** A classified input after any table has been squeezed */
export type SeriesInput = Exclude<ClassifiedInput, { kind: 'table' }>;

export function classifyInput(input: MetricInput, role: InputRole): ClassifiedInput {
  if (input instanceof IndexedSeries) {
    return { kind: 'indexed', series: input };
  }
  if (input instanceof DataTable) {
    return { kind: 'table', table: input };
  }
  if (Array.isArray(input) && input.every((value: unknown) => typeof value === 'number')) {
    return { kind: 'array', values: input };
  }
  throw new TypeMismatchError(
    `${role} must be a numeric array, an IndexedSeries or a DataTable`,
    { role }
  );
}

/**
 * Reduce a single-column table to an indexed series
 */
export function squeezeInput(input: ClassifiedInput): SeriesInput {
  if (input.kind !== 'table') {
    return input;
  }
  if (input.table.columnCount !== 1) {
    throw new UnsupportedShapeError(input.table.columnCount);
  }
  return { kind: 'indexed', series: input.table.squeeze() };
}

export function hasDatetimeIndex(input: SeriesInput): boolean {
  return input.kind === 'indexed' && input.series.isDatetimeIndex();
}

/**
 * Build the canonical series. Positional unless every input in the call
 * carries a datetime index, in which case values are ordered by date.
 * Duplicate dates fail with NormalizationError.
 */
export function toCanonical(input: SeriesInput, isDatetimeIndex: boolean): TimeSeries {
  if (input.kind === 'array') {
    return TimeSeries.fromValues(input.values);
  }
  if (!isDatetimeIndex) {
    return TimeSeries.fromValues(input.series.values);
  }

  const { series } = input;
  const timestamps = series.index.filter((label): label is Date => label instanceof Date);
  if (timestamps.length !== series.length) {
    throw new NormalizationError('Series was classified as datetime-indexed but has non-date labels', {
      labels: series.length,
      dates: timestamps.length,
    });
  }

  const order = timestamps
    .map((_, i) => i)
    .sort((a, b) => timestamps[a].getTime() - timestamps[b].getTime());

  try {
    return TimeSeries.fromSeries(
      order.map(i => series.values[i]),
      order.map(i => timestamps[i])
    );
  } catch (error) {
    throw new NormalizationError(
      `Cannot build a time-indexed series: ${error instanceof Error ? error.message : String(error)}`,
      { name: series.name }
    );
  }
}

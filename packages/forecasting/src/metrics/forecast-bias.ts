/**
 * Forecast Bias (FB)
 *
 * Percentage by which the predicted total falls short of the actual total:
 *
 *   100 * (sum(actual) - sum(predicted)) / sum(actual)
 *
 * Positive values mean under-forecasting.
 */

import { TimeSeries } from '@tsforge/core';
import { InvalidSeriesError, TypeMismatchError, ZeroBaselineError } from '../errors.js';
import { defineMetric, getValuesOrRaise, removeNanUnion, type MetricResult } from './metrics.js';
import { identity, mean, sum, type InterReduction, type Reduction } from './reductions.js';

export type BiasOperand = readonly number[] | TimeSeries | readonly TimeSeries[];

export interface ForecastBiasOptions {
  /** Restrict time-indexed series to their common span (default true) */
  intersect?: boolean;
  reduction?: Reduction;
  interReduction?: InterReduction;
}

type ClassifiedOperand =
  | { kind: 'array'; values: readonly number[] }
  | { kind: 'series'; series: TimeSeries }
  | { kind: 'sequence'; series: readonly TimeSeries[] };

/**
 * Bias over already aligned, NaN-free values
 */
export function biasValue(actual: readonly number[], predicted: readonly number[]): number {
  const actualSum = sum(actual);
  if (actualSum === 0) {
    throw new ZeroBaselineError('The actual values cannot sum to zero when computing forecast bias', {
      points: actual.length,
    });
  }
  return ((actualSum - sum(predicted)) / actualSum) * 100;
}

function classifyOperand(operand: BiasOperand, role: 'actual' | 'predicted'): ClassifiedOperand {
  if (operand instanceof TimeSeries) {
    return { kind: 'series', series: operand };
  }
  if (isSeriesSequence(operand)) {
    return { kind: 'sequence', series: operand };
  }
  if (isNumberArray(operand)) {
    return { kind: 'array', values: operand };
  }
  throw new TypeMismatchError(`${role} must be a numeric array, a TimeSeries or a sequence of TimeSeries`, {
    role,
  });
}

function isSeriesSequence(operand: readonly number[] | readonly TimeSeries[]): operand is readonly TimeSeries[] {
  const items: readonly unknown[] = operand;
  return items.length > 0 && items.every(item => item instanceof TimeSeries);
}

function isNumberArray(operand: readonly number[] | readonly TimeSeries[]): operand is readonly number[] {
  const items: readonly unknown[] = operand;
  return items.every(item => typeof item === 'number');
}

/**
 * Forecast bias of predicted against actual values.
 *
 * Both sides must be raw arrays, or both canonical series (or sequences of
 * them). Positions where either side is NaN are dropped together.
 *
 * @throws TypeMismatchError when the two sides differ in representation
 * @throws ZeroBaselineError when the retained actual values sum to zero
 */
export function forecastBias(
  actual: BiasOperand,
  predicted: BiasOperand,
  options: ForecastBiasOptions = {}
): MetricResult {
  const intersect = options.intersect ?? true;
  const reduction = options.reduction ?? mean;
  const interReduction = options.interReduction ?? identity;

  const a = classifyOperand(actual, 'actual');
  const p = classifyOperand(predicted, 'predicted');
  if (a.kind !== p.kind) {
    throw new TypeMismatchError('actual and predicted should be of the same type', {
      actual: a.kind,
      predicted: p.kind,
    });
  }

  if (a.kind === 'array' && p.kind === 'array') {
    const [actualValues, predValues] = removeNanUnion(a.values, p.values);
    return reduction([biasValue(actualValues, predValues)]);
  }

  if (a.kind === 'series' && p.kind === 'series') {
    const [actualValues, predValues] = getValuesOrRaise(a.series, p.series, intersect);
    return reduction([biasValue(actualValues, predValues)]);
  }

  if (a.kind === 'sequence' && p.kind === 'sequence') {
    if (a.series.length !== p.series.length) {
      throw new InvalidSeriesError(
        `Got ${a.series.length} actual series and ${p.series.length} predicted series`
      );
    }
    const perSeries = a.series.map((series, i) => {
      const [actualValues, predValues] = getValuesOrRaise(series, p.series[i], intersect);
      return reduction([biasValue(actualValues, predValues)]);
    });
    return interReduction(perSeries);
  }

  throw new TypeMismatchError('actual and predicted should be of the same type');
}

/** Forecast bias as a metric over canonical series */
export const forecastBiasMetric = defineMetric('forecast_bias', (actual, predicted) =>
  biasValue(actual, predicted)
);

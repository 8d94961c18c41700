/**
 * Metric Family
 *
 * Accuracy metrics over canonical series. Every metric accepts a
 * MetricInvocation: a single actual/predicted pair yields
 * `reduction(componentValues)`, sequences of pairs yield
 * `interReduction(perSeriesValues)`.
 */

import { getLogger, type Logger, type TimeSeries } from '@tsforge/core';
import {
  IndexMismatchError,
  InvalidSeriesError,
  ZeroBaselineError,
} from '../errors.js';
import { mean, type InterReduction, type Reduction } from './reductions.js';

// =============================================================================
// Types
// =============================================================================

export type SeriesOrSequence = TimeSeries | readonly TimeSeries[];

export type MetricResult = number | number[];

/**
 * Parameters forwarded to a metric function. `insample` and `m` are only
 * present for index-dependent metrics.
 */
export interface MetricInvocation {
  actualSeries: SeriesOrSequence;
  predSeries: SeriesOrSequence;
  insample?: SeriesOrSequence;
  /** Seasonality period of the naive baseline */
  m?: number;
  /** Compare only over the time span both series cover */
  intersect: boolean;
  reduction: Reduction;
  interReduction: InterReduction;
  /** Batch parallelism hint; -1 means all available */
  parallelism: number;
  verbose: boolean;
  logger?: Logger;
}

export interface MetricFunction {
  (invocation: MetricInvocation): MetricResult;
  readonly metricName: string;
}

/**
 * Per-pair context handed to a pairwise metric
 */
export interface PairContext {
  /** Actual series after alignment, before NaN removal */
  actual: TimeSeries;
  insample?: TimeSeries;
  m?: number;
}

export type PairwiseMetric = (actual: number[], predicted: number[], context: PairContext) => number;

/**
 * Metrics whose definition needs genuine chronological ordering
 */
export const INDEX_DEPENDENT_METRICS: ReadonlySet<string> = new Set(['mase']);

export function isIndexDependent(metric: Pick<MetricFunction, 'metricName'>): boolean {
  return INDEX_DEPENDENT_METRICS.has(metric.metricName);
}

// =============================================================================
// Alignment helpers
// =============================================================================

/**
 * Drop every position where either side is NaN, keeping the pair aligned
 */
export function removeNanUnion(
  actual: readonly number[],
  predicted: readonly number[]
): [number[], number[]] {
  if (actual.length !== predicted.length) {
    throw new InvalidSeriesError(
      `Actual and predicted values differ in length (${actual.length} vs ${predicted.length})`
    );
  }

  const keptActual: number[] = [];
  const keptPredicted: number[] = [];
  for (let i = 0; i < actual.length; i++) {
    if (Number.isNaN(actual[i]) || Number.isNaN(predicted[i])) continue;
    keptActual.push(actual[i]);
    keptPredicted.push(predicted[i]);
  }
  return [keptActual, keptPredicted];
}

/**
 * Align two canonical series by time and return both, sharing one index
 */
export function alignSeries(
  actual: TimeSeries,
  predicted: TimeSeries,
  intersect: boolean
): [TimeSeries, TimeSeries] {
  if (actual.timeIndex.kind !== predicted.timeIndex.kind) {
    throw new IndexMismatchError('Cannot compare a datetime-indexed series with a positional one', {
      actualIndex: actual.timeIndex.kind,
      predictedIndex: predicted.timeIndex.kind,
    });
  }

  if (!intersect) {
    if (!actual.hasSameTimeIndex(predicted)) {
      throw new IndexMismatchError(
        'Series must share the same time index when intersect is disabled'
      );
    }
    return [actual, predicted];
  }

  const a = actual.sliceIntersect(predicted);
  const p = predicted.sliceIntersect(actual);
  if (a.length === 0) {
    throw new IndexMismatchError('Actual and predicted series do not overlap in time');
  }
  if (!a.hasSameTimeIndex(p)) {
    throw new IndexMismatchError('Series cover the same span but are sampled at different times');
  }
  return [a, p];
}

/**
 * Values of an aligned pair with NaN positions removed
 */
export function getValuesOrRaise(
  actual: TimeSeries,
  predicted: TimeSeries,
  intersect: boolean
): [number[], number[]] {
  const [a, p] = alignSeries(actual, predicted, intersect);
  return removeNanUnion(a.values(), p.values());
}

function isSequence(series: SeriesOrSequence): series is readonly TimeSeries[] {
  return Array.isArray(series);
}

function toSequence(series: SeriesOrSequence): readonly TimeSeries[] {
  return isSequence(series) ? series : [series];
}

// =============================================================================
// Metric factory
// =============================================================================

/**
 * Wrap a pairwise computation into a MetricFunction
 */
export function defineMetric(metricName: string, pairwise: PairwiseMetric): MetricFunction {
  const metric = (invocation: MetricInvocation): MetricResult => {
    const logger = invocation.logger ?? getLogger();
    const batched = isSequence(invocation.actualSeries);
    if (batched !== isSequence(invocation.predSeries)) {
      throw new InvalidSeriesError('actualSeries and predSeries must both be single series or both sequences');
    }

    const actualList = toSequence(invocation.actualSeries);
    const predList = toSequence(invocation.predSeries);
    const insampleList = invocation.insample === undefined ? undefined : toSequence(invocation.insample);

    if (actualList.length !== predList.length) {
      throw new InvalidSeriesError(
        `Got ${actualList.length} actual series and ${predList.length} predicted series`
      );
    }
    if (insampleList && insampleList.length !== actualList.length) {
      throw new InvalidSeriesError(
        `Got ${insampleList.length} insample series for ${actualList.length} actual series`
      );
    }

    const perSeries = actualList.map((actualSeries, i) => {
      const start = Date.now();
      const [a, p] = alignSeries(actualSeries, predList[i], invocation.intersect);
      const [actualValues, predValues] = removeNanUnion(a.values(), p.values());
      const componentValue = pairwise(actualValues, predValues, {
        actual: a,
        insample: insampleList?.[i],
        m: invocation.m,
      });
      const reduced = invocation.reduction([componentValue]);

      if (invocation.verbose) {
        logger.metricComputed(metricName, Date.now() - start, {
          seriesIndex: i,
          seriesCount: actualList.length,
          points: actualValues.length,
        });
      }
      return reduced;
    });

    return batched ? invocation.interReduction(perSeries) : perSeries[0];
  };

  return Object.assign(metric, { metricName });
}

// =============================================================================
// Metrics
// =============================================================================

/** Mean Absolute Error */
export const mae = defineMetric('mae', (actual, predicted) =>
  mean(actual.map((a, i) => Math.abs(a - predicted[i])))
);

/** Mean Squared Error */
export const mse = defineMetric('mse', (actual, predicted) =>
  mean(actual.map((a, i) => (a - predicted[i]) ** 2))
);

/** Root Mean Squared Error */
export const rmse = defineMetric('rmse', (actual, predicted) =>
  Math.sqrt(mean(actual.map((a, i) => (a - predicted[i]) ** 2)))
);

/** Mean Absolute Percentage Error */
export const mape = defineMetric('mape', (actual, predicted) => {
  if (actual.some(a => a === 0)) {
    throw new ZeroBaselineError('Actual values must be non-zero to compute MAPE');
  }
  return 100 * mean(actual.map((a, i) => Math.abs((a - predicted[i]) / a)));
});

/**
 * Mean Absolute Scaled Error
 *
 * Scales the MAE by the in-sample error of a seasonal naive forecast
 * with period `m`. The insample series must end before the actual series
 * starts.
 */
export const mase = defineMetric('mase', (actual, predicted, context) => {
  const { insample, m } = context;
  if (!insample || m === undefined) {
    throw new InvalidSeriesError('MASE requires an insample series and a seasonality period m');
  }

  const insampleEnd = insample.endTime();
  const actualStart = context.actual.startTime();
  if (insampleEnd === undefined || actualStart === undefined || insampleEnd >= actualStart) {
    throw new IndexMismatchError('The insample series must end before the actual series starts', {
      insampleEnd,
      actualStart,
    });
  }

  const history = insample.values();
  if (history.length <= m) {
    throw new InvalidSeriesError(
      `Insample series needs more than m=${m} values, got ${history.length}`
    );
  }

  const naiveErrors: number[] = [];
  for (let t = m; t < history.length; t++) {
    const error = Math.abs(history[t] - history[t - m]);
    if (!Number.isNaN(error)) naiveErrors.push(error);
  }
  if (naiveErrors.length === 0) {
    throw new InvalidSeriesError(
      `Insample series has no pair of values m=${m} steps apart without NaN`,
      { m, insampleLength: history.length }
    );
  }
  const scale = mean(naiveErrors);
  if (scale === 0) {
    throw new ZeroBaselineError('Seasonal naive error on the insample series is zero; MASE is undefined', { m });
  }

  return mean(actual.map((a, i) => Math.abs(a - predicted[i]))) / scale;
});

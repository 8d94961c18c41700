/**
 * Tests for the metric input adapter
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, DataTable, IndexedSeries, TimeSeries } from '@tsforge/core';
import {
  evaluate,
  evaluateBatch,
  mae,
  mape,
  mase,
  mean,
  normalizePair,
  type MetricInput,
  type MetricInvocation,
  type MetricResult,
} from '../metrics/index.js';
import {
  IndexMismatchError,
  InvalidOptionsError,
  InvalidSeriesError,
  MissingDatetimeIndexError,
  NormalizationError,
  TypeMismatchError,
  UnsupportedShapeError,
  ZeroBaselineError,
} from '../errors.js';

// =============================================================================
// Helpers
// =============================================================================

const day = (d: number): Date => new Date(Date.UTC(2024, 0, d));

const days = (from: number, count: number): Date[] =>
  Array.from({ length: count }, (_, i) => day(from + i));

const quietLogger = createLogger('adapter-test', { minSeverity: 'EMERGENCY' });

function spyMetric(metricName: string, result: MetricResult = 0) {
  const fn = vi.fn((_invocation: MetricInvocation): MetricResult => result);
  return Object.assign(fn, { metricName });
}

function firstInvocation(metric: ReturnType<typeof spyMetric>): MetricInvocation {
  return metric.mock.calls[0][0];
}

afterEach(() => {
  vi.restoreAllMocks();
});

// =============================================================================
// Representation checks
// =============================================================================

describe('evaluate - representation kinds', () => {
  const array: MetricInput = [1, 2, 3];
  const indexed: MetricInput = new IndexedSeries([1, 2, 3], days(1, 3));
  const table: MetricInput = new DataTable({ y: [1, 2, 3] }, days(1, 3));

  it.each([
    ['array', 'indexed', array, indexed],
    ['indexed', 'array', indexed, array],
    ['array', 'table', array, table],
    ['table', 'array', table, array],
    ['indexed', 'table', indexed, table],
    ['table', 'indexed', table, indexed],
  ])('should reject %s actual with %s predicted', (_a, _p, actual, predicted) => {
    expect(() => evaluate(mae, actual, predicted, { logger: quietLogger })).toThrow(TypeMismatchError);
  });

  it('should reject an insample of a different kind', () => {
    expect(() =>
      evaluate(mae, [1, 2, 3], [1, 2, 3], { insample: new IndexedSeries([1, 2]), logger: quietLogger })
    ).toThrow(TypeMismatchError);
  });

  it('should check kinds before table shape', () => {
    const wide = new DataTable({ a: [1, 2], b: [3, 4] });

    expect(() => evaluate(mae, wide, [1, 2], { logger: quietLogger })).toThrow(TypeMismatchError);
  });

  it('should compute on raw arrays', () => {
    expect(evaluate(mae, [1, 2, 3], [2, 2, 5], { logger: quietLogger })).toBe(1);
  });
});

// =============================================================================
// Tables
// =============================================================================

describe('evaluate - tables', () => {
  it('should treat a single-column table like the equivalent indexed series', () => {
    const dates = days(1, 3);
    const fromTables = evaluate(
      mae,
      new DataTable({ y: [1, 2, 3] }, dates),
      new DataTable({ y: [2, 2, 5] }, dates),
      { logger: quietLogger }
    );
    const fromSeries = evaluate(
      mae,
      new IndexedSeries([1, 2, 3], dates),
      new IndexedSeries([2, 2, 5], dates),
      { logger: quietLogger }
    );

    expect(fromTables).toBe(1);
    expect(fromTables).toBe(fromSeries);
  });

  it('should forward squeezed tables as time-indexed series', () => {
    const metric = spyMetric('mae');
    const dates = days(1, 2);

    evaluate(metric, new DataTable({ y: [1, 2] }, dates), new DataTable({ y: [1, 2] }, dates), {
      logger: quietLogger,
    });

    const invocation = firstInvocation(metric);
    expect(invocation.actualSeries).toBeInstanceOf(TimeSeries);
    if (invocation.actualSeries instanceof TimeSeries) {
      expect(invocation.actualSeries.hasDatetimeIndex).toBe(true);
      expect(invocation.actualSeries.values()).toEqual([1, 2]);
    }
  });

  it('should reject tables with two columns', () => {
    const wide = new DataTable({ a: [1, 2], b: [3, 4] });

    expect(() => evaluate(mae, wide, wide, { logger: quietLogger })).toThrow(UnsupportedShapeError);
  });
});

// =============================================================================
// Datetime index handling
// =============================================================================

describe('evaluate - datetime index', () => {
  it('should coerce indexed series without a datetime index to positional form', () => {
    const metric = spyMetric('mae');

    evaluate(metric, new IndexedSeries([1, 2], [10, 20]), new IndexedSeries([1, 2], [10, 20]), {
      logger: quietLogger,
    });

    const invocation = firstInvocation(metric);
    expect(invocation.actualSeries).toBeInstanceOf(TimeSeries);
    if (invocation.actualSeries instanceof TimeSeries) {
      expect(invocation.actualSeries.hasDatetimeIndex).toBe(false);
    }
  });

  it('should order datetime-indexed series by date', () => {
    const shuffled = [day(3), day(1), day(2)];
    const fromShuffled = evaluate(
      mae,
      new IndexedSeries([3, 1, 2], shuffled),
      new IndexedSeries([5, 2, 2], shuffled),
      { logger: quietLogger }
    );
    const fromSorted = evaluate(
      mae,
      new IndexedSeries([1, 2, 3], days(1, 3)),
      new IndexedSeries([2, 2, 5], days(1, 3)),
      { logger: quietLogger }
    );

    expect(fromShuffled).toBe(1);
    expect(fromShuffled).toBe(fromSorted);
  });

  it('should forward date-ordered values and timestamps', () => {
    const metric = spyMetric('mae');
    const shuffled = [day(3), day(1), day(2)];

    evaluate(metric, new IndexedSeries([3, 1, 2], shuffled), new IndexedSeries([3, 1, 2], shuffled), {
      logger: quietLogger,
    });

    const invocation = firstInvocation(metric);
    expect(invocation.actualSeries).toBeInstanceOf(TimeSeries);
    if (invocation.actualSeries instanceof TimeSeries) {
      expect(invocation.actualSeries.values()).toEqual([1, 2, 3]);
      expect(invocation.actualSeries.keys()).toEqual(days(1, 3).map(d => d.getTime()));
    }
  });

  it('should reject duplicate dates', () => {
    const repeated = [day(1), day(1)];

    expect(() =>
      evaluate(mae, new IndexedSeries([1, 2], repeated), new IndexedSeries([1, 2], repeated), {
        logger: quietLogger,
      })
    ).toThrow(NormalizationError);
  });

  it('should use positional form when only one side has dates', () => {
    const pair = normalizePair(
      mae,
      new IndexedSeries([1, 2], days(1, 2)),
      new IndexedSeries([1, 2], [0, 1])
    );

    expect(pair.isDatetimeIndex).toBe(false);
    expect(pair.actual.hasDatetimeIndex).toBe(false);
    expect(pair.predicted.hasDatetimeIndex).toBe(false);
    expect(pair.insample).toBeUndefined();
  });

  it('should require a datetime index for mase', () => {
    expect(() =>
      evaluate(mase, [1, 2, 3], [1, 2, 3], { insample: [1, 2, 3], logger: quietLogger })
    ).toThrow(MissingDatetimeIndexError);

    expect(() =>
      evaluate(mase, new IndexedSeries([1, 2]), new IndexedSeries([1, 2]), { logger: quietLogger })
    ).toThrow(MissingDatetimeIndexError);
  });

  it('should require the insample to carry a datetime index too', () => {
    expect(() =>
      evaluate(mase, new IndexedSeries([1, 2], days(5, 2)), new IndexedSeries([1, 2], days(5, 2)), {
        insample: new IndexedSeries([1, 2, 3, 4]),
        logger: quietLogger,
      })
    ).toThrow(MissingDatetimeIndexError);
  });

  it('should forward insample and m to index-dependent metrics', () => {
    const metric = spyMetric('mase', 0.25);

    const result = evaluate(
      metric,
      new IndexedSeries([7, 8], days(7, 2)),
      new IndexedSeries([8, 10], days(7, 2)),
      { insample: new IndexedSeries([1, 2, 3, 4, 5, 6], days(1, 6)), m: 4, logger: quietLogger }
    );

    expect(result).toBe(0.25);
    const invocation = firstInvocation(metric);
    expect(invocation.m).toBe(4);
    expect(invocation.insample).toBeInstanceOf(TimeSeries);
    if (invocation.insample instanceof TimeSeries) {
      expect(invocation.insample.hasDatetimeIndex).toBe(true);
      expect(invocation.insample.values()).toEqual([1, 2, 3, 4, 5, 6]);
    }
  });

  it('should omit insample and m for other metrics', () => {
    const metric = spyMetric('mae');

    evaluate(metric, [1, 2], [1, 2], { insample: [0, 1], m: 3, logger: quietLogger });

    const invocation = firstInvocation(metric);
    expect('insample' in invocation).toBe(false);
    expect('m' in invocation).toBe(false);
  });

  it('should compute mase end to end', () => {
    const result = evaluate(
      mase,
      new IndexedSeries([7, 8], days(7, 2)),
      new IndexedSeries([8, 10], days(7, 2)),
      { insample: new IndexedSeries([1, 2, 3, 4, 5, 6], days(1, 6)), m: 1, logger: quietLogger }
    );

    // naive in-sample error is 1, forecast MAE is 1.5
    expect(result).toBe(1.5);
  });

  it('should reject an insample overlapping the actual series', () => {
    expect(() =>
      evaluate(mase, new IndexedSeries([5, 6], days(5, 2)), new IndexedSeries([5, 6], days(5, 2)), {
        insample: new IndexedSeries([1, 2, 3, 4, 5, 6], days(1, 6)),
        logger: quietLogger,
      })
    ).toThrow(IndexMismatchError);
  });
});

// =============================================================================
// Forwarded options
// =============================================================================

describe('evaluate - options', () => {
  it('should forward defaults', () => {
    const metric = spyMetric('mae');

    evaluate(metric, [1], [1], { logger: quietLogger });

    const invocation = firstInvocation(metric);
    expect(invocation.intersect).toBe(true);
    expect(invocation.parallelism).toBe(1);
    expect(invocation.verbose).toBe(false);
    expect(invocation.reduction).toBe(mean);
    expect(invocation.interReduction([1, 2])).toEqual([1, 2]);
  });

  it('should compare only the overlap when intersect is on', () => {
    expect(evaluate(mae, [1, 2, 3], [1, 2], { logger: quietLogger })).toBe(0);
  });

  it('should require identical indices when intersect is off', () => {
    expect(() => evaluate(mae, [1, 2, 3], [1, 2], { intersect: false, logger: quietLogger })).toThrow(
      IndexMismatchError
    );
  });

  it('should reject invalid m and parallelism', () => {
    expect(() => evaluate(mae, [1], [1], { m: 0, logger: quietLogger })).toThrow(InvalidOptionsError);
    expect(() => evaluate(mae, [1], [1], { parallelism: 0, logger: quietLogger })).toThrow(
      InvalidOptionsError
    );
  });

  it('should accept -1 as parallelism', () => {
    const metric = spyMetric('mae');

    evaluate(metric, [1], [1], { parallelism: -1, logger: quietLogger });

    expect(firstInvocation(metric).parallelism).toBe(-1);
  });

  it('should not mutate caller data', () => {
    const actual = [3, NaN, 5];
    const predicted = [1, 2, NaN];

    evaluate(mae, actual, predicted, { logger: quietLogger });

    expect(actual).toEqual([3, NaN, 5]);
    expect(predicted).toEqual([1, 2, NaN]);
  });
});

// =============================================================================
// Logging
// =============================================================================

describe('evaluate - logging', () => {
  it('should log validation failures as warnings', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createLogger('adapter-test', { minSeverity: 'DEBUG', prettyPrint: false });

    expect(() => evaluate(mae, [1, 2], new IndexedSeries([1, 2]), { logger })).toThrow(TypeMismatchError);

    expect(warnSpy).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(warnSpy.mock.calls[0][0]));
    expect(entry.eventName).toBe('validation.failure');
    expect(entry.metricName).toBe('mae');
    expect(entry.error.code).toBe('FC_2001');
  });

  it('should log metric failures separately from validation failures', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger('adapter-test', { minSeverity: 'DEBUG', prettyPrint: false });

    expect(() => evaluate(mape, [0, 2], [1, 2], { logger })).toThrow(ZeroBaselineError);

    expect(warnSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(errorSpy.mock.calls[0][0]));
    expect(entry.eventName).toBe('metric.failure');
    expect(entry.metricName).toBe('mape');
    expect(entry.error.code).toBe('FC_3001');
  });

  it('should log dispatch and computation when verbose', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = createLogger('adapter-test', { minSeverity: 'DEBUG', prettyPrint: false });

    evaluate(mae, [1, 2], [1, 3], { verbose: true, logger });

    const messages = logSpy.mock.calls.map(call => JSON.parse(String(call[0])).message);
    expect(messages).toEqual(['Dispatching metric', 'Metric computed']);
  });
});

// =============================================================================
// Batches
// =============================================================================

describe('evaluateBatch', () => {
  const pairs = [
    { actual: [1, 2], predicted: [1, 3] },
    { actual: [4, 4], predicted: [2, 2] },
  ];

  it('should return per-pair results in input order', () => {
    expect(evaluateBatch(mae, pairs, { logger: quietLogger })).toEqual([0.5, 2]);
  });

  it('should apply the inter-series reduction', () => {
    expect(evaluateBatch(mae, pairs, { interReduction: mean, logger: quietLogger })).toBe(1.25);
  });

  it('should forward sequences of canonical series', () => {
    const metric = spyMetric('mae', [0, 0]);

    evaluateBatch(metric, pairs, { parallelism: 2, logger: quietLogger });

    const invocation = firstInvocation(metric);
    expect(Array.isArray(invocation.actualSeries)).toBe(true);
    expect(invocation.parallelism).toBe(2);
  });

  it('should validate each pair', () => {
    expect(() =>
      evaluateBatch(mae, [...pairs, { actual: [1], predicted: new IndexedSeries([1]) }], {
        logger: quietLogger,
      })
    ).toThrow(TypeMismatchError);
  });

  it('should reject an empty batch', () => {
    expect(() => evaluateBatch(mae, [], { logger: quietLogger })).toThrow(InvalidSeriesError);
  });

  it('should require insample on every pair or none', () => {
    const metric = spyMetric('mase');
    const withInsample = {
      actual: new IndexedSeries([1], days(5, 1)),
      predicted: new IndexedSeries([1], days(5, 1)),
      insample: new IndexedSeries([1, 2], days(1, 2)),
    };
    const withoutInsample = {
      actual: new IndexedSeries([1], days(5, 1)),
      predicted: new IndexedSeries([1], days(5, 1)),
    };

    expect(() =>
      evaluateBatch(metric, [withInsample, withoutInsample], { logger: quietLogger })
    ).toThrow(InvalidSeriesError);
  });
});

/**
 * Metric Adapter
 *
 * Normalizes numeric arrays, indexed series and single-column tables into
 * canonical series, checks they are compatible with the requested metric,
 * and forwards a uniform MetricInvocation.
 *
 * @example
 * ```typescript
 * import { evaluate, mase } from '@tsforge/forecasting';
 *
 * const score = evaluate(mase, actual, predicted, { insample: history, m: 7 });
 * ```
 */

import { z } from 'zod';
import { getLogger, type Logger, type TimeSeries } from '@tsforge/core';
import {
  ForecastingError,
  InvalidOptionsError,
  InvalidSeriesError,
  MissingDatetimeIndexError,
  TypeMismatchError,
} from '../errors.js';
import {
  classifyInput,
  hasDatetimeIndex,
  squeezeInput,
  toCanonical,
  type MetricInput,
  type SeriesInput,
} from './inputs.js';
import {
  isIndexDependent,
  type MetricFunction,
  type MetricInvocation,
  type MetricResult,
} from './metrics.js';
import { identity, mean, type InterReduction, type Reduction } from './reductions.js';

// =============================================================================
// Options
// =============================================================================

export const EvaluateOptionsSchema = z.object({
  /** Seasonality period forwarded to index-dependent metrics */
  m: z.number().int().min(1).default(1),
  intersect: z.boolean().default(true),
  parallelism: z.number().int().refine(n => n >= 1 || n === -1, {
    message: 'parallelism must be a positive integer or -1',
  }).default(1),
  verbose: z.boolean().default(false),
});

export interface EvaluateOptions extends Partial<z.input<typeof EvaluateOptionsSchema>> {
  insample?: MetricInput;
  reduction?: Reduction;
  interReduction?: InterReduction;
  logger?: Logger;
}

export interface BatchPair {
  actual: MetricInput;
  predicted: MetricInput;
  insample?: MetricInput;
}

export type BatchEvaluateOptions = Omit<EvaluateOptions, 'insample'>;

/**
 * Canonical inputs for one actual/predicted pair
 */
export interface NormalizedPair {
  actual: TimeSeries;
  predicted: TimeSeries;
  insample?: TimeSeries;
  isDatetimeIndex: boolean;
}

// =============================================================================
// Normalization
// =============================================================================

/**
 * Validate and coerce one pair, in order:
 * representation kinds, table shape, datetime index, canonical form.
 */
export function normalizePair(
  metric: Pick<MetricFunction, 'metricName'>,
  actual: MetricInput,
  predicted: MetricInput,
  insample?: MetricInput
): NormalizedPair {
  const actualInput = classifyInput(actual, 'actual');
  const predictedInput = classifyInput(predicted, 'predicted');
  if (actualInput.kind !== predictedInput.kind) {
    throw new TypeMismatchError('actual and predicted should be of the same type', {
      actual: actualInput.kind,
      predicted: predictedInput.kind,
    });
  }

  const insampleInput = insample === undefined ? undefined : classifyInput(insample, 'insample');
  if (insampleInput && insampleInput.kind !== actualInput.kind) {
    throw new TypeMismatchError('actual and insample should be of the same type', {
      actual: actualInput.kind,
      insample: insampleInput.kind,
    });
  }

  const inputs: SeriesInput[] = [squeezeInput(actualInput), squeezeInput(predictedInput)];
  if (insampleInput) {
    inputs.push(squeezeInput(insampleInput));
  }

  const isDatetimeIndex = inputs.every(hasDatetimeIndex);
  if (isIndexDependent(metric) && !isDatetimeIndex) {
    throw new MissingDatetimeIndexError(metric.metricName);
  }

  const canonical = inputs.map(input => toCanonical(input, isDatetimeIndex));

  return {
    actual: canonical[0],
    predicted: canonical[1],
    insample: insampleInput ? canonical[2] : undefined,
    isDatetimeIndex,
  };
}

type ParsedOptions = z.output<typeof EvaluateOptionsSchema>;

function parseOptions(options: BatchEvaluateOptions): ParsedOptions {
  const parsed = EvaluateOptionsSchema.safeParse({
    m: options.m,
    intersect: options.intersect,
    parallelism: options.parallelism,
    verbose: options.verbose,
  });
  if (!parsed.success) {
    throw new InvalidOptionsError(`Invalid metric options: ${parsed.error.message}`, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

function buildInvocation(
  metric: MetricFunction,
  series: Pick<MetricInvocation, 'actualSeries' | 'predSeries' | 'insample'>,
  parsed: ParsedOptions,
  options: BatchEvaluateOptions,
  logger: Logger
): MetricInvocation {
  const invocation: MetricInvocation = {
    actualSeries: series.actualSeries,
    predSeries: series.predSeries,
    intersect: parsed.intersect,
    reduction: options.reduction ?? mean,
    interReduction: options.interReduction ?? identity,
    parallelism: parsed.parallelism,
    verbose: parsed.verbose,
    logger,
  };

  if (isIndexDependent(metric)) {
    invocation.insample = series.insample;
    invocation.m = parsed.m;
  }
  return invocation;
}

function withValidationLogging<T>(logger: Logger, metricName: string, run: () => T): T {
  try {
    return run();
  } catch (error) {
    if (error instanceof ForecastingError) {
      logger.validationFailed(error.code, error, { metricName });
    }
    throw error;
  }
}

function runMetric(metric: MetricFunction, invocation: MetricInvocation, logger: Logger): MetricResult {
  try {
    return metric(invocation);
  } catch (error) {
    logger.metricFailed(metric.metricName, error);
    throw error;
  }
}

// =============================================================================
// Dispatch
// =============================================================================

/**
 * Evaluate `metric` on one actual/predicted pair
 */
export function evaluate(
  metric: MetricFunction,
  actual: MetricInput,
  predicted: MetricInput,
  options: EvaluateOptions = {}
): MetricResult {
  const logger = options.logger ?? getLogger();

  const { parsed, pair } = withValidationLogging(logger, metric.metricName, () => ({
    parsed: parseOptions(options),
    pair: normalizePair(metric, actual, predicted, options.insample),
  }));
  const invocation = buildInvocation(
    metric,
    { actualSeries: pair.actual, predSeries: pair.predicted, insample: pair.insample },
    parsed,
    options,
    logger
  );

  if (parsed.verbose) {
    logger.debug('Dispatching metric', {
      eventName: 'metric.dispatch',
      metricName: metric.metricName,
      isDatetimeIndex: pair.isDatetimeIndex,
      withInsample: invocation.insample !== undefined,
    });
  }

  return runMetric(metric, invocation, logger);
}

/**
 * Evaluate `metric` over many independent pairs in one invocation.
 * Results follow input order; `interReduction` combines them.
 */
export function evaluateBatch(
  metric: MetricFunction,
  pairs: readonly BatchPair[],
  options: BatchEvaluateOptions = {}
): MetricResult {
  const logger = options.logger ?? getLogger();

  const { parsed, normalized, insample } = withValidationLogging(logger, metric.metricName, () => {
    if (pairs.length === 0) {
      throw new InvalidSeriesError('evaluateBatch needs at least one pair');
    }
    const parsedOptions = parseOptions(options);

    const normalizedPairs = pairs.map(pair =>
      normalizePair(metric, pair.actual, pair.predicted, pair.insample)
    );

    const insampleSeries = normalizedPairs.flatMap(pair => (pair.insample ? [pair.insample] : []));
    if (insampleSeries.length !== 0 && insampleSeries.length !== normalizedPairs.length) {
      throw new InvalidSeriesError('Either every pair or no pair should carry an insample series', {
        pairs: normalizedPairs.length,
        withInsample: insampleSeries.length,
      });
    }
    return { parsed: parsedOptions, normalized: normalizedPairs, insample: insampleSeries };
  });

  const invocation = buildInvocation(
    metric,
    {
      actualSeries: normalized.map(pair => pair.actual),
      predSeries: normalized.map(pair => pair.predicted),
      insample: insample.length > 0 ? insample : undefined,
    },
    parsed,
    options,
    logger
  );

  if (parsed.verbose) {
    logger.debug('Dispatching metric batch', {
      eventName: 'metric.dispatch',
      metricName: metric.metricName,
      pairs: normalized.length,
      parallelism: parsed.parallelism,
    });
  }

  return runMetric(metric, invocation, logger);
}

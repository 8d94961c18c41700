/**
 * Metrics Configuration
 *
 * Defaults for metric evaluation, loadable from environment variables, and
 * an evaluator bound to them.
 */

import { z } from 'zod';
import { createLogger, type Logger } from '@tsforge/core';
import { InvalidOptionsError } from './errors.js';
import {
  evaluate,
  evaluateBatch,
  type BatchEvaluateOptions,
  type BatchPair,
  type EvaluateOptions,
} from './metrics/adapter.js';
import {
  forecastBias,
  type BiasOperand,
  type ForecastBiasOptions,
} from './metrics/forecast-bias.js';
import type { MetricFunction, MetricInput, MetricResult } from './metrics/index.js';

// =============================================================================
// Schemas
// =============================================================================

const LogLevelSchema = z.enum(['DEBUG', 'INFO', 'NOTICE', 'WARNING', 'ERROR', 'CRITICAL', 'ALERT', 'EMERGENCY']);

export const MetricsConfigSchema = z.object({
  /** Compare only the common time span of actual and predicted */
  intersect: z.boolean().default(true),
  /** Batch parallelism hint (-1 for all available) */
  parallelism: z.number().int().refine(n => n >= 1 || n === -1, {
    message: 'parallelism must be a positive integer or -1',
  }).default(1),
  /** Log one line per metric computation */
  verbose: z.boolean().default(false),
  /** Default seasonality period for index-dependent metrics */
  seasonality: z.number().int().min(1).default(1),
  /** Minimum log severity */
  logLevel: LogLevelSchema.default('INFO'),
});

export type MetricsConfig = z.infer<typeof MetricsConfigSchema>;

export type MetricsConfigInput = z.input<typeof MetricsConfigSchema>;

const EnvBoolean = z.enum(['true', 'false', '1', '0']).transform(v => v === 'true' || v === '1');

const MetricsEnvSchema = z.object({
  FORECAST_INTERSECT: EnvBoolean.optional(),
  FORECAST_PARALLELISM: z.coerce.number().optional(),
  FORECAST_VERBOSE: EnvBoolean.optional(),
  FORECAST_SEASONALITY: z.coerce.number().optional(),
  LOG_LEVEL: z.string().transform(v => v.toUpperCase()).pipe(LogLevelSchema).optional(),
});

// =============================================================================
// Loading
// =============================================================================

export function parseMetricsConfig(input: MetricsConfigInput = {}): MetricsConfig {
  const parsed = MetricsConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidOptionsError(`Invalid metrics configuration: ${parsed.error.message}`, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

/**
 * Load configuration from environment variables
 *
 * - FORECAST_INTERSECT: true/false/1/0
 * - FORECAST_PARALLELISM: integer >= 1, or -1
 * - FORECAST_VERBOSE: true/false/1/0
 * - FORECAST_SEASONALITY: integer >= 1
 * - LOG_LEVEL: severity name, case-insensitive
 */
export function loadMetricsConfig(
  env: Record<string, string | undefined> = process.env
): MetricsConfig {
  const parsedEnv = MetricsEnvSchema.safeParse(
    Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''))
  );
  if (!parsedEnv.success) {
    throw new InvalidOptionsError(`Invalid metrics environment: ${parsedEnv.error.message}`, {
      issues: parsedEnv.error.issues,
    });
  }

  const vars = parsedEnv.data;
  return parseMetricsConfig({
    intersect: vars.FORECAST_INTERSECT,
    parallelism: vars.FORECAST_PARALLELISM,
    verbose: vars.FORECAST_VERBOSE,
    seasonality: vars.FORECAST_SEASONALITY,
    logLevel: vars.LOG_LEVEL,
  });
}

// =============================================================================
// Bound evaluator
// =============================================================================

export interface MetricsEvaluator {
  readonly config: MetricsConfig;
  readonly logger: Logger;
  evaluate(
    metric: MetricFunction,
    actual: MetricInput,
    predicted: MetricInput,
    options?: EvaluateOptions
  ): MetricResult;
  evaluateBatch(
    metric: MetricFunction,
    pairs: readonly BatchPair[],
    options?: BatchEvaluateOptions
  ): MetricResult;
  forecastBias(
    actual: BiasOperand,
    predicted: BiasOperand,
    options?: ForecastBiasOptions
  ): MetricResult;
}

/**
 * Create an evaluator whose calls default to `config`. Per-call options win.
 */
export function createMetricsEvaluator(
  config: MetricsConfigInput = {},
  logger?: Logger
): MetricsEvaluator {
  const resolved = parseMetricsConfig(config);
  const evaluatorLogger = logger ?? createLogger('tsforge-metrics', { minSeverity: resolved.logLevel });

  // Keys present but undefined keep the configured default
  const withDefaults = <O extends BatchEvaluateOptions>(options: O): O => ({
    ...options,
    m: options.m ?? resolved.seasonality,
    intersect: options.intersect ?? resolved.intersect,
    parallelism: options.parallelism ?? resolved.parallelism,
    verbose: options.verbose ?? resolved.verbose,
    logger: options.logger ?? evaluatorLogger,
  });

  return {
    config: resolved,
    logger: evaluatorLogger,
    evaluate: (metric, actual, predicted, options = {}) =>
      evaluate(metric, actual, predicted, withDefaults(options)),
    evaluateBatch: (metric, pairs, options = {}) =>
      evaluateBatch(metric, pairs, withDefaults(options)),
    forecastBias: (actual, predicted, options = {}) =>
      forecastBias(actual, predicted, {
        ...options,
        intersect: options.intersect ?? resolved.intersect,
      }),
  };
}

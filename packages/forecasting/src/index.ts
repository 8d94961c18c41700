/**
 * @tsforge/forecasting
 *
 * Stationarity transforms and metric evaluation for forecasting workflows.
 * Provides reversible stationarity transforms, an adapter that normalizes
 * arrays, indexed series and single-column tables before calling a metric,
 * and a forecast bias statistic.
 *
 * @example
 * ```typescript
 * import { IndexedSeries } from '@tsforge/core';
 * import { makeStationary, inverseTransform, evaluate, mae } from '@tsforge/forecasting';
 *
 * const { stationary, transform } = makeStationary(history, 'detrend');
 * const restored = inverseTransform(transform, stationary);
 *
 * const error = evaluate(mae, new IndexedSeries(actual, dates), new IndexedSeries(predicted, dates));
 * ```
 */

// Errors
export {
  ForecastingErrorCodes,
  type ForecastingErrorCode,
  ForecastingError,
  UnsupportedMethodError,
  InvalidOptionsError,
  TypeMismatchError,
  UnsupportedShapeError,
  MissingDatetimeIndexError,
  NormalizationError,
  IndexMismatchError,
  InvalidSeriesError,
  ZeroBaselineError,
} from './errors.js';

// Stationarity transforms
export {
  STATIONARITY_METHODS,
  StationarityOptionsSchema,
  type StationarityMethod,
  type StationarityOptions,
  type StationaryTransform,
  type StationaryResult,
  isStationarityMethod,
  makeStationary,
  inverseTransform,
  polynomialDetrend,
  DEFAULT_DETREND_DEGREE,
  type Detrender,
  type DetrendOptions,
  type DetrendResult,
} from './stationarity/index.js';

// Metrics and input adapter
export * from './metrics/index.js';

// Configuration
export {
  MetricsConfigSchema,
  type MetricsConfig,
  type MetricsConfigInput,
  type MetricsEvaluator,
  parseMetricsConfig,
  loadMetricsConfig,
  createMetricsEvaluator,
} from './config.js';

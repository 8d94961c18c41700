/**
 * Metrics
 *
 * Metric family, input normalization/dispatch and forecast bias.
 */

export {
  type Reduction,
  type InterReduction,
  mean,
  median,
  identity,
  sum,
} from './reductions.js';

export {
  type SeriesOrSequence,
  type MetricResult,
  type MetricInvocation,
  type MetricFunction,
  type PairContext,
  type PairwiseMetric,
  INDEX_DEPENDENT_METRICS,
  isIndexDependent,
  removeNanUnion,
  alignSeries,
  getValuesOrRaise,
  defineMetric,
  mae,
  mse,
  rmse,
  mape,
  mase,
} from './metrics.js';

export {
  type MetricInput,
  type InputRole,
  type ClassifiedInput,
  type InputKind,
  type SeriesInput,
  classifyInput,
  squeezeInput,
  hasDatetimeIndex,
  toCanonical,
} from './inputs.js';

export {
  EvaluateOptionsSchema,
  type EvaluateOptions,
  type BatchEvaluateOptions,
  type BatchPair,
  type NormalizedPair,
  normalizePair,
  evaluate,
  evaluateBatch,
} from './adapter.js';

export {
  type BiasOperand,
  type ForecastBiasOptions,
  biasValue,
  forecastBias,
  forecastBiasMetric,
} from './forecast-bias.js';

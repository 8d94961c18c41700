/**
 * Stationarity Transforms
 *
 * Converts a raw series into a stationary one and records exactly the data
 * needed to map a stationary sequence back to the original scale.
 *
 * @example
 * ```typescript
 * const { stationary, transform } = makeStationary(prices, 'logdiff');
 * // ... model in stationary space ...
 * const restored = inverseTransform(transform, stationary);
 * ```
 */

import { z } from 'zod';
import { InvalidOptionsError, InvalidSeriesError, UnsupportedMethodError } from '../errors.js';
import { polynomialDetrend, type Detrender } from './detrend.js';

export {
  polynomialDetrend,
  DEFAULT_DETREND_DEGREE,
  type Detrender,
  type DetrendOptions,
  type DetrendResult,
} from './detrend.js';

// =============================================================================
// Types
// =============================================================================

export const STATIONARITY_METHODS = ['detrend', 'logdiff'] as const;

export type StationarityMethod = (typeof STATIONARITY_METHODS)[number];

/**
 * Side data owned by a transform. Only valid for the series it came from.
 */
export type StationaryTransform =
  | { kind: 'detrend'; trend: readonly number[] }
  | { kind: 'logdiff'; original: readonly number[] };

export interface StationaryResult {
  stationary: number[];
  transform: StationaryTransform;
}

/**
 * Options of the built-in polynomial detrender. Unknown keys are kept.
 */
export const StationarityOptionsSchema = z.object({
  degree: z.number().int().min(0).max(5).optional(),
}).passthrough();

/**
 * Detrend options. With a custom `detrender` they are handed over as given;
 * `returnTrend` is always overridden to true.
 */
export type StationarityOptions = z.input<typeof StationarityOptionsSchema> & {
  returnTrend?: boolean;
  /** Replacement detrending routine */
  detrender?: Detrender;
};

export function isStationarityMethod(method: string): method is StationarityMethod {
  return (STATIONARITY_METHODS as readonly string[]).includes(method);
}

// =============================================================================
// Forward transform
// =============================================================================

/**
 * Make a series stationary
 *
 * @param x - Non-empty series of finite values
 * @param method - `detrend` (default) or `logdiff`
 * @param options - Passed on to the detrend routine
 */
export function makeStationary(
  x: readonly number[],
  method: string = 'detrend',
  options: StationarityOptions = {}
): StationaryResult {
  if (!isStationarityMethod(method)) {
    throw new UnsupportedMethodError(method, STATIONARITY_METHODS);
  }
  assertFiniteSeries(x);

  switch (method) {
    case 'detrend':
      return detrendTransform(x, options);
    case 'logdiff':
      return logDiffTransform(x);
  }
}

function detrendTransform(x: readonly number[], options: StationarityOptions): StationaryResult {
  const { detrender, returnTrend: _returnTrend, ...rest } = options;

  const { residual, trend } = detrender
    ? detrender(x, { ...rest, returnTrend: true })
    : polynomialDetrend(x, { ...parseDetrendOptions(rest), returnTrend: true });

  if (!trend || trend.length !== x.length || residual.length !== x.length) {
    throw new InvalidSeriesError('Detrender must return a residual and a trend of the input length', {
      inputLength: x.length,
      residualLength: residual.length,
      trendLength: trend?.length ?? null,
    });
  }

  return {
    stationary: [...residual],
    transform: { kind: 'detrend', trend: [...trend] },
  };
}

function logDiffTransform(x: readonly number[]): StationaryResult {
  const nonPositive = x.findIndex(value => value <= 0);
  if (nonPositive >= 0) {
    throw new InvalidSeriesError('logdiff requires strictly positive values', {
      position: nonPositive,
      value: x[nonPositive],
    });
  }

  const stationary: number[] = [];
  for (let i = 0; i < x.length - 1; i++) {
    stationary.push(Math.log(x[i] / x[i + 1]));
  }

  return {
    stationary,
    transform: { kind: 'logdiff', original: [...x] },
  };
}

// =============================================================================
// Inverse transform
// =============================================================================

/**
 * Map a stationary sequence back to the original scale.
 *
 * `detrend` adds the trend back. `logdiff` computes `exp(s[i]) * x[i + 1]`,
 * which restores `x[0..n-2]`.
 */
export function inverseTransform(
  transform: StationaryTransform,
  stationary: readonly number[]
): number[] {
  switch (transform.kind) {
    case 'detrend': {
      const { trend } = transform;
      assertLength(stationary, trend.length, 'detrend');
      return stationary.map((value, i) => value + trend[i]);
    }
    case 'logdiff': {
      const { original } = transform;
      assertLength(stationary, original.length - 1, 'logdiff');
      return stationary.map((value, i) => Math.exp(value) * original[i + 1]);
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function parseDetrendOptions(
  options: z.input<typeof StationarityOptionsSchema>
): z.output<typeof StationarityOptionsSchema> {
  const parsed = StationarityOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new InvalidOptionsError(`Invalid detrend options: ${parsed.error.message}`, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

function assertFiniteSeries(x: readonly number[]): void {
  if (x.length === 0) {
    throw new InvalidSeriesError('Cannot make an empty series stationary');
  }
  const invalid = x.findIndex(value => !Number.isFinite(value));
  if (invalid >= 0) {
    throw new InvalidSeriesError('Series must contain only finite values', {
      position: invalid,
    });
  }
}

function assertLength(stationary: readonly number[], expected: number, kind: StationaryTransform['kind']): void {
  if (stationary.length !== expected) {
    throw new InvalidSeriesError(
      `Stationary sequence has ${stationary.length} values, ${kind} transform expects ${expected}`,
      { kind, expected, actual: stationary.length }
    );
  }
}

/**
 * Forecasting Errors
 *
 * Typed errors with stable codes. Every validation failure is raised where
 * it is detected.
 */

// =============================================================================
// Error Codes
// =============================================================================

export const ForecastingErrorCodes = {
  // Configuration errors (1xxx)
  UNSUPPORTED_METHOD: 'FC_1001',
  INVALID_OPTIONS: 'FC_1002',

  // Input errors (2xxx)
  TYPE_MISMATCH: 'FC_2001',
  UNSUPPORTED_SHAPE: 'FC_2002',
  MISSING_DATETIME_INDEX: 'FC_2003',
  NORMALIZATION_FAILED: 'FC_2004',
  INDEX_MISMATCH: 'FC_2005',
  INVALID_SERIES: 'FC_2006',

  // Computation errors (3xxx)
  ZERO_BASELINE: 'FC_3001',
} as const;

export type ForecastingErrorCode =
  (typeof ForecastingErrorCodes)[keyof typeof ForecastingErrorCodes];

// =============================================================================
// Error Types
// =============================================================================

export class ForecastingError extends Error {
  constructor(
    message: string,
    public readonly code: ForecastingErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ForecastingError';
  }
}

/** Unknown stationarity transform requested */
export class UnsupportedMethodError extends ForecastingError {
  constructor(public readonly method: string, supported: readonly string[]) {
    super(
      `Unsupported stationarity method "${method}". Supported: ${supported.join(', ')}`,
      ForecastingErrorCodes.UNSUPPORTED_METHOD,
      { method, supported }
    );
    this.name = 'UnsupportedMethodError';
  }
}

export class InvalidOptionsError extends ForecastingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ForecastingErrorCodes.INVALID_OPTIONS, details);
    this.name = 'InvalidOptionsError';
  }
}

/** actual/predicted/insample are not the same representation kind */
export class TypeMismatchError extends ForecastingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ForecastingErrorCodes.TYPE_MISMATCH, details);
    this.name = 'TypeMismatchError';
  }
}

/** Tabular input with more than one column */
export class UnsupportedShapeError extends ForecastingError {
  constructor(public readonly columnCount: number) {
    super(
      `Tables with ${columnCount} columns are not supported. Use a single-column table, an indexed series or a numeric array`,
      ForecastingErrorCodes.UNSUPPORTED_SHAPE,
      { columnCount }
    );
    this.name = 'UnsupportedShapeError';
  }
}

/** Index-dependent metric requested without a datetime index on every input */
export class MissingDatetimeIndexError extends ForecastingError {
  constructor(public readonly metricName: string) {
    super(
      `Metric "${metricName}" needs indexed series with a datetime index as inputs`,
      ForecastingErrorCodes.MISSING_DATETIME_INDEX,
      { metricName }
    );
    this.name = 'MissingDatetimeIndexError';
  }
}

/** No coercion rule matched the classified inputs */
export class NormalizationError extends ForecastingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ForecastingErrorCodes.NORMALIZATION_FAILED, details);
    this.name = 'NormalizationError';
  }
}

export class IndexMismatchError extends ForecastingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ForecastingErrorCodes.INDEX_MISMATCH, details);
    this.name = 'IndexMismatchError';
  }
}

export class InvalidSeriesError extends ForecastingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ForecastingErrorCodes.INVALID_SERIES, details);
    this.name = 'InvalidSeriesError';
  }
}

/** Denominator of a ratio metric is zero */
export class ZeroBaselineError extends ForecastingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ForecastingErrorCodes.ZERO_BASELINE, details);
    this.name = 'ZeroBaselineError';
  }
}

/**
 * Polynomial detrending
 *
 * Least-squares polynomial fit against position. Positions are scaled to
 * [0, 1] before the normal equations are solved.
 */

import { InvalidSeriesError } from '../errors.js';

export interface DetrendOptions {
  /** Polynomial degree of the trend (capped at length - 1) */
  degree?: number;
  /** Return the fitted trend alongside the residual */
  returnTrend?: boolean;
}

export interface DetrendResult {
  residual: number[];
  trend?: number[];
}

/**
 * Detrending routine contract. Called with `returnTrend: true` by the
 * stationarity transformer.
 */
export type Detrender = (
  x: readonly number[],
  options: DetrendOptions & { returnTrend: true }
) => DetrendResult;

export const DEFAULT_DETREND_DEGREE = 1;

export function polynomialDetrend(
  x: readonly number[],
  options: DetrendOptions & { returnTrend: true }
): Required<DetrendResult>;
export function polynomialDetrend(x: readonly number[], options?: DetrendOptions): DetrendResult;
export function polynomialDetrend(x: readonly number[], options: DetrendOptions = {}): DetrendResult {
  const n = x.length;
  if (n === 0) {
    throw new InvalidSeriesError('Cannot detrend an empty series');
  }

  const degree = Math.min(options.degree ?? DEFAULT_DETREND_DEGREE, n - 1);
  const positions = x.map((_, i) => (n > 1 ? i / (n - 1) : 0));
  const coefficients = fitPolynomial(positions, x, degree);

  const trend = positions.map(t => evaluatePolynomial(coefficients, t));
  const residual = x.map((value, i) => value - trend[i]);

  return options.returnTrend ? { residual, trend } : { residual };
}

/**
 * Coefficients c[0..degree] minimising sum (y - sum c[k] t^k)^2
 */
function fitPolynomial(t: readonly number[], y: readonly number[], degree: number): number[] {
  const size = degree + 1;

  // Power sums: powerSums[k] = sum t^k for k in 0..2*degree
  const powerSums = new Array<number>(2 * degree + 1).fill(0);
  const rhs = new Array<number>(size).fill(0);
  for (let i = 0; i < t.length; i++) {
    let power = 1;
    for (let k = 0; k <= 2 * degree; k++) {
      powerSums[k] += power;
      if (k < size) rhs[k] += power * y[i];
      power *= t[i];
    }
  }

  const matrix = Array.from({ length: size }, (_, row) =>
    Array.from({ length: size }, (_, col) => powerSums[row + col])
  );

  return solveLinearSystem(matrix, rhs);
}

/**
 * Gaussian elimination with partial pivoting. Mutates its arguments.
 */
function solveLinearSystem(a: number[][], b: number[]): number[] {
  const size = b.length;

  for (let col = 0; col < size; col++) {
    let pivot = col;
    for (let row = col + 1; row < size; row++) {
      if (Math.abs(a[row][col]) > Math.abs(a[pivot][col])) pivot = row;
    }
    if (Math.abs(a[pivot][col]) < 1e-12) {
      throw new InvalidSeriesError('Trend fit is singular; lower the polynomial degree', {
        degree: size - 1,
      });
    }
    [a[col], a[pivot]] = [a[pivot], a[col]];
    [b[col], b[pivot]] = [b[pivot], b[col]];

    for (let row = col + 1; row < size; row++) {
      const factor = a[row][col] / a[col][col];
      for (let k = col; k < size; k++) {
        a[row][k] -= factor * a[col][k];
      }
      b[row] -= factor * b[col];
    }
  }

  const solution = new Array<number>(size).fill(0);
  for (let row = size - 1; row >= 0; row--) {
    let sum = b[row];
    for (let k = row + 1; k < size; k++) {
      sum -= a[row][k] * solution[k];
    }
    solution[row] = sum / a[row][row];
  }
  return solution;
}

function evaluatePolynomial(coefficients: readonly number[], t: number): number {
  // Horner
  let result = 0;
  for (let k = coefficients.length - 1; k >= 0; k--) {
    result = result * t + coefficients[k];
  }
  return result;
}

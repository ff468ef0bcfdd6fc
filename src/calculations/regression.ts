/**
 * Least-squares fitting for the two-parameter threshold models.
 *
 * fitLinear handles straight lines in closed form.
 * fitLevenbergMarquardt handles any two-parameter model given its Jacobian.
 */

import { MIN_FIT_POINTS } from '@/constants';
import { FitError } from './errors';

/** Relative determinant below which a 2x2 normal matrix is treated as singular */
const SINGULAR_EPS = 1e-12;

export interface LinearFit {
  slope: number;
  intercept: number;
}

/** Two-parameter model: value and partial derivatives at x */
export interface TwoParamModel {
  value(x: number, a: number, b: number): number;
  gradient(x: number, a: number, b: number): [number, number];
}

export interface LmOptions {
  maxIterations?: number;
  /** Relative step size that counts as converged */
  xtol?: number;
  /** Gradient magnitude that counts as converged */
  gtol?: number;
}

export interface LmResult {
  params: [number, number];
  iterations: number;
  /** Sum of squared residuals at params */
  cost: number;
}

/**
 * Check paired inputs before any fit.
 * @throws FitError on mismatched lengths, too few points or non-finite values
 */
export function checkPairs(xs: readonly number[], ys: readonly number[]): void {
  if (xs.length !== ys.length) {
    throw new FitError(`Mismatched inputs: ${xs.length} x values, ${ys.length} y values`);
  }
  if (xs.length < MIN_FIT_POINTS) {
    throw new FitError(`At least ${MIN_FIT_POINTS} points are required, got ${xs.length}`);
  }
  for (let i = 0; i < xs.length; i++) {
    if (!Number.isFinite(xs[i]) || !Number.isFinite(ys[i])) {
      throw new FitError(`Point ${i} is not finite (${xs[i]}, ${ys[i]})`);
    }
  }
}

/**
 * Solve the 2x2 system [[a, b], [c, d]] · [u, v] = [e, f].
 * Returns null when the matrix is singular relative to its own scale.
 */
function solve2x2(
  a: number, b: number, c: number, d: number,
  e: number, f: number
): [number, number] | null {
  const det = a * d - b * c;
  const scale = Math.max(Math.abs(a * d), Math.abs(b * c));
  if (!Number.isFinite(det) || scale === 0 || Math.abs(det) <= SINGULAR_EPS * scale) {
    return null;
  }
  return [(e * d - b * f) / det, (a * f - e * c) / det];
}

/**
 * Ordinary least squares fit of y = slope * x + intercept
 * @throws FitError when all x values coincide
 */
export function fitLinear(xs: readonly number[], ys: readonly number[]): LinearFit {
  checkPairs(xs, ys);

  const n = xs.length;
  const meanX = xs.reduce((s, x) => s + x, 0) / n;
  const meanY = ys.reduce((s, y) => s + y, 0) / n;

  let num = 0, den = 0, spread = 0;
  for (let i = 0; i < n; i++) {
    num += (xs[i] - meanX) * (ys[i] - meanY);
    den += Math.pow(xs[i] - meanX, 2);
    spread = Math.max(spread, Math.abs(xs[i]));
  }

  if (den === 0 || den <= SINGULAR_EPS * spread * spread * n) {
    throw new FitError('Singular fit: all durations are identical');
  }

  const slope = num / den;
  return { slope, intercept: meanY - slope * meanX };
}

function sumSquares(
  model: TwoParamModel,
  xs: readonly number[],
  ys: readonly number[],
  a: number,
  b: number
): number {
  let cost = 0;
  for (let i = 0; i < xs.length; i++) {
    const r = ys[i] - model.value(xs[i], a, b);
    cost += r * r;
  }
  return cost;
}

/**
 * Levenberg-Marquardt fit of a two-parameter model.
 *
 * Damped normal equations (JᵀJ + λ·diag(JᵀJ)) δ = Jᵀr, with λ shrinking
 * tenfold after an accepted step and growing tenfold after a rejected one.
 *
 * @throws FitError on a singular Jacobian, a non-finite cost, or no convergence
 */
export function fitLevenbergMarquardt(
  model: TwoParamModel,
  xs: readonly number[],
  ys: readonly number[],
  initial: [number, number],
  options: LmOptions = {}
): LmResult {
  checkPairs(xs, ys);

  const maxIterations = options.maxIterations ?? 200;
  const xtol = options.xtol ?? 1e-10;
  const gtol = options.gtol ?? 1e-14;

  let [a, b] = initial;
  let cost = sumSquares(model, xs, ys, a, b);
  let lambda = 1e-3;

  for (let iter = 1; iter <= maxIterations; iter++) {
    // Normal matrix and gradient at the current point
    let jaa = 0, jab = 0, jbb = 0, ga = 0, gb = 0;
    for (let i = 0; i < xs.length; i++) {
      const [da, db] = model.gradient(xs[i], a, b);
      const r = ys[i] - model.value(xs[i], a, b);
      jaa += da * da;
      jab += da * db;
      jbb += db * db;
      ga += da * r;
      gb += db * r;
    }

    if (solve2x2(jaa, jab, jab, jbb, ga, gb) === null) {
      throw new FitError('Singular fit: the durations do not separate the two parameters');
    }

    if (cost === 0 || Math.max(Math.abs(ga), Math.abs(gb)) <= gtol) {
      return { params: [a, b], iterations: iter, cost };
    }

    const step = solve2x2(jaa * (1 + lambda), jab, jab, jbb * (1 + lambda), ga, gb);
    if (step === null) {
      throw new FitError('Singular fit: damped system could not be solved');
    }
    const [da, db] = step;

    const nextA = a + da;
    const nextB = b + db;
    const nextCost = sumSquares(model, xs, ys, nextA, nextB);

    const small =
      Math.abs(da) <= xtol * (Math.abs(a) + xtol) &&
      Math.abs(db) <= xtol * (Math.abs(b) + xtol);

    if (Number.isFinite(nextCost) && nextCost < cost) {
      a = nextA;
      b = nextB;
      cost = nextCost;
      lambda = Math.max(lambda / 10, 1e-12);
    } else {
      lambda *= 10;
    }

    if (small) {
      return { params: [a, b], iterations: iter, cost };
    }
    if (!Number.isFinite(lambda) || lambda > 1e16) {
      throw new FitError(`Fit did not converge after ${iter} iterations`);
    }
  }

  throw new FitError(`Fit did not converge within ${maxIterations} iterations`);
}

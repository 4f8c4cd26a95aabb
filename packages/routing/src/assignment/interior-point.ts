/**
 * Convex quadratic programs over a scaled simplex.
 *
 *   min ½·xᵀHx + cᵀx   subject to   x_i >= 0,  Σ x_i = total
 *
 * with H symmetric positive semidefinite (possibly singular). Solved with a
 * primal-dual interior-point method (Mehrotra predictor-corrector). The
 * iteration count barely depends on conditioning, which matters for
 * networks whose paths share congested edges: there H is singular and the
 * linear term alone decides how flow spreads along the flat directions.
 *
 * Optimality conditions, with multiplier λ for the demand constraint and
 * slacks s for the bounds:
 *
 *   Hx + c - λ·1 - s = 0,   Σx = total,   x∘s = 0,   x, s >= 0
 */

import { ConvergenceError } from "../domain/errors.js";

export interface QuadraticObjective {
  /** Symmetric positive semidefinite matrix H */
  hessian: number[][];
  /** Linear term c */
  linear: number[];
}

export interface InteriorPointOptions {
  /** Maximum number of Newton steps */
  maxIterations: number;
  /** Threshold on the largest scaled optimality residual */
  tolerance: number;
}

export const DEFAULT_INTERIOR_POINT_OPTIONS: InteriorPointOptions = {
  maxIterations: 100,
  tolerance: 1e-10,
};

export interface InteriorPointResult {
  x: number[];
  iterations: number;
  /** Largest scaled optimality residual at the returned point */
  residual: number;
}

/** Fraction of the distance to the boundary taken per step */
const STEP_TO_BOUNDARY = 0.99;

export function quadraticValue(objective: QuadraticObjective, x: number[]): number {
  const hx = multiply(objective.hessian, x);
  return x.reduce((sum, xi, i) => sum + xi * (0.5 * (hx[i] ?? 0) + (objective.linear[i] ?? 0)), 0);
}

export function quadraticGradient(objective: QuadraticObjective, x: number[]): number[] {
  return multiply(objective.hessian, x).map((v, i) => v + (objective.linear[i] ?? 0));
}

function multiply(matrix: number[][], x: number[]): number[] {
  return matrix.map((row) => row.reduce((sum, m, j) => sum + m * (x[j] ?? 0), 0));
}

/** Lower-triangular L with L·Lᵀ = K; null when K is not positive definite */
function cholesky(k: number[][]): number[][] | null {
  const n = k.length;
  const l = k.map(() => new Array<number>(n).fill(0));

  for (let j = 0; j < n; j++) {
    const lj = l[j] ?? [];
    let diagonal = k[j]?.[j] ?? 0;
    for (let p = 0; p < j; p++) diagonal -= (lj[p] ?? 0) ** 2;
    if (!(diagonal > 0)) return null;
    const pivot = Math.sqrt(diagonal);
    lj[j] = pivot;

    for (let i = j + 1; i < n; i++) {
      const li = l[i] ?? [];
      let value = k[i]?.[j] ?? 0;
      for (let p = 0; p < j; p++) value -= (li[p] ?? 0) * (lj[p] ?? 0);
      li[j] = value / pivot;
    }
  }
  return l;
}

/** Solve L·Lᵀ·x = b */
function choleskySolve(l: number[][], b: number[]): number[] {
  const n = l.length;
  const y = new Array<number>(n).fill(0);
  for (let i = 0; i < n; i++) {
    let value = b[i] ?? 0;
    for (let p = 0; p < i; p++) value -= (l[i]?.[p] ?? 0) * (y[p] ?? 0);
    y[i] = value / (l[i]?.[i] ?? 1);
  }

  const x = new Array<number>(n).fill(0);
  for (let i = n - 1; i >= 0; i--) {
    let value = y[i] ?? 0;
    for (let p = i + 1; p < n; p++) value -= (l[p]?.[i] ?? 0) * (x[p] ?? 0);
    x[i] = value / (l[i]?.[i] ?? 1);
  }
  return x;
}

/** Largest α <= 1 keeping v + α·dv non-negative */
function maxStep(v: number[], dv: number[]): number {
  let alpha = 1;
  v.forEach((vi, i) => {
    const di = dv[i] ?? 0;
    if (di < 0) alpha = Math.min(alpha, -vi / di);
  });
  return alpha;
}

interface NewtonDirection {
  dx: number[];
  dLambda: number;
  ds: number[];
}

/**
 * Minimize a convex quadratic over the simplex scaled to `total > 0`.
 *
 * Starts from the equal split. Throws ConvergenceError when the iteration
 * budget runs out or the Newton system breaks down numerically.
 */
export function minimizeQuadraticOnSimplex(
  objective: QuadraticObjective,
  total: number,
  options: Partial<InteriorPointOptions> = {},
): InteriorPointResult {
  const opts = { ...DEFAULT_INTERIOR_POINT_OPTIONS, ...options };
  const { hessian } = objective;
  const n = objective.linear.length;

  let x = new Array<number>(n).fill(total / n);
  const g0 = quadraticGradient(objective, x);
  const gMin = Math.min(...g0);
  const gMax = Math.max(...g0);
  // dual start: λ below every marginal cost so that all slacks are positive
  let lambda = gMin - Math.max(1, gMax - gMin, 0.1 * Math.max(Math.abs(gMin), Math.abs(gMax)));
  let s = g0.map((gi) => gi - lambda);
  let residual = Infinity;

  for (let iteration = 1; iteration <= opts.maxIterations; iteration++) {
    const g = quadraticGradient(objective, x);
    const dualResidual = g.map((gi, i) => gi - lambda - (s[i] ?? 0));
    const primalResidual = x.reduce((sum, xi) => sum + xi, 0) - total;
    const gap = x.reduce((sum, xi, i) => sum + xi * (s[i] ?? 0), 0);

    const scale = Math.max(1, ...g.map(Math.abs));
    residual = Math.max(
      Math.max(...dualResidual.map(Math.abs)) / scale,
      Math.abs(primalResidual) / Math.max(1, total),
      gap / Math.max(1, total * scale),
    );
    if (!Number.isFinite(residual)) {
      throw new ConvergenceError("Interior-point iterate is not finite", iteration, residual);
    }
    if (residual <= opts.tolerance) {
      return { x, iterations: iteration, residual };
    }

    const mu = gap / n;
    const xs = x;
    const ss = s;
    const factor = cholesky(
      hessian.map((row, i) =>
        row.map((h, j) => (i === j ? h + (ss[i] ?? 0) / (xs[i] ?? 1) : h)),
      ),
    );
    if (!factor) {
      throw new ConvergenceError("Interior-point system is not positive definite", iteration, residual);
    }
    const u = choleskySolve(factor, new Array<number>(n).fill(1));
    const uSum = u.reduce((sum, ui) => sum + ui, 0);

    // Newton step for complementarity target x∘s = rc
    const direction = (rc: number[]): NewtonDirection => {
      const v = choleskySolve(
        factor,
        dualResidual.map((rd, i) => -rd - (rc[i] ?? 0) / (xs[i] ?? 1)),
      );
      const dLambda = (-primalResidual - v.reduce((sum, vi) => sum + vi, 0)) / uSum;
      const dx = v.map((vi, i) => vi + dLambda * (u[i] ?? 0));
      const ds = dx.map((dxi, i) => (-(rc[i] ?? 0) - (ss[i] ?? 0) * dxi) / (xs[i] ?? 1));
      return { dx, dLambda, ds };
    };

    const affine = direction(xs.map((xi, i) => xi * (ss[i] ?? 0)));
    const affineStep = Math.min(maxStep(xs, affine.dx), maxStep(ss, affine.ds));
    const affineGap = xs.reduce(
      (sum, xi, i) =>
        sum + (xi + affineStep * (affine.dx[i] ?? 0)) * ((ss[i] ?? 0) + affineStep * (affine.ds[i] ?? 0)),
      0,
    );
    const centering = (affineGap / n / mu) ** 3;

    const corrected = direction(
      xs.map((xi, i) => xi * (ss[i] ?? 0) + (affine.dx[i] ?? 0) * (affine.ds[i] ?? 0) - centering * mu),
    );
    const alpha = Math.min(
      1,
      STEP_TO_BOUNDARY * Math.min(maxStep(xs, corrected.dx), maxStep(ss, corrected.ds)),
    );

    x = xs.map((xi, i) => xi + alpha * (corrected.dx[i] ?? 0));
    s = ss.map((si, i) => si + alpha * (corrected.ds[i] ?? 0));
    lambda += alpha * corrected.dLambda;
  }

  throw new ConvergenceError(
    `Did not converge within ${opts.maxIterations} iterations (residual ${residual.toExponential(3)})`,
    opts.maxIterations,
    residual,
  );
}

/**
 * Smooth minimization over a scaled probability simplex.
 *
 * Solves  min f(x)  subject to  x_i >= 0,  Σ x_i = total
 * with accelerated projected gradient descent. Each trial step is accepted
 * once the curvature along it is covered by the step length,
 *
 *   (∇f(x⁺) - ∇f(y))·(x⁺ - y) <= ‖x⁺ - y‖² / t
 *
 * which is tested on gradients rather than on function values, so it stays
 * meaningful close to the minimum where f barely changes. Momentum restarts
 * whenever it points against the last step. Stops once the gradient mapping
 * ‖x⁺ - y‖ / t falls below the tolerance, scaled by the largest gradient
 * component when that exceeds 1.
 *
 * The objective is any pair of closures; nothing here knows about graphs.
 */

import { ConvergenceError } from "../domain/errors.js";

/** Objective passed to the minimizer */
export interface SimplexObjective {
  value(x: number[]): number;
  gradient(x: number[]): number[];
}

export interface SimplexMinimizerOptions {
  /** Maximum number of accepted steps */
  maxIterations: number;
  /** Convergence threshold on the (gradient-scaled) gradient-mapping norm */
  tolerance: number;
  /** First trial step length */
  initialStep: number;
  /** Step shrink factor while backtracking, in (0, 1) */
  backtrackFactor: number;
  /** Maximum shrinks per iteration before giving up */
  maxBacktracks: number;
}

export const DEFAULT_MINIMIZER_OPTIONS: SimplexMinimizerOptions = {
  maxIterations: 10_000,
  tolerance: 1e-9,
  initialStep: 1,
  backtrackFactor: 0.5,
  maxBacktracks: 60,
};

export interface SimplexMinimizerResult {
  x: number[];
  value: number;
  iterations: number;
  /** Gradient-mapping norm at the returned point */
  residual: number;
}

const MAX_STEP = 1e6;

/**
 * Euclidean projection of `v` onto { x >= 0, Σx = total }.
 *
 * Sort-based algorithm: find the largest k such that the k largest entries
 * stay positive after a common shift, then clip the rest to zero.
 */
export function projectOntoSimplex(v: number[], total: number): number[] {
  if (v.length === 0) return [];
  if (total <= 0) return v.map(() => 0);

  const sorted = [...v].sort((p, q) => q - p);
  let cumulative = 0;
  let theta = 0;
  for (let k = 0; k < sorted.length; k++) {
    const u = sorted[k] ?? 0;
    cumulative += u;
    const candidate = (cumulative - total) / (k + 1);
    if (u - candidate > 0) theta = candidate;
  }

  return v.map((value) => Math.max(value - theta, 0));
}

function dot(p: number[], q: number[]): number {
  let sum = 0;
  for (let i = 0; i < p.length; i++) sum += (p[i] ?? 0) * (q[i] ?? 0);
  return sum;
}

function maxAbs(values: number[]): number {
  return values.reduce((max, v) => Math.max(max, Math.abs(v)), 0);
}

/**
 * Minimize `objective` over the simplex scaled to `total`, starting from
 * the projection of `x0`.
 *
 * Throws ConvergenceError when the iteration budget runs out, the line
 * search cannot make progress, or the objective turns non-finite.
 */
export function minimizeOnSimplex(
  objective: SimplexObjective,
  x0: number[],
  total: number,
  options: Partial<SimplexMinimizerOptions> = {},
): SimplexMinimizerResult {
  const opts = { ...DEFAULT_MINIMIZER_OPTIONS, ...options };

  let x = projectOntoSimplex(x0, total);
  if (!Number.isFinite(objective.value(x))) {
    throw new ConvergenceError("Objective is not finite at the starting point", 0, Infinity);
  }

  // extrapolated point the next step is taken from
  let y = x;
  let momentum = 1;
  let step = opts.initialStep;
  let residual = Infinity;

  for (let iteration = 1; iteration <= opts.maxIterations; iteration++) {
    const g = objective.gradient(y);
    const threshold = opts.tolerance * Math.max(1, maxAbs(g));

    let accepted: number[] | null = null;
    let acceptedStep = step;
    let lastTrial = step;
    let lastStepNorm = Infinity;

    for (let shrink = 0; shrink <= opts.maxBacktracks; shrink++) {
      lastTrial = step;
      const candidate = projectOntoSimplex(
        y.map((yi, i) => yi - step * (g[i] ?? 0)),
        total,
      );
      const d = candidate.map((ci, i) => ci - (y[i] ?? 0));
      const squaredNorm = dot(d, d);
      lastStepNorm = Math.sqrt(squaredNorm);

      if (squaredNorm === 0) {
        accepted = candidate;
        acceptedStep = step;
        break;
      }

      const gCandidate = objective.gradient(candidate);
      const curvature = dot(
        gCandidate.map((gc, i) => gc - (g[i] ?? 0)),
        d,
      );
      if (
        Number.isFinite(curvature) &&
        curvature <= squaredNorm / step &&
        Number.isFinite(objective.value(candidate))
      ) {
        accepted = candidate;
        acceptedStep = step;
        break;
      }

      step *= opts.backtrackFactor;
    }

    if (!accepted) {
      residual = lastStepNorm / lastTrial;
      if (residual <= threshold) {
        return { x, value: objective.value(x), iterations: iteration, residual };
      }
      throw new ConvergenceError(
        `Line search failed after ${opts.maxBacktracks} backtracks (residual ${residual.toExponential(3)})`,
        iteration,
        residual,
      );
    }

    residual = lastStepNorm / acceptedStep;
    if (residual <= threshold) {
      return { x: accepted, value: objective.value(accepted), iterations: iteration, residual };
    }

    const next = accepted;
    const nextMomentum = (1 + Math.sqrt(1 + 4 * momentum * momentum)) / 2;
    const restart =
      dot(
        y.map((yi, i) => yi - (next[i] ?? 0)),
        next.map((ni, i) => ni - (x[i] ?? 0)),
      ) > 0;

    if (restart) {
      momentum = 1;
      y = next;
    } else {
      const beta = (momentum - 1) / nextMomentum;
      y = next.map((ni, i) => ni + beta * (ni - (x[i] ?? 0)));
      momentum = nextMomentum;
    }
    x = next;
    step = Math.min(step * 2, MAX_STEP);
  }

  throw new ConvergenceError(
    `Did not converge within ${opts.maxIterations} iterations (residual ${residual.toExponential(3)})`,
    opts.maxIterations,
    residual,
  );
}

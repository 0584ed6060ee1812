// =============================================================================
// Numerical Solver
// Brent's method for the bootstrap steps without a closed form
// =============================================================================

import { DEFAULT_SOLVER_CONFIG, type SolverConfig } from './types';

/**
 * Result from root-finding
 */
export interface RootResult {
  root: number;
  iterations: number;
  converged: boolean;
  error: number;      // |f(root)|
}

/**
 * Brent's method for root-finding.
 * Combines bisection, secant and inverse quadratic interpolation; the
 * bracket is widened towards the configured bounds when f(a) and f(b)
 * share a sign.
 */
export function brent(
  f: (x: number) => number,
  a: number,
  b: number,
  config: Partial<SolverConfig> = {}
): RootResult {
  const { tolerance, maxIterations, lowerBound, upperBound } = {
    ...DEFAULT_SOLVER_CONFIG,
    ...config,
  };

  a = Math.max(a, lowerBound);
  b = Math.min(b, upperBound);

  let fa = f(a);
  let fb = f(b);

  if (fa * fb > 0) {
    const expanded = expandBracket(f, a, b, lowerBound, upperBound);
    if (!expanded) {
      const best = Math.abs(fa) < Math.abs(fb) ? a : b;
      return { root: best, iterations: 0, converged: false, error: Math.min(Math.abs(fa), Math.abs(fb)) };
    }
    ({ a, b, fa, fb } = expanded);
  }

  let c = b;
  let fc = fb;
  let d = b - a;
  let e = d;

  for (let iter = 1; iter <= maxIterations; iter++) {
    // Keep the root between b and c
    if (fb * fc > 0) {
      c = a;
      fc = fa;
      d = b - a;
      e = d;
    }
    if (Math.abs(fc) < Math.abs(fb)) {
      a = b; b = c; c = a;
      fa = fb; fb = fc; fc = fa;
    }

    const tol = 2 * Number.EPSILON * Math.abs(b) + tolerance / 2;
    const half = (c - b) / 2;
    if (Math.abs(half) <= tol || Math.abs(fb) <= tolerance) {
      return { root: b, iterations: iter, converged: true, error: Math.abs(fb) };
    }

    if (Math.abs(e) >= tol && Math.abs(fa) > Math.abs(fb)) {
      // Secant when a == c, inverse quadratic otherwise
      const s = fb / fa;
      let p: number;
      let q: number;
      if (a === c) {
        p = 2 * half * s;
        q = 1 - s;
      } else {
        const qa = fa / fc;
        const r = fb / fc;
        p = s * (2 * half * qa * (qa - r) - (b - a) * (r - 1));
        q = (qa - 1) * (r - 1) * (s - 1);
      }
      if (p > 0) q = -q;
      p = Math.abs(p);

      if (2 * p < Math.min(3 * half * q - Math.abs(tol * q), Math.abs(e * q))) {
        e = d;
        d = p / q;
      } else {
        d = half;
        e = d;
      }
    } else {
      d = half;
      e = d;
    }

    a = b;
    fa = fb;
    b += Math.abs(d) > tol ? d : (half > 0 ? tol : -tol);
    fb = f(b);
  }

  return { root: b, iterations: maxIterations, converged: false, error: Math.abs(fb) };
}

/**
 * Try to find a bracket for the root by expanding the search
 */
function expandBracket(
  f: (x: number) => number,
  a: number,
  b: number,
  lower: number,
  upper: number
): { a: number; b: number; fa: number; fb: number } | null {
  const nSteps = 20;
  const expansion = 1.6;

  let fa = f(a);
  let fb = f(b);

  for (let i = 0; i < nSteps; i++) {
    if (fa * fb <= 0) {
      return { a, b, fa, fb };
    }
    const width = b - a;
    if (Math.abs(fa) < Math.abs(fb)) {
      a = Math.max(lower, a - expansion * width);
      fa = f(a);
    } else {
      b = Math.min(upper, b + expansion * width);
      fb = f(b);
    }
  }

  return fa * fb <= 0 ? { a, b, fa, fb } : null;
}

/**
 * Bracketed scalar root-finding (Brent's method).
 *
 * Combines inverse quadratic interpolation, secant steps and bisection; the
 * bracket [a, b] always holds a sign change, so the loop is bounded by the
 * bisection rate even when interpolation misbehaves.
 */
import { RootBracketFailureError } from '../../contracts/ExchangerErrors';

/** Absolute tolerance on the root. */
export const DEFAULT_ROOT_TOLERANCE = 2e-12;
export const DEFAULT_ROOT_MAX_ITER = 200;

export interface RootFindOptions {
  tolerance?: number;
  maxIter?: number;
}

/**
 * Find x in [lower, upper] with f(x) = 0.
 *
 * Throws RootBracketFailureError when f(lower) and f(upper) share a sign (or
 * either is not finite). When the iteration budget runs out the best estimate
 * so far is returned.
 */
export function brentRoot(
  f: (x: number) => number,
  lower: number,
  upper: number,
  options: RootFindOptions = {},
): number {
  const tolerance = options.tolerance ?? DEFAULT_ROOT_TOLERANCE;
  const maxIter = options.maxIter ?? DEFAULT_ROOT_MAX_ITER;

  let a = lower;
  let b = upper;
  let fa = f(a);
  let fb = f(b);

  if (!Number.isFinite(fa) || !Number.isFinite(fb) || fa * fb > 0) {
    throw new RootBracketFailureError(lower, upper, fa, fb);
  }
  if (fa === 0) return a;
  if (fb === 0) return b;

  let c = b;
  let fc = fb;
  let d = b - a;
  let e = d;

  for (let iter = 0; iter < maxIter; iter++) {
    if ((fb > 0 && fc > 0) || (fb < 0 && fc < 0)) {
      // Re-establish the bracket on [b, c]
      c = a;
      fc = fa;
      d = b - a;
      e = d;
    }
    if (Math.abs(fc) < Math.abs(fb)) {
      a = b; b = c; c = a;
      fa = fb; fb = fc; fc = fa;
    }

    const tol1 = 2 * Number.EPSILON * Math.abs(b) + 0.5 * tolerance;
    const xm = 0.5 * (c - b);
    if (Math.abs(xm) <= tol1 || fb === 0) {
      return b;
    }

    if (Math.abs(e) >= tol1 && Math.abs(fa) > Math.abs(fb)) {
      const s = fb / fa;
      let p: number;
      let q: number;
      if (a === c) {
        // secant
        p = 2 * xm * s;
        q = 1 - s;
      } else {
        // inverse quadratic
        const r0 = fa / fc;
        const r1 = fb / fc;
        p = s * (2 * xm * r0 * (r0 - r1) - (b - a) * (r1 - 1));
        q = (r0 - 1) * (r1 - 1) * (s - 1);
      }
      if (p > 0) q = -q;
      p = Math.abs(p);

      const min1 = 3 * xm * q - Math.abs(tol1 * q);
      const min2 = Math.abs(e * q);
      if (2 * p < Math.min(min1, min2)) {
        e = d;
        d = p / q;
      } else {
        d = xm;
        e = d;
      }
    } else {
      // Bisection
      d = xm;
      e = d;
    }

    a = b;
    fa = fb;
    b += Math.abs(d) > tol1 ? d : (xm >= 0 ? tol1 : -tol1);
    fb = f(b);
  }

  return b;
}

/**
 * Curve functions — the single-variable inputs of the generator.
 *
 * Anything callable as (x) => y works: closures, named functions, table
 * interpolants. Functions must be pure; the sampler relies on evaluating
 * the same x twice and getting the same y.
 */

import { InvalidParameterError } from './errors.js';
import type { Vec2 } from './vec3.js';

export type CurveFunction = (x: number) => number;

/** f(x) = c. Flat profile: square cross-sections, straight extrusions. */
export function constant(c = 1): CurveFunction {
  return () => c;
}

/** Upper half of a circle of radius r centered at the origin. Zero outside [-r, r]. */
export function circle(radius = 1): CurveFunction {
  const r2 = radius * radius;
  return (x) => Math.sqrt(Math.max(0, r2 - x * x));
}

/**
 * Upper half of a superellipse |x|^p + |y|^p = r^p.
 * exponent 2 is a circle; 4 is the usual squircle.
 */
export function squircle(radius = 1, exponent = 4): CurveFunction {
  if (!(exponent > 0)) {
    throw new InvalidParameterError('exponent', `must be positive (got ${exponent})`);
  }
  const rp = Math.pow(radius, exponent);
  return (x) => Math.pow(Math.max(0, rp - Math.pow(Math.abs(x), exponent)), 1 / exponent);
}

/** f(x) = a·x² + c. */
export function parabola(a = -1, c = 1): CurveFunction {
  return (x) => a * x * x + c;
}

/** f(x) = offset + amplitude·sin(frequency·x). */
export function sine(amplitude = 0.25, frequency = Math.PI, offset = 1): CurveFunction {
  return (x) => offset + amplitude * Math.sin(frequency * x);
}

/**
 * Piecewise-linear interpolant through [x, y] pairs.
 * x must be strictly ascending. Outside the table the end values hold.
 */
export function lookupTable(points: readonly Vec2[]): CurveFunction {
  if (points.length < 2) {
    throw new InvalidParameterError('points', `lookup table needs at least 2 entries (got ${points.length})`);
  }
  const xs = new Float64Array(points.length);
  const ys = new Float64Array(points.length);
  for (let i = 0; i < points.length; i++) {
    const [x, y] = points[i];
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      throw new InvalidParameterError('points', `entry ${i} is not finite ([${x}, ${y}])`);
    }
    if (i > 0 && !(x > xs[i - 1])) {
      throw new InvalidParameterError('points', `x must be strictly ascending (entry ${i}: ${x} after ${xs[i - 1]})`);
    }
    xs[i] = x;
    ys[i] = y;
  }

  const last = xs.length - 1;
  return (x) => {
    if (x <= xs[0]) return ys[0];
    if (x >= xs[last]) return ys[last];

    // Binary search for the segment [xs[lo], xs[hi]] containing x
    let lo = 0;
    let hi = last;
    while (hi - lo > 1) {
      const mid = (lo + hi) >> 1;
      if (xs[mid] <= x) lo = mid;
      else hi = mid;
    }
    const t = (x - xs[lo]) / (xs[hi] - xs[lo]);
    return ys[lo] + t * (ys[hi] - ys[lo]);
  };
}

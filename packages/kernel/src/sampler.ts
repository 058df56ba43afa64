/**
 * Adaptive ring sampler.
 *
 *   sampleRing(circle(1), -1, 1, 20, { mirror: true })
 *
 * Samples f over [xStart, xEnd] with exactly `vertexCount` points placed
 * by curvature (see refinement.ts), then optionally mirrors them into a
 * closed ring of 2·vertexCount − k points, k = number of end points on
 * the axis.
 */

import { requireCount, requireRange } from './errors.js';
import type { CurveFunction } from './functions.js';
import { greedyRefinement, samplePoint, type Refinement } from './refinement.js';
import { mirrorHalf, type Ring } from './ring.js';

export interface SampleRingOptions {
  /** Append the lower half (y negated). Default false. */
  mirror?: boolean;
  /** Point placement strategy. Default greedyRefinement. */
  refinement?: Refinement;
}

/** Smallest vertex budget that still bounds an area once mirrored. */
export const MIN_RING_VERTICES = 3;

/** Validate the arguments of sampleRing without evaluating f. */
export function validateCurve(xStart: number, xEnd: number, vertexCount: number, label = 'curve'): void {
  requireRange(xStart, xEnd, `${label} domain`);
  requireCount(`${label} vertices`, vertexCount, MIN_RING_VERTICES);
}

export function sampleRing(
  f: CurveFunction,
  xStart: number,
  xEnd: number,
  vertexCount: number,
  options: SampleRingOptions = {},
): Ring {
  validateCurve(xStart, xEnd, vertexCount);
  const refine = options.refinement ?? greedyRefinement;

  const start = samplePoint(f, xStart);
  const end = samplePoint(f, xEnd, true);
  const upper = refine(f, start, end, vertexCount);

  let maxY = 0;
  for (let i = 1; i < upper.length - 1; i++) {
    if (upper[i].y > maxY) maxY = upper[i].y;
  }

  return {
    points: options.mirror ? mirrorHalf(upper) : upper,
    upperLength: upper.length,
    maxY,
  };
}

/**
 * Rings — closed, ordered point sequences describing one cross-section.
 *
 * A sampled curve is the upper half; mirroring across y = 0 appends the
 * lower half in reverse so the sequence reads cyclically as one closed
 * outline. End points lying on the axis would appear twice after
 * mirroring, so they are trimmed from the copy. The same trim drops the
 * zero-radius ends of a height ring, which collapse into the poles.
 */

import type { SamplePoint } from './refinement.js';

export interface Ring {
  /** Upper half (ascending x), then the mirrored lower half if any. */
  points: SamplePoint[];
  /** Points [0, upperLength) belong to the upper half. */
  upperLength: number;
  /** Maximum of f over the inserted midpoints, never below 0. */
  maxY: number;
}

/** The value of f at this point is exactly zero. */
export function isOnAxis(p: SamplePoint): boolean {
  return p.y === 0;
}

/**
 * Copy of `points` without its first and last entries where those lie on
 * the axis. Interior zeros (sign changes) are kept.
 */
export function trimAxisEnds(points: readonly SamplePoint[]): SamplePoint[] {
  let from = 0;
  let to = points.length;
  if (to > 0 && isOnAxis(points[0])) from++;
  if (to > from && isOnAxis(points[to - 1])) to--;
  return points.slice(from, to);
}

/** Upper half followed by its reflection, with no duplicate at either seam. */
export function mirrorHalf(upper: readonly SamplePoint[]): SamplePoint[] {
  const lower = trimAxisEnds(upper)
    .reverse()
    .map((p) => ({ x: p.x, y: -p.y, slope: p.slope }));
  return [...upper, ...lower];
}

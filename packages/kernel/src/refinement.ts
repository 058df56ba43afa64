/**
 * Curvature-adaptive refinement — where the sample points of a curve go.
 *
 * Starting from the two domain end points, each step splits the interval
 * whose midpoint disagrees most with the slopes at both ends:
 *
 *   score = |slope(mid) − slope(right)| + |slope(mid) − slope(left)|
 *
 * Ties go to the wider interval, then to the leftmost one. A constant
 * function scores 0 everywhere and degenerates to uniform bisection.
 *
 * Two strategies produce the same points:
 *   greedyRefinement  — rescans every interval per step, O(n²)
 *   queuedRefinement  — binary heap of interval candidates, O(n log n)
 *
 * The greedy rescan is the default; budgets are tens of points.
 */

import type { CurveFunction } from './functions.js';

/** Finite-difference step used for slope estimation. */
export const SLOPE_EPSILON = 1e-6;

export interface SamplePoint {
  x: number;
  y: number;
  /** atan of the finite-difference derivative at x (radians). */
  slope: number;
}

/**
 * Estimate atan(f'(x)). Forward difference by default; backward at the
 * domain end so the estimate never evaluates past xEnd.
 */
export function estimateSlope(f: CurveFunction, x: number, backward = false): number {
  const d = backward
    ? (f(x) - f(x - SLOPE_EPSILON)) / SLOPE_EPSILON
    : (f(x + SLOPE_EPSILON) - f(x)) / SLOPE_EPSILON;
  return Math.atan(d);
}

export function samplePoint(f: CurveFunction, x: number, backward = false): SamplePoint {
  return { x, y: f(x), slope: estimateSlope(f, x, backward) };
}

/**
 * Grows [start, end] to `count` points, ordered by ascending x.
 * Implementations must be deterministic for a pure f.
 */
export type Refinement = (
  f: CurveFunction,
  start: SamplePoint,
  end: SamplePoint,
  count: number,
) => SamplePoint[];

// ─── Candidate scoring ────────────────────────────────────────

interface Candidate {
  left: SamplePoint;
  right: SamplePoint;
  mid: SamplePoint;
  score: number;
  span: number;
}

function candidate(f: CurveFunction, left: SamplePoint, right: SamplePoint): Candidate {
  const span = right.x - left.x;
  const mid = samplePoint(f, left.x + span / 2);
  const score = Math.abs(mid.slope - right.slope) + Math.abs(mid.slope - left.slope);
  return { left, right, mid, score, span };
}

/** True if a should be split before b (higher score, then wider, then leftmost). */
function precedes(a: Candidate, b: Candidate): boolean {
  if (a.score !== b.score) return a.score > b.score;
  if (a.span !== b.span) return a.span > b.span;
  return a.left.x < b.left.x;
}

// ─── Greedy rescan ─────────────────────────────────────────────

export const greedyRefinement: Refinement = (f, start, end, count) => {
  const points: SamplePoint[] = [start, end];

  for (let step = 2; step < count; step++) {
    // Strict comparison keeps the leftmost interval on a full tie
    let index = 1;
    let bestScore = 0;
    let bestSpan = 0;
    let best: Candidate | null = null;

    for (let j = 1; j < points.length; j++) {
      const c = candidate(f, points[j - 1], points[j]);
      if (c.score > bestScore || (c.score === bestScore && c.span > bestSpan)) {
        index = j;
        bestScore = c.score;
        bestSpan = c.span;
        best = c;
      }
    }

    // Only reachable when every score is NaN
    const chosen = best ?? candidate(f, points[0], points[1]);
    points.splice(index, 0, chosen.mid);
  }

  return points;
};

// ─── Heap-backed variant ───────────────────────────────────────

class CandidateHeap {
  private readonly items: Candidate[] = [];

  get size(): number {
    return this.items.length;
  }

  push(c: Candidate): void {
    const items = this.items;
    items.push(c);
    let i = items.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!precedes(items[i], items[parent])) break;
      [items[i], items[parent]] = [items[parent], items[i]];
      i = parent;
    }
  }

  pop(): Candidate | undefined {
    const items = this.items;
    const top = items[0];
    const last = items.pop();
    if (items.length === 0 || last === undefined) return top;

    items[0] = last;
    let i = 0;
    for (;;) {
      const l = 2 * i + 1;
      const r = l + 1;
      let first = i;
      if (l < items.length && precedes(items[l], items[first])) first = l;
      if (r < items.length && precedes(items[r], items[first])) first = r;
      if (first === i) break;
      [items[i], items[first]] = [items[first], items[i]];
      i = first;
    }
    return top;
  }
}

export const queuedRefinement: Refinement = (f, start, end, count) => {
  const points: SamplePoint[] = [start, end];
  const heap = new CandidateHeap();
  heap.push(candidate(f, start, end));

  // Splitting an interval only replaces its own candidate with two new ones
  for (let step = 2; step < count && heap.size > 0; step++) {
    const next = heap.pop();
    if (!next) break;
    points.push(next.mid);
    heap.push(candidate(f, next.left, next.mid));
    heap.push(candidate(f, next.mid, next.right));
  }

  return points.sort((a, b) => a.x - b.x);
};

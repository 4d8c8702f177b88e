/**
 * The limit function lim(node, x) = sup_n approx(node, n, x).
 *
 * approx is non-decreasing in n, and lim - approx_n ≤ 2^-n: at each level
 * one of the two children takes its exact boundary value, so the remaining
 * error is halved. That gives a depth for any tolerance up front.
 */

import type { CU } from './cu.js';
import { descend } from './approx.js';
import { ToleranceError } from './errors.js';

/** 2^-1074 is the smallest positive double, so no tolerance needs a deeper descent. */
export const MAX_DEPTH = 1074;

export const DEFAULT_TOLERANCE = 1e-6;

export interface LimEstimate {
  /** approx at `depth`; never above the true limit. */
  value: number;
  depth: number;
  /** lim - value lies in [0, errorBound]. */
  errorBound: number;
  /** value is the limit itself (point in some C, or outside some U). */
  exact: boolean;
}

/** Smallest n with 2^-n ≤ tolerance. Never exceeds MAX_DEPTH. */
export function depthForTolerance(tolerance: number): number {
  if (!Number.isFinite(tolerance) || tolerance <= 0) throw new ToleranceError(tolerance);
  let depth = 0;
  let bound = 1;
  while (bound > tolerance) {
    bound /= 2;
    depth++;
  }
  return depth;
}

export function estimateLim<P, O, K>(
  node: CU<P, O, K>,
  point: P,
  tolerance = DEFAULT_TOLERANCE,
): LimEstimate {
  const depth = depthForTolerance(tolerance);
  const { value, settled } = descend(node, depth, point);
  return {
    value,
    depth,
    errorBound: settled ? 0 : 2 ** -depth,
    exact: settled,
  };
}

/** lim(node, point) to within `tolerance` (from below). */
export function limApprox<P, O, K>(node: CU<P, O, K>, point: P, tolerance = DEFAULT_TOLERANCE): number {
  return estimateLim(node, point, tolerance).value;
}

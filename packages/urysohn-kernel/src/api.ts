/**
 * Fluent API: one call per concrete space.
 *
 *   separateIntervals(atMost(-1), atLeast(1)).at(0)        // 0.5
 *   separateRegions(sphere(1), sphere(1).at(4, 0, 0))      // f = 1/2 on x = 2
 *
 * Each returns a SeparatingFunction bound to the space's own oracle.
 */

import { urysohn, type SeparatingFunction, type SeparationOptions } from './urysohn.js';
import { realLine, intervalOracle, type IntervalSet } from './spaces/intervals.js';
import { levelSetSpace, levelSetOracle, ClosedRegion, type Field, type OpenRegion } from './spaces/field.js';
import { searchOracle, type FiniteSpace, type FiniteSet } from './spaces/finite.js';
import type { Vec3 } from './vec3.js';

export type IntervalSeparator = SeparatingFunction<number, IntervalSet, IntervalSet>;
export type RegionSeparator = SeparatingFunction<Vec3, OpenRegion, ClosedRegion>;
export type FiniteSeparator = SeparatingFunction<string, FiniteSet, FiniteSet>;

/** 0 on s, 1 on t, for disjoint closed interval sets. */
export function separateIntervals(s: IntervalSet, t: IntervalSet, options?: SeparationOptions): IntervalSeparator {
  return urysohn(realLine, intervalOracle, s, t, options);
}

/**
 * 0 on {s ≤ 0}, 1 on {t ≤ 0}. Disjointness cannot be decided for arbitrary
 * fields; overlapping regions are reported when a point of the overlap is
 * evaluated.
 */
export function separateRegions(s: Field, t: Field, options?: SeparationOptions): RegionSeparator {
  return urysohn(levelSetSpace, levelSetOracle, new ClosedRegion(s), new ClosedRegion(t), options);
}

export function separateFinite(
  space: FiniteSpace,
  s: FiniteSet,
  t: FiniteSet,
  options?: SeparationOptions,
): FiniteSeparator {
  return urysohn(space, searchOracle(space), s, t, options);
}

/**
 * Performance gates: timed assertions that catch algorithmic regressions.
 *
 * Evaluation must stay linear in depth (one descent per point, not the
 * 2^n two-child recursion), and node memoization must keep repeated
 * evaluations from calling the oracle again.
 *
 * If a gate fails: profile the function, don't just bump the budget.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  CU, limApprox, approx, continuityNeighborhood, separateRegions,
  realLine, intervalOracle, singleton, openInterval, sphere,
} from '../src/index.js';

/** Run fn, return [result, elapsed_ms]. */
function timed<T>(fn: () => T): [T, number] {
  const t0 = performance.now();
  const result = fn();
  return [result, performance.now() - t0];
}

describe('performance gates', () => {

  // ─── Evaluation ──────────────────────────────────────────

  describe('limApprox', () => {
    it('1000 interval points at depth 40 within 500ms', () => {
      const root = CU.make(realLine, intervalOracle, singleton(0), openInterval(-1, 1));
      const xs = Array.from({ length: 1000 }, (_, k) => -1.2 + (2.4 * k) / 999);
      const [values, ms] = timed(() => xs.map((x) => limApprox(root, x, 2 ** -40)));
      for (let k = 0; k < xs.length; k++) {
        expect(Math.abs((values[k] ?? NaN) - Math.min(Math.abs(xs[k] ?? NaN), 1))).toBeLessThanOrEqual(2 ** -40);
      }
      expect(ms, `limApprox took ${ms.toFixed(0)}ms`).toBeLessThan(500);
    });

    it('depth 52 level-set evaluation within 200ms', () => {
      const f = separateRegions(sphere(1), sphere(1).at(4, 0, 0));
      const [value, ms] = timed(() => f.at([2.3, 0.2, 0.1], 2 ** -52));
      expect(value).toBeGreaterThan(0.5);
      expect(value).toBeLessThan(1);
      expect(ms, `level-set evaluation took ${ms.toFixed(0)}ms`).toBeLessThan(200);
    });

    it('reuses memoized nodes across points', () => {
      const separate = vi.fn(intervalOracle.separate);
      const root = CU.make(realLine, { separate }, singleton(0), openInterval(-1, 1));
      approx(root, 30, 0.3);
      const calls = separate.mock.calls.length;
      expect(calls).toBeLessThanOrEqual(30);
      approx(root, 30, 0.3);
      expect(separate).toHaveBeenCalledTimes(calls);
    });
  });

  // ─── Continuity certificates ─────────────────────────────

  describe('continuityNeighborhood', () => {
    it('level 8 certificate within 500ms', () => {
      const root = CU.make(realLine, intervalOracle, singleton(0), openInterval(-1, 1));
      const [cert, ms] = timed(() => continuityNeighborhood(root, 0.7, 8));
      expect(cert.neighborhood.radiusAt(0.7)).toBeGreaterThan(0);
      expect(ms, `certificate took ${ms.toFixed(0)}ms`).toBeLessThan(500);
    });
  });
});

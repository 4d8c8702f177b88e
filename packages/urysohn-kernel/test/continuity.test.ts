import { describe, it, expect } from 'vitest';
import {
  CU, continuityNeighborhood, limApprox, realLine, intervalOracle, IntervalSet,
  singleton, openInterval, atMost, atLeast, closedInterval, separateIntervals, UrysohnError,
} from '../src/index.js';

const TOL = 1e-6;
const root = CU.make(realLine, intervalOracle, singleton(0), openInterval(-1, 1));

/** Points of (x - r, x + r), or of [x - 10, x + 10] when r is infinite. */
function probes(x: number, r: number): number[] {
  const reach = Number.isFinite(r) ? r * 0.999 : 10;
  return [-1, -0.75, -0.5, -0.1, 0.1, 0.5, 0.75, 1].map((k) => x + k * reach);
}

describe('continuityNeighborhood on the ramp', () => {
  it('uses the whole line at level 0', () => {
    const cert = continuityNeighborhood(root, 0.3, 0);
    expect(cert.neighborhood.toString()).toBe('(-∞, ∞)');
    expect(cert.bound).toBe(1);
    expect(cert.insideLeft).toBe(0);
    expect(cert.outsideLeft).toBe(0);
  });

  it('stays inside left.U when x is there', () => {
    const cert = continuityNeighborhood(root, 0.3, 1);
    expect(cert.neighborhood.toString()).toBe('(-0.5, 0.5)');
    expect(cert.bound).toBe(0.75);
    expect(cert.insideLeft).toBe(1);
    expect(cert.outsideLeft).toBe(0);
  });

  it('stays off left.right.C when x is outside left.U', () => {
    // left = ({0}, (-1/2, 1/2)), left.right.C = [-1/4, 1/4]
    const cert = continuityNeighborhood(root, 0.7, 1);
    expect(cert.neighborhood.toString()).toBe('(-∞, -0.25) ∪ (0.25, ∞)');
    expect(cert.insideLeft).toBe(0);
    expect(cert.outsideLeft).toBe(1);
  });

  it('always contains x in an open neighborhood', () => {
    for (const x of [0, 0.3, -0.45, 0.7, 0.99, 1, 3]) {
      for (let n = 0; n <= 6; n++) {
        const { neighborhood } = continuityNeighborhood(root, x, n);
        expect(neighborhood.isOpen()).toBe(true);
        expect(neighborhood.radiusAt(x), `x=${x} n=${n}`).toBeGreaterThan(0);
      }
    }
  });

  it('bounds the oscillation by (3/4)^n', () => {
    for (const x of [0, 0.3, -0.45, 0.7, 0.99, 1, 3]) {
      const fx = limApprox(root, x, TOL);
      for (let n = 0; n <= 8; n++) {
        const cert = continuityNeighborhood(root, x, n);
        expect(cert.bound).toBe(0.75 ** n);
        for (const y of probes(x, cert.neighborhood.radiusAt(x))) {
          expect(Math.abs(limApprox(root, y, TOL) - fx), `x=${x} y=${y} n=${n}`)
            .toBeLessThanOrEqual(cert.bound + 2 * TOL);
        }
      }
    }
  });

  it('rejects invalid levels', () => {
    expect(() => continuityNeighborhood(root, 0, -1)).toThrow(UrysohnError);
    expect(() => continuityNeighborhood(root, 0, 0.5)).toThrow(UrysohnError);
  });
});

describe('continuity certificates through separators', () => {
  it('certifies a two-sided separator', () => {
    const f = separateIntervals(atMost(-1), atLeast(1));
    for (const x of [-1.5, -1, -0.2, 0, 0.4, 1, 2]) {
      const cert = f.certify(x, 5);
      const r = cert.neighborhood.radiusAt(x);
      expect(r).toBeGreaterThan(0);
      for (const y of probes(x, r)) {
        expect(Math.abs(f.at(y) - f.at(x))).toBeLessThanOrEqual(cert.bound + 2 * TOL);
      }
    }
  });

  it('certifies around a C made of several intervals', () => {
    const s = IntervalSet.of(...closedInterval(-3, -2).intervals, ...closedInterval(2, 3).intervals);
    const f = separateIntervals(s, closedInterval(-0.5, 0.5));
    for (const x of [-2.5, -1, 0.75, 1.9, 4]) {
      const cert = f.certify(x, 4);
      for (const y of probes(x, cert.neighborhood.radiusAt(x))) {
        expect(Math.abs(f.at(y) - f.at(x))).toBeLessThanOrEqual(cert.bound + 2 * TOL);
      }
    }
  });
});

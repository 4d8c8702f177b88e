/**
 * Continuity certificates for the limit function.
 *
 * For a point x and level n, builds an open neighborhood N of x with
 * |lim(y) - lim(x)| ≤ (3/4)^n for every y ∈ N. Recursion on n:
 *
 *   n = 0         N = whole space (both values lie in [0, 1])
 *   x ∈ left.U    N = left.U ∩ N(left, n-1)
 *                 right's lim is 0 on left.U, so the gap halves: r/2
 *   x ∉ left.U    N = (left.right.C)ᶜ ∩ N(left.right, n-1) ∩ N(right, n-1)
 *                 left.left's lim is 1 off left.right.C, so the gap is
 *                 at most ((r/2 + r) / 2) = (3/4) r
 */

import type { CU } from './cu.js';
import { assertLevel } from './errors.js';

export interface ContinuityCertificate<O> {
  neighborhood: O;
  level: number;
  /** (3/4)^level */
  bound: number;
  /** Times the recursion took the x ∈ left.U branch. */
  insideLeft: number;
  /** Times it took the x ∉ left.U branch. */
  outsideLeft: number;
}

export const CONTRACTION = 3 / 4;

export function continuityNeighborhood<P, O, K>(
  node: CU<P, O, K>,
  x: P,
  level: number,
): ContinuityCertificate<O> {
  assertLevel(level, 'level');
  const counts = { insideLeft: 0, outsideLeft: 0 };
  const neighborhood = build(node, x, level, counts);
  return { neighborhood, level, bound: CONTRACTION ** level, ...counts };
}

function build<P, O, K>(
  node: CU<P, O, K>,
  x: P,
  level: number,
  counts: { insideLeft: number; outsideLeft: number },
): O {
  const space = node.space;
  if (level === 0) return space.whole();

  const left = node.left();
  if (left.inU(x)) {
    counts.insideLeft++;
    return space.intersect(left.U, build(left, x, level - 1, counts));
  }

  counts.outsideLeft++;
  const leftRight = left.right();
  const away = space.complementOfClosed(leftRight.C);
  return space.intersect(
    away,
    space.intersect(build(leftRight, x, level - 1, counts), build(node.right(), x, level - 1, counts)),
  );
}

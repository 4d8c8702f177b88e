/**
 * Depth-n approximations of the separating function.
 *
 *   approx(node, 0, x)   = 1 if x ∉ U else 0
 *   approx(node, n+1, x) = (approx(left, n, x) + approx(right, n, x)) / 2
 *
 * Values are dyadic rationals k / 2^n in [0, 1].
 */

import type { CU } from './cu.js';
import { assertLevel } from './errors.js';

/**
 * Evaluate approx by a single descent instead of the two-child recursion.
 *
 * At every node, x ∈ C pins the value to 0 and x ∉ U pins it to 1 at all
 * depths. Otherwise x ∈ left.U puts x in right.C (right child is 0), and
 * x ∉ left.U puts x outside left.U (left child is 1), so only one child is
 * ever unresolved. O(depth) nodes per point.
 */
export function approx<P, O, K>(node: CU<P, O, K>, depth: number, point: P): number {
  return descend(node, depth, point).value;
}

/** Result of a descent: the depth-n value and whether it is already the limit. */
export interface Descent {
  value: number;
  /** True when the descent stopped at a node whose C contains the point or whose U misses it. */
  settled: boolean;
}

export function descend<P, O, K>(node: CU<P, O, K>, depth: number, point: P): Descent {
  assertLevel(depth, 'depth');
  let value = 0;
  let weight = 1;
  let current = node;
  for (let remaining = depth; ; remaining--) {
    const inC = current.inC(point);
    const inU = current.inU(point);
    // Only the starting node can fail this: children are entered with the point in their U.
    if (inC && !inU && current.checksContracts) {
      throw current.invariantError('point lies in C but not in U');
    }
    if (inC) return { value, settled: true };
    if (!inU) return { value: value + weight, settled: true };
    if (remaining === 0) return { value, settled: false };

    weight /= 2;
    const left = current.left();
    if (left.inU(point)) {
      if (current.checksContracts && !current.right().inC(point)) {
        throw current.contractError('point lies in separate(C, U) but not in its closure');
      }
      current = left;
    } else {
      value += weight;
      current = current.right();
    }
  }
}

/**
 * The literal two-child recursion. Exponential in depth; exists to
 * cross-check the descent.
 */
export function approxByDefinition<P, O, K>(node: CU<P, O, K>, depth: number, point: P): number {
  assertLevel(depth, 'depth');
  return byDefinition(node, depth, point);
}

function byDefinition<P, O, K>(node: CU<P, O, K>, depth: number, point: P): number {
  if (depth === 0) return node.inU(point) ? 0 : 1;
  return (byDefinition(node.left(), depth - 1, point) + byDefinition(node.right(), depth - 1, point)) / 2;
}

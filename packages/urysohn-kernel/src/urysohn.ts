/**
 * Separating functions, the entry point most callers want.
 *
 *   const f = urysohn(realLine, intervalOracle, singleton(0), atLeast(1));
 *   f.at(0.5)          // 0.5
 *   f.certify(0.5, 4)  // neighborhood where f moves by ≤ (3/4)^4
 *
 * Given disjoint closed s, t the root node is (s, tᶜ): lim is 0 on s and
 * 1 off tᶜ, i.e. on t.
 */

import { CU, type CUOptions } from './cu.js';
import type { Space, NormalityOracle } from './space.js';
import { approx } from './approx.js';
import { estimateLim, depthForTolerance, DEFAULT_TOLERANCE, type LimEstimate } from './lim.js';
import { continuityNeighborhood, type ContinuityCertificate } from './continuity.js';
import { PreconditionViolatedError, UrysohnError } from './errors.js';

export interface SeparationOptions extends CUOptions {
  /** Output interval: `low` on s, `high` on t. Default [0, 1]. */
  range?: [number, number];
  /** Default tolerance for at() / estimate(). */
  tolerance?: number;
}

export interface SeparatorReadback {
  space: string;
  s?: string;
  t?: string;
  range: [number, number];
  tolerance: number;
}

/** Build the root node for a closed set C inside an open set U. */
export function build<P, O, K>(
  space: Space<P, O, K>,
  oracle: NormalityOracle<O, K>,
  C: K,
  U: O,
  options?: CUOptions,
): CU<P, O, K> {
  return CU.make(space, oracle, C, U, options);
}

export class SeparatingFunction<P, O, K> {
  readonly range: [number, number];
  readonly tolerance: number;

  constructor(
    readonly root: CU<P, O, K>,
    readonly s: K,
    readonly t: K,
    options: SeparationOptions = {},
  ) {
    const range = options.range ?? [0, 1];
    if (!Number.isFinite(range[0]) || !Number.isFinite(range[1])) {
      throw new UrysohnError(`range must be finite, got [${range[0]}, ${range[1]}]`, 'INVALID_ARGUMENT');
    }
    this.range = [range[0], range[1]];
    this.tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
    depthForTolerance(this.tolerance);
  }

  get space(): Space<P, O, K> { return this.root.space; }

  /** Value at p, within tolerance (scaled by the range width). */
  at(p: P, tolerance = this.tolerance): number {
    return this.rescale(estimateLim(this.root, p, tolerance).value);
  }

  /** Unscaled limit estimate with its error bound. */
  estimate(p: P, tolerance = this.tolerance): LimEstimate {
    return estimateLim(this.root, p, tolerance);
  }

  /** Depth-n approximation, rescaled to the range. */
  approx(p: P, depth: number): number {
    return this.rescale(approx(this.root, depth, p));
  }

  /** Neighborhood of p on which the unscaled function moves by at most (3/4)^level. */
  certify(p: P, level: number): ContinuityCertificate<O> {
    return continuityNeighborhood(this.root, p, level);
  }

  sample(points: readonly P[], tolerance = this.tolerance): number[] {
    return points.map((p) => this.at(p, tolerance));
  }

  readback(): SeparatorReadback {
    const space = this.space;
    const out: SeparatorReadback = { space: space.name, range: this.range, tolerance: this.tolerance };
    if (space.describeClosed) {
      out.s = space.describeClosed(this.s);
      out.t = space.describeClosed(this.t);
    }
    return out;
  }

  private rescale(unit: number): number {
    const [low, high] = this.range;
    return low + (high - low) * unit;
  }
}

/**
 * Continuous function that is `low` on s, `high` on t. s and t must be
 * disjoint closed sets; disjointness is checked where the space can decide
 * inclusion.
 */
export function urysohn<P, O, K>(
  space: Space<P, O, K>,
  oracle: NormalityOracle<O, K>,
  s: K,
  t: K,
  options: SeparationOptions = {},
): SeparatingFunction<P, O, K> {
  const outside = space.complementOfClosed(t);
  if ((options.checkContracts ?? true) && space.subset && !space.subset(s, outside)) {
    throw new PreconditionViolatedError(
      `Closed sets must be disjoint, got s = ${space.describeClosed?.(s) ?? '<set>'}, t = ${space.describeClosed?.(t) ?? '<set>'}`,
    );
  }
  const root = CU.make(space, oracle, s, outside, { checkContracts: options.checkContracts });
  return new SeparatingFunction(root, s, t, options);
}

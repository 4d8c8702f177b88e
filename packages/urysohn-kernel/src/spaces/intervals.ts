/**
 * Real line: finite unions of intervals.
 *
 * IntervalSet keeps its intervals sorted, disjoint and non-touching, so
 * every set has one canonical form:
 *
 *   IntervalSet.of(closedInterval(0, 1), openInterval(1, 2))  →  [0, 2)
 *
 * Infinite endpoints are always open.
 */

import type { Space, NormalityOracle } from '../space.js';
import { UrysohnError, PreconditionViolatedError } from '../errors.js';

export interface Interval {
  readonly lo: number;
  readonly hi: number;
  readonly loClosed: boolean;
  readonly hiClosed: boolean;
}

export function interval(lo: number, hi: number, loClosed: boolean, hiClosed: boolean): Interval {
  if (Number.isNaN(lo) || Number.isNaN(hi)) {
    throw new UrysohnError('Interval endpoints must be numbers, got NaN', 'INVALID_ARGUMENT');
  }
  return {
    lo,
    hi,
    loClosed: loClosed && Number.isFinite(lo),
    hiClosed: hiClosed && Number.isFinite(hi),
  };
}

function isEmptyInterval(i: Interval): boolean {
  return i.lo > i.hi || (i.lo === i.hi && !(i.loClosed && i.hiClosed));
}

function formatInterval(i: Interval): string {
  if (i.lo === i.hi) return `{${i.lo}}`;
  const lo = i.lo === -Infinity ? '-∞' : String(i.lo);
  const hi = i.hi === Infinity ? '∞' : String(i.hi);
  return `${i.loClosed ? '[' : '('}${lo}, ${hi}${i.hiClosed ? ']' : ')'}`;
}

function intersectIntervals(a: Interval, b: Interval): Interval {
  let lo: number, loClosed: boolean;
  if (a.lo > b.lo) { lo = a.lo; loClosed = a.loClosed; }
  else if (b.lo > a.lo) { lo = b.lo; loClosed = b.loClosed; }
  else { lo = a.lo; loClosed = a.loClosed && b.loClosed; }

  let hi: number, hiClosed: boolean;
  if (a.hi < b.hi) { hi = a.hi; hiClosed = a.hiClosed; }
  else if (b.hi < a.hi) { hi = b.hi; hiClosed = b.hiClosed; }
  else { hi = a.hi; hiClosed = a.hiClosed && b.hiClosed; }

  return { lo, hi, loClosed, hiClosed };
}

/** Sort, drop empties, merge overlapping or touching intervals. */
function normalize(intervals: readonly Interval[]): Interval[] {
  const sorted = intervals
    .filter((i) => !isEmptyInterval(i))
    .sort((a, b) => a.lo - b.lo || Number(b.loClosed) - Number(a.loClosed));

  const out: Interval[] = [];
  for (const next of sorted) {
    const cur = out[out.length - 1];
    const joins = cur !== undefined &&
      (next.lo < cur.hi || (next.lo === cur.hi && (cur.hiClosed || next.loClosed)));
    if (!cur || !joins) {
      out.push({ ...next });
      continue;
    }
    if (next.hi > cur.hi) {
      out[out.length - 1] = { ...cur, hi: next.hi, hiClosed: next.hiClosed };
    } else if (next.hi === cur.hi && next.hiClosed && !cur.hiClosed) {
      out[out.length - 1] = { ...cur, hiClosed: true };
    }
  }
  return out;
}

export class IntervalSet {
  private constructor(readonly intervals: readonly Interval[]) {}

  static of(...intervals: Interval[]): IntervalSet {
    return new IntervalSet(normalize(intervals));
  }

  static empty(): IntervalSet { return new IntervalSet([]); }

  static all(): IntervalSet {
    return new IntervalSet([interval(-Infinity, Infinity, false, false)]);
  }

  get isEmpty(): boolean { return this.intervals.length === 0; }

  contains(x: number): boolean {
    return this.component(x) !== undefined;
  }

  /** The interval of this set that contains x, if any. */
  component(x: number): Interval | undefined {
    return this.intervals.find((i) =>
      (i.lo < x || (i.lo === x && i.loClosed)) && (x < i.hi || (x === i.hi && i.hiClosed)),
    );
  }

  union(other: IntervalSet): IntervalSet {
    return IntervalSet.of(...this.intervals, ...other.intervals);
  }

  intersect(other: IntervalSet): IntervalSet {
    const parts: Interval[] = [];
    for (const a of this.intervals) {
      for (const b of other.intervals) parts.push(intersectIntervals(a, b));
    }
    return IntervalSet.of(...parts);
  }

  complement(): IntervalSet {
    const gaps: Interval[] = [];
    let lo = -Infinity;
    let loClosed = false;
    for (const i of this.intervals) {
      gaps.push(interval(lo, i.lo, loClosed, !i.loClosed));
      lo = i.hi;
      loClosed = !i.hiClosed;
    }
    gaps.push(interval(lo, Infinity, loClosed, false));
    return IntervalSet.of(...gaps);
  }

  closure(): IntervalSet {
    return IntervalSet.of(...this.intervals.map((i) => interval(i.lo, i.hi, true, true)));
  }

  interior(): IntervalSet {
    return IntervalSet.of(...this.intervals.map((i) => interval(i.lo, i.hi, false, false)));
  }

  isOpen(): boolean { return this.equals(this.interior()); }
  isClosed(): boolean { return this.equals(this.closure()); }

  subsetOf(other: IntervalSet): boolean {
    return this.intersect(other.complement()).isEmpty;
  }

  equals(other: IntervalSet): boolean {
    if (this.intervals.length !== other.intervals.length) return false;
    return this.intervals.every((a, k) => {
      const b = other.intervals[k];
      return b !== undefined && a.lo === b.lo && a.hi === b.hi &&
        a.loClosed === b.loClosed && a.hiClosed === b.hiClosed;
    });
  }

  /**
   * Distance from x to the complement: (x - r, x + r) lies in the set.
   * 0 when x is outside or on a boundary point, Infinity for the whole line.
   */
  radiusAt(x: number): number {
    const i = this.component(x);
    if (!i) return 0;
    return Math.min(x - i.lo, i.hi - x);
  }

  toString(): string {
    return this.isEmpty ? '∅' : this.intervals.map(formatInterval).join(' ∪ ');
  }
}

// ─── Constructors ──────────────────────────────────────────────

/** [lo, hi] */
export function closedInterval(lo: number, hi: number): IntervalSet {
  return IntervalSet.of(interval(lo, hi, true, true));
}

/** (lo, hi) */
export function openInterval(lo: number, hi: number): IntervalSet {
  return IntervalSet.of(interval(lo, hi, false, false));
}

/** {x} */
export function singleton(x: number): IntervalSet {
  return closedInterval(x, x);
}

/** [a, ∞) */
export function atLeast(a: number): IntervalSet {
  return IntervalSet.of(interval(a, Infinity, true, false));
}

/** (-∞, a] */
export function atMost(a: number): IntervalSet {
  return IntervalSet.of(interval(-Infinity, a, false, true));
}

// ─── Space + oracle ────────────────────────────────────────────

export const realLine: Space<number, IntervalSet, IntervalSet> = {
  name: 'real line',
  inOpen: (set, x) => set.contains(x),
  inClosed: (set, x) => set.contains(x),
  closure: (set) => set.closure(),
  complementOfOpen: (set) => set.complement(),
  complementOfClosed: (set) => set.complement(),
  intersect: (a, b) => a.intersect(b),
  whole: () => IntervalSet.all(),
  subset: (closed, open) => closed.subsetOf(open),
  isOpen: (set) => set.isOpen(),
  isClosed: (set) => set.isClosed(),
  describeOpen: (set) => set.toString(),
  describeClosed: (set) => set.toString(),
};

/**
 * Each component [a, b] of C sits in a component (p, q) of U. Its
 * separating interval runs from the midpoint of p and a to the midpoint of
 * b and q; on an unbounded side it reaches one unit past the endpoint.
 */
export const intervalOracle: NormalityOracle<IntervalSet, IntervalSet> = {
  separate(closed, open) {
    const parts = closed.intervals.map((c) => {
      const u = open.intervals.find((j) => IntervalSet.of(c).subsetOf(IntervalSet.of(j)));
      if (!u) {
        throw new PreconditionViolatedError(
          `separate requires C ⊆ U: ${formatInterval(c)} is not inside ${open.toString()}`,
        );
      }
      const lo = u.lo === -Infinity ? c.lo - 1 : (u.lo + c.lo) / 2;
      const hi = u.hi === Infinity ? c.hi + 1 : (c.hi + u.hi) / 2;
      return interval(lo, hi, false, false);
    });
    return IntervalSet.of(...parts);
  },
};

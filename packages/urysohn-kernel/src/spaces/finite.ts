/**
 * Finite topological spaces.
 *
 * Points are string labels; the topology is the explicit list of open sets.
 * Small spaces only: generating a topology or the discrete topology
 * enumerates subsets.
 */

import type { NormalityOracle, Space } from '../space.js';
import { UrysohnError, OracleContractViolatedError } from '../errors.js';

/** Discrete topology enumerates 2^n subsets. */
const MAX_DISCRETE_POINTS = 12;

export class FiniteSet implements Iterable<string> {
  private readonly items: ReadonlySet<string>;
  private readonly sorted: readonly string[];
  /** Canonical form: JSON array of the sorted labels. */
  readonly key: string;

  constructor(items: Iterable<string>) {
    this.items = new Set(items);
    this.sorted = [...this.items].sort();
    this.key = JSON.stringify(this.sorted);
  }

  get size(): number { return this.items.size; }

  has(p: string): boolean { return this.items.has(p); }

  union(other: FiniteSet): FiniteSet {
    return new FiniteSet([...this.items, ...other.items]);
  }

  intersect(other: FiniteSet): FiniteSet {
    return new FiniteSet([...this.items].filter((p) => other.has(p)));
  }

  minus(other: FiniteSet): FiniteSet {
    return new FiniteSet([...this.items].filter((p) => !other.has(p)));
  }

  subsetOf(other: FiniteSet): boolean {
    return [...this.items].every((p) => other.has(p));
  }

  equals(other: FiniteSet): boolean { return this.key === other.key; }

  [Symbol.iterator](): Iterator<string> { return this.items[Symbol.iterator](); }

  toString(): string { return `{${this.sorted.join(', ')}}`; }
}

const EMPTY_KEY = new FiniteSet([]).key;

export class FiniteSpace implements Space<string, FiniteSet, FiniteSet> {
  readonly points: FiniteSet;
  /** Open sets, smallest first. */
  readonly opens: readonly FiniteSet[];
  private readonly openKeys: ReadonlySet<string>;

  /**
   * @param opens Every open set of the topology. Must contain ∅ and the
   *   whole space and be closed under union and intersection.
   * @param validate Check the topology axioms (pairwise, so O(opens²)).
   */
  constructor(
    points: Iterable<string>,
    opens: Iterable<Iterable<string>>,
    readonly name = 'finite space',
    validate = true,
  ) {
    this.points = new FiniteSet(points);
    const byKey = new Map<string, FiniteSet>();
    for (const o of opens) {
      const set = new FiniteSet(o);
      if (!set.subsetOf(this.points)) {
        throw new UrysohnError(`Open set ${set} has points outside ${this.points}`, 'INVALID_ARGUMENT');
      }
      byKey.set(set.key, set);
    }
    this.opens = [...byKey.values()].sort((a, b) => a.size - b.size || a.key.localeCompare(b.key));
    this.openKeys = new Set(byKey.keys());
    if (validate) this.validate();
  }

  private validate(): void {
    if (!this.openKeys.has(EMPTY_KEY)) {
      throw new UrysohnError('A topology must contain the empty set', 'INVALID_ARGUMENT');
    }
    if (!this.openKeys.has(this.points.key)) {
      throw new UrysohnError('A topology must contain the whole space', 'INVALID_ARGUMENT');
    }
    for (const a of this.opens) {
      for (const b of this.opens) {
        for (const c of [a.union(b), a.intersect(b)]) {
          if (!this.openKeys.has(c.key)) {
            throw new UrysohnError(
              `Not a topology: ${a} and ${b} are open but ${c} is not`,
              'INVALID_ARGUMENT',
            );
          }
        }
      }
    }
  }

  /** Coarsest topology containing every set of `subbasis`. */
  static generated(points: Iterable<string>, subbasis: Iterable<Iterable<string>>, name?: string): FiniteSpace {
    const whole = new FiniteSet(points);
    const found = new Map<string, FiniteSet>([[EMPTY_KEY, new FiniteSet([])], [whole.key, whole]]);
    for (const s of subbasis) {
      const set = new FiniteSet(s);
      found.set(set.key, set);
    }
    let grew = true;
    while (grew) {
      grew = false;
      const current = [...found.values()];
      for (const a of current) {
        for (const b of current) {
          for (const c of [a.union(b), a.intersect(b)]) {
            if (!found.has(c.key)) {
              found.set(c.key, c);
              grew = true;
            }
          }
        }
      }
    }
    return new FiniteSpace(whole, found.values(), name, false);
  }

  /** Every subset is open (and closed). */
  static discrete(points: Iterable<string>, name = 'discrete space'): FiniteSpace {
    const list = [...new FiniteSet(points)];
    if (list.length > MAX_DISCRETE_POINTS) {
      throw new UrysohnError(
        `Discrete spaces support at most ${MAX_DISCRETE_POINTS} points, got ${list.length}`,
        'INVALID_ARGUMENT',
      );
    }
    const subsets: string[][] = [];
    for (let mask = 0; mask < 1 << list.length; mask++) {
      subsets.push(list.filter((_, k) => (mask >> k) & 1));
    }
    return new FiniteSpace(list, subsets, name, false);
  }

  set(...points: string[]): FiniteSet {
    const set = new FiniteSet(points);
    if (!set.subsetOf(this.points)) {
      throw new UrysohnError(`${set} has points outside ${this.points}`, 'INVALID_ARGUMENT');
    }
    return set;
  }

  isOpen(set: FiniteSet): boolean { return this.openKeys.has(set.key); }
  isClosed(set: FiniteSet): boolean { return this.isOpen(this.points.minus(set)); }

  /** Largest open subset. */
  interior(set: FiniteSet): FiniteSet {
    return this.opens.filter((o) => o.subsetOf(set)).reduce((a, b) => a.union(b), new FiniteSet([]));
  }

  inOpen(set: FiniteSet, p: string): boolean { return set.has(p); }
  inClosed(set: FiniteSet, p: string): boolean { return set.has(p); }

  closure(set: FiniteSet): FiniteSet {
    return this.points.minus(this.interior(this.points.minus(set)));
  }

  complementOfOpen(set: FiniteSet): FiniteSet { return this.points.minus(set); }
  complementOfClosed(set: FiniteSet): FiniteSet { return this.points.minus(set); }
  intersect(a: FiniteSet, b: FiniteSet): FiniteSet { return a.intersect(b); }
  whole(): FiniteSet { return this.points; }
  subset(closed: FiniteSet, open: FiniteSet): boolean { return closed.subsetOf(open); }

  describeOpen(set: FiniteSet): string { return set.toString(); }
  describeClosed(set: FiniteSet): string { return set.toString(); }
}

/**
 * Oracle for any finite space: the smallest open V with C ⊆ V and
 * closure(V) ⊆ U. Throws when none exists, which happens exactly when the
 * space cannot separate C from the complement of U.
 */
export function searchOracle(space: FiniteSpace): NormalityOracle<FiniteSet, FiniteSet> {
  return {
    separate(closed, open) {
      const v = space.opens.find((o) => closed.subsetOf(o) && space.closure(o).subsetOf(open));
      if (!v) {
        throw new OracleContractViolatedError(
          `No open set of ${space.name} separates ${closed} from the complement of ${open}`,
        );
      }
      return v;
    },
  };
}

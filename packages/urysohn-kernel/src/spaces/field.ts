/**
 * Level-set space over R^3.
 *
 * A continuous field f gives an open set {f < 0} and a closed set {f ≤ 0}.
 * Signed distance primitives compose with booleans and transforms:
 *
 *   sphere(1).union(box(2, 2, 2).at(4, 0, 0))
 *
 * The oracle adds fields: for C = {c ≤ 0} ⊆ U = {u < 0} it returns
 * V = {c + u < 0}. On C, c ≤ 0 and u < 0, so C ⊆ V; off U, u ≥ 0, so
 * c + u ≤ 0 would force c ≤ 0, i.e. a point of C outside U. Hence
 * {c + u ≤ 0} ⊆ U, and that set serves as closure(V).
 */

import type { Space, NormalityOracle } from '../space.js';
import { type Vec3, sub, dot, length, normalize } from '../vec3.js';
import { UrysohnError } from '../errors.js';

// ─── Base class ────────────────────────────────────────────────

export interface Term {
  field: Field;
  weight: number;
}

export abstract class Field {
  /** Field value at p. Negative = inside. */
  abstract evaluate(p: Vec3): number;

  /** Human-readable name for readback. */
  abstract get name(): string;

  /** Lipschitz constant: |f(p) - f(q)| ≤ L |p - q|. */
  abstract get lipschitz(): number;

  /** This field as a weighted sum of leaf fields. Overridden by Combination. */
  terms(): Term[] {
    return [{ field: this, weight: 1 }];
  }

  // ─── Booleans (fluent) ─────────────────────────────────────

  union(other: Field): Field { return new Union(this, other); }
  intersect(other: Field): Field { return new Intersect(this, other); }
  subtract(other: Field): Field { return new Intersect(this, other.negate()); }

  // ─── Transforms (fluent) ───────────────────────────────────

  translate(x: number, y: number, z: number): Field { return new Translate(this, [x, y, z]); }

  /** Alias for .translate() */
  at(x: number, y: number, z: number): Field { return this.translate(x, y, z); }

  // ─── Arithmetic (fluent) ───────────────────────────────────

  plus(other: Field): Field { return Combination.of([...this.terms(), ...other.terms()]); }
  negate(): Field { return Combination.of(this.terms().map((t) => ({ field: t.field, weight: -t.weight }))); }
}

// ─── Primitives ────────────────────────────────────────────────

export class Constant extends Field {
  readonly kind = 'constant' as const;
  constructor(readonly value: number) { super(); }
  get name() { return String(this.value); }
  get lipschitz() { return 0; }
  evaluate(_p: Vec3): number { return this.value; }
}

export class Sphere extends Field {
  readonly kind = 'sphere' as const;
  constructor(readonly radius: number) {
    super();
    if (!(radius > 0)) throw new UrysohnError(`Sphere radius must be > 0, got ${radius}`, 'INVALID_ARGUMENT');
  }
  get name() { return `sphere(r=${this.radius})`; }
  get lipschitz() { return 1; }
  evaluate(p: Vec3): number {
    return length(p) - this.radius;
  }
}

export class Box extends Field {
  readonly kind = 'box' as const;
  readonly half: Vec3;
  constructor(readonly w: number, readonly h: number, readonly d: number) {
    super();
    if (!(w > 0 && h > 0 && d > 0)) {
      throw new UrysohnError(`Box dimensions must be > 0, got ${w} x ${h} x ${d}`, 'INVALID_ARGUMENT');
    }
    this.half = [w / 2, h / 2, d / 2];
  }
  get name() { return `box(${this.w}, ${this.h}, ${this.d})`; }
  get lipschitz() { return 1; }
  evaluate(p: Vec3): number {
    const q: Vec3 = [
      Math.abs(p[0]) - this.half[0],
      Math.abs(p[1]) - this.half[1],
      Math.abs(p[2]) - this.half[2],
    ];
    return (
      length([Math.max(q[0], 0), Math.max(q[1], 0), Math.max(q[2], 0)]) +
      Math.min(Math.max(q[0], Math.max(q[1], q[2])), 0)
    );
  }
}

/** Half-space. Points where dot(p, normal) < offset are inside. */
export class HalfSpace extends Field {
  readonly kind = 'halfspace' as const;
  readonly normal: Vec3;
  constructor(normal: Vec3, readonly offset: number) {
    super();
    this.normal = normalize(normal);
    if (length(this.normal) === 0) throw new UrysohnError('HalfSpace normal must be non-zero', 'INVALID_ARGUMENT');
  }
  get name() { return `halfspace(n=[${this.normal.join(', ')}], d=${this.offset})`; }
  get lipschitz() { return 1; }
  evaluate(p: Vec3): number {
    return dot(p, this.normal) - this.offset;
  }
}

// ─── Booleans ──────────────────────────────────────────────────

export class Union extends Field {
  readonly kind = 'union' as const;
  constructor(readonly a: Field, readonly b: Field) { super(); }
  get name() { return `union(${this.a.name}, ${this.b.name})`; }
  get lipschitz() { return Math.max(this.a.lipschitz, this.b.lipschitz); }
  evaluate(p: Vec3): number {
    return Math.min(this.a.evaluate(p), this.b.evaluate(p));
  }
}

export class Intersect extends Field {
  readonly kind = 'intersect' as const;
  constructor(readonly a: Field, readonly b: Field) { super(); }
  get name() { return `intersect(${this.a.name}, ${this.b.name})`; }
  get lipschitz() { return Math.max(this.a.lipschitz, this.b.lipschitz); }
  evaluate(p: Vec3): number {
    return Math.max(this.a.evaluate(p), this.b.evaluate(p));
  }
}

// ─── Transforms ────────────────────────────────────────────────

export class Translate extends Field {
  readonly kind = 'translate' as const;
  constructor(readonly child: Field, readonly offset: Vec3) { super(); }
  get name() { return `${this.child.name}@(${this.offset.join(', ')})`; }
  get lipschitz() { return this.child.lipschitz; }
  evaluate(p: Vec3): number {
    return this.child.evaluate(sub(p, this.offset));
  }
}

// ─── Linear combinations ───────────────────────────────────────

/**
 * Σ weight · field over leaf fields. Flattened on construction, so the
 * oracle's repeated sums stay a two-term combination at any tree depth.
 */
export class Combination extends Field {
  readonly kind = 'combination' as const;

  private constructor(private readonly parts: readonly Term[]) { super(); }

  static of(terms: readonly Term[]): Field {
    const weights = new Map<Field, number>();
    for (const t of terms) {
      for (const leaf of t.field.terms()) {
        weights.set(leaf.field, (weights.get(leaf.field) ?? 0) + t.weight * leaf.weight);
      }
    }
    const parts = [...weights].filter(([, w]) => w !== 0).map(([field, weight]) => ({ field, weight }));
    const only = parts[0];
    if (parts.length === 1 && only !== undefined && only.weight === 1) return only.field;
    return new Combination(parts);
  }

  terms(): Term[] { return [...this.parts]; }

  get name() {
    if (this.parts.length === 0) return '0';
    return this.parts
      .map((t, k) => {
        const sign = t.weight < 0 ? '-' : k === 0 ? '' : '+';
        const mag = Math.abs(t.weight);
        const body = mag === 1 ? t.field.name : `${mag}·${t.field.name}`;
        return k === 0 ? `${sign}${body}` : ` ${sign} ${body}`;
      })
      .join('');
  }

  get lipschitz() {
    return this.parts.reduce((sum, t) => sum + Math.abs(t.weight) * t.field.lipschitz, 0);
  }

  evaluate(p: Vec3): number {
    let sum = 0;
    for (const t of this.parts) sum += t.weight * t.field.evaluate(p);
    return sum;
  }
}

// ─── Regions ───────────────────────────────────────────────────

/** {f < 0} */
export class OpenRegion {
  constructor(readonly field: Field) {}

  contains(p: Vec3): boolean { return this.field.evaluate(p) < 0; }

  /**
   * Radius of a ball around p inside the region: -f(p) / L.
   * 0 outside, Infinity for a constant field.
   */
  radiusAt(p: Vec3): number {
    const value = this.field.evaluate(p);
    if (value >= 0) return 0;
    const l = this.field.lipschitz;
    return l === 0 ? Infinity : -value / l;
  }

  toString(): string { return `{${this.field.name} < 0}`; }
}

/** {f ≤ 0} */
export class ClosedRegion {
  constructor(readonly field: Field) {}

  contains(p: Vec3): boolean { return this.field.evaluate(p) <= 0; }

  toString(): string { return `{${this.field.name} ≤ 0}`; }
}

// ─── Space + oracle ────────────────────────────────────────────

const EVERYWHERE = new Constant(-1);

export const levelSetSpace: Space<Vec3, OpenRegion, ClosedRegion> = {
  name: 'R^3 (level sets)',
  inOpen: (set, p) => set.contains(p),
  inClosed: (set, p) => set.contains(p),
  closure: (set) => new ClosedRegion(set.field),
  complementOfOpen: (set) => new ClosedRegion(set.field.negate()),
  complementOfClosed: (set) => new OpenRegion(set.field.negate()),
  intersect: (a, b) => new OpenRegion(a.field.intersect(b.field)),
  whole: () => new OpenRegion(EVERYWHERE),
  describeOpen: (set) => set.toString(),
  describeClosed: (set) => set.toString(),
};

export const levelSetOracle: NormalityOracle<OpenRegion, ClosedRegion> = {
  separate: (closed, open) => new OpenRegion(closed.field.plus(open.field)),
};

// ─── Constructors ──────────────────────────────────────────────

/** Sphere centered at origin. */
export function sphere(radius: number): Field {
  return new Sphere(radius);
}

/** Axis-aligned box centered at origin. */
export function box(width: number, height: number, depth: number): Field {
  return new Box(width, height, depth);
}

/** Half-space dot(p, normal) < offset. */
export function halfSpace(normal: Vec3, offset: number): Field {
  return new HalfSpace(normal, offset);
}

export function closedRegion(field: Field): ClosedRegion {
  return new ClosedRegion(field);
}

export function openRegion(field: Field): OpenRegion {
  return new OpenRegion(field);
}
